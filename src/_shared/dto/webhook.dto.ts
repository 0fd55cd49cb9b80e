import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * Response DTO for an accepted webhook (created or duplicate)
 */
export class WebhookAckDto {
  @ApiProperty({ enum: ['ok'], example: 'ok' })
  status!: 'ok';
}

/**
 * Error body for rejected webhooks
 */
export class WebhookErrorDto {
  @ApiProperty({ example: 422 })
  statusCode!: number;

  @ApiProperty({ example: 'validation failed' })
  message!: string;

  @ApiPropertyOptional({ description: 'First failing field', example: 'from' })
  field?: string;

  @ApiPropertyOptional({
    example: 'from must be a phone number: optional + followed by 7-15 digits',
  })
  reason?: string;
}

/**
 * Health probe body
 */
export class HealthStatusDto {
  @ApiProperty({ example: 'ready' })
  status!: string;

  @ApiPropertyOptional({ example: 'storage unavailable' })
  reason?: string;
}
