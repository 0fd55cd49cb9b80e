import { Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  DEFAULT_PAGE,
  IsZonedTimestamp,
  MAX_PAGE_LIMIT,
  Message,
} from '../../core';

/**
 * Query DTO for listing messages
 */
export class ListMessagesQueryDto {
  @ApiPropertyOptional({
    description: 'Page size',
    default: DEFAULT_PAGE.limit,
    minimum: 1,
    maximum: MAX_PAGE_LIMIT,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_PAGE_LIMIT)
  limit: number = DEFAULT_PAGE.limit;

  @ApiPropertyOptional({
    description: 'Number of messages to skip',
    default: DEFAULT_PAGE.offset,
    minimum: 0,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset: number = DEFAULT_PAGE.offset;

  @ApiPropertyOptional({
    description: 'Exact sender number',
    example: '+919876543210',
  })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  from?: string;

  @ApiPropertyOptional({
    description: 'Only messages with ts at or after this instant',
    example: '2025-01-15T09:00:00Z',
  })
  @IsOptional()
  @IsZonedTimestamp()
  since?: string;

  @ApiPropertyOptional({
    description: 'Case-insensitive substring of the message text',
    example: 'hello',
  })
  @IsOptional()
  @IsString()
  q?: string;
}

/**
 * One stored message as returned by the API
 */
export class MessageDto {
  @ApiProperty({ example: 'm1' })
  message_id!: string;

  @ApiProperty({ example: '+919876543210' })
  from!: string;

  @ApiProperty({ example: '+14155550100' })
  to!: string;

  @ApiProperty({ example: '2025-01-15T10:00:00.000Z' })
  ts!: string;

  @ApiProperty({ type: String, nullable: true, example: 'Hello' })
  text!: string | null;
}

/**
 * Paginated message list
 */
export class MessageListResponseDto {
  @ApiProperty({ type: [MessageDto] })
  data!: MessageDto[];

  @ApiProperty({ description: 'Matches across all pages', example: 1 })
  total!: number;

  @ApiProperty({ example: 50 })
  limit!: number;

  @ApiProperty({ example: 0 })
  offset!: number;
}

export function toMessageDto(message: Message): MessageDto {
  return {
    message_id: message.messageId,
    from: message.from,
    to: message.to,
    ts: message.ts,
    text: message.text,
  };
}
