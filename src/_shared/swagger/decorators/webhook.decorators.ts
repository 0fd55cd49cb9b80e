import { applyDecorators } from '@nestjs/common';
import {
  ApiBody,
  ApiConsumes,
  ApiHeader,
  ApiOperation,
  ApiResponse,
} from '@nestjs/swagger';
import { WebhookAckDto, WebhookErrorDto } from '../../dto';

/**
 * Swagger decorator for the webhook endpoint
 */
export const ApiWebhookEndpoint = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive an inbound message',
      description:
        'Verifies the HMAC-SHA256 signature over the raw body, validates the message and stores it once per message_id. Redeliveries of a stored message_id are acknowledged without a second write.',
    }),
    ApiConsumes('application/json'),
    ApiHeader({
      name: 'X-Signature',
      description: 'Hex HMAC-SHA256 of the raw body keyed by the shared secret',
      required: true,
      example:
        '5f1d0a4e8f1c3b8e2a0f6d9c7b5a3e1f0d2c4b6a8e0f1d3c5b7a9e2f4d6c8b0a',
    }),
    ApiBody({
      description: 'Message payload, signed byte for byte',
      required: true,
      schema: {
        type: 'object',
        required: ['message_id', 'from', 'to', 'ts'],
        properties: {
          message_id: { type: 'string', example: 'm1' },
          from: { type: 'string', example: '+919876543210' },
          to: { type: 'string', example: '+14155550100' },
          ts: { type: 'string', example: '2025-01-15T10:00:00Z' },
          text: { type: 'string', nullable: true, example: 'Hello' },
        },
      },
    }),
    ApiResponse({
      status: 200,
      description: 'Stored, or already stored',
      type: WebhookAckDto,
    }),
    ApiResponse({
      status: 401,
      description: 'Missing or wrong signature',
    }),
    ApiResponse({
      status: 422,
      description: 'Signed body is not a valid message',
      type: WebhookErrorDto,
    }),
    ApiResponse({
      status: 503,
      description: 'Storage unavailable; safe to retry',
    }),
  );
};
