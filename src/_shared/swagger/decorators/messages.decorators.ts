import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';
import { MessageListResponseDto, StatsResponseDto } from '../../dto';

/**
 * Swagger decorator for listing messages
 */
export const ApiListMessages = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'List stored messages',
      description:
        'Messages ordered by ts, then message_id. Filters combine with AND.',
    }),
    ApiResponse({
      status: 200,
      description: 'One page of messages',
      type: MessageListResponseDto,
    }),
    ApiResponse({
      status: 422,
      description: 'Invalid query parameters',
    }),
    ApiResponse({
      status: 503,
      description: 'Storage unavailable',
    }),
  );
};

/**
 * Swagger decorator for message statistics
 */
export const ApiMessageStats = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Message statistics',
      description: 'Totals, top senders and the ts range of stored messages',
    }),
    ApiResponse({
      status: 200,
      description: 'Statistics',
      type: StatsResponseDto,
    }),
    ApiResponse({
      status: 503,
      description: 'Storage unavailable',
    }),
  );
};
