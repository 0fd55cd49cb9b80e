import {
  Controller,
  Get,
  Query,
  Inject,
  Logger,
  ServiceUnavailableException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  InvalidPageError,
  MessageStore,
  StorageUnavailableError,
  normalizeZonedTimestamp,
} from '../../../core';
import {
  ApiListMessages,
  ApiMessageStats,
  ListMessagesQueryDto,
  MessageListResponseDto,
  StatsResponseDto,
  toMessageDto,
  toStatsDto,
} from '../../../_shared';
import { MESSAGE_STORE } from '../constants';

/**
 * Messages Controller
 * Read side over stored messages
 */
@ApiTags('Query')
@Controller()
export class MessagesController {
  private readonly logger = new Logger(MessagesController.name);

  constructor(
    @Inject(MESSAGE_STORE)
    private readonly store: MessageStore,
  ) {}

  @Get('messages')
  @ApiListMessages()
  async listMessages(
    @Query() query: ListMessagesQueryDto,
  ): Promise<MessageListResponseDto> {
    try {
      const page = await this.store.list(
        {
          from: query.from,
          since: normalizeZonedTimestamp(query.since) ?? undefined,
          q: query.q,
        },
        { limit: query.limit, offset: query.offset },
      );

      return {
        data: page.items.map(toMessageDto),
        total: page.total,
        limit: page.limit,
        offset: page.offset,
      };
    } catch (error) {
      throw this.mapStoreError(error);
    }
  }

  @Get('stats')
  @ApiMessageStats()
  async getStats(): Promise<StatsResponseDto> {
    try {
      return toStatsDto(await this.store.stats());
    } catch (error) {
      throw this.mapStoreError(error);
    }
  }

  private mapStoreError(error: unknown): unknown {
    if (error instanceof InvalidPageError) {
      return new UnprocessableEntityException(error.message);
    }

    if (error instanceof StorageUnavailableError) {
      this.logger.error(`Message store unavailable: ${error.message}`);
      return new ServiceUnavailableException('storage unavailable');
    }

    return error;
  }
}
