import { ApiProperty } from '@nestjs/swagger';
import { MessageStats } from '../../core';

export class SenderCountDto {
  @ApiProperty({ example: '+919876543210' })
  from!: string;

  @ApiProperty({ example: 3 })
  count!: number;
}

/**
 * Aggregate statistics over all stored messages
 */
export class StatsResponseDto {
  @ApiProperty({ example: 5 })
  total_messages!: number;

  @ApiProperty({ description: 'Distinct senders', example: 2 })
  senders_count!: number;

  @ApiProperty({
    type: [SenderCountDto],
    description: 'Top 10 senders by message count',
  })
  messages_per_sender!: SenderCountDto[];

  @ApiProperty({ type: String, nullable: true })
  first_message_ts!: string | null;

  @ApiProperty({ type: String, nullable: true })
  last_message_ts!: string | null;
}

export function toStatsDto(stats: MessageStats): StatsResponseDto {
  return {
    total_messages: stats.totalMessages,
    senders_count: stats.uniqueSenderCount,
    messages_per_sender: stats.topSenders.map(({ from, count }) => ({
      from,
      count,
    })),
    first_message_ts: stats.firstMessageTs,
    last_message_ts: stats.lastMessageTs,
  };
}
