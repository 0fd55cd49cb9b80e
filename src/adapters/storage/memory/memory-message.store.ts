import {
  InsertOutcome,
  Message,
  MessageFilter,
  MessageStats,
  MessageStore,
  PageRequest,
  PaginatedResult,
  StorageUnavailableError,
  TOP_SENDERS_LIMIT,
  ValidMessage,
  resolvePage,
} from '../../../core';

export interface MemoryStoreOptions {
  simulateLatency?: boolean;
  latencyMs?: number;
}

/**
 * In-memory message store for development and testing
 * Same contract as the database store, with deterministic behavior
 */
export class MemoryMessageStore implements MessageStore {
  private messages: Map<string, Message> = new Map();
  private available = true;
  private readonly options: Required<MemoryStoreOptions>;

  constructor(options: MemoryStoreOptions = {}) {
    this.options = {
      simulateLatency: false,
      latencyMs: 10,
      ...options,
    };
  }

  async insert(message: ValidMessage): Promise<InsertOutcome> {
    await this.beforeOperation('insert');

    if (this.messages.has(message.messageId)) {
      return InsertOutcome.ALREADY_EXISTS;
    }

    this.messages.set(
      message.messageId,
      new Message(
        message.messageId,
        message.from,
        message.to,
        message.ts,
        message.text,
        new Date().toISOString(),
      ),
    );
    return InsertOutcome.CREATED;
  }

  async list(
    filter: MessageFilter,
    page?: Partial<PageRequest>,
  ): Promise<PaginatedResult<Message>> {
    const { limit, offset } = resolvePage(page);
    await this.beforeOperation('list');

    const matches = Array.from(this.messages.values())
      .filter((m) => !filter.from || m.from === filter.from)
      .filter((m) => !filter.since || m.ts >= filter.since)
      .filter((m) => !filter.q || m.mentions(filter.q))
      .sort(compareMessages);

    return {
      items: matches.slice(offset, offset + limit),
      total: matches.length,
      limit,
      offset,
    };
  }

  async stats(): Promise<MessageStats> {
    await this.beforeOperation('stats');

    const counts = new Map<string, number>();
    let firstMessageTs: string | null = null;
    let lastMessageTs: string | null = null;

    for (const message of this.messages.values()) {
      counts.set(message.from, (counts.get(message.from) ?? 0) + 1);
      if (firstMessageTs === null || message.ts < firstMessageTs) {
        firstMessageTs = message.ts;
      }
      if (lastMessageTs === null || message.ts > lastMessageTs) {
        lastMessageTs = message.ts;
      }
    }

    const topSenders = Array.from(counts, ([from, count]) => ({ from, count }))
      .sort((a, b) =>
        b.count !== a.count ? b.count - a.count : a.from < b.from ? -1 : 1,
      )
      .slice(0, TOP_SENDERS_LIMIT);

    return {
      totalMessages: this.messages.size,
      uniqueSenderCount: counts.size,
      topSenders,
      firstMessageTs,
      lastMessageTs,
    };
  }

  async ping(): Promise<boolean> {
    return this.available;
  }

  async close(): Promise<void> {
    this.available = false;
  }

  /**
   * Test Helper Methods
   */

  /**
   * Simulate the backing store going away or coming back
   */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  size(): number {
    return this.messages.size;
  }

  clear(): void {
    this.messages.clear();
  }

  private async beforeOperation(operation: string): Promise<void> {
    if (this.options.simulateLatency) {
      await new Promise((resolve) =>
        setTimeout(resolve, this.options.latencyMs),
      );
    }
    if (!this.available) {
      throw new StorageUnavailableError(
        `Message store ${operation} failed: store is unavailable`,
        operation,
      );
    }
  }
}

function compareMessages(a: Message, b: Message): number {
  if (a.ts !== b.ts) {
    return a.ts < b.ts ? -1 : 1;
  }
  if (a.messageId !== b.messageId) {
    return a.messageId < b.messageId ? -1 : 1;
  }
  return 0;
}
