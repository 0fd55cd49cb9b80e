import { Logger } from '@nestjs/common';
import {
  DataSource,
  QueryFailedError,
  Repository,
  SelectQueryBuilder,
} from 'typeorm';
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
import { MessageEntity } from './entities';
import { SqlDialect, sqlDialectFor } from './sql-dialect';

const UNIQUE_VIOLATION_CODES: ReadonlySet<string> = new Set([
  '23505', // postgres unique_violation
  'SQLITE_CONSTRAINT_PRIMARYKEY',
  'SQLITE_CONSTRAINT_UNIQUE',
]);

interface TotalsRow {
  total: string | number;
  senders: string | number;
  first_ts: string | null;
  last_ts: string | null;
}

interface SenderRow {
  sender: string;
  message_count: string | number;
}

/**
 * TypeORM implementation of MessageStore for PostgreSQL and SQLite
 */
export class TypeORMMessageStore implements MessageStore {
  private readonly logger = new Logger(TypeORMMessageStore.name);
  private readonly messageRepo: Repository<MessageEntity>;
  private readonly dialect: SqlDialect;

  constructor(private readonly dataSource: DataSource) {
    this.messageRepo = dataSource.getRepository(MessageEntity);
    this.dialect = sqlDialectFor(dataSource.options.type);
  }

  /**
   * Initialize the connection and run pending migrations
   */
  static async open(dataSource: DataSource): Promise<TypeORMMessageStore> {
    if (!dataSource.isInitialized) {
      await dataSource.initialize();
    }
    return new TypeORMMessageStore(dataSource);
  }

  async insert(message: ValidMessage): Promise<InsertOutcome> {
    try {
      await this.messageRepo.insert({
        messageId: message.messageId,
        fromMsisdn: message.from,
        toMsisdn: message.to,
        ts: message.ts,
        text: message.text,
        createdAt: new Date().toISOString(),
      });
      return InsertOutcome.CREATED;
    } catch (error) {
      if (isUniqueViolation(error)) {
        return InsertOutcome.ALREADY_EXISTS;
      }
      throw this.unavailable('insert', error);
    }
  }

  async list(
    filter: MessageFilter,
    page?: Partial<PageRequest>,
  ): Promise<PaginatedResult<Message>> {
    const { limit, offset } = resolvePage(page);

    try {
      const qb = this.messageRepo.createQueryBuilder('m');
      this.applyFilter(qb, filter);

      const total = await qb.getCount();
      const entities = await qb
        .orderBy(`m.ts${this.dialect.binaryCollation}`, 'ASC')
        .addOrderBy(`m.message_id${this.dialect.binaryCollation}`, 'ASC')
        .limit(limit)
        .offset(offset)
        .getMany();

      return {
        items: entities.map((entity) => this.mapEntityToDomain(entity)),
        total,
        limit,
        offset,
      };
    } catch (error) {
      throw this.unavailable('list', error);
    }
  }

  async stats(): Promise<MessageStats> {
    try {
      const totals = await this.messageRepo
        .createQueryBuilder('m')
        .select('COUNT(*)', 'total')
        .addSelect('COUNT(DISTINCT m.from_msisdn)', 'senders')
        .addSelect('MIN(m.ts)', 'first_ts')
        .addSelect('MAX(m.ts)', 'last_ts')
        .getRawOne<TotalsRow>();

      const senders = await this.messageRepo
        .createQueryBuilder('m')
        .select('m.from_msisdn', 'sender')
        .addSelect('COUNT(*)', 'message_count')
        .groupBy('m.from_msisdn')
        .orderBy('message_count', 'DESC')
        .addOrderBy(`m.from_msisdn${this.dialect.binaryCollation}`, 'ASC')
        .limit(TOP_SENDERS_LIMIT)
        .getRawMany<SenderRow>();

      return {
        // pg returns bigint aggregates as strings
        totalMessages: Number(totals?.total ?? 0),
        uniqueSenderCount: Number(totals?.senders ?? 0),
        topSenders: senders.map((row) => ({
          from: row.sender,
          count: Number(row.message_count),
        })),
        firstMessageTs: totals?.first_ts ?? null,
        lastMessageTs: totals?.last_ts ?? null,
      };
    } catch (error) {
      throw this.unavailable('stats', error);
    }
  }

  async ping(): Promise<boolean> {
    if (!this.dataSource.isInitialized) {
      return false;
    }
    try {
      await this.dataSource.query('SELECT 1 FROM messages LIMIT 1');
      return true;
    } catch (error) {
      this.logger.warn(
        `Storage ping failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
    }
  }

  /**
   * Helper Methods
   */

  private applyFilter(
    qb: SelectQueryBuilder<MessageEntity>,
    filter: MessageFilter,
  ): void {
    if (filter.from) {
      qb.andWhere('m.from_msisdn = :from', { from: filter.from });
    }
    if (filter.since) {
      qb.andWhere('m.ts >= :since', { since: filter.since });
    }
    if (filter.q) {
      qb.andWhere(`${this.dialect.lower}(m.text) LIKE :pattern ESCAPE '\\'`, {
        pattern: `%${escapeLikePattern(filter.q.toLowerCase())}%`,
      });
    }
  }

  private mapEntityToDomain(entity: MessageEntity): Message {
    return new Message(
      entity.messageId,
      entity.fromMsisdn,
      entity.toMsisdn,
      entity.ts,
      entity.text,
      entity.createdAt,
    );
  }

  private unavailable(operation: string, error: unknown): StorageUnavailableError {
    const reason = error instanceof Error ? error.message : String(error);
    return new StorageUnavailableError(
      `Message store ${operation} failed: ${reason}`,
      operation,
      error,
    );
  }
}

function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  if (
    typeof driverError !== 'object' ||
    driverError === null ||
    !('code' in driverError)
  ) {
    return false;
  }
  return (
    typeof driverError.code === 'string' &&
    UNIQUE_VIOLATION_CODES.has(driverError.code)
  );
}

/**
 * Escape LIKE wildcards so they match literally
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}
