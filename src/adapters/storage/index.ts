import { Logger } from '@nestjs/common';
import { MessageStore } from '../../core';
import { MemoryMessageStore } from './memory';
import {
  TypeORMMessageStore,
  TypeORMStoreOptions,
  createDataSource,
} from './typeorm';
import { parseDatabaseUrl, redactDatabaseUrl } from './database-url';

export * from './database-url';
export * from './memory';
export * from './typeorm';

/**
 * Open the message store selected by a database URL
 */
export async function openMessageStore(
  databaseUrl: string,
  options: TypeORMStoreOptions = {},
): Promise<MessageStore> {
  const logger = new Logger('MessageStore');
  const target = parseDatabaseUrl(databaseUrl);

  if (target.kind === 'memory') {
    logger.log('Using in-memory message store');
    return new MemoryMessageStore();
  }

  logger.log(`Opening ${target.kind} message store at ${redactDatabaseUrl(databaseUrl)}`);
  return TypeORMMessageStore.open(createDataSource(target, options));
}
