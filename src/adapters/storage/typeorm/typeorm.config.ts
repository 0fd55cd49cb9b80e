import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { DataSource, DataSourceOptions } from 'typeorm';
import { MessageEntity } from './entities';
import { MESSAGE_MIGRATIONS } from './migrations';
import { DatabaseTarget } from '../database-url';
import { registerSqliteFunctions } from './sql-dialect';

export interface TypeORMStoreOptions {
  /**
   * Driver-level timeout for connecting, statements and SQLite locks
   */
  timeoutMs?: number;
  logging?: boolean;
  poolSize?: number;
}

/**
 * TypeORM configuration for the message store
 *
 * The schema is owned by migrations which run on initialize().
 */
export const createTypeORMConfig = (
  target: Exclude<DatabaseTarget, { kind: 'memory' }>,
  options: TypeORMStoreOptions = {},
): DataSourceOptions => {
  const timeoutMs = options.timeoutMs ?? 5000;
  const shared = {
    entities: [MessageEntity],
    migrations: MESSAGE_MIGRATIONS,
    migrationsRun: true,
    synchronize: false,
    logging: options.logging ?? false,
  };

  if (target.kind === 'postgres') {
    return {
      ...shared,
      type: 'postgres',
      url: target.url,
      // Connection pool settings
      extra: {
        max: options.poolSize ?? 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: timeoutMs,
        statement_timeout: timeoutMs,
        query_timeout: timeoutMs,
      },
    };
  }

  return {
    ...shared,
    type: 'better-sqlite3',
    database: target.path,
    timeout: timeoutMs,
    prepareDatabase: registerSqliteFunctions,
  };
};

/**
 * Create TypeORM DataSource, making room for a SQLite file first
 */
export const createDataSource = (
  target: Exclude<DatabaseTarget, { kind: 'memory' }>,
  options?: TypeORMStoreOptions,
): DataSource => {
  if (target.kind === 'sqlite' && target.path !== ':memory:') {
    mkdirSync(dirname(target.path), { recursive: true });
  }
  return new DataSource(createTypeORMConfig(target, options));
};
