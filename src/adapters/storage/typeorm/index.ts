/**
 * TypeORM message store for PostgreSQL and SQLite
 */

export { TypeORMMessageStore, escapeLikePattern } from './typeorm-message.store';
export {
  createDataSource,
  createTypeORMConfig,
  TypeORMStoreOptions,
} from './typeorm.config';
export {
  SqlDialect,
  UNICODE_LOWER_FUNCTION,
  sqlDialectFor,
} from './sql-dialect';
export * from './entities';
export * from './migrations';
