import type BetterSqlite3 from 'better-sqlite3';
import { DataSourceOptions } from 'typeorm';

/**
 * Unicode-aware lowercase registered on every SQLite connection;
 * SQLite's own LOWER() only folds ASCII
 */
export const UNICODE_LOWER_FUNCTION = 'unicode_lower';

/**
 * SQL fragments that differ between the supported databases
 */
export interface SqlDialect {
  /**
   * Function lowercasing text the same way String.prototype.toLowerCase does
   */
  lower: string;

  /**
   * Suffix making string comparisons byte-ordered
   */
  binaryCollation: string;
}

export function sqlDialectFor(type: DataSourceOptions['type']): SqlDialect {
  if (type === 'postgres') {
    return { lower: 'LOWER', binaryCollation: ' COLLATE "C"' };
  }
  // SQLite compares with BINARY unless told otherwise
  return { lower: UNICODE_LOWER_FUNCTION, binaryCollation: '' };
}

export function registerSqliteFunctions(db: BetterSqlite3.Database): void {
  db.function(
    UNICODE_LOWER_FUNCTION,
    { deterministic: true },
    (value: unknown) => (typeof value === 'string' ? value.toLowerCase() : value),
  );
}
