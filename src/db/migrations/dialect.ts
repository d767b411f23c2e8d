/**
 * DDL fragments that differ between SQLite and PostgreSQL
 */

import { DatabaseDialect } from '../../config/config-types';

export function idColumn(dialect: DatabaseDialect): string {
  return dialect === 'postgres' ? 'SERIAL PRIMARY KEY' : 'INTEGER PRIMARY KEY AUTOINCREMENT';
}

export function timestampType(dialect: DatabaseDialect): string {
  return dialect === 'postgres' ? 'TIMESTAMP' : 'DATETIME';
}

/**
 * Column default producing the current UTC time
 */
export function currentTimestamp(dialect: DatabaseDialect): string {
  return dialect === 'postgres' ? `(NOW() AT TIME ZONE 'UTC')` : 'CURRENT_TIMESTAMP';
}
