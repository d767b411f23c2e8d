/**
 * Dialect-neutral database interface
 *
 * SQL is written once with `?` placeholders; adapters translate it for their driver.
 */

import { DatabaseDialect } from '../../config/config-types';

export type SqlValue = string | number | boolean | null | Date;

export type SqlParams = readonly SqlValue[];

export type Row = Record<string, unknown>;

export interface RunResult {
  /** Rows affected */
  changes: number;
}

export interface SqlDatabase {
  readonly dialect: DatabaseDialect;

  all(sql: string, params?: SqlParams): Promise<Row[]>;

  get(sql: string, params?: SqlParams): Promise<Row | null>;

  run(sql: string, params?: SqlParams): Promise<RunResult>;

  /**
   * Execute an INSERT and return the generated `id`
   */
  insert(sql: string, params?: SqlParams): Promise<number>;

  /**
   * Execute one or more statements without parameters (DDL)
   */
  exec(sql: string): Promise<void>;

  ping(): Promise<boolean>;

  close(): Promise<void>;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * UTC timestamp in the `YYYY-MM-DD HH:MM:SS` form both dialects store
 */
export function toSqlTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

/**
 * Parameter value as handed to a driver
 */
export function normalizeParam(value: SqlValue): string | number | null {
  if (value instanceof Date) {
    return toSqlTimestamp(value);
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  return value;
}

/**
 * Rewrite `?` placeholders as `$1..$n`, leaving quoted literals and identifiers alone
 */
export function toPostgresPlaceholders(sql: string): string {
  let result = '';
  let index = 0;
  let quote: '\'' | '"' | null = null;

  for (const char of sql) {
    if (quote) {
      if (char === quote) {
        quote = null;
      }
      result += char;
      continue;
    }

    if (char === '\'' || char === '"') {
      quote = char;
      result += char;
    } else if (char === '?') {
      index++;
      result += `$${index}`;
    } else {
      result += char;
    }
  }

  return result;
}
