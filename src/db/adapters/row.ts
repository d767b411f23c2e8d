/**
 * Typed column readers
 *
 * Both drivers return loosely typed rows: PostgreSQL hands back bigint aggregates as
 * strings and TIMESTAMP columns as Date, SQLite stores booleans as integers.
 */

import { Row } from './database';

function describe(key: string, value: unknown): string {
  return `Unexpected value for column "${key}": ${JSON.stringify(value)}`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function readNumber(row: Row, key: string): number {
  const value = row[key];
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value === 'string' && value.trim() !== '' && !isNaN(Number(value))) {
    return Number(value);
  }
  throw new TypeError(describe(key, value));
}

export function readString(row: Row, key: string): string {
  const value = row[key];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  throw new TypeError(describe(key, value));
}

export function readNullableString(row: Row, key: string): string | null {
  const value = row[key];
  return value === null || value === undefined ? null : readString(row, key);
}

export function readBoolean(row: Row, key: string): boolean {
  const value = row[key];
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === null || value === undefined) {
    return false;
  }
  return readNumber(row, key) !== 0;
}

/**
 * Timestamp as `YYYY-MM-DD HH:MM:SS`.
 *
 * node-postgres parses TIMESTAMP WITHOUT TIME ZONE as local time, so a Date is
 * turned back into the stored wall-clock value with local getters.
 */
export function readTimestamp(row: Row, key: string): string {
  const value = row[key];
  if (value instanceof Date) {
    return (
      `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())} ` +
      `${pad(value.getHours())}:${pad(value.getMinutes())}:${pad(value.getSeconds())}`
    );
  }
  return readString(row, key);
}
