import fs from 'fs';
import path from 'path';
import sqlite3 from 'sqlite3';
import { Database, open } from 'sqlite';
import { Row, RunResult, SqlDatabase, SqlParams, normalizeParam } from './database';
import { createDatabaseLogger } from '../../utils/logger';

const logger = createDatabaseLogger().createSubLogger('sqlite');

/**
 * SQLite adapter over a single shared connection.
 *
 * An in-memory database lives and dies with its connection, so the connection is
 * opened once and reused for every query.
 */
export class SqliteDatabase implements SqlDatabase {
  readonly dialect = 'sqlite' as const;

  private constructor(private readonly db: Database, readonly filename: string) {}

  static async open(filename: string): Promise<SqliteDatabase> {
    const inMemory = filename === ':memory:';
    if (!inMemory) {
      fs.mkdirSync(path.dirname(filename), { recursive: true });
    }

    const db = await open({
      filename,
      driver: sqlite3.Database,
      mode: sqlite3.OPEN_READWRITE | sqlite3.OPEN_CREATE
    });

    if (!inMemory) {
      await db.run('PRAGMA journal_mode = WAL');
      await db.run('PRAGMA synchronous = NORMAL');
    }
    await db.run('PRAGMA foreign_keys = ON');
    await db.run('PRAGMA busy_timeout = 5000');

    logger.debug(`Opened SQLite database: ${filename}`);
    return new SqliteDatabase(db, filename);
  }

  async all(sql: string, params: SqlParams = []): Promise<Row[]> {
    return this.db.all<Row[]>(sql, params.map(normalizeParam));
  }

  async get(sql: string, params: SqlParams = []): Promise<Row | null> {
    const row = await this.db.get<Row>(sql, params.map(normalizeParam));
    return row ?? null;
  }

  async run(sql: string, params: SqlParams = []): Promise<RunResult> {
    const result = await this.db.run(sql, params.map(normalizeParam));
    return { changes: result.changes ?? 0 };
  }

  async insert(sql: string, params: SqlParams = []): Promise<number> {
    const result = await this.db.run(sql, params.map(normalizeParam));
    if (result.lastID === undefined) {
      throw new Error('SQLite did not report the inserted row id');
    }
    return result.lastID;
  }

  async exec(sql: string): Promise<void> {
    await this.db.exec(sql);
  }

  async ping(): Promise<boolean> {
    try {
      await this.db.get('SELECT 1 AS ok');
      return true;
    } catch (error) {
      logger.warn(`SQLite ping failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    await this.db.close();
  }
}
