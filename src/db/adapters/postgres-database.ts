import { Pool, PoolConfig } from 'pg';
import { PostgresConfig } from '../../config/config-types';
import { Row, RunResult, SqlDatabase, SqlParams, normalizeParam, toPostgresPlaceholders } from './database';
import { readNumber } from './row';
import { createDatabaseLogger } from '../../utils/logger';

const logger = createDatabaseLogger().createSubLogger('postgres');

/**
 * The part of a pg pool the adapter needs
 */
export interface PgQueryable {
  query(text: string, values: unknown[]): Promise<{ rows: Row[]; rowCount: number | null }>;
  end(): Promise<void>;
}

export function buildPoolConfig(config: PostgresConfig): PoolConfig {
  if (config.connectionString) {
    return { connectionString: config.connectionString, max: config.maxConnections };
  }

  return {
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    max: config.maxConnections
  };
}

/**
 * PostgreSQL adapter over a pg pool
 */
export class PostgresDatabase implements SqlDatabase {
  readonly dialect = 'postgres' as const;

  constructor(private readonly client: PgQueryable) {}

  static connect(config: PostgresConfig): PostgresDatabase {
    const pool = new Pool(buildPoolConfig(config));
    pool.on('error', error => logger.error('Idle PostgreSQL client error', error));

    return new PostgresDatabase({
      query: (text, values) => pool.query<Row>(text, values),
      end: () => pool.end()
    });
  }

  private query(sql: string, params: SqlParams): Promise<{ rows: Row[]; rowCount: number | null }> {
    return this.client.query(toPostgresPlaceholders(sql), params.map(normalizeParam));
  }

  async all(sql: string, params: SqlParams = []): Promise<Row[]> {
    const result = await this.query(sql, params);
    return result.rows;
  }

  async get(sql: string, params: SqlParams = []): Promise<Row | null> {
    const result = await this.query(sql, params);
    return result.rows[0] ?? null;
  }

  async run(sql: string, params: SqlParams = []): Promise<RunResult> {
    const result = await this.query(sql, params);
    return { changes: result.rowCount ?? 0 };
  }

  async insert(sql: string, params: SqlParams = []): Promise<number> {
    const statement = `${sql.trim().replace(/;$/, '')} RETURNING id`;
    const row = await this.get(statement, params);
    if (!row) {
      throw new Error('PostgreSQL did not return the inserted row id');
    }
    return readNumber(row, 'id');
  }

  async exec(sql: string): Promise<void> {
    await this.client.query(sql, []);
  }

  async ping(): Promise<boolean> {
    try {
      await this.client.query('SELECT 1 AS ok', []);
      return true;
    } catch (error) {
      logger.warn(`PostgreSQL ping failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}
