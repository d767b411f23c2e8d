import { DatabaseConfig } from '../../config/config-types';
import { SqlDatabase } from '../adapters/database';
import { SqliteDatabase } from '../adapters/sqlite-database';
import { PostgresDatabase } from '../adapters/postgres-database';
import { MigrationManager } from '../migrations/migration-manager';
import { ALL_MIGRATIONS } from '../migrations';
import { DatabaseErrorHandler, RetryOptions } from '../../system/error-handling';
import { AppError } from '../../utils/error-handler';
import { createDatabaseLogger } from '../../utils/logger';

const logger = createDatabaseLogger();

export interface OpenDatabaseOptions {
  /** Apply pending migrations after connecting (default true) */
  migrate?: boolean;

  /** Retry policy for the initial PostgreSQL connection check */
  connectRetry?: RetryOptions;
}

/**
 * Connect to the configured dialect
 */
export async function createDatabase(
  config: DatabaseConfig,
  connectRetry: RetryOptions = { maxRetries: 3, retryDelay: 1000, backoffFactor: 2 }
): Promise<SqlDatabase> {
  if (config.dialect === 'sqlite') {
    return SqliteDatabase.open(config.sqlitePath);
  }

  const db = PostgresDatabase.connect(config.postgres);
  const handler = new DatabaseErrorHandler<void>({ module: 'db', operation: 'connect' }, logger);

  try {
    await handler.handle(async () => {
      if (!(await db.ping())) {
        throw new Error(`PostgreSQL at ${config.postgres.host}:${config.postgres.port} is not reachable`);
      }
    }, connectRetry);
  } catch (error) {
    await db.close();
    throw error;
  }

  logger.info(`Connected to PostgreSQL database ${config.postgres.database}`);
  return db;
}

/**
 * Connect and bring the schema up to date
 */
export async function openDatabase(config: DatabaseConfig, options: OpenDatabaseOptions = {}): Promise<SqlDatabase> {
  const db = await createDatabase(config, options.connectRetry);

  if (options.migrate !== false) {
    const result = await new MigrationManager(db, ALL_MIGRATIONS).migrate();
    if (result.errors.length > 0) {
      await db.close();
      throw AppError.database(result.errors.map(error => error.message).join('; '), 'migrate');
    }
    if (result.applied.length > 0) {
      logger.info(`Applied migrations: ${result.applied.join(', ')}`);
    }
  }

  return db;
}
