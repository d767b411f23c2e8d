import { SqlDatabase } from '../adapters/database';
import { readNullableString, readNumber, readString, readTimestamp } from '../adapters/row';
import {
  MigrationConfig,
  MigrationDirection,
  MigrationError,
  MigrationRecord,
  MigrationResult,
  MigrationScript,
  MigrationStats,
  MigrationStatus
} from '../types/migration';
import { currentTimestamp, timestampType } from './dialect';
import { AppLogger, createDatabaseLogger, toError } from '../../utils/logger';

const MIGRATION_STATUSES: readonly MigrationStatus[] = ['running', 'completed', 'failed', 'rolled_back'];

function toStatus(value: string): MigrationStatus {
  const status = MIGRATION_STATUSES.find(candidate => candidate === value);
  if (!status) {
    throw new TypeError(`Unknown migration status: ${value}`);
  }
  return status;
}

function toDirection(value: string | null): MigrationDirection | null {
  return value === 'up' || value === 'down' ? value : null;
}

/**
 * Migration manager
 */
export class MigrationManager {
  private config: MigrationConfig;
  private readonly migrations: MigrationScript[];
  private readonly logger: AppLogger;

  constructor(
    private readonly db: SqlDatabase,
    migrations: readonly MigrationScript[],
    config?: Partial<MigrationConfig>
  ) {
    this.config = {
      migrationTableName: 'schema_migrations',
      verboseLogging: false,
      ...config
    };
    this.migrations = [...migrations].sort((a, b) => a.version - b.version);
    this.logger = createDatabaseLogger().createSubLogger('migrations');
  }

  /**
   * Create the bookkeeping table
   */
  public async initialize(): Promise<void> {
    const ts = timestampType(this.db.dialect);
    const now = currentTimestamp(this.db.dialect);

    await this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${this.config.migrationTableName} (
        version INTEGER PRIMARY KEY,
        description TEXT NOT NULL,
        status TEXT NOT NULL,
        direction TEXT,
        started_at ${ts} NOT NULL DEFAULT ${now},
        completed_at ${ts},
        error_message TEXT,
        execution_time INTEGER
      )
    `);
  }

  public getMigrations(): MigrationScript[] {
    return [...this.migrations];
  }

  public async getMigrationRecords(): Promise<MigrationRecord[]> {
    const rows = await this.db.all(`SELECT * FROM ${this.config.migrationTableName} ORDER BY version`);

    return rows.map(row => {
      const executionTime = row.execution_time;
      return {
        version: readNumber(row, 'version'),
        description: readString(row, 'description'),
        status: toStatus(readString(row, 'status')),
        direction: toDirection(readNullableString(row, 'direction')),
        started_at: readTimestamp(row, 'started_at'),
        completed_at: row.completed_at === null || row.completed_at === undefined ? null : readTimestamp(row, 'completed_at'),
        error_message: readNullableString(row, 'error_message'),
        execution_time: executionTime === null || executionTime === undefined ? null : readNumber(row, 'execution_time')
      };
    });
  }

  private completedVersions(records: MigrationRecord[]): Set<number> {
    return new Set(records.filter(r => r.status === 'completed' && r.direction === 'up').map(r => r.version));
  }

  public async getStats(): Promise<MigrationStats> {
    await this.initialize();
    const records = await this.getMigrationRecords();
    const completed = this.completedVersions(records);

    const lastMigration = records
      .filter(r => r.status === 'completed' && r.completed_at !== null)
      .map(r => r.completed_at)
      .sort()
      .pop();

    return {
      totalMigrations: this.migrations.length,
      completedMigrations: completed.size,
      failedMigrations: records.filter(r => r.status === 'failed').length,
      pendingVersions: this.migrations.map(m => m.version).filter(version => !completed.has(version)),
      currentVersion: completed.size > 0 ? Math.max(...completed) : 0,
      latestVersion: this.migrations.length > 0 ? Math.max(...this.migrations.map(m => m.version)) : 0,
      lastMigrationTime: lastMigration ?? null
    };
  }

  /**
   * Bring the schema to `targetVersion` (default: latest), applying or rolling back as needed
   */
  public async migrate(targetVersion?: number): Promise<MigrationResult> {
    await this.initialize();
    const records = await this.getMigrationRecords();
    const completed = this.completedVersions(records);
    const target = targetVersion ?? (this.migrations.length > 0 ? Math.max(...this.migrations.map(m => m.version)) : 0);

    const result: MigrationResult = { applied: [], rolledBack: [], errors: [] };

    for (const migration of this.migrations) {
      if (migration.version > target || completed.has(migration.version)) {
        continue;
      }

      const missing = (migration.dependencies || []).filter(dep => !completed.has(dep));
      if (missing.length > 0) {
        result.errors.push(
          new MigrationError(migration.version, 'up', `missing dependencies: ${missing.join(', ')}`)
        );
        break;
      }

      try {
        await this.executeMigration(migration, 'up');
        completed.add(migration.version);
        result.applied.push(migration.version);
      } catch (error) {
        const cause = toError(error);
        result.errors.push(new MigrationError(migration.version, 'up', cause.message, cause));
        break;
      }
    }

    if (result.errors.length === 0) {
      const rollback = await this.rollback(target);
      result.rolledBack.push(...rollback.rolledBack);
      result.errors.push(...rollback.errors);
    }

    return result;
  }

  /**
   * Undo every applied migration above `targetVersion`, newest first
   */
  public async rollback(targetVersion: number): Promise<MigrationResult> {
    await this.initialize();
    const completed = this.completedVersions(await this.getMigrationRecords());
    const result: MigrationResult = { applied: [], rolledBack: [], errors: [] };

    for (const migration of [...this.migrations].reverse()) {
      if (migration.version <= targetVersion || !completed.has(migration.version)) {
        continue;
      }

      try {
        await this.executeMigration(migration, 'down');
        result.rolledBack.push(migration.version);
      } catch (error) {
        const cause = toError(error);
        result.errors.push(new MigrationError(migration.version, 'down', cause.message, cause));
        break;
      }
    }

    return result;
  }

  private async executeMigration(migration: MigrationScript, direction: MigrationDirection): Promise<void> {
    await this.startMigrationRecord(migration, direction);
    const startTime = Date.now();

    try {
      if (direction === 'up') {
        await migration.up(this.db);
      } else {
        await migration.down(this.db);
      }
    } catch (error) {
      await this.finishMigrationRecord(migration, 'failed', Date.now() - startTime, toError(error).message);
      throw error;
    }

    const executionTime = Date.now() - startTime;
    await this.finishMigrationRecord(migration, direction === 'up' ? 'completed' : 'rolled_back', executionTime, null);

    const message = `Migration ${direction} done: v${migration.version} - ${migration.description} (${executionTime}ms)`;
    if (this.config.verboseLogging) {
      this.logger.info(message);
    } else {
      this.logger.debug(message);
    }
  }

  private async startMigrationRecord(migration: MigrationScript, direction: MigrationDirection): Promise<void> {
    await this.db.run(
      `INSERT INTO ${this.config.migrationTableName} (version, description, status, direction, started_at)
       VALUES (?, ?, 'running', ?, ?)
       ON CONFLICT (version) DO UPDATE SET
         status = 'running',
         direction = excluded.direction,
         started_at = excluded.started_at,
         completed_at = NULL,
         error_message = NULL`,
      [migration.version, migration.description, direction, new Date()]
    );
  }

  private async finishMigrationRecord(
    migration: MigrationScript,
    status: MigrationStatus,
    executionTime: number,
    errorMessage: string | null
  ): Promise<void> {
    await this.db.run(
      `UPDATE ${this.config.migrationTableName}
       SET status = ?, completed_at = ?, execution_time = ?, error_message = ?
       WHERE version = ?`,
      [status, new Date(), executionTime, errorMessage, migration.version]
    );
  }
}
