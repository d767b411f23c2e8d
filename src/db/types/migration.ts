/**
 * Migration types
 */

import { SqlDatabase } from '../adapters/database';

export type MigrationDirection = 'up' | 'down';

export type MigrationStatus = 'running' | 'completed' | 'failed' | 'rolled_back';

/**
 * A schema migration; `up` and `down` receive the dialect through `db.dialect`
 */
export interface MigrationScript {
  version: number;

  description: string;

  up(db: SqlDatabase): Promise<void>;

  down(db: SqlDatabase): Promise<void>;

  /** Versions that must be applied first */
  dependencies?: number[];
}

export interface MigrationRecord {
  version: number;
  description: string;
  status: MigrationStatus;
  direction: MigrationDirection | null;
  started_at: string;
  completed_at: string | null;
  error_message: string | null;
  execution_time: number | null;
}

export interface MigrationConfig {
  migrationTableName: string;
  verboseLogging: boolean;
}

export interface MigrationStats {
  totalMigrations: number;
  completedMigrations: number;
  failedMigrations: number;
  pendingVersions: number[];
  currentVersion: number;
  latestVersion: number;
  lastMigrationTime: string | null;
}

export interface MigrationResult {
  applied: number[];
  rolledBack: number[];
  errors: MigrationError[];
}

export class MigrationError extends Error {
  constructor(
    public readonly version: number,
    public readonly direction: MigrationDirection,
    message: string,
    public readonly originalError?: Error
  ) {
    super(`Migration v${version} (${direction}) failed: ${message}`);
    this.name = 'MigrationError';
  }
}
