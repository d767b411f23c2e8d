import { MigrationScript } from '../types/migration';
import initialSchema from './scripts/001_initial_schema';
import statusIndexes from './scripts/002_add_status_indexes';

/**
 * Every migration, in version order
 */
export const ALL_MIGRATIONS: readonly MigrationScript[] = [initialSchema, statusIndexes];

export { MigrationManager } from './migration-manager';
