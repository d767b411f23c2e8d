/**
 * Migration: status and recency indexes for the task and reading lists
 * Version: 2
 */

import { SqlDatabase } from '../../adapters/database';
import { MigrationScript } from '../../types/migration';

const migration: MigrationScript = {
  version: 2,
  description: 'Add status and created_at indexes to tasks and reads',

  async up(db: SqlDatabase): Promise<void> {
    await db.exec(`CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status)`);
    await db.exec(`CREATE INDEX IF NOT EXISTS idx_tasks_created_at ON tasks(created_at)`);
    await db.exec(`CREATE INDEX IF NOT EXISTS idx_reads_status ON reads(status)`);
    await db.exec(`CREATE INDEX IF NOT EXISTS idx_magic_links_token ON magic_links(token)`);
  },

  async down(db: SqlDatabase): Promise<void> {
    await db.exec(`DROP INDEX IF EXISTS idx_magic_links_token`);
    await db.exec(`DROP INDEX IF EXISTS idx_reads_status`);
    await db.exec(`DROP INDEX IF EXISTS idx_tasks_created_at`);
    await db.exec(`DROP INDEX IF EXISTS idx_tasks_status`);
  },

  dependencies: [1]
};

export default migration;
