/**
 * Migration: initial schema
 * Version: 1
 */

import { SqlDatabase } from '../../adapters/database';
import { MigrationScript } from '../../types/migration';
import { currentTimestamp, idColumn, timestampType } from '../dialect';

const migration: MigrationScript = {
  version: 1,
  description: 'Create users, magic links, tasks, reads and chat history',

  async up(db: SqlDatabase): Promise<void> {
    const id = idColumn(db.dialect);
    const ts = timestampType(db.dialect);
    const now = currentTimestamp(db.dialect);

    await db.exec(`
      CREATE TABLE IF NOT EXISTS users (
        id ${id},
        email TEXT UNIQUE NOT NULL,
        is_admin INTEGER DEFAULT 0,
        created_at ${ts} DEFAULT ${now}
      )
    `);

    await db.exec(`
      CREATE TABLE IF NOT EXISTS magic_links (
        id ${id},
        email TEXT NOT NULL,
        token TEXT UNIQUE NOT NULL,
        expires_at ${ts} NOT NULL,
        used INTEGER DEFAULT 0,
        created_at ${ts} DEFAULT ${now}
      )
    `);

    await db.exec(`
      CREATE TABLE IF NOT EXISTS tasks (
        id ${id},
        title TEXT NOT NULL,
        description TEXT,
        assigned_by TEXT NOT NULL,
        status TEXT DEFAULT 'pending',
        created_at ${ts} DEFAULT ${now},
        updated_at ${ts} DEFAULT ${now}
      )
    `);

    await db.exec(`
      CREATE TABLE IF NOT EXISTS chat_history (
        id ${id},
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        user_email TEXT,
        created_at ${ts} DEFAULT ${now}
      )
    `);
    await db.exec(`CREATE INDEX IF NOT EXISTS idx_chat_history_user_email ON chat_history(user_email)`);

    await db.exec(`
      CREATE TABLE IF NOT EXISTS reads (
        id ${id},
        title TEXT NOT NULL,
        url TEXT,
        author TEXT,
        notes TEXT,
        status TEXT DEFAULT 'unread',
        added_by TEXT NOT NULL,
        created_at ${ts} DEFAULT ${now},
        updated_at ${ts} DEFAULT ${now}
      )
    `);
  },

  async down(db: SqlDatabase): Promise<void> {
    await db.exec(`DROP TABLE IF EXISTS reads`);
    await db.exec(`DROP INDEX IF EXISTS idx_chat_history_user_email`);
    await db.exec(`DROP TABLE IF EXISTS chat_history`);
    await db.exec(`DROP TABLE IF EXISTS tasks`);
    await db.exec(`DROP TABLE IF EXISTS magic_links`);
    await db.exec(`DROP TABLE IF EXISTS users`);
  }
};

export default migration;
