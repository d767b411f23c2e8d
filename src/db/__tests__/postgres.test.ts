import { Row } from '../adapters/database';
import { PgQueryable, PostgresDatabase, buildPoolConfig } from '../adapters/postgres-database';
import { TaskRepository } from '../repositories/task.repository';
import { createDefaultConfig } from '../../config';

interface QueryResponse {
  rows: Row[];
  rowCount: number | null;
}

/**
 * In-process stand-in for a pg pool that records every query
 */
class RecordingPool implements PgQueryable {
  public calls: Array<{ text: string; values: unknown[] }> = [];
  public ended = false;

  constructor(private readonly responses: Array<QueryResponse | Error> = []) {}

  async query(text: string, values: unknown[]): Promise<QueryResponse> {
    this.calls.push({ text, values });
    const response = this.responses.shift();
    if (response instanceof Error) {
      throw response;
    }
    return response ?? { rows: [], rowCount: 0 };
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

describe('PostgresDatabase', () => {
  test('rewrites placeholders and normalizes parameters', async () => {
    const pool = new RecordingPool([{ rows: [], rowCount: 2 }]);
    const db = new PostgresDatabase(pool);

    const result = await db.run('UPDATE magic_links SET used = ? WHERE expires_at > ?', [
      true,
      new Date(Date.UTC(2026, 0, 5, 3, 4, 5))
    ]);

    expect(result).toEqual({ changes: 2 });
    expect(pool.calls).toEqual([
      { text: 'UPDATE magic_links SET used = $1 WHERE expires_at > $2', values: [1, '2026-01-05 03:04:05'] }
    ]);
  });

  test('returns the generated id from RETURNING', async () => {
    const pool = new RecordingPool([{ rows: [{ id: 7 }], rowCount: 1 }]);
    const db = new PostgresDatabase(pool);

    const id = await db.insert('INSERT INTO users (email) VALUES (?);', ['ana@fydy.ai']);

    expect(id).toBe(7);
    expect(pool.calls[0].text).toBe('INSERT INTO users (email) VALUES ($1) RETURNING id');
    expect(pool.calls[0].values).toEqual(['ana@fydy.ai']);
  });

  test('treats a missing row count as zero changes', async () => {
    const db = new PostgresDatabase(new RecordingPool([{ rows: [], rowCount: null }]));
    await expect(db.run('DELETE FROM chat_history')).resolves.toEqual({ changes: 0 });
  });

  test('returns null when get finds nothing', async () => {
    const db = new PostgresDatabase(new RecordingPool());
    await expect(db.get('SELECT * FROM users WHERE id = ?', [1])).resolves.toBeNull();
  });

  test('runs DDL without parameters or rewriting', async () => {
    const pool = new RecordingPool();
    const db = new PostgresDatabase(pool);

    await db.exec(`CREATE TABLE t (note TEXT DEFAULT '?')`);

    expect(pool.calls).toEqual([{ text: `CREATE TABLE t (note TEXT DEFAULT '?')`, values: [] }]);
  });

  test('reports a failed ping as false', async () => {
    const db = new PostgresDatabase(new RecordingPool([new Error('connection refused')]));
    await expect(db.ping()).resolves.toBe(false);
  });

  test('ends the pool on close', async () => {
    const pool = new RecordingPool();
    await new PostgresDatabase(pool).close();
    expect(pool.ended).toBe(true);
  });

  test('maps driver rows to the same entities as SQLite', async () => {
    const created = new Date(2026, 0, 5, 3, 4, 5);
    const pool = new RecordingPool([
      {
        rows: [
          {
            id: 3,
            title: 'Ship the release',
            description: null,
            assigned_by: 'ana@fydy.ai',
            status: 'done',
            created_at: created,
            updated_at: created
          }
        ],
        rowCount: 1
      }
    ]);

    const task = await new TaskRepository(new PostgresDatabase(pool)).findById(3);

    expect(pool.calls[0].text).toBe('SELECT * FROM tasks WHERE id = $1');
    expect(task).toEqual({
      id: 3,
      title: 'Ship the release',
      description: null,
      assigned_by: 'ana@fydy.ai',
      status: 'done',
      created_at: '2026-01-05 03:04:05',
      updated_at: '2026-01-05 03:04:05'
    });
  });

  test('prefers a connection string over discrete settings', () => {
    const postgres = createDefaultConfig().database.postgres;

    expect(buildPoolConfig({ ...postgres, connectionString: 'postgres://app@db/tasks' })).toEqual({
      connectionString: 'postgres://app@db/tasks',
      max: 10
    });
    expect(buildPoolConfig({ ...postgres, host: '/cloudsql/project:region:instance' })).toEqual({
      host: '/cloudsql/project:region:instance',
      port: 5432,
      user: 'appuser',
      password: '',
      database: 'makearjowork',
      max: 10
    });
  });
});
