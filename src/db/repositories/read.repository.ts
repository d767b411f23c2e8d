import { SqlDatabase, SqlValue, Row } from '../adapters/database';
import { readNullableString, readNumber, readString, readTimestamp } from '../adapters/row';
import { NewRead, Read, ReadUpdate, isReadStatus } from '../types';
import { ReadFilter, ReadRepository as ReadRepositoryInterface } from '../types/repository';

/**
 * Reading-list repository
 */
export class ReadRepository implements ReadRepositoryInterface {
  constructor(private readonly db: SqlDatabase) {}

  public async create(read: NewRead): Promise<Read> {
    const id = await this.db.insert(
      `INSERT INTO reads (title, url, author, notes, added_by, status) VALUES (?, ?, ?, ?, ?, 'unread')`,
      [read.title, read.url ?? '', read.author ?? '', read.notes ?? '', read.added_by]
    );

    const created = await this.findById(id);
    if (!created) {
      throw new Error(`Read #${id} vanished after insert`);
    }
    return created;
  }

  public async findById(id: number): Promise<Read | null> {
    const row = await this.db.get(`SELECT * FROM reads WHERE id = ?`, [id]);
    return row ? this.mapToRead(row) : null;
  }

  public async findAll(filter: ReadFilter = {}): Promise<Read[]> {
    const params: SqlValue[] = [];
    let where = '';

    if (filter.status) {
      where = 'WHERE status = ?';
      params.push(filter.status);
    }

    const rows = await this.db.all(`SELECT * FROM reads ${where} ORDER BY created_at DESC, id DESC`, params);
    return rows.map(row => this.mapToRead(row));
  }

  public async findRecent(limit: number): Promise<Read[]> {
    const rows = await this.db.all(`SELECT * FROM reads ORDER BY created_at DESC, id DESC LIMIT ?`, [limit]);
    return rows.map(row => this.mapToRead(row));
  }

  public async update(id: number, updates: ReadUpdate): Promise<Read | null> {
    const existing = await this.findById(id);
    if (!existing) {
      return null;
    }

    const pick = <K extends 'url' | 'author' | 'notes'>(key: K): string | null =>
      updates[key] !== undefined ? updates[key] ?? null : existing[key];

    await this.db.run(
      `UPDATE reads SET title = ?, url = ?, author = ?, notes = ?, status = ?, updated_at = ? WHERE id = ?`,
      [
        updates.title ?? existing.title,
        pick('url'),
        pick('author'),
        pick('notes'),
        updates.status ?? existing.status,
        new Date(),
        id
      ]
    );

    return this.findById(id);
  }

  public async markRead(id: number): Promise<Read | null> {
    return this.update(id, { status: 'read' });
  }

  public async delete(id: number): Promise<boolean> {
    const result = await this.db.run(`DELETE FROM reads WHERE id = ?`, [id]);
    return result.changes > 0;
  }

  private mapToRead(row: Row): Read {
    const status = readString(row, 'status');

    return {
      id: readNumber(row, 'id'),
      title: readString(row, 'title'),
      url: readNullableString(row, 'url'),
      author: readNullableString(row, 'author'),
      notes: readNullableString(row, 'notes'),
      status: isReadStatus(status) ? status : 'unread',
      added_by: readString(row, 'added_by'),
      created_at: readTimestamp(row, 'created_at'),
      updated_at: readTimestamp(row, 'updated_at')
    };
  }
}
