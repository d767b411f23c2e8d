import { SqlDatabase, Row } from '../adapters/database';
import { readBoolean, readNumber, readString, readTimestamp } from '../adapters/row';
import { MagicLink } from '../types';
import { MagicLinkRepository as MagicLinkRepositoryInterface } from '../types/repository';

/**
 * Magic login link repository
 */
export class MagicLinkRepository implements MagicLinkRepositoryInterface {
  constructor(private readonly db: SqlDatabase) {}

  public async create(email: string, token: string, expiresAt: Date): Promise<MagicLink> {
    const id = await this.db.insert(
      `INSERT INTO magic_links (email, token, expires_at) VALUES (?, ?, ?)`,
      [email, token, expiresAt]
    );

    const row = await this.db.get(`SELECT * FROM magic_links WHERE id = ?`, [id]);
    if (!row) {
      throw new Error(`Magic link #${id} vanished after insert`);
    }
    return this.mapToMagicLink(row);
  }

  public async findValid(token: string, now: Date): Promise<MagicLink | null> {
    const row = await this.db.get(
      `SELECT * FROM magic_links WHERE token = ? AND used = 0 AND expires_at > ?`,
      [token, now]
    );
    return row ? this.mapToMagicLink(row) : null;
  }

  public async markUsed(id: number): Promise<boolean> {
    const result = await this.db.run(`UPDATE magic_links SET used = 1 WHERE id = ? AND used = 0`, [id]);
    return result.changes > 0;
  }

  public async deleteExpired(now: Date): Promise<number> {
    const result = await this.db.run(`DELETE FROM magic_links WHERE expires_at <= ? OR used = 1`, [now]);
    return result.changes;
  }

  private mapToMagicLink(row: Row): MagicLink {
    return {
      id: readNumber(row, 'id'),
      email: readString(row, 'email'),
      token: readString(row, 'token'),
      expires_at: readTimestamp(row, 'expires_at'),
      used: readBoolean(row, 'used'),
      created_at: readTimestamp(row, 'created_at')
    };
  }
}
