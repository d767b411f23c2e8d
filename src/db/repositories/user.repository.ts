import { SqlDatabase, Row } from '../adapters/database';
import { readBoolean, readNumber, readString, readTimestamp } from '../adapters/row';
import { User } from '../types';
import { UserRepository as UserRepositoryInterface } from '../types/repository';

/**
 * User repository
 */
export class UserRepository implements UserRepositoryInterface {
  constructor(private readonly db: SqlDatabase) {}

  public async findById(id: number): Promise<User | null> {
    const row = await this.db.get(`SELECT * FROM users WHERE id = ?`, [id]);
    return row ? this.mapToUser(row) : null;
  }

  public async findByEmail(email: string): Promise<User | null> {
    const row = await this.db.get(`SELECT * FROM users WHERE email = ?`, [email]);
    return row ? this.mapToUser(row) : null;
  }

  public async create(email: string): Promise<User> {
    const id = await this.db.insert(`INSERT INTO users (email) VALUES (?)`, [email]);
    const user = await this.findById(id);
    if (!user) {
      throw new Error(`User #${id} vanished after insert`);
    }
    return user;
  }

  public async findOrCreate(email: string): Promise<User> {
    const existing = await this.findByEmail(email);
    return existing ?? this.create(email);
  }

  private mapToUser(row: Row): User {
    return {
      id: readNumber(row, 'id'),
      email: readString(row, 'email'),
      is_admin: readBoolean(row, 'is_admin'),
      created_at: readTimestamp(row, 'created_at')
    };
  }
}
