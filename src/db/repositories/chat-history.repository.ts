import { SqlDatabase, Row } from '../adapters/database';
import { readNullableString, readNumber, readString, readTimestamp } from '../adapters/row';
import { ChatMessage, ChatRole } from '../types';
import { ChatHistoryRepository as ChatHistoryRepositoryInterface } from '../types/repository';

/**
 * Chat history repository; every query is scoped to one user
 */
export class ChatHistoryRepository implements ChatHistoryRepositoryInterface {
  constructor(private readonly db: SqlDatabase) {}

  public async append(userEmail: string, role: ChatRole, content: string): Promise<ChatMessage> {
    const id = await this.db.insert(
      `INSERT INTO chat_history (role, content, user_email) VALUES (?, ?, ?)`,
      [role, content, userEmail]
    );

    const row = await this.db.get(`SELECT * FROM chat_history WHERE id = ?`, [id]);
    if (!row) {
      throw new Error(`Chat message #${id} vanished after insert`);
    }
    return this.mapToMessage(row);
  }

  public async findRecent(userEmail: string, limit: number): Promise<ChatMessage[]> {
    const rows = await this.db.all(
      `SELECT * FROM chat_history WHERE user_email = ? ORDER BY id DESC LIMIT ?`,
      [userEmail, limit]
    );
    return rows.map(row => this.mapToMessage(row)).reverse();
  }

  public async clearForUser(userEmail: string): Promise<number> {
    const result = await this.db.run(`DELETE FROM chat_history WHERE user_email = ?`, [userEmail]);
    return result.changes;
  }

  public async clearAll(): Promise<number> {
    const result = await this.db.run(`DELETE FROM chat_history`);
    return result.changes;
  }

  private mapToMessage(row: Row): ChatMessage {
    const role = readString(row, 'role');

    return {
      id: readNumber(row, 'id'),
      role: role === 'assistant' || role === 'model' ? 'assistant' : 'user',
      content: readString(row, 'content'),
      user_email: readNullableString(row, 'user_email'),
      created_at: readTimestamp(row, 'created_at')
    };
  }
}
