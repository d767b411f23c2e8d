import { SqlDatabase, SqlValue, Row } from '../adapters/database';
import { readNullableString, readNumber, readString, readTimestamp } from '../adapters/row';
import { NewTask, Task, TaskUpdate, isTaskStatus } from '../types';
import { TaskFilter, TaskRepository as TaskRepositoryInterface } from '../types/repository';

/**
 * Task repository
 */
export class TaskRepository implements TaskRepositoryInterface {
  constructor(private readonly db: SqlDatabase) {}

  public async create(task: NewTask): Promise<Task> {
    const id = await this.db.insert(
      `INSERT INTO tasks (title, description, assigned_by, status) VALUES (?, ?, ?, 'pending')`,
      [task.title, task.description ?? '', task.assigned_by]
    );

    const created = await this.findById(id);
    if (!created) {
      throw new Error(`Task #${id} vanished after insert`);
    }
    return created;
  }

  public async findById(id: number): Promise<Task | null> {
    const row = await this.db.get(`SELECT * FROM tasks WHERE id = ?`, [id]);
    return row ? this.mapToTask(row) : null;
  }

  public async findAll(filter: TaskFilter = {}): Promise<Task[]> {
    const params: SqlValue[] = [];
    let where = '';

    if (filter.status) {
      where = 'WHERE status = ?';
      params.push(filter.status);
    }

    const rows = await this.db.all(`SELECT * FROM tasks ${where} ORDER BY created_at DESC, id DESC`, params);
    return rows.map(row => this.mapToTask(row));
  }

  public async findRecent(limit: number): Promise<Task[]> {
    const rows = await this.db.all(`SELECT * FROM tasks ORDER BY created_at DESC, id DESC LIMIT ?`, [limit]);
    return rows.map(row => this.mapToTask(row));
  }

  public async update(id: number, updates: TaskUpdate): Promise<Task | null> {
    const existing = await this.findById(id);
    if (!existing) {
      return null;
    }

    await this.db.run(
      `UPDATE tasks SET title = ?, description = ?, status = ?, updated_at = ? WHERE id = ?`,
      [
        updates.title ?? existing.title,
        updates.description !== undefined ? updates.description : existing.description,
        updates.status ?? existing.status,
        new Date(),
        id
      ]
    );

    return this.findById(id);
  }

  public async markDone(id: number): Promise<Task | null> {
    return this.update(id, { status: 'done' });
  }

  public async delete(id: number): Promise<boolean> {
    const result = await this.db.run(`DELETE FROM tasks WHERE id = ?`, [id]);
    return result.changes > 0;
  }

  private mapToTask(row: Row): Task {
    const status = readString(row, 'status');

    return {
      id: readNumber(row, 'id'),
      title: readString(row, 'title'),
      description: readNullableString(row, 'description'),
      assigned_by: readString(row, 'assigned_by'),
      status: isTaskStatus(status) ? status : 'pending',
      created_at: readTimestamp(row, 'created_at'),
      updated_at: readTimestamp(row, 'updated_at')
    };
  }
}
