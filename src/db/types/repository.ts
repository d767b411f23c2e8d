/**
 * Repository interfaces
 */

import {
  ChatMessage,
  ChatRole,
  MagicLink,
  NewRead,
  NewTask,
  Read,
  ReadStatus,
  ReadUpdate,
  Task,
  TaskStatus,
  TaskUpdate,
  User
} from './index';

/**
 * Basic CRUD operations
 */
export interface BaseRepository<T, TNew, TUpdate, ID = number> {
  findById(id: ID): Promise<T | null>;

  create(entity: TNew): Promise<T>;

  /**
   * Change only the given fields; null when the entity does not exist
   */
  update(id: ID, updates: TUpdate): Promise<T | null>;

  delete(id: ID): Promise<boolean>;
}

export interface TaskFilter {
  status?: TaskStatus;
}

export interface TaskRepository extends BaseRepository<Task, NewTask, TaskUpdate> {
  /**
   * Newest first
   */
  findAll(filter?: TaskFilter): Promise<Task[]>;

  findRecent(limit: number): Promise<Task[]>;

  markDone(id: number): Promise<Task | null>;
}

export interface ReadFilter {
  status?: ReadStatus;
}

export interface ReadRepository extends BaseRepository<Read, NewRead, ReadUpdate> {
  findAll(filter?: ReadFilter): Promise<Read[]>;

  findRecent(limit: number): Promise<Read[]>;

  markRead(id: number): Promise<Read | null>;
}

export interface UserRepository {
  findById(id: number): Promise<User | null>;

  findByEmail(email: string): Promise<User | null>;

  create(email: string): Promise<User>;

  findOrCreate(email: string): Promise<User>;
}

export interface MagicLinkRepository {
  create(email: string, token: string, expiresAt: Date): Promise<MagicLink>;

  /**
   * Unused link whose expiry is after `now`
   */
  findValid(token: string, now: Date): Promise<MagicLink | null>;

  /**
   * Flip an unused link to used; false when it was already used
   */
  markUsed(id: number): Promise<boolean>;

  deleteExpired(now: Date): Promise<number>;
}

export interface ChatHistoryRepository {
  append(userEmail: string, role: ChatRole, content: string): Promise<ChatMessage>;

  /**
   * The latest `limit` messages of a user, oldest first
   */
  findRecent(userEmail: string, limit: number): Promise<ChatMessage[]>;

  clearForUser(userEmail: string): Promise<number>;

  clearAll(): Promise<number>;
}
