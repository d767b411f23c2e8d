/**
 * Entity types
 *
 * Property names follow the column names; they are also the JSON shape of the API.
 */

export const TASK_STATUSES = ['pending', 'in_progress', 'done'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const READ_STATUSES = ['unread', 'reading', 'read'] as const;
export type ReadStatus = (typeof READ_STATUSES)[number];

export type ChatRole = 'user' | 'assistant';

export function isTaskStatus(value: unknown): value is TaskStatus {
  return TASK_STATUSES.some(status => status === value);
}

export function isReadStatus(value: unknown): value is ReadStatus {
  return READ_STATUSES.some(status => status === value);
}

export interface User {
  id: number;
  email: string;
  is_admin: boolean;
  created_at: string;
}

export interface MagicLink {
  id: number;
  email: string;
  token: string;
  expires_at: string;
  used: boolean;
  created_at: string;
}

export interface Task {
  id: number;
  title: string;
  description: string | null;

  /** Email of the user who created the task */
  assigned_by: string;

  status: TaskStatus;
  created_at: string;
  updated_at: string;
}

export interface Read {
  id: number;
  title: string;
  url: string | null;
  author: string | null;
  notes: string | null;
  status: ReadStatus;
  added_by: string;
  created_at: string;
  updated_at: string;
}

export interface ChatMessage {
  id: number;
  role: ChatRole;
  content: string;
  user_email: string | null;
  created_at: string;
}

export interface NewTask {
  title: string;
  description?: string | null;
  assigned_by: string;
}

export interface TaskUpdate {
  title?: string;
  description?: string | null;
  status?: TaskStatus;
}

export interface NewRead {
  title: string;
  url?: string | null;
  author?: string | null;
  notes?: string | null;
  added_by: string;
}

export interface ReadUpdate {
  title?: string;
  url?: string | null;
  author?: string | null;
  notes?: string | null;
  status?: ReadStatus;
}
