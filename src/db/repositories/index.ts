import { SqlDatabase } from '../adapters/database';
import { TaskRepository } from './task.repository';
import { ReadRepository } from './read.repository';
import { UserRepository } from './user.repository';
import { MagicLinkRepository } from './magic-link.repository';
import { ChatHistoryRepository } from './chat-history.repository';
import * as contracts from '../types/repository';

export interface Repositories {
  tasks: contracts.TaskRepository;
  reads: contracts.ReadRepository;
  users: contracts.UserRepository;
  magicLinks: contracts.MagicLinkRepository;
  chatHistory: contracts.ChatHistoryRepository;
}

export function createRepositories(db: SqlDatabase): Repositories {
  return {
    tasks: new TaskRepository(db),
    reads: new ReadRepository(db),
    users: new UserRepository(db),
    magicLinks: new MagicLinkRepository(db),
    chatHistory: new ChatHistoryRepository(db)
  };
}

export { TaskRepository, ReadRepository, UserRepository, MagicLinkRepository, ChatHistoryRepository };
