/**
 * Runs assistant function calls against the task and reading lists
 */

import { z } from 'zod';
import { Read, Task, isReadStatus, isTaskStatus } from '../../db/types';
import { ReadRepository, TaskRepository } from '../../db/types/repository';
import { PaperSearch, PaperSearchResult } from '../../integrations/arxiv-client';
import { ToolArgs } from '../ai-engine/interface';
import { errorMessage } from '../../utils/error-handler';
import { AppLogger, createAssistantLogger } from '../../utils/logger';

export type TaskAction = {
  type: 'added' | 'updated' | 'deleted' | 'done';
  task: Task;
};

export type ReadAction = {
  type: 'read_added' | 'read_updated' | 'read_deleted' | 'read_done';
  read: Read;
};

export type ArxivAction = {
  type: 'arxiv_result';
  result: PaperSearchResult;
};

export type ClarificationAction = {
  type: 'clarification';
};

export type ErrorAction = {
  type: 'error';
  message: string;
};

export type ActionResult = TaskAction | ReadAction | ArxivAction | ClarificationAction | ErrorAction;

export interface FunctionCall {
  name: string;
  args: ToolArgs;
}

const optionalText = z
  .string()
  .nullish()
  .transform(value => value ?? undefined);

const requiredText = z
  .string()
  .nullish()
  .transform(value => (value ?? '').trim());

const idField = z.union([z.number(), z.string()]).nullish();

const schemas = {
  addTask: z.object({ title: requiredText, description: optionalText }),
  updateTask: z.object({ id: idField, title: optionalText, description: optionalText, status: optionalText }),
  byId: z.object({ id: idField }),
  addRead: z.object({ title: requiredText, url: optionalText, author: optionalText, notes: optionalText }),
  updateRead: z.object({
    id: idField,
    title: optionalText,
    url: optionalText,
    author: optionalText,
    notes: optionalText,
    status: optionalText
  }),
  search: z.object({ query: requiredText })
};

type IdLookup = { ok: true; id: number } | { ok: false; result: ErrorAction };

function error(message: string): ErrorAction {
  return { type: 'error', message };
}

/**
 * Ids arrive as integers or numeric strings; 0 and empty values count as missing
 */
export function resolveId(raw: number | string | null | undefined, subject: 'Task' | 'Read'): IdLookup {
  if (raw === undefined || raw === null || raw === 0 || (typeof raw === 'string' && raw.trim() === '')) {
    return { ok: false, result: error(`${subject} ID is required`) };
  }

  const id = typeof raw === 'number' ? raw : Number(raw.trim());
  if (!Number.isInteger(id) || id < 1) {
    return { ok: false, result: error(`${subject} #${raw} not found`) };
  }

  return { ok: true, id };
}

export class FunctionExecutor {
  private readonly logger: AppLogger;

  constructor(
    private readonly tasks: TaskRepository,
    private readonly reads: ReadRepository,
    private readonly papers: PaperSearch,
    logger?: AppLogger
  ) {
    this.logger = logger || createAssistantLogger().createSubLogger('executor');
  }

  /**
   * Execute one call; failures come back as `error` results
   */
  async execute(call: FunctionCall, userEmail: string): Promise<ActionResult> {
    if (!call.name) {
      return error('No function name provided');
    }

    try {
      const result = await this.dispatch(call, userEmail);
      if (result.type === 'error') {
        this.logger.debug(`${call.name}: ${result.message}`, call.args, 'execute');
      }
      return result;
    } catch (cause) {
      const message = cause instanceof z.ZodError ? formatIssues(cause) : errorMessage(cause);
      this.logger.error(`${call.name} failed`, cause, call.args, 'execute');
      return error(`Function execution failed: ${message}`);
    }
  }

  private async dispatch(call: FunctionCall, userEmail: string): Promise<ActionResult> {
    const args = call.args;

    switch (call.name) {
      case 'add_task': {
        const { title, description } = schemas.addTask.parse(args);
        if (!title) {
          return error('Task title is required');
        }
        const task = await this.tasks.create({ title, description: description ?? '', assigned_by: userEmail });
        return { type: 'added', task };
      }

      case 'update_task': {
        const { id: rawId, title, description, status } = schemas.updateTask.parse(args);
        const lookup = resolveId(rawId, 'Task');
        if (!lookup.ok) {
          return lookup.result;
        }
        if (status !== undefined && !isTaskStatus(status)) {
          return error(`Invalid status: ${status}`);
        }
        const task = await this.tasks.update(lookup.id, { title, description, status });
        return task ? { type: 'updated', task } : error(`Task #${lookup.id} not found`);
      }

      case 'delete_task': {
        const lookup = resolveId(schemas.byId.parse(args).id, 'Task');
        if (!lookup.ok) {
          return lookup.result;
        }
        const task = await this.tasks.findById(lookup.id);
        if (!task) {
          return error(`Task #${lookup.id} not found`);
        }
        await this.tasks.delete(lookup.id);
        return { type: 'deleted', task };
      }

      case 'mark_task_done': {
        const lookup = resolveId(schemas.byId.parse(args).id, 'Task');
        if (!lookup.ok) {
          return lookup.result;
        }
        const task = await this.tasks.markDone(lookup.id);
        return task ? { type: 'done', task } : error(`Task #${lookup.id} not found`);
      }

      case 'ask_clarification':
        return { type: 'clarification' };

      case 'add_read': {
        const { title, url, author, notes } = schemas.addRead.parse(args);
        if (!title) {
          return error('Read title is required');
        }
        const read = await this.reads.create({ title, url, author, notes, added_by: userEmail });
        return { type: 'read_added', read };
      }

      case 'update_read': {
        const { id: rawId, status, ...fields } = schemas.updateRead.parse(args);
        const lookup = resolveId(rawId, 'Read');
        if (!lookup.ok) {
          return lookup.result;
        }
        if (status !== undefined && !isReadStatus(status)) {
          return error(`Invalid status: ${status}`);
        }
        const read = await this.reads.update(lookup.id, { ...fields, status });
        return read ? { type: 'read_updated', read } : error(`Read #${lookup.id} not found`);
      }

      case 'delete_read': {
        const lookup = resolveId(schemas.byId.parse(args).id, 'Read');
        if (!lookup.ok) {
          return lookup.result;
        }
        const read = await this.reads.findById(lookup.id);
        if (!read) {
          return error(`Read #${lookup.id} not found`);
        }
        await this.reads.delete(lookup.id);
        return { type: 'read_deleted', read };
      }

      case 'mark_read_done': {
        const lookup = resolveId(schemas.byId.parse(args).id, 'Read');
        if (!lookup.ok) {
          return lookup.result;
        }
        const read = await this.reads.markRead(lookup.id);
        return read ? { type: 'read_done', read } : error(`Read #${lookup.id} not found`);
      }

      case 'search_arxiv': {
        const { query } = schemas.search.parse(args);
        if (!query) {
          return error('Search query is required');
        }
        return { type: 'arxiv_result', result: await this.papers.search(query) };
      }

      default:
        return error(`Unknown function: ${call.name}`);
    }
  }
}

function formatIssues(zodError: z.ZodError): string {
  return zodError.issues.map(issue => `${issue.path.join('.') || 'args'}: ${issue.message}`).join(', ');
}
