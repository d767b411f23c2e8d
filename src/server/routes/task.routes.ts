import { Request, Response, Router } from 'express';
import { z } from 'zod';
import { AppContext } from '../context';
import { asyncHandler, parseBody, queryString, routeId } from '../http';
import { currentUser, requireLogin } from '../../auth/session';
import { TaskStatus, isTaskStatus } from '../../db/types';
import { AppError } from '../../utils/error-handler';

const createSchema = z.object({
  title: z.string().optional(),
  description: z.string().nullish()
});

const updateSchema = z.object({
  title: z.string().optional(),
  description: z.string().nullish(),
  status: z.string().optional()
});

function parseStatus(value: string): TaskStatus {
  if (!isTaskStatus(value)) {
    throw AppError.validation(`Invalid status: ${value}`, 'tasks');
  }
  return value;
}

export class TaskRoutes {
  constructor(private readonly context: AppContext) {}

  register(router: Router): void {
    router.get('/api/tasks', requireLogin, asyncHandler(this.list.bind(this)));
    router.post('/api/tasks', requireLogin, asyncHandler(this.create.bind(this)));
    router.put('/api/tasks/:id(\\d+)', requireLogin, asyncHandler(this.update.bind(this)));
    router.delete('/api/tasks/:id(\\d+)', requireLogin, asyncHandler(this.remove.bind(this)));
  }

  /**
   * Calendar events come first unless a specific non-pending status is requested;
   * `pending` lists every task, like no filter at all
   */
  private async list(req: Request, res: Response): Promise<void> {
    const status = queryString(req, 'status');
    const tasks = this.context.repositories.tasks;

    if (status && status !== 'pending') {
      res.json(await tasks.findAll({ status: parseStatus(status) }));
      return;
    }

    const [events, found] = await Promise.all([
      this.context.calendar.listUpcomingEvents(),
      tasks.findAll()
    ]);
    res.json([...events, ...found]);
  }

  private async create(req: Request, res: Response): Promise<void> {
    const body = parseBody(createSchema, req, 'createTask');
    const title = (body.title ?? '').trim();
    if (!title) {
      throw AppError.validation('Title is required', 'createTask');
    }

    const task = await this.context.repositories.tasks.create({
      title,
      description: body.description ?? '',
      assigned_by: currentUser(res).email
    });
    res.status(201).json(task);
  }

  private async update(req: Request, res: Response): Promise<void> {
    const body = parseBody(updateSchema, req, 'updateTask');
    const title = body.title?.trim();
    if (title === '') {
      throw AppError.validation('Title is required', 'updateTask');
    }

    const task = await this.context.repositories.tasks.update(routeId(req), {
      title,
      description: body.description,
      status: body.status === undefined ? undefined : parseStatus(body.status)
    });
    if (!task) {
      throw AppError.notFound('Task not found', 'updateTask');
    }
    res.json(task);
  }

  private async remove(req: Request, res: Response): Promise<void> {
    await this.context.repositories.tasks.delete(routeId(req));
    res.status(204).end();
  }
}
