import { Request, Response, Router } from 'express';
import { z } from 'zod';
import { AppContext } from '../context';
import { asyncHandler, parseBody, queryString, routeId } from '../http';
import { currentUser, requireLogin } from '../../auth/session';
import { ReadStatus, isReadStatus } from '../../db/types';
import { AppError } from '../../utils/error-handler';

const createSchema = z.object({
  title: z.string().optional(),
  url: z.string().nullish(),
  author: z.string().nullish(),
  notes: z.string().nullish()
});

const updateSchema = createSchema.extend({
  status: z.string().optional()
});

function parseStatus(value: string): ReadStatus {
  if (!isReadStatus(value)) {
    throw AppError.validation(`Invalid status: ${value}`, 'reads');
  }
  return value;
}

/**
 * Reading list
 */
export class ReadRoutes {
  constructor(private readonly context: AppContext) {}

  register(router: Router): void {
    router.get('/api/reads', requireLogin, asyncHandler(this.list.bind(this)));
    router.post('/api/reads', requireLogin, asyncHandler(this.create.bind(this)));
    router.put('/api/reads/:id(\\d+)', requireLogin, asyncHandler(this.update.bind(this)));
    router.delete('/api/reads/:id(\\d+)', requireLogin, asyncHandler(this.remove.bind(this)));
  }

  private async list(req: Request, res: Response): Promise<void> {
    const status = queryString(req, 'status');
    const reads = await this.context.repositories.reads.findAll(status ? { status: parseStatus(status) } : {});
    res.json(reads);
  }

  private async create(req: Request, res: Response): Promise<void> {
    const body = parseBody(createSchema, req, 'createRead');
    const title = (body.title ?? '').trim();
    if (!title) {
      throw AppError.validation('Title is required', 'createRead');
    }

    const read = await this.context.repositories.reads.create({
      title,
      url: body.url,
      author: body.author,
      notes: body.notes,
      added_by: currentUser(res).email
    });
    res.status(201).json(read);
  }

  private async update(req: Request, res: Response): Promise<void> {
    const { status, ...body } = parseBody(updateSchema, req, 'updateRead');
    const title = body.title?.trim();
    if (title === '') {
      throw AppError.validation('Title is required', 'updateRead');
    }

    const read = await this.context.repositories.reads.update(routeId(req), {
      ...body,
      title,
      status: status === undefined ? undefined : parseStatus(status)
    });
    if (!read) {
      throw AppError.notFound('Read not found', 'updateRead');
    }
    res.json(read);
  }

  private async remove(req: Request, res: Response): Promise<void> {
    await this.context.repositories.reads.delete(routeId(req));
    res.status(204).end();
  }
}
