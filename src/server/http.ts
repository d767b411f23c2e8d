/**
 * Express helpers shared by the route controllers
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import { AppError, isAppError } from '../utils/error-handler';
import { AppLogger } from '../utils/logger';

/**
 * Forward rejections of an async handler to the error middleware
 */
export function asyncHandler(handler: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

/**
 * Validate the request body (JSON or form encoded)
 */
export function parseBody<T extends z.ZodTypeAny>(schema: T, req: Request, operation: string): z.infer<T> {
  const body: unknown = req.body ?? {};
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw AppError.validation(`${field}${issue?.message ?? 'Invalid request body'}`, operation);
  }
  return result.data;
}

/**
 * Single string query parameter; repeated or nested values count as absent
 */
export function queryString(req: Request, name: string): string | undefined {
  const value: unknown = req.query[name];
  return typeof value === 'string' ? value : undefined;
}

export function routeId(req: Request): number {
  return Number(req.params.id);
}

export function notFound(req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found', path: req.path });
}

/**
 * 4xx status set by body-parser and other express middleware
 */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : null;
  }
  return null;
}

export function createErrorHandler(logger: AppLogger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      res.status(clientStatus).json({ error: err instanceof Error ? err.message : 'Bad request' });
      return;
    }

    if (isAppError(err) && err.statusCode < 500) {
      logger.debug(`${req.method} ${req.path}: ${err.message}`, undefined, 'request');
      res.status(err.statusCode).json({ error: err.message });
      return;
    }

    logger.error(`${req.method} ${req.path} failed`, err, undefined, 'request');
    if (isAppError(err)) {
      res.status(err.statusCode).json({ error: err.message });
      return;
    }
    res.status(500).json({ error: 'Internal server error' });
  };
}
