import crypto from 'crypto';
import { NextFunction, Request, Response, Router } from 'express';
import { AppContext } from '../context';
import { asyncHandler, queryString } from '../http';
import { requireLogin } from '../../auth/session';
import { AppError } from '../../utils/error-handler';
import { createServerLogger } from '../../utils/logger';

const logger = createServerLogger().createSubLogger('system');

/**
 * Constant-time comparison of SHA-256 digests; an empty expected token never matches
 */
export function tokenMatches(expected: string, given: string): boolean {
  if (!expected) {
    return false;
  }
  const a = crypto.createHash('sha256').update(expected).digest();
  const b = crypto.createHash('sha256').update(given).digest();
  return crypto.timingSafeEqual(a, b);
}

/**
 * Paper search, maintenance and health
 */
export class SystemRoutes {
  constructor(private readonly context: AppContext) {}

  register(router: Router): void {
    router.get('/api/papers/search', requireLogin, asyncHandler(this.searchPapers.bind(this)));
    router.post('/api/internal/clear-all-chats/:token', asyncHandler(this.clearAllChats.bind(this)));
    router.get('/health', asyncHandler(this.health.bind(this)));
  }

  private async searchPapers(req: Request, res: Response): Promise<void> {
    const query = (queryString(req, 'q') ?? '').trim();
    if (!query) {
      throw AppError.validation('Query required', 'searchPapers');
    }
    res.json(await this.context.papers.findLink(query));
  }

  /**
   * Unknown tokens get the ordinary 404
   */
  private async clearAllChats(req: Request, res: Response, next: NextFunction): Promise<void> {
    if (!tokenMatches(this.context.config.server.maintenanceToken, req.params.token)) {
      next();
      return;
    }

    const deleted = await this.context.repositories.chatHistory.clearAll();
    logger.warn(`Cleared all chat history (${deleted} messages)`, undefined, 'clearAllChats');
    res.json({ cleared: true, deleted });
  }

  private async health(_req: Request, res: Response): Promise<void> {
    const database = (await this.context.db.ping()) ? 'connected' : 'unreachable';
    const healthy = database === 'connected';

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.context.startedAt.getTime()) / 1000),
      database
    });
  }
}
