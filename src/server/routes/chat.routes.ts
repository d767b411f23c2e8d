import { Request, Response, Router } from 'express';
import { z } from 'zod';
import { AppContext } from '../context';
import { asyncHandler, parseBody } from '../http';
import { currentUser, requireLogin } from '../../auth/session';
import { isAppError } from '../../utils/error-handler';
import { createServerLogger } from '../../utils/logger';

const logger = createServerLogger().createSubLogger('chat');

export const CHAT_HISTORY_LIMIT = 100;

const chatSchema = z.object({
  message: z.string().optional()
});

export class ChatRoutes {
  constructor(private readonly context: AppContext) {}

  register(router: Router): void {
    router.get('/api/chat/history', requireLogin, asyncHandler(this.history.bind(this)));
    router.post('/api/chat/clear', requireLogin, asyncHandler(this.clear.bind(this)));
    router.post('/api/chat', requireLogin, asyncHandler(this.chat.bind(this)));
  }

  /**
   * The user's latest messages, oldest first
   */
  private async history(_req: Request, res: Response): Promise<void> {
    const messages = await this.context.repositories.chatHistory.findRecent(currentUser(res).email, CHAT_HISTORY_LIMIT);
    res.json(
      messages.map(message => ({
        role: message.role,
        content: message.content,
        user_email: message.user_email,
        created_at: message.created_at
      }))
    );
  }

  private async clear(_req: Request, res: Response): Promise<void> {
    await this.context.repositories.chatHistory.clearForUser(currentUser(res).email);
    res.json({ success: true });
  }

  private async chat(req: Request, res: Response): Promise<void> {
    const { message } = parseBody(chatSchema, req, 'chat');
    try {
      res.json(await this.context.chat.chat(currentUser(res).email, message ?? ''));
    } catch (error) {
      if (isAppError(error) && error.statusCode < 500) {
        throw error;
      }
      // Provider and storage failures are reported to the chat client verbatim
      logger.error('Chat failed', error, undefined, 'chat');
      res.status(500).json({ error: error instanceof Error ? error.message : String(error) });
    }
  }
}
