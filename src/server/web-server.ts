/**
 * HTTP server
 */

import { Server } from 'http';
import express, { Application, Router } from 'express';
import cookieSession from 'cookie-session';
import { AppContext } from './context';
import { createErrorHandler, notFound } from './http';
import { AuthRoutes } from './routes/auth.routes';
import { TaskRoutes } from './routes/task.routes';
import { ReadRoutes } from './routes/read.routes';
import { ChatRoutes } from './routes/chat.routes';
import { SystemRoutes } from './routes/system.routes';
import { AppLogger, createServerLogger } from '../utils/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

export function createApp(context: AppContext, logger: AppLogger = createServerLogger()): Application {
  const { server } = context.config;
  const app = express();

  app.set('trust proxy', 1);
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));
  app.use(
    cookieSession({
      name: 'session',
      keys: [server.sessionSecret],
      maxAge: server.sessionMaxAgeDays * DAY_MS,
      httpOnly: true,
      sameSite: 'lax',
      secure: server.cookieSecure
    })
  );

  const router = Router();
  new AuthRoutes(context).register(router);
  new TaskRoutes(context).register(router);
  new ReadRoutes(context).register(router);
  new ChatRoutes(context).register(router);
  new SystemRoutes(context).register(router);
  app.use(router);

  app.use(notFound);
  app.use(createErrorHandler(logger));

  return app;
}

export class WebServer {
  private readonly logger: AppLogger;
  private readonly app: Application;
  private server: Server | null = null;

  constructor(private readonly context: AppContext) {
    this.logger = createServerLogger();
    this.app = createApp(context, this.logger);
  }

  async start(port: number = this.context.config.server.port): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, () => {
        this.logger.info(`Listening on port ${port} (${this.context.config.server.domain})`);
        resolve();
      });

      server.on('error', (error: Error) => {
        this.logger.error('Failed to start HTTP server', error);
        reject(error);
      });

      this.server = server;
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }

      server.close(error => {
        if (error) {
          this.logger.error('Failed to stop HTTP server', error);
          reject(error);
        } else {
          this.server = null;
          this.logger.info('HTTP server stopped');
          resolve();
        }
      });
    });
  }
}
