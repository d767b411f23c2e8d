import { bootstrap } from './bootstrap';
import { WebServer } from './server/web-server';
import { createServerLogger } from './utils/logger';

const logger = createServerLogger();

async function main(): Promise<void> {
  const context = await bootstrap();
  const server = new WebServer(context);
  await server.start();

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info(`${signal} received, shutting down`);
    await server.stop();
    await context.db.close();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        error => {
          logger.fatal('Shutdown failed', error);
          process.exit(1);
        }
      );
    });
  }
}

main().catch(error => {
  logger.fatal('Server failed to start', error);
  process.exit(1);
});
