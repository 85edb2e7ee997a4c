import type { FastifyInstance } from 'fastify';
import { loadConfig } from '../config';
import { createLogger } from '../observability/logging';
import { buildServer } from './buildServer';

export interface MessagingServer {
  app: FastifyInstance;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export const createServer = async (): Promise<MessagingServer> => {
  const config = loadConfig();
  const { app, container } = await buildServer({ config });

  return {
    app,
    async start() {
      await container.init();
      await app.listen({ host: config.HTTP_HOST, port: config.HTTP_PORT });
    },
    async stop() {
      app.log.info('Starting graceful shutdown sequence...');
      // closes the stream hub and the pg pool through the onClose hook
      await app.close();
      app.log.info('Graceful shutdown complete');
    }
  };
};

if (process.argv[1] && import.meta.url === `file://${process.argv[1]}`) {
  let server: MessagingServer | null = null;
  let isShuttingDown = false;
  const SHUTDOWN_TIMEOUT_MS = 15_000;
  const logger = createLogger(process.env.LOG_LEVEL === 'debug' ? 'debug' : 'info', 'herald-messaging');

  const gracefulShutdown = async (signal: string) => {
    if (isShuttingDown) {
      logger.warn({ signal }, 'signal received again, forcing immediate exit');
      process.exit(1);
    }
    isShuttingDown = true;

    logger.info({ signal, timeoutMs: SHUTDOWN_TIMEOUT_MS }, 'initiating graceful shutdown');

    const forceExitTimer = setTimeout(() => {
      logger.error('graceful shutdown timeout exceeded, forcing exit');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
      if (server) {
        await server.stop();
      }
      clearTimeout(forceExitTimer);
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'error during graceful shutdown');
      clearTimeout(forceExitTimer);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  createServer()
    .then((s) => {
      server = s;
      return server.start();
    })
    .catch((error) => {
      logger.error({ err: error }, 'failed to start messaging service');
      process.exit(1);
    });
}
