import { Pool } from 'pg';
import type { MessagingConfig } from '../config';
import type { Logger } from '../observability/logging';
import type { MessagingMetrics } from '../observability/metrics';
import type { MessageRepository } from '../ports/messages/messageRepository';
import { createInMemoryMessageRepository } from '../ports/messages/inMemory';
import { createPgSqlClient, createPostgresMessageRepository, migrate } from '../ports/messages/postgres';
import { createLoggingNotifier, createNoopNotifier, type Notifier } from '../ports/notifier';
import { createAuthorizationGuard } from '../usecases/messages/authorizationGuard';
import { createMessageService, type MessageService } from '../usecases/messages/messageService';
import { StreamHub } from '../ws/streamHub';

export interface MessagingContainer {
  repository: MessageRepository;
  notifier: Notifier;
  streamHub?: StreamHub;
  messageService: MessageService;
  init(): Promise<void>;
  close(): Promise<void>;
}

export interface MessagingContainerOverrides {
  repository?: MessageRepository;
  notifier?: Notifier;
}

export const createMessagingContainer = (
  config: MessagingConfig,
  deps: { logger: Logger; metrics: MessagingMetrics },
  overrides: MessagingContainerOverrides = {}
): MessagingContainer => {
  const { logger, metrics } = deps;

  const pgPool = !overrides.repository && config.STORAGE_DRIVER === 'postgres'
    ? new Pool({
        connectionString: config.POSTGRES_URL,
        application_name: 'herald-messaging',
        max: config.POSTGRES_POOL_MAX,
      })
    : undefined;
  const sql = pgPool ? createPgSqlClient(pgPool) : undefined;

  pgPool?.on('error', (err) => {
    logger.error({ err }, 'pg_pool_error');
  });

  const repository = overrides.repository
    ?? (sql ? createPostgresMessageRepository({ sql }) : createInMemoryMessageRepository());

  const streamHub = !overrides.notifier && config.NOTIFIER_DRIVER === 'stream'
    ? new StreamHub({
        heartbeatIntervalMs: config.WEBSOCKET_HEARTBEAT_INTERVAL_MS,
        maxBufferedBytes: config.WEBSOCKET_MAX_BUFFERED_BYTES,
        logger,
        metrics,
      })
    : undefined;

  const notifier = overrides.notifier
    ?? streamHub
    ?? (config.NOTIFIER_DRIVER === 'log' ? createLoggingNotifier(logger) : createNoopNotifier());

  const messageService = createMessageService({
    repository,
    notifier,
    guard: createAuthorizationGuard({ repository, logger }),
    deletionOrder: config.DELETION_NOTIFY_ORDER,
    logger,
    metrics,
  });

  return {
    repository,
    notifier,
    streamHub,
    messageService,
    async init() {
      if (sql && config.POSTGRES_MIGRATE) {
        await migrate(sql);
        logger.info('postgres_schema_applied');
      }
    },
    async close() {
      streamHub?.close();
      if (pgPool) {
        await pgPool.end();
        logger.debug('pgPool ended');
      }
    },
  };
};
