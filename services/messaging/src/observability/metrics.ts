import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export type MessagingMetrics = {
  registry: Registry;
  requestCounter: Counter<string>;
  requestDurationMs: Histogram<string>;
  messagesCreatedTotal: Counter<string>;
  messagesDeletedTotal: Counter<string>;
  notificationsTotal: Counter<string>;
  authRequestsTotal: Counter<string>;
  streamConnections: Gauge<string>;
  streamDroppedTotal: Counter<string>;
};

/**
 * Creates a new isolated metrics registry and all messaging metrics.
 * Each server instance should call this to get its own metrics.
 */
export function createMessagingMetrics(opts?: { defaultPrefix?: string; collectDefaults?: boolean }): MessagingMetrics {
  const registry = new Registry();
  const prefix = opts?.defaultPrefix ?? 'herald_';

  if (opts?.collectDefaults ?? true) {
    collectDefaultMetrics({
      register: registry,
      prefix,
    });
  }

  const requestCounter = new Counter({
    name: `${prefix}http_requests_total`,
    help: 'Total HTTP requests received',
    labelNames: ['route', 'method', 'statusCode'],
    registers: [registry],
  });

  const requestDurationMs = new Histogram({
    name: `${prefix}http_request_duration_ms`,
    help: 'HTTP request duration in milliseconds',
    buckets: [5, 10, 25, 50, 100, 250, 500, 750, 1_000, 1_500, 2_000, 5_000],
    labelNames: ['route', 'method', 'statusCode'],
    registers: [registry],
  });

  const messagesCreatedTotal = new Counter({
    name: `${prefix}messages_created_total`,
    help: 'Messages persisted by applications',
    registers: [registry],
  });

  const messagesDeletedTotal = new Counter({
    name: `${prefix}messages_deleted_total`,
    help: 'Messages removed, by deletion scope',
    labelNames: ['scope'],
    registers: [registry],
  });

  const notificationsTotal = new Counter({
    name: `${prefix}notifications_total`,
    help: 'Events handed to live listeners',
    labelNames: ['kind', 'outcome'],
    registers: [registry],
  });

  const authRequestsTotal = new Counter({
    name: `${prefix}auth_requests_total`,
    help: 'Bearer token verifications by outcome',
    labelNames: ['outcome'],
    registers: [registry],
  });

  const streamConnections = new Gauge({
    name: `${prefix}stream_connections`,
    help: 'Open live stream connections',
    registers: [registry],
  });

  const streamDroppedTotal = new Counter({
    name: `${prefix}stream_dropped_total`,
    help: 'Stream connections closed by the server',
    labelNames: ['reason'],
    registers: [registry],
  });

  return {
    registry,
    requestCounter,
    requestDurationMs,
    messagesCreatedTotal,
    messagesDeletedTotal,
    notificationsTotal,
    authRequestsTotal,
    streamConnections,
    streamDroppedTotal,
  };
}
