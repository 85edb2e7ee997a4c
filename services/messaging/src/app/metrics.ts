import type { FastifyInstance } from 'fastify';
import type { MessagingMetrics } from '../observability/metrics';

export const registerMetricsHooks = (app: FastifyInstance, metrics: MessagingMetrics) => {
  app.addHook('onRequest', async (request) => {
    request.metrics = {
      startTime: process.hrtime.bigint(),
      route: request.routeOptions.url ?? request.url.split('?')[0]
    };
  });

  app.addHook('onResponse', async (request, reply) => {
    if (!request.metrics) return;
    const duration = Number(process.hrtime.bigint() - request.metrics.startTime) / 1_000_000;
    const labels = {
      route: request.metrics.route,
      method: request.method,
      statusCode: reply.statusCode.toString()
    };
    metrics.requestCounter.labels(labels).inc();
    metrics.requestDurationMs.labels(labels).observe(duration);
  });
};

export const registerMetricsRoute = (app: FastifyInstance, metrics: MessagingMetrics) => {
  app.get('/metrics', async (_request, reply) => {
    if (app.config.NODE_ENV === 'production') {
      return reply.code(404).send();
    }
    reply.header('Content-Type', metrics.registry.contentType);
    return reply.send(await metrics.registry.metrics());
  });
};
