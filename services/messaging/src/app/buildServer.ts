import Fastify from 'fastify';
import fastifyWebsocket from '@fastify/websocket';
import { loadConfig, type MessagingConfig } from '../config';
import { createMessagingMetrics, type MessagingMetrics } from '../observability/metrics';
import { APP_TOKEN_HEADER } from './middleware/appToken';
import { createRequireAuth } from './middleware/auth';
import { registerErrorHandler } from './errorHandler';
import { registerMetricsHooks, registerMetricsRoute } from './metrics';
import { registerRoutes } from './routes';
import { createMessagingContainer, type MessagingContainer, type MessagingContainerOverrides } from './serverContainer';

export interface BuildServerOptions {
  config?: MessagingConfig;
  metrics?: MessagingMetrics;
  overrides?: MessagingContainerOverrides;
}

const PUBLIC_ROUTES = new Set(['/health', '/metrics']);

const isPublicRequest = (method: string, path: string) =>
  method === 'OPTIONS' || PUBLIC_ROUTES.has(path) || (method === 'POST' && path === '/message');

export const buildServer = async ({
  config = loadConfig(),
  metrics = createMessagingMetrics(),
  overrides
}: BuildServerOptions = {}) => {
  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
      redact: ['req.headers.authorization', 'req.headers.cookie', `req.headers["${APP_TOKEN_HEADER}"]`]
    },
    trustProxy: true,
    bodyLimit: config.PAYLOAD_MAX_BYTES
  });

  const container: MessagingContainer = createMessagingContainer(config, { logger: app.log, metrics }, overrides);

  app.decorate('config', config);
  app.decorate('messagingMetrics', metrics);
  app.decorate('messageService', container.messageService);
  app.decorate('streamHub', container.streamHub);

  registerMetricsHooks(app, metrics);
  registerErrorHandler(app);
  await app.register(fastifyWebsocket, {
    options: { maxPayload: config.PAYLOAD_MAX_BYTES }
  });

  const requireAuth = createRequireAuth({ config, logger: app.log, metrics });
  app.addHook('preHandler', async (request, reply) => {
    const path = request.url.split('?')[0];
    if (isPublicRequest(request.method, path)) {
      return;
    }
    await requireAuth(request, reply);
  });

  await registerRoutes(app);
  registerMetricsRoute(app, metrics);
  app.get('/health', async () => ({ status: 'ok' }));

  app.addHook('onClose', async () => {
    await container.close();
  });

  return { app, container };
};
