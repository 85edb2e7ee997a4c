import type { FastifyInstance } from 'fastify';
import { registerMessageRoutes } from './messages';
import { registerStreamRoutes } from './stream';

export const registerRoutes = async (app: FastifyInstance) => {
  await app.register(registerMessageRoutes);
  if (app.streamHub) {
    await app.register(registerStreamRoutes(app.streamHub));
  }
};
