import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { WebSocket } from 'ws';
import type { StreamHub } from '../../ws/streamHub';

const POLICY_VIOLATION = 1008;

export const registerStreamRoutes = (hub: StreamHub) => async (app: FastifyInstance) => {
  app.get('/stream', { websocket: true }, (socket: WebSocket, request: FastifyRequest) => {
    const userId = request.auth?.userId;
    if (!userId) {
      socket.close(POLICY_VIOLATION, 'unauthorized');
      return;
    }
    hub.register(userId, socket);
  });
};
