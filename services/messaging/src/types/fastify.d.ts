import 'fastify';
import type { MessagingConfig } from '../config';
import type { AuthContext } from '../domain/types/auth.types';
import type { MessagingMetrics } from '../observability/metrics';
import type { MessageService } from '../usecases/messages/messageService';
import type { StreamHub } from '../ws/streamHub';

declare module 'fastify' {
  interface FastifyInstance {
    config: MessagingConfig;
    messagingMetrics: MessagingMetrics;
    messageService: MessageService;
    streamHub?: StreamHub;
  }

  interface FastifyRequest {
    auth?: AuthContext;
    metrics?: {
      startTime: bigint;
      route: string;
    };
  }
}
