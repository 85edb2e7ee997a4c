import type { FastifyInstance, FastifyRequest } from 'fastify';
import { UnauthorizedError } from '../../domain/errors';
import type { UserId } from '../../domain/types/message.types';
import { extractAppToken } from '../middleware/appToken';
import { mapPagedMessagesResponse, toExternalMessage } from './mappers';
import {
  ApplicationIdParamsSchema,
  CreateMessageBodySchema,
  ExternalMessageSchema,
  ListMessagesQuerySchema,
  MessageIdParamsSchema,
  PagedMessagesResponseSchema
} from './schemas/messages';

const requireUser = (request: FastifyRequest): UserId => {
  if (!request.auth) {
    throw new UnauthorizedError('authentication required');
  }
  return request.auth.userId;
};

/**
 * Absolute URL of the current request, rooted at PUBLIC_BASE_URL when the
 * service sits behind a proxy that rewrites the origin.
 */
export const resolveRequestUrl = (request: FastifyRequest, publicBaseUrl?: string): URL => {
  const origin = publicBaseUrl ?? `${request.protocol}://${request.hostname}`;
  return new URL(`${origin.replace(/\/+$/, '')}${request.url}`);
};

export const registerMessageRoutes = async (app: FastifyInstance) => {
  app.get('/message', async (request) => {
    const userId = requireUser(request);
    const paging = ListMessagesQuerySchema.parse(request.query);
    const page = await app.messageService.listMessages(userId, paging);
    return PagedMessagesResponseSchema.parse(
      mapPagedMessagesResponse(page, resolveRequestUrl(request, app.config.PUBLIC_BASE_URL))
    );
  });

  app.get('/application/:id/message', async (request) => {
    const userId = requireUser(request);
    const params = ApplicationIdParamsSchema.parse(request.params);
    const paging = ListMessagesQuerySchema.parse(request.query);
    const page = await app.messageService.listApplicationMessages(userId, params.id, paging);
    return PagedMessagesResponseSchema.parse(
      mapPagedMessagesResponse(page, resolveRequestUrl(request, app.config.PUBLIC_BASE_URL))
    );
  });

  app.post('/message', async (request) => {
    const token = extractAppToken(request);
    if (!token) {
      throw new UnauthorizedError('application token required');
    }
    const body = CreateMessageBodySchema.parse(request.body);
    const message = await app.messageService.createMessage(token, body);
    return ExternalMessageSchema.parse(toExternalMessage(message));
  });

  app.delete('/message', async (request, reply) => {
    const userId = requireUser(request);
    await app.messageService.deleteAllMessages(userId);
    return reply.code(200).send();
  });

  app.delete('/application/:id/message', async (request, reply) => {
    const userId = requireUser(request);
    const params = ApplicationIdParamsSchema.parse(request.params);
    await app.messageService.deleteApplicationMessages(userId, params.id);
    return reply.code(200).send();
  });

  app.delete('/message/:id', async (request, reply) => {
    const userId = requireUser(request);
    const params = MessageIdParamsSchema.parse(request.params);
    await app.messageService.deleteMessage(userId, params.id);
    return reply.code(200).send();
  });
};
