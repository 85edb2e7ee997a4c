import type { FastifyRequest } from 'fastify';
import { z } from 'zod';

export const APP_TOKEN_HEADER = 'x-app-token';

const AppTokenQuerySchema = z.object({ token: z.string().min(1).optional() }).passthrough();

/**
 * Application token for message creation, from the `X-App-Token` header or
 * the `token` query parameter.
 */
export const extractAppToken = (request: FastifyRequest): string | undefined => {
  const header = request.headers[APP_TOKEN_HEADER];
  if (typeof header === 'string' && header.trim()) {
    return header.trim();
  }
  const query = AppTokenQuerySchema.safeParse(request.query ?? {});
  return query.success ? query.data.token : undefined;
};
