import type { FastifyError, FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import { MessagingError } from '../domain/errors';

type FastifyErrorHandler = Parameters<FastifyInstance['setErrorHandler']>[0];

type MappedError = { statusCode: number; code: string; message: string };

const INTERNAL_MESSAGE = 'Internal server error';

const isFastifyError = (error: Error): error is FastifyError =>
  'code' in error && typeof error.code === 'string';

export const mapError = (error: Error): MappedError => {
  if (error instanceof ZodError) {
    return { statusCode: 400, code: 'VALIDATION_ERROR', message: 'Request validation failed' };
  }

  if (error instanceof MessagingError) {
    const message = error.statusCode >= 500 ? INTERNAL_MESSAGE : error.message;
    return { statusCode: error.statusCode, code: error.code, message };
  }

  if (isFastifyError(error)) {
    if (error.code === 'FST_ERR_VALIDATION') {
      return { statusCode: 400, code: 'VALIDATION_ERROR', message: error.message };
    }
    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      return { statusCode: error.statusCode, code: error.code, message: error.message };
    }
  }

  return { statusCode: 500, code: 'INTERNAL_SERVER_ERROR', message: INTERNAL_MESSAGE };
};

export const registerErrorHandler = (app: FastifyInstance) => {
  const handler: FastifyErrorHandler = (error, request, reply) => {
    const { statusCode, code, message } = mapError(error);

    const responseBody = {
      code,
      message,
      details: error instanceof ZodError ? error.flatten() : undefined,
      requestId: request.id
    };

    if (statusCode >= 500) {
      request.log.error({ err: error, requestId: request.id }, 'Unhandled error');
    } else {
      request.log.warn({ err: error, requestId: request.id }, 'Client error');
    }

    reply
      .code(statusCode)
      .type('application/json')
      .send(responseBody);
  };

  app.setErrorHandler(handler);
};
