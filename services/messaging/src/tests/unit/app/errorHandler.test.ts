import Fastify from 'fastify';
import { describe, expect, it, test } from 'vitest';
import { z } from 'zod';

import { mapError, registerErrorHandler } from '../../../app/errorHandler';
import {
  ApplicationNotFoundError,
  NotifierError,
  StorageError,
  UnauthorizedError,
  ValidationError
} from '../../../domain/errors';

const zodError = () => {
  const result = z.object({ limit: z.number() }).safeParse({ limit: 'x' });
  if (result.success) throw new Error('expected a parse failure');
  return result.error;
};

const fastifyError = (code: string, statusCode: number, message: string) =>
  Object.assign(new Error(message), { code, statusCode });

describe('mapError', () => {
  test.each([
    {
      name: 'zod error',
      error: zodError(),
      expected: { statusCode: 400, code: 'VALIDATION_ERROR', message: 'Request validation failed' }
    },
    {
      name: 'domain validation error',
      error: new ValidationError('limit', 'too large'),
      expected: { statusCode: 400, code: 'VALIDATION_ERROR', message: 'Validation error for limit: too large' }
    },
    {
      name: 'unauthorized',
      error: new UnauthorizedError(),
      expected: { statusCode: 401, code: 'UNAUTHORIZED', message: 'invalid application token' }
    },
    {
      name: 'not found',
      error: new ApplicationNotFoundError(4),
      expected: { statusCode: 404, code: 'APPLICATION_NOT_FOUND', message: 'Application not found: 4' }
    },
    {
      name: 'storage error hides its detail',
      error: new StorageError('createMessage', new Error('connection reset')),
      expected: { statusCode: 500, code: 'STORAGE_ERROR', message: 'Internal server error' }
    },
    {
      name: 'notifier error',
      error: new NotifierError('MessageCreated'),
      expected: { statusCode: 500, code: 'NOTIFIER_ERROR', message: 'Internal server error' }
    },
    {
      name: 'fastify schema validation',
      error: fastifyError('FST_ERR_VALIDATION', 400, 'body must be object'),
      expected: { statusCode: 400, code: 'VALIDATION_ERROR', message: 'body must be object' }
    },
    {
      name: 'fastify client error',
      error: fastifyError('FST_ERR_CTP_BODY_TOO_LARGE', 413, 'Request body is too large'),
      expected: { statusCode: 413, code: 'FST_ERR_CTP_BODY_TOO_LARGE', message: 'Request body is too large' }
    },
    {
      name: 'fastify server error',
      error: fastifyError('FST_ERR_SOMETHING', 500, 'boom'),
      expected: { statusCode: 500, code: 'INTERNAL_SERVER_ERROR', message: 'Internal server error' }
    },
    {
      name: 'plain error',
      error: new Error('boom'),
      expected: { statusCode: 500, code: 'INTERNAL_SERVER_ERROR', message: 'Internal server error' }
    }
  ])('$name', ({ error, expected }) => {
    expect(mapError(error)).toEqual(expected);
  });
});

describe('registerErrorHandler', () => {
  it('answers with code, message, details and request id', async () => {
    const app = Fastify();
    registerErrorHandler(app);
    app.get('/zod', async () => {
      throw zodError();
    });
    app.get('/domain', async () => {
      throw new ApplicationNotFoundError(9);
    });

    try {
      const zod = await app.inject({ method: 'GET', url: '/zod' });
      const zodBody = zod.json();
      expect(zod.statusCode).toBe(400);
      expect(zodBody.code).toBe('VALIDATION_ERROR');
      expect(zodBody.details.fieldErrors.limit).toHaveLength(1);
      expect(typeof zodBody.requestId).toBe('string');

      const domain = await app.inject({ method: 'GET', url: '/domain' });
      expect(domain.statusCode).toBe(404);
      expect(domain.headers['content-type']).toContain('application/json');
      expect(domain.json()).toEqual({
        code: 'APPLICATION_NOT_FOUND',
        message: 'Application not found: 9',
        requestId: expect.any(String)
      });
    } finally {
      await app.close();
    }
  });
});
