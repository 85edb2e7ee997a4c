import type { FastifyReply, FastifyRequest } from 'fastify';
import {
  createRemoteJWKSet,
  errors as joseErrors,
  importSPKI,
  importX509,
  jwtVerify,
  type KeyLike
} from 'jose';
import { z } from 'zod';
import type { MessagingConfig } from '../../config';
import type { AuthContext } from '../../domain/types/auth.types';
import type { Logger } from '../../observability/logging';
import type { MessagingMetrics } from '../../observability/metrics';

export const AUTH_ERROR_CODES = {
  missingToken: 'MISSING_TOKEN',
  invalidToken: 'INVALID_TOKEN',
  tokenExpired: 'TOKEN_EXPIRED',
  tokenAudienceMismatch: 'TOKEN_AUDIENCE_MISMATCH',
  tokenIssuerMismatch: 'TOKEN_ISSUER_MISMATCH',
  tokenNotBefore: 'TOKEN_NOT_BEFORE',
} as const;

export type AuthErrorCode = (typeof AUTH_ERROR_CODES)[keyof typeof AUTH_ERROR_CODES];

export interface RequireAuthDependencies {
  config: Pick<
    MessagingConfig,
    'JWT_JWKS_URL' | 'JWT_PUBLIC_KEY' | 'JWT_ISSUER' | 'JWT_AUDIENCE' | 'JWT_ALGS' | 'JWT_CLOCK_SKEW'
  >;
  logger?: Logger;
  metrics?: Pick<MessagingMetrics, 'authRequestsTotal'>;
  importKey?: (pem: string, algorithms: string[]) => Promise<KeyLike>;
}

// browsers cannot set headers on a websocket upgrade, so /stream may pass the token in the query
const TokenQuerySchema = z.object({ access_token: z.string().min(1).optional() }).passthrough();

export const extractBearerToken = (request: FastifyRequest): string | undefined => {
  const header = request.headers.authorization;
  if (header?.startsWith('Bearer ')) {
    const token = header.slice('Bearer '.length).trim();
    return token || undefined;
  }
  const query = TokenQuerySchema.safeParse(request.query ?? {});
  return query.success ? query.data.access_token : undefined;
};

/**
 * Imports a PEM public key or certificate, trying each allowed algorithm
 * until one accepts the key.
 */
export const importVerificationKey = async (pem: string, algorithms: string[]): Promise<KeyLike> => {
  const trimmed = pem.trim();
  const isCertificate = trimmed.includes('BEGIN CERTIFICATE');
  let lastError: unknown = new Error('No JWT algorithm configured');
  for (const alg of algorithms) {
    try {
      return isCertificate ? await importX509(trimmed, alg) : await importSPKI(trimmed, alg);
    } catch (error) {
      lastError = error;
    }
  }
  throw lastError;
};

export const createRequireAuth = (deps: RequireAuthDependencies) => {
  const { config, logger, metrics, importKey = importVerificationKey } = deps;

  const algorithms = config.JWT_ALGS.split(',')
    .map((alg) => alg.trim())
    .filter(Boolean);

  const issuer = config.JWT_ISSUER;
  const audience = config.JWT_AUDIENCE;
  const clockTolerance = config.JWT_CLOCK_SKEW;

  const jwksFetcher = config.JWT_JWKS_URL ? createRemoteJWKSet(new URL(config.JWT_JWKS_URL)) : null;
  const pemKey = config.JWT_PUBLIC_KEY;
  if (!jwksFetcher && !pemKey) {
    throw new Error('JWT_JWKS_URL or JWT_PUBLIC_KEY must be configured');
  }

  let staticKey: Promise<KeyLike> | undefined;

  const verifyToken = async (token: string) => {
    const options = { issuer, audience, algorithms, clockTolerance } as const;
    if (jwksFetcher) {
      return jwtVerify(token, jwksFetcher, options);
    }
    if (!pemKey) {
      throw new Error('JWT_PUBLIC_KEY must be configured');
    }
    // a failed import is not cached, so the next request tries again
    const key = (staticKey ??= importKey(pemKey, algorithms).catch((error: unknown) => {
      staticKey = undefined;
      logger?.error({ err: error }, 'jwt_key_import_failed');
      throw error;
    }));
    return jwtVerify(token, await key, options);
  };

  const fail = (
    reply: FastifyReply,
    request: FastifyRequest,
    outcome: string,
    code: AuthErrorCode,
    message: string,
    loggingMeta?: Record<string, unknown>
  ): void => {
    metrics?.authRequestsTotal.labels({ outcome }).inc();
    logger?.warn({ reqId: request.id, code, ...loggingMeta }, 'auth_failed');
    void reply.code(401).send({
      code,
      message,
      requestId: request.id,
    });
  };

  return async function requireAuth(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    const token = extractBearerToken(request);
    if (!token) {
      return fail(reply, request, 'missing', AUTH_ERROR_CODES.missingToken, 'Authorization header required');
    }

    try {
      const { payload } = await verifyToken(token);
      const { sub, iat, exp } = payload;
      const scope = payload.scope;

      if (!sub) {
        return fail(reply, request, 'invalid', AUTH_ERROR_CODES.invalidToken, 'Token missing subject');
      }
      if (typeof exp !== 'number') {
        return fail(reply, request, 'invalid', AUTH_ERROR_CODES.invalidToken, 'Token missing expiration');
      }

      const scopes = Array.isArray(scope)
        ? scope.filter((entry): entry is string => typeof entry === 'string')
        : typeof scope === 'string'
          ? scope.split(' ').filter(Boolean)
          : [];

      request.auth = {
        userId: sub,
        scope: scopes,
        issuedAt: typeof iat === 'number' ? iat : 0,
        expiresAt: exp,
      } satisfies AuthContext;

      metrics?.authRequestsTotal.labels({ outcome: 'ok' }).inc();
    } catch (error) {
      if (error instanceof joseErrors.JWTExpired) {
        return fail(reply, request, 'expired', AUTH_ERROR_CODES.tokenExpired, 'Token expired');
      }

      if (error instanceof joseErrors.JWTClaimValidationFailed) {
        const claim = error.claim;
        const code = claim === 'nbf'
          ? AUTH_ERROR_CODES.tokenNotBefore
          : claim === 'aud'
            ? AUTH_ERROR_CODES.tokenAudienceMismatch
            : claim === 'iss'
              ? AUTH_ERROR_CODES.tokenIssuerMismatch
              : AUTH_ERROR_CODES.invalidToken;
        return fail(reply, request, 'invalid_claim', code, 'Token claim validation failed', { claim });
      }

      const reason = error instanceof Error ? error.message : 'token verification failed';
      return fail(reply, request, 'invalid', AUTH_ERROR_CODES.invalidToken, 'Token validation failed', { reason });
    }
  };
};
