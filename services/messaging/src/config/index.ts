import { z } from 'zod';

const BOOL = z
  .union([z.string(), z.boolean()])
  .optional()
  .transform((value) => {
    if (value === undefined) return undefined;
    if (typeof value === 'boolean') return value;
    return value === 'true';
  });

const NUMBER_FROM_STRING = (schema: z.ZodNumber = z.number()) =>
  z
    .union([z.string(), z.number()])
    .optional()
    .transform((value) => {
      if (value === undefined) return undefined;
      return typeof value === 'number' ? value : Number.parseInt(value, 10);
    })
    .pipe(schema);

export const MessagingConfigSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    HTTP_HOST: z.string().default('0.0.0.0'),
    HTTP_PORT: NUMBER_FROM_STRING(z.number().int().nonnegative()).default(8080),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    // Absolute origin used when rendering paging.next links behind a proxy
    PUBLIC_BASE_URL: z.string().url().optional(),
    // JWT Authentication Configuration
    JWT_JWKS_URL: z.string().url().optional(),
    JWT_PUBLIC_KEY: z.string().optional(),
    JWT_ISSUER: z.string().min(1),
    JWT_AUDIENCE: z.string().min(1),
    JWT_ALGS: z.string().default('RS256,ES256'),
    JWT_CLOCK_SKEW: NUMBER_FROM_STRING(z.number().int().nonnegative()).default(60),
    // Storage
    STORAGE_DRIVER: z.enum(['memory', 'postgres']).default('memory'),
    POSTGRES_URL: z.string().url().optional(),
    POSTGRES_POOL_MAX: NUMBER_FROM_STRING(z.number().int().positive()).default(20),
    POSTGRES_MIGRATE: BOOL.default(true),
    // Delivery
    NOTIFIER_DRIVER: z.enum(['stream', 'log', 'none']).default('stream'),
    DELETION_NOTIFY_ORDER: z.enum(['notify-first', 'delete-first']).default('notify-first'),
    WEBSOCKET_HEARTBEAT_INTERVAL_MS: NUMBER_FROM_STRING(z.number().int().positive()).default(45_000),
    WEBSOCKET_MAX_BUFFERED_BYTES: NUMBER_FROM_STRING(z.number().int().positive()).default(1024 * 1024),
    PAYLOAD_MAX_BYTES: NUMBER_FROM_STRING(z.number().int().positive().max(1024 * 1024)).default(65_536)
  })
  .superRefine((cfg, ctx) => {
    if (!cfg.JWT_JWKS_URL && !cfg.JWT_PUBLIC_KEY) {
      ctx.addIssue({
        path: ['JWT_JWKS_URL'],
        code: z.ZodIssueCode.custom,
        message: 'Either JWT_JWKS_URL or JWT_PUBLIC_KEY must be provided'
      });
    }
    if (cfg.JWT_JWKS_URL && cfg.JWT_PUBLIC_KEY) {
      ctx.addIssue({
        path: ['JWT_JWKS_URL'],
        code: z.ZodIssueCode.custom,
        message: 'Provide only one of JWT_JWKS_URL or JWT_PUBLIC_KEY, not both'
      });
    }
    if (cfg.STORAGE_DRIVER === 'postgres' && !cfg.POSTGRES_URL) {
      ctx.addIssue({
        path: ['POSTGRES_URL'],
        code: z.ZodIssueCode.custom,
        message: 'POSTGRES_URL is required when STORAGE_DRIVER=postgres'
      });
    }
  });

export type MessagingConfig = z.infer<typeof MessagingConfigSchema>;

let cached: MessagingConfig | undefined;

export const loadConfig = (): MessagingConfig => {
  if (!cached) {
    cached = MessagingConfigSchema.parse(process.env);
  }
  return cached;
};

export const resetConfigForTests = () => {
  cached = undefined;
};
