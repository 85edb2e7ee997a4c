import pino from 'pino';

export type Logger = Pick<pino.BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export const createLogger = (level: pino.Level = 'info', name?: string) =>
  pino({ level, name, redact: ['req.headers.authorization', 'req.headers.cookie', 'req.headers["x-app-token"]'] });
