import pino, { type Logger } from 'pino';

/**
 * Library logger using Pino
 *
 * Pretty output in development, JSON in production, silent under test
 * unless LOG_LEVEL says otherwise.
 */

const env = process.env.NODE_ENV || 'development';
const isDevelopment = env !== 'production' && env !== 'test';

export const logger = pino({
  level: process.env.LOG_LEVEL || (env === 'test' ? 'silent' : 'info'),

  transport: isDevelopment ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,

  base: {
    env,
  },
});

/**
 * Create a child logger with specific context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export type { Logger };
