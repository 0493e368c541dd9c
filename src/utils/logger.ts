import pino from 'pino';

/**
 * Application logger using Pino
 *
 * Features:
 * - Structured JSON logging
 * - Pretty printing outside production
 * - Silent under test unless LOG_LEVEL is set
 */

export function loggerOptions(environment: NodeJS.ProcessEnv): pino.LoggerOptions {
  const env = environment.NODE_ENV || 'development';
  const isTest = env === 'test';
  const isPretty = env !== 'production' && !isTest;

  return {
    level: environment.LOG_LEVEL || (isTest ? 'silent' : 'info'),

    // Pretty print outside production, JSON in production
    transport: isPretty ? {
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
  };
}

export const logger = pino(loggerOptions(process.env));

export type Logger = pino.Logger;

/**
 * Create a child logger with specific context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
