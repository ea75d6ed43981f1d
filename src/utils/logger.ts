/**
 * Screener logging: one pino root, a child per module tagged `module`.
 * Pretty output for local scans, JSON in production, silent under vitest.
 */

import pino from 'pino';

const redactPaths = [
  'apiKey',
  'api_key',
  'authorization',
  'Authorization',
  'password',
  'secret',
  'token',
  '*.apiKey',
  '*.api_key',
  'headers.authorization',
  'headers.Authorization',
];

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

export const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport:
    process.env.NODE_ENV !== 'production' && !isTest
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export type Logger = pino.Logger;

export function createChildLogger(name: string): Logger {
  return logger.child({ module: name });
}
