/**
 * Logger
 *
 * Structured JSON logging with pino. One root logger per configuration,
 * with a child per request carrying the correlation ID.
 */

import { pino, type LevelWithSilent, type Logger } from 'pino';
import type { Env } from '../types.js';

export const SERVICE_NAME = 'cleancue-api';

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export function isLogLevel(value: unknown): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

type LoggerEnv = Pick<Env, 'ENVIRONMENT' | 'API_VERSION' | 'LOG_LEVEL'>;

const rootLoggers = new Map<string, Logger>();

/**
 * Root logger for an environment. Unknown levels fall back to 'info'
 * (validateEnv reports them separately).
 */
export function createLogger(env: LoggerEnv): Logger {
  const level = isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : 'info';
  const key = `${env.ENVIRONMENT}|${env.API_VERSION}|${level}`;

  let logger = rootLoggers.get(key);
  if (!logger) {
    logger = pino({
      level,
      base: {
        service: SERVICE_NAME,
        environment: env.ENVIRONMENT,
        version: env.API_VERSION,
      },
    });
    rootLoggers.set(key, logger);
  }
  return logger;
}

export function createRequestLogger(env: LoggerEnv, requestId: string): Logger {
  return createLogger(env).child({ requestId });
}
