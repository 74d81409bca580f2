/**
 * Environment Validation
 *
 * Checks the Env bindings once at startup, and once per bindings object in
 * the request pipeline.
 */

import type { Logger } from 'pino';
import { isLanguageCode, type Env } from '../types.js';
import { LOG_LEVELS, isLogLevel } from './logger.js';

export interface EnvValidationResult {
  valid: boolean;
  errors: string[];
}

const REQUIRED_STRING_VARS = ['ENVIRONMENT', 'API_VERSION', 'CORS_ORIGIN'] as const;

export const DEFAULT_MAX_TEXT_LENGTH = 100_000;

/**
 * Build Env bindings from process environment variables.
 * ENVIRONMENT and API_VERSION default for local runs; CORS_ORIGIN does not.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return {
    ENVIRONMENT: source.ENVIRONMENT ?? 'development',
    API_VERSION: source.API_VERSION ?? 'v1',
    CORS_ORIGIN: source.CORS_ORIGIN ?? '',
    ADDITIONAL_CORS_ORIGINS: source.ADDITIONAL_CORS_ORIGINS,
    DEFAULT_LANGUAGE: source.DEFAULT_LANGUAGE,
    WORD_LIST_DIR: source.WORD_LIST_DIR,
    MAX_TEXT_LENGTH: source.MAX_TEXT_LENGTH,
    LOG_LEVEL: source.LOG_LEVEL,
  };
}

function isValidUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Validate required and optional environment variables
 */
export function validateEnv(env: Partial<Env>): EnvValidationResult {
  const errors: string[] = [];

  for (const key of REQUIRED_STRING_VARS) {
    const value = env[key];
    if (typeof value !== 'string' || value.trim().length === 0) {
      errors.push(`Missing or empty required env var: ${key}`);
    }
  }

  if (typeof env.CORS_ORIGIN === 'string' && env.CORS_ORIGIN.trim().length > 0 && !isValidUrl(env.CORS_ORIGIN)) {
    errors.push(`Invalid URL for CORS_ORIGIN: ${env.CORS_ORIGIN}`);
  }

  if (env.ADDITIONAL_CORS_ORIGINS !== undefined) {
    for (const origin of env.ADDITIONAL_CORS_ORIGINS.split(',').map((o) => o.trim())) {
      if (origin.length > 0 && !isValidUrl(origin)) {
        errors.push(`Invalid URL in ADDITIONAL_CORS_ORIGINS: ${origin}`);
      }
    }
  }

  if (env.DEFAULT_LANGUAGE !== undefined && !isLanguageCode(env.DEFAULT_LANGUAGE)) {
    errors.push(`DEFAULT_LANGUAGE must be a supported language code, got "${env.DEFAULT_LANGUAGE}"`);
  }

  if (env.MAX_TEXT_LENGTH !== undefined) {
    const max = Number(env.MAX_TEXT_LENGTH);
    if (!Number.isInteger(max) || max <= 0) {
      errors.push(`MAX_TEXT_LENGTH must be a positive integer, got "${env.MAX_TEXT_LENGTH}"`);
    }
  }

  if (env.LOG_LEVEL !== undefined && !isLogLevel(env.LOG_LEVEL)) {
    errors.push(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Maximum accepted text length in characters
 */
export function getMaxTextLength(env: Pick<Env, 'MAX_TEXT_LENGTH'>): number {
  const max = Number(env.MAX_TEXT_LENGTH);
  return Number.isInteger(max) && max > 0 ? max : DEFAULT_MAX_TEXT_LENGTH;
}

/**
 * Log validation errors
 */
export function logValidationErrors(errors: readonly string[], logger: Logger): void {
  logger.error({ errors }, 'Environment validation failed');
}
