/**
 * Request Context Middleware
 *
 * Gives every request a correlation ID and a pino child logger carrying it,
 * and logs the start and end of the request.
 *
 * Publishing pipelines that submit subtitle text usually send their own job
 * or batch ID in X-Request-ID. It is kept when it is a plain token (letters,
 * digits, `.`, `_`, `:`, `-`, at most 128 characters); anything else is
 * replaced with a fresh UUID so it cannot inject lines into the logs.
 */

import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import type { Logger } from 'pino';
import type { Env } from '../types.js';
import { createLogger, createRequestLogger } from '../utils/logger.js';

export const REQUEST_ID_HEADER = 'X-Request-ID';

const REQUEST_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._:-]{0,127}$/;

export type RequestContextVariables = {
  requestId: string;
  logger: Logger;
};

type RequestContext = Context<{ Bindings: Env; Variables: RequestContextVariables }>;

/**
 * The caller's request ID when it is a safe token, otherwise a new UUID
 */
export function resolveRequestId(header: string | undefined): string {
  return header !== undefined && REQUEST_ID_PATTERN.test(header) ? header : randomUUID();
}

/**
 * Add this first in the middleware chain.
 *
 * @example
 * ```typescript
 * app.use('*', requestContextMiddleware);
 *
 * app.post('/api/v1/profanity/check', (c) => {
 *   c.get('logger').info({ language }, 'Checked text');
 * });
 * ```
 */
export async function requestContextMiddleware(c: RequestContext, next: Next): Promise<void> {
  const requestId = resolveRequestId(c.req.header(REQUEST_ID_HEADER));
  const logger = createRequestLogger(c.env, requestId);
  c.set('requestId', requestId);
  c.set('logger', logger);

  const startTime = performance.now();
  const method = c.req.method;
  const path = c.req.path;

  logger.info({ method, path, userAgent: c.req.header('user-agent') }, 'Request started');

  await next();

  c.header(REQUEST_ID_HEADER, requestId);
  logger.info(
    {
      method,
      path,
      status: c.res.status,
      durationMs: Math.round((performance.now() - startTime) * 100) / 100,
    },
    'Request completed'
  );
}

/**
 * Request ID for error handlers, which may run before the middleware did
 */
export function getRequestId(c: RequestContext): string {
  return c.get('requestId') ?? 'unknown';
}

/**
 * Request logger, or the root logger when the middleware has not run
 */
export function getLogger(c: RequestContext): Logger {
  return c.get('logger') ?? createLogger(c.env);
}
