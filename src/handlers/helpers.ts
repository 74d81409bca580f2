/**
 * Shared handler helpers
 */

import type { Context } from 'hono';
import type { Env } from '../types.js';
import type { RequestContextVariables } from '../middleware/request-context.js';
import { CleanCueError } from '../utils/errors.js';
import { errorResponse } from '../utils/api-response.js';
import { createLogger } from '../utils/logger.js';
import { DEFAULT_WORD_LIST_DIR, getWordListStore, type WordListStore } from '../services/word-list-service.js';

export type HandlerVariables = RequestContextVariables;

export type HandlerContext = Context<{ Bindings: Env; Variables: HandlerVariables }>;

/**
 * Shared store for the configured word list directory
 */
export function storeFor(c: HandlerContext): WordListStore {
  return getWordListStore(c.env.WORD_LIST_DIR ?? DEFAULT_WORD_LIST_DIR, createLogger(c.env));
}

/**
 * Request body as JSON, or undefined when it does not parse
 */
export async function readJsonBody(c: HandlerContext): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch {
    return undefined;
  }
}

/**
 * Answer a library error with its own code and status; anything else is
 * rethrown for the global error handler.
 */
export function domainErrorResponse(c: HandlerContext, error: unknown): Response {
  if (error instanceof CleanCueError) {
    return errorResponse(c, error.code, error.message, error.status);
  }
  throw error;
}
