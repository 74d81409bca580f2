/**
 * Profanity Handler
 * Routes for checking and censoring text
 */

import { Hono } from 'hono';
import type { CensorRequest, CensorResponse, CheckResponse, Env } from '../types.js';
import { ProfanityChecker, DEFAULT_LANGUAGE } from '../services/profanity-checker.js';
import { AUTO_LANGUAGE, parseCensorRequest } from '../services/validation-service.js';
import { getMaxTextLength } from '../utils/env-validation.js';
import { invalidJsonResponse, validationErrorResponse } from '../utils/api-response.js';
import { domainErrorResponse, readJsonBody, storeFor, type HandlerContext, type HandlerVariables } from './helpers.js';

export const profanityRouter = new Hono<{ Bindings: Env; Variables: HandlerVariables }>();

/**
 * Build a checker for the request's language: an explicit code, 'auto'
 * (detected from the text itself), or the configured default.
 */
async function checkerFor(c: HandlerContext, request: CensorRequest): Promise<ProfanityChecker> {
  const checker = new ProfanityChecker({
    store: storeFor(c),
    maskCharacter: request.maskCharacter,
    logger: c.get('logger'),
  });

  if (request.language === AUTO_LANGUAGE) {
    await checker.setLanguageFromText(request.text);
  } else {
    await checker.setLanguage(request.language ?? c.env.DEFAULT_LANGUAGE ?? DEFAULT_LANGUAGE);
  }
  return checker;
}

/**
 * Parse and validate the body shared by both routes
 */
async function readRequest(c: HandlerContext): Promise<CensorRequest | Response> {
  const body = await readJsonBody(c);
  if (body === undefined) {
    return invalidJsonResponse(c);
  }

  const parsed = parseCensorRequest(body, getMaxTextLength(c.env));
  if (!parsed.ok) {
    return validationErrorResponse(c, parsed.error);
  }
  return parsed.value;
}

/**
 * POST /api/v1/profanity/check
 * Locate listed terms in the text
 */
profanityRouter.post('/check', async (c) => {
  const request = await readRequest(c);
  if (request instanceof Response) {
    return request;
  }

  try {
    const checker = await checkerFor(c, request);
    const matches = checker.checkProfanity(request.text);
    const language = checker.language ?? DEFAULT_LANGUAGE;

    c.get('logger').info({ language, matchCount: matches.length }, 'Checked text');

    return c.json<CheckResponse>({ language, found: matches.length > 0, matches });
  } catch (error) {
    return domainErrorResponse(c, error);
  }
});

/**
 * POST /api/v1/profanity/censor
 * Return the text with every match masked
 */
profanityRouter.post('/censor', async (c) => {
  const request = await readRequest(c);
  if (request instanceof Response) {
    return request;
  }

  try {
    const checker = await checkerFor(c, request);
    const { censored, matches } = checker.censorWithMatches(request.text);
    const language = checker.language ?? DEFAULT_LANGUAGE;

    c.get('logger').info({ language, matchCount: matches.length }, 'Censored text');

    return c.json<CensorResponse>({ language, censored, matchCount: matches.length });
  } catch (error) {
    return domainErrorResponse(c, error);
  }
});
