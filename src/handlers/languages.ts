/**
 * Languages Handler
 * Routes for listing supported languages and detecting a sample's language
 */

import { Hono } from 'hono';
import { DETECTION_PRIORITY, SUPPORTED_LANGUAGES, type Env } from '../types.js';
import { DEFAULT_LANGUAGE } from '../services/profanity-checker.js';
import { detectLanguageFromText } from '../services/language-detection-service.js';
import { DEFAULT_MAX_CUES, parseSubtitles, subtitleSample } from '../services/subtitle-service.js';
import { parseDetectRequest } from '../services/validation-service.js';
import { getMaxTextLength } from '../utils/env-validation.js';
import { invalidJsonResponse, validationErrorResponse } from '../utils/api-response.js';
import { domainErrorResponse, readJsonBody, storeFor, type HandlerVariables } from './helpers.js';

export const languagesRouter = new Hono<{ Bindings: Env; Variables: HandlerVariables }>();

/**
 * GET /api/v1/languages
 * Supported language codes, the default and the detection tie-break order
 *
 * PERFORMANCE: The list only changes with a deploy, so browsers may cache it.
 */
languagesRouter.get('/', (c) => {
  return c.json(
    {
      languages: SUPPORTED_LANGUAGES,
      default: c.env.DEFAULT_LANGUAGE ?? DEFAULT_LANGUAGE,
      detectionPriority: DETECTION_PRIORITY,
    },
    200,
    {
      'Cache-Control': 'public, max-age=300',
    }
  );
});

/**
 * POST /api/v1/languages/detect
 * Detect the language of plain text or of SRT/WebVTT subtitle content
 */
languagesRouter.post('/detect', async (c) => {
  const body = await readJsonBody(c);
  if (body === undefined) {
    return invalidJsonResponse(c);
  }

  const parsed = parseDetectRequest(body, getMaxTextLength(c.env));
  if (!parsed.ok) {
    return validationErrorResponse(c, parsed.error);
  }
  const request = parsed.value;

  try {
    const sample = request.subtitle !== undefined
      ? subtitleSample(parseSubtitles(request.subtitle), request.maxCues ?? DEFAULT_MAX_CUES)
      : request.text ?? '';

    const detection = await detectLanguageFromText(sample, storeFor(c));
    c.get('logger').info({ language: detection.language, scores: detection.scores }, 'Detected language');

    return c.json(detection);
  } catch (error) {
    return domainErrorResponse(c, error);
  }
});
