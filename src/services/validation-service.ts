/**
 * Validation Service
 * Centralized validation of API request bodies.
 *
 * Provides:
 * - Generic string/enum validation helpers
 * - Request parsers for check, censor and detect payloads
 */

import {
  SUPPORTED_LANGUAGES,
  isLanguageCode,
  type CensorRequest,
  type DetectRequest,
  type LanguageCode,
} from '../types.js';
import { validateMaskCharacter } from './censor-service.js';

// ============================================================================
// Validation Rule Constants
// ============================================================================

export const DETECT_VALIDATION_RULES = {
  maxCues: {
    min: 1,
    max: 500,
  },
} as const;

export const AUTO_LANGUAGE = 'auto';

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; error: string };

// ============================================================================
// Generic Validation Helpers
// ============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a string field with length constraints
 *
 * @param value - The value to validate
 * @param fieldName - Human-readable field name for error messages
 * @param options - Validation options
 * @returns Error message or null if valid
 */
export function validateStringLength(
  value: unknown,
  fieldName: string,
  options: {
    minLength?: number;
    maxLength?: number;
    required?: boolean;
  }
): string | null {
  const { minLength, maxLength, required = true } = options;

  if (typeof value !== 'string') {
    if (required || value !== undefined) {
      return `${fieldName} must be a string`;
    }
    return null;
  }

  if (minLength !== undefined && value.length < minLength) {
    return `${fieldName} must be at least ${minLength} characters`;
  }

  if (maxLength !== undefined && value.length > maxLength) {
    return `${fieldName} must be at most ${maxLength} characters`;
  }

  return null;
}

/**
 * Validate a value against an enum/list of valid values
 *
 * @returns Error message or null if valid
 */
export function validateEnum<T>(
  value: unknown,
  fieldName: string,
  validValues: readonly T[]
): string | null {
  if (!validValues.some((valid) => valid === value)) {
    return `${fieldName} must be one of: ${validValues.join(', ')}`;
  }
  return null;
}

// ============================================================================
// Request Parsers
// ============================================================================

/**
 * Parse the language field: a supported code, 'auto', or absent
 */
function parseLanguageField(value: unknown): ValidationResult<LanguageCode | typeof AUTO_LANGUAGE | undefined> {
  if (value === undefined) {
    return { ok: true, value: undefined };
  }
  if (value === AUTO_LANGUAGE || isLanguageCode(value)) {
    return { ok: true, value };
  }
  const error = validateEnum(value, 'language', [...SUPPORTED_LANGUAGES, AUTO_LANGUAGE]);
  return { ok: false, error: error ?? 'language is invalid' };
}

/**
 * Parse a check or censor request body
 */
export function parseCensorRequest(body: unknown, maxTextLength: number): ValidationResult<CensorRequest> {
  if (!isRecord(body)) {
    return { ok: false, error: 'Request body must be a JSON object' };
  }

  const textError = validateStringLength(body.text, 'text', { maxLength: maxTextLength });
  if (textError || typeof body.text !== 'string') {
    return { ok: false, error: textError ?? 'text must be a string' };
  }

  const language = parseLanguageField(body.language);
  if (!language.ok) {
    return language;
  }

  const request: CensorRequest = { text: body.text, language: language.value };

  if (body.maskCharacter !== undefined) {
    const maskError = validateMaskCharacter(body.maskCharacter);
    if (maskError || typeof body.maskCharacter !== 'string') {
      return { ok: false, error: maskError ?? 'maskCharacter must be a string' };
    }
    request.maskCharacter = body.maskCharacter;
  }

  return { ok: true, value: request };
}

/**
 * Parse a detect request body: exactly one of `text` or `subtitle`
 */
export function parseDetectRequest(body: unknown, maxTextLength: number): ValidationResult<DetectRequest> {
  if (!isRecord(body)) {
    return { ok: false, error: 'Request body must be a JSON object' };
  }

  const hasText = body.text !== undefined;
  const hasSubtitle = body.subtitle !== undefined;
  if (hasText === hasSubtitle) {
    return { ok: false, error: 'Provide exactly one of text or subtitle' };
  }

  const field = hasText ? 'text' : 'subtitle';
  const value = body[field];
  const lengthError = validateStringLength(value, field, { maxLength: maxTextLength });
  if (lengthError || typeof value !== 'string') {
    return { ok: false, error: lengthError ?? `${field} must be a string` };
  }

  const request: DetectRequest = hasText ? { text: value } : { subtitle: value };

  if (body.maxCues !== undefined) {
    const { min, max } = DETECT_VALIDATION_RULES.maxCues;
    if (!hasSubtitle) {
      return { ok: false, error: 'maxCues only applies to subtitle detection' };
    }
    if (typeof body.maxCues !== 'number' || !Number.isInteger(body.maxCues) || body.maxCues < min || body.maxCues > max) {
      return { ok: false, error: `maxCues must be an integer between ${min} and ${max}` };
    }
    request.maxCues = body.maxCues;
  }

  return { ok: true, value: request };
}
