/**
 * Standardized API Response Utilities
 *
 * Consistent error response format across all API endpoints.
 *
 * Error Response Format:
 * {
 *   success: false,
 *   error: "ERROR_CODE",      // Machine-readable, SCREAMING_SNAKE_CASE
 *   message: "Human message"  // Human-readable description
 * }
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';

// ============================================
// ERROR CODES
// ============================================

/**
 * Standard error codes used across the API and the library errors.
 * Using SCREAMING_SNAKE_CASE for machine-readability.
 */
export const ErrorCode = {
  // Client errors (4xx)
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_JSON: 'INVALID_JSON',
  NOT_FOUND: 'NOT_FOUND',
  UNSUPPORTED_MEDIA_TYPE: 'UNSUPPORTED_MEDIA_TYPE',
  UNSUPPORTED_LANGUAGE: 'UNSUPPORTED_LANGUAGE',
  DETECTION_FAILED: 'DETECTION_FAILED',
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  PARSE_ERROR: 'PARSE_ERROR',

  // Server errors (5xx)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  LANGUAGE_NOT_SET: 'LANGUAGE_NOT_SET',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

// ============================================
// RESPONSE TYPES
// ============================================

/**
 * Standard error response shape
 */
export interface ApiErrorResponse {
  success: false;
  error: ErrorCodeType | string;
  message: string;
}

// Use a generic context type that works with any Hono app configuration
// eslint-disable-next-line @typescript-eslint/no-explicit-any
type AnyContext = Context<any, any, any>;

// ============================================
// RESPONSE HELPERS
// ============================================

/**
 * Create a standardized error response
 *
 * @example
 * return errorResponse(c, ErrorCode.UNSUPPORTED_LANGUAGE, 'Language "fr" is not supported', 400);
 */
export function errorResponse(
  c: AnyContext,
  error: ErrorCodeType | string,
  message: string,
  status: ContentfulStatusCode = 400
): Response {
  return c.json<ApiErrorResponse>(
    {
      success: false,
      error,
      message,
    },
    status
  );
}

// ============================================
// COMMON ERROR RESPONSES
// ============================================

/**
 * 400 Bad Request - Invalid JSON body
 */
export function invalidJsonResponse(c: AnyContext): Response {
  return errorResponse(c, ErrorCode.INVALID_JSON, 'Invalid JSON body', 400);
}

/**
 * 400 Bad Request - Validation failed
 */
export function validationErrorResponse(c: AnyContext, message: string): Response {
  return errorResponse(c, ErrorCode.VALIDATION_ERROR, message, 400);
}
