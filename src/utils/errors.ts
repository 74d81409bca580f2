/**
 * Error Types
 *
 * Every failure the library raises on purpose is a CleanCueError. Each
 * carries a machine-readable code from the shared ErrorCode table and the
 * HTTP status the API answers with, so the global error handler can turn
 * it into the standard error envelope without a lookup table.
 */

import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ErrorCode, type ErrorCodeType } from './api-response.js';

export class CleanCueError extends Error {
  readonly code: ErrorCodeType;
  readonly status: ContentfulStatusCode;

  constructor(message: string, code: ErrorCodeType, status: ContentfulStatusCode, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/**
 * The requested or detected language has no word list
 */
export class UnsupportedLanguageError extends CleanCueError {
  readonly language: string;

  constructor(language: string) {
    super(`Language "${language}" is not supported`, ErrorCode.UNSUPPORTED_LANGUAGE, 400);
    this.language = language;
  }
}

/**
 * No language scored above zero on the sample, or the sample was empty
 */
export class DetectionFailedError extends CleanCueError {
  constructor(message = 'Could not detect a supported language from the given text') {
    super(message, ErrorCode.DETECTION_FAILED, 422);
  }
}

export class FileNotFoundError extends CleanCueError {
  readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super(`File not found: ${path}`, ErrorCode.FILE_NOT_FOUND, 404, options);
    this.path = path;
  }
}

export class ParseError extends CleanCueError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, ErrorCode.PARSE_ERROR, 400, options);
  }
}

/**
 * check/censor was called on a checker that has no vocabulary loaded yet
 */
export class LanguageNotSetError extends CleanCueError {
  constructor() {
    super('Language not set; call setLanguage() first', ErrorCode.LANGUAGE_NOT_SET, 500);
  }
}

export class InvalidOptionError extends CleanCueError {
  constructor(message: string) {
    super(message, ErrorCode.VALIDATION_ERROR, 400);
  }
}

/**
 * True for Node's ENOENT (missing file or directory)
 */
export function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
