/**
 * cleancue - Type Definitions
 *
 * Core matching types shared by the library and the HTTP API, plus the
 * environment bindings the API reads its configuration from.
 */

import type { Logger } from 'pino';
import type { WordListStore } from './services/word-list-service.js';

// ============================================
// LANGUAGES
// ============================================

export const SUPPORTED_LANGUAGES = ['en', 'tr', 'de', 'es', 'pt'] as const;

export type LanguageCode = (typeof SUPPORTED_LANGUAGES)[number];

/**
 * Tie-break order for language detection. Earlier codes win equal scores.
 */
export const DETECTION_PRIORITY: readonly LanguageCode[] = ['en', 'tr', 'de', 'es', 'pt'];

export function isLanguageCode(value: unknown): value is LanguageCode {
  return SUPPORTED_LANGUAGES.some((code) => code === value);
}

// ============================================
// MATCHING
// ============================================

/**
 * A word taken from input text. Offsets are UTF-16 code unit indices
 * into the original string, end-exclusive.
 */
export interface Token {
  /** Normalized (NFC, lower-cased) form used for matching */
  text: string;
  /** Exact substring of the input, `input.slice(start, end)` */
  original: string;
  index: number;
  start: number;
  end: number;
  /** The whole whitespace-delimited chunk, edge punctuation kept */
  chunk: TokenChunk;
}

export interface TokenChunk {
  /** Normalized like `Token.text` */
  text: string;
  start: number;
  end: number;
}

/**
 * A listed profanity entry: one word or a multi-word phrase
 */
export interface Term {
  /** Spelling as listed in the source file (trimmed) */
  text: string;
  /** Normalized whitespace-separated words, edge punctuation kept */
  words: readonly string[];
}

export interface TermTrieNode {
  children: Map<string, TermTrieNode>;
  term?: Term;
}

export interface Vocabulary {
  language: LanguageCode;
  terms: readonly Term[];
  trie: TermTrieNode;
  /** Word count of the longest term; 0 for an empty list */
  maxTermWords: number;
  /** Everyday words plus every term word, used to score detection */
  referenceWords: ReadonlySet<string>;
}

export interface MatchRecord {
  term: string;
  /** Index of the first matched token */
  wordIndex: number;
  start: number;
  end: number;
}

export type DetectionScores = Record<LanguageCode, number>;

export interface DetectionResult {
  language: LanguageCode;
  scores: DetectionScores;
}

// ============================================
// WORD LIST SOURCES
// ============================================

export type WordListKind = 'words' | 'stopwords';

export interface WordListSource {
  /**
   * Raw lines of a list, or null when the language has no list of that kind
   */
  readList(language: LanguageCode, kind: WordListKind): Promise<string[] | null>;
}

// ============================================
// SUBTITLES
// ============================================

export interface SubtitleCue {
  /** Position of the cue in the file, starting at 1 */
  sequence: number;
  startTime: string;
  endTime: string;
  text: string;
}

export interface SubtitleDetectionOptions {
  /** Number of leading cues sampled for detection */
  maxCues?: number;
}

// ============================================
// CHECKER OPTIONS
// ============================================

export interface ProfanityCheckerOptions {
  /** Language loaded by `ProfanityChecker.create` (default 'en') */
  language?: LanguageCode;
  /** Character repeated to build the censor mask (default '*') */
  maskCharacter?: string;
  /** Store to load vocabularies from; defaults to the bundled word lists */
  store?: WordListStore;
  logger?: Logger;
}

// ============================================
// ENVIRONMENT BINDINGS
// ============================================

export interface Env {
  ENVIRONMENT: string;
  API_VERSION: string;
  CORS_ORIGIN: string;
  ADDITIONAL_CORS_ORIGINS?: string; // Comma-separated additional allowed origins

  DEFAULT_LANGUAGE?: string;
  WORD_LIST_DIR?: string;
  MAX_TEXT_LENGTH?: string;
  LOG_LEVEL?: string;
}

// ============================================
// API PAYLOADS
// ============================================

export interface CheckRequest {
  text: string;
  language?: LanguageCode | 'auto';
}

export interface CensorRequest extends CheckRequest {
  maskCharacter?: string;
}

export interface CheckResponse {
  language: LanguageCode;
  found: boolean;
  matches: MatchRecord[];
}

export interface CensorResponse {
  language: LanguageCode;
  censored: string;
  matchCount: number;
}

export interface DetectRequest {
  text?: string;
  subtitle?: string;
  maxCues?: number;
}
