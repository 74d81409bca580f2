/**
 * Library entry point
 */

export { ProfanityChecker, DEFAULT_LANGUAGE } from './services/profanity-checker.js';
export {
  WordListStore,
  buildVocabulary,
  createFileWordListSource,
  createInMemoryWordListSource,
  getWordListStore,
  DEFAULT_WORD_LIST_DIR,
} from './services/word-list-service.js';
export { tokenize, normalizeWord } from './services/tokenizer-service.js';
export { buildTermTrie, matchTokens } from './services/matcher-service.js';
export { censorText, buildMask, MASK_LENGTH, DEFAULT_MASK_CHARACTER } from './services/censor-service.js';
export {
  scoreLanguages,
  pickLanguage,
  detectLanguageFromText,
  detectLanguageFromSubtitleFile,
} from './services/language-detection-service.js';
export { parseSubtitles, readSubtitleFile, subtitleSample, DEFAULT_MAX_CUES } from './services/subtitle-service.js';
export {
  CleanCueError,
  UnsupportedLanguageError,
  DetectionFailedError,
  FileNotFoundError,
  ParseError,
  LanguageNotSetError,
  InvalidOptionError,
} from './utils/errors.js';
export { SUPPORTED_LANGUAGES, DETECTION_PRIORITY, isLanguageCode } from './types.js';
export type {
  LanguageCode,
  Token,
  Term,
  Vocabulary,
  MatchRecord,
  DetectionScores,
  DetectionResult,
  WordListSource,
  WordListKind,
  SubtitleCue,
  SubtitleDetectionOptions,
  ProfanityCheckerOptions,
} from './types.js';
