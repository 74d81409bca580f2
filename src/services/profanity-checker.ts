/**
 * Profanity Checker
 * Session object that owns the selected language's vocabulary and exposes
 * check/censor plus language selection by code, text or subtitle file.
 */

import type { Logger } from 'pino';
import type {
  DetectionResult,
  LanguageCode,
  MatchRecord,
  ProfanityCheckerOptions,
  SubtitleDetectionOptions,
  Vocabulary,
} from '../types.js';
import { LanguageNotSetError } from '../utils/errors.js';
import { DEFAULT_MASK_CHARACTER, buildMask, censorText } from './censor-service.js';
import { detectLanguageFromSubtitleFile, detectLanguageFromText } from './language-detection-service.js';
import { matchTokens } from './matcher-service.js';
import { tokenize } from './tokenizer-service.js';
import { WordListStore, getWordListStore } from './word-list-service.js';

export const DEFAULT_LANGUAGE: LanguageCode = 'en';

export class ProfanityChecker {
  private readonly store: WordListStore;
  private readonly maskCharacter: string;
  private readonly logger?: Logger;
  private vocabulary: Vocabulary | null = null;
  private lastDetection: DetectionResult | null = null;

  /**
   * The checker starts without a language; use `ProfanityChecker.create`
   * or call `setLanguage` before checking text.
   */
  constructor(options: Omit<ProfanityCheckerOptions, 'language'> = {}) {
    this.store = options.store ?? getWordListStore(undefined, options.logger);
    this.maskCharacter = options.maskCharacter ?? DEFAULT_MASK_CHARACTER;
    this.logger = options.logger;
    // Throws InvalidOptionError for a bad mask character
    buildMask(this.maskCharacter);
  }

  /**
   * Create a checker with its language already loaded
   */
  static async create(options: ProfanityCheckerOptions = {}): Promise<ProfanityChecker> {
    const checker = new ProfanityChecker(options);
    await checker.setLanguage(options.language ?? DEFAULT_LANGUAGE);
    return checker;
  }

  get language(): LanguageCode | null {
    return this.vocabulary?.language ?? null;
  }

  /**
   * Scores behind the last setLanguageFromText / setLanguageFromSubtitleFile
   */
  get detection(): DetectionResult | null {
    return this.lastDetection;
  }

  /**
   * Select a language. The vocabulary is loaded before switching, so on
   * failure the previous language stays selected.
   *
   * @throws UnsupportedLanguageError
   */
  async setLanguage(language: string): Promise<void> {
    this.vocabulary = await this.store.load(language);
    this.logger?.debug({ language: this.vocabulary.language, terms: this.vocabulary.terms.length }, 'Language selected');
  }

  /**
   * Detect the language of a text sample and select it
   *
   * @throws DetectionFailedError
   */
  async setLanguageFromText(text: string): Promise<LanguageCode> {
    const detection = await detectLanguageFromText(text, this.store);
    await this.setLanguage(detection.language);
    this.lastDetection = detection;
    return detection.language;
  }

  /**
   * Detect the language of a subtitle file (SRT or WebVTT) and select it
   *
   * @throws FileNotFoundError, ParseError, DetectionFailedError
   */
  async setLanguageFromSubtitleFile(filePath: string, options?: SubtitleDetectionOptions): Promise<LanguageCode> {
    const detection = await detectLanguageFromSubtitleFile(filePath, this.store, options);
    await this.setLanguage(detection.language);
    this.lastDetection = detection;
    return detection.language;
  }

  /**
   * Locate every listed term in the text, in order of occurrence
   */
  checkProfanity(text: string): MatchRecord[] {
    const vocabulary = this.requireVocabulary();
    return matchTokens(tokenize(text, vocabulary.language), vocabulary);
  }

  containsProfanity(text: string): boolean {
    return this.checkProfanity(text).length > 0;
  }

  /**
   * Copy of the text with every match replaced by the mask
   */
  censorProfanity(text: string): string {
    return this.censorWithMatches(text).censored;
  }

  /**
   * Censored text together with the matches that were masked
   */
  censorWithMatches(text: string): { censored: string; matches: MatchRecord[] } {
    const matches = this.checkProfanity(text);
    return { censored: censorText(text, matches, this.maskCharacter), matches };
  }

  private requireVocabulary(): Vocabulary {
    if (this.vocabulary === null) {
      throw new LanguageNotSetError();
    }
    return this.vocabulary;
  }
}
