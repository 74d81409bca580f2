/**
 * Word List Service
 * Loads per-language profanity and stop-word lists into immutable vocabularies.
 *
 * ARCHITECTURE: Lists are read through a WordListSource so production code
 * uses the bundled text files while tests inject lists in memory. Each
 * WordListStore caches one vocabulary per language for its lifetime.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Logger } from 'pino';
import {
  SUPPORTED_LANGUAGES,
  isLanguageCode,
  type LanguageCode,
  type Term,
  type Vocabulary,
  type WordListKind,
  type WordListSource,
} from '../types.js';
import { UnsupportedLanguageError, isFileNotFound } from '../utils/errors.js';
import { buildTermTrie } from './matcher-service.js';
import { hasWordCharacter, normalizeWord, tokenize } from './tokenizer-service.js';

/**
 * Bundled lists: data/languages/<code>/{words,stopwords}.txt.
 * Resolves the same from src/services and dist/services.
 */
export const DEFAULT_WORD_LIST_DIR = fileURLToPath(new URL('../../data/languages', import.meta.url));

// ============================================
// SOURCES
// ============================================

/**
 * Read lists from `<dir>/<language>/<kind>.txt`.
 * A missing words file means the language is unsupported; a missing
 * stop-word file only means detection has fewer words to go on.
 */
export function createFileWordListSource(dir: string): WordListSource {
  return {
    async readList(language: LanguageCode, kind: WordListKind): Promise<string[] | null> {
      const file = path.join(dir, language, `${kind}.txt`);
      try {
        const content = await readFile(file, 'utf-8');
        return content.split(/\r?\n/);
      } catch (error) {
        if (isFileNotFound(error)) {
          return kind === 'words' ? null : [];
        }
        throw error;
      }
    },
  };
}

export function createInMemoryWordListSource(
  lists: Partial<Record<LanguageCode, { words: readonly string[]; stopwords?: readonly string[] }>>
): WordListSource {
  return {
    async readList(language: LanguageCode, kind: WordListKind): Promise<string[] | null> {
      const entry = lists[language];
      if (!entry) {
        return null;
      }
      return [...(kind === 'words' ? entry.words : entry.stopwords ?? [])];
    },
  };
}

// ============================================
// VOCABULARY
// ============================================

/**
 * Trimmed, non-empty lines that are not `#` comments
 */
function cleanLines(lines: readonly string[]): string[] {
  return lines.map((line) => line.trim()).filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * Build a vocabulary from raw list lines.
 * A term splits on whitespace only and keeps its edge characters, so an
 * obfuscated spelling like "a$$" stays distinct from the word "a". Words
 * are normalized exactly as the tokenizer normalizes running text.
 */
export function buildVocabulary(
  language: LanguageCode,
  termLines: readonly string[],
  stopwordLines: readonly string[] = []
): Vocabulary {
  const terms: Term[] = [];
  const seen = new Set<string>();

  for (const line of cleanLines(termLines)) {
    const words = line.split(/\s+/).map((word) => normalizeWord(word, language));
    // A chunk without letters or digits never becomes a token
    if (!words.every(hasWordCharacter)) {
      continue;
    }
    const key = words.join(' ');
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    terms.push(Object.freeze({ text: line, words: Object.freeze(words) }));
  }

  const referenceWords = new Set<string>();
  for (const line of cleanLines(stopwordLines)) {
    for (const token of tokenize(line, language)) {
      referenceWords.add(token.text);
    }
  }
  for (const term of terms) {
    for (const token of tokenize(term.text, language)) {
      referenceWords.add(token.text);
    }
  }

  return Object.freeze({
    language,
    terms: Object.freeze(terms),
    trie: buildTermTrie(terms),
    maxTermWords: terms.reduce((max, term) => Math.max(max, term.words.length), 0),
    referenceWords,
  });
}

// ============================================
// STORE
// ============================================

export class WordListStore {
  private readonly cache = new Map<LanguageCode, Promise<Vocabulary>>();

  constructor(
    private readonly source: WordListSource,
    private logger?: Logger
  ) {}

  /**
   * Attach a logger to a store created without one. A logger the store
   * already has is kept, so log output does not switch between callers.
   */
  setDefaultLogger(logger: Logger): void {
    this.logger ??= logger;
  }

  /**
   * Load a language's vocabulary, reading its lists at most once.
   * Concurrent calls for one language share the pending read; a failed
   * read is dropped from the cache so a later call tries again.
   *
   * @throws UnsupportedLanguageError if the code is unknown or has no word list
   */
  async load(language: string): Promise<Vocabulary> {
    if (!isLanguageCode(language)) {
      throw new UnsupportedLanguageError(language);
    }

    let pending = this.cache.get(language);
    if (!pending) {
      pending = this.read(language).catch((error: unknown) => {
        this.cache.delete(language);
        throw error;
      });
      this.cache.set(language, pending);
    }
    return pending;
  }

  /**
   * Load every supported language that has a word list, in
   * SUPPORTED_LANGUAGES order. Languages without a list are skipped.
   */
  async loadAvailable(): Promise<Vocabulary[]> {
    const vocabularies = await Promise.all(
      SUPPORTED_LANGUAGES.map(async (language) => {
        try {
          return await this.load(language);
        } catch (error) {
          if (error instanceof UnsupportedLanguageError) {
            return null;
          }
          throw error;
        }
      })
    );
    return vocabularies.filter((vocabulary): vocabulary is Vocabulary => vocabulary !== null);
  }

  isLoaded(language: LanguageCode): boolean {
    return this.cache.has(language);
  }

  private async read(language: LanguageCode): Promise<Vocabulary> {
    const [termLines, stopwordLines] = await Promise.all([
      this.source.readList(language, 'words'),
      this.source.readList(language, 'stopwords'),
    ]);

    if (termLines === null) {
      throw new UnsupportedLanguageError(language);
    }

    const vocabulary = buildVocabulary(language, termLines, stopwordLines ?? []);
    this.logger?.debug(
      {
        language,
        terms: vocabulary.terms.length,
        maxTermWords: vocabulary.maxTermWords,
        referenceWords: vocabulary.referenceWords.size,
      },
      'Loaded vocabulary'
    );
    return vocabulary;
  }
}

// ============================================
// SHARED STORE
// ============================================

/**
 * Lazily created store over the bundled (or configured) word list directory.
 * PERFORMANCE: Lists are parsed once per process, then served from memory.
 *
 * The store logs through the first logger it is given; loggers passed on
 * later calls for the same directory are ignored.
 */
let _sharedStore: WordListStore | null = null;
let _sharedStoreDir: string | null = null;
let _testStore: WordListStore | null = null;

export function getWordListStore(dir: string = DEFAULT_WORD_LIST_DIR, logger?: Logger): WordListStore {
  if (_testStore !== null) {
    return _testStore;
  }
  if (_sharedStore === null || _sharedStoreDir !== dir) {
    _sharedStore = new WordListStore(createFileWordListSource(dir), logger);
    _sharedStoreDir = dir;
  } else if (logger) {
    _sharedStore.setDefaultLogger(logger);
  }
  return _sharedStore;
}

/**
 * Serve a custom store from getWordListStore() - FOR TESTING ONLY
 */
export function _setWordListStoreForTesting(store: WordListStore): void {
  _testStore = store;
}

/**
 * Drop shared and injected stores - FOR TESTING ONLY
 */
export function _resetWordListStoreForTesting(): void {
  _sharedStore = null;
  _sharedStoreDir = null;
  _testStore = null;
}
