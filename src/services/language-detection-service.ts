/**
 * Language Detection Service
 * Picks the supported language whose reference words best cover a sample.
 *
 * Every token of the sample that appears in a language's reference set
 * (everyday words plus its listed terms) scores one point for that language.
 * The highest score wins; equal scores go to the language that comes first
 * in DETECTION_PRIORITY, so the result never depends on load order.
 */

import {
  DETECTION_PRIORITY,
  type DetectionResult,
  type DetectionScores,
  type LanguageCode,
  type SubtitleDetectionOptions,
  type Vocabulary,
} from '../types.js';
import { DetectionFailedError } from '../utils/errors.js';
import { DEFAULT_MAX_CUES, readSubtitleFile, subtitleSample } from './subtitle-service.js';
import { tokenize } from './tokenizer-service.js';
import type { WordListStore } from './word-list-service.js';

function emptyScores(): DetectionScores {
  return { en: 0, tr: 0, de: 0, es: 0, pt: 0 };
}

/**
 * Count, per language, the sample tokens found in its reference words.
 * The sample is lower-cased with each language's own locale, as its
 * reference words were, so "BİR" reads as "bir" for Turkish.
 */
export function scoreLanguages(text: string, vocabularies: readonly Vocabulary[]): DetectionScores {
  const scores = emptyScores();

  for (const vocabulary of vocabularies) {
    let hits = 0;
    for (const token of tokenize(text, vocabulary.language)) {
      if (vocabulary.referenceWords.has(token.text)) {
        hits++;
      }
    }
    scores[vocabulary.language] = hits;
  }

  return scores;
}

/**
 * Highest-scoring language, or null when nothing scored
 */
export function pickLanguage(scores: DetectionScores): LanguageCode | null {
  let best: LanguageCode | null = null;

  for (const language of DETECTION_PRIORITY) {
    const score = scores[language];
    if (score > 0 && (best === null || score > scores[best])) {
      best = language;
    }
  }

  return best;
}

/**
 * Detect the language of a text sample
 *
 * @throws DetectionFailedError if the sample is empty or no language scores
 */
export async function detectLanguageFromText(text: string, store: WordListStore): Promise<DetectionResult> {
  if (text.trim().length === 0) {
    throw new DetectionFailedError('Cannot detect the language of empty text');
  }

  const scores = scoreLanguages(text, await store.loadAvailable());
  const language = pickLanguage(scores);
  if (language === null) {
    throw new DetectionFailedError();
  }

  return { language, scores };
}

/**
 * Detect the language of a subtitle file from its first cues
 *
 * @throws FileNotFoundError / ParseError from the subtitle reader
 * @throws DetectionFailedError as for detectLanguageFromText
 */
export async function detectLanguageFromSubtitleFile(
  filePath: string,
  store: WordListStore,
  options: SubtitleDetectionOptions = {}
): Promise<DetectionResult> {
  const cues = await readSubtitleFile(filePath);
  return detectLanguageFromText(subtitleSample(cues, options.maxCues ?? DEFAULT_MAX_CUES), store);
}
