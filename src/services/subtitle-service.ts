/**
 * Subtitle Service
 * Reads SRT and WebVTT files into plain-text cues for language detection.
 *
 * Both formats are blank-line separated blocks whose timing line contains
 * "-->"; every line after the timing line is cue text. Blocks without a
 * timing line (WEBVTT header, NOTE and STYLE blocks) are skipped.
 */

import { readFile } from 'node:fs/promises';
import type { SubtitleCue } from '../types.js';
import { FileNotFoundError, ParseError, isFileNotFound } from '../utils/errors.js';

/** Cues sampled for detection when the caller does not say otherwise */
export const DEFAULT_MAX_CUES = 10;

const TIMING_SEPARATOR = '-->';

/**
 * Remove inline markup: HTML-style tags (<i>, </font>, <c.yellow>) and
 * SSA override blocks ({\an8}).
 */
export function stripMarkup(text: string): string {
  return text
    .replace(/<[^>]*>/g, '')
    .replace(/\{\\[^}]*\}/g, '');
}

function parseTiming(line: string): { startTime: string; endTime: string } {
  const [start, rest = ''] = line.split(TIMING_SEPARATOR);
  // VTT cue settings follow the end time ("00:00:02.000 align:start")
  const [end = ''] = rest.trim().split(/\s+/);
  return { startTime: start.trim(), endTime: end };
}

/**
 * Parse subtitle file content into cues, in file order
 *
 * @throws ParseError if the content is not empty but holds no cue
 */
export function parseSubtitles(content: string): SubtitleCue[] {
  const normalized = content.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
  if (normalized.trim().length === 0) {
    return [];
  }

  const cues: SubtitleCue[] = [];
  for (const block of normalized.split(/\n\s*\n/)) {
    const lines = block.split('\n');
    const timingIndex = lines.findIndex((line) => line.includes(TIMING_SEPARATOR));
    if (timingIndex === -1) {
      continue;
    }

    const text = lines
      .slice(timingIndex + 1)
      .map((line) => stripMarkup(line).trim())
      .filter((line) => line.length > 0)
      .join(' ');

    cues.push({
      sequence: cues.length + 1,
      ...parseTiming(lines[timingIndex]),
      text,
    });
  }

  if (cues.length === 0) {
    throw new ParseError('No subtitle cues found (expected SRT or WebVTT timing lines)');
  }

  return cues;
}

/**
 * Read and parse a UTF-8 subtitle file
 *
 * @throws FileNotFoundError if the file does not exist
 * @throws ParseError if the file holds no cue
 */
export async function readSubtitleFile(filePath: string): Promise<SubtitleCue[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isFileNotFound(error)) {
      throw new FileNotFoundError(filePath, { cause: error });
    }
    throw error;
  }
  return parseSubtitles(content);
}

/**
 * Join the text of the first `maxCues` cues into one detection sample
 */
export function subtitleSample(cues: readonly SubtitleCue[], maxCues: number = DEFAULT_MAX_CUES): string {
  return cues
    .slice(0, maxCues)
    .map((cue) => cue.text)
    .filter((text) => text.length > 0)
    .join(' ');
}
