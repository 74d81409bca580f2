/**
 * Matcher Service
 * Finds listed terms in a token sequence.
 *
 * Terms live in a prefix tree keyed by normalized words. At each start index
 * the scan walks the tree along the following tokens, by whole chunk or by
 * stripped word, and keeps the deepest node that ends a term, so a listed
 * phrase wins over its own first word.
 * After a match the scan resumes behind the consumed tokens: matches are
 * leftmost-first, longest-first and never overlap.
 */

import type { MatchRecord, Term, TermTrieNode, Token, Vocabulary } from '../types.js';

function createNode(): TermTrieNode {
  return { children: new Map() };
}

/**
 * Build the word trie for a term list. The first of two terms with the same
 * words keeps its listed spelling.
 */
export function buildTermTrie(terms: readonly Term[]): TermTrieNode {
  const root = createNode();

  for (const term of terms) {
    if (term.words.length === 0) {
      continue;
    }

    let node = root;
    for (const word of term.words) {
      let child = node.children.get(word);
      if (!child) {
        child = createNode();
        node.children.set(word, child);
      }
      node = child;
    }

    if (!node.term) {
      node.term = term;
    }
  }

  return root;
}

interface Candidate {
  term: Term;
  /** Tokens consumed */
  length: number;
  start: number;
  end: number;
}

/**
 * Trie keys a token can take, whole chunk first. A listed "$hit" is keyed
 * by its chunk and only matches the chunk; "darn" matches "darn!" through
 * the stripped word.
 */
function stepsFor(token: Token): { key: string; start: number; end: number }[] {
  const word = { key: token.text, start: token.start, end: token.end };
  if (token.chunk.text === token.text) {
    return [word];
  }
  return [{ key: token.chunk.text, start: token.chunk.start, end: token.chunk.end }, word];
}

/**
 * Longest term reachable from `node` with tokens[i..limit). On equal
 * length the chunk key wins, since it is tried first.
 */
function longestFrom(
  tokens: readonly Token[],
  node: TermTrieNode,
  first: number,
  i: number,
  limit: number,
  spanStart: number
): Candidate | null {
  if (i >= limit) {
    return null;
  }

  let best: Candidate | null = null;
  for (const step of stepsFor(tokens[i])) {
    const child = node.children.get(step.key);
    if (!child) {
      continue;
    }

    const start = i === first ? step.start : spanStart;
    const candidate =
      longestFrom(tokens, child, first, i + 1, limit, start) ??
      (child.term ? { term: child.term, length: i - first + 1, start, end: step.end } : null);

    if (candidate && (best === null || candidate.length > best.length)) {
      best = candidate;
    }
  }

  return best;
}

function longestMatchAt(tokens: readonly Token[], first: number, vocabulary: Vocabulary): Candidate | null {
  const limit = Math.min(tokens.length, first + vocabulary.maxTermWords);
  return longestFrom(tokens, vocabulary.trie, first, first, limit, 0);
}

/**
 * Scan tokens for vocabulary terms. An empty result is not an error.
 */
export function matchTokens(tokens: readonly Token[], vocabulary: Vocabulary): MatchRecord[] {
  const matches: MatchRecord[] = [];

  let i = 0;
  while (i < tokens.length) {
    const found = longestMatchAt(tokens, i, vocabulary);
    if (!found) {
      i++;
      continue;
    }

    matches.push({
      term: found.term.text,
      wordIndex: tokens[i].index,
      start: found.start,
      end: found.end,
    });
    i += found.length;
  }

  return matches;
}
