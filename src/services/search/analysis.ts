/**
 * Text analysis for lexical matching
 *
 * Two analyzers mirror the fields a contract page is indexed under:
 * - standard: letter/digit words, lower-cased; every Han ideograph is its own token
 * - ngram: 2-3 character grams over runs of letters and digits
 *
 * Offsets are UTF-16 indexes into the analyzed string so the highlighter can
 * slice the original text directly.
 *
 * @module services/search/analysis
 */

export type AnalyzerName = 'standard' | 'ngram';

export type Fuzziness = 'AUTO' | '0' | '1' | '2';

export interface Token {
  term: string;
  /** Inclusive start offset */
  start: number;
  /** Exclusive end offset */
  end: number;
}

export const NGRAM_MIN = 2;
export const NGRAM_MAX = 3;

const STANDARD_TOKEN = /\p{Script=Han}|(?:(?!\p{Script=Han})[\p{L}\p{N}\p{M}])+/gu;
const ALNUM_RUN = /[\p{L}\p{N}]+/gu;

export function standardTokens(text: string): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(STANDARD_TOKEN)) {
    const start = match.index ?? 0;
    tokens.push({ term: match[0].toLowerCase(), start, end: start + match[0].length });
  }
  return tokens;
}

export function ngramTokens(text: string): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(ALNUM_RUN)) {
    const runStart = match.index ?? 0;
    const chars = Array.from(match[0]);
    // offsets[i] = UTF-16 offset of chars[i]; offsets[chars.length] = end of run
    const offsets: number[] = [runStart];
    for (const char of chars) {
      offsets.push(offsets[offsets.length - 1] + char.length);
    }
    for (let i = 0; i < chars.length; i++) {
      for (let size = NGRAM_MIN; size <= NGRAM_MAX && i + size <= chars.length; size++) {
        tokens.push({
          term: chars.slice(i, i + size).join('').toLowerCase(),
          start: offsets[i],
          end: offsets[i + size],
        });
      }
    }
  }
  return tokens;
}

export function analyze(text: string, analyzer: AnalyzerName): Token[] {
  return analyzer === 'ngram' ? ngramTokens(text) : standardTokens(text);
}

/**
 * Distinct query terms in first-seen order
 */
export function queryTerms(query: string, analyzer: AnalyzerName): string[] {
  return [...new Set(analyze(query, analyzer).map((token) => token.term))];
}

/**
 * Maximum edit distance allowed for a query term.
 * AUTO: 0 below 3 characters, 1 for 3-5, 2 from 6. Never reaches the term
 * length, so a single ideograph always needs an exact match.
 */
export function maxEditsFor(term: string, fuzziness: Fuzziness): number {
  const length = Array.from(term).length;
  let edits: number;
  if (fuzziness === 'AUTO') {
    edits = length < 3 ? 0 : length < 6 ? 1 : 2;
  } else {
    edits = Number(fuzziness);
  }
  return Math.max(0, Math.min(edits, length - 1));
}

/**
 * Optimal string alignment distance (insert, delete, substitute, adjacent
 * transposition), abandoning early once the distance exceeds `limit`.
 * Returns limit + 1 for anything beyond the limit.
 */
export function editDistance(a: string, b: string, limit: number): number {
  const s = Array.from(a);
  const t = Array.from(b);
  if (Math.abs(s.length - t.length) > limit) {
    return limit + 1;
  }

  let prevPrev: number[] = [];
  let prev = Array.from({ length: t.length + 1 }, (_, j) => j);
  for (let i = 1; i <= s.length; i++) {
    const current = [i];
    let rowMin = i;
    for (let j = 1; j <= t.length; j++) {
      const cost = s[i - 1] === t[j - 1] ? 0 : 1;
      let value = Math.min(prev[j] + 1, current[j - 1] + 1, prev[j - 1] + cost);
      if (i > 1 && j > 1 && s[i - 1] === t[j - 2] && s[i - 2] === t[j - 1]) {
        value = Math.min(value, prevPrev[j - 2] + 1);
      }
      current.push(value);
      rowMin = Math.min(rowMin, value);
    }
    if (rowMin > limit) {
      return limit + 1;
    }
    prevPrev = prev;
    prev = current;
  }
  return Math.min(prev[t.length], limit + 1);
}

/**
 * Weight of one indexed term against one query term: 1 for an exact match,
 * 1 - edits / max(length) for a fuzzy match within maxEdits, otherwise 0.
 */
export function termMatchWeight(queryTerm: string, indexedTerm: string, maxEdits: number): number {
  if (queryTerm === indexedTerm) {
    return 1;
  }
  if (maxEdits === 0) {
    return 0;
  }
  const distance = editDistance(queryTerm, indexedTerm, maxEdits);
  if (distance > maxEdits) {
    return 0;
  }
  const longest = Math.max(Array.from(queryTerm).length, Array.from(indexedTerm).length);
  return 1 - distance / longest;
}
