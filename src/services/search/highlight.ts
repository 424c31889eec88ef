/**
 * Highlighter: wraps matched query terms in <em> tags and cuts the text into
 * fixed-size fragments around them.
 *
 * @module services/search/highlight
 */

import { analyze, maxEditsFor, queryTerms, termMatchWeight } from './analysis.js';
import type { AnalyzerName, Fuzziness } from './analysis.js';

export const PRE_TAG = '<em>';
export const POST_TAG = '</em>';
export const FRAGMENT_SIZE = 100;
export const MAX_FRAGMENTS = 5;

interface Range {
  start: number;
  end: number;
}

/**
 * Character ranges of `text` matching any query term under the given analyzers.
 * Overlapping and touching ranges are merged.
 */
export function matchRanges(
  text: string,
  query: string,
  analyzers: readonly AnalyzerName[],
  fuzziness: Fuzziness
): Range[] {
  const ranges: Range[] = [];
  for (const analyzer of analyzers) {
    const terms = queryTerms(query, analyzer).map((term) => ({
      term,
      maxEdits: maxEditsFor(term, fuzziness),
    }));
    if (terms.length === 0) continue;

    for (const token of analyze(text, analyzer)) {
      if (terms.some(({ term, maxEdits }) => termMatchWeight(term, token.term, maxEdits) > 0)) {
        ranges.push({ start: token.start, end: token.end });
      }
    }
  }
  return mergeRanges(ranges);
}

function mergeRanges(ranges: Range[]): Range[] {
  const sorted = [...ranges].sort((a, b) => a.start - b.start || a.end - b.end);
  const merged: Range[] = [];
  for (const range of sorted) {
    const last = merged[merged.length - 1];
    if (last && range.start <= last.end) {
      last.end = Math.max(last.end, range.end);
    } else {
      merged.push({ ...range });
    }
  }
  return merged;
}

/** True when `index` falls between the two halves of a surrogate pair */
function splitsSurrogatePair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) {
    return false;
  }
  const code = text.charCodeAt(index);
  return code >= 0xdc00 && code <= 0xdfff;
}

function wrap(text: string, start: number, end: number, ranges: readonly Range[]): string {
  let out = '';
  let cursor = start;
  for (const range of ranges) {
    out += text.slice(cursor, range.start) + PRE_TAG + text.slice(range.start, range.end) + POST_TAG;
    cursor = range.end;
  }
  return out + text.slice(cursor, end);
}

/**
 * Highlighted fragments of `text` in text order; empty when nothing matched.
 *
 * Fragments are FRAGMENT_SIZE-aligned windows, widened so neither a match
 * nor a surrogate pair is cut in half, at most MAX_FRAGMENTS of them.
 */
export function highlightText(
  text: string,
  query: string,
  analyzers: readonly AnalyzerName[],
  fuzziness: Fuzziness
): string[] {
  const ranges = matchRanges(text, query, analyzers, fuzziness);
  const fragments: string[] = [];
  let index = 0;
  let previousEnd = 0;

  while (index < ranges.length && fragments.length < MAX_FRAGMENTS) {
    let start = Math.max(previousEnd, Math.floor(ranges[index].start / FRAGMENT_SIZE) * FRAGMENT_SIZE);
    if (splitsSurrogatePair(text, start)) start--;
    let end = Math.min(text.length, start + FRAGMENT_SIZE);
    const inFragment: Range[] = [];
    while (index < ranges.length && ranges[index].start < end) {
      end = Math.max(end, ranges[index].end);
      inFragment.push(ranges[index]);
      index++;
    }
    if (splitsSurrogatePair(text, end)) end++;
    fragments.push(wrap(text, start, end, inFragment));
    previousEnd = end;
  }

  return fragments;
}
