/**
 * Unit tests for text analysis: tokenizers, fuzziness and edit distance
 *
 * @module tests/unit/search/analysis
 */

import { describe, it, expect } from 'vitest';
import {
  editDistance,
  maxEditsFor,
  ngramTokens,
  queryTerms,
  standardTokens,
  termMatchWeight,
} from '../../../src/services/search/analysis.js';

describe('standardTokens', () => {
  it('splits Han text into single ideographs and keeps Latin words whole', () => {
    const tokens = standardTokens('Contract 合同 No.12');

    expect(tokens).toEqual([
      { term: 'contract', start: 0, end: 8 },
      { term: '合', start: 9, end: 10 },
      { term: '同', start: 10, end: 11 },
      { term: 'no', start: 12, end: 14 },
      { term: '12', start: 15, end: 17 },
    ]);
  });

  it('treats punctuation as a separator', () => {
    expect(standardTokens('甲方：某某').map((t) => t.term)).toEqual(['甲', '方', '某', '某']);
  });

  it('returns nothing for punctuation-only text', () => {
    expect(standardTokens('，。！')).toEqual([]);
  });
});

describe('ngramTokens', () => {
  it('emits 2- and 3-grams in position order', () => {
    expect(ngramTokens('abcd').map((t) => t.term)).toEqual(['ab', 'abc', 'bc', 'bcd', 'cd']);
  });

  it('keeps UTF-16 offsets into the source string', () => {
    expect(ngramTokens('x 合同')).toEqual([{ term: '合同', start: 2, end: 4 }]);
  });

  it('does not gram across punctuation', () => {
    expect(ngramTokens('ab,cd').map((t) => t.term)).toEqual(['ab', 'cd']);
  });

  it('ignores runs shorter than two characters', () => {
    expect(ngramTokens('a')).toEqual([]);
  });
});

describe('queryTerms', () => {
  it('drops duplicates and keeps first-seen order', () => {
    expect(queryTerms('合同 合同 服务', 'standard')).toEqual(['合', '同', '服', '务']);
  });

  it('lower-cases terms', () => {
    expect(queryTerms('Bank BANK', 'standard')).toEqual(['bank']);
  });
});

describe('maxEditsFor', () => {
  it('scales AUTO with term length', () => {
    expect(maxEditsFor('ab', 'AUTO')).toBe(0);
    expect(maxEditsFor('abc', 'AUTO')).toBe(1);
    expect(maxEditsFor('abcde', 'AUTO')).toBe(1);
    expect(maxEditsFor('abcdef', 'AUTO')).toBe(2);
  });

  it('never allows as many edits as the term has characters', () => {
    expect(maxEditsFor('合', '2')).toBe(0);
    expect(maxEditsFor('ab', '2')).toBe(1);
  });

  it('uses explicit values as given', () => {
    expect(maxEditsFor('contract', '0')).toBe(0);
    expect(maxEditsFor('contract', '1')).toBe(1);
  });
});

describe('editDistance', () => {
  it('counts an adjacent transposition as one edit', () => {
    expect(editDistance('ab', 'ba', 2)).toBe(1);
  });

  it('computes substitutions and insertions', () => {
    expect(editDistance('kitten', 'sitting', 3)).toBe(3);
  });

  it('returns limit + 1 once the limit is exceeded', () => {
    expect(editDistance('abc', 'abcdef', 1)).toBe(2);
    expect(editDistance('kitten', 'sitting', 2)).toBe(3);
  });
});

describe('termMatchWeight', () => {
  it('is 1 for an exact match', () => {
    expect(termMatchWeight('合', '合', 0)).toBe(1);
  });

  it('is 0 for a mismatch when no edits are allowed', () => {
    expect(termMatchWeight('ab', 'ac', 0)).toBe(0);
  });

  it('discounts fuzzy matches by edits over length', () => {
    expect(termMatchWeight('contrakt', 'contract', 2)).toBeCloseTo(0.875, 10);
  });

  it('is 0 beyond the allowed edits', () => {
    expect(termMatchWeight('abc', 'xyz', 1)).toBe(0);
  });
});
