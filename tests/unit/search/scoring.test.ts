/**
 * Unit tests for multi-field BM25 scoring
 *
 * @module tests/unit/search/scoring
 */

import { describe, it, expect } from 'vitest';
import { analyzerFor, bm25Idf, scoreMultiMatch } from '../../../src/services/search/scoring.js';
import type { MultiMatchClause } from '../../../src/services/storage/types.js';

const readText = (doc: string): string => doc;

function clause(query: string, fields: MultiMatchClause['fields']): MultiMatchClause {
  return { query, fields, fuzziness: 'AUTO' };
}

describe('bm25Idf', () => {
  it('follows ln(1 + (N - n + 0.5) / (n + 0.5))', () => {
    expect(bm25Idf(1, 1)).toBeCloseTo(Math.log(4 / 3), 12);
    expect(bm25Idf(10, 2)).toBeCloseTo(Math.log(1 + 8.5 / 2.5), 12);
  });

  it('ranks rare terms above common ones', () => {
    expect(bm25Idf(3, 1)).toBeGreaterThan(bm25Idf(3, 3));
  });
});

describe('analyzerFor', () => {
  it('maps the ngram sub-field to the ngram analyzer', () => {
    expect(analyzerFor('text.ngram')).toBe('ngram');
    expect(analyzerFor('text')).toBe('standard');
    expect(analyzerFor('document_metadata.customer_name')).toBe('standard');
  });
});

describe('scoreMultiMatch', () => {
  it('sums per-term BM25 for a single document', () => {
    const [result] = scoreMultiMatch(clause('合同', [{ field: 'text', boost: 1 }]), ['合同'], readText);

    // two terms, tf 1, length equal to the average: each contributes idf(1, 1)
    expect(result.matched).toBe(true);
    expect(result.score).toBeCloseTo(2 * Math.log(4 / 3), 12);
  });

  it('scales linearly with the field boost', () => {
    const [plain] = scoreMultiMatch(clause('合同', [{ field: 'text', boost: 1 }]), ['合同'], readText);
    const [boosted] = scoreMultiMatch(clause('合同', [{ field: 'text', boost: 3 }]), ['合同'], readText);

    expect(boosted.score).toBeCloseTo(plain.score * 3, 12);
  });

  it('takes the best boosted field rather than the sum', () => {
    const [result] = scoreMultiMatch(
      clause('合同', [
        { field: 'text', boost: 3 },
        { field: 'text.ngram', boost: 1 },
      ]),
      ['合同'],
      readText
    );

    expect(result.score).toBeCloseTo(6 * Math.log(4 / 3), 12);
  });

  it('flags documents without any matching term', () => {
    const results = scoreMultiMatch(
      clause('合同', [{ field: 'text', boost: 1 }]),
      ['合同', '服务', '服务合同'],
      readText
    );

    expect(results.map((r) => r.matched)).toEqual([true, false, true]);
    expect(results[1].score).toBe(0);
  });

  it('scores shorter documents higher for the same term frequency', () => {
    const [short, long] = scoreMultiMatch(
      clause('合同', [{ field: 'text', boost: 1 }]),
      ['合同', '合同服务内容条款说明'],
      readText
    );

    expect(short.score).toBeGreaterThan(long.score);
  });

  it('treats a missing field value as no match', () => {
    const results = scoreMultiMatch(
      clause('合同', [{ field: 'document_metadata.customer_name', boost: 3 }]),
      [null, '合同'],
      (doc: string | null) => doc
    );

    expect(results[0]).toEqual({ matched: false, score: 0 });
    expect(results[1].matched).toBe(true);
  });

  it('returns nothing matched for a query without terms', () => {
    const results = scoreMultiMatch(clause('，。', [{ field: 'text', boost: 1 }]), ['合同'], readText);

    expect(results).toEqual([{ matched: false, score: 0 }]);
  });
});
