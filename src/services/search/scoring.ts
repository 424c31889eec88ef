/**
 * Multi-field BM25 scoring for the full-text clause of a StoreQuery.
 *
 * Statistics (document frequency, average length) come from the candidate set
 * that already passed the filters. A field's score sums BM25 over the query
 * terms it matches; across fields the best boosted score wins.
 *
 * @module services/search/scoring
 */

import { analyze, maxEditsFor, queryTerms, termMatchWeight } from './analysis.js';
import type { AnalyzerName } from './analysis.js';
import type { MultiMatchClause, SearchableField } from '../storage/types.js';

export const BM25_K1 = 1.2;
export const BM25_B = 0.75;

export interface LexicalScore {
  /** At least one query term matched in at least one field */
  matched: boolean;
  score: number;
}

/** Resolves a searchable field to the stored text it reads */
export type FieldReader<T> = (doc: T, field: SearchableField) => string | null;

export function analyzerFor(field: SearchableField): AnalyzerName {
  return field === 'text.ngram' ? 'ngram' : 'standard';
}

export function bm25Idf(docCount: number, docFreq: number): number {
  return Math.log(1 + (docCount - docFreq + 0.5) / (docFreq + 0.5));
}

interface FieldStats {
  /** tf per query term for each document */
  frequencies: Map<string, number>[];
  lengths: number[];
  docFreq: Map<string, number>;
  avgLength: number;
}

function collectFieldStats<T>(
  docs: readonly T[],
  field: SearchableField,
  terms: readonly { term: string; maxEdits: number }[],
  read: FieldReader<T>
): FieldStats {
  const analyzer = analyzerFor(field);
  const frequencies: Map<string, number>[] = [];
  const lengths: number[] = [];
  const docFreq = new Map<string, number>();

  for (const doc of docs) {
    const text = read(doc, field);
    const tokens = text ? analyze(text, analyzer) : [];
    const tf = new Map<string, number>();
    for (const { term, maxEdits } of terms) {
      let frequency = 0;
      for (const token of tokens) {
        frequency += termMatchWeight(term, token.term, maxEdits);
      }
      if (frequency > 0) {
        tf.set(term, frequency);
        docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
      }
    }
    frequencies.push(tf);
    lengths.push(tokens.length);
  }

  const totalLength = lengths.reduce((sum, length) => sum + length, 0);
  const avgLength = docs.length > 0 && totalLength > 0 ? totalLength / docs.length : 1;
  return { frequencies, lengths, docFreq, avgLength };
}

/**
 * Score every document against the clause; the result is index-aligned with `docs`.
 */
export function scoreMultiMatch<T>(
  clause: MultiMatchClause,
  docs: readonly T[],
  read: FieldReader<T>
): LexicalScore[] {
  const results: LexicalScore[] = docs.map(() => ({ matched: false, score: 0 }));

  for (const { field, boost } of clause.fields) {
    const terms = queryTerms(clause.query, analyzerFor(field)).map((term) => ({
      term,
      maxEdits: maxEditsFor(term, clause.fuzziness),
    }));
    if (terms.length === 0) continue;

    const stats = collectFieldStats(docs, field, terms, read);
    stats.frequencies.forEach((tf, index) => {
      if (tf.size === 0) return;
      const lengthNorm = 1 - BM25_B + (BM25_B * stats.lengths[index]) / stats.avgLength;
      let fieldScore = 0;
      for (const [term, frequency] of tf) {
        const idf = bm25Idf(docs.length, stats.docFreq.get(term) ?? 0);
        fieldScore += (idf * frequency * (BM25_K1 + 1)) / (frequency + BM25_K1 * lengthNorm);
      }
      const result = results[index];
      result.score = result.matched ? Math.max(result.score, boost * fieldScore) : boost * fieldScore;
      result.matched = true;
    });
  }

  return results;
}
