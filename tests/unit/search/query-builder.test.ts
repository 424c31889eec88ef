/**
 * Unit tests for StoreQuery construction
 *
 * @module tests/unit/search/query-builder
 */

import { describe, it, expect } from 'vitest';
import {
  METADATA_FIELD_IMPORTANCE,
  NEUTRAL_VECTOR_SCORE,
  buildContentFields,
  buildContentQuery,
  buildMetadataFields,
  buildMetadataQuery,
  buildRangeFilters,
} from '../../../src/services/search/query-builder.js';
import type { SearchFilters } from '../../../src/models/search.js';

const NO_FILTERS: SearchFilters = { amount_min: null, amount_max: null, date_start: null, date_end: null };
const VECTOR = [0, 1, 0, 0];

describe('buildContentFields', () => {
  it('boosts the standard and ngram fields by their weights', () => {
    expect(buildContentFields(3, 1)).toEqual([
      { field: 'text', boost: 3 },
      { field: 'text.ngram', boost: 1 },
    ]);
  });

  it('leaves out a field whose weight is zero', () => {
    expect(buildContentFields(0, 2)).toEqual([{ field: 'text.ngram', boost: 2 }]);
  });

  it('falls back to the standard field at boost 1 when both weights are zero', () => {
    expect(buildContentFields(0, 0)).toEqual([{ field: 'text', boost: 1 }]);
  });
});

describe('buildMetadataFields', () => {
  it('multiplies each field importance by the metadata weight', () => {
    const fields = buildMetadataFields(3);

    expect(fields).toHaveLength(METADATA_FIELD_IMPORTANCE.length);
    expect(fields[0]).toEqual({ field: 'document_metadata.customer_name', boost: 3 });
    const description = fields.find((f) => f.field === 'document_metadata.project_description');
    expect(description?.boost).toBeCloseTo(2.4, 10);
    const personnel = fields.find((f) => f.field === 'document_metadata.personnel_list');
    expect(personnel?.boost).toBeCloseTo(1.8, 10);
  });
});

describe('buildRangeFilters', () => {
  it('emits nothing without bounds', () => {
    expect(buildRangeFilters(NO_FILTERS)).toEqual([]);
  });

  it('emits one inclusive clause per bound', () => {
    expect(
      buildRangeFilters({ amount_min: 100, amount_max: 500, date_start: null, date_end: '2024-12-31' })
    ).toEqual([
      { kind: 'range', field: 'document_metadata.contract_amount', gte: 100 },
      { kind: 'range', field: 'document_metadata.contract_amount', lte: 500 },
      { kind: 'range', field: 'document_metadata.signing_date', lte: '2024-12-31' },
    ]);
  });

  it('keeps a zero bound', () => {
    expect(buildRangeFilters({ ...NO_FILTERS, amount_min: 0 })).toEqual([
      { kind: 'range', field: 'document_metadata.contract_amount', gte: 0 },
    ]);
  });
});

describe('buildContentQuery', () => {
  it('boosts by the text vector and highlights page text', () => {
    const query = buildContentQuery(
      {
        query_text: '合同',
        text_standard_weight: 3,
        text_ngram_weight: 1,
        vector_weight: 5,
        fuzziness: 'AUTO',
        filters: NO_FILTERS,
        size: 6,
      },
      VECTOR
    );

    expect(query).toEqual({
      match: {
        query: '合同',
        fields: [
          { field: 'text', boost: 3 },
          { field: 'text.ngram', boost: 1 },
        ],
        fuzziness: 'AUTO',
      },
      filters: [],
      vectorBoost: { field: 'text_vector', queryVector: VECTOR, weight: 5, missingValue: NEUTRAL_VECTOR_SCORE },
      highlightFields: ['text'],
      size: 6,
    });
  });
});

describe('buildMetadataQuery', () => {
  const query = buildMetadataQuery(
    {
      query_metadata: '某银行',
      metadata_weight: 2,
      fuzziness: '1',
      filters: { ...NO_FILTERS, date_start: '2024-01-01' },
      size: 3,
    },
    VECTOR
  );

  it('restricts candidates to page 1 before any range filter', () => {
    expect(query.filters).toEqual([
      { kind: 'term', field: 'page_id', value: 1 },
      { kind: 'range', field: 'document_metadata.signing_date', gte: '2024-01-01' },
    ]);
  });

  it('boosts by the metadata vector with the metadata weight', () => {
    expect(query.vectorBoost).toEqual({
      field: 'metadata_vector',
      queryVector: VECTOR,
      weight: 2,
      missingValue: NEUTRAL_VECTOR_SCORE,
    });
  });

  it('highlights every searchable metadata field', () => {
    expect(query.highlightFields).toEqual(
      METADATA_FIELD_IMPORTANCE.map(({ field }) => `document_metadata.${field}`)
    );
    expect(query.match.fuzziness).toBe('1');
  });
});
