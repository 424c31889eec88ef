/**
 * Builds StoreQuery objects for content and metadata search.
 *
 * @module services/search/query-builder
 */

import type { MetadataTextField } from '../../models/contract.js';
import type { ContentWeights, SearchFilters } from '../../models/search.js';
import type { Fuzziness } from './analysis.js';
import type { FieldBoost, FilterClause, HighlightField, StoreQuery } from '../storage/types.js';

/**
 * Vector score contributed by a page with no stored vector: the same as a
 * cosine of 0, so such pages neither gain nor lose against orthogonal ones.
 */
export const NEUTRAL_VECTOR_SCORE = 1.0;

/**
 * Relative importance of each metadata field, multiplied by metadata_weight
 */
export const METADATA_FIELD_IMPORTANCE: ReadonlyArray<{ field: MetadataTextField; factor: number }> = [
  { field: 'customer_name', factor: 1.0 },
  { field: 'our_entity', factor: 1.0 },
  { field: 'project_description', factor: 0.8 },
  { field: 'contract_type', factor: 0.7 },
  { field: 'customer_category_level1', factor: 0.7 },
  { field: 'customer_category_level2', factor: 0.7 },
  { field: 'positions', factor: 0.6 },
  { field: 'personnel_list', factor: 0.6 },
];

export function buildContentFields(standardWeight: number, ngramWeight: number): FieldBoost[] {
  const fields: FieldBoost[] = [];
  if (standardWeight > 0) {
    fields.push({ field: 'text', boost: standardWeight });
  }
  if (ngramWeight > 0) {
    fields.push({ field: 'text.ngram', boost: ngramWeight });
  }
  return fields.length > 0 ? fields : [{ field: 'text', boost: 1 }];
}

export function buildMetadataFields(metadataWeight: number): FieldBoost[] {
  return METADATA_FIELD_IMPORTANCE.map(({ field, factor }) => ({
    field: `document_metadata.${field}` as const,
    boost: metadataWeight * factor,
  }));
}

/**
 * One range clause per provided bound
 */
export function buildRangeFilters(filters: SearchFilters): FilterClause[] {
  const clauses: FilterClause[] = [];
  if (filters.amount_min !== null) {
    clauses.push({ kind: 'range', field: 'document_metadata.contract_amount', gte: filters.amount_min });
  }
  if (filters.amount_max !== null) {
    clauses.push({ kind: 'range', field: 'document_metadata.contract_amount', lte: filters.amount_max });
  }
  if (filters.date_start !== null) {
    clauses.push({ kind: 'range', field: 'document_metadata.signing_date', gte: filters.date_start });
  }
  if (filters.date_end !== null) {
    clauses.push({ kind: 'range', field: 'document_metadata.signing_date', lte: filters.date_end });
  }
  return clauses;
}

export interface ContentQueryParams extends ContentWeights {
  query_text: string;
  size: number;
  fuzziness: Fuzziness;
  filters: SearchFilters;
}

export function buildContentQuery(params: ContentQueryParams, queryVector: number[]): StoreQuery {
  return {
    match: {
      query: params.query_text,
      fields: buildContentFields(params.text_standard_weight, params.text_ngram_weight),
      fuzziness: params.fuzziness,
    },
    filters: buildRangeFilters(params.filters),
    vectorBoost: {
      field: 'text_vector',
      queryVector,
      weight: params.vector_weight,
      missingValue: NEUTRAL_VECTOR_SCORE,
    },
    highlightFields: ['text'],
    size: params.size,
  };
}

export interface MetadataQueryParams {
  query_metadata: string;
  metadata_weight: number;
  size: number;
  fuzziness: Fuzziness;
  filters: SearchFilters;
}

export function buildMetadataQuery(params: MetadataQueryParams, queryVector: number[]): StoreQuery {
  const fields = buildMetadataFields(params.metadata_weight);
  const highlightFields: HighlightField[] = METADATA_FIELD_IMPORTANCE.map(
    ({ field }) => `document_metadata.${field}` as const
  );

  return {
    match: {
      query: params.query_metadata,
      fields,
      fuzziness: params.fuzziness,
    },
    filters: [{ kind: 'term', field: 'page_id', value: 1 }, ...buildRangeFilters(params.filters)],
    vectorBoost: {
      field: 'metadata_vector',
      queryVector,
      weight: params.metadata_weight,
      missingValue: NEUTRAL_VECTOR_SCORE,
    },
    highlightFields,
    size: params.size,
  };
}
