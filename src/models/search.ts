/**
 * Search request and result models
 */

import type { DocumentMetadata } from './contract.js';
import type { Fuzziness } from '../services/search/analysis.js';

export type SearchMode = 'content' | 'metadata' | 'hybrid';

/**
 * Optional filters shared by every mode; AND-combined, inclusive bounds
 */
export interface SearchFilters {
  amount_min: number | null;
  amount_max: number | null;
  /** YYYY-MM-DD */
  date_start: string | null;
  /** YYYY-MM-DD */
  date_end: string | null;
}

interface SearchRequestBase {
  top_k: number;
  fuzziness: Fuzziness;
  filters: SearchFilters;
}

export interface ContentWeights {
  text_standard_weight: number;
  text_ngram_weight: number;
  vector_weight: number;
}

export interface ContentSearchRequest extends SearchRequestBase, ContentWeights {
  mode: 'content';
  query_text: string;
}

export interface MetadataSearchRequest extends SearchRequestBase {
  mode: 'metadata';
  query_metadata: string;
  metadata_weight: number;
}

export interface HybridSearchRequest extends SearchRequestBase, ContentWeights {
  mode: 'hybrid';
  query_text: string | null;
  query_metadata: string | null;
  metadata_weight: number;
}

export type SearchRequest = ContentSearchRequest | MetadataSearchRequest | HybridSearchRequest;

/** Highlight fragments keyed by field name (`text`, `document_metadata.<field>`) */
export type Highlights = Record<string, string[]>;

export interface ContentSearchResult {
  score: number;
  contract_name: string;
  page_id: number;
  text: string;
  highlights: Highlights;
}

export interface MetadataSearchResult extends ContentSearchResult {
  metadata_info: DocumentMetadata | null;
}

export interface ContentPage {
  page_id: number;
  text: string;
  score: number;
}

export interface MergedResult {
  contract_name: string;
  content_score: number;
  metadata_score: number;
  combined_score: number;
  content_pages: ContentPage[];
  metadata_info: DocumentMetadata | null;
  highlights: Highlights;
}

export type SearchResponse =
  | { mode: 'content'; results: ContentSearchResult[] }
  | { mode: 'metadata'; results: MetadataSearchResult[] }
  | { mode: 'hybrid'; results: MergedResult[] };
