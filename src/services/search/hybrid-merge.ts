/**
 * Hybrid search: content and metadata search run side by side, merged per
 * contract by summing the best content page score and the metadata score.
 *
 * @module services/search/hybrid-merge
 */

import type {
  ContentSearchResult,
  MergedResult,
  MetadataSearchResult,
} from '../../models/search.js';
import type { ContentSearch, ContentSearchParams } from './content-search.js';
import type { MetadataSearch, MetadataSearchParams } from './metadata-search.js';

/**
 * Merge ranked content pages and metadata hits into one entry per contract.
 *
 * Content hits arrive best first, so the first page seen for a contract sets
 * its content score; later pages of the same contract only join content_pages.
 * A metadata hit adds its score to the combined score and its highlights win
 * over content highlights on the same key. Ties keep first-seen order.
 */
export function mergeResults(
  contentResults: readonly ContentSearchResult[],
  metadataResults: readonly MetadataSearchResult[],
  topK: number
): MergedResult[] {
  const merged = new Map<string, MergedResult>();

  for (const result of contentResults) {
    let entry = merged.get(result.contract_name);
    if (!entry) {
      entry = {
        contract_name: result.contract_name,
        content_score: result.score,
        metadata_score: 0,
        combined_score: result.score,
        content_pages: [],
        metadata_info: null,
        highlights: { ...result.highlights },
      };
      merged.set(result.contract_name, entry);
    }
    entry.content_pages.push({ page_id: result.page_id, text: result.text, score: result.score });
  }

  for (const result of metadataResults) {
    const entry = merged.get(result.contract_name);
    if (!entry) {
      merged.set(result.contract_name, {
        contract_name: result.contract_name,
        content_score: 0,
        metadata_score: result.score,
        combined_score: result.score,
        content_pages: [],
        metadata_info: result.metadata_info,
        highlights: { ...result.highlights },
      });
      continue;
    }
    entry.metadata_score = result.score;
    entry.combined_score += result.score;
    entry.metadata_info = result.metadata_info;
    entry.highlights = { ...entry.highlights, ...result.highlights };
  }

  return [...merged.values()]
    .sort((a, b) => b.combined_score - a.combined_score)
    .slice(0, topK);
}

export interface HybridSearchParams
  extends Omit<ContentSearchParams, 'query_text'>,
    Omit<MetadataSearchParams, 'query_metadata'> {
  query_text: string | null;
  query_metadata: string | null;
}

export class HybridSearch {
  constructor(
    private readonly content: ContentSearch,
    private readonly metadata: MetadataSearch
  ) {}

  /**
   * Each side fetches top_k × 2 candidates so the merge has room to reorder.
   * A failure on either side fails the whole search.
   */
  async search(params: HybridSearchParams): Promise<MergedResult[]> {
    const candidates = params.top_k * 2;
    const { query_text: queryText, query_metadata: queryMetadata } = params;

    const [contentResults, metadataResults] = await Promise.all([
      queryText
        ? this.content.search({ ...params, query_text: queryText, top_k: candidates })
        : Promise.resolve<ContentSearchResult[]>([]),
      queryMetadata
        ? this.metadata.search({ ...params, query_metadata: queryMetadata, top_k: candidates })
        : Promise.resolve<MetadataSearchResult[]>([]),
    ]);

    return mergeResults(contentResults, metadataResults, params.top_k);
  }
}
