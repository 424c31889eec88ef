/**
 * Content search: page text, lexical + semantic.
 *
 * @module services/search/content-search
 */

import type { ContentSearchResult, ContentWeights, SearchFilters } from '../../models/search.js';
import type { EmbeddingProvider } from '../embedding/provider.js';
import type { DocumentStore } from '../storage/types.js';
import type { Fuzziness } from './analysis.js';
import { buildContentQuery } from './query-builder.js';
import { toContentResult } from './shaping.js';

export interface ContentSearchParams extends ContentWeights {
  query_text: string;
  top_k: number;
  fuzziness: Fuzziness;
  filters: SearchFilters;
}

export class ContentSearch {
  constructor(
    private readonly store: DocumentStore,
    private readonly embedder: EmbeddingProvider
  ) {}

  /**
   * Top `top_k` pages by lexical score plus vector_weight × (cosine + 1).
   * An empty query returns [] without touching the embedder or the store.
   */
  async search(params: ContentSearchParams): Promise<ContentSearchResult[]> {
    if (params.query_text.trim().length === 0) {
      return [];
    }

    const queryVector = await this.embedder.embedQuery(params.query_text);
    const hits = await this.store.search(
      buildContentQuery(
        {
          query_text: params.query_text,
          text_standard_weight: params.text_standard_weight,
          text_ngram_weight: params.text_ngram_weight,
          vector_weight: params.vector_weight,
          fuzziness: params.fuzziness,
          filters: params.filters,
          size: params.top_k,
        },
        queryVector
      )
    );

    return hits.map(toContentResult);
  }
}
