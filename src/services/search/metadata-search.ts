/**
 * Metadata search: page-1 document metadata, lexical + semantic.
 *
 * @module services/search/metadata-search
 */

import type { MetadataSearchResult, SearchFilters } from '../../models/search.js';
import type { EmbeddingProvider } from '../embedding/provider.js';
import type { DocumentStore } from '../storage/types.js';
import type { Fuzziness } from './analysis.js';
import { buildMetadataQuery } from './query-builder.js';
import { toMetadataResult } from './shaping.js';

export interface MetadataSearchParams {
  query_metadata: string;
  top_k: number;
  metadata_weight: number;
  fuzziness: Fuzziness;
  filters: SearchFilters;
}

export class MetadataSearch {
  constructor(
    private readonly store: DocumentStore,
    private readonly embedder: EmbeddingProvider
  ) {}

  async search(params: MetadataSearchParams): Promise<MetadataSearchResult[]> {
    if (params.query_metadata.trim().length === 0) {
      return [];
    }

    const queryVector = await this.embedder.embedQuery(params.query_metadata);
    const hits = await this.store.search(
      buildMetadataQuery(
        {
          query_metadata: params.query_metadata,
          metadata_weight: params.metadata_weight,
          fuzziness: params.fuzziness,
          filters: params.filters,
          size: params.top_k,
        },
        queryVector
      )
    );

    return hits.map(toMetadataResult);
  }
}
