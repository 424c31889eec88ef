/**
 * SearchEngine - validates a search request and dispatches on its mode.
 *
 * @module services/search/engine
 */

import type { SearchRequest, SearchResponse } from '../../models/search.js';
import { parseSearchRequest } from '../../utils/validation.js';
import type { EmbeddingProvider } from '../embedding/provider.js';
import type { DocumentStore } from '../storage/types.js';
import { ContentSearch } from './content-search.js';
import { HybridSearch } from './hybrid-merge.js';
import { MetadataSearch } from './metadata-search.js';

export interface SearchEngineDeps {
  store: DocumentStore;
  embedder: EmbeddingProvider;
}

export class SearchEngine {
  private readonly content: ContentSearch;
  private readonly metadata: MetadataSearch;
  private readonly hybrid: HybridSearch;

  constructor(deps: SearchEngineDeps) {
    this.content = new ContentSearch(deps.store, deps.embedder);
    this.metadata = new MetadataSearch(deps.store, deps.embedder);
    this.hybrid = new HybridSearch(this.content, this.metadata);
  }

  /**
   * Validate then run. Invalid input throws ValidationError before any
   * embedding or store call.
   */
  async search(input: unknown): Promise<SearchResponse> {
    return this.execute(parseSearchRequest(input));
  }

  async execute(request: SearchRequest): Promise<SearchResponse> {
    const started = Date.now();
    const response = await this.dispatch(request);
    console.error(
      `[Search] mode=${request.mode} top_k=${request.top_k} results=${response.results.length} in ${Date.now() - started}ms`
    );
    return response;
  }

  private async dispatch(request: SearchRequest): Promise<SearchResponse> {
    switch (request.mode) {
      case 'content':
        return { mode: 'content', results: await this.content.search(request) };
      case 'metadata':
        return { mode: 'metadata', results: await this.metadata.search(request) };
      case 'hybrid':
        return { mode: 'hybrid', results: await this.hybrid.search(request) };
      default: {
        const unreachable: never = request;
        throw new Error(`Unhandled search mode: ${JSON.stringify(unreachable)}`);
      }
    }
  }
}
