/**
 * Builds the service graph from configuration.
 *
 * @module server/services
 */

import { RemoteEmbeddingClient } from '../services/embedding/remote-client.js';
import type { EmbeddingProvider } from '../services/embedding/provider.js';
import { CustomerCategoryLookup } from '../services/extraction/customer-category.js';
import { LlmClient } from '../services/extraction/llm-client.js';
import type { ChatCompletionClient } from '../services/extraction/llm-client.js';
import { MetadataExtractor } from '../services/extraction/metadata-extractor.js';
import { ContractIndexer } from '../services/ingestion/indexer.js';
import { MetadataService } from '../services/ingestion/metadata-service.js';
import { SearchEngine } from '../services/search/engine.js';
import { SqliteDocumentStore } from '../services/storage/sqlite-store.js';
import type { DocumentStore } from '../services/storage/types.js';
import type { ServerConfig } from './config.js';
import type { ServiceContainer } from './types.js';

/**
 * Replacements for the configured backends (tests, alternative deployments)
 */
export interface ServiceOverrides {
  store?: DocumentStore;
  embedder?: EmbeddingProvider;
  /** null disables extraction even when LLM_API_URL is set */
  llm?: ChatCompletionClient | null;
}

function createLlmClient(config: ServerConfig): ChatCompletionClient | null {
  if (!config.llm.endpoint) {
    return null;
  }
  return new LlmClient({
    endpoint: config.llm.endpoint,
    apiKey: config.llm.apiKey,
    model: config.llm.model,
    timeoutMs: config.llm.timeoutMs,
  });
}

export function createServices(config: ServerConfig, overrides: ServiceOverrides = {}): ServiceContainer {
  const embedder =
    overrides.embedder ??
    new RemoteEmbeddingClient({
      endpoint: config.embedding.endpoint,
      apiKey: config.embedding.apiKey,
      model: config.embedding.model,
      dimension: config.embedding.dimension,
      batchSize: config.embedding.batchSize,
      timeoutMs: config.embedding.timeoutMs,
    });

  const store =
    overrides.store ?? SqliteDocumentStore.open(config.databasePath, { dimension: embedder.dimension });

  const categories = new CustomerCategoryLookup(config.customerCategoryFile ?? null);
  const llm = overrides.llm === undefined ? createLlmClient(config) : overrides.llm;
  const extractor = llm
    ? new MetadataExtractor({ llm, embedder, categories, maxInputChars: config.llm.maxInputChars })
    : null;

  const metadata = new MetadataService({ store, embedder, extractor, categories });

  return {
    config,
    store,
    embedder,
    engine: new SearchEngine({ store, embedder }),
    indexer: new ContractIndexer(store, embedder, metadata),
    metadata,
  };
}
