/**
 * MCP Server Type Definitions
 *
 * @module server/types
 */

import type { EmbeddingProvider } from '../services/embedding/provider.js';
import type { MetadataService } from '../services/ingestion/metadata-service.js';
import type { ContractIndexer } from '../services/ingestion/indexer.js';
import type { SearchEngine } from '../services/search/engine.js';
import type { DocumentStore } from '../services/storage/types.js';
import type { ServerConfig } from './config.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Long-lived services shared by every tool handler
 */
export interface ServiceContainer {
  config: ServerConfig;
  store: DocumentStore;
  embedder: EmbeddingProvider;
  engine: SearchEngine;
  indexer: ContractIndexer;
  metadata: MetadataService;
}
