/**
 * Health Check MCP Tools
 *
 * Tools: contract_health_check
 *
 * @module tools/health
 */

import { describeConfig } from '../server/config.js';
import type { ServiceContainer } from '../server/types.js';
import { successResult } from '../server/types.js';
import { formatResponse, handleError } from './shared.js';
import type { ToolDefinition, ToolResponse } from './shared.js';

export const createHealthTools = (services: ServiceContainer): Record<string, ToolDefinition> => {
  async function handleHealthCheck(): Promise<ToolResponse> {
    try {
      const stats = await services.store.stats();
      const warnings: string[] = [];
      if (services.store.dimension !== services.embedder.dimension) {
        warnings.push(
          `Store dimension ${services.store.dimension} differs from embedding dimension ${services.embedder.dimension}`
        );
      }
      if (stats.pages_with_text_vector < stats.total_pages) {
        warnings.push(`${stats.total_pages - stats.pages_with_text_vector} pages have no text vector`);
      }
      if (!services.metadata.extractionEnabled) {
        warnings.push('LLM_API_URL is not set; metadata extraction is disabled');
      }

      return formatResponse(
        successResult({
          status: warnings.length === 0 ? 'ok' : 'degraded',
          store: { ...stats, dimension: services.store.dimension },
          embedding: { model: services.embedder.model, dimension: services.embedder.dimension },
          config: describeConfig(services.config),
          warnings,
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    contract_health_check: {
      description: 'Report index statistics, embedding model and dimension, configured endpoints and warnings.',
      inputSchema: {},
      handler: handleHealthCheck,
    },
  };
};
