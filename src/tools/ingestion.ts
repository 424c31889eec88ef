/**
 * Ingestion MCP Tools
 *
 * Tools: contract_index_pages
 *
 * @module tools/ingestion
 */

import type { ServiceContainer } from '../server/types.js';
import { successResult } from '../server/types.js';
import { IndexPagesInput, validateInput } from '../utils/validation.js';
import { formatResponse, handleError } from './shared.js';
import type { ToolDefinition, ToolResponse } from './shared.js';

export const createIngestionTools = (services: ServiceContainer): Record<string, ToolDefinition> => {
  async function handleIndexPages(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(IndexPagesInput, params);
      const result = await services.indexer.indexPages(input);
      return formatResponse(successResult(result));
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    contract_index_pages: {
      description:
        'Index a contract from its extracted page texts. Replaces any earlier version of the same contract. Runs metadata extraction afterwards unless extract_metadata is false.',
      inputSchema: IndexPagesInput.shape,
      handler: handleIndexPages,
    },
  };
};
