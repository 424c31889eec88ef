/**
 * Search MCP Tools
 *
 * Tools: contract_search
 *
 * @module tools/search
 */

import type { z } from 'zod';
import type { ServiceContainer } from '../server/types.js';
import { successResult } from '../server/types.js';
import type { SearchRequestInput } from '../utils/validation.js';
import { ContractSearchInput, validateInput } from '../utils/validation.js';
import { formatResponse, handleError } from './shared.js';
import type { ToolDefinition, ToolResponse } from './shared.js';

/**
 * Map tool parameters onto a search request. A bare legacy `query` with no
 * mode-specific text searches page content.
 */
export function toSearchRequest(input: z.output<typeof ContractSearchInput>): SearchRequestInput {
  const legacy = input.query !== undefined && input.query_content === undefined && input.query_metadata === undefined;

  return {
    mode: legacy ? 'content' : input.search_mode,
    query_text: legacy ? input.query : input.query_content,
    query_metadata: input.query_metadata,
    top_k: input.top_k,
    text_standard_weight: input.text_standard,
    text_ngram_weight: input.text_ngram,
    vector_weight: input.vector_weight,
    metadata_weight: input.metadata_weight,
    fuzziness: input.fuzziness,
    amount_min: input.amount_min,
    amount_max: input.amount_max,
    date_start: input.date_start,
    date_end: input.date_end,
  };
}

export const createSearchTools = (services: ServiceContainer): Record<string, ToolDefinition> => {
  async function handleSearch(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(ContractSearchInput, params);
      const response = await services.engine.search(toSearchRequest(input));
      return formatResponse(
        successResult({
          search_mode: response.mode,
          total: response.results.length,
          results: response.results,
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    contract_search: {
      description:
        'Search indexed contracts. content mode matches page text (whole words, character n-grams and vector similarity); metadata mode matches extracted contract metadata such as customer name and project description; hybrid runs both and merges per contract. Filter by contract amount and signing date.',
      inputSchema: ContractSearchInput.shape,
      handler: handleSearch,
    },
  };
};
