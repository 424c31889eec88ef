/**
 * Metadata MCP Tools
 *
 * Tools: contract_metadata_extract, contract_metadata_save
 *
 * @module tools/metadata
 */

import { normalizeContractName } from '../models/contract.js';
import type { ServiceContainer } from '../server/types.js';
import { successResult } from '../server/types.js';
import { MetadataExtractInput, MetadataSaveInput, validateInput } from '../utils/validation.js';
import { formatResponse, handleError } from './shared.js';
import type { ToolDefinition, ToolResponse } from './shared.js';

export const createMetadataTools = (services: ServiceContainer): Record<string, ToolDefinition> => {
  async function handleMetadataExtract(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(MetadataExtractInput, params);
      const outcome = await services.metadata.extractForDocument(normalizeContractName(input.file_name), {
        save: input.save,
      });
      return formatResponse(successResult(outcome));
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleMetadataSave(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(MetadataSaveInput, params);
      const outcome = await services.metadata.saveMetadata(normalizeContractName(input.file_name), input.metadata);
      return formatResponse(successResult(outcome));
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    contract_metadata_extract: {
      description:
        'Extract customer, counterparty, contract type, amount, signing date, project description, positions and personnel from a stored contract with the configured LLM. Set save to write the result to the index.',
      inputSchema: MetadataExtractInput.shape,
      handler: handleMetadataExtract,
    },
    contract_metadata_save: {
      description:
        'Save metadata for a stored contract by hand. Amounts and dates are normalized, customer categories are looked up, and the metadata vector is regenerated.',
      inputSchema: MetadataSaveInput.shape,
      handler: handleMetadataSave,
    },
  };
};
