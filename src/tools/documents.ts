/**
 * Document MCP Tools
 *
 * Tools: contract_document_list, contract_document_get,
 *        contract_document_delete, contract_index_clear
 *
 * @module tools/documents
 */

import { hasMetadataValues, normalizeContractName } from '../models/contract.js';
import { documentNotFoundError } from '../server/errors.js';
import type { ServiceContainer } from '../server/types.js';
import { successResult } from '../server/types.js';
import { ContractNameInput, IndexClearInput, validateInput } from '../utils/validation.js';
import { formatResponse, handleError } from './shared.js';
import type { ToolDefinition, ToolResponse } from './shared.js';

function charCount(text: string): number {
  return Array.from(text).length;
}

export const createDocumentTools = (services: ServiceContainer): Record<string, ToolDefinition> => {
  const { store } = services;

  async function handleDocumentList(): Promise<ToolResponse> {
    try {
      const documents = await store.listDocuments();
      return formatResponse(
        successResult({
          total: documents.length,
          documents: documents.map((doc) => {
            const hasMetadata = hasMetadataValues(doc.document_metadata);
            return {
              contract_name: doc.contract_name,
              page_count: doc.page_count,
              total_chars: doc.total_chars,
              file_size: doc.file_size,
              has_metadata: hasMetadata,
              metadata_status: hasMetadata ? 'extracted' : 'not_extracted',
              customer_name: doc.document_metadata?.customer_name ?? null,
              contract_type: doc.document_metadata?.contract_type ?? null,
              created_at: doc.created_at,
              updated_at: doc.updated_at,
            };
          }),
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleDocumentGet(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(ContractNameInput, params);
      const contractName = normalizeContractName(input.file_name);
      const pages = await store.getDocumentPages(contractName);
      if (pages.length === 0) {
        throw documentNotFoundError(contractName);
      }

      const firstPage = pages.find((page) => page.page_id === 1) ?? null;
      const metadata = firstPage?.document_metadata ?? null;
      const hasMetadata = hasMetadataValues(metadata);

      return formatResponse(
        successResult({
          contract_name: contractName,
          total_pages: pages.length,
          total_chars: pages.reduce((sum, page) => sum + charCount(page.text), 0),
          file_size: firstPage?.file_size ?? null,
          document_metadata: metadata,
          has_metadata: hasMetadata,
          has_metadata_vector: firstPage?.has_metadata_vector ?? false,
          metadata_status: hasMetadata ? 'extracted' : 'not_extracted',
          created_at: firstPage?.created_at ?? pages[0].created_at,
          updated_at: pages.reduce((latest, page) => (page.updated_at > latest ? page.updated_at : latest), ''),
          pages: pages.map((page) => ({
            page_id: page.page_id,
            text: page.text,
            char_count: charCount(page.text),
          })),
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleDocumentDelete(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(ContractNameInput, params);
      const contractName = normalizeContractName(input.file_name);
      const deleted = await store.deleteDocument(contractName);
      if (deleted === 0) {
        throw documentNotFoundError(contractName);
      }
      console.error(`[Documents] Deleted "${contractName}" (${deleted} pages)`);
      return formatResponse(successResult({ contract_name: contractName, deleted_pages: deleted }));
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleIndexClear(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      validateInput(IndexClearInput, params);
      const deleted = await store.clear();
      console.error(`[Documents] Cleared index (${deleted} pages)`);
      return formatResponse(successResult({ deleted_pages: deleted }));
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    contract_document_list: {
      description:
        'List indexed contracts, most recently updated first, with page count and whether metadata has been extracted.',
      inputSchema: {},
      handler: handleDocumentList,
    },
    contract_document_get: {
      description: 'Get every page of one contract plus its document metadata.',
      inputSchema: ContractNameInput.shape,
      handler: handleDocumentGet,
    },
    contract_document_delete: {
      description: 'Delete one contract and all of its pages from the index.',
      inputSchema: ContractNameInput.shape,
      handler: handleDocumentDelete,
    },
    contract_index_clear: {
      description: 'Delete every indexed page. Requires confirm: true.',
      inputSchema: IndexClearInput.shape,
      handler: handleIndexClear,
    },
  };
};
