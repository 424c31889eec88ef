/**
 * ContractIndexer - embeds already-extracted page text and writes a contract
 * to the store, optionally running metadata extraction afterwards.
 *
 * @module services/ingestion/indexer
 */

import { emptyMetadata, normalizeContractName } from '../../models/contract.js';
import type { PageInput } from '../../models/contract.js';
import { ValidationError } from '../../utils/validation.js';
import { EmbeddingError } from '../embedding/provider.js';
import type { EmbeddingProvider } from '../embedding/provider.js';
import type { DocumentStore } from '../storage/types.js';
import type { MetadataService } from './metadata-service.js';

export interface IndexPagesRequest {
  file_name: string;
  pages: Array<{ page_id?: number; text: string }>;
  file_size?: number | null;
  extract_metadata: boolean;
}

export type MetadataStatus = 'extracted' | 'empty' | 'failed' | 'skipped';

export interface IndexPagesResult {
  contract_name: string;
  total_pages: number;
  metadata_status: MetadataStatus;
  has_metadata: boolean;
  error: string | null;
}

/** Page text the OCR step writes when a page could not be read */
const OCR_FAILURE_MARKER = /^error/i;

export class ContractIndexer {
  constructor(
    private readonly store: DocumentStore,
    private readonly embedder: EmbeddingProvider,
    private readonly metadata: MetadataService
  ) {}

  async indexPages(request: IndexPagesRequest): Promise<IndexPagesResult> {
    const contractName = normalizeContractName(request.file_name);
    if (!contractName) {
      throw new ValidationError(`Cannot derive a contract name from "${request.file_name}"`);
    }
    if (request.pages.length === 0) {
      throw new ValidationError('pages must not be empty');
    }

    const pages = request.pages.map((page, index) => ({
      page_id: page.page_id ?? index + 1,
      text: page.text,
    }));

    const seen = new Set<number>();
    for (const page of pages) {
      if (seen.has(page.page_id)) {
        throw new ValidationError(`Duplicate page_id ${page.page_id}`);
      }
      seen.add(page.page_id);
    }
    if (!seen.has(1)) {
      throw new ValidationError('Page 1 is required; it carries the document metadata');
    }

    const failed = pages.filter((page) => OCR_FAILURE_MARKER.test(page.text.trim()));
    if (failed.length > 0) {
      throw new ValidationError(
        `${failed.length} page(s) contain text extraction errors: ${failed.map((p) => p.page_id).join(', ')}`
      );
    }

    const vectors = await this.embedder.embed(pages.map((page) => page.text));
    if (vectors.length !== pages.length) {
      throw new EmbeddingError(
        `Expected ${pages.length} page vectors, got ${vectors.length}`,
        'COUNT_MISMATCH'
      );
    }

    const inputs: PageInput[] = pages.map((page, index) => ({
      contract_name: contractName,
      page_id: page.page_id,
      text: page.text,
      text_vector: vectors[index],
      ...(page.page_id === 1 && {
        document_metadata: emptyMetadata(),
        total_pages: pages.length,
        file_size: request.file_size ?? null,
      }),
    }));

    const written = await this.store.replaceDocument(contractName, inputs);
    console.error(`[Indexer] Indexed "${contractName}": ${written} pages`);

    if (!request.extract_metadata || !this.metadata.extractionEnabled) {
      return {
        contract_name: contractName,
        total_pages: written,
        metadata_status: 'skipped',
        has_metadata: false,
        error: request.extract_metadata ? 'Metadata extraction is not configured' : null,
      };
    }

    // Pages stay indexed when extraction fails; the failure is reported
    try {
      const outcome = await this.metadata.extractForDocument(contractName, { save: true });
      return {
        contract_name: contractName,
        total_pages: written,
        metadata_status: outcome.has_metadata ? 'extracted' : 'empty',
        has_metadata: outcome.has_metadata,
        error: null,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Indexer] Metadata extraction failed for "${contractName}": ${message}`);
      return {
        contract_name: contractName,
        total_pages: written,
        metadata_status: 'failed',
        has_metadata: false,
        error: message,
      };
    }
  }
}
