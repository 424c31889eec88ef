/**
 * MetadataService - extraction and manual save of document-level metadata
 *
 * @module services/ingestion/metadata-service
 */

import { hasMetadataValues } from '../../models/contract.js';
import type { DocumentMetadata } from '../../models/contract.js';
import type { EmbeddingProvider } from '../embedding/provider.js';
import { MetadataExtractionError } from '../extraction/json-response.js';
import type { CustomerCategoryLookup } from '../extraction/customer-category.js';
import { cleanMetadata, embedMetadata } from '../extraction/metadata-extractor.js';
import type { MetadataExtractor } from '../extraction/metadata-extractor.js';
import { ContractNotFoundError } from '../storage/types.js';
import type { DocumentStore } from '../storage/types.js';

export interface MetadataExtractionOutcome {
  contract_name: string;
  metadata: DocumentMetadata;
  has_metadata: boolean;
  metadata_vector_generated: boolean;
  truncated: boolean;
  saved: boolean;
  raw_response: string;
}

export interface MetadataSaveOutcome {
  contract_name: string;
  metadata: DocumentMetadata;
  has_metadata: boolean;
  metadata_vector_generated: boolean;
}

export interface MetadataServiceDeps {
  store: DocumentStore;
  embedder: EmbeddingProvider;
  /** null when no LLM endpoint is configured */
  extractor: MetadataExtractor | null;
  categories?: CustomerCategoryLookup | null;
  now?: () => Date;
}

export class MetadataService {
  private readonly now: () => Date;

  constructor(private readonly deps: MetadataServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  get extractionEnabled(): boolean {
    return this.deps.extractor !== null;
  }

  /**
   * Run LLM extraction over the contract's full text (pages joined by a space).
   * Writes the result to page 1 when `save` is set.
   */
  async extractForDocument(contractName: string, options: { save: boolean }): Promise<MetadataExtractionOutcome> {
    const extractor = this.deps.extractor;
    if (!extractor) {
      throw new MetadataExtractionError(
        'Metadata extraction is not configured: set LLM_API_URL',
        'NOT_CONFIGURED'
      );
    }

    const pages = await this.deps.store.getDocumentPages(contractName);
    if (pages.length === 0) {
      throw new ContractNotFoundError(contractName);
    }

    const fullText = pages.map((page) => page.text).join(' ');
    const result = await extractor.extract(fullText);

    let saved = false;
    if (options.save) {
      saved = await this.deps.store.updateDocumentMetadata(contractName, result.metadata, result.metadata_vector);
      if (!saved) {
        throw new ContractNotFoundError(contractName);
      }
      console.error(`[Metadata] Saved extracted metadata for "${contractName}"`);
    }

    return {
      contract_name: contractName,
      metadata: result.metadata,
      has_metadata: hasMetadataValues(result.metadata),
      metadata_vector_generated: result.metadata_vector !== null,
      truncated: result.truncated,
      saved,
      raw_response: result.raw_response,
    };
  }

  /**
   * Manual save: the input is cleaned like an LLM response, then re-embedded.
   */
  async saveMetadata(contractName: string, input: Record<string, unknown>): Promise<MetadataSaveOutcome> {
    await this.deps.categories?.refresh();
    const metadata = cleanMetadata(input, this.now().toISOString(), this.deps.categories);
    const vector = await embedMetadata(this.deps.embedder, metadata);

    const updated = await this.deps.store.updateDocumentMetadata(contractName, metadata, vector);
    if (!updated) {
      throw new ContractNotFoundError(contractName);
    }
    console.error(`[Metadata] Saved manual metadata for "${contractName}"`);

    return {
      contract_name: contractName,
      metadata,
      has_metadata: hasMetadataValues(metadata),
      metadata_vector_generated: vector !== null,
    };
  }
}
