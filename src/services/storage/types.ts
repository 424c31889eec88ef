/**
 * Document store contract
 *
 * The search core talks to storage only through DocumentStore and the typed
 * StoreQuery below; it never sees SQL.
 *
 * @module services/storage/types
 */

import type {
  DocumentMetadata,
  DocumentSummary,
  MetadataTextField,
  PageInput,
  PageRecord,
  StoreStats,
} from '../../models/contract.js';
import type { Fuzziness } from '../search/analysis.js';

// ═══════════════════════════════════════════════════════════════════════════════
// QUERY
// ═══════════════════════════════════════════════════════════════════════════════

export type MetadataFieldPath = `document_metadata.${MetadataTextField}`;

/** `text.ngram` is the page text under the ngram analyzer */
export type SearchableField = 'text' | 'text.ngram' | MetadataFieldPath;

export type HighlightField = 'text' | MetadataFieldPath;

export interface FieldBoost {
  field: SearchableField;
  boost: number;
}

/**
 * Full-text clause: OR across query terms, best field wins
 */
export interface MultiMatchClause {
  query: string;
  fields: FieldBoost[];
  fuzziness: Fuzziness;
}

export type FilterClause =
  | { kind: 'term'; field: 'page_id'; value: number }
  | { kind: 'term'; field: 'contract_name'; value: string }
  | { kind: 'range'; field: 'document_metadata.contract_amount'; gte?: number; lte?: number }
  | { kind: 'range'; field: 'document_metadata.signing_date'; gte?: string; lte?: string };

export type VectorField = 'text_vector' | 'metadata_vector';

/**
 * Adds weight × (cosine + 1) to the lexical score, or weight × missingValue
 * when the page has no stored vector.
 */
export interface VectorBoostClause {
  field: VectorField;
  queryVector: number[];
  weight: number;
  missingValue: number;
}

export interface StoreQuery {
  match: MultiMatchClause;
  /** AND-combined */
  filters: FilterClause[];
  vectorBoost?: VectorBoostClause;
  highlightFields: HighlightField[];
  size: number;
}

export interface StoreHit {
  score: number;
  page: PageRecord;
  /** Highlight fragments keyed by field name; fields without matches are absent */
  highlight: Partial<Record<HighlightField, string[]>>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STORE
// ═══════════════════════════════════════════════════════════════════════════════

export interface DocumentStore {
  /** Vector dimension accepted on write and query */
  readonly dimension: number;

  search(query: StoreQuery): Promise<StoreHit[]>;

  /** Replace every page of a contract in one transaction; returns pages written */
  replaceDocument(contractName: string, pages: PageInput[]): Promise<number>;

  /** Overwrite page-1 metadata; false when the contract has no page 1 */
  updateDocumentMetadata(
    contractName: string,
    metadata: DocumentMetadata,
    metadataVector: number[] | null
  ): Promise<boolean>;

  /** Pages ordered by page_id; empty when the contract is unknown */
  getDocumentPages(contractName: string): Promise<PageRecord[]>;

  /** Most recently updated first */
  listDocuments(): Promise<DocumentSummary[]>;

  /** Returns the number of pages deleted */
  deleteDocument(contractName: string): Promise<number>;

  clear(): Promise<number>;

  stats(): Promise<StoreStats>;

  close(): void;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export enum SearchBackendErrorCode {
  EXTENSION_NOT_LOADED = 'EXTENSION_NOT_LOADED',
  INVALID_VECTOR_DIMENSIONS = 'INVALID_VECTOR_DIMENSIONS',
  INVALID_QUERY = 'INVALID_QUERY',
  QUERY_FAILED = 'QUERY_FAILED',
  WRITE_FAILED = 'WRITE_FAILED',
  STORE_CLOSED = 'STORE_CLOSED',
}

/**
 * Any failure inside the document store
 */
export class SearchBackendError extends Error {
  constructor(
    message: string,
    public readonly code: SearchBackendErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SearchBackendError';
  }
}

/**
 * Raised by services when a contract name has no stored pages
 */
export class ContractNotFoundError extends Error {
  public readonly details: Record<string, unknown>;

  constructor(public readonly contractName: string) {
    super(`Contract not found: ${contractName}`);
    this.name = 'ContractNotFoundError';
    this.details = { contractName };
  }
}
