/**
 * Contract page and document metadata models
 *
 * One stored record per contract page. Document-level metadata and its
 * embedding live on page 1 only.
 */

import { extname } from 'node:path';
import { z } from 'zod';

/**
 * Metadata fields that carry free text and take part in lexical matching
 */
export const METADATA_TEXT_FIELDS = [
  'customer_name',
  'our_entity',
  'customer_category_level1',
  'customer_category_level2',
  'contract_type',
  'project_description',
  'positions',
  'personnel_list',
] as const;

export type MetadataTextField = (typeof METADATA_TEXT_FIELDS)[number];

/**
 * Structured document-level metadata extracted from a contract.
 * Every field is nullable; extraction leaves unknown values as null.
 */
export interface DocumentMetadata {
  customer_name: string | null;
  our_entity: string | null;
  customer_category_level1: string | null;
  customer_category_level2: string | null;
  contract_type: string | null;
  /** Contract amount in yuan */
  contract_amount: number | null;
  /** YYYY-MM-DD */
  signing_date: string | null;
  project_description: string | null;
  positions: string | null;
  personnel_list: string | null;
  /** ISO 8601 timestamp of the extraction or manual save */
  extracted_at: string | null;
}

const nullableText = z.string().nullable().default(null);

/**
 * Shape of metadata as persisted in the store
 */
export const DocumentMetadataSchema = z.object({
  customer_name: nullableText,
  our_entity: nullableText,
  customer_category_level1: nullableText,
  customer_category_level2: nullableText,
  contract_type: nullableText,
  contract_amount: z.number().nullable().default(null),
  signing_date: nullableText,
  project_description: nullableText,
  positions: nullableText,
  personnel_list: nullableText,
  extracted_at: nullableText,
});

/**
 * Placeholder metadata attached to page 1 at ingestion time
 */
export function emptyMetadata(): DocumentMetadata {
  return {
    customer_name: null,
    our_entity: null,
    customer_category_level1: null,
    customer_category_level2: null,
    contract_type: null,
    contract_amount: null,
    signing_date: null,
    project_description: null,
    positions: null,
    personnel_list: null,
    extracted_at: null,
  };
}

/**
 * True when at least one extracted field holds a value.
 * extracted_at alone does not count.
 */
export function hasMetadataValues(metadata: DocumentMetadata | null): boolean {
  if (!metadata) {
    return false;
  }
  if (metadata.contract_amount !== null) {
    return true;
  }
  if (metadata.signing_date !== null && metadata.signing_date.trim() !== '') {
    return true;
  }
  return METADATA_TEXT_FIELDS.some((field) => {
    const value = metadata[field];
    return value !== null && value.trim() !== '';
  });
}

/**
 * Contract name used as the document key: the file's base name without extension.
 */
export function normalizeContractName(fileName: string): string {
  const trimmed = fileName.trim();
  const base = trimmed.split(/[\\/]/).pop() ?? trimmed;
  const ext = extname(base);
  return (ext ? base.slice(0, -ext.length) : base).trim();
}

/**
 * Page as written to the store
 */
export interface PageInput {
  contract_name: string;
  /** 1-based page number */
  page_id: number;
  text: string;
  text_vector: number[] | null;
  /** Only honoured on page 1 */
  document_metadata?: DocumentMetadata | null;
  /** Only honoured on page 1 */
  metadata_vector?: number[] | null;
  total_pages?: number | null;
  file_size?: number | null;
}

/**
 * Page as read back from the store. Vectors are reported by presence only.
 */
export interface PageRecord {
  id: string;
  contract_name: string;
  page_id: number;
  text: string;
  document_metadata: DocumentMetadata | null;
  has_text_vector: boolean;
  has_metadata_vector: boolean;
  total_pages: number | null;
  file_size: number | null;
  created_at: string;
  updated_at: string;
}

/**
 * One entry of the document listing
 */
export interface DocumentSummary {
  contract_name: string;
  page_count: number;
  total_chars: number;
  file_size: number | null;
  document_metadata: DocumentMetadata | null;
  has_metadata_vector: boolean;
  created_at: string;
  updated_at: string;
}

export interface StoreStats {
  total_documents: number;
  total_pages: number;
  pages_with_text_vector: number;
  documents_with_metadata_vector: number;
}
