/**
 * SQL schema for the contract page store
 *
 * @module services/storage/schema
 */

/** Current schema version */
export const SCHEMA_VERSION = 1;

export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA cache_size = -64000',
  'PRAGMA busy_timeout = 30000',
] as const;

export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * One row per contract page. document_metadata is JSON; it and
 * metadata_vector are only ever set on page 1. Vectors are float32 blobs.
 */
export const CREATE_CONTRACT_PAGES_TABLE = `
CREATE TABLE IF NOT EXISTS contract_pages (
  id TEXT PRIMARY KEY,
  contract_name TEXT NOT NULL,
  page_id INTEGER NOT NULL CHECK (page_id >= 1),
  text TEXT NOT NULL,
  text_vector BLOB,
  document_metadata TEXT,
  metadata_vector BLOB,
  total_pages INTEGER,
  file_size INTEGER,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  UNIQUE (contract_name, page_id),
  CHECK (page_id = 1 OR (document_metadata IS NULL AND metadata_vector IS NULL))
)
`;

export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_contract_pages_name ON contract_pages(contract_name)',
  'CREATE INDEX IF NOT EXISTS idx_contract_pages_page ON contract_pages(page_id)',
] as const;
