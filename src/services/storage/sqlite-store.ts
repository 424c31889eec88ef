/**
 * SqliteDocumentStore - contract pages in better-sqlite3 with sqlite-vec
 *
 * Filters and cosine similarity (vec_distance_cosine) run in SQL; the lexical
 * clause is scored and highlighted over the filtered candidates.
 *
 * @module services/storage/sqlite-store
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { load as loadSqliteVec } from 'sqlite-vec';
import { v4 as uuidv4 } from 'uuid';
import {
  DocumentMetadataSchema,
  METADATA_TEXT_FIELDS,
} from '../../models/contract.js';
import type {
  DocumentMetadata,
  DocumentSummary,
  PageInput,
  PageRecord,
  StoreStats,
} from '../../models/contract.js';
import type { AnalyzerName } from '../search/analysis.js';
import { highlightText } from '../search/highlight.js';
import { analyzerFor, scoreMultiMatch } from '../search/scoring.js';
import {
  CREATE_CONTRACT_PAGES_TABLE,
  CREATE_INDEXES,
  CREATE_SCHEMA_VERSION_TABLE,
  DATABASE_PRAGMAS,
  SCHEMA_VERSION,
} from './schema.js';
import { SearchBackendError, SearchBackendErrorCode } from './types.js';
import type {
  DocumentStore,
  FilterClause,
  HighlightField,
  SearchableField,
  StoreHit,
  StoreQuery,
  VectorField,
} from './types.js';

const IN_MEMORY = ':memory:';

const VECTOR_COLUMNS: Record<VectorField, string> = {
  text_vector: 'text_vector',
  metadata_vector: 'metadata_vector',
};

const PAGE_COLUMNS = `id, contract_name, page_id, text, document_metadata,
  text_vector IS NOT NULL AS has_text_vector,
  metadata_vector IS NOT NULL AS has_metadata_vector,
  total_pages, file_size, created_at, updated_at`;

interface PageRow {
  id: string;
  contract_name: string;
  page_id: number;
  text: string;
  document_metadata: string | null;
  has_text_vector: number;
  has_metadata_vector: number;
  total_pages: number | null;
  file_size: number | null;
  created_at: string;
  updated_at: string;
}

interface ScoredPageRow extends PageRow {
  similarity: number | null;
}

interface SummaryRow {
  contract_name: string;
  page_count: number;
  total_chars: number | null;
  document_metadata: string | null;
  has_metadata_vector: number;
  file_size: number | null;
  created_at: string;
  updated_at: string;
}

interface StatsRow {
  total_documents: number;
  total_pages: number;
  pages_with_text_vector: number | null;
  documents_with_metadata_vector: number | null;
}

export interface SqliteDocumentStoreOptions {
  /** Embedding dimension D */
  dimension: number;
  /** Clock for created_at/updated_at */
  now?: () => Date;
}

function toBlob(vector: number[]): Buffer {
  return Buffer.from(new Float32Array(vector).buffer);
}

function metadataFieldOf(field: SearchableField | HighlightField) {
  return METADATA_TEXT_FIELDS.find((name) => `document_metadata.${name}` === field);
}

function readField(page: PageRecord, field: SearchableField): string | null {
  if (field === 'text' || field === 'text.ngram') {
    return page.text;
  }
  const name = metadataFieldOf(field);
  return name && page.document_metadata ? page.document_metadata[name] : null;
}

/**
 * Analyzers the highlighter applies to a field: those of every queried field
 * that reads the same stored text.
 */
function highlightAnalyzers(query: StoreQuery, field: HighlightField): AnalyzerName[] {
  const analyzers = query.match.fields
    .filter(({ field: searched }) =>
      field === 'text' ? searched === 'text' || searched === 'text.ngram' : searched === field
    )
    .map(({ field: searched }) => analyzerFor(searched));
  return [...new Set(analyzers)];
}

function buildFilterSql(filters: readonly FilterClause[]): { where: string; params: Array<string | number> } {
  const clauses: string[] = [];
  const params: Array<string | number> = [];

  for (const filter of filters) {
    if (filter.kind === 'term') {
      clauses.push(filter.field === 'page_id' ? 'page_id = ?' : 'contract_name = ?');
      params.push(filter.value);
      continue;
    }
    const column =
      filter.field === 'document_metadata.contract_amount'
        ? "json_extract(document_metadata, '$.contract_amount')"
        : "json_extract(document_metadata, '$.signing_date')";
    if (filter.gte !== undefined) {
      clauses.push(`${column} >= ?`);
      params.push(filter.gte);
    }
    if (filter.lte !== undefined) {
      clauses.push(`${column} <= ?`);
      params.push(filter.lte);
    }
  }

  return { where: clauses.length > 0 ? clauses.join(' AND ') : '1 = 1', params };
}

export class SqliteDocumentStore implements DocumentStore {
  readonly dimension: number;
  private readonly now: () => Date;
  private closed = false;

  private constructor(
    private readonly db: Database.Database,
    options: SqliteDocumentStoreOptions
  ) {
    this.dimension = options.dimension;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Open (creating if needed) the store at `path`; ':memory:' for an ephemeral store.
   */
  static open(path: string, options: SqliteDocumentStoreOptions): SqliteDocumentStore {
    if (!Number.isInteger(options.dimension) || options.dimension <= 0) {
      throw new SearchBackendError(
        `Vector dimension must be a positive integer, got ${options.dimension}`,
        SearchBackendErrorCode.INVALID_VECTOR_DIMENSIONS
      );
    }

    let db: Database.Database;
    try {
      if (path !== IN_MEMORY) {
        mkdirSync(dirname(path), { recursive: true });
      }
      db = new Database(path);
    } catch (error) {
      throw new SearchBackendError(
        `Failed to open contract store at ${path}: ${String(error)}`,
        SearchBackendErrorCode.QUERY_FAILED,
        { path }
      );
    }

    try {
      loadSqliteVec(db);
    } catch (error) {
      db.close();
      throw new SearchBackendError(
        `sqlite-vec extension could not be loaded: ${String(error)}`,
        SearchBackendErrorCode.EXTENSION_NOT_LOADED
      );
    }

    try {
      for (const pragma of DATABASE_PRAGMAS) {
        db.exec(pragma);
      }
      SqliteDocumentStore.migrate(db);
    } catch (error) {
      db.close();
      throw new SearchBackendError(
        `Failed to initialize contract store schema: ${String(error)}`,
        SearchBackendErrorCode.QUERY_FAILED,
        { path }
      );
    }

    console.error(`[Store] Opened ${path} (dimension ${options.dimension})`);
    return new SqliteDocumentStore(db, options);
  }

  private static migrate(db: Database.Database): void {
    db.transaction(() => {
      db.exec(CREATE_SCHEMA_VERSION_TABLE);
      db.exec(CREATE_CONTRACT_PAGES_TABLE);
      for (const statement of CREATE_INDEXES) {
        db.exec(statement);
      }
      const now = new Date().toISOString();
      db.prepare(
        `INSERT INTO schema_version (id, version, created_at, updated_at) VALUES (1, ?, ?, ?)
         ON CONFLICT(id) DO NOTHING`
      ).run(SCHEMA_VERSION, now, now);
    })();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // SEARCH
  // ═══════════════════════════════════════════════════════════════════════════

  async search(query: StoreQuery): Promise<StoreHit[]> {
    this.assertOpen();
    if (!Number.isInteger(query.size) || query.size <= 0) {
      throw new SearchBackendError(
        `Query size must be a positive integer, got ${query.size}`,
        SearchBackendErrorCode.INVALID_QUERY
      );
    }
    if (query.vectorBoost) {
      this.assertVector(query.vectorBoost.queryVector, 'query vector');
    }

    const rows = this.guard(SearchBackendErrorCode.QUERY_FAILED, 'search', () =>
      this.selectCandidates(query)
    );
    const pages = rows.map((row) => this.toPageRecord(row));
    const lexical = scoreMultiMatch(query.match, pages, readField);

    const hits: StoreHit[] = [];
    pages.forEach((page, index) => {
      const { matched, score } = lexical[index];
      if (!matched) return;
      hits.push({ score: score + this.vectorScore(query, rows[index].similarity), page, highlight: {} });
    });

    // Array.prototype.sort is stable, so equal scores keep rowid order
    hits.sort((a, b) => b.score - a.score);
    const top = hits.slice(0, query.size);

    for (const hit of top) {
      for (const field of query.highlightFields) {
        const analyzers = highlightAnalyzers(query, field);
        const text = readField(hit.page, field);
        if (analyzers.length === 0 || !text) continue;
        const fragments = highlightText(text, query.match.query, analyzers, query.match.fuzziness);
        if (fragments.length > 0) {
          hit.highlight[field] = fragments;
        }
      }
    }

    return top;
  }

  private selectCandidates(query: StoreQuery): ScoredPageRow[] {
    const { where, params } = buildFilterSql(query.filters);
    if (!query.vectorBoost) {
      return this.db
        .prepare<Array<string | number>, ScoredPageRow>(
          `SELECT ${PAGE_COLUMNS}, NULL AS similarity FROM contract_pages WHERE ${where} ORDER BY rowid`
        )
        .all(...params);
    }

    const column = VECTOR_COLUMNS[query.vectorBoost.field];
    return this.db
      .prepare<Array<string | number | Buffer>, ScoredPageRow>(
        `SELECT ${PAGE_COLUMNS},
           CASE WHEN ${column} IS NULL THEN NULL
                ELSE 1.0 - vec_distance_cosine(${column}, ?) END AS similarity
         FROM contract_pages WHERE ${where} ORDER BY rowid`
      )
      .all(toBlob(query.vectorBoost.queryVector), ...params);
  }

  private vectorScore(query: StoreQuery, similarity: number | null): number {
    const boost = query.vectorBoost;
    if (!boost) {
      return 0;
    }
    if (similarity === null || !Number.isFinite(similarity)) {
      return boost.weight * boost.missingValue;
    }
    return boost.weight * (similarity + 1.0);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // WRITES
  // ═══════════════════════════════════════════════════════════════════════════

  async replaceDocument(contractName: string, pages: PageInput[]): Promise<number> {
    this.assertOpen();
    for (const page of pages) {
      if (page.contract_name !== contractName) {
        throw new SearchBackendError(
          `Page belongs to "${page.contract_name}", expected "${contractName}"`,
          SearchBackendErrorCode.INVALID_QUERY
        );
      }
      if (page.text_vector) this.assertVector(page.text_vector, `text_vector of page ${page.page_id}`);
      if (page.metadata_vector) this.assertVector(page.metadata_vector, 'metadata_vector');
    }

    const now = this.now().toISOString();
    const remove = this.db.prepare('DELETE FROM contract_pages WHERE contract_name = ?');
    const insert = this.db.prepare(
      `INSERT INTO contract_pages (id, contract_name, page_id, text, text_vector, document_metadata,
         metadata_vector, total_pages, file_size, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );

    return this.guard(SearchBackendErrorCode.WRITE_FAILED, `replacing ${contractName}`, () =>
      this.db.transaction(() => {
        remove.run(contractName);
        for (const page of pages) {
          const firstPage = page.page_id === 1;
          const metadata = firstPage ? page.document_metadata ?? null : null;
          const metadataVector = firstPage ? page.metadata_vector ?? null : null;
          insert.run(
            uuidv4(),
            contractName,
            page.page_id,
            page.text,
            page.text_vector ? toBlob(page.text_vector) : null,
            metadata ? JSON.stringify(metadata) : null,
            metadataVector ? toBlob(metadataVector) : null,
            firstPage ? page.total_pages ?? null : null,
            firstPage ? page.file_size ?? null : null,
            now,
            now
          );
        }
        return pages.length;
      })()
    );
  }

  async updateDocumentMetadata(
    contractName: string,
    metadata: DocumentMetadata,
    metadataVector: number[] | null
  ): Promise<boolean> {
    this.assertOpen();
    if (metadataVector) this.assertVector(metadataVector, 'metadata_vector');

    const result = this.guard(SearchBackendErrorCode.WRITE_FAILED, `updating metadata of ${contractName}`, () =>
      this.db
        .prepare(
          `UPDATE contract_pages SET document_metadata = ?, metadata_vector = ?, updated_at = ?
           WHERE contract_name = ? AND page_id = 1`
        )
        .run(
          JSON.stringify(metadata),
          metadataVector ? toBlob(metadataVector) : null,
          this.now().toISOString(),
          contractName
        )
    );
    return result.changes > 0;
  }

  async deleteDocument(contractName: string): Promise<number> {
    this.assertOpen();
    const result = this.guard(SearchBackendErrorCode.WRITE_FAILED, `deleting ${contractName}`, () =>
      this.db.prepare('DELETE FROM contract_pages WHERE contract_name = ?').run(contractName)
    );
    return result.changes;
  }

  async clear(): Promise<number> {
    this.assertOpen();
    const result = this.guard(SearchBackendErrorCode.WRITE_FAILED, 'clearing the store', () =>
      this.db.prepare('DELETE FROM contract_pages').run()
    );
    return result.changes;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // READS
  // ═══════════════════════════════════════════════════════════════════════════

  async getDocumentPages(contractName: string): Promise<PageRecord[]> {
    this.assertOpen();
    const rows = this.guard(SearchBackendErrorCode.QUERY_FAILED, `reading ${contractName}`, () =>
      this.db
        .prepare<[string], PageRow>(
          `SELECT ${PAGE_COLUMNS} FROM contract_pages WHERE contract_name = ? ORDER BY page_id`
        )
        .all(contractName)
    );
    return rows.map((row) => this.toPageRecord(row));
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    this.assertOpen();
    const rows = this.guard(SearchBackendErrorCode.QUERY_FAILED, 'listing documents', () =>
      this.db
        .prepare<[], SummaryRow>(
          `SELECT contract_name,
             COUNT(*) AS page_count,
             SUM(LENGTH(text)) AS total_chars,
             MAX(CASE WHEN page_id = 1 THEN document_metadata END) AS document_metadata,
             MAX(CASE WHEN page_id = 1 AND metadata_vector IS NOT NULL THEN 1 ELSE 0 END) AS has_metadata_vector,
             MAX(CASE WHEN page_id = 1 THEN file_size END) AS file_size,
             MIN(created_at) AS created_at,
             MAX(updated_at) AS updated_at
           FROM contract_pages
           GROUP BY contract_name
           ORDER BY updated_at DESC, contract_name ASC`
        )
        .all()
    );

    return rows.map((row) => ({
      contract_name: row.contract_name,
      page_count: row.page_count,
      total_chars: row.total_chars ?? 0,
      file_size: row.file_size,
      document_metadata: this.parseMetadata(row.document_metadata, row.contract_name),
      has_metadata_vector: row.has_metadata_vector === 1,
      created_at: row.created_at,
      updated_at: row.updated_at,
    }));
  }

  async stats(): Promise<StoreStats> {
    this.assertOpen();
    const row = this.guard(SearchBackendErrorCode.QUERY_FAILED, 'reading stats', () =>
      this.db
        .prepare<[], StatsRow>(
          `SELECT COUNT(DISTINCT contract_name) AS total_documents,
             COUNT(*) AS total_pages,
             SUM(text_vector IS NOT NULL) AS pages_with_text_vector,
             SUM(page_id = 1 AND metadata_vector IS NOT NULL) AS documents_with_metadata_vector
           FROM contract_pages`
        )
        .get()
    );

    return {
      total_documents: row?.total_documents ?? 0,
      total_pages: row?.total_pages ?? 0,
      pages_with_text_vector: row?.pages_with_text_vector ?? 0,
      documents_with_metadata_vector: row?.documents_with_metadata_vector ?? 0,
    };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error(`[Store] PRAGMA optimize failed on close: ${String(error)}`);
    }
    this.db.close();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // HELPERS
  // ═══════════════════════════════════════════════════════════════════════════

  private assertOpen(): void {
    if (this.closed) {
      throw new SearchBackendError('Contract store is closed', SearchBackendErrorCode.STORE_CLOSED);
    }
  }

  private assertVector(vector: number[], label: string): void {
    if (vector.length !== this.dimension) {
      throw new SearchBackendError(
        `Invalid ${label} dimensions: expected ${this.dimension}, got ${vector.length}`,
        SearchBackendErrorCode.INVALID_VECTOR_DIMENSIONS,
        { expected: this.dimension, actual: vector.length }
      );
    }
    if (!vector.every((value) => Number.isFinite(value))) {
      throw new SearchBackendError(
        `Invalid ${label}: contains non-finite values`,
        SearchBackendErrorCode.INVALID_VECTOR_DIMENSIONS
      );
    }
  }

  /**
   * Run a synchronous SQLite call, re-raising driver errors as SearchBackendError
   */
  private guard<T>(code: SearchBackendErrorCode, context: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof SearchBackendError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new SearchBackendError(`Store failure while ${context}: ${message}`, code);
    }
  }

  private parseMetadata(raw: string | null, contractName: string): DocumentMetadata | null {
    if (raw === null) {
      return null;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new SearchBackendError(
        `Stored metadata of "${contractName}" is not valid JSON: ${String(error)}`,
        SearchBackendErrorCode.QUERY_FAILED
      );
    }
    const result = DocumentMetadataSchema.safeParse(parsed);
    if (!result.success) {
      throw new SearchBackendError(
        `Stored metadata of "${contractName}" has an unexpected shape: ${result.error.message}`,
        SearchBackendErrorCode.QUERY_FAILED
      );
    }
    return result.data;
  }

  private toPageRecord(row: PageRow): PageRecord {
    return {
      id: row.id,
      contract_name: row.contract_name,
      page_id: row.page_id,
      text: row.text,
      document_metadata: this.parseMetadata(row.document_metadata, row.contract_name),
      has_text_vector: row.has_text_vector === 1,
      has_metadata_vector: row.has_metadata_vector === 1,
      total_pages: row.total_pages,
      file_size: row.file_size,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }
}
