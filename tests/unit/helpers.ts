/**
 * Shared fixtures for unit tests: in-process stand-ins for the embedding
 * service, the LLM and the document store.
 *
 * @module tests/unit/helpers
 */

import Database from 'better-sqlite3';
import ExcelJS from 'exceljs';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { load as loadSqliteVec } from 'sqlite-vec';
import { emptyMetadata } from '../../src/models/contract.js';
import type { DocumentMetadata, PageRecord } from '../../src/models/contract.js';
import type { EmbeddingProvider } from '../../src/services/embedding/provider.js';
import type { ChatCompletionClient, ChatMessage } from '../../src/services/extraction/llm-client.js';
import { SqliteDocumentStore } from '../../src/services/storage/sqlite-store.js';
import type { DocumentStore, StoreHit, StoreQuery } from '../../src/services/storage/types.js';
import { TEMP_DIR_PREFIX } from '../global-teardown.js';

export const TEST_DIMENSION = 4;

function checkSqliteVec(): boolean {
  try {
    const db = new Database(':memory:');
    loadSqliteVec(db);
    db.close();
    return true;
  } catch (error) {
    console.error(`[tests] sqlite-vec is not available, store tests are skipped: ${String(error)}`);
    return false;
  }
}

export const sqliteVecAvailable = checkSqliteVec();

/**
 * Deterministic embedder. Texts registered with `set` get that vector;
 * anything else gets [1, 0, 0, 0] so unknown texts are never zero vectors.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'fake-embedding';
  readonly calls: string[][] = [];
  readonly queries: string[] = [];
  private readonly vectors = new Map<string, number[]>();
  failWith: Error | null = null;

  constructor(readonly dimension: number = TEST_DIMENSION) {}

  set(text: string, vector: number[]): this {
    this.vectors.set(text, vector);
    return this;
  }

  vectorFor(text: string): number[] {
    return this.vectors.get(text) ?? [1, ...new Array<number>(this.dimension - 1).fill(0)];
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    if (this.failWith) throw this.failWith;
    return texts.map((text) => this.vectorFor(text));
  }

  async embedQuery(text: string): Promise<number[]> {
    this.queries.push(text);
    if (this.failWith) throw this.failWith;
    return this.vectorFor(text);
  }

  get callCount(): number {
    return this.calls.length + this.queries.length;
  }
}

/**
 * Chat client that replays canned completions in order and records prompts
 */
export class StubChatClient implements ChatCompletionClient {
  readonly model = 'stub-llm';
  readonly requests: ChatMessage[][] = [];

  constructor(private readonly responses: Array<string | Error>) {}

  async complete(messages: ChatMessage[]): Promise<string> {
    this.requests.push(messages);
    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error('StubChatClient has no more responses');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

/**
 * Store that returns preset hits and records every query it receives
 */
export class RecordingStore implements DocumentStore {
  readonly dimension = TEST_DIMENSION;
  readonly queries: StoreQuery[] = [];
  failWith: Error | null = null;

  constructor(private readonly hits: StoreHit[] = []) {}

  async search(query: StoreQuery): Promise<StoreHit[]> {
    this.queries.push(query);
    if (this.failWith) throw this.failWith;
    return this.hits.slice(0, query.size);
  }

  async replaceDocument(): Promise<number> {
    throw new Error('RecordingStore is read-only');
  }

  async updateDocumentMetadata(): Promise<boolean> {
    throw new Error('RecordingStore is read-only');
  }

  async getDocumentPages(): Promise<PageRecord[]> {
    return [];
  }

  async listDocuments() {
    return [];
  }

  async deleteDocument(): Promise<number> {
    return 0;
  }

  async clear(): Promise<number> {
    return 0;
  }

  async stats() {
    return { total_documents: 0, total_pages: 0, pages_with_text_vector: 0, documents_with_metadata_vector: 0 };
  }

  close(): void {}
}

export function makePage(overrides: Partial<PageRecord> = {}): PageRecord {
  return {
    id: 'page-id',
    contract_name: 'contract-a',
    page_id: 1,
    text: '',
    document_metadata: null,
    has_text_vector: true,
    has_metadata_vector: false,
    total_pages: 1,
    file_size: null,
    created_at: '2024-01-01T00:00:00.000Z',
    updated_at: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeMetadata(overrides: Partial<DocumentMetadata> = {}): DocumentMetadata {
  return { ...emptyMetadata(), ...overrides };
}

/**
 * Clock that advances one second per call, starting at 2024-01-01T00:00:00Z
 */
export function steppingClock(): () => Date {
  let tick = 0;
  return () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++));
}

export function createTestStore(now: () => Date = steppingClock()): SqliteDocumentStore {
  return SqliteDocumentStore.open(':memory:', { dimension: TEST_DIMENSION, now });
}

export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), TEMP_DIR_PREFIX));
}

export function cleanupTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a single-sheet .xlsx workbook; the first row is the header
 */
export async function writeCategoryWorkbook(file: string, rows: Array<Array<string | null>>): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('客户分类');
  for (const row of rows) {
    sheet.addRow(row);
  }
  await workbook.xlsx.writeFile(file);
}

export interface ToolEnvelope<T> {
  success: boolean;
  data: T;
  error: {
    category: string;
    message: string;
    recovery: { tool: string; hint: string };
    details?: Record<string, unknown>;
  };
}

/**
 * Parse the JSON body of a tool response
 */
export function parseToolResponse<T = Record<string, unknown>>(response: {
  content: Array<{ type: 'text'; text: string }>;
}): ToolEnvelope<T> {
  return JSON.parse(response.content[0].text);
}
