/**
 * Tests for the contract_search tool and the tool registry
 *
 * Runs handlers through buildAllTools with a recording store and a fake
 * embedding provider.
 *
 * @module tests/unit/tools/search
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { loadServerConfig } from '../../../src/server/config.js';
import { buildAllTools } from '../../../src/server/register-tools.js';
import { createServices } from '../../../src/server/services.js';
import type { ContentSearchResult } from '../../../src/models/search.js';
import { EmbeddingError } from '../../../src/services/embedding/provider.js';
import { SearchBackendError, SearchBackendErrorCode } from '../../../src/services/storage/types.js';
import type { ToolDefinition } from '../../../src/tools/shared.js';
import { FakeEmbeddingProvider, RecordingStore, makePage, parseToolResponse } from '../helpers.js';

describe('tool registry', () => {
  it('registers every contract tool once', () => {
    const tools = buildAllTools(
      createServices(loadServerConfig({}), {
        store: new RecordingStore(),
        embedder: new FakeEmbeddingProvider(),
        llm: null,
      })
    );

    expect(Object.keys(tools).sort()).toEqual([
      'contract_document_delete',
      'contract_document_get',
      'contract_document_list',
      'contract_health_check',
      'contract_index_clear',
      'contract_index_pages',
      'contract_metadata_extract',
      'contract_metadata_save',
      'contract_search',
    ]);
  });
});

describe('contract_search', () => {
  let store: RecordingStore;
  let embedder: FakeEmbeddingProvider;
  let tools: Record<string, ToolDefinition>;

  beforeEach(() => {
    store = new RecordingStore([
      {
        score: 7.5,
        page: makePage({ contract_name: 'A', page_id: 2, text: '合同条款' }),
        highlight: { text: ['<em>合同</em>条款'] },
      },
    ]);
    embedder = new FakeEmbeddingProvider();
    tools = buildAllTools(createServices(loadServerConfig({}), { store, embedder, llm: null }));
  });

  it('returns content results in a success envelope', async () => {
    const response = await tools.contract_search.handler({ query_content: '合同' });
    const body = parseToolResponse<{ search_mode: string; total: number; results: ContentSearchResult[] }>(response);

    expect(response.isError).toBeUndefined();
    expect(body.success).toBe(true);
    expect(body.data).toEqual({
      search_mode: 'content',
      total: 1,
      results: [
        {
          score: 7.5,
          contract_name: 'A',
          page_id: 2,
          text: '合同条款',
          highlights: { text: ['<em>合同</em>条款'] },
        },
      ],
    });
  });

  it('maps a bare legacy query to content mode', async () => {
    await tools.contract_search.handler({ search_mode: 'metadata', query: '服务' });

    expect(embedder.queries).toEqual(['服务']);
    expect(store.queries[0].match.query).toBe('服务');
    expect(store.queries[0].vectorBoost?.field).toBe('text_vector');
  });

  it('passes tool weights and filters to the store query', async () => {
    await tools.contract_search.handler({
      query_content: '合同',
      top_k: 5,
      text_standard: 0,
      text_ngram: 2,
      vector_weight: 1.5,
      fuzziness: '0',
      amount_min: 1000,
      date_end: '2024-12-31',
    });

    expect(store.queries[0]).toMatchObject({
      match: { query: '合同', fields: [{ field: 'text.ngram', boost: 2 }], fuzziness: '0' },
      filters: [
        { kind: 'range', field: 'document_metadata.contract_amount', gte: 1000 },
        { kind: 'range', field: 'document_metadata.signing_date', lte: '2024-12-31' },
      ],
      vectorBoost: { weight: 1.5 },
      size: 5,
    });
  });

  it('searches metadata on page 1 only', async () => {
    await tools.contract_search.handler({ search_mode: 'metadata', query_metadata: '银行', metadata_weight: 2 });

    expect(store.queries[0].filters).toEqual([{ kind: 'term', field: 'page_id', value: 1 }]);
    expect(store.queries[0].match.fields[0]).toEqual({ field: 'document_metadata.customer_name', boost: 2 });
  });

  it('returns a validation error without touching the store', async () => {
    const response = await tools.contract_search.handler({ query_content: '合同', top_k: 99 });
    const body = parseToolResponse(response);

    expect(response.isError).toBe(true);
    expect(body.success).toBe(false);
    expect(body.error.category).toBe('VALIDATION_ERROR');
    expect(body.error.message).toBe('top_k: top_k must be at most 50');
    expect(body.error.recovery.tool).toBe('contract_search');
    expect(store.queries).toHaveLength(0);
  });

  it('reports store failures as backend errors', async () => {
    store.failWith = new SearchBackendError('disk I/O error', SearchBackendErrorCode.QUERY_FAILED);

    const body = parseToolResponse(await tools.contract_search.handler({ query_content: '合同' }));

    expect(body.error.category).toBe('SEARCH_BACKEND_ERROR');
    expect(body.error.details).toEqual({
      originalName: 'SearchBackendError',
      errorCode: 'QUERY_FAILED',
    });
  });

  it('reports embedding failures', async () => {
    embedder.failWith = new EmbeddingError('HTTP 503', 'HTTP_ERROR');

    const body = parseToolResponse(await tools.contract_search.handler({ query_content: '合同' }));

    expect(body.error.category).toBe('EMBEDDING_FAILED');
    expect(store.queries).toHaveLength(0);
  });
});
