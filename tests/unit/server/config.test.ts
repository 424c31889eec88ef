/**
 * Unit tests for environment configuration
 *
 * @module tests/unit/server/config
 */

import { describe, it, expect } from 'vitest';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_DB_PATH, describeConfig, expandHome, loadServerConfig } from '../../../src/server/config.js';
import { MCPError } from '../../../src/server/errors.js';

describe('loadServerConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadServerConfig({});

    expect(config).toEqual({
      databasePath: DEFAULT_DB_PATH,
      embedding: {
        endpoint: 'http://localhost:8000/v1/embeddings',
        model: 'bge-m3',
        dimension: 1024,
        batchSize: 32,
        timeoutMs: 30_000,
      },
      llm: {
        model: 'qwen-plus',
        timeoutMs: 60_000,
        maxInputChars: 12_000,
      },
    });
  });

  it('reads and coerces variables', () => {
    const config = loadServerConfig({
      CONTRACT_DB_PATH: '/tmp/contracts.db',
      EMBEDDING_API_URL: 'http://embed.local/v1/embeddings',
      EMBEDDING_API_KEY: 'test-secret',
      EMBEDDING_DIM: '768',
      LLM_API_URL: 'http://llm.local/v1/chat/completions',
      LLM_MAX_INPUT_CHARS: '5000',
      CUSTOMER_CATEGORY_FILE: './categories.xlsx',
    });

    expect(config.databasePath).toBe('/tmp/contracts.db');
    expect(config.embedding.dimension).toBe(768);
    expect(config.embedding.apiKey).toBe('test-secret');
    expect(config.llm.endpoint).toBe('http://llm.local/v1/chat/completions');
    expect(config.llm.maxInputChars).toBe(5000);
    expect(config.customerCategoryFile).toBe('./categories.xlsx');
  });

  it('expands a leading ~ in file paths', () => {
    const config = loadServerConfig({
      CONTRACT_DB_PATH: '~/.contract-search/contracts.db',
      CUSTOMER_CATEGORY_FILE: '~/categories.xlsx',
    });

    expect(config.databasePath).toBe(join(homedir(), '.contract-search', 'contracts.db'));
    expect(config.customerCategoryFile).toBe(join(homedir(), 'categories.xlsx'));
  });

  it('leaves other paths alone', () => {
    expect(expandHome('/data/~/contracts.db')).toBe('/data/~/contracts.db');
    expect(expandHome('~user/contracts.db')).toBe('~user/contracts.db');
    expect(expandHome('~')).toBe(homedir());
  });

  it('treats blank values as unset', () => {
    const config = loadServerConfig({ EMBEDDING_DIM: '  ', LLM_API_URL: '' });

    expect(config.embedding.dimension).toBe(1024);
    expect(config.llm.endpoint).toBeUndefined();
  });

  it('rejects invalid values with a configuration error', () => {
    let caught: unknown;
    try {
      loadServerConfig({ EMBEDDING_DIM: 'abc', EMBEDDING_API_URL: 'not a url' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MCPError);
    expect(caught).toMatchObject({ category: 'CONFIGURATION_ERROR' });
    expect(caught instanceof MCPError && caught.message.startsWith('Invalid configuration: ')).toBe(true);
    expect(caught instanceof MCPError && caught.details?.problems).toHaveLength(2);
  });

  it('rejects a batch size above 512', () => {
    expect(() => loadServerConfig({ EMBEDDING_BATCH_SIZE: '1000' })).toThrow(MCPError);
  });
});

describe('describeConfig', () => {
  it('reports whether keys are set without showing them', () => {
    const described = describeConfig(
      loadServerConfig({ EMBEDDING_API_KEY: 'test-secret', LLM_API_URL: 'http://llm.local/v1' })
    );

    expect(described.embedding).toMatchObject({ api_key_set: true });
    expect(described.llm).toMatchObject({ enabled: true, api_key_set: false });
    expect(JSON.stringify(described)).not.toContain('test-secret');
  });
});
