/**
 * Server configuration from environment variables, validated with zod.
 *
 * @module server/config
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { configurationError } from './errors.js';

export const DEFAULT_DB_PATH = join(homedir(), '.contract-search', 'contracts.db');

const optionalString = z.string().trim().min(1).optional();

/**
 * Replace a leading `~` with the home directory; shells do this, .env files do not
 */
export function expandHome(filePath: string): string {
  if (filePath === '~') {
    return homedir();
  }
  if (filePath.startsWith('~/') || filePath.startsWith('~\\')) {
    return join(homedir(), filePath.slice(2));
  }
  return filePath;
}

const FilePath = z.string().trim().min(1).transform(expandHome);

export const ServerConfigSchema = z.object({
  databasePath: FilePath.default(DEFAULT_DB_PATH),
  embedding: z.object({
    endpoint: z.string().url().default('http://localhost:8000/v1/embeddings'),
    apiKey: optionalString,
    model: z.string().min(1).default('bge-m3'),
    dimension: z.coerce.number().int().positive().default(1024),
    batchSize: z.coerce.number().int().min(1).max(512).default(32),
    timeoutMs: z.coerce.number().int().positive().default(30_000),
  }),
  llm: z.object({
    /** Extraction is disabled when unset */
    endpoint: z.string().url().optional(),
    apiKey: optionalString,
    model: z.string().min(1).default('qwen-plus'),
    timeoutMs: z.coerce.number().int().positive().default(60_000),
    maxInputChars: z.coerce.number().int().min(1000).default(12_000),
  }),
  customerCategoryFile: FilePath.optional(),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/**
 * Empty strings count as unset so a blank line in .env falls back to the default
 */
function env(source: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = source[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Build the server configuration from the environment.
 *
 * @throws MCPError (CONFIGURATION_ERROR) listing every invalid variable
 */
export function loadServerConfig(source: NodeJS.ProcessEnv = process.env): ServerConfig {
  const raw = {
    databasePath: env(source, 'CONTRACT_DB_PATH'),
    embedding: {
      endpoint: env(source, 'EMBEDDING_API_URL'),
      apiKey: env(source, 'EMBEDDING_API_KEY'),
      model: env(source, 'EMBEDDING_MODEL'),
      dimension: env(source, 'EMBEDDING_DIM'),
      batchSize: env(source, 'EMBEDDING_BATCH_SIZE'),
      timeoutMs: env(source, 'EMBEDDING_TIMEOUT_MS'),
    },
    llm: {
      endpoint: env(source, 'LLM_API_URL'),
      apiKey: env(source, 'LLM_API_KEY'),
      model: env(source, 'LLM_MODEL'),
      timeoutMs: env(source, 'LLM_TIMEOUT_MS'),
      maxInputChars: env(source, 'LLM_MAX_INPUT_CHARS'),
    },
    customerCategoryFile: env(source, 'CUSTOMER_CATEGORY_FILE'),
  };

  const result = ServerConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw configurationError(`Invalid configuration: ${problems.join('; ')}`, { problems });
  }
  return result.data;
}

/**
 * Configuration safe to show in health output: endpoints and models, no keys
 */
export function describeConfig(config: ServerConfig): Record<string, unknown> {
  return {
    database_path: config.databasePath,
    embedding: {
      endpoint: config.embedding.endpoint,
      model: config.embedding.model,
      dimension: config.embedding.dimension,
      batch_size: config.embedding.batchSize,
      api_key_set: config.embedding.apiKey !== undefined,
    },
    llm: {
      enabled: config.llm.endpoint !== undefined,
      endpoint: config.llm.endpoint ?? null,
      model: config.llm.model,
      max_input_chars: config.llm.maxInputChars,
      api_key_set: config.llm.apiKey !== undefined,
    },
    customer_category_file: config.customerCategoryFile ?? null,
  };
}
