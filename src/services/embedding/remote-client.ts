/**
 * RemoteEmbeddingClient - OpenAI-compatible /v1/embeddings endpoint
 * (bge-m3 behind vLLM, Xinference, TEI and the like).
 *
 * @module services/embedding/remote-client
 */

import { z } from 'zod';
import { withRetry } from '../../utils/backoff.js';
import type { BackoffConfig } from '../../utils/backoff.js';
import { HttpRequestError, isRetryableHttpError, postJson } from '../../utils/http.js';
import { EmbeddingError } from './provider.js';
import type { EmbeddingProvider } from './provider.js';

export interface RemoteEmbeddingConfig {
  endpoint: string;
  apiKey?: string;
  model: string;
  dimension: number;
  batchSize: number;
  timeoutMs: number;
  retry?: Partial<BackoffConfig>;
}

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int().nonnegative().optional(),
    })
  ),
});

function toEmbeddingError(error: unknown): EmbeddingError {
  if (error instanceof EmbeddingError) {
    return error;
  }
  if (error instanceof HttpRequestError) {
    const code =
      error.kind === 'timeout' ? 'TIMEOUT'
      : error.kind === 'network' ? 'NETWORK_ERROR'
      : error.kind === 'parse' ? 'MALFORMED_RESPONSE'
      : 'HTTP_ERROR';
    return new EmbeddingError(error.message, code, { status: error.status });
  }
  return new EmbeddingError(error instanceof Error ? error.message : String(error), 'EMBEDDING_FAILED');
}

export class RemoteEmbeddingClient implements EmbeddingProvider {
  readonly dimension: number;
  readonly model: string;

  constructor(private readonly config: RemoteEmbeddingConfig) {
    this.dimension = config.dimension;
    this.model = config.model;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const vectors: number[][] = [];
    for (let offset = 0; offset < texts.length; offset += this.config.batchSize) {
      const batch = texts.slice(offset, offset + this.config.batchSize);
      vectors.push(...(await this.embedBatch(batch)));
    }
    return vectors;
  }

  async embedQuery(text: string): Promise<number[]> {
    if (text.trim().length === 0) {
      throw new EmbeddingError('Cannot embed an empty query', 'EMPTY_INPUT');
    }
    const [vector] = await this.embed([text]);
    return vector;
  }

  private async embedBatch(batch: string[]): Promise<number[][]> {
    let payload: unknown;
    try {
      payload = await withRetry(
        () =>
          postJson(
            this.config.endpoint,
            { model: this.config.model, input: batch },
            { apiKey: this.config.apiKey, timeoutMs: this.config.timeoutMs }
          ),
        isRetryableHttpError,
        { ...this.config.retry, label: 'Embedding' }
      );
    } catch (error) {
      console.error(`[Embedding] Batch of ${batch.length} failed: ${String(error)}`);
      throw toEmbeddingError(error);
    }

    const parsed = EmbeddingResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new EmbeddingError(
        `Unexpected embedding response shape: ${parsed.error.message}`,
        'MALFORMED_RESPONSE'
      );
    }

    const items = [...parsed.data.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    if (items.length !== batch.length) {
      throw new EmbeddingError(
        `Embedding service returned ${items.length} vectors for ${batch.length} inputs`,
        'COUNT_MISMATCH',
        { expected: batch.length, actual: items.length }
      );
    }

    return items.map(({ embedding }) => {
      if (embedding.length !== this.dimension) {
        throw new EmbeddingError(
          `Embedding dimension ${embedding.length} does not match configured ${this.dimension}`,
          'DIMENSION_MISMATCH',
          { expected: this.dimension, actual: embedding.length, model: this.model }
        );
      }
      return embedding;
    });
  }
}
