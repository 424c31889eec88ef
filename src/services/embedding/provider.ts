/**
 * EmbeddingProvider - text to dense vectors
 *
 * Page text and queries must be embedded by the same model for the cosine
 * boost to mean anything.
 *
 * @module services/embedding/provider
 */

export type EmbeddingErrorCode =
  | 'EMBEDDING_FAILED'
  | 'EMPTY_INPUT'
  | 'HTTP_ERROR'
  | 'TIMEOUT'
  | 'NETWORK_ERROR'
  | 'MALFORMED_RESPONSE'
  | 'COUNT_MISMATCH'
  | 'DIMENSION_MISMATCH';

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly code: EmbeddingErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EmbeddingError';
    Error.captureStackTrace?.(this, EmbeddingError);
  }
}

export interface EmbeddingProvider {
  readonly dimension: number;
  readonly model: string;

  /** One vector per input, in input order */
  embed(texts: string[]): Promise<number[][]>;

  embedQuery(text: string): Promise<number[]>;
}
