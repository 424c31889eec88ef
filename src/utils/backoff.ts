/**
 * Retry with exponential backoff and jitter for the remote model clients.
 *
 * Delay doubles per attempt from baseDelayMs, capped at maxDelayMs, with
 * +/- jitterFraction randomness. Logs go to stderr; stdout is JSON-RPC.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 500) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 8000) */
  maxDelayMs: number;
  /** Total attempts including the first one (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25) */
  jitterFraction: number;
  /** Log prefix, e.g. "Embedding" */
  label: string;
}

const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 500,
  maxDelayMs: 8000,
  maxAttempts: 3,
  jitterFraction: 0.25,
  label: 'Backoff',
};

/**
 * Delay for a zero-indexed attempt: min(base * 2^attempt, max) +/- jitter, never negative.
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const cappedDelay = Math.min(cfg.baseDelayMs * Math.pow(2, attempt), cfg.maxDelayMs);
  const jitter = (Math.random() * 2 - 1) * cappedDelay * cfg.jitterFraction;
  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * HTTP statuses worth another attempt: rate limiting and server-side failures
 */
export function isTransientHttpStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Execute fn, retrying errors accepted by shouldRetry until maxAttempts is
 * reached. Non-retryable errors and the last failure are re-thrown as-is.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  config?: Partial<BackoffConfig>
): Promise<T> {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error) || attempt === cfg.maxAttempts - 1) {
        throw error;
      }
      const delay = calculateBackoffDelay(attempt, cfg);
      const reason = error instanceof Error ? error.message : String(error);
      console.error(
        `[${cfg.label}] Attempt ${attempt + 1}/${cfg.maxAttempts} failed (${reason}); retrying in ${delay}ms`
      );
      await new Promise<void>((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}
