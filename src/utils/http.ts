/**
 * JSON-over-HTTP POST with a request timeout, shared by the embedding and
 * LLM clients. Both speak the OpenAI-compatible wire format.
 *
 * @module utils/http
 */

import { isTransientHttpStatus } from './backoff.js';

export type HttpFailureKind = 'http' | 'timeout' | 'network' | 'parse';

export class HttpRequestError extends Error {
  constructor(
    message: string,
    public readonly kind: HttpFailureKind,
    public readonly status: number | null = null
  ) {
    super(message);
    this.name = 'HttpRequestError';
  }
}

export interface PostJsonOptions {
  apiKey?: string;
  timeoutMs: number;
}

/**
 * Retry timeouts, network failures and transient HTTP statuses
 */
export function isRetryableHttpError(error: unknown): boolean {
  if (!(error instanceof HttpRequestError)) {
    return false;
  }
  if (error.kind === 'timeout' || error.kind === 'network') {
    return true;
  }
  return error.kind === 'http' && error.status !== null && isTransientHttpStatus(error.status);
}

export async function postJson(url: string, body: unknown, options: PostJsonOptions): Promise<unknown> {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (options.apiKey) {
    headers.Authorization = `Bearer ${options.apiKey}`;
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  // the timer covers the body read as well as the headers
  let response: Response;
  let text: string;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
      signal: controller.signal,
    });
    text = await response.text();
  } catch (error) {
    if (controller.signal.aborted) {
      throw new HttpRequestError(`Request to ${url} timed out after ${options.timeoutMs}ms`, 'timeout');
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new HttpRequestError(`Request to ${url} failed: ${message}`, 'network');
  } finally {
    clearTimeout(timeoutId);
  }

  if (!response.ok) {
    throw new HttpRequestError(
      `HTTP ${response.status} from ${url}: ${text.slice(0, 200)}`,
      'http',
      response.status
    );
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new HttpRequestError(`Response from ${url} is not JSON: ${text.slice(0, 200)}`, 'parse', response.status);
  }
}
