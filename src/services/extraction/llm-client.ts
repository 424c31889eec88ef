/**
 * LlmClient - OpenAI-compatible /v1/chat/completions
 *
 * @module services/extraction/llm-client
 */

import { z } from 'zod';
import { withRetry } from '../../utils/backoff.js';
import type { BackoffConfig } from '../../utils/backoff.js';
import { HttpRequestError, isRetryableHttpError, postJson } from '../../utils/http.js';
import { MetadataExtractionError } from './json-response.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Anything that turns a conversation into one completion
 */
export interface ChatCompletionClient {
  readonly model: string;
  complete(messages: ChatMessage[]): Promise<string>;
}

export interface LlmClientConfig {
  endpoint: string;
  apiKey?: string;
  model: string;
  timeoutMs: number;
  temperature?: number;
  maxTokens?: number;
  retry?: Partial<BackoffConfig>;
}

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
});

export class LlmClient implements ChatCompletionClient {
  readonly model: string;

  constructor(private readonly config: LlmClientConfig) {
    this.model = config.model;
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    const body = {
      model: this.config.model,
      messages,
      temperature: this.config.temperature ?? 0.1,
      max_tokens: this.config.maxTokens ?? 2000,
      top_p: 0.9,
    };

    let payload: unknown;
    try {
      payload = await withRetry(
        () => postJson(this.config.endpoint, body, { apiKey: this.config.apiKey, timeoutMs: this.config.timeoutMs }),
        isRetryableHttpError,
        { ...this.config.retry, label: 'LLM' }
      );
    } catch (error) {
      const status = error instanceof HttpRequestError ? error.status : null;
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[LLM] Chat completion failed: ${message}`);
      throw new MetadataExtractionError(`LLM request failed: ${message}`, 'LLM_REQUEST_FAILED', { status });
    }

    const parsed = ChatCompletionResponseSchema.safeParse(payload);
    const content = parsed.success ? parsed.data.choices[0].message.content : null;
    if (!content || content.trim().length === 0) {
      throw new MetadataExtractionError('LLM returned an empty completion', 'EMPTY_RESPONSE');
    }
    return content;
  }
}
