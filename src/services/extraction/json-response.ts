/**
 * Recover a JSON object from free-form LLM output.
 *
 * @module services/extraction/json-response
 */

export type MetadataExtractionErrorCode =
  | 'NOT_CONFIGURED'
  | 'EMPTY_INPUT'
  | 'LLM_REQUEST_FAILED'
  | 'EMPTY_RESPONSE'
  | 'INVALID_JSON';

export class MetadataExtractionError extends Error {
  constructor(
    message: string,
    public readonly code: MetadataExtractionErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MetadataExtractionError';
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseObject(candidate: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Tries, in order: the whole text, a ```json fenced block, the span from the
 * first `{` to the last `}`.
 *
 * @throws MetadataExtractionError (INVALID_JSON) when none yields an object
 */
export function parseJsonResponse(text: string): Record<string, unknown> {
  const trimmed = text.trim();

  const direct = tryParseObject(trimmed);
  if (direct) return direct;

  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(trimmed);
  if (fenced) {
    const fromFence = tryParseObject(fenced[1].trim());
    if (fromFence) return fromFence;
  }

  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start !== -1 && end > start) {
    const fromBraces = tryParseObject(trimmed.slice(start, end + 1));
    if (fromBraces) return fromBraces;
  }

  throw new MetadataExtractionError('LLM response contains no JSON object', 'INVALID_JSON', {
    response: trimmed.slice(0, 500),
  });
}
