/**
 * Zod Validation Schemas
 *
 * Input validation for search requests and every MCP tool input.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import type { SearchRequest } from '../models/search.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError listing every failing path
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

/**
 * True for a real calendar date written as YYYY-MM-DD
 */
export function isIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return false;
  }
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED ENUMS AND BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const SearchModeSchema = z.enum(['content', 'metadata', 'hybrid']);

export const FuzzinessSchema = z.enum(['AUTO', '0', '1', '2']);

export const IsoDateSchema = z.string().refine(isIsoDate, 'must be a valid date in YYYY-MM-DD format');

const TopK = z
  .number()
  .int('top_k must be an integer')
  .min(1, 'top_k must be at least 1')
  .max(50, 'top_k must be at most 50');

const TextWeight = z.number().int('text weights must be integers').min(0, 'text weights must be non-negative');

const VectorWeight = z
  .number()
  .min(0, 'vector weights must be between 0 and 10')
  .max(10, 'vector weights must be between 0 and 10');

const Amount = z.number().min(0, 'amounts must be non-negative');

// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH REQUEST
// ═══════════════════════════════════════════════════════════════════════════════

export const SEARCH_DEFAULTS = {
  top_k: 3,
  text_standard_weight: 3,
  text_ngram_weight: 1,
  vector_weight: 5,
  metadata_weight: 3,
  fuzziness: 'AUTO',
} as const;

/**
 * Flat search request as callers send it. Cross-field rules: the mode's
 * query must be present, min <= max for amounts and dates.
 */
export const SearchRequestSchema = z
  .object({
    mode: SearchModeSchema.default('content'),
    query_text: z.string().max(2000).nullish(),
    query_metadata: z.string().max(2000).nullish(),
    top_k: TopK.default(SEARCH_DEFAULTS.top_k),
    text_standard_weight: TextWeight.default(SEARCH_DEFAULTS.text_standard_weight),
    text_ngram_weight: TextWeight.default(SEARCH_DEFAULTS.text_ngram_weight),
    vector_weight: VectorWeight.default(SEARCH_DEFAULTS.vector_weight),
    metadata_weight: VectorWeight.default(SEARCH_DEFAULTS.metadata_weight),
    fuzziness: FuzzinessSchema.default(SEARCH_DEFAULTS.fuzziness),
    amount_min: Amount.nullish(),
    amount_max: Amount.nullish(),
    date_start: IsoDateSchema.nullish(),
    date_end: IsoDateSchema.nullish(),
  })
  .superRefine((value, ctx) => {
    if (value.mode === 'content' && (value.query_text === null || value.query_text === undefined)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['query_text'], message: 'required in content mode' });
    }
    if (value.mode === 'metadata' && (value.query_metadata === null || value.query_metadata === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['query_metadata'],
        message: 'required in metadata mode',
      });
    }
    if (value.mode === 'hybrid' && !value.query_text?.trim() && !value.query_metadata?.trim()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['query_text'],
        message: 'hybrid mode needs query_text, query_metadata or both',
      });
    }
    if (
      value.amount_min !== null &&
      value.amount_min !== undefined &&
      value.amount_max !== null &&
      value.amount_max !== undefined &&
      value.amount_min > value.amount_max
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['amount_min'],
        message: 'amount_min must not exceed amount_max',
      });
    }
    if (value.date_start && value.date_end && value.date_start > value.date_end) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['date_start'],
        message: 'date_start must not be after date_end',
      });
    }
  });

export type SearchRequestInput = z.input<typeof SearchRequestSchema>;

/**
 * Validate a flat request and narrow it to the mode's variant
 *
 * @throws ValidationError
 */
export function parseSearchRequest(input: unknown): SearchRequest {
  const value = validateInput(SearchRequestSchema, input);
  const shared = {
    top_k: value.top_k,
    fuzziness: value.fuzziness,
    filters: {
      amount_min: value.amount_min ?? null,
      amount_max: value.amount_max ?? null,
      date_start: value.date_start ?? null,
      date_end: value.date_end ?? null,
    },
  };
  const contentWeights = {
    text_standard_weight: value.text_standard_weight,
    text_ngram_weight: value.text_ngram_weight,
    vector_weight: value.vector_weight,
  };

  switch (value.mode) {
    case 'content':
      return { mode: 'content', query_text: value.query_text ?? '', ...shared, ...contentWeights };
    case 'metadata':
      return {
        mode: 'metadata',
        query_metadata: value.query_metadata ?? '',
        metadata_weight: value.metadata_weight,
        ...shared,
      };
    case 'hybrid':
      return {
        mode: 'hybrid',
        query_text: value.query_text?.trim() ? value.query_text : null,
        query_metadata: value.query_metadata?.trim() ? value.query_metadata : null,
        metadata_weight: value.metadata_weight,
        ...shared,
        ...contentWeights,
      };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const FileName = z.string().trim().min(1, 'file_name is required').max(512);

export const MetadataFieldsInput = z.object({
  customer_name: z.string().nullish(),
  our_entity: z.string().nullish(),
  customer_category_level1: z.string().nullish(),
  customer_category_level2: z.string().nullish(),
  contract_type: z.string().nullish(),
  contract_amount: z.union([z.number(), z.string()]).nullish(),
  signing_date: z.string().nullish(),
  project_description: z.string().nullish(),
  positions: z.union([z.string(), z.array(z.string())]).nullish(),
  personnel_list: z.union([z.string(), z.array(z.string())]).nullish(),
});

export const ContractSearchInput = z.object({
  search_mode: SearchModeSchema.default('content').describe('content, metadata or hybrid'),
  query_content: z.string().max(2000).optional().describe('Text to match against page content'),
  query_metadata: z.string().max(2000).optional().describe('Text to match against contract metadata'),
  query: z.string().max(2000).optional().describe('Legacy keyword; searches page content'),
  top_k: z.number().int().optional().describe('Results to return (1-50, default 3)'),
  text_standard: z.number().int().optional().describe('Whole-word field weight (default 3)'),
  text_ngram: z.number().int().optional().describe('Character n-gram field weight (default 1)'),
  vector_weight: z.number().optional().describe('Page vector similarity weight, 0-10 (default 5)'),
  metadata_weight: z.number().optional().describe('Metadata weight, 0-10 (default 3)'),
  fuzziness: FuzzinessSchema.optional().describe('Max edits per term: AUTO, 0, 1 or 2'),
  amount_min: z.number().optional().describe('Minimum contract amount (yuan)'),
  amount_max: z.number().optional().describe('Maximum contract amount (yuan)'),
  date_start: z.string().optional().describe('Earliest signing date, YYYY-MM-DD'),
  date_end: z.string().optional().describe('Latest signing date, YYYY-MM-DD'),
});

export const IndexPagesInput = z.object({
  file_name: FileName.describe('Uploaded file name; the contract name is its base name without extension'),
  pages: z
    .array(
      z.object({
        page_id: z.number().int().min(1).optional().describe('1-based page number (defaults to position)'),
        text: z.string(),
      })
    )
    .min(1, 'pages must not be empty')
    .max(5000),
  file_size: z.number().int().min(0).optional(),
  extract_metadata: z.boolean().default(true),
});

export const ContractNameInput = z.object({
  file_name: FileName.describe('Contract file name, with or without extension'),
});

export const IndexClearInput = z.object({
  confirm: z.literal(true, {
    errorMap: () => ({ message: 'confirm must be true to delete every indexed page' }),
  }),
});

export const MetadataExtractInput = z.object({
  file_name: FileName,
  save: z.boolean().default(false).describe('Write the extracted metadata to the index'),
});

export const MetadataSaveInput = z.object({
  file_name: FileName,
  metadata: MetadataFieldsInput,
});
