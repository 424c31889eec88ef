/**
 * MetadataExtractor - structured contract metadata from full text via an LLM,
 * plus the metadata embedding used by metadata search.
 *
 * @module services/extraction/metadata-extractor
 */

import { METADATA_TEXT_FIELDS, emptyMetadata } from '../../models/contract.js';
import type { DocumentMetadata, MetadataTextField } from '../../models/contract.js';
import { isIsoDate } from '../../utils/validation.js';
import type { EmbeddingProvider } from '../embedding/provider.js';
import type { CustomerCategoryLookup } from './customer-category.js';
import { MetadataExtractionError, parseJsonResponse } from './json-response.js';
import type { ChatCompletionClient } from './llm-client.js';

export const DEFAULT_MAX_INPUT_CHARS = 12000;

const SYSTEM_PROMPT = '你是一个专业的合同分析助手，只输出JSON。';

/**
 * Single extraction prompt; the contract text goes last.
 */
export function buildExtractionPrompt(contractText: string): string {
  return `请仔细分析以下合同文本，提取关键信息。

需要提取的字段：
- customer_name: 客户名称（合同中的客户一方，通常为甲方）
- our_entity: 我方主体名称（通常为乙方）
- contract_type: 合同方向（金融方向【银行、保险、证券】、互联网方向、电信方向、其他）
- contract_amount: 合同金额（数字，不含货币符号；有多个金额时取总金额）
- signing_date: 签订日期（YYYY-MM-DD）
- project_description: 合同内容（项目描述或服务内容）
- positions: 岗位信息
- personnel_list: 相关人员清单

要求：
1. 合同中没有明确提及的字段设置为 null
2. 只返回上述字段组成的 JSON 对象，不要添加解释

合同文本：
${contractText}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLEANING
// ═══════════════════════════════════════════════════════════════════════════════

function cleanText(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  if (Array.isArray(value)) {
    const parts = value
      .filter((item): item is string | number => typeof item === 'string' || typeof item === 'number')
      .map((item) => String(item).trim())
      .filter((item) => item.length > 0);
    return parts.length > 0 ? parts.join('、') : null;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 && trimmed.toLowerCase() !== 'null' ? trimmed : null;
}

/**
 * Numbers pass through; strings lose separators, currency marks and a
 * trailing 元, and 万 multiplies by 10 000.
 */
export function cleanAmount(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }
  let text = value.replace(/[,，\s¥￥]|人民币|RMB|CNY/gi, '');
  let multiplier = 1;
  if (text.endsWith('元')) {
    text = text.slice(0, -1);
  }
  if (text.endsWith('万')) {
    text = text.slice(0, -1);
    multiplier = 10000;
  }
  if (!/^\d+(\.\d+)?$/.test(text)) {
    return null;
  }
  return Number(text) * multiplier;
}

/**
 * YYYY-MM-DD from 2024-03-05, 2024/3/5, 2024.3.5 or 2024年3月5日; null otherwise.
 */
export function cleanDate(value: unknown): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const match = /^(\d{4})\s*[-/.年]\s*(\d{1,2})\s*[-/.月]\s*(\d{1,2})\s*日?$/.exec(value.trim());
  if (!match) {
    return null;
  }
  const iso = `${match[1]}-${match[2].padStart(2, '0')}-${match[3].padStart(2, '0')}`;
  return isIsoDate(iso) ? iso : null;
}

/**
 * Keep known fields only, coerce types, stamp extracted_at, and fill the
 * customer categories from the lookup when the LLM left them empty.
 * The lookup is read as last refreshed.
 */
export function cleanMetadata(
  raw: Record<string, unknown>,
  extractedAt: string,
  categories?: CustomerCategoryLookup | null
): DocumentMetadata {
  const metadata = emptyMetadata();
  for (const field of METADATA_TEXT_FIELDS) {
    metadata[field] = cleanText(raw[field]);
  }
  metadata.contract_amount = cleanAmount(raw.contract_amount);
  metadata.signing_date = cleanDate(raw.signing_date);
  metadata.extracted_at = extractedAt;

  if (categories && metadata.customer_name) {
    const found = categories.lookup(metadata.customer_name);
    metadata.customer_category_level1 ??= found.level1;
    metadata.customer_category_level2 ??= found.level2;
  }
  return metadata;
}

const METADATA_TEXT_LABELS: ReadonlyArray<[MetadataTextField | 'contract_amount' | 'signing_date', string]> = [
  ['customer_name', '客户名称'],
  ['our_entity', '我方主体'],
  ['customer_category_level1', '客户一级分类'],
  ['customer_category_level2', '客户二级分类'],
  ['contract_type', '合同方向'],
  ['contract_amount', '合同金额'],
  ['signing_date', '签订日期'],
  ['project_description', '项目描述'],
  ['positions', '岗位信息'],
  ['personnel_list', '人员清单'],
];

/**
 * Labelled concatenation of the non-null fields, e.g. "客户名称：X 合同金额：100元".
 * Empty when there is nothing to embed.
 */
export function buildMetadataText(metadata: DocumentMetadata): string {
  const parts: string[] = [];
  for (const [field, label] of METADATA_TEXT_LABELS) {
    const value = metadata[field];
    if (value === null || value === '') continue;
    parts.push(field === 'contract_amount' ? `${label}：${value}元` : `${label}：${value}`);
  }
  return parts.join(' ');
}

/**
 * Embedding of buildMetadataText, or null when the metadata is empty
 */
export async function embedMetadata(
  embedder: EmbeddingProvider,
  metadata: DocumentMetadata
): Promise<number[] | null> {
  const text = buildMetadataText(metadata);
  if (text.length === 0) {
    return null;
  }
  const [vector] = await embedder.embed([text]);
  return vector;
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTOR
// ═══════════════════════════════════════════════════════════════════════════════

export interface ExtractionResult {
  metadata: DocumentMetadata;
  metadata_vector: number[] | null;
  raw_response: string;
  truncated: boolean;
}

export interface MetadataExtractorDeps {
  llm: ChatCompletionClient;
  embedder: EmbeddingProvider;
  categories?: CustomerCategoryLookup | null;
  maxInputChars?: number;
  now?: () => Date;
}

export class MetadataExtractor {
  private readonly maxInputChars: number;
  private readonly now: () => Date;

  constructor(private readonly deps: MetadataExtractorDeps) {
    this.maxInputChars = deps.maxInputChars ?? DEFAULT_MAX_INPUT_CHARS;
    this.now = deps.now ?? (() => new Date());
  }

  get model(): string {
    return this.deps.llm.model;
  }

  async extract(contractText: string): Promise<ExtractionResult> {
    const text = contractText.trim();
    if (text.length === 0) {
      throw new MetadataExtractionError('Contract text is empty', 'EMPTY_INPUT');
    }

    const truncated = text.length > this.maxInputChars;
    const input = truncated ? text.slice(0, this.maxInputChars) : text;
    if (truncated) {
      console.error(`[Extraction] Contract text truncated from ${text.length} to ${this.maxInputChars} chars`);
    }

    const rawResponse = await this.deps.llm.complete([
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: buildExtractionPrompt(input) },
    ]);
    await this.deps.categories?.refresh();
    const metadata = cleanMetadata(
      parseJsonResponse(rawResponse),
      this.now().toISOString(),
      this.deps.categories
    );
    const metadataVector = await embedMetadata(this.deps.embedder, metadata);

    return { metadata, metadata_vector: metadataVector, raw_response: rawResponse, truncated };
  }
}
