/**
 * CustomerCategoryLookup - customer name to (level1, level2) category
 *
 * Reads the active sheet of an .xlsx workbook whose header row names the
 * customer, level-1 and level-2 columns, and reloads it whenever the file's
 * mtime changes. Callers await refresh() before lookup().
 *
 * @module services/extraction/customer-category
 */

import { stat } from 'node:fs/promises';
import ExcelJS from 'exceljs';
import type { Worksheet } from 'exceljs';

export interface CustomerCategory {
  level1: string | null;
  level2: string | null;
}

const EMPTY_CATEGORY: CustomerCategory = { level1: null, level2: null };

const PARTY_PREFIX = /^[甲乙丙丁]方[:：\s]*/;
const EDGE_BRACKETS = /^[（）()\s]+|[（）()\s]+$/g;

/** Accepted header spellings per column, compared after whitespace removal */
export const HEADER_ALIASES = {
  customer_name: ['客户名称', '客户名', '客户', '公司名称', '名称'],
  level1: ['一级分类', '一级客户分类', '一级类', '一级'],
  level2: ['二级分类', '二级客户分类', '二级类', '二级'],
} as const;

type CategoryColumn = keyof typeof HEADER_ALIASES;

export type ColumnIndices = Record<CategoryColumn, number | null>;

/**
 * Lookup key: drop a 甲方/乙方 prefix, surrounding brackets and all
 * whitespace, then case-fold.
 */
export function normalizeCustomerKey(value: string | null | undefined): string {
  if (!value) {
    return '';
  }
  return value
    .trim()
    .replace(/\u3000/g, ' ')
    .replace(PARTY_PREFIX, '')
    .replace(EDGE_BRACKETS, '')
    .replace(/\s+/g, '')
    .toLowerCase();
}

function normalizeHeader(value: string): string {
  return value.replace(/\u3000/g, ' ').replace(/\s+/g, '');
}

/**
 * 1-based column number of the first header matching each alias set
 */
export function resolveColumns(headers: string[]): ColumnIndices {
  const normalized = headers.map(normalizeHeader);
  const find = (aliases: readonly string[]): number | null => {
    const index = normalized.findIndex((header) => header !== '' && aliases.includes(header));
    return index === -1 ? null : index + 1;
  };
  return {
    customer_name: find(HEADER_ALIASES.customer_name),
    level1: find(HEADER_ALIASES.level1),
    level2: find(HEADER_ALIASES.level2),
  };
}

function cellText(sheet: Worksheet, row: number, column: number | null): string | null {
  if (column === null) {
    return null;
  }
  const text = sheet.getRow(row).getCell(column).text.trim();
  return text === '' ? null : text;
}

/**
 * Rows to mapping; the first record wins when a customer appears twice.
 */
export function readCategorySheet(sheet: Worksheet): Map<string, CustomerCategory> {
  if (sheet.rowCount === 0) {
    throw new Error('customer category sheet is empty');
  }

  const header = sheet.getRow(1);
  const headers: string[] = [];
  for (let column = 1; column <= header.cellCount; column++) {
    headers.push(header.getCell(column).text.trim());
  }
  const columns = resolveColumns(headers);
  if (columns.customer_name === null) {
    throw new Error(
      `customer category sheet has no customer name column (one of ${HEADER_ALIASES.customer_name.join('/')})`
    );
  }

  const mapping = new Map<string, CustomerCategory>();
  const duplicates = new Set<string>();
  for (let row = 2; row <= sheet.rowCount; row++) {
    const key = normalizeCustomerKey(cellText(sheet, row, columns.customer_name));
    if (!key) continue;

    const record: CustomerCategory = {
      level1: cellText(sheet, row, columns.level1),
      level2: cellText(sheet, row, columns.level2),
    };
    const existing = mapping.get(key);
    if (existing) {
      if (existing.level1 !== record.level1 || existing.level2 !== record.level2) {
        duplicates.add(key);
      }
      continue;
    }
    mapping.set(key, record);
  }

  if (duplicates.size > 0) {
    console.error(`[Categories] Duplicate customers, keeping the first row: ${[...duplicates].join(', ')}`);
  }
  return mapping;
}

export class CustomerCategoryLookup {
  private mapping = new Map<string, CustomerCategory>();
  private loadedMtimeMs: number | null = null;
  private pending: Promise<void> | null = null;

  constructor(private readonly filePath: string | null) {}

  /**
   * Category from the last loaded workbook
   */
  lookup(customerName: string | null | undefined): CustomerCategory {
    const key = normalizeCustomerKey(customerName);
    if (!key) {
      return EMPTY_CATEGORY;
    }
    return this.mapping.get(key) ?? EMPTY_CATEGORY;
  }

  get size(): number {
    return this.mapping.size;
  }

  /**
   * Reload the workbook if its mtime changed. A workbook that fails to parse
   * leaves the previous mapping in place; a removed file clears it.
   */
  refresh(): Promise<void> {
    if (!this.filePath) {
      return Promise.resolve();
    }
    this.pending ??= this.reloadIfChanged(this.filePath).finally(() => {
      this.pending = null;
    });
    return this.pending;
  }

  private async reloadIfChanged(filePath: string): Promise<void> {
    let mtimeMs: number;
    try {
      mtimeMs = (await stat(filePath)).mtimeMs;
    } catch {
      if (this.loadedMtimeMs !== null) {
        console.error(`[Categories] ${filePath} disappeared; clearing category mapping`);
      }
      this.mapping = new Map();
      this.loadedMtimeMs = null;
      return;
    }

    if (mtimeMs === this.loadedMtimeMs) {
      return;
    }

    try {
      const workbook = new ExcelJS.Workbook();
      await workbook.xlsx.readFile(filePath);
      const activeTab = workbook.views[0]?.activeTab ?? 0;
      const sheet = workbook.worksheets[activeTab] ?? workbook.worksheets[0];
      if (!sheet) {
        throw new Error('workbook has no worksheets');
      }
      this.mapping = readCategorySheet(sheet);
      this.loadedMtimeMs = mtimeMs;
      console.error(`[Categories] Loaded ${this.mapping.size} customer categories from ${filePath}`);
    } catch (error) {
      console.error(`[Categories] Failed to load ${filePath}: ${String(error)}`);
    }
  }
}
