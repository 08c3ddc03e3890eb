/**
 * Labfolder Content Normalization
 *
 * Turns TABLE / WELL_PLATE payloads (SpreadJS JSON or CSV strings) and DATA
 * element trees into the plain Sheet and DataItem shapes the pipeline uses.
 */

import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { CellValue, DataItem, Sheet } from '../types.js';
import type { LabfolderDataElement } from './schema.js';

const spreadSheetSchema = z
  .object({
    name: z.string().nullish(),
    rowCount: z.number().nullish(),
    columnCount: z.number().nullish(),
    data: z
      .object({
        dataTable: z.record(z.string(), z.record(z.string(), z.unknown())).nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

const sheetMapSchema = z.record(z.string(), z.unknown());

const csvRowsSchema = z.array(z.array(z.string()));

const NUMERIC = /^-?\d+(\.\d+)?([eE][-+]?\d+)?$/;

// ─── Cells ───────────────────────────────────────────────────

export function toCellValue(raw: unknown): CellValue {
  const value = typeof raw === 'object' && raw !== null && 'value' in raw ? raw.value : raw;
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return JSON.stringify(value);
}

function csvCell(raw: string): CellValue {
  const trimmed = raw.trim();
  if (trimmed === '') return null;
  return NUMERIC.test(trimmed) ? Number(trimmed) : raw;
}

// ─── CSV ─────────────────────────────────────────────────────

export function detectDelimiter(text: string): string {
  const firstLine = text.split(/\r?\n/, 1)[0] ?? '';
  let best = ',';
  let bestCount = 0;
  for (const candidate of [',', ';', '\t']) {
    const count = firstLine.split(candidate).length - 1;
    if (count > bestCount) {
      best = candidate;
      bestCount = count;
    }
  }
  return best;
}

export function parseCsvSheet(name: string, text: string): Sheet {
  const records: unknown = parse(text, {
    delimiter: detectDelimiter(text),
    relax_column_count: true,
    skip_empty_lines: true,
  });
  const rows = csvRowsSchema.parse(records);
  return { name, rows: rows.map((row) => row.map(csvCell)) };
}

// ─── SpreadJS ────────────────────────────────────────────────

function maxIndex(keys: string[]): number {
  let max = -1;
  for (const key of keys) {
    const index = Number(key);
    if (Number.isInteger(index) && index > max) max = index;
  }
  return max;
}

export function densifySheet(name: string, raw: unknown): Sheet {
  const sheet = spreadSheetSchema.parse(raw);
  const table = sheet.data?.dataTable ?? {};

  const rowCount =
    sheet.rowCount ?? maxIndex(Object.keys(table)) + 1;
  const columnCount =
    sheet.columnCount ??
    Math.max(0, ...Object.values(table).map((row) => maxIndex(Object.keys(row)) + 1));

  const rows: CellValue[][] = [];
  for (let r = 0; r < rowCount; r++) {
    const source = table[String(r)] ?? {};
    const row: CellValue[] = [];
    for (let c = 0; c < columnCount; c++) {
      row.push(toCellValue(source[String(c)]));
    }
    rows.push(row);
  }

  return { name: sheet.name ?? name, rows };
}

/**
 * Normalize a `{ sheets }` map, a bare CSV string, or nothing at all.
 * Each sheet may itself be SpreadJS JSON or a CSV string.
 */
export function normalizeSheets(content: unknown, fallbackName: string): Sheet[] {
  if (content === null || content === undefined) return [];
  if (typeof content === 'string') {
    return content.trim() === '' ? [] : [parseCsvSheet(fallbackName, content)];
  }

  const sheets = sheetMapSchema.parse(content);
  return Object.entries(sheets).map(([name, sheet]) =>
    typeof sheet === 'string' ? parseCsvSheet(name, sheet) : densifySheet(name, sheet),
  );
}

// ─── DATA elements ───────────────────────────────────────────

/**
 * Flatten a DATA element tree. Group titles prefix their children's titles;
 * descriptive elements carry their description as the value.
 */
export function flattenDataItems(elements: LabfolderDataElement[], prefix = ''): DataItem[] {
  const items: DataItem[] = [];
  for (const element of elements) {
    const title = prefix ? `${prefix} / ${element.title ?? ''}` : element.title ?? '';
    if (element.children && element.children.length > 0) {
      items.push(...flattenDataItems(element.children, title));
      continue;
    }
    const value = element.value ?? element.description ?? '';
    items.push({ title, value: String(value), unit: element.unit ?? '' });
  }
  return items;
}
