/**
 * Cache row schema
 *
 * One row per element. Entry-level fields travel as JSON in every row of the
 * entry; an entry without elements is a single row with element_index -1.
 * Shared by the parquet and JSON-lines formats.
 */

import { z } from 'zod';
import type { Element, Entry } from '../types.js';
import { authorName } from '../grouper.js';

export interface CacheRow {
  entry_id: string;
  project_id: string | null;
  /** Author display name, for inspection without decoding `entry` */
  author: string;
  /** JSON of the entry without its elements */
  entry: string;
  element_index: number;
  element_id: string | null;
  element_kind: string | null;
  /** JSON of the element's non-binary fields */
  payload: string | null;
  blob: Buffer | null;
}

export const EMPTY_ENTRY_INDEX = -1;

// ─── Validation ──────────────────────────────────────────────

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const sheetsPayloadSchema = z.object({
  sheets: z.array(z.object({ name: z.string(), rows: z.array(z.array(cellSchema)) })),
});

const textPayloadSchema = z.object({ content: z.string() });

const binaryPayloadSchema = z.object({ filename: z.string(), mimeType: z.string() });

const dataPayloadSchema = z.object({
  items: z.array(z.object({ title: z.string(), value: z.string(), unit: z.string() })),
});

const unrecognizedPayloadSchema = z.object({ sourceType: z.string() });

const entryFieldsSchema = z.object({
  id: z.string(),
  projectId: z.string().nullable(),
  projectTitle: z.string(),
  projectCreatedAt: z.string().optional(),
  projectEntryCount: z.number().optional(),
  entryNumber: z.number().optional(),
  title: z.string(),
  tags: z.array(z.string()),
  author: z.object({ firstName: z.string(), lastName: z.string() }),
  createdAt: z.string(),
  lastEditedAt: z.string().optional(),
});

type EntryFields = z.infer<typeof entryFieldsSchema>;

// ─── Entries → rows ──────────────────────────────────────────

function elementPayload(element: Element): { payload: object; blob: Buffer | null } {
  switch (element.kind) {
    case 'table':
    case 'well_plate':
      return { payload: { sheets: element.sheets }, blob: null };
    case 'text':
      return { payload: { content: element.content }, blob: null };
    case 'file':
    case 'image':
      return { payload: { filename: element.filename, mimeType: element.mimeType }, blob: element.data };
    case 'data':
      return { payload: { items: element.items }, blob: null };
    case 'unrecognized':
      return { payload: { sourceType: element.sourceType }, blob: null };
  }
}

export function entriesToRows(entries: readonly Entry[]): CacheRow[] {
  const rows: CacheRow[] = [];

  for (const entry of entries) {
    const { elements, ...fields } = entry;
    const shared = {
      entry_id: entry.id,
      project_id: entry.projectId,
      author: authorName(entry.author),
      entry: JSON.stringify(fields),
    };

    if (elements.length === 0) {
      rows.push({
        ...shared,
        element_index: EMPTY_ENTRY_INDEX,
        element_id: null,
        element_kind: null,
        payload: null,
        blob: null,
      });
      continue;
    }

    elements.forEach((element, index) => {
      const { payload, blob } = elementPayload(element);
      rows.push({
        ...shared,
        element_index: index,
        element_id: element.id,
        element_kind: element.kind,
        payload: JSON.stringify(payload),
        blob,
      });
    });
  }

  return rows;
}

// ─── Rows → entries ──────────────────────────────────────────

function requireBlob(row: CacheRow): Buffer {
  if (!row.blob) {
    throw new Error(`Row for element ${row.element_id} of entry ${row.entry_id} has no blob`);
  }
  return row.blob;
}

export function rowToElement(row: CacheRow): Element {
  const id = row.element_id ?? '';
  const payload: unknown = JSON.parse(row.payload ?? '{}');

  switch (row.element_kind) {
    case 'table':
      return { kind: 'table', id, sheets: sheetsPayloadSchema.parse(payload).sheets };
    case 'well_plate':
      return { kind: 'well_plate', id, sheets: sheetsPayloadSchema.parse(payload).sheets };
    case 'text':
      return { kind: 'text', id, content: textPayloadSchema.parse(payload).content };
    case 'file':
      return { kind: 'file', id, ...binaryPayloadSchema.parse(payload), data: requireBlob(row) };
    case 'image':
      return { kind: 'image', id, ...binaryPayloadSchema.parse(payload), data: requireBlob(row) };
    case 'data':
      return { kind: 'data', id, items: dataPayloadSchema.parse(payload).items };
    case 'unrecognized':
      return { kind: 'unrecognized', id, sourceType: unrecognizedPayloadSchema.parse(payload).sourceType };
    default:
      throw new Error(`Unknown element kind "${row.element_kind}" in entry ${row.entry_id}`);
  }
}

/**
 * Reassemble entries in first-seen order, elements by element_index.
 */
export function rowsToEntries(rows: readonly CacheRow[]): Entry[] {
  const grouped = new Map<string, { fields: EntryFields; rows: CacheRow[] }>();

  for (const row of rows) {
    let slot = grouped.get(row.entry_id);
    if (!slot) {
      slot = { fields: entryFieldsSchema.parse(JSON.parse(row.entry)), rows: [] };
      grouped.set(row.entry_id, slot);
    }
    if (row.element_index !== EMPTY_ENTRY_INDEX) {
      slot.rows.push(row);
    }
  }

  return [...grouped.values()].map(({ fields, rows: elementRows }) => ({
    ...fields,
    elements: [...elementRows].sort((a, b) => a.element_index - b.element_index).map(rowToElement),
  }));
}
