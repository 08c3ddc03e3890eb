/**
 * Parquet codec for cache rows (@dsnp/parquetjs).
 */

import { ParquetReader, ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import { z } from 'zod';
import type { CacheRow } from './rows.js';

export const CACHE_PARQUET_SCHEMA = new ParquetSchema({
  entry_id: { type: 'UTF8' },
  project_id: { type: 'UTF8', optional: true },
  author: { type: 'UTF8' },
  entry: { type: 'UTF8' },
  element_index: { type: 'INT32' },
  element_id: { type: 'UTF8', optional: true },
  element_kind: { type: 'UTF8', optional: true },
  payload: { type: 'UTF8', optional: true },
  blob: { type: 'BYTE_ARRAY', optional: true },
});

const parquetRowSchema = z.object({
  entry_id: z.string(),
  project_id: z.string().nullish(),
  author: z.string(),
  entry: z.string(),
  element_index: z.number().int(),
  element_id: z.string().nullish(),
  element_kind: z.string().nullish(),
  payload: z.string().nullish(),
  blob: z.instanceof(Uint8Array).nullish(),
});

/** Optional columns are omitted rather than written as null */
function toRecord(row: CacheRow): Record<string, string | number | Buffer> {
  const record: Record<string, string | number | Buffer> = {
    entry_id: row.entry_id,
    author: row.author,
    entry: row.entry,
    element_index: row.element_index,
  };
  if (row.project_id !== null) record.project_id = row.project_id;
  if (row.element_id !== null) record.element_id = row.element_id;
  if (row.element_kind !== null) record.element_kind = row.element_kind;
  if (row.payload !== null) record.payload = row.payload;
  if (row.blob !== null) record.blob = row.blob;
  return record;
}

export async function writeParquetRows(path: string, rows: readonly CacheRow[]): Promise<void> {
  const writer = await ParquetWriter.openFile(CACHE_PARQUET_SCHEMA, path);
  try {
    for (const row of rows) {
      await writer.appendRow(toRecord(row));
    }
  } finally {
    await writer.close();
  }
}

export async function readParquetRows(path: string): Promise<CacheRow[]> {
  const reader = await ParquetReader.openFile(path);
  try {
    const cursor = reader.getCursor();
    const rows: CacheRow[] = [];

    for (;;) {
      const record: unknown = await cursor.next();
      if (record === null || record === undefined) break;

      const row = parquetRowSchema.parse(record);
      rows.push({
        entry_id: row.entry_id,
        project_id: row.project_id ?? null,
        author: row.author,
        entry: row.entry,
        element_index: row.element_index,
        element_id: row.element_id ?? null,
        element_kind: row.element_kind ?? null,
        payload: row.payload ?? null,
        blob: row.blob ? Buffer.from(row.blob) : null,
      });
    }

    return rows;
  } finally {
    await reader.close();
  }
}
