/**
 * Gzip-compressed JSON lines codec for cache rows. Blobs are base64.
 */

import { gunzipSync, gzipSync } from 'node:zlib';
import { z } from 'zod';
import type { CacheRow } from './rows.js';

const jsonRowSchema = z.object({
  entry_id: z.string(),
  project_id: z.string().nullable(),
  author: z.string(),
  entry: z.string(),
  element_index: z.number().int(),
  element_id: z.string().nullable(),
  element_kind: z.string().nullable(),
  payload: z.string().nullable(),
  blob: z.string().nullable(),
});

export function encodeJsonLines(rows: readonly CacheRow[]): Buffer {
  const lines = rows.map((row) =>
    JSON.stringify({ ...row, blob: row.blob ? row.blob.toString('base64') : null }),
  );
  return gzipSync(Buffer.from(lines.join('\n') + '\n', 'utf-8'));
}

export function decodeJsonLines(data: Buffer): CacheRow[] {
  const text = gunzipSync(data).toString('utf-8');
  return text
    .split('\n')
    .filter((line) => line.trim() !== '')
    .map((line) => {
      const row = jsonRowSchema.parse(JSON.parse(line));
      return { ...row, blob: row.blob === null ? null : Buffer.from(row.blob, 'base64') };
    });
}
