/**
 * Auxiliary lookup tables
 *
 * ISA-study IDs keyed by Labfolder project ID, and destination users keyed by
 * source author name. Both come from CSV files with a header row.
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { Author } from './types.js';
import { ConfigError, errorMessage } from './errors.js';
import { authorName } from './grouper.js';

const isaRowSchema = z
  .object({
    'Project ID': z.string(),
    'ISA ID': z.string(),
  })
  .passthrough();

const userRowSchema = z
  .object({
    'First Name': z.string(),
    'Last Name': z.string(),
    Username: z.string().optional(),
    'User ID': z.string().optional(),
  })
  .passthrough();

export interface UserMapping {
  username?: string;
  userId?: number;
}

export interface Lookups {
  isaIdFor(projectId: string): string | undefined;
  userFor(author: Author): UserMapping | undefined;
}

function parseRows(text: string): unknown {
  return parse(text, { columns: true, skip_empty_lines: true, trim: true, bom: true });
}

export function parseIsaList(text: string): Map<string, string> {
  const rows = z.array(isaRowSchema).parse(parseRows(text));
  const map = new Map<string, string>();
  for (const row of rows) {
    if (row['Project ID'] && row['ISA ID']) {
      map.set(row['Project ID'], row['ISA ID']);
    }
  }
  return map;
}

function nameKey(first: string, last: string): string {
  return `${first} ${last}`.trim().toLowerCase();
}

export function parseUserMap(text: string): Map<string, UserMapping> {
  const rows = z.array(userRowSchema).parse(parseRows(text));
  const map = new Map<string, UserMapping>();
  for (const row of rows) {
    const userId = row['User ID'] && /^\d+$/.test(row['User ID']) ? Number(row['User ID']) : undefined;
    map.set(nameKey(row['First Name'], row['Last Name']), {
      username: row.Username || undefined,
      userId,
    });
  }
  return map;
}

export class LookupTables implements Lookups {
  constructor(
    private readonly isaIds: ReadonlyMap<string, string> = new Map(),
    private readonly users: ReadonlyMap<string, UserMapping> = new Map(),
  ) {}

  isaIdFor(projectId: string): string | undefined {
    return this.isaIds.get(projectId);
  }

  userFor(author: Author): UserMapping | undefined {
    return this.users.get(authorName(author).trim().toLowerCase());
  }
}

export const emptyLookups: Lookups = new LookupTables();

async function readTable<T>(path: string, label: string, parseText: (text: string) => T): Promise<T> {
  try {
    return parseText(await readFile(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read ${label} at ${path}: ${errorMessage(err)}`);
  }
}

export async function loadLookups(paths: { isaIds?: string; userMap?: string }): Promise<LookupTables> {
  const isaIds = paths.isaIds ? await readTable(paths.isaIds, 'ISA ID list', parseIsaList) : undefined;
  const users = paths.userMap ? await readTable(paths.userMap, 'user map', parseUserMap) : undefined;
  return new LookupTables(isaIds, users);
}
