/**
 * Cache Store
 *
 * Full-snapshot persistence of fetched entries. The format follows the file
 * extension; writes go to a temp sibling and are renamed into place.
 */

import { existsSync } from 'node:fs';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { randomBytes } from 'node:crypto';
import type { Entry } from '../types.js';
import { CacheUnavailableError, ConfigError, errorMessage } from '../errors.js';
import { entriesToRows, rowsToEntries } from './rows.js';
import { decodeJsonLines, encodeJsonLines } from './jsonl.js';
import { readParquetRows, writeParquetRows } from './parquet.js';
import { silentLogger, type Logger } from '../../logging.js';

export type CacheFormat = 'parquet' | 'jsonl';

export interface CacheStore {
  readonly path: string;
  readonly format: CacheFormat;
  /** Replace the cache with this snapshot */
  save(entries: readonly Entry[]): Promise<void>;
  /** Read the snapshot back; throws CacheUnavailableError */
  load(): Promise<Entry[]>;
}

export function cacheFormatFor(path: string): CacheFormat {
  const lower = path.toLowerCase();
  if (lower.endsWith('.parquet')) return 'parquet';
  if (lower.endsWith('.jsonl.gz') || lower.endsWith('.json.gz')) return 'jsonl';
  throw new ConfigError(`Unsupported cache file extension: ${path} (use .parquet, .jsonl.gz or .json.gz)`);
}

/** `.json.gz` sibling used when parquet cannot be written or read */
export function fallbackPathFor(path: string): string {
  return path.replace(/\.parquet$/i, '.json.gz');
}

async function atomicWrite(path: string, write: (tempPath: string) => Promise<void>): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.tmp.${randomBytes(4).toString('hex')}`;
  try {
    await write(tempPath);
    await rename(tempPath, path);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}

// ─── JSON lines ──────────────────────────────────────────────

export class JsonLinesCacheStore implements CacheStore {
  readonly format = 'jsonl';

  constructor(readonly path: string) {}

  async save(entries: readonly Entry[]): Promise<void> {
    const data = encodeJsonLines(entriesToRows(entries));
    await atomicWrite(this.path, (tempPath) => writeFile(tempPath, data));
  }

  async load(): Promise<Entry[]> {
    if (!existsSync(this.path)) {
      throw new CacheUnavailableError(this.path, 'file not found');
    }
    try {
      return rowsToEntries(decodeJsonLines(await readFile(this.path)));
    } catch (err) {
      throw new CacheUnavailableError(this.path, errorMessage(err), { cause: err });
    }
  }
}

// ─── Parquet ─────────────────────────────────────────────────

export class ParquetCacheStore implements CacheStore {
  readonly format = 'parquet';
  private readonly fallback: JsonLinesCacheStore;
  private readonly logger: Logger;

  constructor(
    readonly path: string,
    options: { logger?: Logger } = {},
  ) {
    this.fallback = new JsonLinesCacheStore(fallbackPathFor(path));
    this.logger = options.logger ?? silentLogger;
  }

  async save(entries: readonly Entry[]): Promise<void> {
    const rows = entriesToRows(entries);
    try {
      await atomicWrite(this.path, (tempPath) => writeParquetRows(tempPath, rows));
      await rm(this.fallback.path, { force: true });
    } catch (err) {
      this.logger.warn(`Parquet write failed, writing ${this.fallback.path} instead`, {
        reason: errorMessage(err),
      });
      await this.fallback.save(entries);
      await rm(this.path, { force: true });
    }
  }

  async load(): Promise<Entry[]> {
    let primary: CacheUnavailableError;
    if (existsSync(this.path)) {
      try {
        return rowsToEntries(await readParquetRows(this.path));
      } catch (err) {
        primary = new CacheUnavailableError(this.path, errorMessage(err), { cause: err });
      }
    } else {
      primary = new CacheUnavailableError(this.path, 'file not found');
    }

    if (!existsSync(this.fallback.path)) {
      throw primary;
    }
    this.logger.warn(`Reading cache from ${this.fallback.path}`, { reason: primary.message });
    return this.fallback.load();
  }
}

export function createCacheStore(path: string, options: { logger?: Logger } = {}): CacheStore {
  return cacheFormatFor(path) === 'parquet'
    ? new ParquetCacheStore(path, options)
    : new JsonLinesCacheStore(path);
}
