/**
 * eln-migrate Configuration
 *
 * Layers, lowest first: built-in defaults, .eln-migrate/config.json in the
 * working directory (or ~/.eln-migrate/config.json), environment variables,
 * then command-line flags. The merged result is validated with zod.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { ConfigError } from './migrate/errors.js';
import { DEFAULT_LABFOLDER_URL } from './migrate/labfolder/session.js';

/** Directory name for local config */
export const CONFIG_DIR = '.eln-migrate';

/** Config filename */
export const CONFIG_FILE = 'config.json';

/** Global config home */
export const GLOBAL_CONFIG_DIR = join(homedir(), CONFIG_DIR);

export const DEFAULT_CACHE_PATH = join(CONFIG_DIR, 'cache.parquet');

/** Project PDFs land in `<dir>/pdf`, XHTML export zips in `<dir>/xhtml` */
export const DEFAULT_EXPORTS_DIR = join(CONFIG_DIR, 'exports');

// ─── Schema ──────────────────────────────────────────────────

const positiveInt = z.number().int().positive();

export const configSchema = z.object({
  labfolder: z
    .object({
      url: z.string().url().default(DEFAULT_LABFOLDER_URL),
      username: z.string().min(1).optional(),
      password: z.string().min(1).optional(),
    })
    .default({}),
  elabftw: z
    .object({
      url: z.string().url().optional(),
      apiKey: z.string().min(1).optional(),
      category: positiveInt.optional(),
    })
    .default({}),
  authors: z.array(z.string().min(1)).default([]),
  cache: z
    .object({
      path: z.string().min(1).default(DEFAULT_CACHE_PATH),
      useCache: z.boolean().default(false),
    })
    .default({}),
  lookups: z
    .object({
      isaIds: z.string().min(1).optional(),
      userMap: z.string().min(1).optional(),
    })
    .default({}),
  exports: z
    .object({
      dir: z.string().min(1).default(DEFAULT_EXPORTS_DIR),
      pdf: z.boolean().default(true),
      xhtml: z.boolean().default(true),
      restrictToXhtml: z.boolean().default(false),
    })
    .default({}),
  run: z
    .object({
      groupConcurrency: positiveInt.default(2),
      uploadConcurrency: positiveInt.default(4),
      duplicatePolicy: z.enum(['create', 'skip']).default('create'),
      dryRun: z.boolean().default(false),
      previewRows: z.number().int().nonnegative().default(10),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
      file: z.string().min(1).optional(),
    })
    .default({}),
});

export type MigrationConfig = z.infer<typeof configSchema>;

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

/** One configuration layer; undefined values leave lower layers in place */
export type ConfigLayer = DeepPartial<MigrationConfig>;

// ─── Layering ────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-merge plain objects, later layers winning. Arrays are replaced and
 * undefined values are skipped.
 */
export function mergeLayers(...layers: unknown[]): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    if (!isRecord(layer)) continue;
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const current = merged[key];
      merged[key] = isRecord(current) && isRecord(value) ? mergeLayers(current, value) : value;
    }
  }
  return merged;
}

export function envLayer(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  return {
    labfolder: {
      url: env.LABFOLDER_URL || undefined,
      username: env.LABFOLDER_USERNAME || undefined,
      password: env.LABFOLDER_PASSWORD || undefined,
    },
    elabftw: {
      url: env.ELABFTW_URL || undefined,
      apiKey: env.ELABFTW_API_KEY || undefined,
    },
  };
}

export function validateConfig(raw: unknown): MigrationConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'config';
    throw new ConfigError(`Invalid configuration at ${field}: ${issue?.message ?? 'invalid value'}`);
  }
  return parsed.data;
}

// ─── Files ───────────────────────────────────────────────────

/**
 * Resolve the local .eln-migrate directory for the given working directory.
 */
export function localConfigDir(cwd?: string): string {
  return join(resolve(cwd ?? process.cwd()), CONFIG_DIR);
}

export function localConfigPath(cwd?: string): string {
  return join(localConfigDir(cwd), CONFIG_FILE);
}

/**
 * Read the local config file, falling back to the global one.
 * Returns an empty layer when neither exists.
 */
export async function loadConfigFile(options: { cwd?: string; globalDir?: string } = {}): Promise<unknown> {
  const localPath = localConfigPath(options.cwd);
  const globalPath = join(options.globalDir ?? GLOBAL_CONFIG_DIR, CONFIG_FILE);

  for (const configPath of [localPath, globalPath]) {
    if (existsSync(configPath)) {
      const raw = await readFile(configPath, 'utf-8');
      try {
        return JSON.parse(raw);
      } catch (err) {
        throw new ConfigError(`Cannot parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  return {};
}

export interface ResolveOptions {
  cwd?: string;
  globalDir?: string;
  env?: NodeJS.ProcessEnv;
  /** Command-line flags */
  overrides?: ConfigLayer;
}

export async function resolveConfig(options: ResolveOptions = {}): Promise<MigrationConfig> {
  const file = await loadConfigFile(options);
  return validateConfig(mergeLayers(file, envLayer(options.env), options.overrides));
}

/**
 * Starter config for `eln-migrate init`. Credentials are left to the
 * environment.
 */
export function defaultConfig(): ConfigLayer {
  const config = validateConfig({});
  return {
    labfolder: { url: config.labfolder.url },
    elabftw: { url: 'https://elabftw.example.org/api/v2' },
    authors: [],
    cache: config.cache,
    exports: config.exports,
    run: config.run,
    logging: { level: config.logging.level },
  };
}

export async function saveConfig(config: ConfigLayer, cwd?: string): Promise<string> {
  const dir = localConfigDir(cwd);
  await mkdir(dir, { recursive: true });
  const configPath = join(dir, CONFIG_FILE);
  await writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  return configPath;
}

export function isInitialized(cwd?: string): boolean {
  return existsSync(localConfigPath(cwd));
}

// ─── Requirements ────────────────────────────────────────────

export function requireSourceCredentials(config: MigrationConfig): { url: string; username: string; password: string } {
  const { url, username, password } = config.labfolder;
  if (!username) throw new ConfigError('Missing Labfolder username (--username or LABFOLDER_USERNAME)');
  if (!password) throw new ConfigError('Missing Labfolder password (--password or LABFOLDER_PASSWORD)');
  return { url, username, password };
}

export function requireDestination(config: MigrationConfig): { url: string; apiKey: string } {
  const { url, apiKey } = config.elabftw;
  if (!url) throw new ConfigError('Missing eLabFTW URL (--elab-url or ELABFTW_URL)');
  if (!apiKey) throw new ConfigError('Missing eLabFTW API key (--elab-key or ELABFTW_API_KEY)');
  return { url, apiKey };
}
