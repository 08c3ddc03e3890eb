import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CONFIG_DIR,
  DEFAULT_CACHE_PATH,
  defaultConfig,
  isInitialized,
  mergeLayers,
  requireDestination,
  requireSourceCredentials,
  resolveConfig,
  saveConfig,
  validateConfig,
} from '../config.js';
import { ConfigError } from '../migrate/errors.js';
import { DEFAULT_LABFOLDER_URL } from '../migrate/labfolder/session.js';

async function writeConfig(dir: string, config: unknown): Promise<void> {
  await mkdir(dir, { recursive: true });
  await writeFile(join(dir, 'config.json'), JSON.stringify(config));
}

describe('validateConfig', () => {
  it('fills in defaults', () => {
    const config = validateConfig({});

    expect(config.labfolder.url).toBe(DEFAULT_LABFOLDER_URL);
    expect(config.cache).toEqual({ path: DEFAULT_CACHE_PATH, useCache: false });
    expect(config.run).toEqual({
      groupConcurrency: 2,
      uploadConcurrency: 4,
      duplicatePolicy: 'create',
      dryRun: false,
      previewRows: 10,
    });
    expect(config.logging.level).toBe('info');
    expect(config.authors).toEqual([]);
  });

  it('names the offending field', () => {
    expect(() => validateConfig({ run: { groupConcurrency: 0 } })).toThrow(ConfigError);
    expect(() => validateConfig({ run: { groupConcurrency: 0 } })).toThrow(
      /^Invalid configuration at run\.groupConcurrency: /,
    );
    expect(() => validateConfig({ elabftw: { url: 'not a url' } })).toThrow(/^Invalid configuration at elabftw\.url: /);
  });
});

describe('mergeLayers', () => {
  it('merges nested objects, skips undefined and replaces arrays', () => {
    expect(
      mergeLayers({ a: { b: 1, c: 2 }, d: [1, 2] }, { a: { b: undefined, c: 3 } }, undefined, { d: [3] }),
    ).toEqual({ a: { b: 1, c: 3 }, d: [3] });
  });
});

describe('resolveConfig', () => {
  let cwd: string;
  let globalDir: string;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'eln-migrate-cwd-'));
    globalDir = await mkdtemp(join(tmpdir(), 'eln-migrate-home-'));
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
    await rm(globalDir, { recursive: true, force: true });
  });

  it('layers file, environment and flags', async () => {
    await writeConfig(join(cwd, CONFIG_DIR), {
      labfolder: { username: 'file-user' },
      run: { groupConcurrency: 3, uploadConcurrency: 8 },
    });

    const config = await resolveConfig({
      cwd,
      globalDir,
      env: { LABFOLDER_USERNAME: 'env-user', LABFOLDER_PASSWORD: 'test-secret' },
      overrides: { run: { groupConcurrency: 5 } },
    });

    expect(config.labfolder.username).toBe('env-user');
    expect(config.labfolder.password).toBe('test-secret');
    expect(config.run.groupConcurrency).toBe(5);
    expect(config.run.uploadConcurrency).toBe(8);
  });

  it('falls back to the global config file', async () => {
    await writeConfig(globalDir, { authors: ['Emma'] });

    const config = await resolveConfig({ cwd, globalDir, env: {} });

    expect(config.authors).toEqual(['Emma']);
  });

  it('prefers the local config file over the global one', async () => {
    await writeConfig(globalDir, { authors: ['Emma'] });
    await writeConfig(join(cwd, CONFIG_DIR), { authors: ['Jonas'] });

    const config = await resolveConfig({ cwd, globalDir, env: {} });

    expect(config.authors).toEqual(['Jonas']);
  });

  it('reports a config file that is not JSON', async () => {
    await mkdir(join(cwd, CONFIG_DIR), { recursive: true });
    await writeFile(join(cwd, CONFIG_DIR, 'config.json'), '{ nope');

    await expect(resolveConfig({ cwd, globalDir, env: {} })).rejects.toThrow(/^Cannot parse /);
  });

  it('reads back what init writes', async () => {
    expect(isInitialized(cwd)).toBe(false);

    const path = await saveConfig(defaultConfig(), cwd);
    const config = await resolveConfig({ cwd, globalDir, env: {} });

    expect(path).toBe(join(cwd, CONFIG_DIR, 'config.json'));
    expect(isInitialized(cwd)).toBe(true);
    expect(config.elabftw.url).toBe('https://elabftw.example.org/api/v2');
    expect(config.run.groupConcurrency).toBe(2);
  });
});

describe('requirements', () => {
  it('demands Labfolder credentials', () => {
    expect(() => requireSourceCredentials(validateConfig({}))).toThrow(
      'Missing Labfolder username (--username or LABFOLDER_USERNAME)',
    );
    expect(requireSourceCredentials(validateConfig({ labfolder: { username: 'emma', password: 'test-secret' } }))).toEqual({
      url: DEFAULT_LABFOLDER_URL,
      username: 'emma',
      password: 'test-secret',
    });
  });

  it('demands eLabFTW settings', () => {
    expect(() => requireDestination(validateConfig({ elabftw: { url: 'https://elab.test/api/v2' } }))).toThrow(
      'Missing eLabFTW API key (--elab-key or ELABFTW_API_KEY)',
    );
  });
});
