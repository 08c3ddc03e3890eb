import { describe, it, expect } from 'vitest';
import { buildPipeline, overridesFromOptions, runMigration } from '../migrate.js';
import { summarizeEntries } from '../cache.js';
import { mergeLayers, validateConfig } from '../../config.js';
import { silentLogger } from '../../logging.js';
import { SourceFetcher } from '../../migrate/labfolder/fetcher.js';
import { DestinationImporter } from '../../migrate/elabftw/importer.js';
import { ConfigError } from '../../migrate/errors.js';
import { XhtmlExportSource } from '../../migrate/artifacts/xhtml.js';
import { imageElement, makeEntry, textElement } from '../../migrate/__tests__/fixtures.js';

describe('overridesFromOptions', () => {
  it('maps flags onto configuration', () => {
    const config = validateConfig(
      mergeLayers(
        overridesFromOptions({
          author: ['Emma', 'Jonas Klein'],
          skipExisting: true,
          verbose: true,
          groupConcurrency: 3,
          cache: 'run.jsonl.gz',
          useCache: true,
        }),
      ),
    );

    expect(config.authors).toEqual(['Emma', 'Jonas Klein']);
    expect(config.run.duplicatePolicy).toBe('skip');
    expect(config.run.groupConcurrency).toBe(3);
    expect(config.logging.level).toBe('debug');
    expect(config.cache).toEqual({ path: 'run.jsonl.gz', useCache: true });
  });

  it('leaves absent flags undefined', () => {
    const layer = overridesFromOptions({ author: [] });

    expect(layer.authors).toBeUndefined();
    expect(layer.run?.duplicatePolicy).toBeUndefined();
    expect(layer.logging?.level).toBeUndefined();
    expect(layer.exports).toEqual({ dir: undefined, pdf: undefined, xhtml: undefined, restrictToXhtml: undefined });
  });

  it('maps the export flags', () => {
    const config = validateConfig(
      mergeLayers(
        overridesFromOptions({ pdf: false, xhtml: true, onlyProjectsFromXhtml: true, exportsDir: 'exports' }),
      ),
    );

    expect(config.exports).toEqual({ dir: 'exports', pdf: false, xhtml: true, restrictToXhtml: true });
  });
});

describe('buildPipeline', () => {
  it('needs no credentials for a dry run from the cache', async () => {
    const config = validateConfig({ cache: { path: 'run.jsonl.gz', useCache: true }, run: { dryRun: true } });

    const deps = await buildPipeline(config, silentLogger);

    expect(deps.source).toBeUndefined();
    expect(deps.importer).toBeUndefined();
    expect(deps.cache?.format).toBe('jsonl');
  });

  it('wires source and destination clients when both are configured', async () => {
    const config = validateConfig({
      labfolder: { username: 'emma', password: 'test-secret' },
      elabftw: { url: 'https://elab.test/api/v2', apiKey: 'test-secret' },
    });

    const deps = await buildPipeline(config, silentLogger);

    expect(deps.source).toBeInstanceOf(SourceFetcher);
    expect(deps.importer).toBeInstanceOf(DestinationImporter);
    expect(deps.cache?.format).toBe('parquet');
  });

  it('rejects a live run without destination settings', async () => {
    const config = validateConfig({ labfolder: { username: 'emma', password: 'test-secret' } });

    await expect(buildPipeline(config, silentLogger)).rejects.toBeInstanceOf(ConfigError);
  });

  it('asks for Labfolder credentials when project PDFs are wanted', async () => {
    const config = validateConfig({
      cache: { useCache: true },
      elabftw: { url: 'https://elab.test/api/v2', apiKey: 'test-secret' },
    });

    await expect(buildPipeline(config, silentLogger)).rejects.toThrow(
      'Project PDFs need Labfolder credentials (--username/--password), or pass --no-pdf',
    );
  });

  it('imports from the cache without Labfolder when PDFs are off', async () => {
    const config = validateConfig({
      cache: { useCache: true },
      elabftw: { url: 'https://elab.test/api/v2', apiKey: 'test-secret' },
      exports: { pdf: false },
    });

    const deps = await buildPipeline(config, silentLogger);

    expect(deps.source).toBeUndefined();
    expect(deps.importer).toBeInstanceOf(DestinationImporter);
    expect(deps.xhtml).toBeInstanceOf(XhtmlExportSource);
    expect(deps.xhtml?.restrict).toBe(false);
  });

  it('leaves the XHTML export out of a dry run unless it restricts projects', async () => {
    const dryRun = { cache: { useCache: true }, run: { dryRun: true } };

    expect((await buildPipeline(validateConfig(dryRun), silentLogger)).xhtml).toBeUndefined();
    expect(
      (await buildPipeline(validateConfig({ ...dryRun, exports: { restrictToXhtml: true } }), silentLogger)).xhtml
        ?.restrict,
    ).toBe(true);
  });
});

describe('runMigration', () => {
  it('reports a run whose pipeline cannot be built as aborted', async () => {
    const config = validateConfig({ labfolder: { username: 'emma', password: 'test-secret' } });

    const report = await runMigration(config, silentLogger);

    expect(report.status).toBe('aborted');
    expect(report.phases).toEqual(['aborted']);
    expect(report.fatal).toBe('Missing eLabFTW URL (--elab-url or ELABFTW_URL)');
    expect(report.source).toBe('fetch');
    expect(report.dryRun).toBe(false);
    expect(report.counts.groupsTotal).toBe(0);
    expect(report.completedAt).not.toBe('');
  });
});

describe('summarizeEntries', () => {
  it('counts projects, authors, element kinds and binary size', () => {
    const summary = summarizeEntries([
      makeEntry({ id: 'a', elements: [textElement('x1', '<p/>'), imageElement('i1')] }),
      makeEntry({ id: 'b', projectId: 'P2', author: { firstName: 'Jonas', lastName: 'Klein' }, elements: [imageElement('i2')] }),
      makeEntry({ id: 'c', projectId: null }),
    ]);

    expect(summary).toEqual({
      entries: 3,
      projects: 3,
      authors: ['Emma Weber', 'Jonas Klein'],
      elements: { text: 1, image: 2 },
      attachmentBytes: 12,
    });
  });
});
