import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import JSZip from 'jszip';
import { ProjectPdfSource, pdfFilename, safeFileTitle } from '../artifacts/pdf.js';
import { XhtmlArchive, XhtmlExportSource } from '../artifacts/xhtml.js';
import { LabfolderExports } from '../labfolder/exports.js';
import { XLSX_MIME_TYPE } from '../transform/spreadsheet.js';
import { UNGROUPED_PROJECT_ID, type Attachment, type PreparedGroup } from '../types.js';
import { FakeLabfolder, makeEntry } from './fixtures.js';

function group(projectId: string, projectTitle = 'Buffer optimisation'): PreparedGroup {
  return { projectId, entries: [{ entry: makeEntry({ projectId, projectTitle }), units: [] }] };
}

function exportsOf(labfolder: FakeLabfolder): LabfolderExports {
  return new LabfolderExports(labfolder, { sleep: async () => {} });
}

function described(attachments: Attachment[]) {
  return attachments.map(({ key, filename, mimeType, data }) => ({ key, filename, mimeType, text: data.toString() }));
}

async function xhtmlZip(projects: Record<string, string>): Promise<Buffer> {
  const zip = new JSZip();
  for (const [projectId, title] of Object.entries(projects)) {
    const folder = `labfolder_export/projects/Weber lab/${projectId}_${title}`;
    zip.file(`${folder}/index.html`, `<html>${projectId}</html>`);
    zip.file(`${folder}/tables/plate.xlsx`, `xlsx-${projectId}`);
  }
  zip.file('labfolder_export/index.html', '<html>root</html>');
  return zip.generateAsync({ type: 'nodebuffer' });
}

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'eln-artifacts-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

// ─── Project PDF ─────────────────────────────────────────────

describe('pdfFilename', () => {
  it('replaces characters unsafe in file names', () => {
    expect(safeFileTitle(' Buffer/pH 7.4: test ')).toBe('Buffer_pH 7.4_ test');
    expect(pdfFilename('P1', 'Buffer optimisation')).toBe('P1_Buffer optimisation.pdf');
    expect(pdfFilename('7', '   ')).toBe('7_project_7.pdf');
  });
});

describe('ProjectPdfSource', () => {
  it('requests, downloads and keeps one PDF per project', async () => {
    const labfolder = new FakeLabfolder();
    labfolder.exportData.set('x1', Buffer.from('%PDF-P1'));
    const source = new ProjectPdfSource(exportsOf(labfolder), { dir });

    const artifacts = await source.artifactsFor(group('P1'));

    expect(artifacts).toEqual([
      { key: 'pdf/P1', filename: 'P1_Buffer optimisation.pdf', mimeType: 'application/pdf', data: Buffer.from('%PDF-P1') },
    ]);
    expect(labfolder.requested[0]?.payload).toEqual({
      download_filename: 'P1_Buffer optimisation.pdf',
      settings: { preserve_entry_layout: true },
      content: { project_ids: ['P1'], entry_ids: [], template_ids: [], group_ids: [] },
      include_hidden_items: false,
    });
    expect(await readFile(join(dir, 'P1_Buffer optimisation.pdf'), 'utf-8')).toBe('%PDF-P1');
  });

  it('reuses a PDF already on disk', async () => {
    await writeFile(join(dir, 'P1_older title.pdf'), '%PDF-cached');
    const labfolder = new FakeLabfolder();
    const source = new ProjectPdfSource(exportsOf(labfolder), { dir });

    const artifacts = await source.artifactsFor(group('P1'));

    expect(described(artifacts)).toEqual([
      { key: 'pdf/P1', filename: 'P1_older title.pdf', mimeType: 'application/pdf', text: '%PDF-cached' },
    ]);
    expect(labfolder.calls).toEqual([]);
  });

  it('has nothing for entries without a project', async () => {
    const labfolder = new FakeLabfolder();
    const source = new ProjectPdfSource(exportsOf(labfolder), { dir });

    expect(await source.artifactsFor(group(UNGROUPED_PROJECT_ID))).toEqual([]);
    expect(labfolder.calls).toEqual([]);
  });
});

// ─── XHTML Export ────────────────────────────────────────────

describe('XhtmlArchive', () => {
  it('finds project folders and their index and spreadsheets', async () => {
    const archive = await XhtmlArchive.load(await xhtmlZip({ P1: 'Buffer optimisation', P2: 'Cell lines' }));

    expect(archive.projectIds().sort()).toEqual(['P1', 'P2']);
    expect(archive.hasProject('P3')).toBe(false);
    expect(described(await archive.artifacts('P1'))).toEqual([
      { key: 'xhtml/P1/index.html', filename: 'index.html', mimeType: 'text/html', text: '<html>P1</html>' },
      { key: 'xhtml/P1/tables/plate.xlsx', filename: 'plate.xlsx', mimeType: XLSX_MIME_TYPE, text: 'xlsx-P1' },
    ]);
    expect(await archive.artifacts('P3')).toEqual([]);
  });
});

describe('XhtmlExportSource', () => {
  it('works without an export when none is on disk', async () => {
    const source = new XhtmlExportSource(undefined, { dir });

    expect(await source.prepare(['P1'])).toBeNull();
    expect(await source.artifactsFor(group('P1'))).toEqual([]);
  });

  it('uses a local export without asking Labfolder', async () => {
    await writeFile(join(dir, 'xhtml_2024.zip'), await xhtmlZip({ P1: 'Buffer optimisation' }));
    const labfolder = new FakeLabfolder();
    const source = new XhtmlExportSource(exportsOf(labfolder), { dir });

    const archive = await source.prepare(['P1', 'P2']);

    expect(archive?.hasProject('P1')).toBe(true);
    expect((await source.artifactsFor(group('P1'))).map((file) => file.filename)).toEqual(['index.html', 'plate.xlsx']);
    expect(labfolder.calls).toEqual([]);
  });

  it('downloads the newest finished export when restricted and nothing is on disk', async () => {
    const labfolder = new FakeLabfolder();
    labfolder.exportList.push({
      kind: 'xhtml',
      info: { id: 'f9', status: 'FINISHED', creation_date: '2024-02-01T00:00:00' },
    });
    labfolder.exportData.set('f9', await xhtmlZip({ P1: 'Buffer optimisation' }));
    const source = new XhtmlExportSource(exportsOf(labfolder), { dir, restrict: true });

    const archive = await source.prepare(['P1']);

    expect(archive?.projectIds()).toEqual(['P1']);
    expect(labfolder.calls).toEqual(['exports:xhtml:FINISHED:0', 'download:f9']);
    expect(await readdir(dir)).toEqual(['labfolder_xhtml_f9.zip']);
  });

  it('requests a new export when the local one lacks projects', async () => {
    await writeFile(join(dir, 'labfolder_xhtml_old.zip'), await xhtmlZip({ P1: 'Buffer optimisation' }));
    const labfolder = new FakeLabfolder();
    labfolder.exportData.set('x1', await xhtmlZip({ P1: 'Buffer optimisation', P2: 'Cell lines' }));
    const source = new XhtmlExportSource(exportsOf(labfolder), { dir, restrict: true });

    const archive = await source.prepare(['P1', 'P2']);

    expect(archive?.hasProject('P2')).toBe(true);
    expect(labfolder.requested).toEqual([{ kind: 'xhtml', payload: { include_hidden_items: false } }]);
    expect((await readdir(dir)).sort()).toEqual(['labfolder_xhtml_old.zip', 'labfolder_xhtml_x1.zip']);
  });

  it('keeps the local export when a new one cannot be made', async () => {
    await writeFile(join(dir, 'labfolder_xhtml_old.zip'), await xhtmlZip({ P1: 'Buffer optimisation' }));
    const labfolder = new FakeLabfolder();
    labfolder.exportStatuses = ['ERROR'];
    const source = new XhtmlExportSource(exportsOf(labfolder), { dir, restrict: true });

    const archive = await source.prepare(['P1', 'P2']);

    expect(archive?.projectIds()).toEqual(['P1']);
    expect(labfolder.calls).not.toContain('download:x1');
  });
});
