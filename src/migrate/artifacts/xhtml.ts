/**
 * XHTML Export
 *
 * A Labfolder XHTML export is a zip with one folder per project:
 *
 *   projects/<group folder>/<projectId>_<title>/index.html
 *   projects/<group folder>/<projectId>_<title>/**.xlsx
 *
 * Each project's index.html and spreadsheets are attached to its experiment.
 * Downloaded exports are kept as `<dir>/labfolder_xhtml_<exportId>.zip`.
 * Without `restrict` only a zip already on disk is used and Labfolder is
 * never asked for one.
 */

import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import JSZip from 'jszip';
import type { ArtifactSource, Attachment, PreparedGroup } from '../types.js';
import type { LabfolderExports } from '../labfolder/exports.js';
import { XLSX_MIME_TYPE } from '../transform/spreadsheet.js';
import { errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../../logging.js';
import { listFiles } from './files.js';

const ARCHIVE_NAME = /^(labfolder_)?xhtml_.+\.zip$/;

/** `<prefix>projects/<group>/<project folder>/` */
const PROJECT_FOLDER = /^(.*?(?:^|\/)projects\/[^/]+\/([^/]+)\/)/;

interface ProjectFolder {
  prefix: string;
  newest: number;
}

export class XhtmlArchive {
  private constructor(
    private readonly zip: JSZip,
    private readonly folders: ReadonlyMap<string, ProjectFolder>,
  ) {}

  static async load(data: Buffer | Uint8Array): Promise<XhtmlArchive> {
    const zip = await JSZip.loadAsync(data);
    const folders = new Map<string, ProjectFolder>();

    zip.forEach((path, file) => {
      if (file.dir) return;
      const match = PROJECT_FOLDER.exec(path);
      const prefix = match?.[1];
      const folder = match?.[2];
      if (!prefix || !folder) return;

      const separator = folder.indexOf('_');
      if (separator <= 0) return;
      const projectId = folder.slice(0, separator);

      // Several folders for one project: the most recently written wins
      const time = file.date.getTime();
      const known = folders.get(projectId);
      if (!known) {
        folders.set(projectId, { prefix, newest: time });
      } else if (known.prefix === prefix) {
        known.newest = Math.max(known.newest, time);
      } else if (time > known.newest) {
        folders.set(projectId, { prefix, newest: time });
      }
    });

    return new XhtmlArchive(zip, folders);
  }

  projectIds(): string[] {
    return [...this.folders.keys()];
  }

  hasProject(projectId: string): boolean {
    return this.folders.has(projectId);
  }

  /**
   * The project's index.html, then every .xlsx below its folder in archive
   * order.
   */
  async artifacts(projectId: string): Promise<Attachment[]> {
    const folder = this.folders.get(projectId);
    if (!folder) return [];

    const index = this.zip.file(`${folder.prefix}index.html`);
    const sheets: JSZip.JSZipObject[] = [];
    this.zip.forEach((path, file) => {
      if (!file.dir && path.startsWith(folder.prefix) && path.toLowerCase().endsWith('.xlsx')) {
        sheets.push(file);
      }
    });

    const attachments: Attachment[] = [];
    if (index) {
      attachments.push(await this.toAttachment(projectId, folder.prefix, index, 'text/html'));
    }
    for (const sheet of sheets) {
      attachments.push(await this.toAttachment(projectId, folder.prefix, sheet, XLSX_MIME_TYPE));
    }
    return attachments;
  }

  private async toAttachment(
    projectId: string,
    prefix: string,
    file: JSZip.JSZipObject,
    mimeType: string,
  ): Promise<Attachment> {
    const relative = file.name.slice(prefix.length);
    return {
      key: `xhtml/${encodeURIComponent(projectId)}/${relative}`,
      filename: basename(relative),
      mimeType,
      data: await file.async('nodebuffer'),
    };
  }
}

// ─── Source ──────────────────────────────────────────────────

export interface XhtmlExportOptions {
  /** Directory holding downloaded export zips */
  dir: string;
  /** Import only projects present in the export, fetching one if needed */
  restrict?: boolean;
  logger?: Logger;
}

export class XhtmlExportSource implements ArtifactSource {
  readonly name = 'XHTML export';
  readonly restrict: boolean;
  private readonly dir: string;
  private readonly logger: Logger;
  private archive: XhtmlArchive | null = null;

  /**
   * `exports` is only used with `restrict`; without it the source works
   * from local zips alone.
   */
  constructor(
    private readonly exports: LabfolderExports | undefined,
    options: XhtmlExportOptions,
  ) {
    this.dir = options.dir;
    this.restrict = options.restrict ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Settle on the archive used for this run. With `restrict`, an export
   * missing some of `projectIds` is replaced by a fresh one once.
   */
  async prepare(projectIds: readonly string[]): Promise<XhtmlArchive | null> {
    let archive = await this.loadLocal();

    if (this.restrict) {
      const missing = (candidate: XhtmlArchive | null) => projectIds.filter((id) => !candidate?.hasProject(id));

      if (missing(archive).length > 0) {
        try {
          archive = (await this.fetchRemote(archive === null)) ?? archive;
        } catch (err) {
          this.logger.warn(`Could not obtain an XHTML export: ${errorMessage(err)}`);
        }
      }
      const absent = missing(archive);
      if (absent.length > 0) {
        this.logger.warn(`${absent.length} project(s) are not in the XHTML export and will be skipped`, {
          projects: absent.slice(0, 24).join(', '),
        });
      }
    } else if (!archive) {
      this.logger.info('No local XHTML export; continuing without XHTML attachments');
    }

    this.archive = archive;
    return archive;
  }

  async artifactsFor(group: PreparedGroup): Promise<Attachment[]> {
    return this.archive ? this.archive.artifacts(group.projectId) : [];
  }

  /** Most recently written export zip in `dir` */
  private async loadLocal(): Promise<XhtmlArchive | null> {
    const candidates = (await listFiles(this.dir)).filter((name) => ARCHIVE_NAME.test(name));
    if (candidates.length === 0) return null;

    const timed = await Promise.all(
      candidates.map(async (name) => ({ name, mtime: (await stat(join(this.dir, name))).mtimeMs })),
    );
    timed.sort((a, b) => b.mtime - a.mtime);
    const latest = timed[0];
    if (!latest) return null;

    const path = join(this.dir, latest.name);
    try {
      const archive = await XhtmlArchive.load(await readFile(path));
      this.logger.info(`Using XHTML export ${latest.name}`);
      return archive;
    } catch (err) {
      this.logger.warn(`Ignoring unreadable XHTML export ${path}: ${errorMessage(err)}`);
      return null;
    }
  }

  /**
   * Without a local export, reuse the newest finished one; otherwise (or
   * when there is none) request a new export and wait for it.
   */
  private async fetchRemote(reuseFinished: boolean): Promise<XhtmlArchive | null> {
    const { exports } = this;
    if (!exports) {
      this.logger.warn('Fetching an XHTML export requires Labfolder credentials');
      return null;
    }

    if (reuseFinished) {
      const finished = await exports.latestFinished('xhtml');
      if (finished) {
        this.logger.info(`Reusing finished XHTML export ${finished.id}`);
        return this.downloadAndStore(exports, finished.id);
      }
    }

    this.logger.info('Requesting a new XHTML export');
    const exportId = await exports.create('xhtml', { include_hidden_items: false });
    await exports.waitUntilFinished('xhtml', exportId);
    return this.downloadAndStore(exports, exportId);
  }

  private async downloadAndStore(exports: LabfolderExports, exportId: string): Promise<XhtmlArchive> {
    const payload = await exports.download('xhtml', exportId);
    const archive = await XhtmlArchive.load(payload.data);
    await mkdir(this.dir, { recursive: true });
    await writeFile(join(this.dir, `labfolder_xhtml_${exportId}.zip`), payload.data);
    return archive;
  }
}
