/**
 * Project PDF
 *
 * One Labfolder PDF export per project (entry layout preserved), kept under
 * `<dir>/<projectId>_<title>.pdf` and reused by later runs.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { ArtifactSource, Attachment, PreparedGroup } from '../types.js';
import { UNGROUPED_PROJECT_ID } from '../types.js';
import type { LabfolderExports } from '../labfolder/exports.js';
import { silentLogger, type Logger } from '../../logging.js';
import { listFiles } from './files.js';

export const PDF_MIME_TYPE = 'application/pdf';

export interface ProjectPdfOptions {
  /** Directory holding downloaded PDFs */
  dir: string;
  logger?: Logger;
}

/** Keep letters, digits and `-_ .`; everything else becomes `_` */
export function safeFileTitle(title: string): string {
  return title.replace(/[^\p{L}\p{N}\-_ .]/gu, '_').trim();
}

export function pdfFilename(projectId: string, projectTitle: string): string {
  return `${projectId}_${safeFileTitle(projectTitle) || `project_${projectId}`}.pdf`;
}

export class ProjectPdfSource implements ArtifactSource {
  readonly name = 'Project PDF';
  private readonly dir: string;
  private readonly logger: Logger;

  constructor(
    private readonly exports: LabfolderExports,
    options: ProjectPdfOptions,
  ) {
    this.dir = options.dir;
    this.logger = options.logger ?? silentLogger;
  }

  async artifactsFor(group: PreparedGroup): Promise<Attachment[]> {
    const { projectId } = group;
    if (projectId === UNGROUPED_PROJECT_ID) return [];

    const cached = await this.cachedPdf(projectId);
    if (cached) {
      this.logger.debug(`Reusing project PDF ${basename(cached)}`, { project: projectId });
      return [await this.attachment(projectId, cached)];
    }

    const projectTitle = group.entries[0]?.entry.projectTitle || `project_${projectId}`;
    const requested = pdfFilename(projectId, projectTitle);

    this.logger.info(`Requesting PDF export for project ${projectId}`);
    const exportId = await this.exports.create('pdf', {
      download_filename: requested,
      settings: { preserve_entry_layout: true },
      content: { project_ids: [projectId], entry_ids: [], template_ids: [], group_ids: [] },
      include_hidden_items: false,
    });
    const finished = await this.exports.waitUntilFinished('pdf', exportId);
    const payload = await this.exports.download('pdf', exportId);

    const path = join(this.dir, basename(finished.download_filename || requested));
    await mkdir(this.dir, { recursive: true });
    await writeFile(path, payload.data);
    return [this.toAttachment(projectId, path, payload.data)];
  }

  /** Last cached PDF for the project in name order */
  private async cachedPdf(projectId: string): Promise<string | undefined> {
    const names = (await listFiles(this.dir))
      .filter((name) => name.startsWith(`${projectId}_`) && name.endsWith('.pdf'))
      .sort();
    const last = names[names.length - 1];
    return last === undefined ? undefined : join(this.dir, last);
  }

  private async attachment(projectId: string, path: string): Promise<Attachment> {
    return this.toAttachment(projectId, path, await readFile(path));
  }

  private toAttachment(projectId: string, path: string, data: Buffer): Attachment {
    return { key: `pdf/${encodeURIComponent(projectId)}`, filename: basename(path), mimeType: PDF_MIME_TYPE, data };
  }
}
