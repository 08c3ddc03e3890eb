/**
 * Labfolder Exports
 *
 * Request, poll and download server-side PDF / XHTML exports. Labfolder does
 * not return the new export from the create call, so the newest pending or
 * finished export is taken as the one just requested.
 */

import type { ExportKind, LabfolderExportApi } from './client.js';
import type { LabfolderExport } from './schema.js';
import type { BinaryPayload } from './session.js';
import { ExportError } from '../errors.js';
import { silentLogger, type Logger } from '../../logging.js';

export const PENDING_EXPORT_STATUSES = 'NEW,RUNNING,QUEUED,FINISHED';

const FAILED_STATUSES = new Set(['ERROR', 'REMOVED', 'ABORT_PARALLEL']);

const LIST_PAGE_SIZE = 50;

export interface ExportPolling {
  pollIntervalMs: number;
  timeoutMs: number;
}

export const PDF_EXPORT_POLLING: ExportPolling = { pollIntervalMs: 3_000, timeoutMs: 30 * 60_000 };
export const XHTML_EXPORT_POLLING: ExportPolling = { pollIntervalMs: 10_000, timeoutMs: 2 * 60 * 60_000 };

export interface LabfolderExportsOptions {
  polling?: Partial<Record<ExportKind, ExportPolling>>;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  logger?: Logger;
}

/** Newest export by creation date; ties keep the first listed */
export function newestExport(exports: readonly LabfolderExport[]): LabfolderExport | undefined {
  let newest: LabfolderExport | undefined;
  for (const candidate of exports) {
    if (!newest || (candidate.creation_date ?? '') > (newest.creation_date ?? '')) {
      newest = candidate;
    }
  }
  return newest;
}

export class LabfolderExports {
  private readonly polling: Record<ExportKind, ExportPolling>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly api: LabfolderExportApi,
    options: LabfolderExportsOptions = {},
  ) {
    this.polling = {
      pdf: options.polling?.pdf ?? PDF_EXPORT_POLLING,
      xhtml: options.polling?.xhtml ?? XHTML_EXPORT_POLLING,
    };
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Request an export and return its ID.
   */
  async create(kind: ExportKind, payload: Record<string, unknown>): Promise<string> {
    await this.api.requestExport(kind, payload);
    const pending = await this.api.listExports(kind, {
      status: PENDING_EXPORT_STATUSES,
      limit: LIST_PAGE_SIZE,
      offset: 0,
    });
    const created = newestExport(pending);
    if (!created) {
      throw new ExportError('', `Requesting a ${kind.toUpperCase()} export returned no export`);
    }
    this.logger.debug(`Requested ${kind.toUpperCase()} export`, { id: created.id });
    return created.id;
  }

  /**
   * Newest finished export, paging through the whole listing.
   */
  async latestFinished(kind: ExportKind): Promise<LabfolderExport | undefined> {
    const finished: LabfolderExport[] = [];
    for (let offset = 0; ; offset += LIST_PAGE_SIZE) {
      const page = await this.api.listExports(kind, { status: 'FINISHED', limit: LIST_PAGE_SIZE, offset });
      finished.push(...page);
      if (page.length < LIST_PAGE_SIZE) break;
    }
    return newestExport(finished);
  }

  /**
   * Poll until the export is FINISHED and return its final state.
   */
  async waitUntilFinished(kind: ExportKind, exportId: string): Promise<LabfolderExport> {
    const { pollIntervalMs, timeoutMs } = this.polling[kind];
    const deadline = this.now() + timeoutMs;
    let lastStatus = '';

    while (this.now() < deadline) {
      const info = await this.api.getExport(kind, exportId);
      const status = (info.status ?? '').toUpperCase();
      if (status !== lastStatus) {
        this.logger.info(`${kind.toUpperCase()} export ${exportId}: ${status || 'UNKNOWN'}`);
        lastStatus = status;
      }

      if (status === 'FINISHED') return info;
      if (FAILED_STATUSES.has(status)) {
        throw new ExportError(exportId, `${kind.toUpperCase()} export ${exportId} ended with status ${status}`);
      }
      await this.sleep(pollIntervalMs);
    }

    throw new ExportError(exportId, `Timed out waiting for ${kind.toUpperCase()} export ${exportId}`);
  }

  download(kind: ExportKind, exportId: string): Promise<BinaryPayload> {
    return this.api.downloadExport(kind, exportId);
  }
}
