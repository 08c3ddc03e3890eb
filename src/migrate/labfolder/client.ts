/**
 * Labfolder API Client
 *
 * Endpoint bindings over a LabfolderSession. The fetcher depends on the
 * LabfolderApi interface so tests can substitute an in-memory source.
 */

import type { DataItem, Sheet } from '../types.js';
import { LabfolderSession, type BinaryPayload, type LabfolderSessionConfig } from './session.js';
import {
  dataElementSchema,
  labfolderEntryPageSchema,
  labfolderExportListSchema,
  labfolderExportSchema,
  sheetElementSchema,
  textElementSchema,
  type LabfolderEntry,
  type LabfolderExport,
} from './schema.js';
import { flattenDataItems, normalizeSheets } from './normalize.js';

export interface LabfolderApi {
  authenticate(): Promise<void>;
  listEntries(offset: number, limit: number): Promise<LabfolderEntry[]>;
  getText(elementId: string): Promise<string>;
  getTable(elementId: string): Promise<Sheet[]>;
  getWellPlate(elementId: string): Promise<Sheet[]>;
  getData(elementId: string): Promise<DataItem[]>;
  downloadFile(elementId: string): Promise<BinaryPayload>;
  downloadImage(elementId: string): Promise<BinaryPayload>;
}

export type ExportKind = 'pdf' | 'xhtml';

export interface ExportListQuery {
  /** Comma-separated statuses, e.g. `FINISHED` */
  status?: string;
  limit: number;
  offset: number;
}

/**
 * Server-side PDF and XHTML exports (`exports/pdf`, `exports/xhtml`).
 */
export interface LabfolderExportApi {
  requestExport(kind: ExportKind, payload: Record<string, unknown>): Promise<void>;
  listExports(kind: ExportKind, query: ExportListQuery): Promise<LabfolderExport[]>;
  getExport(kind: ExportKind, exportId: string): Promise<LabfolderExport>;
  downloadExport(kind: ExportKind, exportId: string): Promise<BinaryPayload>;
}

export class LabfolderClient implements LabfolderApi, LabfolderExportApi {
  private readonly session: LabfolderSession;

  constructor(sessionOrConfig: LabfolderSession | LabfolderSessionConfig) {
    this.session =
      sessionOrConfig instanceof LabfolderSession ? sessionOrConfig : new LabfolderSession(sessionOrConfig);
  }

  async authenticate(): Promise<void> {
    await this.session.login();
  }

  listEntries(offset: number, limit: number): Promise<LabfolderEntry[]> {
    return this.session.getJson('entries', labfolderEntryPageSchema, {
      limit,
      offset,
      include_hidden: true,
      expand: 'author,project,last_editor',
    });
  }

  async getText(elementId: string): Promise<string> {
    const element = await this.session.getJson(`elements/text/${elementId}`, textElementSchema);
    return element.content ?? '';
  }

  async getTable(elementId: string): Promise<Sheet[]> {
    const element = await this.session.getJson(`elements/table/${elementId}`, sheetElementSchema);
    return normalizeSheets(sheetsOf(element.content) ?? element.sheets ?? element.content, 'Sheet1');
  }

  async getWellPlate(elementId: string): Promise<Sheet[]> {
    const element = await this.session.getJson(`elements/well-plate/${elementId}`, sheetElementSchema);
    return normalizeSheets(sheetsOf(element.content) ?? element.content, 'well_plate');
  }

  async getData(elementId: string): Promise<DataItem[]> {
    const element = await this.session.getJson(`elements/data/${elementId}`, dataElementSchema);
    return flattenDataItems(element.data_elements ?? []);
  }

  downloadFile(elementId: string): Promise<BinaryPayload> {
    return this.session.getBinary(`elements/file/${elementId}/download`);
  }

  downloadImage(elementId: string): Promise<BinaryPayload> {
    return this.session.getBinary(`elements/image/${elementId}/original-data`);
  }

  // ─── Exports ─────────────────────────────────────────────

  requestExport(kind: ExportKind, payload: Record<string, unknown>): Promise<void> {
    return this.session.postJson(`exports/${kind}`, payload);
  }

  listExports(kind: ExportKind, query: ExportListQuery): Promise<LabfolderExport[]> {
    return this.session.getJson(`exports/${kind}`, labfolderExportListSchema, {
      limit: query.limit,
      offset: query.offset,
      status: query.status,
    });
  }

  getExport(kind: ExportKind, exportId: string): Promise<LabfolderExport> {
    return this.session.getJson(`exports/${kind}/${exportId}`, labfolderExportSchema);
  }

  downloadExport(kind: ExportKind, exportId: string): Promise<BinaryPayload> {
    return this.session.getBinary(`exports/${kind}/${exportId}/download`);
  }
}

/** `content.sheets` when content is a SpreadJS document */
function sheetsOf(content: unknown): unknown {
  if (typeof content === 'object' && content !== null && 'sheets' in content) {
    return content.sheets;
  }
  return undefined;
}
