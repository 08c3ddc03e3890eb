/**
 * Element Transformer
 *
 * Converts each element into an HTML fragment plus an optional attachment.
 * Dispatch is exhaustive over Element['kind']; an unrecognized kind fails
 * only its own element.
 */

import type {
  Attachment,
  Element,
  Entry,
  FailureRecord,
  PreparedGroup,
  ProjectGroup,
  Sheet,
  TransformedEntry,
  TransformedUnit,
} from '../types.js';
import { UnsupportedElementError, errorMessage } from '../errors.js';
import { attachmentKey, escapeHtml, placeholder, renderDataTable, renderSheetPreview } from './html.js';
import { XLSX_MIME_TYPE, encodeWorkbook } from './spreadsheet.js';
import { silentLogger, type Logger } from '../../logging.js';

export const DEFAULT_PREVIEW_ROWS = 10;

export interface TransformerOptions {
  /** Rows per sheet shown inline for tables and well plates */
  previewRows?: number;
  logger?: Logger;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled element: ${JSON.stringify(value)}`);
}

/** Entry creation time, or the epoch when the source timestamp is unparseable */
function entryTimestamp(entry: Entry): Date {
  const parsed = new Date(entry.createdAt);
  return Number.isNaN(parsed.getTime()) ? new Date(0) : parsed;
}

export class ElementTransformer {
  private readonly previewRows: number;
  private readonly logger: Logger;

  constructor(options: TransformerOptions = {}) {
    this.previewRows = options.previewRows ?? DEFAULT_PREVIEW_ROWS;
    this.logger = options.logger ?? silentLogger;
  }

  async transform(element: Element, entry: Entry): Promise<TransformedUnit> {
    const key = attachmentKey(entry.id, element.id);
    const base = { entryId: entry.id, elementId: element.id };

    switch (element.kind) {
      case 'table':
      case 'well_plate': {
        const attachment = await this.workbookAttachment(key, element.kind, entry, element.id, element.sheets);
        return {
          ...base,
          kind: element.kind,
          html: this.renderSheets(element.kind, key, attachment.filename, element.sheets),
          attachment,
        };
      }

      case 'text':
        return { ...base, kind: 'text', html: element.content };

      case 'file':
        return {
          ...base,
          kind: 'file',
          html: `<p>[Attached FILE: <a href="${placeholder(key)}">${escapeHtml(element.filename)}</a>]</p>`,
          attachment: { key, filename: element.filename, mimeType: element.mimeType, data: element.data },
        };

      case 'image':
        return {
          ...base,
          kind: 'image',
          html: `<p><img src="${placeholder(key)}" alt="${escapeHtml(element.filename)}" /></p>`,
          attachment: { key, filename: element.filename, mimeType: element.mimeType, data: element.data },
        };

      case 'data':
        return { ...base, kind: 'data', html: renderDataTable(element.items) };

      case 'unrecognized':
        throw new UnsupportedElementError(entry.id, element.id, element.sourceType);

      default:
        return assertNever(element);
    }
  }

  /**
   * Transform every element of an entry, in order. A failing element is
   * reported and skipped; its siblings are unaffected.
   */
  async transformEntry(entry: Entry, onFailure?: (failure: FailureRecord) => void): Promise<TransformedEntry> {
    const units: TransformedUnit[] = [];

    for (const element of entry.elements) {
      try {
        units.push(await this.transform(element, entry));
      } catch (err) {
        const failure: FailureRecord = {
          scope: 'element',
          message: errorMessage(err),
          entryId: entry.id,
          elementId: element.id,
          projectId: entry.projectId ?? undefined,
        };
        this.logger.warn(`Skipping element: ${failure.message}`);
        onFailure?.(failure);
      }
    }

    return { entry, units };
  }

  async transformGroup(group: ProjectGroup, onFailure?: (failure: FailureRecord) => void): Promise<PreparedGroup> {
    const entries: TransformedEntry[] = [];
    for (const entry of group.entries) {
      entries.push(await this.transformEntry(entry, onFailure));
    }
    return { projectId: group.projectId, entries };
  }

  // ─── Tables & well plates ────────────────────────────────

  private async workbookAttachment(
    key: string,
    kind: 'table' | 'well_plate',
    entry: Entry,
    elementId: string,
    sheets: readonly Sheet[],
  ): Promise<Attachment> {
    return {
      key,
      filename: `${kind}_${entry.id}_${elementId}.xlsx`,
      mimeType: XLSX_MIME_TYPE,
      data: await encodeWorkbook(sheets, entryTimestamp(entry)),
    };
  }

  private renderSheets(kind: 'table' | 'well_plate', key: string, filename: string, sheets: readonly Sheet[]): string {
    const label = kind === 'table' ? 'TABLE' : 'WELL PLATE';
    const reference = `<p>[Attached ${label}: <a href="${placeholder(key)}">${escapeHtml(filename)}</a>]</p>`;
    return reference + sheets.map((sheet) => renderSheetPreview(sheet, this.previewRows)).join('');
  }
}
