/**
 * Sheet → .xlsx encoding (exceljs).
 */

import ExcelJS from 'exceljs';
import JSZip from 'jszip';
import type { Sheet } from '../types.js';

export const XLSX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

const MAX_SHEET_NAME = 31;

/**
 * Excel rejects `\ / * ? : [ ]` in sheet names, names over 31 characters,
 * and duplicates (case-insensitive).
 */
export function safeSheetName(name: string, used: Set<string>): string {
  const base = name.replace(/[\\/*?:[\]]/g, '_').trim().slice(0, MAX_SHEET_NAME) || 'Sheet';

  let candidate = base;
  for (let n = 2; used.has(candidate.toLowerCase()); n++) {
    const suffix = ` (${n})`;
    candidate = base.slice(0, MAX_SHEET_NAME - suffix.length) + suffix;
  }
  used.add(candidate.toLowerCase());
  return candidate;
}

/**
 * Rewrite an archive with every entry stamped `date`, in the original entry
 * order. exceljs stamps entries with the wall clock.
 */
export async function repackArchive(archive: ArrayBuffer | Uint8Array, date: Date): Promise<Buffer> {
  const source = await JSZip.loadAsync(archive);
  const files: JSZip.JSZipObject[] = [];
  source.forEach((_path, file) => {
    if (!file.dir) files.push(file);
  });

  const target = new JSZip();
  for (const file of files) {
    target.file(file.name, await file.async('uint8array'), { date, createFolders: false });
  }
  return target.generateAsync({
    type: 'nodebuffer',
    platform: 'DOS',
    compression: 'DEFLATE',
    compressionOptions: { level: 6 },
  });
}

/**
 * Encode sheets into one workbook, one worksheet per sheet. Document and
 * archive dates are pinned to `timestamp`, so the same input always yields
 * the same bytes.
 */
export async function encodeWorkbook(sheets: readonly Sheet[], timestamp: Date): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'eln-migrate';
  workbook.created = timestamp;
  workbook.modified = timestamp;

  const used = new Set<string>();
  if (sheets.length === 0) {
    workbook.addWorksheet(safeSheetName('Sheet1', used));
  }
  for (const sheet of sheets) {
    const worksheet = workbook.addWorksheet(safeSheetName(sheet.name, used));
    worksheet.addRows(sheet.rows);
  }

  return repackArchive(await workbook.xlsx.writeBuffer(), timestamp);
}
