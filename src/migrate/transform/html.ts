/**
 * HTML rendering for experiment bodies.
 */

import type { DataItem, Entry, PreparedGroup, Sheet, TransformedEntry } from '../types.js';
import { authorName } from '../grouper.js';

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

// ─── Attachment placeholders ─────────────────────────────────

/**
 * Both IDs are URI-encoded, so `/` only ever appears as the separator and
 * distinct (entry, element) pairs never share a key.
 */
export function attachmentKey(entryId: string, elementId: string): string {
  return `${encodeURIComponent(entryId)}/${encodeURIComponent(elementId)}`;
}

export function placeholder(key: string): string {
  return `{{attachment:${key}}}`;
}

const PLACEHOLDER = /\{\{attachment:([^}]+)\}\}/g;

/**
 * Replace placeholders whose key has a location; unknown keys stay as they are.
 */
export function fillPlaceholders(html: string, locations: ReadonlyMap<string, string>): string {
  return html.replace(PLACEHOLDER, (match, key: string) => {
    const location = locations.get(key);
    return location === undefined ? match : escapeHtml(location);
  });
}

// ─── Element fragments ───────────────────────────────────────

export function renderDataTable(items: readonly DataItem[]): string {
  const rows = items
    .map(
      (item) =>
        `<tr><td>${escapeHtml(item.title)}</td><td>${escapeHtml(item.value)}</td><td>${escapeHtml(item.unit)}</td></tr>`,
    )
    .join('');
  return `<table><tr><th>Title</th><th>Value</th><th>Unit</th></tr>${rows}</table>`;
}

export function renderSheetPreview(sheet: Sheet, maxRows: number): string {
  const shown = sheet.rows.slice(0, Math.max(0, maxRows));
  const rows = shown
    .map((row) => `<tr>${row.map((cell) => `<td>${escapeHtml(cell === null ? '' : String(cell))}</td>`).join('')}</tr>`)
    .join('');

  let html = `<table><caption>${escapeHtml(sheet.name)}</caption>${rows}</table>`;
  if (sheet.rows.length > shown.length) {
    html += `<p><em>Showing first ${shown.length} of ${sheet.rows.length} rows.</em></p>`;
  }
  return html;
}

// ─── Entry and project framing ───────────────────────────────

/** Calendar date part of a source timestamp, as written by the source */
export function creationDate(timestamp: string): string {
  const match = /^(\d{4}-\d{2}-\d{2})/.exec(timestamp);
  return match?.[1] ?? timestamp;
}

export function renderEntryBlock(
  transformed: TransformedEntry,
  position: number,
  total: number,
  fragments: readonly string[],
): string {
  const { entry } = transformed;
  const number = entry.entryNumber ?? position;
  const count = entry.projectEntryCount ?? total;
  const tags = entry.tags.map((tag) => `§${escapeHtml(tag)}`).join(' ');

  const header =
    `\n----Entry ${number} of ${count}----<br>` +
    `<strong>Entry: ${escapeHtml(entry.title)} (labfolder id: ${escapeHtml(entry.id)})</strong><br>` +
    `<strong>Tags:</strong> ${tags}<br>`;

  return header + fragments.join('\n') + '<br>' + `Created: ${creationDate(entry.createdAt)}<br>` + '<hr><hr>';
}

function latestEdit(entries: readonly Entry[]): string {
  let latest = '';
  for (const entry of entries) {
    const edited = entry.lastEditedAt ?? entry.createdAt;
    if (edited > latest) latest = edited;
  }
  return latest;
}

export function renderProjectFooter(group: PreparedGroup): string {
  const entries = group.entries.map((transformed) => transformed.entry);
  const first = entries[0];
  return (
    '<div style="text-align: right; margin-top: 20px;">' +
    '<h5 style="margin:0 0 4px 0;">Labfolder Info</h5>' +
    `Project created: ${escapeHtml(first?.projectCreatedAt ?? '')}<br>` +
    `Labfolder project id: ${escapeHtml(group.projectId)}<br>` +
    `Author: ${escapeHtml(first ? authorName(first.author) : '')}<br>` +
    `Last edited: ${escapeHtml(latestEdit(entries))}<br>` +
    '</div>'
  );
}

/**
 * Full experiment body: every entry block in order, then the project footer.
 */
export function renderExperimentBody(group: PreparedGroup, locations: ReadonlyMap<string, string>): string {
  const total = group.entries.length;
  const blocks = group.entries.map((transformed, index) =>
    renderEntryBlock(
      transformed,
      index + 1,
      total,
      transformed.units.map((unit) => fillPlaceholders(unit.html, locations)),
    ),
  );
  return blocks.join('') + renderProjectFooter(group);
}
