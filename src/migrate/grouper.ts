/**
 * Project Grouper
 *
 * Partitions entries into one group per source project. Pure.
 */

import { UNGROUPED_PROJECT_ID, type Author, type Entry, type ProjectGroup } from './types.js';

/**
 * Group entries by project ID. Map order follows first appearance and each
 * group keeps the relative order of its entries.
 */
export function groupEntries(entries: readonly Entry[]): Map<string, ProjectGroup> {
  const groups = new Map<string, ProjectGroup>();

  for (const entry of entries) {
    const projectId = entry.projectId ?? UNGROUPED_PROJECT_ID;
    let group = groups.get(projectId);
    if (!group) {
      group = { projectId, entries: [] };
      groups.set(projectId, group);
    }
    group.entries.push(entry);
  }

  return groups;
}

export function authorName(author: Author): string {
  return [author.firstName, author.lastName].filter(Boolean).join(' ');
}

/**
 * Case-insensitive match on first name or full name. Blank filters are
 * dropped first; when none remain every entry is kept.
 */
export function matchesAuthor(author: Author, filters?: readonly string[]): boolean {
  const wanted = (filters ?? []).map((filter) => filter.trim().toLowerCase()).filter((filter) => filter !== '');
  if (wanted.length === 0) return true;

  const first = author.firstName.trim().toLowerCase();
  const full = authorName(author).trim().toLowerCase();

  return wanted.some((filter) => filter === first || filter === full);
}
