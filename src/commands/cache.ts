/**
 * eln-migrate cache <path>: summarize a cache file
 */

import chalk from 'chalk';
import type { Entry, ElementKind } from '../migrate/types.js';
import { UNGROUPED_PROJECT_ID } from '../migrate/types.js';
import { createCacheStore } from '../migrate/cache/store.js';
import { groupEntries, authorName } from '../migrate/grouper.js';
import { errorMessage } from '../migrate/errors.js';
import { error } from '../cli/progress.js';

export interface CacheSummary {
  entries: number;
  projects: number;
  authors: string[];
  elements: Partial<Record<ElementKind, number>>;
  attachmentBytes: number;
}

export function summarizeEntries(entries: readonly Entry[]): CacheSummary {
  const elements: Partial<Record<ElementKind, number>> = {};
  const authors = new Set<string>();
  let attachmentBytes = 0;

  for (const entry of entries) {
    authors.add(authorName(entry.author));
    for (const element of entry.elements) {
      elements[element.kind] = (elements[element.kind] ?? 0) + 1;
      if (element.kind === 'file' || element.kind === 'image') {
        attachmentBytes += element.data.length;
      }
    }
  }

  return {
    entries: entries.length,
    projects: groupEntries(entries).size,
    authors: [...authors].sort(),
    elements,
    attachmentBytes,
  };
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export async function cacheCommand(path: string, options: { json?: boolean } = {}): Promise<void> {
  let entries: Entry[];
  try {
    entries = await createCacheStore(path).load();
  } catch (err) {
    error(errorMessage(err));
    process.exit(1);
  }

  const summary = summarizeEntries(entries);
  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }

  const ungrouped = entries.filter((entry) => entry.projectId === null).length;

  console.log();
  console.log(chalk.bold(`  Cache: ${path}`));
  console.log();
  console.log(`  ${chalk.white('Entries:')}  ${summary.entries}`);
  console.log(`  ${chalk.white('Projects:')} ${summary.projects}${ungrouped ? chalk.dim(` (${ungrouped} entries in ${UNGROUPED_PROJECT_ID})`) : ''}`);
  console.log(`  ${chalk.white('Authors:')}  ${summary.authors.join(', ') || '-'}`);
  console.log(`  ${chalk.white('Binary:')}   ${formatBytes(summary.attachmentBytes)}`);
  console.log();
  console.log(chalk.white.bold('  Elements:'));
  for (const [kind, count] of Object.entries(summary.elements)) {
    console.log(`    ${kind.padEnd(12)} ${count}`);
  }
  console.log();
}
