#!/usr/bin/env node

/**
 * eln-migrate CLI
 *
 * Move Labfolder notebook entries into eLabFTW experiments.
 *
 * Usage:
 *   eln-migrate init                  Write a starter config
 *   eln-migrate migrate [options]     Fetch, convert and import
 *   eln-migrate cache <path>          Summarize a cache file
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { createRequire } from 'node:module';
import { z } from 'zod';
import { initCommand, migrateCommand, cacheCommand } from './commands/index.js';
import { LOG_LEVELS } from './logging.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const { version } = z.object({ version: z.string() }).parse(require('../package.json'));

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name('eln-migrate')
  .description('Migrate Labfolder notebook entries into eLabFTW experiments.')
  .version(version);

// ─── eln-migrate init ────────────────────────────────────────

program
  .command('init')
  .description('Write .eln-migrate/config.json in the current directory')
  .option('-f, --force', 'Overwrite an existing config')
  .action(initCommand);

// ─── eln-migrate migrate ─────────────────────────────────────

program
  .command('migrate')
  .description('Fetch entries from Labfolder and import them into eLabFTW')
  .option('-u, --username <username>', 'Labfolder username')
  .option('-p, --password <password>', 'Labfolder password')
  .option('--url <url>', 'Labfolder API base URL')
  .option('--elab-url <url>', 'eLabFTW API base URL')
  .option('--elab-key <key>', 'eLabFTW API key')
  .option('-a, --author <name>', 'Only migrate entries by this author (repeatable)', collect)
  .option('--cache <path>', 'Cache file (.parquet, .jsonl.gz or .json.gz)')
  .option('--use-cache', 'Read entries from the cache instead of Labfolder')
  .option('--isa-ids <path>', 'CSV of ISA-study IDs per project')
  .option('--user-map <path>', 'CSV mapping authors to eLabFTW users')
  .option('--category <id>', 'eLabFTW experiment category ID', positiveInt)
  .option('--group-concurrency <n>', 'Projects imported at once', positiveInt)
  .option('--upload-concurrency <n>', 'Uploads per project at once', positiveInt)
  .option('--skip-existing', 'Skip projects that already have an experiment')
  .option('--exports-dir <path>', 'Where project PDFs and XHTML exports are kept')
  .option('--no-pdf', 'Do not attach a Labfolder PDF export per project')
  .option('--no-xhtml', 'Do not attach files from the XHTML export')
  .option('--only-projects-from-xhtml', 'Import only projects present in the XHTML export')
  .option('--dry-run', 'Stop after conversion; write nothing to eLabFTW')
  .addOption(new Option('--log-level <level>', 'Console log level').choices(LOG_LEVELS))
  .option('--log-file <path>', 'Append a plain-text log to this file')
  .option('-v, --verbose', 'Debug logging and every failure in the report')
  .option('--no-color', 'Disable colored output')
  .action(migrateCommand);

// ─── eln-migrate cache ───────────────────────────────────────

program
  .command('cache <path>')
  .description('Summarize the entries stored in a cache file')
  .option('--json', 'Output as JSON')
  .action(cacheCommand);

program.parse();
