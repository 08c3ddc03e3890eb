/**
 * Run Report Display
 */

import chalk from 'chalk';
import type { ExperimentSummary, FailureRecord, RunReport } from '../migrate/types.js';

export interface SummaryOptions {
  /** List every failure instead of the first few */
  detailed?: boolean;
}

const RULE = '━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━';
const FAILURE_PREVIEW = 10;

export function formatDuration(startedAt: string, completedAt: string): string {
  const ms = Math.max(0, Date.parse(completedAt) - Date.parse(startedAt));
  if (Number.isNaN(ms)) return '-';
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${Math.floor(ms / 60000)}m ${Math.round((ms % 60000) / 1000)}s`;
}

/** Where a failure happened, e.g. `project P1 / entry 7 / element 3` */
export function failureLocation(failure: FailureRecord): string {
  const parts: string[] = [];
  if (failure.projectId) parts.push(`project ${failure.projectId}`);
  if (failure.entryId) parts.push(`entry ${failure.entryId}`);
  if (failure.elementId) parts.push(`element ${failure.elementId}`);
  return parts.join(' / ');
}

function experimentLine(experiment: ExperimentSummary): string {
  const target = experiment.experimentId ? ` → experiment ${experiment.experimentId}` : '';
  const reason = experiment.reason ? `, ${experiment.reason}` : '';
  return `    ${experiment.status.padEnd(8)} project ${experiment.projectId}${target} (${experiment.entries} entries, ${experiment.attachments} attachments)${reason}`;
}

/**
 * Report lines, without trailing newlines.
 */
export function formatRunReport(report: RunReport, options: SummaryOptions = {}): string[] {
  const aborted = report.status === 'aborted';
  const color = aborted ? chalk.red.bold : chalk.green.bold;
  const title = aborted ? '  ✗ Migration Aborted' : report.dryRun ? '  ✓ Dry Run Complete' : '  ✓ Migration Complete';
  const { counts } = report;

  const lines: string[] = ['', color(RULE), color(title), color(RULE), ''];

  if (report.fatal) {
    lines.push(chalk.red(`  ${report.fatal}`), '');
  }

  lines.push(
    `  ${chalk.white('Run:')}      ${report.runId}`,
    `  ${chalk.white('Source:')}   ${report.source}`,
    `  ${chalk.white('Duration:')} ${formatDuration(report.startedAt, report.completedAt)}`,
    '',
    chalk.white.bold('  Counts:'),
    `    Entries fetched:      ${counts.entriesFetched}`,
    `    Project groups:       ${counts.groupsTotal}`,
    `    Imported:             ${counts.groupsImported}`,
    `    Partial:              ${counts.groupsPartial}`,
    `    Failed:               ${counts.groupsFailed}`,
    `    Skipped:              ${counts.groupsSkipped}`,
    `    Attachments uploaded: ${counts.attachmentsUploaded}`,
  );

  if (report.experiments.length > 0) {
    lines.push('', chalk.white.bold('  Experiments:'), ...report.experiments.map(experimentLine));
  }

  if (report.failures.length > 0) {
    const shown = options.detailed ? report.failures : report.failures.slice(0, FAILURE_PREVIEW);
    lines.push('', chalk.yellow.bold(`  Failures (${report.failures.length}):`));
    for (const failure of shown) {
      const where = failureLocation(failure);
      lines.push(chalk.yellow(`    [${failure.scope}] ${where ? `${where}: ` : ''}${failure.message}`));
    }
    if (shown.length < report.failures.length) {
      lines.push(chalk.dim(`    … and ${report.failures.length - shown.length} more (use --verbose)`));
    }
  }

  lines.push('');
  return lines;
}

export function showRunSummary(report: RunReport, options: SummaryOptions = {}): void {
  for (const line of formatRunReport(report, options)) {
    console.log(line);
  }
}
