/**
 * Run Report Display Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import chalk from 'chalk';
import { failureLocation, formatDuration, formatRunReport } from '../summary.js';
import type { FailureRecord, RunReport } from '../../migrate/types.js';
import { abortedRunReport } from '../../migrate/coordinator.js';

function report(overrides: Partial<RunReport> = {}): RunReport {
  return {
    runId: 'run_0123456789abcdef',
    status: 'done',
    source: 'fetch',
    dryRun: false,
    phases: ['fetching', 'grouping', 'transforming', 'importing', 'done'],
    counts: {
      entriesFetched: 3,
      groupsTotal: 2,
      groupsImported: 1,
      groupsPartial: 1,
      groupsFailed: 0,
      groupsSkipped: 0,
      attachmentsUploaded: 1,
    },
    experiments: [
      { projectId: 'P1', status: 'imported', experimentId: '100', entries: 2, attachments: 1 },
      { projectId: 'P2', status: 'partial', experimentId: '101', entries: 1, attachments: 0 },
    ],
    failures: [],
    startedAt: '2024-03-01T10:00:00.000Z',
    completedAt: '2024-03-01T10:00:01.500Z',
    ...overrides,
  };
}

describe('formatRunReport', () => {
  let level: typeof chalk.level;

  beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  it('summarizes a finished run', () => {
    const lines = formatRunReport(report());

    expect(lines[2]).toBe('  ✓ Migration Complete');
    expect(lines).toContain('  Run:      run_0123456789abcdef');
    expect(lines).toContain('  Duration: 1.5s');
    expect(lines).toContain('    Entries fetched:      3');
    expect(lines).toContain('    Partial:              1');
    expect(lines).toContain('    imported project P1 → experiment 100 (2 entries, 1 attachments)');
    expect(lines).toContain('    partial  project P2 → experiment 101 (1 entries, 0 attachments)');
    expect(lines.some((line) => line.includes('Failures'))).toBe(false);
  });

  it('labels dry runs and planned experiments', () => {
    const lines = formatRunReport(
      report({ dryRun: true, experiments: [{ projectId: 'P1', status: 'planned', entries: 2, attachments: 3 }] }),
    );

    expect(lines[2]).toBe('  ✓ Dry Run Complete');
    expect(lines).toContain('    planned  project P1 (2 entries, 3 attachments)');
  });

  it('gives the reason a project was skipped', () => {
    const lines = formatRunReport(
      report({
        experiments: [
          { projectId: 'P3', status: 'skipped', reason: 'absent from the XHTML export', entries: 4, attachments: 0 },
        ],
      }),
    );

    expect(lines).toContain('    skipped  project P3 (4 entries, 0 attachments), absent from the XHTML export');
  });

  it('prints a report for a run that could not start', () => {
    const lines = formatRunReport(
      abortedRunReport({ useCache: true }, new Error('Missing eLabFTW URL (--elab-url or ELABFTW_URL)')),
    );

    expect(lines[2]).toBe('  ✗ Migration Aborted');
    expect(lines[5]).toBe('  Missing eLabFTW URL (--elab-url or ELABFTW_URL)');
    expect(lines).toContain('  Source:   cache');
    expect(lines).toContain('    Project groups:       0');
  });

  it('shows the fatal error of an aborted run', () => {
    const lines = formatRunReport(
      report({ status: 'aborted', fatal: 'Labfolder login failed for emma: bad credentials', experiments: [] }),
    );

    expect(lines[2]).toBe('  ✗ Migration Aborted');
    expect(lines[5]).toBe('  Labfolder login failed for emma: bad credentials');
  });

  it('lists the first failures with their location', () => {
    const failures: FailureRecord[] = Array.from({ length: 12 }, (_, i) => ({
      scope: 'attachment',
      message: `Upload of f${i}.png failed`,
      projectId: 'P1',
      entryId: 'e1',
      elementId: `i${i}`,
    }));

    const lines = formatRunReport(report({ failures }));

    expect(lines).toContain('  Failures (12):');
    expect(lines).toContain('    [attachment] project P1 / entry e1 / element i0: Upload of f0.png failed');
    expect(lines).not.toContain('    [attachment] project P1 / entry e1 / element i10: Upload of f10.png failed');
    expect(lines).toContain('    … and 2 more (use --verbose)');

    const detailed = formatRunReport(report({ failures }), { detailed: true });
    expect(detailed).toContain('    [attachment] project P1 / entry e1 / element i11: Upload of f11.png failed');
  });
});

describe('failureLocation', () => {
  it('joins whatever identifiers are present', () => {
    expect(failureLocation({ scope: 'element', message: 'x', entryId: 'e1', elementId: 'u1' })).toBe('entry e1 / element u1');
    expect(failureLocation({ scope: 'cache', message: 'x' })).toBe('');
  });
});

describe('formatDuration', () => {
  it('scales the unit to the duration', () => {
    expect(formatDuration('2024-03-01T10:00:00.000Z', '2024-03-01T10:00:00.250Z')).toBe('250ms');
    expect(formatDuration('2024-03-01T10:00:00.000Z', '2024-03-01T10:02:05.000Z')).toBe('2m 5s');
    expect(formatDuration('bad', '2024-03-01T10:00:00.000Z')).toBe('-');
  });
});
