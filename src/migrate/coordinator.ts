/**
 * Migration Coordinator
 *
 * Drives one run through its phases:
 * Fetch (or load) → Cache → Group → (XHTML export) → Transform → Import
 *
 * Any failure before the import phase aborts the run with no destination
 * write. Failures inside the import phase stay with their group. `run`
 * always resolves to a report.
 */

import { randomBytes } from 'node:crypto';
import pLimit from 'p-limit';

import type {
  Entry,
  ExperimentSummary,
  FailureRecord,
  GroupImportResult,
  PreparedGroup,
  ProjectGroup,
  RunPhase,
  RunReport,
} from './types.js';
import { ConfigError, errorMessage } from './errors.js';
import { groupEntries, matchesAuthor } from './grouper.js';
import type { CacheStore } from './cache/store.js';
import type { FetchOptions } from './labfolder/fetcher.js';
import { ElementTransformer } from './transform/transformer.js';
import { silentLogger, type Logger } from '../logging.js';

export const DEFAULT_GROUP_CONCURRENCY = 2;

export const ABSENT_FROM_EXPORT = 'absent from the XHTML export';

// ─── Events ──────────────────────────────────────────────────

export type MigrationEventType =
  | 'phase:start'
  | 'phase:complete'
  | 'progress'
  | 'group:complete'
  | 'failure'
  | 'complete'
  | 'error';

export interface MigrationEvent {
  type: MigrationEventType;
  phase?: RunPhase;
  /** Percent of the current phase */
  progress?: number;
  message?: string;
  error?: Error;
  failure?: FailureRecord;
  group?: GroupImportResult;
  report?: RunReport;
}

export type MigrationEventHandler = (event: MigrationEvent) => void;

// ─── Collaborators ───────────────────────────────────────────

export interface EntrySource {
  fetchEntries(options: FetchOptions): Promise<Entry[]>;
}

export interface GroupImporter {
  importGroup(group: PreparedGroup): Promise<GroupImportResult>;
}

/**
 * Settles on the XHTML export before transforming. With `restrict`, groups
 * whose project is not in the export are skipped.
 */
export interface ProjectExport {
  readonly restrict: boolean;
  prepare(projectIds: readonly string[]): Promise<{ hasProject(projectId: string): boolean } | null>;
}

export interface CoordinatorDeps {
  /** Not needed when every run reads from the cache */
  source?: EntrySource;
  /** Not needed for dry runs */
  importer?: GroupImporter;
  cache?: CacheStore;
  transformer?: ElementTransformer;
  xhtml?: ProjectExport;
  logger?: Logger;
}

export interface RunConfig {
  /** Author filters; empty keeps every entry */
  authors?: readonly string[];
  /** Read entries from the cache instead of the source */
  useCache?: boolean;
  /** Stop after the transform phase */
  dryRun?: boolean;
  groupConcurrency?: number;
}

// ─── Reports ─────────────────────────────────────────────────

export function createRunReport(config: RunConfig = {}): RunReport {
  return {
    runId: `run_${randomBytes(8).toString('hex')}`,
    status: 'done',
    source: config.useCache ? 'cache' : 'fetch',
    dryRun: config.dryRun ?? false,
    phases: [],
    counts: {
      entriesFetched: 0,
      groupsTotal: 0,
      groupsImported: 0,
      groupsPartial: 0,
      groupsFailed: 0,
      groupsSkipped: 0,
      attachmentsUploaded: 0,
    },
    experiments: [],
    failures: [],
    startedAt: new Date().toISOString(),
    completedAt: '',
  };
}

/**
 * Mark a report aborted by a fatal error.
 */
export function markAborted(report: RunReport, error: unknown): Error {
  const err = error instanceof Error ? error : new Error(String(error));
  report.status = 'aborted';
  report.fatal = err.message;
  report.phases.push('aborted');
  report.completedAt = new Date().toISOString();
  return err;
}

/**
 * Report for a run that could not start, e.g. because its configuration is
 * incomplete.
 */
export function abortedRunReport(config: RunConfig, error: unknown): RunReport {
  const report = createRunReport(config);
  markAborted(report, error);
  return report;
}

// ─── Coordinator ─────────────────────────────────────────────

export class MigrationCoordinator {
  private readonly source?: EntrySource;
  private readonly importer?: GroupImporter;
  private readonly cache?: CacheStore;
  private readonly transformer: ElementTransformer;
  private readonly xhtml?: ProjectExport;
  private readonly logger: Logger;
  private eventHandlers: MigrationEventHandler[] = [];

  constructor(deps: CoordinatorDeps) {
    this.source = deps.source;
    this.importer = deps.importer;
    this.cache = deps.cache;
    this.xhtml = deps.xhtml;
    this.logger = deps.logger ?? silentLogger;
    this.transformer = deps.transformer ?? new ElementTransformer({ logger: this.logger });
  }

  /**
   * Subscribe to run events.
   */
  on(handler: MigrationEventHandler): () => void {
    this.eventHandlers.push(handler);
    return () => {
      const index = this.eventHandlers.indexOf(handler);
      if (index >= 0) this.eventHandlers.splice(index, 1);
    };
  }

  async run(config: RunConfig = {}): Promise<RunReport> {
    const report = createRunReport(config);

    const recordFailure = (failure: FailureRecord) => {
      report.failures.push(failure);
      this.emit({ type: 'failure', failure, message: failure.message });
    };

    let prepared: PreparedGroup[];
    let excluded: ProjectGroup[] = [];
    let importer: GroupImporter | undefined;
    try {
      if (!report.dryRun) {
        importer = this.requireImporter();
      }
      const entries = await this.acquireEntries(config, report, recordFailure);
      report.counts.entriesFetched = entries.length;

      this.enterPhase(report, 'grouping', 'Grouping entries by project...');
      let groups = [...groupEntries(entries).values()];
      report.counts.groupsTotal = groups.length;
      this.completePhase('grouping', `${groups.length} project group(s)`);

      if (this.xhtml) {
        ({ groups, excluded } = await this.applyExport(this.xhtml, groups, report));
      }

      this.enterPhase(report, 'transforming', 'Converting elements...');
      prepared = [];
      for (const group of groups) {
        prepared.push(await this.transformer.transformGroup(group, recordFailure));
        this.progress(prepared.length, groups.length, `Converted project ${group.projectId}`);
      }
      this.completePhase('transforming', 'Conversion complete');
    } catch (error) {
      return this.abort(report, error);
    }

    for (const group of excluded) {
      const result: GroupImportResult = {
        status: 'skipped',
        projectId: group.projectId,
        reason: ABSENT_FROM_EXPORT,
        attachmentsUploaded: 0,
        failures: [],
      };
      this.emit({ type: 'group:complete', group: result, message: `Project ${group.projectId}: ${ABSENT_FROM_EXPORT}` });
      this.tally(report, result, group.entries.length);
    }

    if (!importer) {
      report.experiments.push(...prepared.map((group): ExperimentSummary => ({
        projectId: group.projectId,
        status: 'planned',
        entries: group.entries.length,
        attachments: group.entries.reduce(
          (count, { units }) => count + units.filter((unit) => unit.attachment).length,
          0,
        ),
      })));
      return this.finish(report);
    }

    await this.importGroups(importer, prepared, config, report, recordFailure);
    return this.finish(report);
  }

  // ─── Phase Runners ─────────────────────────────────────────

  private async acquireEntries(
    config: RunConfig,
    report: RunReport,
    recordFailure: (failure: FailureRecord) => void,
  ): Promise<Entry[]> {
    if (config.useCache) {
      this.enterPhase(report, 'fetching', 'Loading entries from cache...');
      if (!this.cache) {
        throw new ConfigError('Reading from the cache requires a cache path');
      }
      const loaded = await this.cache.load();
      const entries = loaded.filter((entry) => matchesAuthor(entry.author, config.authors));
      this.completePhase('fetching', `Loaded ${entries.length} entries from ${this.cache.path}`);
      return entries;
    }

    this.enterPhase(report, 'fetching', 'Fetching entries from Labfolder...');
    if (!this.source) {
      throw new ConfigError('Fetching requires Labfolder credentials');
    }
    const entries = await this.source.fetchEntries({
      authors: config.authors,
      onFailure: recordFailure,
      onProgress: (fetched, total) => this.progress(fetched, total, `Fetched ${fetched}/${total} entries`),
    });
    this.completePhase('fetching', `Fetched ${entries.length} entries`);

    if (this.cache) {
      this.enterPhase(report, 'caching', `Writing cache to ${this.cache.path}...`);
      try {
        await this.cache.save(entries);
        this.completePhase('caching', 'Cache written');
      } catch (error) {
        recordFailure({ scope: 'cache', message: `Cache write failed: ${errorMessage(error)}` });
        this.completePhase('caching', 'Cache write failed, continuing');
      }
    }

    return entries;
  }

  private async applyExport(
    xhtml: ProjectExport,
    groups: ProjectGroup[],
    report: RunReport,
  ): Promise<{ groups: ProjectGroup[]; excluded: ProjectGroup[] }> {
    this.enterPhase(report, 'exporting', 'Preparing XHTML export...');
    const archive = await xhtml.prepare(groups.map((group) => group.projectId));

    if (!xhtml.restrict) {
      this.completePhase('exporting', archive ? 'XHTML export ready' : 'No XHTML export');
      return { groups, excluded: [] };
    }

    const kept = groups.filter((group) => archive?.hasProject(group.projectId) ?? false);
    const excluded = groups.filter((group) => !kept.includes(group));
    this.completePhase('exporting', `${kept.length} of ${groups.length} project(s) in the XHTML export`);
    return { groups: kept, excluded };
  }

  private async importGroups(
    importer: GroupImporter,
    prepared: PreparedGroup[],
    config: RunConfig,
    report: RunReport,
    recordFailure: (failure: FailureRecord) => void,
  ): Promise<void> {
    this.enterPhase(report, 'importing', `Importing ${prepared.length} experiment(s)...`);

    const limit = pLimit(Math.max(1, config.groupConcurrency ?? DEFAULT_GROUP_CONCURRENCY));
    let done = 0;

    const results = await Promise.all(
      prepared.map((group) =>
        limit(async () => {
          const result = await this.importOne(importer, group);
          result.failures.forEach(recordFailure);
          done++;
          this.emit({ type: 'group:complete', group: result, message: `Project ${group.projectId}: ${result.status}` });
          this.progress(done, prepared.length, `Imported ${done}/${prepared.length} groups`);
          return result;
        }),
      ),
    );

    results.forEach((result, index) => this.tally(report, result, prepared[index]?.entries.length ?? 0));

    this.completePhase('importing', 'Import complete');
  }

  private tally(report: RunReport, result: GroupImportResult, entries: number): void {
    report.experiments.push(this.summarize(result, entries));
    report.counts.attachmentsUploaded += result.attachmentsUploaded;
    switch (result.status) {
      case 'imported':
        report.counts.groupsImported++;
        break;
      case 'partial':
        report.counts.groupsPartial++;
        break;
      case 'failed':
        report.counts.groupsFailed++;
        break;
      case 'skipped':
        report.counts.groupsSkipped++;
        break;
    }
  }

  /** Unexpected importer errors fail the group, never the run */
  private async importOne(importer: GroupImporter, group: PreparedGroup): Promise<GroupImportResult> {
    try {
      return await importer.importGroup(group);
    } catch (error) {
      return {
        status: 'failed',
        projectId: group.projectId,
        attachmentsUploaded: 0,
        failures: [{ scope: 'group', projectId: group.projectId, message: errorMessage(error) }],
      };
    }
  }

  private summarize(result: GroupImportResult, entries: number): ExperimentSummary {
    const summary: ExperimentSummary = {
      projectId: result.projectId,
      status: result.status,
      entries,
      attachments: result.attachmentsUploaded,
    };
    if (result.status === 'imported' || result.status === 'partial') {
      summary.experimentId = result.experiment.id;
    } else if (result.status === 'skipped') {
      if (result.existingExperimentId !== undefined) summary.experimentId = result.existingExperimentId;
      if (result.reason !== undefined) summary.reason = result.reason;
    }
    return summary;
  }

  // ─── Internals ─────────────────────────────────────────────

  private requireImporter(): GroupImporter {
    if (!this.importer) {
      throw new ConfigError('Importing requires eLabFTW settings');
    }
    return this.importer;
  }

  private enterPhase(report: RunReport, phase: RunPhase, message: string): void {
    report.phases.push(phase);
    this.emit({ type: 'phase:start', phase, message });
  }

  private completePhase(phase: RunPhase, message: string): void {
    this.emit({ type: 'phase:complete', phase, message });
  }

  private progress(done: number, total: number, message: string): void {
    const progress = total > 0 ? Math.round((done / total) * 100) : 100;
    this.emit({ type: 'progress', progress, message });
  }

  private abort(report: RunReport, error: unknown): RunReport {
    const err = markAborted(report, error);
    this.logger.error(`Run aborted: ${err.message}`);
    this.emit({ type: 'error', error: err, report });
    return report;
  }

  private finish(report: RunReport): RunReport {
    report.phases.push('done');
    report.completedAt = new Date().toISOString();
    this.emit({ type: 'complete', report });
    return report;
  }

  private emit(event: MigrationEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.debug(`Event handler failed: ${errorMessage(error)}`);
      }
    }
  }
}
