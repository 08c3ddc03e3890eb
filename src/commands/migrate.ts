/**
 * eln-migrate migrate: Labfolder → eLabFTW migration
 *
 * Resolves configuration, wires the pipeline, runs it with a live progress
 * display, prints the report, and exits non-zero when the run aborted.
 */

import chalk from 'chalk';
import { join } from 'node:path';
import { resolveConfig, requireDestination, requireSourceCredentials, type ConfigLayer, type MigrationConfig } from '../config.js';
import { createLogger, type LogLevel, type Logger } from '../logging.js';
import {
  MigrationCoordinator,
  abortedRunReport,
  type CoordinatorDeps,
  type MigrationEventHandler,
  type RunConfig,
} from '../migrate/coordinator.js';
import type { ArtifactSource, RunReport } from '../migrate/types.js';
import { createCacheStore } from '../migrate/cache/store.js';
import { LabfolderClient } from '../migrate/labfolder/client.js';
import { LabfolderExports } from '../migrate/labfolder/exports.js';
import { SourceFetcher } from '../migrate/labfolder/fetcher.js';
import { ProjectPdfSource } from '../migrate/artifacts/pdf.js';
import { XhtmlExportSource } from '../migrate/artifacts/xhtml.js';
import { ElementTransformer } from '../migrate/transform/transformer.js';
import { ElabClient } from '../migrate/elabftw/client.js';
import { DestinationImporter } from '../migrate/elabftw/importer.js';
import { loadLookups } from '../migrate/lookups.js';
import { ConfigError, errorMessage } from '../migrate/errors.js';
import { ProgressDisplay } from '../cli/progress.js';
import { showRunSummary } from '../cli/summary.js';

// ─── Types ───────────────────────────────────────────────────

export interface MigrateCommandOptions {
  username?: string;
  password?: string;
  url?: string;
  elabUrl?: string;
  elabKey?: string;
  author?: string[];
  cache?: string;
  useCache?: boolean;
  isaIds?: string;
  userMap?: string;
  category?: number;
  groupConcurrency?: number;
  uploadConcurrency?: number;
  skipExisting?: boolean;
  exportsDir?: string;
  /** false when --no-pdf is given */
  pdf?: boolean;
  /** false when --no-xhtml is given */
  xhtml?: boolean;
  onlyProjectsFromXhtml?: boolean;
  dryRun?: boolean;
  logLevel?: LogLevel;
  logFile?: string;
  verbose?: boolean;
  /** false when --no-color is given */
  color?: boolean;
}

/**
 * Map command-line flags onto a config layer. Absent flags stay undefined so
 * lower layers show through.
 */
export function overridesFromOptions(options: MigrateCommandOptions): ConfigLayer {
  return {
    labfolder: { url: options.url, username: options.username, password: options.password },
    elabftw: { url: options.elabUrl, apiKey: options.elabKey, category: options.category },
    authors: options.author && options.author.length > 0 ? options.author : undefined,
    cache: { path: options.cache, useCache: options.useCache },
    lookups: { isaIds: options.isaIds, userMap: options.userMap },
    exports: {
      dir: options.exportsDir,
      pdf: options.pdf === false ? false : undefined,
      xhtml: options.xhtml === false ? false : undefined,
      restrictToXhtml: options.onlyProjectsFromXhtml,
    },
    run: {
      groupConcurrency: options.groupConcurrency,
      uploadConcurrency: options.uploadConcurrency,
      duplicatePolicy: options.skipExisting ? 'skip' : undefined,
      dryRun: options.dryRun,
    },
    logging: {
      level: options.verbose ? 'debug' : options.logLevel,
      file: options.logFile,
    },
  };
}

/**
 * Build the coordinator's collaborators from resolved configuration.
 * Credentials are only demanded for the phases the run will reach.
 */
export async function buildPipeline(config: MigrationConfig, logger: Logger): Promise<CoordinatorDeps> {
  const deps: CoordinatorDeps = {
    cache: createCacheStore(config.cache.path, { logger }),
    transformer: new ElementTransformer({ previewRows: config.run.previewRows, logger }),
    logger,
  };

  let client: LabfolderClient | undefined;
  const labfolder = (): LabfolderClient => {
    if (!client) {
      const credentials = requireSourceCredentials(config);
      client = new LabfolderClient({
        baseUrl: credentials.url,
        username: credentials.username,
        password: credentials.password,
        logger,
      });
    }
    return client;
  };
  const hasCredentials = Boolean(config.labfolder.username && config.labfolder.password);

  if (!config.cache.useCache) {
    deps.source = new SourceFetcher(labfolder(), { logger });
  }

  let xhtml: XhtmlExportSource | undefined;
  if (config.exports.xhtml && (config.exports.restrictToXhtml || !config.run.dryRun)) {
    const exports = config.exports.restrictToXhtml && hasCredentials ? new LabfolderExports(labfolder(), { logger }) : undefined;
    xhtml = new XhtmlExportSource(exports, {
      dir: join(config.exports.dir, 'xhtml'),
      restrict: config.exports.restrictToXhtml,
      logger,
    });
    deps.xhtml = xhtml;
  }

  if (!config.run.dryRun) {
    const destination = requireDestination(config);
    const lookups = await loadLookups(config.lookups);

    const artifacts: ArtifactSource[] = [];
    if (config.exports.pdf) {
      if (!hasCredentials) {
        throw new ConfigError('Project PDFs need Labfolder credentials (--username/--password), or pass --no-pdf');
      }
      artifacts.push(new ProjectPdfSource(new LabfolderExports(labfolder(), { logger }), { dir: join(config.exports.dir, 'pdf'), logger }));
    }
    if (xhtml) {
      artifacts.push(xhtml);
    }

    deps.importer = new DestinationImporter(new ElabClient({ baseUrl: destination.url, apiKey: destination.apiKey, logger }), {
      lookups,
      category: config.elabftw.category,
      uploadConcurrency: config.run.uploadConcurrency,
      duplicatePolicy: config.run.duplicatePolicy,
      artifacts,
      logger,
    });
  }

  return deps;
}

export function runConfigOf(config: MigrationConfig): RunConfig {
  return {
    authors: config.authors,
    useCache: config.cache.useCache,
    dryRun: config.run.dryRun,
    groupConcurrency: config.run.groupConcurrency,
  };
}

/**
 * Wire and run the pipeline. A pipeline that cannot be built still yields
 * an aborted report.
 */
export async function runMigration(
  config: MigrationConfig,
  logger: Logger,
  onEvent?: MigrationEventHandler,
): Promise<RunReport> {
  const runConfig = runConfigOf(config);

  let deps: CoordinatorDeps;
  try {
    deps = await buildPipeline(config, logger);
  } catch (err) {
    logger.error(`Run aborted: ${errorMessage(err)}`);
    return abortedRunReport(runConfig, err);
  }

  const coordinator = new MigrationCoordinator(deps);
  if (onEvent) {
    coordinator.on(onEvent);
  }
  return coordinator.run(runConfig);
}

// ─── Main Command ────────────────────────────────────────────

export async function migrateCommand(options: MigrateCommandOptions): Promise<void> {
  if (options.color === false) {
    chalk.level = 0;
  }

  let config: MigrationConfig;
  try {
    config = await resolveConfig({ overrides: overridesFromOptions(options) });
  } catch (err) {
    showRunSummary(abortedRunReport({ useCache: options.useCache, dryRun: options.dryRun }, err), {
      detailed: options.verbose,
    });
    process.exit(1);
  }

  const progress = new ProgressDisplay({ noColor: options.color === false, verbose: options.verbose });
  const logger = createLogger({
    level: config.logging.level,
    file: config.logging.file,
    write: (line) => progress.log(line),
  });

  let report: RunReport;
  try {
    report = await runMigration(config, logger, progress.handleEvent);
  } catch (err) {
    report = abortedRunReport(runConfigOf(config), err);
  } finally {
    progress.stop();
    await logger.close();
  }

  showRunSummary(report, { detailed: options.verbose });

  if (report.status === 'aborted') {
    process.exit(1);
  }
}
