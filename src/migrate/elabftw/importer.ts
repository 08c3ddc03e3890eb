/**
 * Destination Importer
 *
 * Writes one prepared project group as one eLabFTW experiment:
 *
 *   create → upload attachments (bounded, retried) → patch body → patch
 *   metadata → link ISA item → upload project artifacts
 *
 * Creation failing fails the group. Upload, link and artifact failures are
 * recorded and the group still counts as imported. A failed patch leaves the
 * created experiment in place and marks the group partial.
 */

import pLimit from 'p-limit';
import type {
  ArtifactSource,
  Attachment,
  DestinationApi,
  Experiment,
  FailureRecord,
  GroupImportResult,
  PreparedGroup,
  UploadedArtifact,
  UploadedAttachment,
} from '../types.js';
import { errorMessage } from '../errors.js';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from '../retry.js';
import { renderExperimentBody } from '../transform/html.js';
import { emptyLookups, type Lookups } from '../lookups.js';
import { buildGroupMetadata, experimentTags, experimentTitle } from './metadata.js';
import { silentLogger, type Logger } from '../../logging.js';

export type DuplicatePolicy = 'create' | 'skip';

export const DEFAULT_UPLOAD_CONCURRENCY = 4;

export interface ImporterOptions {
  lookups?: Lookups;
  /** eLabFTW experiment category ID */
  category?: number;
  uploadConcurrency?: number;
  /** `skip` leaves projects that already have an experiment alone */
  duplicatePolicy?: DuplicatePolicy;
  retry?: RetryPolicy;
  /** Project-level files uploaded once the experiment is written */
  artifacts?: ArtifactSource[];
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

type UploadOutcome =
  | { ok: true; uploaded: UploadedAttachment }
  | { ok: false; failure: FailureRecord };

function attachmentsOf(group: PreparedGroup): Array<{ entryId: string; elementId: string; attachment: Attachment }> {
  const found: Array<{ entryId: string; elementId: string; attachment: Attachment }> = [];
  for (const { units } of group.entries) {
    for (const unit of units) {
      if (unit.attachment) {
        found.push({ entryId: unit.entryId, elementId: unit.elementId, attachment: unit.attachment });
      }
    }
  }
  return found;
}

export class DestinationImporter {
  private readonly lookups: Lookups;
  private readonly category?: number;
  private readonly uploadConcurrency: number;
  private readonly duplicatePolicy: DuplicatePolicy;
  private readonly retry: RetryPolicy;
  private readonly artifactSources: ArtifactSource[];
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(
    private readonly api: DestinationApi,
    options: ImporterOptions = {},
  ) {
    this.lookups = options.lookups ?? emptyLookups;
    this.category = options.category;
    this.uploadConcurrency = Math.max(1, options.uploadConcurrency ?? DEFAULT_UPLOAD_CONCURRENCY);
    this.duplicatePolicy = options.duplicatePolicy ?? 'create';
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.artifactSources = options.artifacts ?? [];
    this.sleep = options.sleep;
    this.logger = options.logger ?? silentLogger;
  }

  async importGroup(group: PreparedGroup): Promise<GroupImportResult> {
    const { projectId } = group;
    const failures: FailureRecord[] = [];

    // ─── Step 0: duplicate check ────────────────────────────

    if (this.duplicatePolicy === 'skip') {
      let existing: string | null;
      try {
        existing = await this.api.findExperimentByProjectId(projectId);
      } catch (err) {
        failures.push({ scope: 'group', projectId, message: `Duplicate lookup failed: ${errorMessage(err)}` });
        return { status: 'failed', projectId, attachmentsUploaded: 0, failures };
      }
      if (existing !== null) {
        this.logger.info(`Project ${projectId} already imported as experiment ${existing}, skipping`);
        return { status: 'skipped', projectId, existingExperimentId: existing, attachmentsUploaded: 0, failures };
      }
    }

    // ─── Step 1: create ─────────────────────────────────────

    const title = experimentTitle(group);
    let experimentId: string;
    try {
      experimentId = await this.api.createExperiment({ title, tags: experimentTags(group) });
    } catch (err) {
      failures.push({ scope: 'group', projectId, message: `Experiment creation failed: ${errorMessage(err)}` });
      this.logger.error(`Could not create experiment for project ${projectId}`, { reason: errorMessage(err) });
      return { status: 'failed', projectId, attachmentsUploaded: 0, failures };
    }

    // ─── Step 2: attachments ────────────────────────────────

    const limit = pLimit(this.uploadConcurrency);
    const outcomes = await Promise.all(
      attachmentsOf(group).map((item) =>
        limit(() => this.upload(experimentId, projectId, item.entryId, item.elementId, item.attachment)),
      ),
    );

    const attachments: UploadedAttachment[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) attachments.push(outcome.uploaded);
      else failures.push(outcome.failure);
    }

    // ─── Step 3: body (after every upload settled) ──────────

    const locations = new Map(attachments.map((uploaded) => [uploaded.key, uploaded.location]));
    const body = renderExperimentBody(group, locations);
    let partial = false;

    try {
      await this.api.patchBody(experimentId, { body, category: this.category });
    } catch (err) {
      partial = true;
      failures.push({ scope: 'group', projectId, message: `Body update failed: ${errorMessage(err)}` });
      this.logger.error(`Body update failed for experiment ${experimentId}`, { project: projectId });
    }

    // ─── Step 4: metadata ───────────────────────────────────

    const { metadata, userId, isaId } = buildGroupMetadata(group, this.lookups);
    try {
      await this.api.patchMetadata(experimentId, { metadata, userId });
    } catch (err) {
      partial = true;
      failures.push({ scope: 'group', projectId, message: `Metadata update failed: ${errorMessage(err)}` });
      this.logger.error(`Metadata update failed for experiment ${experimentId}`, { project: projectId });
    }

    // ─── Step 5: ISA-study link ─────────────────────────────

    if (isaId && /^\d+$/.test(isaId)) {
      try {
        await this.api.linkItem(experimentId, isaId);
      } catch (err) {
        failures.push({ scope: 'group', projectId, message: `Linking ISA-study ${isaId} failed: ${errorMessage(err)}` });
        this.logger.warn(`Could not link ISA-study ${isaId} to experiment ${experimentId}`);
      }
    }

    // ─── Step 6: project artifacts ──────────────────────────

    const artifacts: UploadedArtifact[] = [];
    for (const source of this.artifactSources) {
      let files: Attachment[];
      try {
        files = await source.artifactsFor(group);
      } catch (err) {
        failures.push({ scope: 'attachment', projectId, message: `${source.name} unavailable: ${errorMessage(err)}` });
        this.logger.warn(`${source.name} unavailable for project ${projectId}`, { reason: errorMessage(err) });
        continue;
      }

      for (const file of files) {
        try {
          const uploadId = await withRetry(() => this.api.uploadAttachment(experimentId, file), this.retry, {
            sleep: this.sleep,
          });
          artifacts.push({ source: source.name, uploadId, filename: file.filename });
        } catch (err) {
          failures.push({
            scope: 'attachment',
            projectId,
            message: `Upload of ${source.name} ${file.filename} failed: ${errorMessage(err)}`,
          });
          this.logger.warn(`Upload of ${file.filename} failed`, { project: projectId });
        }
      }
    }

    const experiment: Experiment = { id: experimentId, projectId, title, body, metadata, attachments, artifacts };
    return {
      status: partial ? 'partial' : 'imported',
      projectId,
      experiment,
      attachmentsUploaded: attachments.length + artifacts.length,
      failures,
    };
  }

  /**
   * Upload with retries. The upload ID survives a failed location lookup so
   * a retry only repeats the call that failed.
   */
  private async upload(
    experimentId: string,
    projectId: string,
    entryId: string,
    elementId: string,
    attachment: Attachment,
  ): Promise<UploadOutcome> {
    let uploadId: string | undefined;
    try {
      const { id, location } = await withRetry(
        async () => {
          const id = uploadId ?? (await this.api.uploadAttachment(experimentId, attachment));
          uploadId = id;
          return { id, location: await this.api.getUploadLocation(experimentId, id) };
        },
        this.retry,
        {
          sleep: this.sleep,
          onRetry: (error, attempt) =>
            this.logger.debug(`Retrying upload of ${attachment.filename}`, {
              attempt,
              reason: errorMessage(error),
            }),
        },
      );
      return { ok: true, uploaded: { key: attachment.key, uploadId: id, filename: attachment.filename, location } };
    } catch (err) {
      this.logger.warn(`Upload of ${attachment.filename} failed`, { entry: entryId, element: elementId });
      return {
        ok: false,
        failure: {
          scope: 'attachment',
          message: `Upload of ${attachment.filename} failed: ${errorMessage(err)}`,
          entryId,
          elementId,
          projectId,
        },
      };
    }
  }
}
