/**
 * Migration Types
 *
 * Defines the core types for the Labfolder → eLabFTW pipeline:
 * Fetch → Cache → Group → Transform → Import
 */

// ─── Source Entries ──────────────────────────────────────────

export interface Author {
  firstName: string;
  lastName: string;
}

/**
 * One Labfolder notebook page. Immutable once fetched.
 */
export interface Entry {
  /** Labfolder entry ID */
  id: string;
  /** Owning project ID, null when the entry has no project */
  projectId: string | null;
  projectTitle: string;
  projectCreatedAt?: string;
  /** Number of entries the source project reports */
  projectEntryCount?: number;
  /** Position of the entry inside its project */
  entryNumber?: number;
  title: string;
  tags: string[];
  author: Author;
  /** ISO 8601 creation timestamp */
  createdAt: string;
  lastEditedAt?: string;
  /** Elements in display order */
  elements: Element[];
}

export type CellValue = string | number | boolean | null;

export interface Sheet {
  name: string;
  rows: CellValue[][];
}

export interface DataItem {
  title: string;
  value: string;
  unit: string;
}

export interface TableElement {
  kind: 'table';
  id: string;
  sheets: Sheet[];
}

export interface WellPlateElement {
  kind: 'well_plate';
  id: string;
  sheets: Sheet[];
}

export interface TextElement {
  kind: 'text';
  id: string;
  /** Stored markup, copied verbatim */
  content: string;
}

export interface FileElement {
  kind: 'file';
  id: string;
  filename: string;
  mimeType: string;
  data: Buffer;
}

export interface ImageElement {
  kind: 'image';
  id: string;
  filename: string;
  mimeType: string;
  data: Buffer;
}

export interface DataElement {
  kind: 'data';
  id: string;
  items: DataItem[];
}

/**
 * A source element whose type is outside the supported set.
 * Kept so the transformer can report it instead of silently dropping it.
 */
export interface UnrecognizedElement {
  kind: 'unrecognized';
  id: string;
  sourceType: string;
}

export type SupportedElement =
  | TableElement
  | WellPlateElement
  | TextElement
  | FileElement
  | ImageElement
  | DataElement;

export type Element = SupportedElement | UnrecognizedElement;

export type ElementKind = Element['kind'];

export const SUPPORTED_ELEMENT_KINDS: ReadonlyArray<SupportedElement['kind']> = [
  'table',
  'well_plate',
  'text',
  'file',
  'image',
  'data',
];

// ─── Grouping ────────────────────────────────────────────────

/** Bucket for entries without a project ID */
export const UNGROUPED_PROJECT_ID = '__ungrouped__';

export interface ProjectGroup {
  projectId: string;
  entries: Entry[];
}

// ─── Transformation ──────────────────────────────────────────

export interface Attachment {
  /** Stable key, see attachmentKey */
  key: string;
  filename: string;
  mimeType: string;
  data: Buffer;
}

export interface TransformedUnit {
  entryId: string;
  elementId: string;
  kind: SupportedElement['kind'];
  /** HTML fragment; may contain an attachment placeholder */
  html: string;
  attachment?: Attachment;
}

export interface TransformedEntry {
  entry: Entry;
  units: TransformedUnit[];
}

export interface PreparedGroup {
  projectId: string;
  entries: TransformedEntry[];
}

// ─── Destination ─────────────────────────────────────────────

export interface ExtraField {
  type: 'text' | 'items';
  value: string;
  group_id: number;
  description: string;
}

export interface ExperimentMetadata {
  elabftw: {
    display_main_text: boolean;
    extra_fields_groups: Array<{ id: number; name: string }>;
  };
  extra_fields: Record<string, ExtraField>;
}

export interface UploadedAttachment {
  key: string;
  uploadId: string;
  filename: string;
  location: string;
}

/** A project-level file uploaded after the body, e.g. the project PDF */
export interface UploadedArtifact {
  source: string;
  uploadId: string;
  filename: string;
}

export interface Experiment {
  id: string;
  projectId: string;
  title: string;
  body: string;
  metadata: ExperimentMetadata;
  attachments: UploadedAttachment[];
  artifacts: UploadedArtifact[];
}

/**
 * Supplies extra files for a project's experiment. Runs after the body and
 * metadata are written; its failures never fail the group.
 */
export interface ArtifactSource {
  /** Shown in failure messages, e.g. "Project PDF" */
  readonly name: string;
  artifactsFor(group: PreparedGroup): Promise<Attachment[]>;
}

/**
 * Destination API surface used by the importer.
 */
export interface DestinationApi {
  /** Create an empty experiment, returning its assigned ID */
  createExperiment(input: { title: string; tags: string[] }): Promise<string>;
  /** Replace the experiment body */
  patchBody(experimentId: string, input: { body: string; category?: number }): Promise<void>;
  /** Replace metadata / extra fields and optionally the owner */
  patchMetadata(
    experimentId: string,
    input: { metadata: ExperimentMetadata; userId?: number },
  ): Promise<void>;
  /** Upload one attachment, returning the upload ID */
  uploadAttachment(experimentId: string, attachment: Attachment): Promise<string>;
  /** Resolve an uploaded file to a location usable inside the body */
  getUploadLocation(experimentId: string, uploadId: string): Promise<string>;
  /** Find an experiment previously created for a source project */
  findExperimentByProjectId(projectId: string): Promise<string | null>;
  /** Link an item (e.g. an ISA study) to the experiment */
  linkItem(experimentId: string, itemId: string): Promise<void>;
}

// ─── Failures & Reports ──────────────────────────────────────

export type FailureScope = 'entry' | 'element' | 'group' | 'attachment' | 'cache';

export interface FailureRecord {
  scope: FailureScope;
  message: string;
  entryId?: string;
  elementId?: string;
  projectId?: string;
}

export type GroupImportResult =
  | {
      status: 'imported' | 'partial';
      projectId: string;
      experiment: Experiment;
      attachmentsUploaded: number;
      failures: FailureRecord[];
    }
  | {
      status: 'failed';
      projectId: string;
      attachmentsUploaded: 0;
      failures: FailureRecord[];
    }
  | {
      status: 'skipped';
      projectId: string;
      /** Set when the project was imported by an earlier run */
      existingExperimentId?: string;
      reason?: string;
      attachmentsUploaded: 0;
      failures: FailureRecord[];
    };

export type RunPhase =
  | 'pending'
  | 'fetching'
  | 'caching'
  | 'grouping'
  | 'exporting'
  | 'transforming'
  | 'importing'
  | 'done'
  | 'aborted';

export interface RunCounts {
  entriesFetched: number;
  groupsTotal: number;
  groupsImported: number;
  groupsPartial: number;
  groupsFailed: number;
  groupsSkipped: number;
  attachmentsUploaded: number;
}

export interface ExperimentSummary {
  projectId: string;
  status: GroupImportResult['status'] | 'planned';
  experimentId?: string;
  /** Why a skipped project was left out */
  reason?: string;
  entries: number;
  attachments: number;
}

export interface RunReport {
  runId: string;
  status: 'done' | 'aborted';
  source: 'fetch' | 'cache';
  dryRun: boolean;
  /** Phases entered, in order */
  phases: RunPhase[];
  counts: RunCounts;
  experiments: ExperimentSummary[];
  failures: FailureRecord[];
  /** Message of the fatal failure that aborted the run */
  fatal?: string;
  startedAt: string;
  completedAt: string;
}
