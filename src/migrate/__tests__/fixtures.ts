/**
 * Shared test fixtures: entry builders and in-memory fakes for both APIs.
 */

import type { Attachment, DestinationApi, Element, Entry, ExperimentMetadata } from '../types.js';
import { HttpError } from '../errors.js';
import type { ExportKind, ExportListQuery, LabfolderApi, LabfolderExportApi } from '../labfolder/client.js';
import type { LabfolderEntry, LabfolderExport } from '../labfolder/schema.js';
import type { BinaryPayload } from '../labfolder/session.js';

export function makeEntry(overrides: Partial<Entry> = {}): Entry {
  return {
    id: 'e1',
    projectId: 'P1',
    projectTitle: 'Buffer optimisation',
    projectCreatedAt: '2024-01-10T09:00:00.000+0100',
    title: 'Day 1',
    tags: [],
    author: { firstName: 'Emma', lastName: 'Weber' },
    createdAt: '2024-02-01T10:30:00.000+0100',
    elements: [],
    ...overrides,
  };
}

export function textElement(id: string, content: string): Element {
  return { kind: 'text', id, content };
}

export function imageElement(id: string, filename = `img_${id}.png`): Element {
  return { kind: 'image', id, filename, mimeType: 'image/png', data: Buffer.from(`png-${id}`) };
}

// ─── Destination ─────────────────────────────────────────────

export interface FakeExperiment {
  title: string;
  tags: string[];
  body?: string;
  category?: number;
  metadata?: ExperimentMetadata;
  userId?: number;
  links: string[];
}

/**
 * In-memory eLabFTW. Every call is appended to `calls` as `method:arg`.
 */
export class FakeDestination implements DestinationApi {
  readonly calls: string[] = [];
  readonly experiments = new Map<string, FakeExperiment>();
  readonly uploads: Array<{ experimentId: string; uploadId: string; filename: string }> = [];
  /** Project ID → existing experiment ID */
  readonly existing = new Map<string, string>();

  failCreate = false;
  failBody = false;
  failMetadata = false;
  failLink = false;
  /** Return true to fail this upload attempt */
  failUpload: (attachment: Attachment, attempt: number) => boolean = () => false;

  private nextExperiment = 100;
  private nextUpload = 1;
  private readonly attempts = new Map<string, number>();

  async createExperiment(input: { title: string; tags: string[] }): Promise<string> {
    this.calls.push(`create:${input.title}`);
    if (this.failCreate) throw new HttpError('POST', 'experiments', 500);
    const id = String(this.nextExperiment++);
    this.experiments.set(id, { title: input.title, tags: input.tags, links: [] });
    return id;
  }

  async patchBody(experimentId: string, input: { body: string; category?: number }): Promise<void> {
    this.calls.push(`body:${experimentId}`);
    if (this.failBody) throw new HttpError('PATCH', `experiments/${experimentId}`, 500);
    const experiment = this.get(experimentId);
    experiment.body = input.body;
    experiment.category = input.category;
  }

  async patchMetadata(
    experimentId: string,
    input: { metadata: ExperimentMetadata; userId?: number },
  ): Promise<void> {
    this.calls.push(`metadata:${experimentId}`);
    if (this.failMetadata) throw new HttpError('PATCH', `experiments/${experimentId}`, 400);
    const experiment = this.get(experimentId);
    experiment.metadata = input.metadata;
    experiment.userId = input.userId;
  }

  async uploadAttachment(experimentId: string, attachment: Attachment): Promise<string> {
    const attempt = (this.attempts.get(attachment.key) ?? 0) + 1;
    this.attempts.set(attachment.key, attempt);
    this.calls.push(`upload:${attachment.filename}`);
    if (this.failUpload(attachment, attempt)) {
      throw new HttpError('POST', `experiments/${experimentId}/uploads`, 503);
    }
    const uploadId = String(this.nextUpload++);
    this.uploads.push({ experimentId, uploadId, filename: attachment.filename });
    return uploadId;
  }

  async getUploadLocation(experimentId: string, uploadId: string): Promise<string> {
    this.calls.push(`location:${uploadId}`);
    return `uploads/${experimentId}/${uploadId}`;
  }

  async findExperimentByProjectId(projectId: string): Promise<string | null> {
    this.calls.push(`find:${projectId}`);
    return this.existing.get(projectId) ?? null;
  }

  async linkItem(experimentId: string, itemId: string): Promise<void> {
    this.calls.push(`link:${experimentId}:${itemId}`);
    if (this.failLink) throw new HttpError('POST', `experiments/${experimentId}/items_links/${itemId}`, 404);
    this.get(experimentId).links.push(itemId);
  }

  private get(id: string): FakeExperiment {
    const experiment = this.experiments.get(id);
    if (!experiment) throw new HttpError('GET', `experiments/${id}`, 404);
    return experiment;
  }
}

// ─── Source ──────────────────────────────────────────────────

export function listedEntry(
  id: string,
  options: { first?: string; last?: string; projectId?: string | null; elements?: Array<{ id: string; type: string }> } = {},
): LabfolderEntry {
  return {
    id,
    project_id: options.projectId === undefined ? 'P1' : options.projectId,
    title: `Entry ${id}`,
    creation_date: '2024-02-01T10:30:00.000+0100',
    tags: [],
    author: { first_name: options.first ?? 'Emma', last_name: options.last ?? 'Weber' },
    project: { id: options.projectId ?? undefined, title: 'Buffer optimisation' },
    elements: options.elements ?? [],
  };
}

export interface FakeExport {
  kind: ExportKind;
  info: LabfolderExport;
}

/**
 * In-memory Labfolder. Elements are looked up by ID in `content`.
 * Requested exports get IDs x1, x2, … with increasing creation dates.
 */
export class FakeLabfolder implements LabfolderApi, LabfolderExportApi {
  readonly calls: string[] = [];
  failAuth = false;
  failListingAt: number | null = null;
  /** Element IDs whose retrieval throws */
  readonly broken = new Set<string>();
  readonly texts = new Map<string, string>();
  readonly files = new Map<string, BinaryPayload>();

  readonly exportList: FakeExport[] = [];
  readonly requested: Array<{ kind: ExportKind; payload: Record<string, unknown> }> = [];
  /** Statuses reported by successive polls; the last one repeats */
  exportStatuses: string[] = ['FINISHED'];
  /** Export ID → downloaded bytes */
  readonly exportData = new Map<string, Buffer>();
  private nextExport = 1;

  constructor(private readonly entries: LabfolderEntry[] = []) {}

  async authenticate(): Promise<void> {
    this.calls.push('auth');
    if (this.failAuth) throw new HttpError('POST', 'auth/login', 401);
  }

  async listEntries(offset: number, limit: number): Promise<LabfolderEntry[]> {
    this.calls.push(`list:${offset}`);
    if (this.failListingAt === offset) throw new HttpError('GET', 'entries', 500);
    return this.entries.slice(offset, offset + limit);
  }

  async getText(elementId: string): Promise<string> {
    this.calls.push(`text:${elementId}`);
    this.check(elementId);
    return this.texts.get(elementId) ?? `<p>text ${elementId}</p>`;
  }

  async getTable(elementId: string) {
    this.calls.push(`table:${elementId}`);
    this.check(elementId);
    return [{ name: 'Sheet1', rows: [['a', 1]] }];
  }

  async getWellPlate(elementId: string) {
    this.calls.push(`well_plate:${elementId}`);
    this.check(elementId);
    return [{ name: 'well_plate', rows: [['A1', 0.5]] }];
  }

  async getData(elementId: string) {
    this.calls.push(`data:${elementId}`);
    this.check(elementId);
    return [{ title: 'pH', value: '7.4', unit: '' }];
  }

  async downloadFile(elementId: string): Promise<BinaryPayload> {
    this.calls.push(`file:${elementId}`);
    this.check(elementId);
    return this.files.get(elementId) ?? { data: Buffer.from('file'), filename: `f${elementId}.txt`, mimeType: 'text/plain' };
  }

  async downloadImage(elementId: string): Promise<BinaryPayload> {
    this.calls.push(`image:${elementId}`);
    this.check(elementId);
    return { data: Buffer.from('png'), filename: null, mimeType: 'image/png' };
  }

  async requestExport(kind: ExportKind, payload: Record<string, unknown>): Promise<void> {
    this.calls.push(`export:${kind}`);
    this.requested.push({ kind, payload });
    const n = this.nextExport++;
    const id = `x${n}`;
    const filename = payload.download_filename;
    this.exportList.push({
      kind,
      info: {
        id,
        status: 'NEW',
        creation_date: `2024-03-01T10:00:${String(n).padStart(2, '0')}.000+0100`,
        download_filename: typeof filename === 'string' ? filename : `${id}.zip`,
      },
    });
  }

  async listExports(kind: ExportKind, query: ExportListQuery): Promise<LabfolderExport[]> {
    this.calls.push(`exports:${kind}:${query.status ?? ''}:${query.offset}`);
    const statuses = query.status?.split(',');
    return this.exportList
      .filter((item) => item.kind === kind && (!statuses || statuses.includes(item.info.status ?? '')))
      .slice(query.offset, query.offset + query.limit)
      .map((item) => item.info);
  }

  async getExport(kind: ExportKind, exportId: string): Promise<LabfolderExport> {
    this.calls.push(`poll:${exportId}`);
    const found = this.findExport(kind, exportId);
    found.info.status = this.exportStatuses.length > 1 ? this.exportStatuses.shift() : this.exportStatuses[0];
    return { ...found.info };
  }

  async downloadExport(kind: ExportKind, exportId: string): Promise<BinaryPayload> {
    this.calls.push(`download:${exportId}`);
    const found = this.findExport(kind, exportId);
    return {
      data: this.exportData.get(exportId) ?? Buffer.from(`${kind}-${exportId}`),
      filename: found.info.download_filename ?? null,
      mimeType: kind === 'pdf' ? 'application/pdf' : 'application/zip',
    };
  }

  private findExport(kind: ExportKind, exportId: string): FakeExport {
    const found = this.exportList.find((item) => item.kind === kind && item.info.id === exportId);
    if (!found) throw new HttpError('GET', `exports/${kind}/${exportId}`, 404);
    return found;
  }

  private check(elementId: string): void {
    if (this.broken.has(elementId)) {
      throw new HttpError('GET', `elements/${elementId}`, 500);
    }
  }
}
