/**
 * eLabFTW API v2 Client
 *
 * Implements DestinationApi. The API key is sent as-is in the Authorization
 * header. No retries here: creation must not be repeated blindly, and the
 * importer owns the upload retry policy.
 *
 * @see https://doc.elabftw.net/api/v2/
 */

import { z } from 'zod';
import type { Attachment, DestinationApi, ExperimentMetadata } from '../types.js';
import { HttpError, MigrationError } from '../errors.js';
import { silentLogger, type Logger } from '../../logging.js';
import { LABFOLDER_PROJECT_FIELD } from './metadata.js';

// ─── API Types ───────────────────────────────────────────────

const idBodySchema = z.object({ id: z.union([z.number(), z.string()]) }).passthrough();

const uploadSchema = z
  .object({
    long_name: z.string(),
    real_name: z.string(),
    storage: z.union([z.number(), z.string()]).nullish(),
  })
  .passthrough();

const extraFieldsSchema = z
  .object({
    extra_fields: z.record(z.string(), z.object({ value: z.unknown() }).passthrough()).nullish(),
  })
  .passthrough();

const experimentListSchema = z.array(
  z
    .object({
      id: z.union([z.number(), z.string()]),
      metadata: z.union([z.string(), z.record(z.string(), z.unknown())]).nullish(),
    })
    .passthrough(),
);

export interface ElabClientConfig {
  /** API base URL, e.g. https://elab.example.org/api/v2 */
  baseUrl: string;
  apiKey: string;
  logger?: Logger;
}

type RequestBody = { json: unknown } | { form: FormData };

/** Trailing numeric path segment of a Location header */
export function idFromLocation(location: string | null): string | null {
  if (!location) return null;
  const match = /\/(\d+)\/?$/.exec(location);
  return match?.[1] ?? null;
}

function parseJson(text: string): unknown {
  if (!text.trim()) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Value of the project-ID extra field in an experiment's metadata */
export function projectIdOf(metadata: unknown): string | null {
  const decoded = typeof metadata === 'string' ? parseJson(metadata) : metadata;
  const parsed = extraFieldsSchema.safeParse(decoded);
  if (!parsed.success) return null;
  const value = parsed.data.extra_fields?.[LABFOLDER_PROJECT_FIELD]?.value;
  return value === undefined || value === null ? null : String(value);
}

export class ElabClient implements DestinationApi {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly logger: Logger;

  constructor(config: ElabClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
    this.logger = config.logger ?? silentLogger;
  }

  private async request(method: string, path: string, body?: RequestBody): Promise<Response> {
    const url = `${this.baseUrl}/${path.replace(/^\/+/, '')}`;
    const headers: Record<string, string> = {
      Authorization: this.apiKey,
      Accept: 'application/json',
    };

    let payload: string | FormData | undefined;
    if (body && 'json' in body) {
      headers['Content-Type'] = 'application/json';
      payload = JSON.stringify(body.json);
    } else if (body) {
      payload = body.form;
    }

    const response = await fetch(url, { method, headers, body: payload });
    if (!response.ok) {
      let detail: string | undefined;
      try {
        detail = (await response.text()).slice(0, 200) || undefined;
      } catch {
        detail = undefined;
      }
      throw new HttpError(method, url, response.status, detail);
    }
    return response;
  }

  /**
   * The new ID comes from the JSON body when present, otherwise from the
   * Location header.
   */
  private async createdId(response: Response, what: string): Promise<string> {
    const body = idBodySchema.safeParse(parseJson(await response.text()));
    const id = body.success ? String(body.data.id) : idFromLocation(response.headers.get('location'));
    if (!id || !/^\d+$/.test(id)) {
      throw new MigrationError('invalid_response', `Could not determine the ${what} ID from the eLabFTW response`);
    }
    return id;
  }

  async createExperiment(input: { title: string; tags: string[] }): Promise<string> {
    const response = await this.request('POST', 'experiments', { json: { title: input.title, tags: input.tags } });
    const id = await this.createdId(response, 'experiment');
    this.logger.debug('Created experiment', { id, title: input.title });
    return id;
  }

  async patchBody(experimentId: string, input: { body: string; category?: number }): Promise<void> {
    const json: Record<string, unknown> = { body: input.body };
    if (input.category !== undefined) json.category = input.category;
    await this.request('PATCH', `experiments/${experimentId}`, { json });
  }

  async patchMetadata(
    experimentId: string,
    input: { metadata: ExperimentMetadata; userId?: number },
  ): Promise<void> {
    const json: Record<string, unknown> = { metadata: JSON.stringify(input.metadata) };
    if (input.userId !== undefined) json.userid = input.userId;
    await this.request('PATCH', `experiments/${experimentId}`, { json });
  }

  async uploadAttachment(experimentId: string, attachment: Attachment): Promise<string> {
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(attachment.data)], { type: attachment.mimeType }), attachment.filename);
    const response = await this.request('POST', `experiments/${experimentId}/uploads`, { form });
    return this.createdId(response, 'upload');
  }

  async getUploadLocation(experimentId: string, uploadId: string): Promise<string> {
    const response = await this.request('GET', `experiments/${experimentId}/uploads/${uploadId}`);
    const upload = uploadSchema.parse(await response.json());
    const params = new URLSearchParams({
      name: upload.real_name,
      f: upload.long_name,
      storage: String(upload.storage ?? 1),
    });
    return `app/download.php?${params.toString()}`;
  }

  async findExperimentByProjectId(projectId: string): Promise<string | null> {
    const query = new URLSearchParams({ q: projectId, limit: '100' });
    const response = await this.request('GET', `experiments?${query.toString()}`);
    const experiments = experimentListSchema.parse(await response.json());
    const match = experiments.find((experiment) => projectIdOf(experiment.metadata) === projectId);
    return match ? String(match.id) : null;
  }

  async linkItem(experimentId: string, itemId: string): Promise<void> {
    await this.request('POST', `experiments/${experimentId}/items_links/${itemId}`, {
      json: { action: 'create' },
    });
  }
}
