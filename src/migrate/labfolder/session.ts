/**
 * Labfolder Session
 *
 * Owns the bearer token for the Labfolder API v2. A 401 triggers exactly one
 * re-login and one resend; concurrent callers share the in-flight login.
 */

import type { z } from 'zod';
import { AuthenticationError, HttpError, errorMessage, isTransient } from '../errors.js';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from '../retry.js';
import { loginResponseSchema } from './schema.js';
import { silentLogger, type Logger } from '../../logging.js';

export const DEFAULT_LABFOLDER_URL = 'https://labfolder.labforward.app/api/v2';

// ─── Configuration ───────────────────────────────────────────

export interface LabfolderSessionConfig {
  /** API base URL, e.g. https://labfolder.example.org/api/v2 */
  baseUrl?: string;
  username: string;
  password: string;
  retry?: RetryPolicy;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface BinaryPayload {
  data: Buffer;
  filename: string | null;
  mimeType: string;
}

/**
 * Extract the filename from a Content-Disposition header.
 * Prefers the RFC 5987 `filename*` form.
 */
export function parseContentDisposition(header: string | null): string | null {
  if (!header) return null;

  const extended = /filename\*\s*=\s*(?:[\w-]+)''([^;]+)/i.exec(header);
  if (extended?.[1]) {
    try {
      return decodeURIComponent(extended[1].trim());
    } catch {
      return extended[1].trim();
    }
  }

  const plain = /filename\s*=\s*("([^"]*)"|[^;]+)/i.exec(header);
  if (!plain) return null;
  const value = (plain[2] ?? plain[1] ?? '').trim();
  return value || null;
}

// ─── Session ─────────────────────────────────────────────────

export class LabfolderSession {
  private readonly baseUrl: string;
  private readonly username: string;
  private readonly password: string;
  private readonly retry: RetryPolicy;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  private token: string | null = null;
  private refreshing: Promise<string> | null = null;

  constructor(config: LabfolderSessionConfig) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_LABFOLDER_URL).replace(/\/+$/, '');
    this.username = config.username;
    this.password = config.password;
    this.retry = config.retry ?? DEFAULT_RETRY_POLICY;
    this.sleep = config.sleep;
    this.logger = config.logger ?? silentLogger;
  }

  hasToken(): boolean {
    return this.token !== null;
  }

  /**
   * Log in, or join a login already in flight.
   */
  login(): Promise<string> {
    if (!this.refreshing) {
      this.refreshing = this.performLogin().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private async performLogin(): Promise<string> {
    const url = this.url('auth/login');
    let body: unknown;
    try {
      body = await withRetry(
        async () => {
          const response = await fetch(url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
            body: JSON.stringify({ user: this.username, password: this.password }),
          });
          if (!response.ok) {
            throw new HttpError('POST', url, response.status, await readDetail(response));
          }
          return response.json();
        },
        this.retry,
        { shouldRetry: isTransient, sleep: this.sleep },
      );
    } catch (err) {
      throw new AuthenticationError(`Labfolder login failed for ${this.username}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const parsed = loginResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthenticationError('Labfolder login response did not contain a token');
    }

    this.token = parsed.data.token;
    this.logger.debug('Authenticated with Labfolder', { user: this.username });
    return this.token;
  }

  private async currentToken(): Promise<string> {
    return this.token ?? this.login();
  }

  /**
   * Called after a 401. When another caller already replaced the stale token,
   * reuse theirs instead of logging in again.
   */
  private async refresh(stale: string): Promise<string> {
    if (this.token !== null && this.token !== stale) {
      return this.token;
    }
    this.logger.debug('Labfolder token rejected, logging in again');
    return this.login();
  }

  // ─── Requests ────────────────────────────────────────────

  private url(path: string, query?: QueryParams): string {
    const url = `${this.baseUrl}/${path.replace(/^\/+/, '')}`;
    if (!query) return url;

    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) params.set(key, String(value));
    }
    const search = params.toString();
    return search ? `${url}?${search}` : url;
  }

  private async send(method: string, url: string, body?: unknown): Promise<Response> {
    const send = (token: string) =>
      body === undefined
        ? fetch(url, {
            method,
            headers: { Authorization: `Bearer ${token}`, Accept: 'application/json' },
          })
        : fetch(url, {
            method,
            headers: { Authorization: `Bearer ${token}`, Accept: 'application/json', 'Content-Type': 'application/json' },
            body: JSON.stringify(body),
          });

    const token = await this.currentToken();
    let response = await send(token);

    if (response.status === 401) {
      const fresh = await this.refresh(token);
      response = await send(fresh);
    }

    if (!response.ok) {
      throw new HttpError(method, url, response.status, await readDetail(response));
    }
    return response;
  }

  /**
   * Authenticated request with transient-failure retries.
   */
  async request(method: string, path: string, query?: QueryParams, body?: unknown): Promise<Response> {
    const url = this.url(path, query);
    return withRetry(() => this.send(method, url, body), this.retry, {
      shouldRetry: isTransient,
      sleep: this.sleep,
      onRetry: (error, attempt, delayMs) =>
        this.logger.debug(`Retrying ${method} ${path}`, {
          attempt,
          delayMs,
          reason: errorMessage(error),
        }),
    });
  }

  async getJson<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, query?: QueryParams): Promise<T> {
    const response = await this.request('GET', path, query);
    const body: unknown = await response.json();
    return schema.parse(body);
  }

  async postJson(path: string, body: unknown): Promise<void> {
    await this.request('POST', path, undefined, body);
  }

  async getBinary(path: string): Promise<BinaryPayload> {
    const response = await this.request('GET', path);
    const contentType = response.headers.get('content-type');
    return {
      data: Buffer.from(await response.arrayBuffer()),
      filename: parseContentDisposition(response.headers.get('content-disposition')),
      mimeType: contentType?.split(';')[0]?.trim() || 'application/octet-stream',
    };
  }
}

async function readDetail(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    return text ? text.slice(0, 200) : undefined;
  } catch {
    return undefined;
  }
}
