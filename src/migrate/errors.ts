/**
 * Migration Errors
 *
 * Fatal errors abort a run before any destination write; everything else is
 * recorded as a FailureRecord and the run continues.
 */

export class MigrationError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Non-2xx response from either remote API.
 */
export class HttpError extends MigrationError {
  readonly status: number;
  readonly method: string;
  readonly url: string;

  constructor(method: string, url: string, status: number, detail?: string) {
    super('http_error', `${method} ${url} failed with ${status}${detail ? `: ${detail}` : ''}`);
    this.status = status;
    this.method = method;
    this.url = url;
  }
}

export class AuthenticationError extends MigrationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('authentication_failed', message, options);
  }
}

export class ListingError extends MigrationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('listing_failed', message, options);
  }
}

export class CacheUnavailableError extends MigrationError {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super('cache_unavailable', `Cache unavailable at ${path}: ${reason}`, options);
    this.path = path;
  }
}

export class UnsupportedElementError extends MigrationError {
  readonly entryId: string;
  readonly elementId: string;
  readonly kind: string;

  constructor(entryId: string, elementId: string, kind: string) {
    super('unsupported_element', `Unsupported element kind "${kind}" (entry ${entryId}, element ${elementId})`);
    this.entryId = entryId;
    this.elementId = elementId;
    this.kind = kind;
  }
}

/**
 * A Labfolder PDF or XHTML export that failed, vanished or never finished.
 */
export class ExportError extends MigrationError {
  readonly exportId: string;

  constructor(exportId: string, message: string) {
    super('export_failed', message);
    this.exportId = exportId;
  }
}

export class ConfigError extends MigrationError {
  constructor(message: string) {
    super('invalid_config', message);
  }
}

/**
 * Errors that end the run before the import phase.
 */
export function isFatal(error: unknown): boolean {
  return (
    error instanceof AuthenticationError ||
    error instanceof ListingError ||
    error instanceof CacheUnavailableError ||
    error instanceof ConfigError
  );
}

/**
 * Whether a failed request is worth repeating: rate limits, server errors,
 * and network failures surfaced by fetch as TypeError.
 */
export function isTransient(error: unknown): boolean {
  if (error instanceof HttpError) {
    return error.status === 429 || error.status >= 500;
  }
  return error instanceof TypeError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
