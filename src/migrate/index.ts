/**
 * Labfolder → eLabFTW migration pipeline
 *
 * Fetch → Cache → Group → Transform → Import
 */

export type * from './types.js';
export { UNGROUPED_PROJECT_ID, SUPPORTED_ELEMENT_KINDS } from './types.js';

// Coordinator
export {
  MigrationCoordinator,
  DEFAULT_GROUP_CONCURRENCY,
  ABSENT_FROM_EXPORT,
  createRunReport,
  abortedRunReport,
  type MigrationEvent,
  type MigrationEventType,
  type MigrationEventHandler,
  type CoordinatorDeps,
  type EntrySource,
  type GroupImporter,
  type ProjectExport,
  type RunConfig,
} from './coordinator.js';

// Source
export { LabfolderSession, parseContentDisposition, DEFAULT_LABFOLDER_URL } from './labfolder/session.js';
export type { LabfolderSessionConfig, BinaryPayload } from './labfolder/session.js';
export {
  LabfolderClient,
  type LabfolderApi,
  type LabfolderExportApi,
  type ExportKind,
  type ExportListQuery,
} from './labfolder/client.js';
export { LabfolderExports, newestExport, type ExportPolling } from './labfolder/exports.js';
export { SourceFetcher, DEFAULT_PAGE_SIZE, type FetchOptions } from './labfolder/fetcher.js';

// Cache
export {
  createCacheStore,
  cacheFormatFor,
  JsonLinesCacheStore,
  ParquetCacheStore,
  type CacheStore,
  type CacheFormat,
} from './cache/store.js';

// Project artifacts
export { ProjectPdfSource, pdfFilename, safeFileTitle, PDF_MIME_TYPE } from './artifacts/pdf.js';
export { XhtmlArchive, XhtmlExportSource, type XhtmlExportOptions } from './artifacts/xhtml.js';

// Transform & grouping
export { ElementTransformer, DEFAULT_PREVIEW_ROWS, type TransformerOptions } from './transform/transformer.js';
export { groupEntries, matchesAuthor, authorName } from './grouper.js';

// Destination
export { ElabClient, type ElabClientConfig } from './elabftw/client.js';
export { DestinationImporter, type DuplicatePolicy, type ImporterOptions } from './elabftw/importer.js';
export { buildGroupMetadata } from './elabftw/metadata.js';
export { LookupTables, loadLookups, emptyLookups, type Lookups, type UserMapping } from './lookups.js';

// Errors & retry
export * from './errors.js';
export { withRetry, DEFAULT_RETRY_POLICY, type RetryPolicy } from './retry.js';
