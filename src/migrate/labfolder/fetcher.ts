/**
 * Source Fetcher
 *
 * Authenticates, pages through the entry listing, applies the author filter,
 * then pulls every element of each kept entry. Authentication and listing
 * failures are fatal; a failed element is reported and left out.
 */

import type { Author, Element, Entry, FailureRecord } from '../types.js';
import { AuthenticationError, ListingError, errorMessage } from '../errors.js';
import { matchesAuthor } from '../grouper.js';
import type { LabfolderApi } from './client.js';
import type { LabfolderElementRef, LabfolderEntry } from './schema.js';
import { silentLogger, type Logger } from '../../logging.js';

export const DEFAULT_PAGE_SIZE = 50;

export interface FetchOptions {
  /** Author filters; empty keeps every entry */
  authors?: readonly string[];
  onFailure?: (failure: FailureRecord) => void;
  /** Called after each entry with the running count */
  onProgress?: (fetched: number, total: number) => void;
}

export interface SourceFetcherOptions {
  pageSize?: number;
  logger?: Logger;
}

export function toAuthor(raw: LabfolderEntry['author']): Author {
  return {
    firstName: raw?.first_name ?? '',
    lastName: raw?.last_name ?? '',
  };
}

export class SourceFetcher {
  private readonly pageSize: number;
  private readonly logger: Logger;

  constructor(
    private readonly api: LabfolderApi,
    options: SourceFetcherOptions = {},
  ) {
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.logger = options.logger ?? silentLogger;
  }

  async fetchEntries(options: FetchOptions = {}): Promise<Entry[]> {
    try {
      await this.api.authenticate();
    } catch (err) {
      if (err instanceof AuthenticationError) throw err;
      throw new AuthenticationError(`Labfolder authentication failed: ${errorMessage(err)}`, { cause: err });
    }

    const listed = await this.listAll();
    const kept = listed.filter((raw) => matchesAuthor(toAuthor(raw.author), options.authors));
    this.logger.info(`Listed ${listed.length} entries, ${kept.length} match the author filter`);

    const entries: Entry[] = [];
    for (const raw of kept) {
      entries.push(await this.fetchEntry(raw, options.onFailure));
      options.onProgress?.(entries.length, kept.length);
    }
    return entries;
  }

  private async listAll(): Promise<LabfolderEntry[]> {
    const all: LabfolderEntry[] = [];
    let offset = 0;

    for (;;) {
      let page: LabfolderEntry[];
      try {
        page = await this.api.listEntries(offset, this.pageSize);
      } catch (err) {
        if (err instanceof AuthenticationError) throw err;
        throw new ListingError(`Cannot list Labfolder entries at offset ${offset}: ${errorMessage(err)}`, {
          cause: err,
        });
      }

      all.push(...page);
      this.logger.debug('Fetched entry page', { offset, count: page.length });
      if (page.length < this.pageSize) return all;
      offset += this.pageSize;
    }
  }

  private async fetchEntry(
    raw: LabfolderEntry,
    onFailure?: (failure: FailureRecord) => void,
  ): Promise<Entry> {
    const projectId = raw.project_id ?? raw.project?.id ?? null;
    const elements: Element[] = [];

    for (const ref of raw.elements ?? []) {
      if (!ref) continue;
      try {
        elements.push(await this.fetchElement(ref));
      } catch (err) {
        const failure: FailureRecord = {
          scope: 'entry',
          message: `Failed to fetch ${ref.type} element: ${errorMessage(err)}`,
          entryId: raw.id,
          elementId: ref.id,
          projectId: projectId ?? undefined,
        };
        this.logger.warn(failure.message, { entry: raw.id, element: ref.id });
        onFailure?.(failure);
      }
    }

    return {
      id: raw.id,
      projectId,
      projectTitle: raw.project?.title ?? '',
      projectCreatedAt: raw.project?.creation_date ?? undefined,
      projectEntryCount: raw.project?.number_of_entries ?? undefined,
      entryNumber: raw.entry_number ?? undefined,
      title: raw.title ?? '',
      tags: raw.tags ?? [],
      author: toAuthor(raw.author),
      createdAt: raw.creation_date,
      lastEditedAt: raw.version_date ?? undefined,
      elements,
    };
  }

  private async fetchElement(ref: LabfolderElementRef): Promise<Element> {
    const id = ref.id;

    switch (ref.type.toUpperCase()) {
      case 'TEXT':
        return { kind: 'text', id, content: await this.api.getText(id) };
      case 'TABLE':
        return { kind: 'table', id, sheets: await this.api.getTable(id) };
      case 'WELL_PLATE':
        return { kind: 'well_plate', id, sheets: await this.api.getWellPlate(id) };
      case 'DATA':
        return { kind: 'data', id, items: await this.api.getData(id) };
      case 'FILE': {
        const file = await this.api.downloadFile(id);
        return {
          kind: 'file',
          id,
          filename: file.filename ?? `file_${id}`,
          mimeType: file.mimeType,
          data: file.data,
        };
      }
      case 'IMAGE': {
        const image = await this.api.downloadImage(id);
        return {
          kind: 'image',
          id,
          filename: image.filename ?? `image_${id}`,
          mimeType: image.mimeType,
          data: image.data,
        };
      }
      default:
        return { kind: 'unrecognized', id, sourceType: ref.type };
    }
  }
}
