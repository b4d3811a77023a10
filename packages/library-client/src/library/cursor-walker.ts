/**
 * Pagination cursor walker for the library-search endpoint.
 *
 * Follows the server-issued `cursors.next` token page by page until it is
 * absent. Cursors are treated as opaque and single-use: a walk never sends
 * the same cursor twice, and nothing is kept once the walk ends.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { APIError } from '../errors.js';
import type { ApiRequester } from '../http/api-requester.js';
import { renderEndpoint } from '../transport/endpoints.js';
import type { EndpointTemplates } from '../transport/types.js';
import { isRecord, mapAssetRecord } from './asset-mapper.js';
import { Library } from './library.js';
import type { Asset, Cursor, LibraryPage } from './types.js';

const LibrarySearchResponseSchema = z.object({
  results: z.array(z.unknown()).nullish(),
  cursors: z
    .object({
      next: z.string().nullish(),
      previous: z.string().nullish(),
    })
    .nullish(),
  total: z.number().int().nonnegative().nullish(),
});

export interface CursorWalkerOptions {
  /** Maximum pages fetched per walk */
  maxPages: number;
}

export class CursorWalker {
  private readonly requester: ApiRequester;
  private readonly endpoints: EndpointTemplates;
  private readonly options: CursorWalkerOptions;
  private readonly logger: Logger;

  constructor(
    requester: ApiRequester,
    endpoints: EndpointTemplates,
    options: CursorWalkerOptions,
    logger: Logger,
  ) {
    this.requester = requester;
    this.endpoints = endpoints;
    this.options = options;
    this.logger = logger.child({ component: 'cursor-walker' });
  }

  /**
   * Fetch one page. `cursor` is null for the first page.
   */
  async fetchPage(cursor: Cursor | null, sortBy: string): Promise<LibraryPage> {
    const url = renderEndpoint(this.endpoints.librarySearch, {}, this.endpoints.baseUrl);
    const body = await this.requester.getJson('library-search', url, {
      sortBy,
      cursor: cursor ?? undefined,
    });

    const parsed = LibrarySearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new APIError('library-search returned an unexpected payload shape', {
        endpoint: 'library-search',
      });
    }

    const rawResults = parsed.data.results ?? [];
    const records = rawResults.filter(isRecord);
    if (records.length !== rawResults.length) {
      this.logger.warn(
        { dropped: rawResults.length - records.length },
        'Dropped library results that are not objects',
      );
    }

    return {
      records,
      nextCursor: parsed.data.cursors?.next || null,
      previousCursor: parsed.data.cursors?.previous || null,
      total: parsed.data.total ?? undefined,
    };
  }

  /**
   * Lazily yield pages in server order. Each call starts a fresh walk.
   */
  async *walk(sortBy: string): AsyncGenerator<LibraryPage, void, undefined> {
    const consumed = new Set<Cursor>();
    let cursor: Cursor | null = null;
    let pageCount = 0;

    while (true) {
      if (pageCount >= this.options.maxPages) {
        throw new APIError(
          `library-search exceeded the limit of ${this.options.maxPages} pages`,
          { endpoint: 'library-search' },
        );
      }

      if (cursor !== null) {
        if (consumed.has(cursor)) {
          throw new APIError('library-search returned a cursor that was already consumed', {
            endpoint: 'library-search',
          });
        }
        consumed.add(cursor);
      }

      const page = await this.fetchPage(cursor, sortBy);
      pageCount++;

      this.logger.debug(
        { page: pageCount, results: page.records.length, hasNext: page.nextCursor !== null },
        'Fetched library page',
      );

      yield page;

      if (page.nextCursor === null) {
        return;
      }
      cursor = page.nextCursor;
    }
  }

  /**
   * Drain a walk into a Library. The total count comes from the first page
   * and falls back to the number of collected assets.
   */
  async collect(sortBy: string): Promise<Library> {
    const assets: Asset[] = [];
    let total: number | undefined;
    let first = true;

    for await (const page of this.walk(sortBy)) {
      if (first) {
        total = page.total;
        first = false;
      }
      assets.push(...pageAssets(page, this.logger));
    }

    this.logger.info({ assets: assets.length, total }, 'Library collected');

    return new Library(assets, total ?? assets.length);
  }
}

/**
 * Map a page's records to assets, dropping records without a uid.
 */
export function pageAssets(page: LibraryPage, logger?: Logger): Asset[] {
  const assets: Asset[] = [];
  for (const record of page.records) {
    const asset = mapAssetRecord(record);
    if (asset) {
      assets.push(asset);
    } else {
      logger?.warn('Skipped library record without a uid');
    }
  }
  return assets;
}
