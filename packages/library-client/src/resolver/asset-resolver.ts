/**
 * Asset resolver.
 *
 * Discovers an asset's formats and turns the file of the target format into
 * a concrete manifest download URL.
 *
 * @module asset-resolver
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { APIError, NotFoundError, ValidationError } from '../errors.js';
import type { ApiRequester } from '../http/api-requester.js';
import { isRecord } from '../library/asset-mapper.js';
import type { RawRecord } from '../library/types.js';
import { isAbsoluteUrl, renderEndpoint } from '../transport/endpoints.js';
import type { EndpointTemplates } from '../transport/types.js';
import type { AssetFormatEntry, FormatFile, ManifestLocation, ResolvedManifest } from './types.js';

const DownloadInfoResponseSchema = z.object({
  downloadInfo: z.array(z.unknown()).nullish(),
});

/** Keys under which the formats list may be wrapped */
const WRAPPER_KEYS = ['assetFormats', 'formats', 'results'] as const;

export interface AssetResolverOptions {
  /** Format code whose file is used by `resolve()` */
  formatCode: string;

  /** Platform query parameter for download info; omitted when empty */
  platform?: string;
}

export class AssetResolver {
  private readonly requester: ApiRequester;
  private readonly endpoints: EndpointTemplates;
  private readonly options: AssetResolverOptions;
  private readonly logger: Logger;

  constructor(
    requester: ApiRequester,
    endpoints: EndpointTemplates,
    options: AssetResolverOptions,
    logger: Logger,
  ) {
    this.requester = requester;
    this.endpoints = endpoints;
    this.options = options;
    this.logger = logger.child({ component: 'asset-resolver' });
  }

  /**
   * List an asset's formats. The response may be a list, an object wrapping
   * a list, or a single format object; the result is always a list.
   */
  async listFormats(assetUid: string): Promise<AssetFormatEntry[]> {
    const url = renderEndpoint(
      this.endpoints.assetFormats,
      { asset_uid: assetUid },
      this.endpoints.baseUrl,
    );
    const body = await this.requester.getJson('asset-formats', url);
    return normalizeFormats(body);
  }

  /**
   * Resolve the manifest URL for one file of an asset.
   * Throws NotFoundError when no download entry has type "manifest".
   */
  async resolveManifestUrl(assetUid: string, fileUid: string): Promise<ManifestLocation> {
    const url = renderEndpoint(
      this.endpoints.downloadInfo,
      { asset_uid: assetUid, file_uid: fileUid },
      this.endpoints.baseUrl,
    );
    const body = await this.requester.getJson('download-info', url, {
      platform: this.options.platform || undefined,
    });

    const parsed = DownloadInfoResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new APIError('download-info returned an unexpected payload shape', {
        endpoint: 'download-info',
      });
    }

    return selectManifestEntry(parsed.data.downloadInfo ?? []);
  }

  /**
   * Resolve the manifest URL of an asset for the configured format.
   */
  async resolve(assetUid: string): Promise<ResolvedManifest> {
    const formats = await this.listFormats(assetUid);
    const fileUid = findFileUid(formats, this.options.formatCode);
    if (!fileUid) {
      throw new NotFoundError(`No ${this.options.formatCode} format file found for asset`);
    }

    const location = await this.resolveManifestUrl(assetUid, fileUid);
    this.logger.debug({ assetUid, fileUid, expires: location.expires }, 'Manifest URL resolved');

    return { assetUid, fileUid, ...location };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Normalise an asset-formats response body to a list of entries.
 */
export function normalizeFormats(body: unknown): AssetFormatEntry[] {
  let items: unknown[] = [];

  if (Array.isArray(body)) {
    items = body;
  } else if (isRecord(body)) {
    const wrapped = WRAPPER_KEYS.map((key) => body[key]).find(
      (value): value is unknown[] => Array.isArray(value),
    );
    items = wrapped ?? [body];
  }

  return items.filter(isRecord).map(toFormatEntry);
}

function toFormatEntry(raw: RawRecord): AssetFormatEntry {
  const formatType = raw['assetFormatType'];
  const code = isRecord(formatType) ? formatType['code'] : undefined;
  const type =
    typeof raw['type'] === 'string' ? raw['type'] : typeof code === 'string' ? code : '';

  const files: FormatFile[] = [];
  const rawFiles = raw['files'];
  if (Array.isArray(rawFiles)) {
    for (const file of rawFiles) {
      if (isRecord(file) && typeof file['uid'] === 'string' && file['uid']) {
        files.push({ uid: file['uid'], raw: file });
      }
    }
  }

  return { type, files, raw };
}

/**
 * First file uid of the first format matching `formatCode` that has files.
 */
export function findFileUid(formats: AssetFormatEntry[], formatCode: string): string | undefined {
  for (const format of formats) {
    if (format.type === formatCode && format.files.length > 0) {
      return format.files[0]?.uid;
    }
  }
  return undefined;
}

/**
 * Pick the first download entry of type "manifest".
 */
export function selectManifestEntry(entries: unknown[]): ManifestLocation {
  const entry = entries.filter(isRecord).find((info) => info['type'] === 'manifest');
  if (!entry) {
    throw new NotFoundError('download-info has no manifest entry');
  }

  const downloadUrl = entry['downloadUrl'];
  if (typeof downloadUrl !== 'string' || !downloadUrl) {
    throw new NotFoundError('download-info manifest entry has no downloadUrl');
  }
  if (!isAbsoluteUrl(downloadUrl)) {
    throw new ValidationError('download-info manifest URL is not an absolute http(s) URL');
  }

  const expires = entry['expires'];
  return {
    url: downloadUrl,
    expires: typeof expires === 'string' ? expires : undefined,
  };
}
