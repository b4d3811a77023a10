/**
 * Maps raw library-search records onto Asset domain objects.
 *
 * Mapping is lenient: absent or mistyped fields fall back to empty values,
 * with one exception. A record without a non-empty `uid` cannot be an
 * Asset and is dropped.
 */

import type {
  Asset,
  AssetFormatType,
  Capabilities,
  License,
  Listing,
  ListingFormat,
  RawRecord,
  Seller,
  TechnicalSpecs,
} from './types.js';

// ---------------------------------------------------------------------------
// Readers
// ---------------------------------------------------------------------------

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(record: RawRecord, key: string, fallback = ''): string {
  const value = record[key];
  return typeof value === 'string' ? value : fallback;
}

function optStr(record: RawRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function bool(record: RawRecord, key: string, fallback = false): boolean {
  const value = record[key];
  return typeof value === 'boolean' ? value : fallback;
}

function records(record: RawRecord, key: string): RawRecord[] {
  const value = record[key];
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function strings(record: RawRecord, key: string): string[] {
  const value = record[key];
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function nested(record: RawRecord, key: string): RawRecord | undefined {
  const value = record[key];
  return isRecord(value) && Object.keys(value).length > 0 ? value : undefined;
}

/** Parse an ISO-8601 timestamp; invalid or absent values yield undefined */
function date(record: RawRecord, key: string): Date | undefined {
  const value = record[key];
  if (typeof value !== 'string' || value.length === 0) return undefined;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

// ---------------------------------------------------------------------------
// Mappers
// ---------------------------------------------------------------------------

function mapLicense(data: RawRecord): License {
  return {
    name: str(data, 'name'),
    slug: str(data, 'slug'),
    url: optStr(data, 'url'),
    type: optStr(data, 'type'),
    isCc0: bool(data, 'isCc0'),
    priceTier: optStr(data, 'priceTier'),
    uid: optStr(data, 'uid'),
  };
}

function mapSeller(data: RawRecord): Seller {
  return {
    sellerId: str(data, 'sellerId'),
    sellerName: str(data, 'sellerName'),
    uid: str(data, 'uid'),
    profileImageUrl: optStr(data, 'profileImageUrl'),
    coverImageUrl: optStr(data, 'coverImageUrl'),
    isSeller: bool(data, 'isSeller', true),
  };
}

function mapFormatType(data: RawRecord): AssetFormatType {
  return {
    code: str(data, 'code'),
    name: str(data, 'name'),
    icon: str(data, 'icon'),
    groupName: str(data, 'groupName'),
    extensions: strings(data, 'extensions'),
  };
}

function mapTechnicalSpecs(data: RawRecord): TechnicalSpecs {
  return {
    engineVersions: strings(data, 'unrealEngineEngineVersions'),
    targetPlatforms: strings(data, 'unrealEngineTargetPlatforms'),
    distributionMethod: str(data, 'unrealEngineDistributionMethod'),
    technicalDetails: optStr(data, 'technicalDetails'),
  };
}

function mapListingFormat(data: RawRecord): ListingFormat {
  const specs = nested(data, 'technicalSpecs');
  return {
    assetFormatType: mapFormatType(nested(data, 'assetFormatType') ?? {}),
    technicalSpecs: specs ? mapTechnicalSpecs(specs) : undefined,
    versions: records(data, 'versions'),
    raw: data,
  };
}

function mapTags(data: RawRecord): string[] {
  const value = data['tags'];
  if (!Array.isArray(value)) return [];
  const tags: string[] = [];
  for (const tag of value) {
    if (typeof tag === 'string') {
      tags.push(tag);
    } else if (isRecord(tag)) {
      tags.push(str(tag, 'slug'));
    }
  }
  return tags;
}

function mapListing(data: RawRecord): Listing {
  const user = nested(data, 'user');
  return {
    title: str(data, 'title'),
    uid: str(data, 'uid'),
    listingType: str(data, 'listingType'),
    description: optStr(data, 'description'),
    tags: mapTags(data),
    isMature: bool(data, 'isMature'),
    lastUpdatedAt: date(data, 'lastUpdatedAt'),
    licenses: records(data, 'licenses').map(mapLicense),
    seller: user ? mapSeller(user) : undefined,
    assetFormats: records(data, 'assetFormats').map(mapListingFormat),
    raw: data,
  };
}

function mapCapabilities(data: RawRecord): Capabilities {
  return {
    addByVerse: bool(data, 'addByVerse'),
    requestDownloadUrl: bool(data, 'requestDownloadUrl'),
  };
}

/**
 * Map one raw record to an Asset. Returns null when the record has no
 * usable uid.
 */
export function mapAssetRecord(record: RawRecord): Asset | null {
  const uid = str(record, 'uid').trim();
  if (!uid) {
    return null;
  }

  const listingData = nested(record, 'listing');
  const listing = listingData ? mapListing(listingData) : undefined;
  const capabilities = nested(record, 'capabilities');

  return {
    uid,
    title: listing?.title || str(record, 'title'),
    createdAt: date(record, 'createdAt'),
    status: str(record, 'status'),
    capabilities: capabilities ? mapCapabilities(capabilities) : undefined,
    grantedLicenses: records(record, 'licenses').map(mapLicense),
    listing,
    raw: record,
  };
}
