/**
 * Domain types for the remote asset library.
 *
 * These are plain data containers. The pagination and download pipeline
 * only reads `uid` and `title`; everything else is passed through.
 */

/** Untyped record as returned by the remote service */
export type RawRecord = Record<string, unknown>;

/**
 * Opaque pagination continuation token issued by the server.
 * Never parsed, combined or persisted; valid only within one walk.
 */
export type Cursor = string;

/** License attached to a listing or granted with an entitlement */
export interface License {
  name: string;
  slug: string;
  url?: string;
  type?: string;
  isCc0: boolean;
  priceTier?: string;
  uid?: string;
}

/** Seller/creator of a listing */
export interface Seller {
  sellerId: string;
  sellerName: string;
  uid: string;
  profileImageUrl?: string;
  coverImageUrl?: string;
  isSeller: boolean;
}

export interface AssetFormatType {
  code: string;
  name: string;
  icon: string;
  groupName: string;
  extensions: string[];
}

export interface TechnicalSpecs {
  engineVersions: string[];
  targetPlatforms: string[];
  distributionMethod: string;
  technicalDetails?: string;
}

/** A format advertised on a listing */
export interface ListingFormat {
  assetFormatType: AssetFormatType;
  technicalSpecs?: TechnicalSpecs;
  versions: RawRecord[];
  raw: RawRecord;
}

/** Marketplace listing details for an asset */
export interface Listing {
  title: string;
  uid: string;
  listingType: string;
  description?: string;
  tags: string[];
  isMature: boolean;
  lastUpdatedAt?: Date;
  licenses: License[];
  seller?: Seller;
  assetFormats: ListingFormat[];
  raw: RawRecord;
}

/** Entitlement capabilities */
export interface Capabilities {
  addByVerse: boolean;
  requestDownloadUrl: boolean;
}

/** One entitled library item */
export interface Asset {
  /** Unique, non-empty identity key */
  uid: string;
  title: string;
  createdAt?: Date;
  status: string;
  capabilities?: Capabilities;
  grantedLicenses: License[];
  listing?: Listing;
  raw: RawRecord;
}

/** One pagination response unit */
export interface LibraryPage {
  records: RawRecord[];

  /** `null` ends the walk */
  nextCursor: Cursor | null;

  previousCursor: Cursor | null;

  /** Total reported by the server, when present */
  total?: number;
}
