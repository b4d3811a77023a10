import type { RawRecord } from '../library/types.js';

/** A downloadable file of an asset format */
export interface FormatFile {
  uid: string;
  raw: RawRecord;
}

/** One entry of the asset-formats response */
export interface AssetFormatEntry {
  /** Format code, from `type` or `assetFormatType.code` */
  type: string;
  files: FormatFile[];
  raw: RawRecord;
}

/** Where a manifest can be fetched from */
export interface ManifestLocation {
  url: string;

  /** Expiry timestamp as reported by the server */
  expires?: string;
}

export interface ResolvedManifest extends ManifestLocation {
  assetUid: string;
  fileUid: string;
}
