/**
 * Parsed manifest types.
 */

import type { RawRecord } from '../library/types.js';

/** One file listed in a manifest */
export interface ManifestFile {
  filename: string;
  fileHash: string;

  /** Chunk-part descriptors, passed through as-is */
  chunkParts: RawRecord[];
}

export interface ParsedManifest {
  version: string;
  appId: string;
  appName: string;
  buildVersion: string;
  files: ManifestFile[];
  raw: RawRecord;
}

/** Converts a manifest payload into a ParsedManifest */
export interface ManifestCodec {
  parse(bytes: Uint8Array): ParsedManifest;
}

export type ManifestFormat = 'json' | 'binary';
