/**
 * Download outcomes.
 *
 * A success outcome is a handle on the written manifest file. Parsing is
 * deferred until `load()` is called and the parsed value is cached, but the
 * file's presence is re-checked on every call.
 */

import * as fs from 'node:fs/promises';
import { ManifestFileMissingError, OutcomeStateError } from '../errors.js';
import type { ManifestCodec, ParsedManifest } from '../manifest/types.js';

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class ManifestDownloadSuccess {
  readonly success = true;
  readonly assetUid: string;
  readonly filePath: string;

  /** Bytes written */
  readonly size: number;

  private readonly codec: ManifestCodec;
  private cached: ParsedManifest | null = null;

  constructor(assetUid: string, filePath: string, size: number, codec: ManifestCodec) {
    this.assetUid = assetUid;
    this.filePath = filePath;
    this.size = size;
    this.codec = codec;
  }

  /**
   * Read and parse the manifest file.
   * Throws ManifestFileMissingError once the file has been removed.
   */
  async load(): Promise<ParsedManifest> {
    try {
      await fs.access(this.filePath);
      if (this.cached) {
        return this.cached;
      }
      const data = await fs.readFile(this.filePath);
      this.cached = this.codec.parse(data);
      return this.cached;
    } catch (err) {
      if (isMissingFileError(err)) {
        this.cached = null;
        throw new ManifestFileMissingError(this.filePath);
      }
      throw err;
    }
  }
}

export class ManifestDownloadFailure {
  readonly success = false;
  readonly assetUid: string;

  /** Redacted, human-readable reason prefixed with the failing phase */
  readonly error: string;

  constructor(assetUid: string, error: string) {
    this.assetUid = assetUid;
    this.error = error;
  }

  load(): Promise<ParsedManifest> {
    return Promise.reject(
      new OutcomeStateError(`Cannot load manifest: download was not successful (${this.error})`),
    );
  }
}

/** Result of one asset's manifest download */
export type DownloadOutcome = ManifestDownloadSuccess | ManifestDownloadFailure;
