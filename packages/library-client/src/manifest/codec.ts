/**
 * JSON manifest codec.
 *
 * Decodes UTF-8 JSON and maps the top-level manifest fields. With
 * validation on, the document is checked against the manifest schema
 * before any field is read, and every failing path is reported.
 */

import { TextDecoder } from 'node:util';
import { ManifestError } from '../errors.js';
import { isRecord } from '../library/asset-mapper.js';
import type { RawRecord } from '../library/types.js';
import { ManifestSchema, formatIssues } from './schema.js';
import type { ManifestCodec, ManifestFile, ParsedManifest } from './types.js';

export interface JsonManifestCodecOptions {
  /** Validate against the manifest schema (default: false) */
  validate?: boolean;
}

export class JsonManifestCodec implements ManifestCodec {
  private readonly validate: boolean;

  constructor(options?: JsonManifestCodecOptions) {
    this.validate = options?.validate ?? false;
  }

  parse(bytes: Uint8Array): ParsedManifest {
    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (err) {
      throw new ManifestError('invalid manifest: payload is not valid UTF-8', [], err);
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      throw new ManifestError('invalid manifest: payload is not valid JSON', [], err);
    }

    if (this.validate) {
      const result = ManifestSchema.safeParse(data);
      if (!result.success) {
        const issues = formatIssues(result.error);
        throw new ManifestError(`manifest failed schema validation: ${issues.join('; ')}`, issues);
      }
    }

    if (!isRecord(data)) {
      throw new ManifestError('invalid manifest: top-level value is not an object');
    }

    return manifestFromRecord(data);
  }
}

function str(record: RawRecord, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Map a decoded manifest document. Missing fields become empty values.
 */
export function manifestFromRecord(data: RawRecord): ParsedManifest {
  const list = data['FileManifestList'];
  const files: ManifestFile[] = Array.isArray(list)
    ? list.filter(isRecord).map((entry) => {
        const parts = entry['FileChunkParts'];
        return {
          filename: str(entry, 'Filename'),
          fileHash: str(entry, 'FileHash'),
          chunkParts: Array.isArray(parts) ? parts.filter(isRecord) : [],
        };
      })
    : [];

  return {
    version: str(data, 'ManifestFileVersion'),
    appId: str(data, 'AppID'),
    appName: str(data, 'AppNameString'),
    buildVersion: str(data, 'BuildVersionString'),
    files,
    raw: data,
  };
}
