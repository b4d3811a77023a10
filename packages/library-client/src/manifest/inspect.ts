/**
 * Manifest file inspection helpers.
 */

import * as fs from 'node:fs/promises';
import { ManifestError, ManifestFileMissingError } from '../errors.js';
import { ManifestSchema } from './schema.js';
import type { ManifestFormat } from './types.js';

const OPEN_BRACE = 0x7b;

async function readManifestFile(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ManifestFileMissingError(filePath);
    }
    throw err;
  }
}

/**
 * Whether a manifest file holds JSON or a binary/compressed payload,
 * judged by its first byte.
 */
export async function detectManifestFormat(filePath: string): Promise<ManifestFormat> {
  const data = await readManifestFile(filePath);
  return data[0] === OPEN_BRACE ? 'json' : 'binary';
}

/**
 * Check a manifest file against the manifest schema.
 *
 * Returns false when the document is JSON but does not match the schema.
 * Throws ManifestFileMissingError when the file is absent and ManifestError
 * when it is not JSON at all.
 */
export async function validateManifestFile(filePath: string): Promise<boolean> {
  const data = await readManifestFile(filePath);

  if (data[0] !== OPEN_BRACE) {
    throw new ManifestError('invalid manifest: file is not JSON (appears to be binary)');
  }

  let document: unknown;
  try {
    document = JSON.parse(data.toString('utf-8'));
  } catch (err) {
    throw new ManifestError('invalid manifest: payload is not valid JSON', [], err);
  }

  return ManifestSchema.safeParse(document).success;
}
