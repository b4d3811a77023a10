/**
 * Path-safe file helpers for manifest downloads.
 */

import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ValidationError } from '../errors.js';

/**
 * Byte budget for a sanitized name. Filesystems cap names at 255 bytes and
 * the written name gains `.json` plus a `.<uuid>.tmp` suffix while in flight.
 */
export const MAX_FILENAME_BYTES = 200;

// eslint-disable-next-line no-control-regex
const ILLEGAL_CHARACTERS = /[<>:"/\\|?*\u0000-\u001f\u007f]/g;
const EDGE_CHARACTERS = /^[\s._]+|[\s._]+$/g;
const RESERVED_NAMES = /^(con|prn|aux|nul|com[1-9]|lpt[1-9])(\..*)?$/i;

/**
 * Turn an asset title into a filename that is safe on common filesystems.
 *
 * Illegal characters and path separators become `_`, runs of `_` collapse,
 * leading/trailing dots, spaces and underscores are removed, the result is
 * capped at `maxBytes` of UTF-8 on a code point boundary and reserved
 * device names get a `_` prefix.
 *
 * @example
 * sanitizeFilename('My Asset: Cool Edition') // 'My Asset_ Cool Edition'
 * sanitizeFilename('../../etc/passwd')        // 'etc_passwd'
 */
export function sanitizeFilename(title: string, maxBytes: number = MAX_FILENAME_BYTES): string {
  let name = title
    .normalize('NFC')
    .replace(ILLEGAL_CHARACTERS, '_')
    .replace(/_+/g, '_')
    .replace(EDGE_CHARACTERS, '');

  name = truncateUtf8(name, maxBytes).replace(EDGE_CHARACTERS, '');

  if (!name) {
    return 'untitled';
  }

  return RESERVED_NAMES.test(name) ? `_${name}` : name;
}

/**
 * Longest prefix of `value` that fits in `maxBytes` of UTF-8 without
 * splitting a code point.
 */
export function truncateUtf8(value: string, maxBytes: number): string {
  if (Buffer.byteLength(value, 'utf8') <= maxBytes) {
    return value;
  }

  let bytes = 0;
  let result = '';
  for (const char of value) {
    const size = Buffer.byteLength(char, 'utf8');
    if (bytes + size > maxBytes) break;
    bytes += size;
    result += char;
  }
  return result;
}

/**
 * Manifest filename for an asset: `<title>.json`, or `<title>_<uid>.json`
 * when `withUid` is set. The uid suffix always survives truncation.
 */
export function manifestFilename(title: string, uid: string, withUid = false): string {
  if (!withUid) {
    return `${sanitizeFilename(title || uid)}.json`;
  }

  const suffix = `_${sanitizeFilename(uid, 64)}`;
  const stem = sanitizeFilename(title || uid, MAX_FILENAME_BYTES - Buffer.byteLength(suffix, 'utf8'));
  return `${stem}${suffix}.json`;
}

/**
 * Whether `child` is `parent` or lies beneath it.
 */
export function isWithin(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  if (relative === '') return true;
  return relative.split(path.sep)[0] !== '..' && !path.isAbsolute(relative);
}

/**
 * Create `dir` (recursively) and return its resolved path.
 *
 * When `root` is given, the directory must resolve inside it, both
 * lexically and after symlinks are followed.
 */
export async function safeCreateDirectory(dir: string, root?: string): Promise<string> {
  if (!dir || dir.includes('\0')) {
    throw new ValidationError('Output directory path is empty or contains a null byte');
  }

  const resolved = path.resolve(dir);
  const resolvedRoot = root !== undefined ? path.resolve(root) : undefined;

  if (resolvedRoot !== undefined && !isWithin(resolvedRoot, resolved)) {
    throw new ValidationError('Output directory escapes the configured output root');
  }

  await fs.mkdir(resolved, { recursive: true });

  if (resolvedRoot !== undefined) {
    const [realDir, realRoot] = await Promise.all([fs.realpath(resolved), fs.realpath(resolvedRoot)]);
    if (!isWithin(realRoot, realDir)) {
      throw new ValidationError('Output directory escapes the configured output root');
    }
  }

  return resolved;
}

/**
 * Join `filename` onto `dir`, refusing any result outside `dir`.
 */
export function resolveInside(dir: string, filename: string): string {
  const base = path.resolve(dir);
  const target = path.resolve(base, filename);
  if (target === base || !isWithin(base, target)) {
    throw new ValidationError('Destination file escapes the output directory');
  }
  return target;
}

/**
 * Write via a temporary sibling file and rename, so readers never see a
 * partially written file.
 */
export async function writeFileAtomic(filePath: string, data: Uint8Array): Promise<void> {
  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  try {
    await fs.writeFile(tmpPath, data, { flag: 'wx' });
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}
