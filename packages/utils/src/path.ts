/**
 * Path Utilities
 */

import { extname, basename } from 'node:path';

export const DEFAULT_MAX_FILENAME_LENGTH = 240;
const MAX_EXTENSION_LENGTH = 10;

/**
 * Sanitize a filename to be safe for filesystem and upload targets.
 *
 * Unicode is decomposed (NFKD) and reduced to ASCII, runs of whitespace and
 * path-unsafe characters become `_`, and the result is cut to `maxLength`
 * characters with the extension kept intact.
 */
export function sanitizeFilename(
  filename: string,
  maxLength: number = DEFAULT_MAX_FILENAME_LENGTH
): string {
  const rawExt = extname(filename);
  const ext = toAscii(rawExt).slice(0, MAX_EXTENSION_LENGTH);
  const stem = rawExt ? filename.slice(0, -rawExt.length) : filename;

  let base = toAscii(stem)
    // Remove control characters
    .replace(/[\x00-\x1f\x7f]/g, '')
    // Replace whitespace and reserved characters
    .replace(/[\s/\\:*?"<>|]+/g, '_');

  const maxBaseLength = Math.max(1, maxLength - ext.length);
  if (base.length > maxBaseLength) {
    base = base.slice(0, maxBaseLength);
  }
  if (!base) {
    base = '_';
  }

  return base + ext;
}

function toAscii(value: string): string {
  return value.normalize('NFKD').replace(/[^\x00-\x7f]/g, '');
}

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename);
  return ext.toLowerCase().replace(/^\./, '');
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}
