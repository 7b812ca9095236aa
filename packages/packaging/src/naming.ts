/**
 * Package Naming
 *
 * Priority: collection title, then the single file's own title, then
 * `{provider}_{variant}_{identifier}_{epochSeconds}`.
 */

import type { SourceDescriptor } from '@trackdrop/core';
import { getBasename, sanitizeFilename, type ListedFile } from '@trackdrop/utils';

export const ARCHIVE_NAME_MAX_LENGTH = 255;

export interface NamingInput {
  source: SourceDescriptor;
  files: ReadonlyArray<ListedFile>;
  collectionName?: string;
  now?: Date;
}

export function fallbackPackageName(source: SourceDescriptor, now: Date = new Date()): string {
  return `${source.provider}_${source.variant}_${source.identifier}_${Math.floor(now.getTime() / 1000)}`;
}

/**
 * Human-readable name for the package, before sanitizing
 */
export function resolvePackageName(input: NamingInput): string {
  const collectionName = input.collectionName?.trim();
  if (collectionName) {
    return collectionName;
  }

  const [only, ...rest] = input.files;
  if (only && rest.length === 0) {
    const title = getBasename(only.name).trim();
    if (title) {
      return title;
    }
  }

  return fallbackPackageName(input.source, input.now);
}

export function archiveFileName(packageName: string): string {
  return sanitizeFilename(`${packageName}.zip`, ARCHIVE_NAME_MAX_LENGTH);
}

/**
 * Sanitized entry names, unique within the archive:
 *   ["a b.mp3", "a?b.mp3"] -> ["a_b.mp3", "a_b_2.mp3"]
 */
export function archiveEntryNames(fileNames: ReadonlyArray<string>): string[] {
  const seen = new Map<string, number>();
  return fileNames.map(name => {
    const clean = sanitizeFilename(name);
    const count = (seen.get(clean) ?? 0) + 1;
    seen.set(clean, count);
    if (count === 1) {
      return clean;
    }
    const dot = clean.lastIndexOf('.');
    return dot > 0
      ? `${clean.slice(0, dot)}_${count}${clean.slice(dot)}`
      : `${clean}_${count}`;
  });
}
