/**
 * File Operations
 *
 * Safe file operations with proper error handling.
 */

import { mkdir, readdir, rm, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { isObject } from './guards.js';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Get file size in bytes
 */
export async function getFileSizeBytes(filePath: string): Promise<number> {
  const stats = await stat(filePath);
  return stats.size;
}

export interface ListedFile {
  path: string;
  name: string;
  size: number;
}

/**
 * List regular files directly inside a directory, optionally filtered by
 * extension (lowercase, with leading dot). A missing directory lists as empty.
 */
export async function listFiles(
  dirPath: string,
  extensions?: ReadonlyArray<string>
): Promise<ListedFile[]> {
  let names: string[];
  try {
    names = await readdir(dirPath);
  } catch (error) {
    if (isObject(error) && error['code'] === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const files: ListedFile[] = [];
  for (const name of names.sort()) {
    if (extensions && !extensions.includes(extname(name).toLowerCase())) {
      continue;
    }
    const path = join(dirPath, name);
    const stats = await stat(path);
    if (stats.isFile()) {
      files.push({ path, name, size: stats.size });
    }
  }
  return files;
}

/**
 * Recursively remove a directory. Never throws for a missing path.
 */
export async function removeDir(dirPath: string): Promise<void> {
  await rm(dirPath, { recursive: true, force: true });
}
