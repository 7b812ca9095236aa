/**
 * Encrypted Archive
 *
 * AES-256 ZIP built with archiver and the zip-encrypted format. Deflate
 * runs on zlib's thread pool; entry progress comes back on the event loop.
 */

import { createWriteStream } from 'node:fs';
import archiver from 'archiver';
import zipEncrypted from 'archiver-zip-encrypted';
import { ArchiveError } from '@trackdrop/core';
import { createLogger, getFileSizeBytes } from '@trackdrop/utils';
import { archiveEntryNames } from './naming.js';

const logger = createLogger({ component: 'archive' });

const FORMAT = 'zip-encrypted';
let formatRegistered = false;

interface EncryptedZipOptions extends archiver.ArchiverOptions {
  encryptionMethod: 'aes256' | 'zip20';
  password: string;
}

export interface ArchiveSource {
  path: string;
  name: string;
}

export interface ArchiveResult {
  path: string;
  size: number;
  entries: number;
}

export type ArchiveProgress = (processed: number, total: number) => void;

function ensureFormat(): void {
  if (!formatRegistered) {
    archiver.registerFormat(FORMAT, zipEncrypted);
    formatRegistered = true;
  }
}

export async function createEncryptedArchive(
  files: ReadonlyArray<ArchiveSource>,
  archivePath: string,
  password: string,
  onProgress?: ArchiveProgress
): Promise<ArchiveResult> {
  ensureFormat();

  const names = archiveEntryNames(files.map(file => file.name));
  const total = files.length;

  try {
    await new Promise<void>((resolve, reject) => {
      const output = createWriteStream(archivePath);
      const options: EncryptedZipOptions = {
        zlib: { level: 6 },
        encryptionMethod: 'aes256',
        password,
      };
      const archive = archiver.create(FORMAT, options);
      let processed = 0;

      output.on('close', () => resolve());
      output.on('error', reject);
      archive.on('error', reject);
      archive.on('warning', (error: archiver.ArchiverError) => {
        if (error.code === 'ENOENT') {
          logger.warn({ error: error.message }, 'Archive entry missing');
          return;
        }
        reject(error);
      });
      archive.on('entry', () => {
        processed += 1;
        onProgress?.(processed, total);
      });

      archive.pipe(output);
      files.forEach((file, index) => {
        archive.file(file.path, { name: names[index] ?? file.name });
      });
      archive.finalize().catch(reject);
    });
  } catch (error) {
    throw new ArchiveError(archivePath, error instanceof Error ? error.message : String(error));
  }

  const size = await getFileSizeBytes(archivePath);
  logger.info({ archivePath, entries: total, size }, 'Encrypted archive created');
  return { path: archivePath, size, entries: total };
}
