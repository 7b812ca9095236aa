/**
 * Packager
 *
 * Turns a job's output files into something deliverable: the file itself,
 * or an encrypted archive in the job's working directory.
 */

import { join } from 'node:path';
import type { SourceDescriptor } from '@trackdrop/core';
import { createLogger, type ListedFile, type Logger } from '@trackdrop/utils';
import { createEncryptedArchive, type ArchiveProgress } from './archive.js';
import { DEFAULT_DIRECT_SEND_LIMIT_BYTES, decideDelivery, type ArchiveReason } from './decision.js';
import { archiveFileName, resolvePackageName } from './naming.js';

export interface PackagerOptions {
  directSendLimitBytes?: number;
  logger?: Logger;
}

export interface PackageRequest {
  files: ReadonlyArray<ListedFile>;
  source: SourceDescriptor;
  /** Archives are written here, outside the tools' output directory */
  workingDirectory: string;
  password: string;
  collectionName?: string;
  onArchiveProgress?: ArchiveProgress;
}

export type PackageResult =
  | { kind: 'direct'; file: ListedFile }
  | {
      kind: 'archive';
      reason: ArchiveReason;
      name: string;
      archivePath: string;
      size: number;
      itemCount: number;
      password: string;
    };

export class Packager {
  private readonly directSendLimitBytes: number;
  private readonly logger: Logger;

  constructor(options: PackagerOptions = {}) {
    this.directSendLimitBytes = options.directSendLimitBytes ?? DEFAULT_DIRECT_SEND_LIMIT_BYTES;
    this.logger = options.logger ?? createLogger({ component: 'packager' });
  }

  async package(request: PackageRequest): Promise<PackageResult> {
    const decision = decideDelivery(request.files, request.source, this.directSendLimitBytes);
    if (decision.kind === 'direct') {
      this.logger.info({ file: decision.file.name, size: decision.file.size }, 'Sending file directly');
      return decision;
    }

    const name = resolvePackageName({
      source: request.source,
      files: decision.files,
      collectionName: request.collectionName,
    });
    const archivePath = join(request.workingDirectory, archiveFileName(name));
    this.logger.info({ name, reason: decision.reason, files: decision.files.length }, 'Archiving output');

    const archive = await createEncryptedArchive(
      decision.files,
      archivePath,
      request.password,
      request.onArchiveProgress
    );

    return {
      kind: 'archive',
      reason: decision.reason,
      name,
      archivePath: archive.path,
      size: archive.size,
      itemCount: archive.entries,
      password: request.password,
    };
  }
}
