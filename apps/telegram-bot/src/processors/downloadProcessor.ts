/**
 * Download Processor
 *
 * The job boundary. Owns the active-job slot per user and runs one job
 * from the first progress message to the final delivery message:
 *
 *   acquire → (failure message | package → send directly or upload) → clean up
 *
 * Nothing thrown inside a job escapes it; unexpected errors are logged and
 * turned into one generic failure message. The working directory is removed
 * after every terminal outcome, cancellation included.
 */

import { randomBytes, randomUUID } from 'node:crypto';
import { extname, join } from 'node:path';
import {
  ArchiveError,
  JobCancelledError,
  SessionRegistry,
  UploadFailedError,
  isTrackdropError,
  type ChatTransport,
  type DownloadJob,
  type FormatChoice,
  type SentFileKind,
  type SourceDescriptor,
} from '@trackdrop/core';
import {
  computePercentage,
  type JobProgress,
  type OrchestrationHooks,
  type OrchestrationResult,
  type ProgressAggregator,
} from '@trackdrop/acquisition';
import { generateArchivePassword, type PackageRequest, type PackageResult } from '@trackdrop/packaging';
import type { Uploader } from '@trackdrop/upload';
import { createLogger, ensureDir, formatElapsed, removeDir, sleep, type Logger } from '@trackdrop/utils';
import {
  MESSAGES,
  archiveReady,
  collectionAnnouncement,
  directDelivered,
  failureMessage,
  startingDownload,
} from '../messages.js';

export interface JobRequest {
  userId: number;
  chatId: number;
  source: SourceDescriptor;
  format: FormatChoice;
}

export interface LaunchedJob {
  job: DownloadJob;
  /** Settles when the job and its cleanup are done; never rejects */
  completion: Promise<void>;
}

export interface JobLauncher {
  isBusy(userId: number): boolean;
  /** Claims the user's slot synchronously. Null when the slot is taken. */
  start(request: JobRequest): LaunchedJob | null;
  cancel(userId: number): boolean;
}

export interface JobExecutor {
  execute(
    job: DownloadJob,
    progress: JobProgress,
    signal: AbortSignal,
    hooks?: OrchestrationHooks
  ): Promise<OrchestrationResult>;
}

export interface JobPackager {
  package(request: PackageRequest): Promise<PackageResult>;
}

export interface DownloadProcessorOptions {
  transport: ChatTransport;
  orchestrator: JobExecutor;
  progress: ProgressAggregator;
  packager: JobPackager;
  uploader: Uploader;
  /** Parent of every job's working directory */
  storageDir: string;
  cleanupGraceMs?: number;
  generatePassword?: () => string;
  logger?: Logger;
}

interface ActiveJob {
  job: DownloadJob;
  abort: AbortController;
  /** Set once the progress message exists */
  progress?: JobProgress;
}

const DIRECT_AUDIO_EXTENSIONS: readonly string[] = ['.mp3', '.m4a', '.flac'];
const DIRECT_VIDEO_EXTENSIONS: readonly string[] = ['.mp4', '.webm'];

export function sentFileKind(fileName: string): SentFileKind {
  const extension = extname(fileName).toLowerCase();
  if (DIRECT_AUDIO_EXTENSIONS.includes(extension)) {
    return 'audio';
  }
  if (DIRECT_VIDEO_EXTENSIONS.includes(extension)) {
    return 'video';
  }
  return 'document';
}

export class DownloadProcessor implements JobLauncher {
  private readonly active = new SessionRegistry<ActiveJob>();
  private readonly transport: ChatTransport;
  private readonly orchestrator: JobExecutor;
  private readonly progress: ProgressAggregator;
  private readonly packager: JobPackager;
  private readonly uploader: Uploader;
  private readonly storageDir: string;
  private readonly cleanupGraceMs: number;
  private readonly generatePassword: () => string;
  private readonly logger: Logger;

  constructor(options: DownloadProcessorOptions) {
    this.transport = options.transport;
    this.orchestrator = options.orchestrator;
    this.progress = options.progress;
    this.packager = options.packager;
    this.uploader = options.uploader;
    this.storageDir = options.storageDir;
    this.cleanupGraceMs = options.cleanupGraceMs ?? 2000;
    this.generatePassword = options.generatePassword ?? generateArchivePassword;
    this.logger = options.logger ?? createLogger({ component: 'processor' });
  }

  isBusy(userId: number): boolean {
    return this.active.has(userId);
  }

  get activeCount(): number {
    return this.active.size;
  }

  start(request: JobRequest): LaunchedJob | null {
    const workingDirectory = join(
      this.storageDir,
      `user_${request.userId}_${Date.now()}_${randomBytes(3).toString('hex')}`
    );
    const job: DownloadJob = {
      id: randomUUID(),
      userId: request.userId,
      chatId: request.chatId,
      source: request.source,
      format: request.format,
      workingDirectory,
      outputDirectory: join(workingDirectory, 'downloads'),
      startedAt: new Date(),
    };

    const entry: ActiveJob = { job, abort: new AbortController() };
    if (!this.active.tryCreate(request.userId, entry)) {
      return null;
    }

    const completion = this.run(entry).catch((error: unknown) => {
      this.logger.error({ jobId: job.id, error }, 'Job boundary leaked an error');
    });
    return { job, completion };
  }

  /**
   * Abort the user's job and free the slot immediately
   */
  cancel(userId: number): boolean {
    const entry = this.active.evict(userId);
    if (!entry) {
      return false;
    }
    entry.abort.abort(new JobCancelledError(entry.job.id));
    entry.progress?.stop().catch((error: unknown) => {
      this.logger.warn({ jobId: entry.job.id, error }, 'Progress did not stop cleanly');
    });
    this.logger.info({ jobId: entry.job.id, userId }, 'Job cancelled');
    return true;
  }

  private async run(entry: ActiveJob): Promise<void> {
    const { job } = entry;
    const { signal } = entry.abort;
    const log = this.logger.child({ jobId: job.id, userId: job.userId });
    let messageId: number | undefined;

    try {
      await ensureDir(job.outputDirectory);
      messageId = await this.transport.sendText(job.chatId, startingDownload(job.source), { markdown: true });
      if (signal.aborted) {
        return;
      }

      const password = this.generatePassword();
      const progress = this.progress.start({ userId: job.userId, chatId: job.chatId, messageId, zipPassword: password });
      entry.progress = progress;

      const result = await this.orchestrator.execute(job, progress, signal, {
        onCollectionFound: async (name, count) => {
          await this.transport.sendText(
            job.chatId,
            collectionAnnouncement(name, count, job.source.variant),
            { markdown: true }
          );
        },
      });

      if (result.status === 'cancelled' || signal.aborted) {
        log.info('Acquisition stopped by cancellation');
        return;
      }

      if (result.status === 'failed') {
        await this.finish(entry, messageId, failureMessage(result.failureReason ?? 'generic', job.source));
        return;
      }

      await this.deliver(entry, progress, messageId, password, result, log);
    } catch (error) {
      if (signal.aborted) {
        log.debug({ error }, 'Job interrupted by cancellation');
        return;
      }

      log.error({ error, code: isTrackdropError(error) ? error.code : undefined }, 'Job failed');
      const text = error instanceof ArchiveError ? MESSAGES.archiveFailed : MESSAGES.processingFailed;
      await this.report(entry, messageId, text, log);
    } finally {
      this.active.evictIf(job.userId, entry);
      await entry.progress?.stop();
      log.info({ elapsed: formatElapsed(Date.now() - job.startedAt.getTime()) }, 'Job finished');
      await this.cleanup(job, log);
    }
  }

  private async deliver(
    entry: ActiveJob,
    progress: JobProgress,
    messageId: number,
    password: string,
    result: OrchestrationResult,
    log: Logger
  ): Promise<void> {
    const { job } = entry;
    const { signal } = entry.abort;
    const partial = result.status === 'partial';

    await progress.publish();

    const packaged = await this.packager.package({
      files: result.files,
      source: job.source,
      workingDirectory: job.workingDirectory,
      password,
      collectionName: result.collectionName,
      onArchiveProgress: (processed, total) => {
        progress.setUpload(
          computePercentage(processed, total),
          `Compressing files... (${processed}/${total})`,
          'packaging'
        );
      },
    });
    if (signal.aborted) {
      return;
    }

    if (packaged.kind === 'direct') {
      const sent = await this.transport.sendFile(job.chatId, packaged.file.path, sentFileKind(packaged.file.name));
      await this.finish(
        entry,
        messageId,
        sent ? directDelivered(packaged.file.name, packaged.file.size, partial) : MESSAGES.processingFailed
      );
      return;
    }

    progress.setUpload(0, 'Starting upload...');
    await progress.publish();

    const upload = await this.uploader.upload(packaged.archivePath, (percentage, status) => {
      progress.setUpload(percentage, status);
    });
    if (signal.aborted) {
      return;
    }

    if (!upload.success || !upload.link) {
      log.warn({ error: new UploadFailedError(packaged.archivePath, upload.error) }, 'Upload failed');
      await this.finish(entry, messageId, MESSAGES.uploadFailed);
      return;
    }

    await this.finish(entry, messageId, archiveReady({
      source: job.source,
      name: packaged.name,
      itemCount: packaged.itemCount,
      size: packaged.size,
      link: upload.link,
      password: packaged.password,
      partial,
    }));
  }

  /**
   * Stop publishing and wait out any edit already on its way, then replace
   * the progress message with the final text
   */
  private async finish(entry: ActiveJob, messageId: number, text: string): Promise<void> {
    await entry.progress?.stop();
    await this.transport.editText(entry.job.chatId, messageId, text, { markdown: true });
  }

  private async report(entry: ActiveJob, messageId: number | undefined, text: string, log: Logger): Promise<void> {
    try {
      if (messageId === undefined) {
        await this.transport.sendText(entry.job.chatId, text);
      } else {
        await this.finish(entry, messageId, text);
      }
    } catch (error) {
      log.error({ error }, 'Could not report job failure');
    }
  }

  private async cleanup(job: DownloadJob, log: Logger): Promise<void> {
    await sleep(this.cleanupGraceMs);
    try {
      await removeDir(job.workingDirectory);
      log.debug({ dir: job.workingDirectory }, 'Working directory removed');
    } catch (error) {
      log.error({ error, dir: job.workingDirectory }, 'Error cleaning up working directory');
    }
  }
}
