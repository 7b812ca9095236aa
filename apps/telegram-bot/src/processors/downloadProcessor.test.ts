import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ArchiveError, createSourceDescriptor, type DownloadJob, type ProgressState } from '@trackdrop/core';
import { ProgressAggregator, type OrchestrationHooks, type OrchestrationResult } from '@trackdrop/acquisition';
import { sleep } from '@trackdrop/utils';
import type { PackageRequest, PackageResult } from '@trackdrop/packaging';
import type { UploadProgressCallback, UploadResult, Uploader } from '@trackdrop/upload';
import { FakeTransport } from '../testing/fakes.js';
import { MESSAGES, archiveReady, failureMessage } from '../messages.js';
import { DownloadProcessor, sentFileKind, type JobExecutor, type JobPackager, type JobRequest } from './downloadProcessor.js';

const album = createSourceDescriptor('spotify', 'album', 'abc', 'https://open.spotify.com/album/abc');
const track = createSourceDescriptor('spotify', 'track', 'xyz', 'https://open.spotify.com/track/xyz');

const SONG = { path: '/tmp/out/Song.mp3', name: 'Song.mp3', size: 1024 };

type ExecuteHandler = (job: DownloadJob, signal: AbortSignal, hooks: OrchestrationHooks) => Promise<OrchestrationResult>;

class FakeUploader implements Uploader {
  readonly name = 'fake';
  readonly uploaded: string[] = [];

  constructor(private readonly result: UploadResult) {}

  async upload(filePath: string, onProgress?: UploadProgressCallback): Promise<UploadResult> {
    this.uploaded.push(filePath);
    onProgress?.(25, 'Uploading to cloud storage...');
    return this.result;
  }
}

describe('DownloadProcessor', () => {
  let storageDir: string;
  let transport: FakeTransport;
  let progress: ProgressAggregator;

  beforeEach(async () => {
    storageDir = await mkdtemp(join(tmpdir(), 'trackdrop-processor-'));
    transport = new FakeTransport();
    const publisher = async (_snapshot: Readonly<ProgressState>): Promise<void> => undefined;
    progress = new ProgressAggregator({ publisher, publishIntervalMs: 60_000, recountIntervalMs: 60_000 });
  });

  afterEach(async () => {
    await rm(storageDir, { recursive: true, force: true });
  });

  function createProcessor(options: {
    execute: ExecuteHandler;
    packageResult?: (request: PackageRequest) => Promise<PackageResult>;
    uploader?: Uploader;
    progress?: ProgressAggregator;
  }) {
    const orchestrator: JobExecutor = {
      execute: (job, _progress, signal, hooks = {}) => options.execute(job, signal, hooks),
    };
    const packager: JobPackager = {
      package: options.packageResult ?? (async request => {
        const file = request.files[0];
        if (!file) {
          throw new Error('no files');
        }
        return { kind: 'direct', file };
      }),
    };
    return new DownloadProcessor({
      transport,
      orchestrator,
      progress: options.progress ?? progress,
      packager,
      uploader: options.uploader ?? new FakeUploader({ success: true, link: 'https://gofile.io/d/abc123' }),
      storageDir,
      cleanupGraceMs: 0,
      generatePassword: () => '4821',
    });
  }

  const request: JobRequest = { userId: 7, chatId: 70, source: track, format: { kind: 'default' } };

  it('sends a single small file directly', async () => {
    const processor = createProcessor({
      execute: async () => ({ status: 'success', files: [SONG], attempts: [] }),
    });

    const launched = processor.start(request);
    expect(launched).not.toBeNull();
    await launched?.completion;

    expect(transport.files).toEqual([{ chatId: 70, filePath: SONG.path, kind: 'audio' }]);
    expect(transport.lastEdit()).toEqual({
      chatId: 70,
      messageId: 100,
      text: '✅ *Download Complete!*\n\n📁 *File:* Song.mp3\n📊 *Size:* 0.0 MB',
    });
    expect(processor.isBusy(7)).toBe(false);
    expect(progress.isActive(7)).toBe(false);
  });

  it('places the job under the storage directory and removes it afterwards', async () => {
    let seen: DownloadJob | undefined;
    const processor = createProcessor({
      execute: async job => {
        seen = job;
        expect(existsSync(job.outputDirectory)).toBe(true);
        return { status: 'success', files: [SONG], attempts: [] };
      },
    });

    await processor.start(request)?.completion;

    expect(seen?.workingDirectory.startsWith(join(storageDir, 'user_7_'))).toBe(true);
    expect(seen?.outputDirectory).toBe(join(seen?.workingDirectory ?? '', 'downloads'));
    expect(existsSync(seen?.workingDirectory ?? '')).toBe(false);
  });

  it('uploads archives and reports link and password with the partial notice', async () => {
    const uploader = new FakeUploader({ success: true, link: 'https://gofile.io/d/abc123' });
    const requests: PackageRequest[] = [];
    const processor = createProcessor({
      execute: async () => ({ status: 'partial', files: [SONG, SONG], attempts: [], collectionName: 'Summer' }),
      packageResult: async packageRequest => {
        requests.push(packageRequest);
        packageRequest.onArchiveProgress?.(1, 2);
        return {
          kind: 'archive',
          reason: 'collection',
          name: 'Summer',
          archivePath: join(packageRequest.workingDirectory, 'Summer.zip'),
          size: 2 * 1024 * 1024,
          itemCount: 2,
          password: packageRequest.password,
        };
      },
      uploader,
    });

    await processor.start({ ...request, source: album })?.completion;

    expect(requests[0]?.password).toBe('4821');
    expect(requests[0]?.collectionName).toBe('Summer');
    expect(uploader.uploaded).toHaveLength(1);
    expect(transport.lastEdit()?.text).toBe(archiveReady({
      source: album,
      name: 'Summer',
      itemCount: 2,
      size: 2 * 1024 * 1024,
      link: 'https://gofile.io/d/abc123',
      password: '4821',
      partial: true,
    }));
  });

  it('reports the failure reason when nothing was acquired', async () => {
    const packageResult = vi.fn<[PackageRequest], Promise<PackageResult>>();
    const processor = createProcessor({
      execute: async () => ({ status: 'failed', files: [], attempts: [], failureReason: 'automation-blocked' }),
      packageResult,
    });

    await processor.start(request)?.completion;

    expect(packageResult).not.toHaveBeenCalled();
    expect(transport.lastEdit()?.text).toBe(failureMessage('automation-blocked', track));
  });

  it('tells the user when the upload fails', async () => {
    const processor = createProcessor({
      execute: async () => ({ status: 'success', files: [SONG, SONG], attempts: [] }),
      packageResult: async packageRequest => ({
        kind: 'archive',
        reason: 'multiple-files',
        name: 'Mix',
        archivePath: join(packageRequest.workingDirectory, 'Mix.zip'),
        size: 10,
        itemCount: 2,
        password: packageRequest.password,
      }),
      uploader: new FakeUploader({ success: false, error: 'No upload server available' }),
    });

    await processor.start(request)?.completion;

    expect(transport.lastEdit()?.text).toBe(MESSAGES.uploadFailed);
  });

  it('reports archive errors with their own message', async () => {
    const processor = createProcessor({
      execute: async () => ({ status: 'success', files: [SONG, SONG], attempts: [] }),
      packageResult: async () => {
        throw new ArchiveError('/tmp/Mix.zip', 'disk full');
      },
    });

    await processor.start(request)?.completion;

    expect(transport.lastEdit()?.text).toBe(MESSAGES.archiveFailed);
    expect(processor.isBusy(7)).toBe(false);
  });

  it('turns unexpected errors into the generic message', async () => {
    const processor = createProcessor({
      execute: async () => {
        throw new Error('boom');
      },
    });

    await processor.start(request)?.completion;

    expect(transport.lastEdit()?.text).toBe(MESSAGES.processingFailed);
  });

  it('allows one active job per user', async () => {
    const releases: Array<() => void> = [];
    const processor = createProcessor({
      execute: () => new Promise(resolve => {
        releases.push(() => resolve({ status: 'success', files: [SONG], attempts: [] }));
      }),
    });

    const first = processor.start(request);
    expect(processor.start(request)).toBeNull();
    expect(processor.isBusy(7)).toBe(true);
    const other = processor.start({ ...request, userId: 8, chatId: 80 });
    expect(other).not.toBeNull();

    await vi.waitFor(() => expect(releases).toHaveLength(2));
    releases.forEach(release => release());
    await Promise.all([first?.completion, other?.completion]);
    expect(processor.activeCount).toBe(0);
  });

  it('announces collections through the hook', async () => {
    const processor = createProcessor({
      execute: async (_job, _signal, hooks) => {
        await hooks.onCollectionFound?.('Summer', 14);
        return { status: 'success', files: [SONG], attempts: [] };
      },
    });

    await processor.start({ ...request, source: album })?.completion;

    expect(transport.sent.map(message => message.text)).toContain('🎶 *Album:* Summer\n📀 *Total Songs:* 14');
  });

  it('cancels a running job, frees the slot and still cleans up', async () => {
    const execute = vi.fn<Parameters<ExecuteHandler>, ReturnType<ExecuteHandler>>(
      (_job, signal) => new Promise(resolve => {
        signal.addEventListener('abort', () => resolve({ status: 'cancelled', files: [], attempts: [] }), { once: true });
      })
    );
    const processor = createProcessor({ execute });

    const launched = processor.start(request);
    await vi.waitFor(() => expect(execute).toHaveBeenCalled());

    expect(processor.cancel(7)).toBe(true);
    expect(processor.isBusy(7)).toBe(false);
    expect(progress.isActive(7)).toBe(false);

    await launched?.completion;

    expect(transport.edits).toEqual([]);
    expect(existsSync(launched?.job.workingDirectory ?? '')).toBe(false);
    expect(processor.cancel(7)).toBe(false);
  });

  it('puts the final message after a progress edit that was still in flight', async () => {
    const slowProgress = new ProgressAggregator({
      publisher: async snapshot => {
        await sleep(100);
        await transport.editText(snapshot.chatId, snapshot.messageId, 'progress bar');
      },
      publishIntervalMs: 20,
      recountIntervalMs: 60_000,
    });
    const processor = createProcessor({
      execute: async () => {
        await sleep(60);
        return { status: 'success', files: [SONG], attempts: [] };
      },
      progress: slowProgress,
    });

    await processor.start(request)?.completion;

    expect(transport.edits.map(edit => edit.text)).toEqual([
      'progress bar',
      '✅ *Download Complete!*\n\n📁 *File:* Song.mp3\n📊 *Size:* 0.0 MB',
    ]);
  });

  it('does not stop the progress of a job started after a cancellation', async () => {
    const releases: Array<() => void> = [];
    const execute = vi.fn<Parameters<ExecuteHandler>, ReturnType<ExecuteHandler>>(
      () => new Promise(resolve => {
        releases.push(() => resolve({ status: 'cancelled', files: [], attempts: [] }));
      })
    );
    const processor = createProcessor({ execute });

    const first = processor.start(request);
    await vi.waitFor(() => expect(execute).toHaveBeenCalledTimes(1));
    processor.cancel(7);

    const second = processor.start(request);
    await vi.waitFor(() => expect(execute).toHaveBeenCalledTimes(2));
    expect(progress.isActive(7)).toBe(true);

    releases[0]?.();
    await first?.completion;
    expect(progress.isActive(7)).toBe(true);
    expect(processor.isBusy(7)).toBe(true);

    processor.cancel(7);
    releases[1]?.();
    await second?.completion;
  });
});

describe('sentFileKind', () => {
  it('maps extensions to the way the file is sent', () => {
    expect(sentFileKind('a.FLAC')).toBe('audio');
    expect(sentFileKind('b.webm')).toBe('video');
    expect(sentFileKind('c.opus')).toBe('document');
  });
});
