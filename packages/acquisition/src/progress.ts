/**
 * Progress Aggregator
 *
 * Per-user progress state for running jobs. start() hands out a JobProgress
 * bound to that job's entry; mutations only touch state, and the message is
 * refreshed by a periodic tick throttled to one publish per interval.
 *
 * Once a job's progress is stopped (or replaced by the user's next job) its
 * handle goes inert: nothing it does reaches the new entry, and nothing for
 * the old job is published again.
 */

import { SessionRegistry, type ProgressState, type ProgressStatus } from '@trackdrop/core';
import { createLogger, type Logger } from '@trackdrop/utils';

export type ProgressPublisher = (snapshot: Readonly<ProgressState>) => Promise<void>;

export interface ProgressAggregatorOptions {
  publisher: ProgressPublisher;
  /** Minimum gap between delivered publishes */
  publishIntervalMs?: number;
  /** How often the output directory is recounted */
  recountIntervalMs?: number;
  now?: () => number;
  logger?: Logger;
}

export interface ProgressStart {
  userId: number;
  chatId: number;
  messageId: number;
  zipPassword: string;
  totalCount?: number;
  currentLabel?: string;
}

interface TrackedProgress {
  state: ProgressState;
  ticker?: NodeJS.Timeout;
  recount?: NodeJS.Timeout;
  stopped: boolean;
  /** Settles when the running publish does; its error surfaces through publish() */
  inFlight?: Promise<void>;
}

export const DEFAULT_PUBLISH_INTERVAL_MS = 10_000;
export const DEFAULT_RECOUNT_INTERVAL_MS = 15_000;

export function computePercentage(completed: number, total: number): number {
  return clampPercentage((completed / Math.max(total, 1)) * 100);
}

export function clampPercentage(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(100, Math.max(0, Math.round(value)));
}

function halt(entry: TrackedProgress): void {
  entry.stopped = true;
  clearInterval(entry.ticker);
  clearInterval(entry.recount);
  entry.recount = undefined;
}

export class ProgressAggregator {
  private readonly tracked: SessionRegistry<TrackedProgress>;
  private readonly publisher: ProgressPublisher;
  private readonly publishIntervalMs: number;
  private readonly recountIntervalMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: ProgressAggregatorOptions) {
    this.publisher = options.publisher;
    this.publishIntervalMs = options.publishIntervalMs ?? DEFAULT_PUBLISH_INTERVAL_MS;
    this.recountIntervalMs = options.recountIntervalMs ?? DEFAULT_RECOUNT_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger({ component: 'progress' });
    this.tracked = new SessionRegistry<TrackedProgress>({
      onEvict: (_userId, entry) => halt(entry),
    });
  }

  /**
   * Begin tracking a job. Replaces (and stops) any previous entry for the user.
   */
  start(init: ProgressStart): JobProgress {
    const entry: TrackedProgress = {
      state: {
        userId: init.userId,
        chatId: init.chatId,
        messageId: init.messageId,
        status: 'starting',
        currentLabel: init.currentLabel ?? 'Initializing...',
        percentage: 0,
        completedCount: 0,
        totalCount: Math.max(1, init.totalCount ?? 1),
        uploadPercentage: 0,
        uploadStatusLabel: '',
        lastPublishTime: 0,
        collectionAnnounced: false,
        zipPassword: init.zipPassword,
      },
      stopped: false,
    };

    entry.ticker = setInterval(() => {
      this.publish(entry).catch((error: unknown) => {
        this.logger.warn({ userId: init.userId, error }, 'Progress publish failed');
      });
    }, this.publishIntervalMs);

    this.tracked.create(init.userId, entry);
    return new JobProgress(entry, {
      release: () => {
        this.tracked.evictIf(init.userId, entry);
        halt(entry);
      },
      publish: () => this.publish(entry),
      recountIntervalMs: this.recountIntervalMs,
      logger: this.logger,
    });
  }

  isActive(userId: number): boolean {
    return this.tracked.has(userId);
  }

  /**
   * Publish the entry's snapshot unless stopped, busy or throttled.
   * Returns true when the publisher was invoked.
   */
  private async publish(entry: TrackedProgress): Promise<boolean> {
    if (entry.stopped || entry.inFlight) {
      return false;
    }

    const now = this.now();
    if (entry.state.lastPublishTime > 0 && now - entry.state.lastPublishTime < this.publishIntervalMs) {
      return false;
    }

    entry.state.lastPublishTime = now;
    const delivery = this.publisher({ ...entry.state });
    entry.inFlight = delivery.then(
      () => undefined,
      () => undefined
    );
    try {
      await delivery;
      return true;
    } finally {
      entry.inFlight = undefined;
    }
  }
}

interface JobProgressLinks {
  release: () => void;
  publish: () => Promise<boolean>;
  recountIntervalMs: number;
  logger: Logger;
}

/**
 * One job's view of its progress entry
 */
export class JobProgress {
  constructor(
    private readonly entry: TrackedProgress,
    private readonly links: JobProgressLinks
  ) {}

  snapshot(): Readonly<ProgressState> {
    return { ...this.entry.state };
  }

  /**
   * Stop ticking and publishing. Resolves once a publish that was already
   * running has settled, so a final edit made afterwards is the last one.
   */
  stop(): Promise<void> {
    this.links.release();
    return this.entry.inFlight ?? Promise.resolve();
  }

  /** Throttled like the tick; a no-op once stopped */
  publish(): Promise<boolean> {
    return this.links.publish();
  }

  setLabel(label: string, status?: ProgressStatus): void {
    this.mutate(state => {
      state.currentLabel = label;
      if (status) {
        state.status = status;
      }
    });
  }

  setTotal(total: number): void {
    this.mutate(state => {
      state.totalCount = Math.max(1, total);
      state.completedCount = Math.min(state.completedCount, state.totalCount);
      state.percentage = computePercentage(state.completedCount, state.totalCount);
    });
  }

  /**
   * Record the collection name. Returns true only the first time, so the
   * caller announces a collection at most once per job.
   */
  announceCollection(name: string, count: number): boolean {
    let firstTime = false;
    this.mutate(state => {
      if (state.collectionAnnounced) {
        return;
      }
      firstTime = true;
      state.collectionAnnounced = true;
      state.collectionName = name;
      state.totalCount = Math.max(1, count);
      state.completedCount = Math.min(state.completedCount, state.totalCount);
      state.percentage = computePercentage(state.completedCount, state.totalCount);
    });
    return firstTime;
  }

  itemStarted(index: number, total: number, label?: string): void {
    this.mutate(state => {
      state.status = 'downloading';
      state.totalCount = Math.max(1, total);
      state.completedCount = Math.min(Math.max(0, index - 1), state.totalCount);
      state.percentage = computePercentage(state.completedCount, state.totalCount);
      if (label) {
        state.currentLabel = label;
      }
    });
  }

  itemCompleted(label?: string): void {
    this.mutate(state => {
      state.status = 'downloading';
      state.completedCount = Math.min(state.completedCount + 1, state.totalCount);
      state.percentage = computePercentage(state.completedCount, state.totalCount);
      if (label) {
        state.currentLabel = label;
      }
    });
  }

  /**
   * Per-item percentage. Only meaningful for single-item jobs; for
   * collections the completed/total ratio owns the percentage.
   */
  itemPercentage(value: number): void {
    this.mutate(state => {
      if (state.totalCount === 1 && state.completedCount === 0) {
        state.status = 'downloading';
        state.percentage = clampPercentage(value);
      }
    });
  }

  /**
   * Raise completedCount to an observed file count. Never lowers it.
   */
  raiseCompleted(count: number): void {
    this.mutate(state => {
      const next = Math.min(count, state.totalCount);
      if (next > state.completedCount) {
        state.completedCount = next;
        state.percentage = computePercentage(next, state.totalCount);
      }
    });
  }

  markDownloadComplete(): void {
    this.mutate(state => {
      state.status = 'completed';
      state.completedCount = state.totalCount;
      state.percentage = 100;
    });
  }

  setUpload(percentage: number, label: string, status: ProgressStatus = 'uploading'): void {
    this.mutate(state => {
      state.status = status;
      state.uploadPercentage = clampPercentage(percentage);
      state.uploadStatusLabel = label;
    });
  }

  /**
   * Periodically recount produced files and raise completedCount
   */
  startRecount(countFiles: () => Promise<number>): void {
    if (this.entry.stopped) {
      return;
    }
    this.stopRecount();
    this.entry.recount = setInterval(() => {
      countFiles()
        .then(count => this.raiseCompleted(count))
        .catch((error: unknown) => {
          this.links.logger.warn({ userId: this.entry.state.userId, error }, 'Recount failed');
        });
    }, this.links.recountIntervalMs);
  }

  stopRecount(): void {
    clearInterval(this.entry.recount);
    this.entry.recount = undefined;
  }

  private mutate(apply: (state: ProgressState) => void): void {
    if (!this.entry.stopped) {
      apply(this.entry.state);
    }
  }
}
