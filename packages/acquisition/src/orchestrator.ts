/**
 * Download Orchestrator
 *
 * Runs one job from link to files on disk:
 *
 *   Spotify:  metadata lookup → spotdl (primary, 120s)
 *                 ↳ on a lookup miss: one concurrent search via yt-dlp
 *             no files → fallback chain (300s / 180s / 120s)
 *   YouTube:  yt-dlp in the chosen format
 *
 * Files found after a timeout or a non-zero exit are kept and reported
 * as a partial success.
 */

import { extname } from 'node:path';
import type {
  DownloadJob,
  FailureReason,
  FallbackAttempt,
  FormatChoice,
} from '@trackdrop/core';
import { createLogger, listFiles, type ListedFile, type Logger } from '@trackdrop/utils';
import type { SpotdlClient } from './clients/spotdl.js';
import type { YtDlpClient } from './clients/ytdlp.js';
import { FallbackRunner, executeStrategy } from './fallback.js';
import { parseSpotdlLine } from './parsers/spotdlOutput.js';
import { parseYtDlpLine } from './parsers/ytdlpOutput.js';
import type { JobProgress } from './progress.js';
import type { ToolInvocation, ToolRunResult, ToolRunner } from './runner.js';
import {
  FALLBACK_CHAIN,
  LOOKUP_MISS_STRATEGY,
  isPlaceholderLabel,
  synthesizeSearchPhrase,
  type AcquisitionStrategy,
} from './strategies.js';

export const AUDIO_EXTENSIONS: readonly string[] = ['.mp3', '.m4a', '.flac', '.opus', '.ogg', '.wav'];
export const VIDEO_EXTENSIONS: readonly string[] = ['.mp4', '.mkv', '.webm'];

/** yt-dlp per-format downloads (`name.f137.mp4`) and pre-merge temp files */
const INTERMEDIATE_FILE = /\.(f\d+|temp)\.[a-z0-9]+$/i;

/**
 * Finished media for the job's format. Audio jobs ignore video containers,
 * which only appear there before extraction.
 */
export function isFinishedOutput(name: string, format: FormatChoice): boolean {
  const extensions = format.kind === 'video' ? VIDEO_EXTENSIONS : AUDIO_EXTENSIONS;
  return extensions.includes(extname(name).toLowerCase()) && !INTERMEDIATE_FILE.test(name);
}

export const PRIMARY_STRATEGY_ID = 'spotdl-primary';
export const DIRECT_STRATEGY_ID = 'ytdlp-direct';

export type OrchestrationStatus = 'success' | 'partial' | 'failed' | 'cancelled';

export interface OrchestrationResult {
  status: OrchestrationStatus;
  files: ListedFile[];
  attempts: FallbackAttempt[];
  failureReason?: FailureReason;
  collectionName?: string;
}

export interface OrchestrationHooks {
  /** Called at most once per job, when a collection's name and size become known */
  onCollectionFound?: (name: string, count: number) => Promise<void>;
}

export interface DownloadOrchestratorOptions {
  runner: ToolRunner;
  spotdl: SpotdlClient;
  ytdlp: YtDlpClient;
  fallbackChain?: readonly AcquisitionStrategy[];
  lookupMissStrategy?: AcquisitionStrategy;
  logger?: Logger;
}

interface FailureSignals {
  automationBlocked: boolean;
  contentUnavailable: boolean;
}

const FAILED_START: ToolRunResult = { exitCode: 127, timedOut: false, aborted: false, durationMs: 0 };

export function resolveFailureReason(signals: FailureSignals): FailureReason {
  if (signals.automationBlocked) {
    return 'automation-blocked';
  }
  if (signals.contentUnavailable) {
    return 'content-unavailable';
  }
  return 'generic';
}

export class DownloadOrchestrator {
  private readonly runner: ToolRunner;
  private readonly spotdl: SpotdlClient;
  private readonly ytdlp: YtDlpClient;
  private readonly fallbackChain: readonly AcquisitionStrategy[];
  private readonly lookupMissStrategy: AcquisitionStrategy;
  private readonly fallbackRunner: FallbackRunner;
  private readonly logger: Logger;

  constructor(options: DownloadOrchestratorOptions) {
    this.runner = options.runner;
    this.spotdl = options.spotdl;
    this.ytdlp = options.ytdlp;
    this.fallbackChain = options.fallbackChain ?? FALLBACK_CHAIN;
    this.lookupMissStrategy = options.lookupMissStrategy ?? LOOKUP_MISS_STRATEGY;
    this.logger = options.logger ?? createLogger({ component: 'orchestrator' });
    this.fallbackRunner = new FallbackRunner(this.logger);
  }

  /**
   * Acquire the job's files. Every progress update goes through the job's
   * own handle, so a cancelled job never touches the user's next one.
   */
  async execute(
    job: DownloadJob,
    progress: JobProgress,
    signal: AbortSignal,
    hooks: OrchestrationHooks = {}
  ): Promise<OrchestrationResult> {
    const log = this.logger.child({ jobId: job.id, userId: job.userId });
    log.info({ source: job.source }, 'Starting acquisition');

    const result = job.source.provider === 'spotify'
      ? await this.acquireFromResolver(job, progress, signal, hooks, log)
      : await this.acquireDirect(job, progress, signal, hooks, log);

    log.info(
      { status: result.status, files: result.files.length, attempts: result.attempts, failureReason: result.failureReason },
      'Acquisition finished'
    );
    return result;
  }

  /**
   * Spotify links: resolver first, then search-based fallbacks
   */
  private async acquireFromResolver(
    job: DownloadJob,
    progress: JobProgress,
    signal: AbortSignal,
    hooks: OrchestrationHooks,
    log: Logger
  ): Promise<OrchestrationResult> {
    const { source } = job;
    const signals: FailureSignals = { automationBlocked: false, contentUnavailable: false };
    const attempts: FallbackAttempt[] = [];
    const lookupMiss: { run?: Promise<FallbackAttempt> } = {};

    let searchTerm: string | null = null;
    if (source.contentKind === 'item') {
      progress.setLabel('Extracting track info...');
      searchTerm = await this.spotdl
        .extractSearchTerm(source.originalLocator, this.runner, job.outputDirectory, signal)
        .catch((error: unknown) => {
          log.warn({ error }, 'Metadata lookup failed');
          return null;
        });
      if (signal.aborted) {
        return this.cancelled(attempts);
      }
      if (searchTerm) {
        progress.setLabel(`Found: ${searchTerm}`);
      }
    }

    progress.setLabel('Starting download...', 'downloading');
    progress.startRecount(() => this.countOutput(job));

    const onLine = (line: string): void => {
      if (signal.aborted) {
        return;
      }
      if (parseYtDlpLine(line)?.type === 'automation-blocked') {
        signals.automationBlocked = true;
      }

      const event = parseSpotdlLine(line);
      if (!event) {
        return;
      }

      switch (event.type) {
        case 'collection-found':
          this.announceCollection(progress, event.name, event.count, hooks, log);
          break;
        case 'item-started':
          progress.itemStarted(event.index, event.total, event.label);
          break;
        case 'item-completed':
          progress.itemCompleted(event.label);
          break;
        case 'fatal-error':
          log.warn({ category: event.category, line: event.message }, 'Resolver reported an error');
          if (event.category === 'content-unavailable') {
            signals.contentUnavailable = true;
          }
          if (event.category === 'lookup-miss' && !lookupMiss.run) {
            const phrase = synthesizeSearchPhrase({
              explicitTitle: searchTerm,
              errorTitle: event.titleHint,
              itemLocator: source.contentKind === 'item' ? source.originalLocator : undefined,
              currentLabel: progress.snapshot().currentLabel,
              fallbackLocator: source.originalLocator,
            });
            lookupMiss.run = this.runLookupMiss(job, progress, phrase, signals, signal, log);
          }
          break;
      }
    };

    const primary = await this.runTool(this.spotdl.buildDownloadInvocation(source.originalLocator, job.outputDirectory), onLine, signal, log);
    attempts.push(await this.toAttempt(PRIMARY_STRATEGY_ID, this.spotdl.timeoutSeconds, primary, job, signal));

    if (lookupMiss.run) {
      attempts.push(await lookupMiss.run);
    }
    progress.stopRecount();

    if (signal.aborted) {
      return this.cancelled(attempts);
    }

    const files = await this.listOutput(job);
    if (files.length > 0) {
      progress.markDownloadComplete();
      const clean = primary.exitCode === 0 && !primary.timedOut;
      return this.finished(clean ? 'success' : 'partial', files, attempts, progress);
    }

    const knownTitle = this.knownTitle(job, progress, searchTerm);
    log.info({ knownTitle, primary }, 'Primary produced nothing, starting fallback chain');

    const chainAttempts = await this.fallbackRunner.run({
      chain: this.fallbackChain,
      context: { knownTitle },
      signal,
      execute: (strategy, query, stepSignal) => this.runSearch(job, progress, strategy, query, signals, stepSignal, log),
      hasOutput: () => this.hasOutput(job),
      onStepStart: (_strategy, query) => progress.setLabel(`Searching: ${query}`, 'downloading'),
    });
    attempts.push(...chainAttempts);

    if (signal.aborted) {
      return this.cancelled(attempts);
    }

    const recovered = await this.listOutput(job);
    if (recovered.length > 0) {
      progress.markDownloadComplete();
      return this.finished('success', recovered, attempts, progress);
    }

    return {
      status: 'failed',
      files: [],
      attempts,
      failureReason: resolveFailureReason(signals),
      collectionName: progress.snapshot().collectionName,
    };
  }

  /**
   * YouTube links: one yt-dlp run in the chosen format
   */
  private async acquireDirect(
    job: DownloadJob,
    progress: JobProgress,
    signal: AbortSignal,
    hooks: OrchestrationHooks,
    log: Logger
  ): Promise<OrchestrationResult> {
    const { source } = job;
    const signals: FailureSignals = { automationBlocked: false, contentUnavailable: false };
    const isCollection = source.contentKind === 'collection';

    if (isCollection) {
      const [count, title] = await Promise.all([
        this.ytdlp.countPlaylistItems(source.originalLocator, this.runner, job.outputDirectory, signal),
        this.ytdlp.fetchTitle(source.originalLocator, this.runner, job.outputDirectory, signal),
      ]).catch((error: unknown): [null, null] => {
        log.warn({ error }, 'Playlist probe failed');
        return [null, null];
      });
      if (signal.aborted) {
        return this.cancelled([]);
      }
      if (count) {
        progress.setTotal(count);
      }
      if (title) {
        this.announceCollection(progress, title, count ?? 1, hooks, log);
      }
    }

    progress.setLabel('Starting download...', 'downloading');
    progress.startRecount(() => this.countOutput(job));

    const invocation = this.ytdlp.buildDownloadInvocation(source.originalLocator, job.outputDirectory, job.format, isCollection);
    const result = await this.runTool(invocation, line => this.trackYtDlpLine(progress, line, signals, signal), signal, log);
    const attempts = [await this.toAttempt(DIRECT_STRATEGY_ID, invocation.timeoutMs / 1000, result, job, signal)];
    progress.stopRecount();

    if (signal.aborted) {
      return this.cancelled(attempts);
    }

    const files = await this.listOutput(job);
    if (files.length === 0) {
      return {
        status: 'failed',
        files: [],
        attempts,
        failureReason: resolveFailureReason(signals),
        collectionName: progress.snapshot().collectionName,
      };
    }

    progress.markDownloadComplete();
    const clean = result.exitCode === 0 && !result.timedOut;
    return this.finished(clean ? 'success' : 'partial', files, attempts, progress);
  }

  private runLookupMiss(
    job: DownloadJob,
    progress: JobProgress,
    phrase: string,
    signals: FailureSignals,
    signal: AbortSignal,
    log: Logger
  ): Promise<FallbackAttempt> {
    const strategy = this.lookupMissStrategy;
    const query = strategy.buildQuery({ knownTitle: phrase }) ?? phrase;
    log.info({ query }, 'Resolver missed, searching concurrently');

    return executeStrategy(
      strategy,
      query,
      {
        execute: (step, stepQuery, stepSignal) => this.runSearch(job, progress, step, stepQuery, signals, stepSignal, log),
        hasOutput: () => this.hasOutput(job),
        signal,
      },
      log
    ).catch((error: unknown): FallbackAttempt => {
      log.warn({ error }, 'Lookup-miss search failed');
      return { strategyId: strategy.id, timeoutSeconds: strategy.timeoutSeconds, outcome: 'tool-error' };
    });
  }

  private runSearch(
    job: DownloadJob,
    progress: JobProgress,
    strategy: AcquisitionStrategy,
    query: string,
    signals: FailureSignals,
    signal: AbortSignal | undefined,
    log: Logger
  ): Promise<ToolRunResult> {
    const invocation = this.ytdlp.buildSearchInvocation(query, job.outputDirectory, strategy.identity, strategy.timeoutSeconds);
    return this.runTool(invocation, line => this.trackYtDlpLine(progress, line, signals, signal), signal, log);
  }

  private trackYtDlpLine(progress: JobProgress, line: string, signals: FailureSignals, signal: AbortSignal | undefined): void {
    const event = signal?.aborted ? null : parseYtDlpLine(line);
    if (!event) {
      return;
    }

    switch (event.type) {
      case 'item-started':
        progress.itemStarted(event.index, event.total);
        break;
      case 'item-completed':
        progress.itemCompleted(event.label);
        break;
      case 'destination':
        progress.setLabel(event.label, 'downloading');
        break;
      case 'percentage':
        progress.itemPercentage(event.value);
        break;
      case 'automation-blocked':
        signals.automationBlocked = true;
        break;
      case 'content-unavailable':
        signals.contentUnavailable = true;
        break;
      case 'error':
        break;
    }
  }

  /**
   * Run a tool; a binary that fails to start counts as a failed run
   */
  private async runTool(
    invocation: ToolInvocation,
    onLine: (line: string) => void,
    signal: AbortSignal | undefined,
    log: Logger
  ): Promise<ToolRunResult> {
    try {
      return await this.runner.run(invocation, onLine, signal);
    } catch (error) {
      log.error({ error, tool: invocation.tool }, 'Tool failed to start');
      return FAILED_START;
    }
  }

  private announceCollection(
    progress: JobProgress,
    name: string,
    count: number,
    hooks: OrchestrationHooks,
    log: Logger
  ): void {
    if (!progress.announceCollection(name, count) || !hooks.onCollectionFound) {
      return;
    }
    hooks.onCollectionFound(name, count).catch((error: unknown) => {
      log.warn({ error }, 'Collection announcement failed');
    });
  }

  private knownTitle(job: DownloadJob, progress: JobProgress, searchTerm: string | null): string {
    const state = progress.snapshot();
    if (searchTerm) {
      return searchTerm;
    }
    if (state.collectionName) {
      return state.collectionName;
    }
    if (!isPlaceholderLabel(state.currentLabel)) {
      return state.currentLabel;
    }
    return job.source.originalLocator;
  }

  private async toAttempt(
    strategyId: string,
    timeoutSeconds: number,
    result: ToolRunResult,
    job: DownloadJob,
    signal: AbortSignal
  ): Promise<FallbackAttempt> {
    const base = { strategyId, timeoutSeconds, exitCode: result.exitCode, durationMs: result.durationMs };
    if (result.aborted || signal.aborted) {
      return { ...base, outcome: 'cancelled' };
    }
    if (await this.hasOutput(job)) {
      return { ...base, outcome: 'produced-file' };
    }
    return { ...base, outcome: result.timedOut ? 'timed-out' : 'tool-error' };
  }

  private finished(
    status: OrchestrationStatus,
    files: ListedFile[],
    attempts: FallbackAttempt[],
    progress: JobProgress
  ): OrchestrationResult {
    return { status, files, attempts, collectionName: progress.snapshot().collectionName };
  }

  private cancelled(attempts: FallbackAttempt[]): OrchestrationResult {
    return { status: 'cancelled', files: [], attempts };
  }

  private async listOutput(job: DownloadJob): Promise<ListedFile[]> {
    const files = await listFiles(job.outputDirectory);
    return files.filter(file => isFinishedOutput(file.name, job.format));
  }

  private async countOutput(job: DownloadJob): Promise<number> {
    return (await this.listOutput(job)).length;
  }

  private async hasOutput(job: DownloadJob): Promise<boolean> {
    return (await this.countOutput(job)) > 0;
  }
}
