/**
 * Fallback Runner
 *
 * Walks a strategy chain in order. A step is skipped once output exists
 * or when it has nothing to search for; every step gets its own timeout.
 */

import type { FallbackAttempt } from '@trackdrop/core';
import { createLogger, type Logger } from '@trackdrop/utils';
import type { ToolRunResult } from './runner.js';
import type { AcquisitionStrategy, SearchContext } from './strategies.js';

export type StrategyExecutor = (
  strategy: AcquisitionStrategy,
  query: string,
  signal?: AbortSignal
) => Promise<ToolRunResult>;

export interface FallbackRunOptions {
  chain: readonly AcquisitionStrategy[];
  context: SearchContext;
  execute: StrategyExecutor;
  hasOutput: () => Promise<boolean>;
  signal?: AbortSignal;
  onStepStart?: (strategy: AcquisitionStrategy, query: string) => void;
}

export class FallbackRunner {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger({ component: 'fallback' });
  }

  async run(options: FallbackRunOptions): Promise<FallbackAttempt[]> {
    const attempts: FallbackAttempt[] = [];

    for (const strategy of options.chain) {
      if (options.signal?.aborted) {
        break;
      }

      const query = strategy.buildQuery(options.context)?.trim() ?? '';
      if (query.length === 0 || await options.hasOutput()) {
        attempts.push({ strategyId: strategy.id, timeoutSeconds: strategy.timeoutSeconds, outcome: 'skipped' });
        continue;
      }

      options.onStepStart?.(strategy, query);
      const attempt = await executeStrategy(strategy, query, options, this.logger);
      attempts.push(attempt);

      if (attempt.outcome === 'cancelled') {
        break;
      }
    }

    return attempts;
  }
}

/**
 * Run one strategy and classify what happened
 */
export async function executeStrategy(
  strategy: AcquisitionStrategy,
  query: string,
  options: Pick<FallbackRunOptions, 'execute' | 'hasOutput' | 'signal'>,
  logger: Logger
): Promise<FallbackAttempt> {
  const base = { strategyId: strategy.id, timeoutSeconds: strategy.timeoutSeconds };
  logger.info({ strategy: strategy.id, query }, 'Running acquisition strategy');

  let result: ToolRunResult;
  try {
    result = await options.execute(strategy, query, options.signal);
  } catch (error) {
    logger.warn({ strategy: strategy.id, error }, 'Strategy failed to start');
    return { ...base, outcome: 'tool-error' };
  }

  const details = { exitCode: result.exitCode, durationMs: result.durationMs };
  if (result.aborted || options.signal?.aborted) {
    return { ...base, ...details, outcome: 'cancelled' };
  }
  if (await options.hasOutput()) {
    return { ...base, ...details, outcome: 'produced-file' };
  }
  if (result.timedOut) {
    return { ...base, ...details, outcome: 'timed-out' };
  }
  return { ...base, ...details, outcome: 'tool-error' };
}
