/**
 * Fallback Attempt Types
 */

export type AttemptOutcome =
  | 'produced-file'
  | 'timed-out'
  | 'tool-error'
  | 'skipped'
  | 'cancelled';

export interface FallbackAttempt {
  strategyId: string;
  timeoutSeconds: number;
  outcome: AttemptOutcome;
  exitCode?: number;
  durationMs?: number;
}

/**
 * Why a pipeline produced nothing, used to pick the user-facing message
 */
export type FailureReason = 'automation-blocked' | 'content-unavailable' | 'generic';
