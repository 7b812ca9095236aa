/**
 * Conversation State Machine
 *
 * Strict state machine for the choice dialogue that precedes a download.
 *
 * State Flow:
 * IDLE → AWAITING_MEDIA_TYPE → AWAITING_QUALITY → DISPATCHED
 *                         ↘ CANCELLED / EXPIRED (terminal, from any live state)
 *
 * Rules:
 * - Transitions only move forward or into a terminal state
 * - Invalid transitions throw errors
 * - Every transition is recorded
 */

import { StateTransitionError } from './errors/index.js';
import type { MediaType } from './types/job.js';
import type { SourceDescriptor } from './types/source.js';

export type ConversationStage =
  | 'IDLE'
  | 'AWAITING_MEDIA_TYPE'
  | 'AWAITING_QUALITY'
  | 'DISPATCHED'
  | 'CANCELLED'
  | 'EXPIRED';

/**
 * Represents a stage transition with metadata
 */
export interface ConversationTransition {
  from: ConversationStage;
  to: ConversationStage;
  timestamp: Date;
  reason?: string;
}

/**
 * Valid stage transitions
 * Maps each stage to the set of stages it can transition to
 */
const validTransitions: Record<ConversationStage, ReadonlySet<ConversationStage>> = {
  IDLE: new Set<ConversationStage>([
    'AWAITING_MEDIA_TYPE',
    'CANCELLED',
  ]),
  AWAITING_MEDIA_TYPE: new Set<ConversationStage>([
    'AWAITING_QUALITY',
    'CANCELLED',
    'EXPIRED',
  ]),
  AWAITING_QUALITY: new Set<ConversationStage>([
    'DISPATCHED',
    'CANCELLED',
    'EXPIRED',
  ]),
  DISPATCHED: new Set<ConversationStage>([]), // Terminal
  CANCELLED: new Set<ConversationStage>([]), // Terminal
  EXPIRED: new Set<ConversationStage>([]), // Terminal
};

const TERMINAL_STAGES: ReadonlySet<ConversationStage> = new Set(['DISPATCHED', 'CANCELLED', 'EXPIRED']);

/**
 * Check if a stage transition is valid
 */
export function isValidTransition(from: ConversationStage, to: ConversationStage): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next stages from the current stage
 */
export function getNextStages(current: ConversationStage): ConversationStage[] {
  return Array.from(validTransitions[current]);
}

export function isTerminalStage(stage: ConversationStage): boolean {
  return TERMINAL_STAGES.has(stage);
}

/**
 * Per-user conversation. Holds the source awaiting choices and the
 * choices made so far.
 */
export class ConversationStateMachine {
  private currentStage: ConversationStage = 'IDLE';
  private history: ConversationTransition[] = [];
  private mediaType?: MediaType;

  /** Message carrying the choice buttons, once sent */
  messageId?: number;

  constructor(
    readonly userId: number,
    readonly chatId: number,
    readonly source: SourceDescriptor
  ) {}

  /**
   * Get the current stage
   */
  getStage(): ConversationStage {
    return this.currentStage;
  }

  /**
   * Get the full transition history
   */
  getHistory(): ReadonlyArray<ConversationTransition> {
    return [...this.history];
  }

  getMediaType(): MediaType | undefined {
    return this.mediaType;
  }

  canTransitionTo(targetStage: ConversationStage): boolean {
    return isValidTransition(this.currentStage, targetStage);
  }

  isTerminal(): boolean {
    return isTerminalStage(this.currentStage);
  }

  /**
   * Transition to a new stage
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetStage: ConversationStage, reason?: string): ConversationTransition {
    if (!this.canTransitionTo(targetStage)) {
      throw new StateTransitionError(this.userId, this.currentStage, targetStage);
    }

    const transition: ConversationTransition = {
      from: this.currentStage,
      to: targetStage,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentStage = targetStage;

    return transition;
  }

  /**
   * Present the media type question
   */
  begin(): void {
    this.transitionTo('AWAITING_MEDIA_TYPE');
  }

  /**
   * Record the media type and move on to the quality question
   */
  chooseMediaType(mediaType: MediaType): void {
    this.transitionTo('AWAITING_QUALITY', `media type ${mediaType}`);
    this.mediaType = mediaType;
  }

  /**
   * Quality picked: the conversation ends in a dispatched job
   */
  dispatch(reason?: string): void {
    this.transitionTo('DISPATCHED', reason);
  }

  /**
   * Move into CANCELLED unless already terminal
   */
  cancel(reason?: string): void {
    if (!this.isTerminal()) {
      this.transitionTo('CANCELLED', reason);
    }
  }

  /**
   * Move into EXPIRED unless already terminal
   */
  expire(reason?: string): void {
    if (!this.isTerminal()) {
      this.transitionTo('EXPIRED', reason);
    }
  }
}
