/**
 * Custom Error Classes
 */

import type { ConversationStage } from '../stateMachine.js';

/**
 * Base error class for all trackdrop errors
 */
export class TrackdropError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TrackdropError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A choice arrived for a user who has no pending conversation
 */
export class SessionExpiredError extends TrackdropError {
  constructor(userId: number) {
    super(
      `No pending conversation for user ${userId}`,
      'SESSION_EXPIRED',
      { userId }
    );
    this.name = 'SessionExpiredError';
  }
}

/**
 * A choice button was pressed by someone other than the user it was rendered for
 */
export class ForeignCallbackError extends TrackdropError {
  constructor(ownerId: number, senderId: number) {
    super(
      `Callback for user ${ownerId} was sent by user ${senderId}`,
      'FOREIGN_CALLBACK',
      { ownerId, senderId }
    );
    this.name = 'ForeignCallbackError';
  }
}

/**
 * Callback payload could not be decoded
 */
export class InvalidCallbackError extends TrackdropError {
  constructor(payload: string, reason: string) {
    super(
      `Invalid callback payload "${payload}": ${reason}`,
      'INVALID_CALLBACK',
      { payload, reason }
    );
    this.name = 'InvalidCallbackError';
  }
}

/**
 * State transition error for invalid conversation changes
 */
export class StateTransitionError extends TrackdropError {
  constructor(
    userId: number,
    fromStage: ConversationStage,
    toStage: ConversationStage,
    message?: string
  ) {
    super(
      message ?? `Invalid conversation transition from ${fromStage} to ${toStage}`,
      'STATE_TRANSITION_ERROR',
      { userId, fromStage, toStage }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * The user already owns the active-job slot
 */
export class ActiveJobError extends TrackdropError {
  constructor(userId: number) {
    super(
      `User ${userId} already has an active download`,
      'ACTIVE_JOB',
      { userId }
    );
    this.name = 'ActiveJobError';
  }
}

/**
 * Job was cancelled by its owner
 */
export class JobCancelledError extends TrackdropError {
  constructor(jobId: string) {
    super(`Job ${jobId} was cancelled`, 'JOB_CANCELLED', { jobId });
    this.name = 'JobCancelledError';
  }
}

/**
 * Archive could not be created
 */
export class ArchiveError extends TrackdropError {
  constructor(archivePath: string, cause: string) {
    super(
      `Failed to create archive ${archivePath}: ${cause}`,
      'ARCHIVE_FAILED',
      { archivePath, cause }
    );
    this.name = 'ArchiveError';
  }
}

/**
 * Upload collaborator returned no link
 */
export class UploadFailedError extends TrackdropError {
  constructor(filePath: string, cause?: string) {
    super(
      `Upload failed for ${filePath}${cause ? `: ${cause}` : ''}`,
      'UPLOAD_FAILED',
      { filePath, cause }
    );
    this.name = 'UploadFailedError';
  }
}

export function isTrackdropError(error: unknown): error is TrackdropError {
  return error instanceof TrackdropError;
}
