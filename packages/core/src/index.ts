/**
 * @trackdrop/core
 * 
 * Core domain package containing:
 * - Source, job, progress and attempt types
 * - Conversation state machine
 * - Choice callback codec
 * - Per-user session registry
 * - Chat transport contract
 * - Error taxonomy
 */

// State machine
export {
  ConversationStateMachine,
  isValidTransition,
  getNextStages,
  isTerminalStage,
} from './stateMachine.js';

export type {
  ConversationStage,
  ConversationTransition,
} from './stateMachine.js';

// Types
export {
  createSourceDescriptor,
  contentKindOf,
} from './types/source.js';

export type {
  Provider,
  ContentKind,
  SourceVariant,
  SourceDescriptor,
} from './types/source.js';

export { describeFormat } from './types/job.js';

export type {
  AudioQuality,
  MediaType,
  FormatChoice,
  DownloadJob,
} from './types/job.js';

export type {
  ProgressState,
  ProgressStatus,
} from './types/progress.js';

export type {
  AttemptOutcome,
  FallbackAttempt,
  FailureReason,
} from './types/attempt.js';

// Callbacks
export {
  decodeCallback,
  encodeCallback,
  type ChoiceCallback,
} from './callbacks.js';

// Sessions
export {
  SessionRegistry,
  type SessionRegistryOptions,
  type EvictionCause,
} from './sessions.js';

// Transport
export type {
  ChatTransport,
  ChoiceButton,
  ButtonGrid,
  SendTextOptions,
  SentFileKind,
} from './transport.js';

// Errors
export {
  TrackdropError,
  SessionExpiredError,
  ForeignCallbackError,
  InvalidCallbackError,
  StateTransitionError,
  ActiveJobError,
  JobCancelledError,
  ArchiveError,
  UploadFailedError,
  isTrackdropError,
} from './errors/index.js';
