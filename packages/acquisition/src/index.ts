/**
 * @trackdrop/acquisition
 *
 * Acquisition package containing:
 * - Link classification
 * - spotdl and yt-dlp clients and output parsers
 * - Tool runner seam
 * - Progress aggregation
 * - Fallback strategies and the download orchestrator
 */

// Link detection
export { LinkDetector, linkDetector, classifyLink } from './linkDetector.js';

// Tool runner
export { ProcessToolRunner } from './runner.js';
export type {
  ToolRunner,
  ToolInvocation,
  ToolRunResult,
  ToolCaptureResult,
} from './runner.js';

// Clients
export { SpotdlClient, parseTrackListing, type SpotdlConfig } from './clients/spotdl.js';
export {
  YtDlpClient,
  DEFAULT_IDENTITY,
  extractResolutions,
  type YtDlpConfig,
  type ClientIdentity,
} from './clients/ytdlp.js';

// Output parsers
export { parseSpotdlLine, type SpotdlEvent, type SpotdlErrorCategory } from './parsers/spotdlOutput.js';
export { parseYtDlpLine, type YtDlpEvent } from './parsers/ytdlpOutput.js';

// Progress
export {
  ProgressAggregator,
  JobProgress,
  computePercentage,
  clampPercentage,
  DEFAULT_PUBLISH_INTERVAL_MS,
  DEFAULT_RECOUNT_INTERVAL_MS,
} from './progress.js';
export type {
  ProgressPublisher,
  ProgressAggregatorOptions,
  ProgressStart,
} from './progress.js';

// Strategies
export {
  FALLBACK_CHAIN,
  LOOKUP_MISS_STRATEGY,
  DESKTOP_IDENTITY,
  ANDROID_IDENTITY,
  SEARCH_IDENTITY,
  stripTrailingSuffix,
  corePhrase,
  isPlaceholderLabel,
  synthesizeSearchPhrase,
} from './strategies.js';
export type { AcquisitionStrategy, SearchContext, SearchPhraseInputs } from './strategies.js';

// Fallback and orchestration
export { FallbackRunner, executeStrategy, type StrategyExecutor, type FallbackRunOptions } from './fallback.js';
export {
  DownloadOrchestrator,
  resolveFailureReason,
  AUDIO_EXTENSIONS,
  VIDEO_EXTENSIONS,
  isFinishedOutput,
  PRIMARY_STRATEGY_ID,
  DIRECT_STRATEGY_ID,
} from './orchestrator.js';
export type {
  OrchestrationResult,
  OrchestrationStatus,
  OrchestrationHooks,
  DownloadOrchestratorOptions,
} from './orchestrator.js';
