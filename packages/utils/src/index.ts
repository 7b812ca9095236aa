/**
 * @trackdrop/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper (buffered and line-streaming)
 * - File operations
 * - Filename sanitizing
 * - Bounded retry
 * - Type guards
 * - Logger
 */

// Command execution
export {
  executeCommand,
  streamCommand,
  probeBinaryVersion,
  type CommandResult,
  type CommandOptions,
  type StreamCommandOptions,
  type StreamCommandResult,
} from './command.js';

// File operations
export {
  ensureDir,
  getFileSizeBytes,
  listFiles,
  removeDir,
  type ListedFile,
} from './file.js';

// Retry logic
export { retry, type RetryOptions } from './retry.js';

// Path utilities
export {
  sanitizeFilename,
  getExtension,
  getBasename,
  DEFAULT_MAX_FILENAME_LENGTH,
} from './path.js';

// Type guards
export {
  isString,
  isNumber,
  isObject,
} from './guards.js';

// Time utilities
export { sleep, formatElapsed } from './time.js';

// Logger
export { createLogger, setLogLevel, type Logger } from './logger.js';
