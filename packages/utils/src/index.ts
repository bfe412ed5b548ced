/**
 * @seedsync/utils
 *
 * Shared utilities package containing:
 * - File operations
 * - Retry logic
 * - Path utilities
 * - Type guards
 * - Time and clock helpers
 * - Logger
 */

// File operations
export {
  ensureDir,
  safeReadFile,
  atomicWriteFile,
  appendLine,
  pathExists,
  uniqueDestination,
  moveFile,
  removeFile,
  readLastLines,
} from './file.js';

// Retry logic
export { retry, type RetryOptions } from './retry.js';

// Path utilities
export {
  sanitizeFilename,
  getExtension,
  getBasename,
  isInsideDirectory,
} from './path.js';

// Type guards
export {
  isObject,
  isErrnoException,
} from './guards.js';

// Time utilities
export {
  sleep,
  isAbortError,
  systemClock,
  type Clock,
} from './time.js';

// Logger
export {
  logger,
  createLogger,
  createRootLogger,
  type Logger,
  type RootLoggerOptions,
} from './logger.js';
