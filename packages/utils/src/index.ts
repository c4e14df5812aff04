/**
 * @hls-ladder/utils
 *
 * Shared utilities package containing:
 * - Command execution wrappers (buffered and line-streaming)
 * - File operations
 * - Path utilities
 * - Time utilities
 * - Bounded concurrency
 * - Logger
 */

// Command execution
export {
  executeCommand,
  spawnStreaming,
  formatCommand,
  type CommandResult,
  type CommandOptions,
  type StreamingProcess,
  type ProcessSpawner,
} from './command.js';

// File operations
export {
  ensureDir,
  safeWriteFile,
  listDir,
  removeFile,
  isErrnoException,
} from './file.js';

// Path utilities
export {
  sanitizeFilename,
  getBasename,
  toPosixRelative,
} from './path.js';

// Time utilities
export {
  parseTimecode,
  formatDuration,
} from './time.js';

// Concurrency
export { runWithConcurrency } from './pool.js';

// Logger
export {
  createLogger,
  createNullLogger,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from './logger.js';
