/**
 * @hls-ladder/core
 *
 * Core package containing:
 * - File state machine
 * - Error hierarchy
 * - Binary configuration
 * - Shared rendition types
 */

// State machine
export {
  FileStateMachine,
  isValidTransition,
  type FileState,
  type FileStateTransition,
} from './stateMachine.js';

// Types
export type {
  TrackType,
  RenditionResult,
  VideoRenditionResult,
  AudioRenditionResult,
  SubtitleRenditionResult,
  MasterPlaylist,
} from './types/rendition.js';

// Errors
export {
  HlsLadderError,
  ToolUnavailableError,
  ProbeFailureError,
  RenditionFailureError,
  ManifestWriteError,
  CleanupError,
  ConfigurationError,
  StateTransitionError,
  errorMessage,
} from './errors/index.js';

// Binary Configuration
export {
  resolveBinaryPath,
  getBinariesConfig,
  isBinaryAvailable,
  assertToolsAvailable,
  type BinaryConfig,
  type BinariesConfig,
  type BinarySource,
} from './config/binaries.js';
