/**
 * @hls-ladder/processing
 *
 * Processing package containing:
 * - Resolution ladder planning
 * - FFmpeg command and job construction
 * - Job execution with progress tracking
 * - Encoder capability detection
 */

// Ladder
export {
  CANDIDATE_RUNGS,
  BITRATE_TABLE,
  AUTO_WIDTH,
  planLadder,
  scaledWidth,
  bitrateFor,
  fallbackBitrateKbps,
  type RenditionSpec,
  type LadderSource,
  type LadderOptions,
} from './ladder.js';

// Command builder
export {
  FFmpegCommandBuilder,
  type VideoEncoder,
  type VideoCodecOptions,
  type AudioCodecOptions,
  type SubtitleOptions,
  type HlsOptions,
  type OutputOptions,
  type StreamMapping,
} from './commandBuilder.js';

// Jobs
export {
  JobBuilder,
  resolveProgressTotal,
  PLACEHOLDER_PROGRESS_TOTAL,
  SEGMENT_DURATION,
  AUDIO_BITRATE,
  SUBTITLE_CAPTION_FILENAME,
  SUBTITLE_PLAYLIST_FILENAME,
  type EncodeJob,
  type VideoEncodeJob,
  type AudioEncodeJob,
  type SubtitleEncodeJob,
  type EncodeContext,
  type JobBuilderOptions,
} from './jobBuilder.js';

// Execution & progress
export {
  JobExecutor,
  extractError,
  stderrTail,
  type JobOutcome,
  type JobExecutorOptions,
} from './jobExecutor.js';

export { parseProgressLine, type ProgressSample } from './progressParser.js';

export {
  ProgressRegistry,
  type ProgressHandle,
  type ProgressTaskSnapshot,
} from './progressRegistry.js';

// Encoder capabilities
export {
  detectHardwareEncoder,
  resolveVideoEncoder,
  HARDWARE_ENCODER,
  SOFTWARE_ENCODER,
  type HardwareAccelMode,
} from './encoderCapabilities.js';
