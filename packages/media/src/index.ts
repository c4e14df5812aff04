/**
 * @hls-ladder/media
 *
 * Media analysis layer.
 *
 * Responsibilities:
 * - Probe files with ffprobe and validate the output
 * - Build the typed source container model
 * - Classify streams into per-type tracks
 * - Write the probe snapshot
 */

// Probing
export {
  FFProbe,
  parseProbeOutput,
  type FFProbeResult,
  type FFProbeStream,
  type MediaProber,
} from './probes/ffprobe.js';

// Container model
export { buildSourceContainer, parseDuration } from './container.js';

// Classification
export { classifyTracks, resolveDisplayName, UNDETERMINED_LANGUAGE } from './classifier.js';

// Snapshot
export { writeProbeSnapshot, toAsciiJson, SNAPSHOT_FILENAME } from './snapshot.js';

// Types
export type {
  StreamType,
  SourceStream,
  SourceContainer,
  TrackKind,
  ClassifiedTrack,
  TrackCollection,
} from './types.js';
