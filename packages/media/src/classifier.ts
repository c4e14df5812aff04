/**
 * Track Classifier
 *
 * Partitions container streams into per-type track lists. Each type keeps
 * its own counter so indices line up with ffmpeg's type-scoped selectors.
 */

import type { Logger } from '@hls-ladder/utils';
import type {
  ClassifiedTrack,
  SourceContainer,
  SourceStream,
  TrackCollection,
  TrackKind,
} from './types.js';

const FALLBACK_LABELS: Record<TrackKind, string> = {
  video: 'Video',
  audio: 'Audio',
  subtitle: 'Subtitle',
};

export const UNDETERMINED_LANGUAGE = 'und';

export function classifyTracks(container: SourceContainer, logger: Logger): TrackCollection {
  const tracks: TrackCollection = { video: [], audio: [], subtitle: [] };

  for (const stream of container.streams) {
    if (stream.type === 'other') {
      logger.warn(
        { streamIndex: stream.index, codecType: stream.rawType, codec: stream.codecName },
        'Skipping unsupported stream type'
      );
      continue;
    }

    const list = tracks[stream.type];
    list.push(toTrack(stream.type, list.length, stream));
  }

  logger.debug(
    {
      video: tracks.video.length,
      audio: tracks.audio.length,
      subtitle: tracks.subtitle.length,
    },
    'Classified tracks'
  );

  return tracks;
}

function toTrack(type: TrackKind, trackIndex: number, stream: SourceStream): ClassifiedTrack {
  return {
    type,
    trackIndex,
    stream,
    displayName: resolveDisplayName(type, trackIndex, stream),
    language: stream.language ?? UNDETERMINED_LANGUAGE,
  };
}

/**
 * Title, then language, then a generic label
 */
export function resolveDisplayName(type: TrackKind, trackIndex: number, stream: SourceStream): string {
  return stream.title ?? stream.language ?? `${FALLBACK_LABELS[type]}_${trackIndex}`;
}
