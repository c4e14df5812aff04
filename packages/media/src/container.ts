/**
 * Source Container
 *
 * Turns validated ffprobe output into the typed container model.
 */

import type { FFProbeResult, FFProbeStream } from './probes/ffprobe.js';
import type { SourceContainer, SourceStream, StreamType } from './types.js';

export function buildSourceContainer(filePath: string, probe: FFProbeResult): SourceContainer {
  return {
    filePath,
    duration: parseDuration(probe.format?.duration),
    streams: probe.streams.map(toSourceStream),
  };
}

function toSourceStream(stream: FFProbeStream): SourceStream {
  const rawType = stream.codec_type ?? 'unknown';

  return {
    index: stream.index,
    type: toStreamType(rawType),
    rawType,
    codecName: stream.codec_name,
    width: positiveInt(stream.width),
    height: positiveInt(stream.height),
    language: tagValue(stream.tags, 'language'),
    title: tagValue(stream.tags, 'title'),
    isDefault: stream.disposition?.['default'] === 1,
  };
}

function toStreamType(codecType: string): StreamType {
  switch (codecType) {
    case 'video':
    case 'audio':
    case 'subtitle':
      return codecType;
    default:
      return 'other';
  }
}

/**
 * Duration in seconds, or undefined when missing, unparsable or not positive
 */
export function parseDuration(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const seconds = parseFloat(value);
  return Number.isFinite(seconds) && seconds > 0 ? seconds : undefined;
}

function positiveInt(value: number | undefined): number | undefined {
  return value !== undefined && value > 0 ? value : undefined;
}

/**
 * Case-insensitive tag lookup; blank values count as missing
 */
function tagValue(tags: Record<string, string> | undefined, key: string): string | undefined {
  if (!tags) return undefined;
  const match = Object.entries(tags).find(([k]) => k.toLowerCase() === key);
  const value = match?.[1].trim();
  return value ? value : undefined;
}
