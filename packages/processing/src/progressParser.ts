/**
 * Progress Parser
 *
 * Reads the in-place status line ffmpeg writes to stderr:
 *
 *   frame= 1000 fps=24.5 q=28.0 size=   1234kB time=00:00:42.00 bitrate= 240.5kbits/s speed=2.01x
 */

import { parseTimecode } from '@hls-ladder/utils';

export interface ProgressSample {
  /** Position reached in the source, in seconds */
  time: number;
  /** Multiple of realtime */
  speed?: number;
}

const TIME_MARKER = /time=\s*(\S+)/;

/**
 * Parse one stderr line
 *
 * Returns null when the line carries no `time=` marker and throws when the
 * marker is present but unreadable (ffmpeg prints `time=N/A` before the
 * first frame).
 */
export function parseProgressLine(line: string): ProgressSample | null {
  const match = line.match(TIME_MARKER);
  if (!match) return null;

  return {
    time: parseTimecode(match[1] ?? ''),
    speed: numberField(line, /speed=\s*([\d.]+)x/),
  };
}

function numberField(line: string, pattern: RegExp): number | undefined {
  const value = line.match(pattern)?.[1];
  if (value === undefined) return undefined;
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}
