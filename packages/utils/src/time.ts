/**
 * Time Utilities
 */

/**
 * Parse a timecode string (HH:MM:SS.ss) to seconds
 */
export function parseTimecode(timecode: string): number {
  const match = timecode.trim().match(/^(-)?(\d+):(\d{1,2}):(\d{1,2}(?:\.\d+)?)$/);
  if (!match) {
    throw new Error(`Invalid timecode format: ${timecode}`);
  }

  const hours = parseInt(match[2] ?? '0', 10);
  const minutes = parseInt(match[3] ?? '0', 10);
  const seconds = parseFloat(match[4] ?? '0');
  const total = hours * 3600 + minutes * 60 + seconds;

  return match[1] ? -total : total;
}

/**
 * Format a duration in seconds as H:MM:SS or M:SS
 */
export function formatDuration(totalSeconds: number): string {
  if (!Number.isFinite(totalSeconds) || totalSeconds < 0) return '--:--';

  const seconds = Math.floor(totalSeconds);
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;

  if (h > 0) {
    return `${h}:${String(m).padStart(2, '0')}:${String(s).padStart(2, '0')}`;
  }
  return `${m}:${String(s).padStart(2, '0')}`;
}
