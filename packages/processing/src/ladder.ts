/**
 * Resolution Ladder
 *
 * Derives the set of video renditions for a source. A rung never upscales:
 * only candidate heights at or below the source height are kept.
 */

/** Target heights, ascending */
export const CANDIDATE_RUNGS: readonly number[] = [240, 360, 480, 720, 1080, 2160];

/** Target video bitrate per rung height, in kbps */
export const BITRATE_TABLE: ReadonlyMap<number, number> = new Map([
  [240, 400],
  [360, 800],
  [480, 1200],
  [720, 2500],
  [1080, 5000],
  [2160, 12000],
]);

/** Lets the scaler pick an even width that keeps the aspect ratio */
export const AUTO_WIDTH = -2;

export interface RenditionSpec {
  height: number;
  /** Even pixel width, or AUTO_WIDTH */
  width: number;
  bitrateKbps: number;
}

export interface LadderSource {
  width?: number;
  height?: number;
}

export interface LadderOptions {
  /** Replaces CANDIDATE_RUNGS */
  rungs?: readonly number[];
}

export function planLadder(source: LadderSource, options: LadderOptions = {}): RenditionSpec[] {
  const rungs = normalizeRungs(options.rungs ?? CANDIDATE_RUNGS);
  const { width, height } = source;

  if (height === undefined || height <= 0) {
    return rungs.map(rung => ({
      height: rung,
      width: AUTO_WIDTH,
      bitrateKbps: bitrateFor(rung),
    }));
  }

  return rungs
    .filter(rung => rung <= height)
    .map(rung => ({
      height: rung,
      width: scaledWidth(rung, width, height),
      bitrateKbps: bitrateFor(rung),
    }));
}

/**
 * Width for a rung, rounded to the nearest even number
 */
export function scaledWidth(rung: number, sourceWidth: number | undefined, sourceHeight: number): number {
  if (sourceWidth === undefined || sourceWidth <= 0) return AUTO_WIDTH;
  const width = Math.round((rung * sourceWidth) / sourceHeight / 2) * 2;
  return width > 0 ? width : AUTO_WIDTH;
}

export function bitrateFor(rung: number): number {
  return BITRATE_TABLE.get(rung) ?? fallbackBitrateKbps(rung);
}

/**
 * Bitrate for a height missing from the table.
 *
 * Between two entries the bitrate is interpolated linearly. Above the
 * largest entry it grows with pixel count; below the smallest it shrinks
 * in proportion to height.
 */
export function fallbackBitrateKbps(rung: number): number {
  const points = [...BITRATE_TABLE.entries()].sort((a, b) => a[0] - b[0]);
  const lowest = points[0];
  const highest = points[points.length - 1];
  if (!lowest || !highest) return 0;

  if (rung <= lowest[0]) {
    return Math.max(1, Math.round((lowest[1] * rung) / lowest[0]));
  }
  if (rung >= highest[0]) {
    return Math.round(highest[1] * (rung / highest[0]) ** 2);
  }

  let below = lowest;
  let above = highest;
  for (const point of points) {
    if (point[0] <= rung) below = point;
    if (point[0] >= rung) {
      above = point;
      break;
    }
  }

  if (above[0] === below[0]) return below[1];
  const ratio = (rung - below[0]) / (above[0] - below[0]);
  return Math.round(below[1] + ratio * (above[1] - below[1]));
}

function normalizeRungs(rungs: readonly number[]): number[] {
  return [...new Set(rungs)]
    .filter(rung => Number.isInteger(rung) && rung > 0)
    .sort((a, b) => a - b);
}
