/**
 * Probe Snapshot
 *
 * Writes the raw probe output next to the renditions as `info.json`.
 */

import { join } from 'node:path';
import { safeWriteFile } from '@hls-ladder/utils';
import type { FFProbeResult } from './probes/ffprobe.js';

export const SNAPSHOT_FILENAME = 'info.json';

/**
 * Serialize to JSON with every non-ASCII character escaped as \uXXXX
 */
export function toAsciiJson(value: unknown, indent = 4): string {
  return JSON.stringify(value, null, indent).replace(
    /[\u0080-\uffff]/g,
    ch => `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

export async function writeProbeSnapshot(outputDir: string, probe: FFProbeResult): Promise<string> {
  const snapshotPath = join(outputDir, SNAPSHOT_FILENAME);
  await safeWriteFile(snapshotPath, toAsciiJson(probe));
  return snapshotPath;
}
