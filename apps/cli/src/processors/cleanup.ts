/**
 * Intermediate Cleanup
 *
 * Removes the source file and the transport stream segments of finished
 * renditions. Playlists and caption files stay. Nothing here fails the
 * file: every problem is logged and collected.
 */

import { extname, join } from 'node:path';
import { CleanupError, errorMessage } from '@hls-ladder/core';
import { listDir, removeFile, type Logger } from '@hls-ladder/utils';

const SEGMENT_EXTENSION = '.ts';

export interface CleanupReport {
  removed: string[];
  errors: CleanupError[];
}

export async function removeIntermediates(
  sourcePath: string,
  renditionDirs: readonly string[],
  logger: Logger
): Promise<CleanupReport> {
  const report: CleanupReport = { removed: [], errors: [] };

  for (const dir of new Set(renditionDirs)) {
    let entries: string[] | null;
    try {
      entries = await listDir(dir);
    } catch (error) {
      record(report, new CleanupError(dir, errorMessage(error)), logger);
      continue;
    }

    if (entries === null) {
      logger.warn({ dir }, 'Rendition directory missing, nothing to clean');
      continue;
    }

    for (const entry of entries.sort()) {
      if (extname(entry).toLowerCase() !== SEGMENT_EXTENSION) continue;
      await removePath(join(dir, entry), report, logger);
    }
  }

  await removePath(sourcePath, report, logger);

  logger.info({ removed: report.removed.length, failed: report.errors.length }, 'Intermediate files removed');
  return report;
}

async function removePath(path: string, report: CleanupReport, logger: Logger): Promise<void> {
  try {
    await removeFile(path);
    report.removed.push(path);
  } catch (error) {
    record(report, new CleanupError(path, errorMessage(error)), logger);
  }
}

function record(report: CleanupReport, error: CleanupError, logger: Logger): void {
  report.errors.push(error);
  logger.warn({ path: error.details?.['path'], error: error.message }, 'Cleanup failed');
}
