/**
 * Convert Command
 *
 * Converts every source file in a directory into an HLS package.
 */

import { basename, resolve } from 'node:path';
import chalk from 'chalk';
import {
  ConfigurationError,
  ToolUnavailableError,
  assertToolsAvailable,
} from '@hls-ladder/core';
import { FFProbe } from '@hls-ladder/media';
import { ProgressRegistry, resolveVideoEncoder } from '@hls-ladder/processing';
import { formatDuration } from '@hls-ladder/utils';
import { cliOverrides, loadConfig, type AppConfig, type CliOptions } from '../config/index.js';
import { createAppLogger } from '../lib/logger.js';
import { printError, printHeader, printInfo, printKeyValue, printSuccess, printWarning } from '../lib/output.js';
import { ProgressDisplay } from '../lib/progressDisplay.js';
import { BatchProcessor, type BatchSummary } from '../processors/batchProcessor.js';
import { FileProcessor, type FileReport } from '../processors/fileProcessor.js';

export async function convertCommand(directory: string, options: CliOptions): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig({ ...process.env, ...cliOverrides(options) });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      reportConfigurationError(error);
      return;
    }
    throw error;
  }

  const logger = createAppLogger(config);
  const ffmpegPath = config.binaries.ffmpeg.resolvedPath;
  const ffprobePath = config.binaries.ffprobe.resolvedPath;

  try {
    await assertToolsAvailable(config.binaries);
  } catch (error) {
    if (error instanceof ToolUnavailableError) {
      logger.fatal({ tools: error.details?.['tools'] }, error.message);
      printError(error.message);
      printInfo('Install ffmpeg or set FFMPEG_PATH / FFPROBE_PATH');
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const encoder = await resolveVideoEncoder(config.conversion.hwaccel, ffmpegPath, logger);
  printInfo(`Video encoder: ${chalk.cyan(encoder)}`);

  const registry = new ProgressRegistry();
  const display = new ProgressDisplay(registry);
  const fileProcessor = new FileProcessor(
    { prober: new FFProbe(ffprobePath), registry, logger },
    {
      ffmpegPath,
      encoder,
      concurrency: config.conversion.concurrency,
      deleteIntermediates: config.conversion.deleteIntermediates,
      rungs: config.conversion.rungs,
    }
  );
  const batch = new BatchProcessor(fileProcessor, logger, config.conversion.sourceExtension);
  const root = resolve(directory);

  let summary: BatchSummary;
  try {
    summary = await batch.run(root, {
      onFileStart: (sourcePath, position, total) => {
        display.start(`[${position}/${total}] ${basename(sourcePath)}`);
      },
      onFileDone: report => {
        display.stop();
        printFileReport(report);
      },
    });
  } catch (error) {
    display.stop();
    if (error instanceof ConfigurationError) {
      reportConfigurationError(error);
      return;
    }
    throw error;
  }

  printSummary(summary, config.conversion.sourceExtension);
}

function reportConfigurationError(error: ConfigurationError): void {
  printError(error.message);
  const issues = error.details?.['issues'];
  if (Array.isArray(issues)) {
    for (const issue of issues) {
      printWarning(String(issue));
    }
  }
  process.exitCode = 1;
}

function printFileReport(report: FileReport): void {
  const name = basename(report.sourcePath);

  if (report.state === 'FAILED') {
    printError(`${name}: ${report.error ?? 'conversion failed'}`);
    return;
  }

  const { audio, subtitles, video } = report.master;
  printSuccess(
    `${name}: ${video.length} video, ${audio.length} audio, ${subtitles.length} subtitle renditions ` +
      chalk.gray(`(${formatDuration(report.durationMs / 1000)})`)
  );
  if (report.failedJobs.length > 0) {
    printWarning(`${name}: dropped ${report.failedJobs.join(', ')}`);
  }
  if (report.manifestError) {
    printError(`${name}: ${report.manifestError}`);
  } else if (report.masterPath) {
    printInfo(`Master playlist: ${report.masterPath}`);
  }
  if (report.removedPaths.length > 0) {
    printInfo(`${name}: removed ${report.removedPaths.length} intermediate files`);
  }
}

function printSummary(summary: BatchSummary, extension: string): void {
  if (summary.reports.length === 0) {
    printWarning(`No ${extension} files found in ${summary.directory}`);
    return;
  }

  printHeader('Summary');
  printKeyValue('Directory', summary.directory);
  printKeyValue('Converted', summary.converted);
  printKeyValue('Failed', summary.failed);
  printKeyValue('Dropped renditions', summary.droppedRenditions);
}
