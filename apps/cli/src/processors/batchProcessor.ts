/**
 * Batch Processor
 *
 * Converts every matching file in a directory, one file at a time. An
 * unexpected error in one file is recorded and the batch moves on.
 */

import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { ConfigurationError, errorMessage } from '@hls-ladder/core';
import { isErrnoException, type Logger } from '@hls-ladder/utils';
import type { FileConverter, FileReport } from './fileProcessor.js';

export interface BatchHooks {
  onFileStart?(sourcePath: string, position: number, total: number): void;
  onFileDone?(report: FileReport): void;
}

export interface BatchSummary {
  directory: string;
  reports: FileReport[];
  converted: number;
  failed: number;
  droppedRenditions: number;
}

export class BatchProcessor {
  constructor(
    private readonly converter: FileConverter,
    private readonly logger: Logger,
    private readonly extension: string
  ) {}

  /**
   * Files in `directory` with the configured extension, sorted by name
   */
  async listSources(directory: string): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        throw new ConfigurationError(`Not a directory: ${directory}`);
      }
      throw error;
    }

    const wanted = this.extension.toLowerCase();
    return entries
      .filter(entry => entry.isFile() && extname(entry.name).toLowerCase() === wanted)
      .map(entry => entry.name)
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
      .map(name => join(directory, name));
  }

  async run(directory: string, hooks: BatchHooks = {}): Promise<BatchSummary> {
    const sources = await this.listSources(directory);
    this.logger.info({ directory, files: sources.length, extension: this.extension }, 'Starting batch');

    const reports: FileReport[] = [];
    for (const [index, sourcePath] of sources.entries()) {
      hooks.onFileStart?.(sourcePath, index + 1, sources.length);

      const report = await this.convertSafely(sourcePath);
      reports.push(report);

      hooks.onFileDone?.(report);
    }

    const summary: BatchSummary = {
      directory,
      reports,
      converted: reports.filter(r => r.state === 'DONE').length,
      failed: reports.filter(r => r.state !== 'DONE').length,
      droppedRenditions: reports.reduce((sum, r) => sum + r.failedJobs.length, 0),
    };

    this.logger.info(
      { converted: summary.converted, failed: summary.failed, droppedRenditions: summary.droppedRenditions },
      'Batch finished'
    );
    return summary;
  }

  private async convertSafely(sourcePath: string): Promise<FileReport> {
    const startTime = Date.now();
    try {
      return await this.converter.process(sourcePath);
    } catch (error) {
      this.logger.error({ sourcePath, err: error }, 'Unexpected error while converting file');
      return {
        sourcePath,
        state: 'FAILED',
        master: { audio: [], subtitles: [], video: [] },
        failedJobs: [],
        removedPaths: [],
        error: errorMessage(error),
        durationMs: Date.now() - startTime,
      };
    }
  }
}
