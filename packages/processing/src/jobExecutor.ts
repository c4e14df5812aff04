/**
 * Job Executor
 *
 * Runs one encode job: spawns ffmpeg, follows its stderr for progress and
 * reports the outcome. Failures are returned, never thrown.
 */

import { errorMessage } from '@hls-ladder/core';
import { formatCommand, spawnStreaming, type Logger, type ProcessSpawner } from '@hls-ladder/utils';
import type { EncodeJob } from './jobBuilder.js';
import { parseProgressLine, type ProgressSample } from './progressParser.js';
import type { ProgressHandle, ProgressRegistry } from './progressRegistry.js';

export interface JobOutcome {
  jobId: string;
  success: boolean;
  /** null when the process could not be started */
  exitCode: number | null;
  stderr: string;
  durationMs: number;
  error?: string;
}

export interface JobExecutorOptions {
  ffmpegPath: string;
  registry: ProgressRegistry;
  logger: Logger;
  spawner?: ProcessSpawner;
}

type ExitStatus = { code: number } | { spawnError: unknown };

export class JobExecutor {
  private readonly ffmpegPath: string;
  private readonly registry: ProgressRegistry;
  private readonly logger: Logger;
  private readonly spawner: ProcessSpawner;

  constructor(options: JobExecutorOptions) {
    this.ffmpegPath = options.ffmpegPath;
    this.registry = options.registry;
    this.logger = options.logger;
    this.spawner = options.spawner ?? spawnStreaming;
  }

  /**
   * Execute a job to completion
   */
  async execute(job: EncodeJob): Promise<JobOutcome> {
    const startTime = Date.now();
    const log = this.logger.child({ jobId: job.id });
    const task = this.registry.register(job.description, job.progressTotal);
    const stderrLines: string[] = [];

    log.debug({ command: formatCommand(this.ffmpegPath, job.args) }, 'Starting encode');

    try {
      const status = await this.run(job, task, stderrLines, log);
      task.complete();

      const stderr = stderrLines.join('\n');
      const durationMs = Date.now() - startTime;

      if ('spawnError' in status) {
        const error = errorMessage(status.spawnError);
        log.debug({ error }, 'ffmpeg could not be started');
        return { jobId: job.id, success: false, exitCode: null, stderr, durationMs, error };
      }

      const success = status.code === 0;
      log.info({ exitCode: status.code, durationMs }, 'Encode finished');

      return {
        jobId: job.id,
        success,
        exitCode: status.code,
        stderr,
        durationMs,
        error: success ? undefined : extractError(status.code, stderrLines),
      };
    } finally {
      task.release();
    }
  }

  private async run(
    job: EncodeJob,
    task: ProgressHandle,
    stderrLines: string[],
    log: Logger
  ): Promise<ExitStatus> {
    let lines: AsyncIterable<string>;
    let exit: Promise<ExitStatus>;
    try {
      const child = this.spawner(this.ffmpegPath, job.args);
      lines = child.lines;
      // Settle-handlers attached now so a spawn error is never unhandled
      exit = child.exit.then(
        (code): ExitStatus => ({ code }),
        (spawnError: unknown): ExitStatus => ({ spawnError })
      );
    } catch (spawnError) {
      return { spawnError };
    }

    for await (const line of lines) {
      stderrLines.push(line);
      this.trackProgress(line, job, task, log);
    }

    return exit;
  }

  private trackProgress(line: string, job: EncodeJob, task: ProgressHandle, log: Logger): void {
    let sample: ProgressSample | null;
    try {
      sample = parseProgressLine(line);
    } catch (error) {
      log.debug({ line, error: errorMessage(error) }, 'Skipping unreadable progress marker');
      return;
    }

    if (sample) {
      task.report(Math.min(sample.time, job.progressTotal), sample.speed);
    }
  }
}

/**
 * Short failure reason from the tail of ffmpeg's output
 */
export function extractError(exitCode: number, stderrLines: readonly string[]): string {
  const last = [...stderrLines].reverse().find(line => line.trim().length > 0);
  return last
    ? `ffmpeg exited with code ${exitCode}: ${last.trim()}`
    : `ffmpeg exited with code ${exitCode}`;
}

/**
 * Last lines of stderr, for failure logs
 */
export function stderrTail(stderr: string, lines = 10): string[] {
  return stderr.split('\n').filter(line => line.trim().length > 0).slice(-lines);
}
