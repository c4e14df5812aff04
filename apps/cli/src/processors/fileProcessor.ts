/**
 * File Processor
 *
 * Converts one source file into an HLS package:
 * probe → classify → encode renditions → write playlists → (cleanup).
 *
 * Only a probe failure fails the file. A failed rendition is dropped and
 * its siblings carry on; a failed master write is reported without
 * touching the renditions already on disk.
 */

import { basename, dirname, join } from 'node:path';
import {
  FileStateMachine,
  HlsLadderError,
  RenditionFailureError,
  errorMessage,
  type FileState,
  type MasterPlaylist,
  type RenditionResult,
} from '@hls-ladder/core';
import {
  buildSourceContainer,
  classifyTracks,
  writeProbeSnapshot,
  type MediaProber,
  type SourceContainer,
  type TrackCollection,
} from '@hls-ladder/media';
import {
  AUTO_WIDTH,
  JobBuilder,
  JobExecutor,
  SUBTITLE_CAPTION_FILENAME,
  planLadder,
  stderrTail,
  type EncodeContext,
  type EncodeJob,
  type ProgressRegistry,
  type VideoEncoder,
} from '@hls-ladder/processing';
import { PlaylistAssembler } from '@hls-ladder/packaging';
import {
  ensureDir,
  getBasename,
  runWithConcurrency,
  sanitizeFilename,
  toPosixRelative,
  type Logger,
  type ProcessSpawner,
} from '@hls-ladder/utils';
import { removeIntermediates } from './cleanup.js';

/** Output directory name when nothing of the source name survives sanitizing */
export const FALLBACK_OUTPUT_NAME = 'output';

export interface FileProcessorOptions {
  ffmpegPath: string;
  encoder: VideoEncoder;
  /** Encode jobs in flight at once */
  concurrency: number;
  deleteIntermediates: boolean;
  rungs?: readonly number[];
}

export interface FileProcessorDeps {
  prober: MediaProber;
  registry: ProgressRegistry;
  logger: Logger;
  spawner?: ProcessSpawner;
}

export interface FileReport {
  sourcePath: string;
  state: FileState;
  outputRoot?: string;
  master: MasterPlaylist;
  failedJobs: string[];
  masterPath?: string;
  manifestError?: string;
  removedPaths: string[];
  error?: string;
  durationMs: number;
}

/**
 * Anything that converts a single file; the batch depends on this only
 */
export interface FileConverter {
  process(sourcePath: string): Promise<FileReport>;
}

export class FileProcessor implements FileConverter {
  private readonly jobBuilder: JobBuilder;
  private readonly executor: JobExecutor;
  private readonly assembler: PlaylistAssembler;

  constructor(
    private readonly deps: FileProcessorDeps,
    private readonly options: FileProcessorOptions
  ) {
    this.jobBuilder = new JobBuilder({ encoder: options.encoder });
    this.executor = new JobExecutor({
      ffmpegPath: options.ffmpegPath,
      registry: deps.registry,
      logger: deps.logger,
      spawner: deps.spawner,
    });
    this.assembler = new PlaylistAssembler(deps.logger);
  }

  async process(sourcePath: string): Promise<FileReport> {
    const startTime = Date.now();
    const machine = new FileStateMachine(sourcePath);
    const log = this.deps.logger.child({ file: basename(sourcePath) });
    const report: FileReport = {
      sourcePath,
      state: machine.getState(),
      master: { audio: [], subtitles: [], video: [] },
      failedJobs: [],
      removedPaths: [],
      durationMs: 0,
    };
    const finish = (): FileReport => ({ ...report, state: machine.getState(), durationMs: Date.now() - startTime });

    log.info({ sourcePath }, 'Processing file');

    // PROBING
    let container: SourceContainer;
    let outputRoot: string;
    try {
      const probe = await this.deps.prober.probe(sourcePath);
      container = buildSourceContainer(sourcePath, probe);
      outputRoot = resolveOutputRoot(sourcePath);
      await ensureDir(outputRoot);
      await writeProbeSnapshot(outputRoot, probe);
    } catch (error) {
      report.error = errorMessage(error);
      machine.fail(report.error);
      log.error({ error: report.error }, 'Probe failed, skipping file');
      return finish();
    }
    report.outputRoot = outputRoot;
    log.debug({ outputRoot, duration: container.duration, streams: container.streams.length }, 'Probed');

    // CLASSIFYING
    machine.transitionTo('CLASSIFYING');
    const tracks = classifyTracks(container, log);

    // PROCESSING
    machine.transitionTo('PROCESSING');
    const jobs = this.buildJobs(tracks, { sourcePath, outputRoot, duration: container.duration }, log);
    const runs = await runWithConcurrency(jobs, this.options.concurrency, job => this.runJob(job, outputRoot, log));

    // Pool results keep job order, so each group stays in discovery order
    const succeeded: EncodeJob[] = [];
    for (const run of runs) {
      if ('failure' in run) {
        report.failedJobs.push(run.job.id);
        continue;
      }
      succeeded.push(run.job);
      addResult(report.master, run.result);
    }

    // ASSEMBLING
    machine.transitionTo('ASSEMBLING');
    const written = await this.assembler.writeMasterPlaylist(outputRoot, report.master);
    if (written.success) {
      report.masterPath = written.path;
    } else {
      report.manifestError = written.error?.message ?? `Could not write ${written.path}`;
      log.error({ error: report.manifestError }, 'Master playlist not written');
    }

    // CLEANUP, only once a playable package is on disk
    const produced = succeeded.length > 0 && report.masterPath !== undefined;
    if (this.options.deleteIntermediates && !produced) {
      log.warn(
        { renditions: succeeded.length, masterWritten: report.masterPath !== undefined },
        'Nothing usable was produced, keeping the source'
      );
    }
    if (this.options.deleteIntermediates && produced) {
      machine.transitionTo('CLEANUP');
      const segmentDirs = succeeded.filter(job => job.type !== 'subtitle').map(job => job.outputDir);
      const cleanup = await removeIntermediates(sourcePath, segmentDirs, log);
      report.removedPaths = cleanup.removed;
    }

    machine.transitionTo('DONE');
    const final = finish();
    log.info(
      {
        renditions: final.master.video.length + final.master.audio.length + final.master.subtitles.length,
        failed: final.failedJobs.length,
        states: machine.getHistory().map(transition => transition.to),
        durationMs: final.durationMs,
      },
      'File done'
    );
    return final;
  }

  private buildJobs(tracks: TrackCollection, context: EncodeContext, log: Logger): EncodeJob[] {
    const jobs: EncodeJob[] = [];

    for (const track of tracks.video) {
      const ladder = planLadder(
        { width: track.stream.width, height: track.stream.height },
        { rungs: this.options.rungs }
      );
      if (ladder.length === 0) {
        log.warn({ track: track.trackIndex, height: track.stream.height }, 'Video track is below the smallest rung');
      }
      jobs.push(...this.jobBuilder.buildVideoJobs(track, ladder, context));
    }
    for (const track of tracks.audio) {
      jobs.push(this.jobBuilder.buildAudioJob(track, context));
    }
    for (const track of tracks.subtitle) {
      jobs.push(this.jobBuilder.buildSubtitleJob(track, context));
    }

    log.info({ jobs: jobs.length, encoder: this.jobBuilder.encoder }, 'Jobs planned');
    return jobs;
  }

  /**
   * Run one job to a rendition or a failure; never rejects
   */
  private async runJob(job: EncodeJob, outputRoot: string, log: Logger): Promise<JobRun> {
    try {
      await ensureDir(job.outputDir);
    } catch (error) {
      return failed(job, new HlsLadderError(errorMessage(error), 'OUTPUT_DIR_FAILURE', { dir: job.outputDir }), log);
    }

    const outcome = await this.executor.execute(job);
    if (!outcome.success) {
      const failure = new RenditionFailureError(job.id, outcome.exitCode ?? -1, outcome.stderr);
      log.error(
        { jobId: job.id, exitCode: outcome.exitCode, error: outcome.error, stderr: stderrTail(outcome.stderr) },
        'Rendition failed, dropping it'
      );
      return { job, failure };
    }

    if (job.type === 'subtitle') {
      const written = await this.assembler.writeSubtitlePlaylist(job.playlistPath, SUBTITLE_CAPTION_FILENAME);
      if (written.error) {
        return failed(job, written.error, log);
      }
    }

    return { job, result: toRenditionResult(job, outputRoot) };
  }
}

type JobRun =
  | { job: EncodeJob; result: RenditionResult }
  | { job: EncodeJob; failure: HlsLadderError };

function failed(job: EncodeJob, failure: HlsLadderError, log: Logger): JobRun {
  log.error({ jobId: job.id, code: failure.code, error: failure.message }, 'Rendition failed, dropping it');
  return { job, failure };
}

/**
 * `<sourceDir>/<sanitized name>`
 */
export function resolveOutputRoot(sourcePath: string): string {
  const name = sanitizeFilename(getBasename(sourcePath)) || FALLBACK_OUTPUT_NAME;
  return join(dirname(sourcePath), name);
}

export function toRenditionResult(job: EncodeJob, outputRoot: string): RenditionResult {
  const uri = toPosixRelative(outputRoot, job.playlistPath);

  switch (job.type) {
    case 'video':
      return {
        type: 'video',
        uri,
        width: job.rendition.width === AUTO_WIDTH ? null : job.rendition.width,
        height: job.rendition.height,
        bandwidth: job.rendition.bitrateKbps * 1000,
      };
    case 'audio':
      return {
        type: 'audio',
        uri,
        name: job.track.displayName,
        language: job.track.language,
        isDefault: job.track.stream.isDefault,
      };
    case 'subtitle':
      return {
        type: 'subtitle',
        uri,
        name: job.track.displayName,
        language: job.track.language,
      };
  }
}

function addResult(master: MasterPlaylist, result: RenditionResult): void {
  switch (result.type) {
    case 'video':
      master.video.push(result);
      break;
    case 'audio':
      master.audio.push(result);
      break;
    case 'subtitle':
      master.subtitles.push(result);
      break;
  }
}
