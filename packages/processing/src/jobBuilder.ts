/**
 * Job Builder
 *
 * Turns classified tracks into ffmpeg invocations. Each job writes into its
 * own directory under the output root:
 *
 *   video_<i>/<h>p.m3u8      + segment_<h>p_%03d.ts
 *   audio_<i>/audio.m3u8     + segment_audio_%03d.ts
 *   subtitle_<i>/subtitle.vtt (wrapped by subtitle.m3u8 later)
 */

import { join } from 'node:path';
import type { ClassifiedTrack } from '@hls-ladder/media';
import { FFmpegCommandBuilder, type VideoEncoder } from './commandBuilder.js';
import type { RenditionSpec } from './ladder.js';

/** Seconds of progress shown for a source whose duration is unknown */
export const PLACEHOLDER_PROGRESS_TOTAL = 100;

export const SEGMENT_DURATION = 10;
export const AUDIO_BITRATE = '128k';
export const SUBTITLE_CAPTION_FILENAME = 'subtitle.vtt';
export const SUBTITLE_PLAYLIST_FILENAME = 'subtitle.m3u8';

export interface EncodeContext {
  sourcePath: string;
  outputRoot: string;
  /** Source duration in seconds, when the prober reported one */
  duration?: number;
}

interface EncodeJobBase {
  id: string;
  trackIndex: number;
  track: ClassifiedTrack;
  /** Directory holding everything this job writes */
  outputDir: string;
  /** File ffmpeg writes (playlist or caption file) */
  outputPath: string;
  /** Playlist the master manifest points at */
  playlistPath: string;
  args: string[];
  description: string;
  /** Seconds */
  progressTotal: number;
}

export interface VideoEncodeJob extends EncodeJobBase {
  type: 'video';
  rendition: RenditionSpec;
  segmentPattern: string;
}

export interface AudioEncodeJob extends EncodeJobBase {
  type: 'audio';
  segmentPattern: string;
}

export interface SubtitleEncodeJob extends EncodeJobBase {
  type: 'subtitle';
}

export type EncodeJob = VideoEncodeJob | AudioEncodeJob | SubtitleEncodeJob;

export interface JobBuilderOptions {
  encoder: VideoEncoder;
}

export function resolveProgressTotal(duration: number | undefined): number {
  return duration !== undefined && duration > 0 ? duration : PLACEHOLDER_PROGRESS_TOTAL;
}

export class JobBuilder {
  constructor(private readonly options: JobBuilderOptions) {}

  get encoder(): VideoEncoder {
    return this.options.encoder;
  }

  /**
   * One job per rung
   */
  buildVideoJobs(track: ClassifiedTrack, ladder: readonly RenditionSpec[], context: EncodeContext): VideoEncodeJob[] {
    const outputDir = join(context.outputRoot, `video_${track.trackIndex}`);

    return ladder.map((rendition): VideoEncodeJob => {
      const playlistPath = join(outputDir, `${rendition.height}p.m3u8`);
      const segmentPattern = join(outputDir, `segment_${rendition.height}p_%03d.ts`);
      const bitrate = `${rendition.bitrateKbps}k`;

      const builder = this.baseCommand(context)
        .mapVideo(0, track.trackIndex)
        .setVideoCodec(
          this.options.encoder === 'h264_nvenc'
            ? {
                codec: 'h264_nvenc',
                preset: 'fast',
                bitrate,
                maxrate: bitrate,
                bufsize: `${rendition.bitrateKbps * 2}k`,
                pixFmt: 'yuv420p',
                extraArgs: ['-rc:v', 'vbr_hq'],
              }
            : { codec: 'libx264', preset: 'fast', bitrate, pixFmt: 'yuv420p' }
        )
        .addVideoFilter(`scale=${rendition.width}:${rendition.height}`);

      return {
        id: `video_${track.trackIndex}_${rendition.height}p`,
        type: 'video',
        trackIndex: track.trackIndex,
        track,
        rendition,
        outputDir,
        outputPath: playlistPath,
        playlistPath,
        segmentPattern,
        args: withHlsOutput(builder, segmentPattern, playlistPath).build(),
        description: `Video ${track.trackIndex} ${rendition.height}p`,
        progressTotal: resolveProgressTotal(context.duration),
      };
    });
  }

  buildAudioJob(track: ClassifiedTrack, context: EncodeContext): AudioEncodeJob {
    const outputDir = join(context.outputRoot, `audio_${track.trackIndex}`);
    const playlistPath = join(outputDir, 'audio.m3u8');
    const segmentPattern = join(outputDir, 'segment_audio_%03d.ts');

    const builder = this.baseCommand(context)
      .mapAudio(0, track.trackIndex)
      .setAudioCodec({ codec: 'aac', bitrate: AUDIO_BITRATE });

    return {
      id: `audio_${track.trackIndex}`,
      type: 'audio',
      trackIndex: track.trackIndex,
      track,
      outputDir,
      outputPath: playlistPath,
      playlistPath,
      segmentPattern,
      args: withHlsOutput(builder, segmentPattern, playlistPath).build(),
      description: `Audio ${track.trackIndex} (${track.displayName})`,
      progressTotal: resolveProgressTotal(context.duration),
    };
  }

  buildSubtitleJob(track: ClassifiedTrack, context: EncodeContext): SubtitleEncodeJob {
    const outputDir = join(context.outputRoot, `subtitle_${track.trackIndex}`);
    const captionPath = join(outputDir, SUBTITLE_CAPTION_FILENAME);

    const args = this.baseCommand(context)
      .mapSubtitles(0, track.trackIndex)
      .setSubtitleCodec({ codec: 'webvtt' })
      .setOutputOptions({ format: 'webvtt' })
      .setOutput(captionPath)
      .build();

    return {
      id: `subtitle_${track.trackIndex}`,
      type: 'subtitle',
      trackIndex: track.trackIndex,
      track,
      outputDir,
      outputPath: captionPath,
      playlistPath: join(outputDir, SUBTITLE_PLAYLIST_FILENAME),
      args,
      description: `Subtitle ${track.trackIndex} (${track.displayName})`,
      progressTotal: resolveProgressTotal(context.duration),
    };
  }

  private baseCommand(context: EncodeContext): FFmpegCommandBuilder {
    return new FFmpegCommandBuilder().addGlobalArg('-y').addInput(context.sourcePath);
  }
}

function withHlsOutput(
  builder: FFmpegCommandBuilder,
  segmentPattern: string,
  playlistPath: string
): FFmpegCommandBuilder {
  return builder
    .setOutputOptions({
      format: 'hls',
      hls: { segmentDuration: SEGMENT_DURATION, playlistType: 'vod', segmentFilename: segmentPattern },
    })
    .setOutput(playlistPath);
}
