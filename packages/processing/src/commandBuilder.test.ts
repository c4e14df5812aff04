import { describe, expect, it } from 'vitest';
import { FFmpegCommandBuilder } from './commandBuilder.js';

describe('FFmpegCommandBuilder', () => {
  it('orders global args, inputs, mappings, codecs and output', () => {
    const args = new FFmpegCommandBuilder()
      .addGlobalArg('-y')
      .addInput('in.mkv')
      .mapAudio(0, 1)
      .setAudioCodec({ codec: 'aac', bitrate: '128k' })
      .setOutputOptions({
        format: 'hls',
        hls: { segmentDuration: 6, playlistType: 'vod', segmentFilename: 'seg_%03d.ts' },
      })
      .setOutput('audio.m3u8')
      .build();

    expect(args).toEqual([
      '-y', '-i', 'in.mkv',
      '-map', '0:a:1',
      '-c:a', 'aac', '-b:a', '128k',
      '-f', 'hls', '-hls_time', '6', '-hls_playlist_type', 'vod', '-hls_segment_filename', 'seg_%03d.ts',
      'audio.m3u8',
    ]);
  });

  it('chains video filters in insertion order', () => {
    const args = new FFmpegCommandBuilder()
      .addInput('in.mkv')
      .mapVideo(0, 0)
      .setVideoCodec({ codec: 'libx264', preset: 'fast', pixFmt: 'yuv420p' })
      .addVideoFilter('scale=640:360')
      .addVideoFilter('fps=30')
      .setOutput('out.m3u8')
      .build();

    expect(args).toEqual([
      '-i', 'in.mkv',
      '-map', '0:v:0',
      '-c:v', 'libx264', '-preset', 'fast', '-pix_fmt', 'yuv420p',
      '-vf', 'scale=640:360,fps=30',
      'out.m3u8',
    ]);
  });

  it('requires an input and an output', () => {
    expect(() => new FFmpegCommandBuilder().setOutput('x.m3u8').build()).toThrow('No input specified');
    expect(() => new FFmpegCommandBuilder().addInput('in.mkv').build()).toThrow('No output file specified');
  });

  it('extracts subtitles as a bare webvtt file', () => {
    const args = new FFmpegCommandBuilder()
      .addInput('My Movie.mkv')
      .mapSubtitles(0, 0)
      .setSubtitleCodec({ codec: 'webvtt' })
      .setOutputOptions({ format: 'webvtt' })
      .setOutput('subtitle.vtt')
      .build();

    expect(args).toEqual(['-i', 'My Movie.mkv', '-map', '0:s:0', '-c:s', 'webvtt', '-f', 'webvtt', 'subtitle.vtt']);
  });
});
