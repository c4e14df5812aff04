import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { writeFileSync } from 'node:fs';
import { access, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ManifestWriteError, ProbeFailureError } from '@hls-ladder/core';
import { parseProbeOutput, type MediaProber } from '@hls-ladder/media';
import { ProgressRegistry } from '@hls-ladder/processing';
import { PlaylistAssembler } from '@hls-ladder/packaging';
import { createNullLogger, type ProcessSpawner } from '@hls-ladder/utils';
import { FileProcessor, resolveOutputRoot, type FileProcessorOptions } from './fileProcessor.js';

const STREAMS_720P = [
  { index: 0, codec_type: 'video', codec_name: 'h264', width: 1280, height: 720 },
  { index: 1, codec_type: 'audio', codec_name: 'aac', disposition: { default: 1 }, tags: { language: 'eng' } },
];

function proberFor(streams: unknown[]): MediaProber {
  const json = JSON.stringify({ format: { duration: '120.000000' }, streams });
  return { probe: vi.fn(async (filePath: string) => parseProbeOutput(filePath, json)) };
}

async function* fromLines(lines: string[]): AsyncGenerator<string> {
  yield* lines;
}

/**
 * Stands in for ffmpeg: optionally writes the playlist and one segment,
 * and exits with 1 for jobs matched by `failWhen`
 */
function fakeFfmpeg(options: { failWhen?: (args: string[]) => boolean; writeOutputs?: boolean } = {}) {
  return vi.fn<ProcessSpawner>((_command, args) => {
    if (options.writeOutputs) {
      const patternAt = args.indexOf('-hls_segment_filename');
      const pattern = patternAt >= 0 ? args[patternAt + 1] : undefined;
      if (pattern) writeFileSync(pattern.replace('%03d', '000'), 'segment');
      const output = args[args.length - 1];
      if (output) writeFileSync(output, '#EXTM3U\n');
    }
    return {
      lines: fromLines(['Press [q] to stop', 'size=    512kB time=00:01:00.00 bitrate= 69.9kbits/s speed=4.0x']),
      exit: Promise.resolve(options.failWhen?.(args) ? 1 : 0),
    };
  });
}

describe('FileProcessor', () => {
  let dir: string;
  let sourcePath: string;

  const options: FileProcessorOptions = {
    ffmpegPath: 'ffmpeg',
    encoder: 'libx264',
    concurrency: 1,
    deleteIntermediates: false,
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hls-ladder-file-'));
    sourcePath = join(dir, 'My Movie.mkv');
    await writeFile(sourcePath, 'source');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('converts a 720p source with a default English audio track', async () => {
    const spawner = fakeFfmpeg();
    const processor = new FileProcessor(
      { prober: proberFor(STREAMS_720P), registry: new ProgressRegistry(), logger: createNullLogger(), spawner },
      options
    );

    const report = await processor.process(sourcePath);
    const outputRoot = join(dir, 'My_Movie');

    expect(report.state).toBe('DONE');
    expect(report.outputRoot).toBe(outputRoot);
    expect(report.failedJobs).toEqual([]);
    expect(report.masterPath).toBe(join(outputRoot, 'master.m3u8'));
    expect(spawner.mock.calls.map(([, args]) => args[args.length - 1])).toEqual([
      join(outputRoot, 'video_0', '240p.m3u8'),
      join(outputRoot, 'video_0', '360p.m3u8'),
      join(outputRoot, 'video_0', '480p.m3u8'),
      join(outputRoot, 'video_0', '720p.m3u8'),
      join(outputRoot, 'audio_0', 'audio.m3u8'),
    ]);

    expect(await readFile(join(outputRoot, 'master.m3u8'), 'utf8')).toBe(
      [
        '#EXTM3U',
        '#EXT-X-VERSION:3',
        '',
        '#EXT-X-MEDIA:TYPE=AUDIO,GROUP-ID="audio",NAME="eng",LANGUAGE="eng",DEFAULT=YES,AUTOSELECT=YES,URI="audio_0/audio.m3u8"',
        '',
        '#EXT-X-STREAM-INF:BANDWIDTH=400000,RESOLUTION=426x240,AUDIO="audio"',
        'video_0/240p.m3u8',
        '#EXT-X-STREAM-INF:BANDWIDTH=800000,RESOLUTION=640x360,AUDIO="audio"',
        'video_0/360p.m3u8',
        '#EXT-X-STREAM-INF:BANDWIDTH=1200000,RESOLUTION=854x480,AUDIO="audio"',
        'video_0/480p.m3u8',
        '#EXT-X-STREAM-INF:BANDWIDTH=2500000,RESOLUTION=1280x720,AUDIO="audio"',
        'video_0/720p.m3u8',
        '',
      ].join('\n')
    );

    const snapshot: unknown = JSON.parse(await readFile(join(outputRoot, 'info.json'), 'utf8'));
    expect(snapshot).toMatchObject({ format: { duration: '120.000000' } });
  });

  it('drops a failed rung and keeps the others', async () => {
    const spawner = fakeFfmpeg({ failWhen: args => args.includes('scale=854:480') });
    const processor = new FileProcessor(
      { prober: proberFor(STREAMS_720P), registry: new ProgressRegistry(), logger: createNullLogger(), spawner },
      options
    );

    const report = await processor.process(sourcePath);

    expect(report.state).toBe('DONE');
    expect(report.failedJobs).toEqual(['video_0_480p']);
    expect(report.master.video.map(v => v.uri)).toEqual([
      'video_0/240p.m3u8',
      'video_0/360p.m3u8',
      'video_0/720p.m3u8',
    ]);
    expect(report.master.audio).toHaveLength(1);
  });

  it('wraps extracted subtitles and references the subtitle group', async () => {
    const streams = [
      ...STREAMS_720P,
      { index: 2, codec_type: 'subtitle', codec_name: 'subrip', tags: { language: 'spa', title: 'Español' } },
      { index: 3, codec_type: 'attachment', codec_name: 'ttf' },
    ];
    const processor = new FileProcessor(
      { prober: proberFor(streams), registry: new ProgressRegistry(), logger: createNullLogger(), spawner: fakeFfmpeg() },
      { ...options, rungs: [360] }
    );

    const report = await processor.process(sourcePath);
    const outputRoot = join(dir, 'My_Movie');

    expect(report.master.subtitles).toEqual([
      { type: 'subtitle', uri: 'subtitle_0/subtitle.m3u8', name: 'Español', language: 'spa' },
    ]);
    expect((await readFile(join(outputRoot, 'subtitle_0', 'subtitle.m3u8'), 'utf8')).split('\n')[5]).toBe(
      'subtitle.vtt'
    );
    const master = await readFile(join(outputRoot, 'master.m3u8'), 'utf8');
    expect(master.split('\n')).toContain(
      '#EXT-X-STREAM-INF:BANDWIDTH=800000,RESOLUTION=640x360,AUDIO="audio",SUBTITLES="subs"'
    );
  });

  it('fails the file when probing fails', async () => {
    const spawner = fakeFfmpeg();
    const prober: MediaProber = {
      probe: vi.fn(async (filePath: string) => {
        throw new ProbeFailureError(filePath, 'Invalid data found when processing input');
      }),
    };
    const processor = new FileProcessor(
      { prober, registry: new ProgressRegistry(), logger: createNullLogger(), spawner },
      options
    );

    const report = await processor.process(sourcePath);

    expect(report.state).toBe('FAILED');
    expect(report.error).toBe(`Could not probe ${sourcePath}: Invalid data found when processing input`);
    expect(report.outputRoot).toBeUndefined();
    expect(spawner).not.toHaveBeenCalled();
  });

  it('removes the source and segments but keeps playlists when cleanup is on', async () => {
    const processor = new FileProcessor(
      {
        prober: proberFor(STREAMS_720P),
        registry: new ProgressRegistry(),
        logger: createNullLogger(),
        spawner: fakeFfmpeg({ writeOutputs: true }),
      },
      { ...options, deleteIntermediates: true, rungs: [240] }
    );

    const report = await processor.process(sourcePath);
    const outputRoot = join(dir, 'My_Movie');

    expect(report.state).toBe('DONE');
    expect(report.removedPaths).toEqual([
      join(outputRoot, 'video_0', 'segment_240p_000.ts'),
      join(outputRoot, 'audio_0', 'segment_audio_000.ts'),
      sourcePath,
    ]);
    expect(await readdir(join(outputRoot, 'video_0'))).toEqual(['240p.m3u8']);
    await expect(access(sourcePath)).rejects.toThrow();
  });

  it('writes an empty master and keeps the source when every job fails', async () => {
    const processor = new FileProcessor(
      {
        prober: proberFor(STREAMS_720P),
        registry: new ProgressRegistry(),
        logger: createNullLogger(),
        spawner: fakeFfmpeg({ failWhen: () => true }),
      },
      { ...options, deleteIntermediates: true }
    );

    const report = await processor.process(sourcePath);
    const outputRoot = join(dir, 'My_Movie');

    expect(report.state).toBe('DONE');
    expect(report.failedJobs).toEqual(['video_0_240p', 'video_0_360p', 'video_0_480p', 'video_0_720p', 'audio_0']);
    expect(report.masterPath).toBe(join(outputRoot, 'master.m3u8'));
    expect(await readFile(join(outputRoot, 'master.m3u8'), 'utf8')).toBe('#EXTM3U\n#EXT-X-VERSION:3\n\n\n');
    expect(report.removedPaths).toEqual([]);
    await expect(access(sourcePath)).resolves.toBeUndefined();
  });

  it('reports a master write failure without dropping renditions or the source', async () => {
    const masterPath = join(dir, 'My_Movie', 'master.m3u8');
    const writeMaster = vi.spyOn(PlaylistAssembler.prototype, 'writeMasterPlaylist').mockResolvedValue({
      success: false,
      path: masterPath,
      error: new ManifestWriteError(masterPath, 'EACCES: permission denied'),
    });
    const processor = new FileProcessor(
      {
        prober: proberFor(STREAMS_720P),
        registry: new ProgressRegistry(),
        logger: createNullLogger(),
        spawner: fakeFfmpeg({ writeOutputs: true }),
      },
      { ...options, deleteIntermediates: true, rungs: [240] }
    );

    const report = await processor.process(sourcePath);

    expect(writeMaster).toHaveBeenCalledTimes(1);
    expect(report.state).toBe('DONE');
    expect(report.masterPath).toBeUndefined();
    expect(report.manifestError).toBe(`Could not write ${masterPath}: EACCES: permission denied`);
    expect(report.master.video.map(v => v.uri)).toEqual(['video_0/240p.m3u8']);
    expect(report.master.audio.map(a => a.uri)).toEqual(['audio_0/audio.m3u8']);
    expect(report.removedPaths).toEqual([]);
    await expect(access(sourcePath)).resolves.toBeUndefined();
  });
});

describe('resolveOutputRoot', () => {
  it('sanitizes the source name', () => {
    expect(resolveOutputRoot('/media/Olá Mundo.mkv')).toBe('/media/Ola_Mundo');
  });

  it('falls back when nothing survives sanitizing', () => {
    expect(resolveOutputRoot('/media/ñ★.mkv')).toBe('/media/n');
    expect(resolveOutputRoot('/media/★★.mkv')).toBe('/media/output');
  });
});
