import { describe, expect, it, vi } from 'vitest';
import { createNullLogger, type CommandResult } from '@hls-ladder/utils';
import { detectHardwareEncoder, resolveVideoEncoder } from './encoderCapabilities.js';

function result(exitCode: number, stdout: string): CommandResult {
  return { exitCode, stdout, stderr: '', duration: 12, timedOut: false };
}

const ENCODERS = [
  'Encoders:',
  ' V....D libx264              libx264 H.264 / AVC / MPEG-4 AVC / MPEG-4 part 10 (codec h264)',
  ' V....D h264_nvenc           NVIDIA NVENC H.264 encoder (codec h264)',
  ' A....D aac                  AAC (Advanced Audio Coding)',
].join('\n');

describe('detectHardwareEncoder', () => {
  it('finds the NVENC encoder in the listing', async () => {
    const run = vi.fn(async () => result(0, ENCODERS));

    await expect(detectHardwareEncoder('/opt/ffmpeg', run)).resolves.toBe(true);
    expect(run).toHaveBeenCalledWith('/opt/ffmpeg', ['-hide_banner', '-encoders'], { timeout: 10000 });
  });

  it('is false when the encoder is absent', async () => {
    const run = vi.fn(async () => result(0, 'Encoders:\n V....D libx264 libx264 H.264'));
    await expect(detectHardwareEncoder('ffmpeg', run)).resolves.toBe(false);
  });

  it('is false when ffmpeg fails or cannot start', async () => {
    await expect(detectHardwareEncoder('ffmpeg', vi.fn(async () => result(1, ENCODERS)))).resolves.toBe(false);
    await expect(
      detectHardwareEncoder('ffmpeg', vi.fn(async () => Promise.reject(new Error('spawn ffmpeg ENOENT'))))
    ).resolves.toBe(false);
  });
});

describe('resolveVideoEncoder', () => {
  it('honours an explicit mode without probing', async () => {
    const detect = vi.fn(async () => true);

    await expect(resolveVideoEncoder('off', 'ffmpeg', createNullLogger(), detect)).resolves.toBe('libx264');
    await expect(resolveVideoEncoder('on', 'ffmpeg', createNullLogger(), detect)).resolves.toBe('h264_nvenc');
    expect(detect).not.toHaveBeenCalled();
  });

  it('probes in auto mode', async () => {
    const detect = vi.fn(async () => false);

    await expect(resolveVideoEncoder('auto', '/opt/ffmpeg', createNullLogger(), detect)).resolves.toBe('libx264');
    expect(detect).toHaveBeenCalledWith('/opt/ffmpeg');
  });
});
