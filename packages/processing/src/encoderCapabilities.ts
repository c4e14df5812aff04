/**
 * Encoder Capabilities
 *
 * Decides once per run whether video is encoded on the GPU.
 */

import { executeCommand, type Logger } from '@hls-ladder/utils';
import type { VideoEncoder } from './commandBuilder.js';

export type HardwareAccelMode = 'auto' | 'on' | 'off';

export const HARDWARE_ENCODER = 'h264_nvenc';
export const SOFTWARE_ENCODER = 'libx264';

type CommandRunner = typeof executeCommand;

/**
 * True when the ffmpeg build lists the NVENC H.264 encoder
 */
export async function detectHardwareEncoder(
  ffmpegPath: string,
  run: CommandRunner = executeCommand
): Promise<boolean> {
  try {
    const result = await run(ffmpegPath, ['-hide_banner', '-encoders'], { timeout: 10000 });
    return result.exitCode === 0 && /\bh264_nvenc\b/.test(result.stdout);
  } catch {
    // An ffmpeg that cannot be started has no encoders to offer
    return false;
  }
}

export async function resolveVideoEncoder(
  mode: HardwareAccelMode,
  ffmpegPath: string,
  logger: Logger,
  detect: (ffmpegPath: string) => Promise<boolean> = detectHardwareEncoder
): Promise<VideoEncoder> {
  switch (mode) {
    case 'on':
      return HARDWARE_ENCODER;
    case 'off':
      return SOFTWARE_ENCODER;
    case 'auto': {
      const available = await detect(ffmpegPath);
      logger.info({ encoder: available ? HARDWARE_ENCODER : SOFTWARE_ENCODER }, 'Selected video encoder');
      return available ? HARDWARE_ENCODER : SOFTWARE_ENCODER;
    }
  }
}
