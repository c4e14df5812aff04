/**
 * Binary Configuration
 *
 * Resolution and availability checks for the external encoder/prober.
 * Supports both Windows and Linux binaries with automatic OS detection.
 *
 * Priority order:
 * 1. Environment variables (FFMPEG_PATH, FFPROBE_PATH)
 * 2. Custom binary folder (packages/core/binaries/<os>/)
 * 3. System PATH
 */

import { existsSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { executeCommand } from '@hls-ladder/utils';
import { ToolUnavailableError } from '../errors/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Binary folder location - relative to packages/core/
const BINARY_ROOT = resolve(__dirname, '../../binaries');

function getOsFolder(): string {
  switch (process.platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

function getExeExt(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

export type BinarySource = 'env' | 'folder' | 'path';

export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: BinarySource;
}

export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ffprobe: BinaryConfig;
}

/**
 * Resolve binary path with priority:
 * 1. Environment variable
 * 2. Custom binary folder
 * 3. System PATH
 */
export function resolveBinaryPath(
  name: string,
  envVar: string,
  env: NodeJS.ProcessEnv = process.env
): BinaryConfig {
  const envPath = env[envVar];
  if (envPath) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  const customPath = join(BINARY_ROOT, getOsFolder(), name + getExeExt());
  if (existsSync(customPath)) {
    return { name, envVar, resolvedPath: customPath, source: 'folder' };
  }

  // Let the system PATH resolve the bare name; availability is checked separately
  return { name, envVar, resolvedPath: name, source: 'path' };
}

export function getBinariesConfig(env: NodeJS.ProcessEnv = process.env): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', env),
    ffprobe: resolveBinaryPath('ffprobe', 'FFPROBE_PATH', env),
  };
}

/**
 * Check if a binary runs and exits cleanly for `-version`
 */
export async function isBinaryAvailable(binaryPath: string): Promise<boolean> {
  try {
    const result = await executeCommand(binaryPath, ['-version'], { timeout: 5000 });
    return result.exitCode === 0;
  } catch {
    // Spawn failure (ENOENT, EACCES) means the binary is unusable
    return false;
  }
}

/**
 * Throw ToolUnavailableError unless every configured binary is usable
 */
export async function assertToolsAvailable(
  config: BinariesConfig,
  check: (binaryPath: string) => Promise<boolean> = isBinaryAvailable
): Promise<void> {
  const missing: string[] = [];

  for (const binary of [config.ffmpeg, config.ffprobe]) {
    if (!(await check(binary.resolvedPath))) {
      missing.push(`${binary.name} (${binary.resolvedPath})`);
    }
  }

  if (missing.length > 0) {
    throw new ToolUnavailableError(missing);
  }
}
