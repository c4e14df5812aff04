/**
 * FFProbe Wrapper
 *
 * Safe wrapper for ffprobe command execution.
 * Extracts container and stream metadata in JSON format and validates
 * the fields the pipeline relies on; everything else is passed through
 * untouched so the snapshot keeps the full probe output.
 */

import { z } from 'zod';
import { executeCommand } from '@hls-ladder/utils';
import { ProbeFailureError, errorMessage } from '@hls-ladder/core';

const streamSchema = z
  .object({
    index: z.number().int(),
    codec_type: z.string().optional(),
    codec_name: z.string().optional(),
    // Video specific
    width: z.number().int().optional(),
    height: z.number().int().optional(),
    // Common
    disposition: z.record(z.number()).optional(),
    tags: z.record(z.string()).optional(),
  })
  .passthrough();

const formatSchema = z
  .object({
    filename: z.string().optional(),
    format_name: z.string().optional(),
    duration: z.string().optional(),
    tags: z.record(z.string()).optional(),
  })
  .passthrough();

export const ffprobeResultSchema = z
  .object({
    format: formatSchema.optional(),
    streams: z.array(streamSchema).default([]),
  })
  .passthrough();

export type FFProbeResult = z.infer<typeof ffprobeResultSchema>;
export type FFProbeStream = z.infer<typeof streamSchema>;

/**
 * Anything that can produce structured metadata for a media file
 */
export interface MediaProber {
  /** Rejects with ProbeFailureError when no structured metadata is available */
  probe(filePath: string): Promise<FFProbeResult>;
}

export class FFProbe implements MediaProber {
  constructor(private readonly ffprobePath: string = 'ffprobe') {}

  async probe(filePath: string): Promise<FFProbeResult> {
    const args = [
      '-v', 'error',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      '-i', filePath,
    ];

    let stdout: string;
    try {
      const result = await executeCommand(this.ffprobePath, args, {
        timeout: 60000, // 1 minute timeout
      });
      if (result.exitCode !== 0) {
        throw new ProbeFailureError(
          filePath,
          result.stderr.trim() || `ffprobe exited with code ${result.exitCode}`
        );
      }
      stdout = result.stdout;
    } catch (error) {
      if (error instanceof ProbeFailureError) throw error;
      throw new ProbeFailureError(filePath, errorMessage(error));
    }

    return parseProbeOutput(filePath, stdout);
  }
}

/**
 * Parse and validate ffprobe's JSON output
 */
export function parseProbeOutput(filePath: string, stdout: string): FFProbeResult {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    throw new ProbeFailureError(
      filePath,
      `Failed to parse ffprobe output: ${stdout.substring(0, 200)}`
    );
  }

  const parsed = ffprobeResultSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ProbeFailureError(filePath, `Unexpected ffprobe output (${issues.join('; ')})`);
  }

  return parsed.data;
}
