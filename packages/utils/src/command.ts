/**
 * Command Execution Wrapper
 *
 * Safe wrappers for executing external commands:
 * - Buffered execution with timeout and output capture
 * - Streaming execution that yields diagnostic output line by line
 */

import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
}

/**
 * Execute an external command and buffer its output
 *
 * Rejects only when the process cannot be spawned; a non-zero exit code
 * is reported through `exitCode`.
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 300000, // 5 minutes default
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      // Force kill after 10 seconds
      setTimeout(() => child.kill('SIGKILL'), 10000).unref();
    }, timeout);

    child.stdout.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    child.on('close', (code, signal) => {
      clearTimeout(timeoutId);

      resolve({
        exitCode: code ?? (signal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      clearTimeout(timeoutId);
      reject(error);
    });
  });
}

/**
 * A running process whose diagnostic output is consumed line by line
 */
export interface StreamingProcess {
  /** Lines written to stderr, without trailing newlines */
  lines: AsyncIterable<string>;
  /** Resolves with the exit code; rejects when the process could not be spawned */
  exit: Promise<number>;
}

export type ProcessSpawner = (command: string, args: string[]) => StreamingProcess;

/**
 * Spawn a command and expose its stderr as an async line iterator
 *
 * readline splits on `\r` as well as `\n`, which is how ffmpeg
 * terminates its in-place progress lines.
 */
export const spawnStreaming: ProcessSpawner = (command, args) => {
  const child = spawn(command, args, {
    stdio: ['ignore', 'ignore', 'pipe'],
  });

  const lines = createInterface({ input: child.stderr, crlfDelay: Infinity });

  const exit = new Promise<number>((resolve, reject) => {
    child.once('error', (error) => {
      // The pipe may never emit 'end' when the process failed to start
      lines.close();
      reject(error);
    });
    child.once('close', (code, signal) => {
      resolve(code ?? (signal ? 128 : 1));
    });
  });

  return { lines, exit };
};

/**
 * Render a command line for logging, quoting arguments with spaces
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map(a => (a.includes(' ') ? `"${a}"` : a)).join(' ');
}
