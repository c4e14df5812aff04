/**
 * File Operations
 *
 * Safe file operations with proper error handling.
 */

import { mkdir, writeFile, readdir, rm } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Safely write a file, ensuring the directory exists
 */
export async function safeWriteFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content, 'utf8');
}

/**
 * List the entries of a directory, returning null if it doesn't exist
 */
export async function listDir(dirPath: string): Promise<string[] | null> {
  try {
    return await readdir(dirPath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Remove a file; rejects when it cannot be removed
 */
export async function removeFile(filePath: string): Promise<void> {
  await rm(filePath);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
