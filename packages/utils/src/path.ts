/**
 * Path Utilities
 */

import { extname, basename, relative, sep } from 'node:path';

/**
 * Reduce a name to ASCII letters, digits, `-` and `_`
 *
 * Diacritics are stripped to their base letter and spaces become
 * underscores: `"Olá Mundo"` → `"Ola_Mundo"`.
 */
export function sanitizeFilename(name: string): string {
  return name
    .normalize('NFKD')
    .replace(/ /g, '_')
    .replace(/[^A-Za-z0-9_-]/g, '');
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Relative path from `from` to `to` with forward slashes, as used in playlists
 */
export function toPosixRelative(from: string, to: string): string {
  return relative(from, to).split(sep).join('/');
}
