/**
 * Path Utilities
 */

import { extname, basename } from 'node:path';

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}
