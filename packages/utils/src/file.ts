/**
 * File Operations
 */

import { mkdir, writeFile } from 'node:fs/promises';
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
 * Write a value as pretty-printed JSON
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await safeWriteFile(filePath, `${JSON.stringify(data, null, 2)}\n`);
}
