/**
 * Binary Configuration
 * 
 * Resolves the external tool paths with automatic OS detection.
 * 
 * Priority order:
 * 1. Explicit path (CLI flag or validated env config)
 * 2. Environment variable (e.g., FFMPEG_PATH)
 * 3. Bundled binary folder (packages/core/binaries/<os>/)
 * 4. System PATH
 */

import { existsSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Binary folder location - relative to packages/core/
const BINARY_ROOT = resolve(__dirname, '../../binaries');

export type BinaryName = 'ffmpeg' | 'ffprobe';

export type BinarySource = 'explicit' | 'env' | 'bundled' | 'path';

export interface BinaryConfig {
  name: BinaryName;
  envVar: string;
  resolvedPath: string;
  source: BinarySource;
}

const ENV_VARS: Record<BinaryName, string> = {
  ffmpeg: 'FFMPEG_PATH',
  ffprobe: 'FFPROBE_PATH',
};

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

/**
 * Resolve a binary path. Environment paths are taken as given; a wrong
 * path fails when the tool is spawned.
 */
export function resolveBinaryPath(
  name: BinaryName,
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env
): BinaryConfig {
  const envVar = ENV_VARS[name];

  if (explicitPath) {
    return { name, envVar, resolvedPath: explicitPath, source: 'explicit' };
  }

  const envPath = env[envVar];
  if (envPath) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  const bundledPath = join(BINARY_ROOT, getOsFolder(), name + getExeExt());
  if (existsSync(bundledPath)) {
    return { name, envVar, resolvedPath: bundledPath, source: 'bundled' };
  }

  // Let the system PATH resolve it
  return { name, envVar, resolvedPath: name, source: 'path' };
}

/**
 * Get binary folder paths for user reference
 */
export function getBinaryFolders(): { root: string; os: string } {
  return {
    root: BINARY_ROOT,
    os: join(BINARY_ROOT, getOsFolder()),
  };
}
