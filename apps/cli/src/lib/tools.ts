/**
 * External tool construction from configuration
 */

import { resolveBinaryPath } from '@remuxer/core';
import { FFProbe } from '@remuxer/media';
import { FFmpeg } from '@remuxer/processing';
import type { AppConfig } from '../config/index.js';

export interface MediaTools {
  ffprobe: FFProbe;
  ffmpeg: FFmpeg;
  paths: { ffprobe: string; ffmpeg: string };
}

export function createMediaTools(config: AppConfig): MediaTools {
  const ffprobePath = resolveBinaryPath('ffprobe', config.mediaTools.ffprobe).resolvedPath;
  const ffmpegPath = resolveBinaryPath('ffmpeg', config.mediaTools.ffmpeg).resolvedPath;

  return {
    ffprobe: new FFProbe(ffprobePath, { timeout: config.timeouts.probeMs }),
    ffmpeg: new FFmpeg(ffmpegPath, { timeout: config.timeouts.transcodeMs }),
    paths: { ffprobe: ffprobePath, ffmpeg: ffmpegPath },
  };
}
