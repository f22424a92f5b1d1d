/**
 * FFProbe Wrapper
 * 
 * Runs ffprobe in compact mode with only the entries the planner needs,
 * then hands the output to the parser.
 */

import { stat } from 'node:fs/promises';
import { ProbeFailedError, ProbeUnavailableError } from '@remuxer/core';
import { createLogger, executeCommand, type CommandResult } from '@remuxer/utils';
import { parseProbeOutput } from './parser.js';
import type { ProbeResult } from '../types.js';

const log = createLogger({ component: 'ffprobe' });

export const PROBE_ENTRIES = [
  'stream_tags=title,language',
  'stream=index,codec_type,codec_name,coded_height',
  'stream_disposition=',
  'format=duration,bit_rate',
  'format_tags=title',
].join(':');

export interface FFProbeOptions {
  timeout?: number;
}

export function buildProbeArgs(filePath: string): string[] {
  return [
    filePath,
    '-of', 'compact',
    '-hide_banner',
    '-show_streams',
    '-show_format',
    '-show_entries', PROBE_ENTRIES,
  ];
}

export class FFProbe {
  private ffprobePath: string;
  private timeout: number;

  constructor(ffprobePath: string = 'ffprobe', options: FFProbeOptions = {}) {
    this.ffprobePath = ffprobePath;
    this.timeout = options.timeout ?? 60000; // 1 minute
  }

  /**
   * Probe a media file
   * 
   * @throws ProbeUnavailableError if the file cannot be read
   * @throws ProbeFailedError if ffprobe cannot be run or exits non-zero
   * @throws ParseError if the output lacks mandatory stream fields
   */
  async probe(filePath: string): Promise<ProbeResult> {
    // Missing input is reported apart from a failed probe
    try {
      await stat(filePath);
    } catch (error) {
      throw new ProbeUnavailableError(filePath, error);
    }

    const args = buildProbeArgs(filePath);
    log.debug({ command: this.ffprobePath, args }, 'Running ffprobe');

    let result: CommandResult;
    try {
      result = await executeCommand(this.ffprobePath, args, {
        timeout: this.timeout,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProbeFailedError(filePath, 127, message);
    }

    if (result.exitCode !== 0 || result.timedOut) {
      throw new ProbeFailedError(filePath, result.exitCode, result.stderr);
    }

    const probe = parseProbeOutput(result.stdout);
    log.info(
      { filePath, tracks: probe.tracks.length, duration: probe.duration, durationMs: result.duration },
      'Probed media file'
    );
    return probe;
  }

  /**
   * Check if ffprobe is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await executeCommand(this.ffprobePath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
