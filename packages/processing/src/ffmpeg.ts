/**
 * FFmpeg Wrapper
 * 
 * Runs a built ffmpeg command and logs it.
 */

import { TranscodeFailedError } from '@remuxer/core';
import { createLogger, executeCommand, type CommandResult } from '@remuxer/utils';

const log = createLogger({ component: 'ffmpeg' });

export interface FFmpegOptions {
  timeout?: number;
}

export interface ExecuteOptions {
  overwrite?: boolean;   // -y
  timeout?: number;
}

export class FFmpeg {
  private ffmpegPath: string;
  private timeout: number;

  constructor(ffmpegPath: string = 'ffmpeg', options: FFmpegOptions = {}) {
    this.ffmpegPath = ffmpegPath;
    this.timeout = options.timeout ?? 3600000; // 1 hour
  }

  /**
   * Execute an FFmpeg command
   * 
   * @param args - Arguments NOT including the binary
   * @throws TranscodeFailedError on a non-zero exit, a timeout or a spawn failure
   */
  async execute(args: string[], options: ExecuteOptions = {}): Promise<CommandResult> {
    const fullArgs = options.overwrite === false ? args : ['-y', ...args];
    const commandLine = [this.ffmpegPath, ...fullArgs].join(' ');

    log.info({ command: commandLine }, 'Running ffmpeg');

    let result: CommandResult;
    try {
      result = await executeCommand(this.ffmpegPath, fullArgs, {
        timeout: options.timeout ?? this.timeout,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TranscodeFailedError(commandLine, 127, message);
    }

    if (result.exitCode !== 0 || result.timedOut) {
      log.error({ exitCode: result.exitCode, timedOut: result.timedOut }, 'ffmpeg failed');
      throw new TranscodeFailedError(commandLine, result.exitCode, result.stderr, result.timedOut);
    }

    log.info({ durationMs: result.duration }, 'ffmpeg finished');
    return result;
  }

  /**
   * Check if FFmpeg is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await executeCommand(this.ffmpegPath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
