/**
 * Doctor Command
 * 
 * Check that ffprobe and ffmpeg can be run.
 */

import ora from 'ora';
import chalk from 'chalk';
import { getBinaryFolders } from '@remuxer/core';
import type { AppConfig } from '../config/index.js';
import { createMediaTools } from '../lib/tools.js';
import { printError, printHeader, printKeyValue, printSuccess } from '../lib/output.js';

export async function doctorCommand(config: AppConfig): Promise<void> {
  const tools = createMediaTools(config);
  const spinner = ora('Checking media tools...').start();

  const [ffprobeOk, ffmpegOk] = await Promise.all([
    tools.ffprobe.isAvailable(),
    tools.ffmpeg.isAvailable(),
  ]);
  spinner.stop();

  printHeader('Media Tools');
  printKeyValue('ffprobe', `${tools.paths.ffprobe} ${ffprobeOk ? chalk.green('[OK]') : chalk.red('[ERR]')}`);
  printKeyValue('ffmpeg', `${tools.paths.ffmpeg} ${ffmpegOk ? chalk.green('[OK]') : chalk.red('[ERR]')}`);
  printKeyValue('Bundled binaries', getBinaryFolders().os);
  console.log();

  if (ffprobeOk && ffmpegOk) {
    printSuccess('All tools available');
  } else {
    printError('Set FFPROBE_PATH / FFMPEG_PATH or install ffmpeg');
    process.exitCode = 1;
  }
}
