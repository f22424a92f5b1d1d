#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Command-line interface for remuxer. One input file per invocation.
 */

// Loads .env before the logger reads LOG_LEVEL
import { loadConfig, type AppConfig } from './config/index.js';

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { isRemuxerError } from '@remuxer/core';
import { QUALITY_MODES } from '@remuxer/processing';

// Commands
import { remuxCommand, type RemuxCommandOptions } from './commands/remux.js';
import { probeCommand } from './commands/probe.js';
import { doctorCommand } from './commands/doctor.js';
import { printError } from './lib/output.js';

function handleError(error: unknown): void {
  if (isRemuxerError(error)) {
    printError(`${chalk.bold(error.code)} ${error.message}`);
    process.exitCode = error.exitCode;
    return;
  }
  printError(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}

function buildProgram(config: AppConfig): Command {
  const program = new Command();

  program
    .name('remuxer')
    .description('Remux media into browser-playable files and write a custom media manifest')
    .version('0.1.0');

  program
    .command('remux <file>')
    .description('Probe, plan and extract streams, then write manifest.json')
    .option('-o, --output <dir>', 'Output directory', config.remux.outputDir)
    .option('-u, --url-prefix <prefix>', 'Prepended verbatim to every file name in the manifest')
    .option('-l, --language <code>', 'Preferred audio language (e.g. eng)')
    .addOption(new Option('--quality <mode>', 'How to declare non-standard heights').choices(QUALITY_MODES))
    .option('--video-only-source', 'Emit the video source even without an audio track')
    .option('--title <title>', 'Manifest title (defaults to the container title or file name)')
    .option('--dry-run', 'Print the plan without writing or running anything')
    .option('--json', 'Output in JSON format')
    .action((file: string, options: RemuxCommandOptions) => remuxCommand(file, options, config));

  program
    .command('probe <file>')
    .description('Show the tracks found in a media file')
    .option('--json', 'Output in JSON format')
    .action((file: string, options: { json?: boolean }) => probeCommand(file, options, config));

  program
    .command('doctor')
    .description('Check that ffprobe and ffmpeg are available')
    .action(() => doctorCommand(config));

  return program;
}

async function main(): Promise<void> {
  const config = loadConfig();
  await buildProgram(config).parseAsync();
}

main().catch(handleError);
