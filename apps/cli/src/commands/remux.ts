/**
 * Remux Command
 * 
 * Remux (or transcode where needed) one media file and write its manifest.
 */

import ora from 'ora';
import chalk from 'chalk';
import { ConfigurationError } from '@remuxer/core';
import { QUALITY_MODES, type QualityMode, type RemuxPlan } from '@remuxer/processing';
import type { AppConfig } from '../config/index.js';
import { createMediaTools } from '../lib/tools.js';
import { remuxFile, type RemuxSettings, type RemuxStage } from '../lib/remux.js';
import {
  formatDuration,
  printHeader,
  printJson,
  printKeyValue,
  printSuccess,
  printWarning,
} from '../lib/output.js';

export interface RemuxCommandOptions {
  output?: string;
  urlPrefix?: string;
  language?: string;
  quality?: string;
  videoOnlySource?: boolean;
  title?: string;
  dryRun?: boolean;
  json?: boolean;
}

const stageText: Record<RemuxStage, string> = {
  'probing': 'Probing media file...',
  'planning': 'Planning streams...',
  'writing-manifest': 'Writing manifest...',
  'transcoding': 'Running ffmpeg...',
};

export function parseQualityMode(value: string): QualityMode {
  const mode = QUALITY_MODES.find(candidate => candidate === value);
  if (!mode) {
    throw new ConfigurationError('quality', `expected one of ${QUALITY_MODES.join(', ')}, got "${value}"`);
  }
  return mode;
}

// Track language tags are cut to this length when probed
const MAX_LANGUAGE_LENGTH = 4;

export function parseLanguage(value: string): string {
  if (value.length === 0 || value.length > MAX_LANGUAGE_LENGTH) {
    throw new ConfigurationError('language', `expected 1 to ${MAX_LANGUAGE_LENGTH} characters, got "${value}"`);
  }
  return value;
}

/**
 * Flags win over environment defaults.
 */
export function resolveRemuxSettings(options: RemuxCommandOptions, config: AppConfig): RemuxSettings {
  return {
    outputDir: options.output ?? config.remux.outputDir,
    urlPrefix: options.urlPrefix ?? config.remux.urlPrefix,
    preferredLanguage: options.language !== undefined ? parseLanguage(options.language) : config.remux.language,
    qualityMode: options.quality ? parseQualityMode(options.quality) : config.remux.qualityMode,
    videoOnlySource: options.videoOnlySource ?? false,
    title: options.title,
    dryRun: options.dryRun ?? false,
  };
}

function printPlan(plan: RemuxPlan): void {
  const { manifest } = plan;

  printHeader('Remux Plan');
  printKeyValue('Title', manifest.title);
  printKeyValue('Duration', formatDuration(manifest.duration));
  console.log();

  console.log(chalk.bold(`Outputs (${plan.outputs.length}):`));
  for (const output of plan.outputs) {
    const streams = plan.operations
      .filter(op => op.output === output.name)
      .map(op => {
        const action = op.action.type === 'copy' ? 'copy' : `encode ${op.action.codec}`;
        return `#${op.trackIndex} ${op.kind} (${action})`;
      });
    console.log(`  ${chalk.cyan(output.name)} ${chalk.gray('←')} ${streams.join(', ')}`);
  }

  if (plan.skipped.length > 0) {
    console.log();
    console.log(chalk.bold(`Skipped (${plan.skipped.length}):`));
    for (const track of plan.skipped) {
      console.log(`  ${chalk.yellow(`#${track.trackIndex}`)} ${track.kind} ${track.codec} ${chalk.gray(track.reason)}`);
    }
  }
  console.log();
}

export async function remuxCommand(
  file: string,
  options: RemuxCommandOptions,
  config: AppConfig
): Promise<void> {
  const settings = resolveRemuxSettings(options, config);
  const tools = createMediaTools(config);
  const spinner = options.json ? undefined : ora(stageText.probing).start();

  try {
    const outcome = await remuxFile(file, settings, {
      probe: tools.ffprobe,
      ffmpeg: tools.ffmpeg,
      onStage: (stage) => {
        if (spinner) spinner.text = stageText[stage];
      },
    });
    spinner?.stop();

    if (options.json) {
      printJson({
        manifest: outcome.plan.manifest,
        operations: outcome.plan.operations,
        skipped: outcome.plan.skipped,
        command: outcome.args,
        manifestPath: outcome.manifestPath,
        executed: outcome.executed,
      });
      return;
    }

    printPlan(outcome.plan);

    if (outcome.commandLine) {
      printKeyValue('Command', outcome.commandLine);
    }

    if (settings.dryRun) {
      printWarning('Dry run: nothing was written');
    } else if (outcome.executed) {
      printSuccess(`Wrote ${outcome.plan.outputs.length} file(s) and ${outcome.manifestPath}`);
    } else {
      printWarning(`No streams to extract; wrote ${outcome.manifestPath}`);
    }
  } catch (error) {
    spinner?.fail('Remux failed');
    throw error;
  }
}
