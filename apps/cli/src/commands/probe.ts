/**
 * Probe Command
 * 
 * Show the tracks the planner will see.
 */

import ora from 'ora';
import type { AppConfig } from '../config/index.js';
import { createMediaTools } from '../lib/tools.js';
import { formatDuration, printHeader, printJson, printKeyValue, printTable } from '../lib/output.js';

interface ProbeCommandOptions {
  json?: boolean;
}

export async function probeCommand(
  file: string,
  options: ProbeCommandOptions,
  config: AppConfig
): Promise<void> {
  const { ffprobe } = createMediaTools(config);
  const spinner = options.json ? undefined : ora('Probing media file...').start();

  try {
    const result = await ffprobe.probe(file);
    spinner?.stop();

    if (options.json) {
      printJson(result);
      return;
    }

    printHeader('Media Probe');
    printKeyValue('File', file);
    printKeyValue('Title', result.title ?? '-');
    printKeyValue('Duration', formatDuration(result.duration));
    printKeyValue('Bitrate', result.bitrate);
    console.log();

    printTable(result.tracks.map(track => ({
      index: track.index,
      kind: track.kind,
      codec: track.codec,
      height: track.scanlineCount ?? '',
      language: track.language ?? '',
      title: track.title ?? '',
    })));
  } catch (error) {
    spinner?.fail('Probe failed');
    throw error;
  }
}
