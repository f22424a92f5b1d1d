/**
 * Remux Pipeline
 * 
 * probe → plan → manifest.json → ffmpeg, for a single input file.
 */

import { join } from 'node:path';
import type { ProbeResult } from '@remuxer/media';
import {
  buildRemuxPlan,
  createPlanCommand,
  type QualityMode,
  type RemuxPlan,
} from '@remuxer/processing';
import { createLogger, ensureDir, writeJsonFile } from '@remuxer/utils';

const log = createLogger({ component: 'remux' });

export const MANIFEST_FILE = 'manifest.json';

export type RemuxStage = 'probing' | 'planning' | 'writing-manifest' | 'transcoding';

export interface RemuxSettings {
  outputDir: string;
  urlPrefix: string;
  preferredLanguage?: string;
  qualityMode: QualityMode;
  videoOnlySource: boolean;
  title?: string;
  /** Plan only; nothing is written or run */
  dryRun: boolean;
}

export interface RemuxDependencies {
  probe: { probe(filePath: string): Promise<ProbeResult> };
  ffmpeg: { execute(args: string[]): Promise<unknown> };
  onStage?: (stage: RemuxStage) => void;
}

export interface RemuxOutcome {
  plan: RemuxPlan;
  args: string[];
  commandLine: string;
  manifestPath: string;
  executed: boolean;
}

export async function remuxFile(
  inputFile: string,
  settings: RemuxSettings,
  deps: RemuxDependencies
): Promise<RemuxOutcome> {
  deps.onStage?.('probing');
  const probe = await deps.probe.probe(inputFile);

  deps.onStage?.('planning');
  const plan = buildRemuxPlan(probe, {
    inputFile,
    urlPrefix: settings.urlPrefix,
    preferredLanguage: settings.preferredLanguage,
    qualityMode: settings.qualityMode,
    videoOnlySource: settings.videoOnlySource,
    title: settings.title,
  });

  const manifestPath = join(settings.outputDir, MANIFEST_FILE);

  if (plan.outputs.length === 0) {
    log.warn({ inputFile }, 'Nothing to extract');
  }

  const builder = plan.outputs.length > 0
    ? createPlanCommand(plan, inputFile, settings.outputDir)
    : undefined;
  const args = builder?.build() ?? [];
  const commandLine = builder?.buildString() ?? '';

  if (settings.dryRun) {
    return { plan, args, commandLine, manifestPath, executed: false };
  }

  deps.onStage?.('writing-manifest');
  await ensureDir(settings.outputDir);
  await writeJsonFile(manifestPath, plan.manifest);
  log.info({ manifestPath }, 'Wrote manifest');

  if (args.length === 0) {
    return { plan, args, commandLine, manifestPath, executed: false };
  }

  deps.onStage?.('transcoding');
  await deps.ffmpeg.execute(args);

  return { plan, args, commandLine, manifestPath, executed: true };
}
