/**
 * CLI Configuration
 * 
 * Environment (and `.env`) defaults for the remux commands. Flags given on
 * the command line take precedence over everything here.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '@remuxer/core';

dotenvConfig();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Media tools
  FFMPEG_PATH: z.string().min(1).optional(),
  FFPROBE_PATH: z.string().min(1).optional(),

  // Remux defaults
  REMUX_URL_PREFIX: z.string().default(''),
  REMUX_OUTPUT_DIR: z.string().min(1).default('./extracted'),
  REMUX_LANGUAGE: z.string().min(1).max(4).optional(),
  REMUX_QUALITY_MODE: z.enum(['exact', 'snap', 'strict']).default('snap'),

  // Timeouts
  PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(60000), // 1 minute
  TRANSCODE_TIMEOUT_MS: z.coerce.number().int().positive().default(3600000), // 1 hour
});

export type EnvConfig = z.infer<typeof envSchema>;

export interface AppConfig {
  nodeEnv: EnvConfig['NODE_ENV'];
  logLevel: EnvConfig['LOG_LEVEL'];
  mediaTools: {
    ffmpeg?: string;
    ffprobe?: string;
  };
  remux: {
    urlPrefix: string;
    outputDir: string;
    language?: string;
    qualityMode: EnvConfig['REMUX_QUALITY_MODE'];
  };
  timeouts: {
    probeMs: number;
    transcodeMs: number;
  };
}

/**
 * @throws ConfigurationError naming the first invalid variable
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const [issue] = parseResult.error.issues;
    throw new ConfigurationError(
      issue ? issue.path.join('.') : 'environment',
      issue ? issue.message : 'invalid environment'
    );
  }

  const env = parseResult.data;

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    mediaTools: {
      ffmpeg: env.FFMPEG_PATH,
      ffprobe: env.FFPROBE_PATH,
    },
    remux: {
      urlPrefix: env.REMUX_URL_PREFIX,
      outputDir: env.REMUX_OUTPUT_DIR,
      language: env.REMUX_LANGUAGE,
      qualityMode: env.REMUX_QUALITY_MODE,
    },
    timeouts: {
      probeMs: env.PROBE_TIMEOUT_MS,
      transcodeMs: env.TRANSCODE_TIMEOUT_MS,
    },
  };
}
