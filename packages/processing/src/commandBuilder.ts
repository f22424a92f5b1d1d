/**
 * FFmpeg Command Builder
 * 
 * Fluent API for multi-output FFmpeg commands. As on the ffmpeg command
 * line, mappings and codec options accumulate until `setOutput` closes
 * them into one output file.
 * 
 * CRITICAL: Prefer stream copy over encoding when possible!
 */

import { join } from 'node:path';
import type { TrackKind } from '@remuxer/media';
import type { RemuxPlan, StreamOperation } from './types.js';

export interface InputOptions {
  extraArgs?: string[];   // Input args, placed before -i
}

export type StreamType = 'v' | 'a' | 's';

export interface CodecSetting {
  streamType: StreamType;
  codec: string;          // 'copy' or an encoder name
}

export interface OutputOptions {
  mappings: string[];     // e.g. '0:3'
  codecs: CodecSetting[];
  channels?: number;      // -ac
  format?: string;        // -f
  extraArgs: string[];
}

export interface OutputSpec extends OutputOptions {
  file: string;
}

const STREAM_TYPES: Record<TrackKind, StreamType> = {
  video: 'v',
  audio: 'a',
  subtitle: 's',
};

function emptyOutputOptions(): OutputOptions {
  return { mappings: [], codecs: [], extraArgs: [] };
}

function hasPendingOptions(options: OutputOptions): boolean {
  return options.mappings.length > 0
    || options.codecs.length > 0
    || options.channels !== undefined
    || options.format !== undefined
    || options.extraArgs.length > 0;
}

export class FFmpegCommandBuilder {
  private globalArgs: string[] = [];
  private inputs: { file: string; options: InputOptions }[] = [];
  private outputs: OutputSpec[] = [];
  private pending: OutputOptions = emptyOutputOptions();

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  /**
   * Add input file
   */
  addInput(file: string, options: InputOptions = {}): this {
    this.inputs.push({ file, options });
    return this;
  }

  /**
   * Map a stream into the next output
   */
  map(selector: string): this {
    this.pending.mappings.push(selector);
    return this;
  }

  /**
   * Set the codec of one stream type in the next output (copy = no re-encode)
   */
  setCodec(streamType: StreamType, codec: string): this {
    this.pending.codecs = this.pending.codecs.filter(setting => setting.streamType !== streamType);
    this.pending.codecs.push({ streamType, codec });
    return this;
  }

  setAudioChannels(channels: number): this {
    this.pending.channels = channels;
    return this;
  }

  /**
   * Force the muxer of the next output
   */
  setFormat(format: string): this {
    this.pending.format = format;
    return this;
  }

  addOutputArg(...args: string[]): this {
    this.pending.extraArgs.push(...args);
    return this;
  }

  /**
   * Close the pending options into an output file
   */
  setOutput(file: string): this {
    this.outputs.push({ ...this.pending, file });
    this.pending = emptyOutputOptions();
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    if (this.inputs.length === 0) {
      throw new Error('Input file not specified');
    }
    if (this.outputs.length === 0) {
      throw new Error('Output file not specified');
    }
    if (hasPendingOptions(this.pending)) {
      throw new Error('Output options given after the last output file');
    }

    const args: string[] = [...this.globalArgs];

    for (const input of this.inputs) {
      if (input.options.extraArgs) {
        args.push(...input.options.extraArgs);
      }
      args.push('-i', input.file);
    }

    for (const output of this.outputs) {
      for (const selector of output.mappings) {
        args.push('-map', selector);
      }
      for (const setting of output.codecs) {
        args.push(`-c:${setting.streamType}`, setting.codec);
      }
      if (output.channels !== undefined) {
        args.push('-ac', output.channels.toString());
      }
      args.push(...output.extraArgs);
      if (output.format) {
        args.push('-f', output.format);
      }
      args.push(output.file);
    }

    return args;
  }

  /**
   * Build command as string for logging
   */
  buildString(binary: string = 'ffmpeg'): string {
    return `${binary} ${this.build().map(a => a.includes(' ') ? `"${a}"` : a).join(' ')}`;
  }
}

function codecFor(operation: StreamOperation): string {
  return operation.action.type === 'copy' ? 'copy' : operation.action.codec;
}

/**
 * Translate a remux plan into one ffmpeg invocation writing every output.
 */
export function createPlanCommand(
  plan: RemuxPlan,
  inputFile: string,
  outputDir: string
): FFmpegCommandBuilder {
  const builder = new FFmpegCommandBuilder()
    .addGlobalArg('-hide_banner')
    .addInput(inputFile, { extraArgs: ['-strict', '-2'] });

  for (const output of plan.outputs) {
    const operations = plan.operations.filter(op => op.output === output.name);
    let experimental = false;

    for (const operation of operations) {
      builder.map(operation.mapping);
    }
    for (const operation of operations) {
      builder.setCodec(STREAM_TYPES[operation.kind], codecFor(operation));

      const { action } = operation;
      if (action.type === 'encode' && action.channels !== undefined) {
        builder.setAudioChannels(action.channels);
      }
      if (action.type === 'copy' && action.experimental) {
        experimental = true;
      }
    }

    if (experimental) {
      builder.addOutputArg('-strict', 'experimental');
    }
    if (output.format) {
      builder.setFormat(output.format);
    }
    builder.setOutput(join(outputDir, output.name));
  }

  return builder;
}
