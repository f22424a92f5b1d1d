/**
 * FFProbe Compact Output Parser
 * 
 * Turns `-of compact` output into tracks and container facts:
 * 
 *   format|duration=60.040000|bit_rate=2500000|tag:title=Example
 *   stream|index=0|codec_name=h264|codec_type=video|coded_height=1080
 */

import { ParseError } from '@remuxer/core';
import { createLogger } from '@remuxer/utils';
import { TRACK_KINDS, type ProbeResult, type Track, type TrackKind } from '../types.js';

const log = createLogger({ component: 'probe-parser' });

const NOT_AVAILABLE = 'N/A';
const MAX_LANGUAGE_LENGTH = 4;

export interface ProbeRecord {
  kind: string;
  fields: Array<[key: string, value: string]>;
}

const ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
};

/**
 * Split one line on unescaped `|` and undo ffprobe's C-style escaping.
 */
export function splitProbeLine(line: string): string[] {
  const tokens: string[] = [];
  let current = '';

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);
    if (char === '\\' && i + 1 < line.length) {
      const next = line.charAt(++i);
      current += ESCAPES[next] ?? next;
    } else if (char === '|') {
      tokens.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  tokens.push(current);

  return tokens;
}

/**
 * Parse a line into its record kind and key/value pairs.
 * Tokens without `=` are dropped.
 */
export function parseProbeRecord(line: string): ProbeRecord {
  const [kind = '', ...tokens] = splitProbeLine(line);
  const fields: ProbeRecord['fields'] = [];

  for (const token of tokens) {
    const separator = token.indexOf('=');
    if (separator === -1) {
      log.debug({ token, line }, 'Ignoring probe token without a value');
      continue;
    }
    fields.push([token.slice(0, separator), token.slice(separator + 1)]);
  }

  return { kind, fields };
}

export function parseTrackKind(value: string): TrackKind | undefined {
  const normalized = value.trim().toLowerCase();
  return TRACK_KINDS.find(kind => kind === normalized);
}

function parseUnsigned(field: string, value: string, line: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ParseError(field, line, `Invalid ${field} "${value}" in probe line: ${line}`);
  }
  return parseInt(value, 10);
}

function parseSeconds(field: string, value: string, line: string): number {
  const seconds = Number(value);
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds < 0) {
    throw new ParseError(field, line, `Invalid ${field} "${value}" in probe line: ${line}`);
  }
  return seconds;
}

interface FormatFacts {
  title?: string;
  duration: number;
  bitrate: number;
}

function applyFormatRecord(record: ProbeRecord, line: string, facts: FormatFacts): void {
  for (const [key, value] of record.fields) {
    switch (key) {
      case 'duration':
        if (value !== NOT_AVAILABLE) facts.duration = parseSeconds(key, value, line);
        break;
      case 'bit_rate':
        if (value !== NOT_AVAILABLE) facts.bitrate = parseUnsigned(key, value, line);
        break;
      case 'tag:title':
        if (value) facts.title = value;
        break;
      default:
        log.debug({ key, line }, 'Unrecognized format key');
    }
  }
}

/**
 * @returns undefined when the stream is not video, audio or subtitle
 */
function parseStreamRecord(record: ProbeRecord, line: string): Track | undefined {
  let kind: TrackKind | undefined;
  let index: number | undefined;
  let codec: string | undefined;
  let scanlineCount: number | undefined;
  let language: string | undefined;
  let title: string | undefined;

  for (const [key, value] of record.fields) {
    switch (key) {
      case 'codec_type':
        kind = parseTrackKind(value);
        if (!kind) {
          // data, attachment and friends
          log.debug({ codecType: value, line }, 'Skipping non-media stream');
          return undefined;
        }
        break;
      case 'index':
        index = parseUnsigned(key, value, line);
        break;
      case 'codec_name':
        codec = value.toLowerCase();
        break;
      case 'coded_height':
        if (value !== NOT_AVAILABLE) {
          const height = parseUnsigned(key, value, line);
          scanlineCount = height > 0 ? height : undefined;
        }
        break;
      case 'tag:language':
        if (value) language = value.slice(0, MAX_LANGUAGE_LENGTH);
        break;
      case 'tag:title':
        if (value) title = value;
        break;
      default:
        log.debug({ key, line }, 'Unrecognized stream key');
    }
  }

  if (index === undefined) throw new ParseError('index', line);
  if (!kind) throw new ParseError('codec_type', line);
  if (!codec) throw new ParseError('codec_name', line);

  const track: Track = {
    index,
    kind,
    codec,
    ...(scanlineCount !== undefined && { scanlineCount }),
    ...(language !== undefined && { language }),
    ...(title !== undefined && { title }),
  };
  return track;
}

/**
 * Parse the complete compact output of one probe.
 * 
 * @throws ParseError when a stream lacks `index`, `codec_type` or `codec_name`,
 * or a numeric field cannot be read
 */
export function parseProbeOutput(output: string): ProbeResult {
  const tracks: Track[] = [];
  const seen = new Set<number>();
  const facts: FormatFacts = { duration: 0, bitrate: 0 };

  for (const rawLine of output.split('\n')) {
    const line = rawLine.replace(/\r$/, '');
    if (!line.trim()) continue;

    const record = parseProbeRecord(line);
    switch (record.kind) {
      case 'format':
        applyFormatRecord(record, line, facts);
        break;
      case 'stream': {
        const track = parseStreamRecord(record, line);
        if (!track) break;
        if (seen.has(track.index)) {
          throw new ParseError('index', line, `Duplicate stream index ${track.index} in probe line: ${line}`);
        }
        seen.add(track.index);
        tracks.push(track);
        break;
      }
      default:
        break;
    }
  }

  log.debug({ trackCount: tracks.length, duration: facts.duration }, 'Parsed probe output');

  return {
    tracks,
    duration: facts.duration,
    bitrate: facts.bitrate,
    ...(facts.title !== undefined && { title: facts.title }),
  };
}
