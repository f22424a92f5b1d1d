import { describe, expect, it } from 'vitest';
import { ParseError } from '@remuxer/core';
import { parseProbeOutput, parseProbeRecord, parseTrackKind, splitProbeLine } from '../probes/parser.js';

const SAMPLE = [
  'stream|index=0|codec_name=h264|codec_type=video|coded_height=1080',
  'stream|index=1|codec_name=aac|codec_type=audio|tag:language=eng|tag:title=Stereo',
  'stream|index=2|codec_name=ttf|codec_type=attachment|tag:title=font.ttf',
  'stream|index=3|codec_name=subrip|codec_type=subtitle|tag:language=jpn',
  'format|duration=1421.504000|bit_rate=4281337|tag:title=Episode 1',
  '',
].join('\n');

describe('splitProbeLine', () => {
  it('splits on unescaped pipes only', () => {
    expect(splitProbeLine('a|b\\|c|d')).toEqual(['a', 'b|c', 'd']);
  });

  it('unescapes backslashes and control characters', () => {
    expect(splitProbeLine('x|t=a\\\\b\\nc')).toEqual(['x', 't=a\\b\nc']);
  });
});

describe('parseProbeRecord', () => {
  it('splits tokens at the first equals sign', () => {
    expect(parseProbeRecord('format|tag:title=a=b|duration=1.5')).toEqual({
      kind: 'format',
      fields: [['tag:title', 'a=b'], ['duration', '1.5']],
    });
  });

  it('drops tokens without a value', () => {
    expect(parseProbeRecord('stream|index=0|garbage').fields).toEqual([['index', '0']]);
  });
});

describe('parseTrackKind', () => {
  it('accepts media kinds case-insensitively', () => {
    expect(parseTrackKind('Video')).toBe('video');
    expect(parseTrackKind('AUDIO')).toBe('audio');
    expect(parseTrackKind('subtitle')).toBe('subtitle');
  });

  it('rejects other stream kinds', () => {
    expect(parseTrackKind('data')).toBeUndefined();
    expect(parseTrackKind('attachment')).toBeUndefined();
  });
});

describe('parseProbeOutput', () => {
  it('parses tracks and container facts', () => {
    const result = parseProbeOutput(SAMPLE);

    expect(result.title).toBe('Episode 1');
    expect(result.duration).toBeCloseTo(1421.504);
    expect(result.bitrate).toBe(4281337);
    expect(result.tracks).toEqual([
      { index: 0, kind: 'video', codec: 'h264', scanlineCount: 1080 },
      { index: 1, kind: 'audio', codec: 'aac', language: 'eng', title: 'Stereo' },
      { index: 3, kind: 'subtitle', codec: 'subrip', language: 'jpn' },
    ]);
  });

  it('skips non-media streams even without a codec name', () => {
    const result = parseProbeOutput('stream|index=4|codec_type=data\n');
    expect(result.tracks).toEqual([]);
  });

  it('defaults duration and bitrate when not reported', () => {
    const result = parseProbeOutput('format|duration=N/A|bit_rate=N/A');
    expect(result).toEqual({ tracks: [], duration: 0, bitrate: 0 });
  });

  it('treats a zero or missing coded height as absent', () => {
    const result = parseProbeOutput([
      'stream|index=0|codec_name=mjpeg|codec_type=video|coded_height=0',
      'stream|index=1|codec_name=hevc|codec_type=video|coded_height=N/A',
    ].join('\n'));

    expect(result.tracks.map(track => track.scanlineCount)).toEqual([undefined, undefined]);
  });

  it('truncates language tags to four characters', () => {
    const result = parseProbeOutput('stream|index=1|codec_name=opus|codec_type=audio|tag:language=english');
    expect(result.tracks[0]?.language).toBe('engl');
  });

  it('keeps escaped pipes inside titles', () => {
    const result = parseProbeOutput('stream|index=2|codec_name=ass|codec_type=subtitle|tag:title=Signs \\| Songs');
    expect(result.tracks[0]?.title).toBe('Signs | Songs');
  });

  it('ignores unrecognized keys and other record kinds', () => {
    const result = parseProbeOutput([
      'program|program_id=1',
      'stream|index=0|codec_name=vp9|codec_type=video|coded_height=720|profile=Profile 0',
      'format|duration=10.000000|probe_score=100',
    ].join('\r\n'));

    expect(result.tracks).toEqual([{ index: 0, kind: 'video', codec: 'vp9', scanlineCount: 720 }]);
    expect(result.duration).toBe(10);
  });

  it('fails when a stream has no index', () => {
    const line = 'stream|codec_name=aac|codec_type=audio';
    expect(() => parseProbeOutput(line)).toThrow(ParseError);
    expect(() => parseProbeOutput(line)).toThrow(`Missing index in probe line: ${line}`);
  });

  it('fails when a stream has no codec name', () => {
    try {
      parseProbeOutput('stream|index=1|codec_type=audio');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      expect(error).toMatchObject({
        code: 'PARSE_ERROR',
        details: { field: 'codec_name', line: 'stream|index=1|codec_type=audio' },
      });
    }
  });

  it('fails when a stream has no codec type', () => {
    expect(() => parseProbeOutput('stream|index=1|codec_name=aac')).toThrow('Missing codec_type');
  });

  it('fails on malformed numbers', () => {
    expect(() => parseProbeOutput('format|bit_rate=fast')).toThrow('Invalid bit_rate "fast"');
    expect(() => parseProbeOutput('format|duration=-3')).toThrow('Invalid duration "-3"');
    expect(() => parseProbeOutput('stream|index=x|codec_name=aac|codec_type=audio')).toThrow('Invalid index "x"');
  });

  it('fails on duplicate stream indexes', () => {
    const output = [
      'stream|index=1|codec_name=aac|codec_type=audio',
      'stream|index=1|codec_name=opus|codec_type=audio',
    ].join('\n');
    expect(() => parseProbeOutput(output)).toThrow('Duplicate stream index 1');
  });
});
