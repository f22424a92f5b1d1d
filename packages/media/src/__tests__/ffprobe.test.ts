import { fileURLToPath } from 'node:url';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ProbeFailedError, ProbeUnavailableError } from '@remuxer/core';
import { executeCommand } from '@remuxer/utils';
import { FFProbe, buildProbeArgs } from '../probes/ffprobe.js';

vi.mock('@remuxer/utils', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@remuxer/utils')>();
  return { ...actual, executeCommand: vi.fn() };
});

const mockedExecute = vi.mocked(executeCommand);

// Any readable file will do; ffprobe itself is mocked
const EXISTING_FILE = fileURLToPath(import.meta.url);

function commandResult(exitCode: number, stdout = '', stderr = '') {
  return { exitCode, stdout, stderr, duration: 12, timedOut: false };
}

describe('buildProbeArgs', () => {
  it('asks for compact output with only the needed entries', () => {
    expect(buildProbeArgs('/media/in.mkv')).toEqual([
      '/media/in.mkv',
      '-of', 'compact',
      '-hide_banner',
      '-show_streams',
      '-show_format',
      '-show_entries',
      'stream_tags=title,language:stream=index,codec_type,codec_name,coded_height:stream_disposition=:format=duration,bit_rate:format_tags=title',
    ]);
  });
});

describe('FFProbe', () => {
  beforeEach(() => {
    mockedExecute.mockReset();
  });

  it('reports an unreadable file before running ffprobe', async () => {
    const probe = new FFProbe();

    await expect(probe.probe('/definitely/not/here.mkv')).rejects.toBeInstanceOf(ProbeUnavailableError);
    expect(mockedExecute).not.toHaveBeenCalled();
  });

  it('reports a non-zero exit as a probe failure', async () => {
    mockedExecute.mockResolvedValue(commandResult(1, '', 'Invalid data found when processing input'));
    const probe = new FFProbe('/opt/ffprobe');

    await expect(probe.probe(EXISTING_FILE)).rejects.toMatchObject({
      code: 'PROBE_FAILED',
      details: { exitCode: 1, stderr: 'Invalid data found when processing input' },
    });
  });

  it('reports a spawn failure as a probe failure', async () => {
    mockedExecute.mockRejectedValue(new Error('spawn ffprobe ENOENT'));

    await expect(new FFProbe().probe(EXISTING_FILE)).rejects.toBeInstanceOf(ProbeFailedError);
  });

  it('parses the output of a successful run', async () => {
    mockedExecute.mockResolvedValue(commandResult(0, [
      'stream|index=0|codec_name=vp9|codec_type=video|coded_height=720',
      'stream|index=1|codec_name=opus|codec_type=audio|tag:language=fre',
      'format|duration=12.500000|bit_rate=900000',
    ].join('\n')));

    const probe = new FFProbe('/opt/ffprobe', { timeout: 1000 });
    const result = await probe.probe(EXISTING_FILE);

    expect(mockedExecute).toHaveBeenCalledWith('/opt/ffprobe', buildProbeArgs(EXISTING_FILE), { timeout: 1000 });
    expect(result).toEqual({
      tracks: [
        { index: 0, kind: 'video', codec: 'vp9', scanlineCount: 720 },
        { index: 1, kind: 'audio', codec: 'opus', language: 'fre' },
      ],
      duration: 12.5,
      bitrate: 900000,
    });
  });

  it('checks availability with -version', async () => {
    mockedExecute.mockResolvedValueOnce(commandResult(0));
    mockedExecute.mockRejectedValueOnce(new Error('spawn ffprobe ENOENT'));
    const probe = new FFProbe();

    await expect(probe.isAvailable()).resolves.toBe(true);
    await expect(probe.isAvailable()).resolves.toBe(false);
    expect(mockedExecute).toHaveBeenCalledWith('ffprobe', ['-version'], { timeout: 5000 });
  });
});
