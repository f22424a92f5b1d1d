import { beforeEach, describe, expect, it, vi } from 'vitest';
import { TranscodeFailedError } from '@remuxer/core';
import { executeCommand } from '@remuxer/utils';
import { FFmpeg } from '../ffmpeg.js';

vi.mock('@remuxer/utils', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@remuxer/utils')>();
  return { ...actual, executeCommand: vi.fn() };
});

const mockedExecute = vi.mocked(executeCommand);

function result(exitCode: number, stderr = '', timedOut = false) {
  return { exitCode, stdout: '', stderr, duration: 12, timedOut };
}

describe('FFmpeg', () => {
  beforeEach(() => {
    mockedExecute.mockReset();
  });

  it('overwrites outputs by default', async () => {
    mockedExecute.mockResolvedValue(result(0));
    const ffmpeg = new FFmpeg('/opt/ffmpeg', { timeout: 1000 });

    await ffmpeg.execute(['-i', 'in.mkv', 'out.mp4']);

    expect(mockedExecute).toHaveBeenCalledWith(
      '/opt/ffmpeg',
      ['-y', '-i', 'in.mkv', 'out.mp4'],
      { timeout: 1000 }
    );
  });

  it('leaves -y out when overwriting is disabled', async () => {
    mockedExecute.mockResolvedValue(result(0));

    await new FFmpeg().execute(['-i', 'in.mkv', 'out.mp4'], { overwrite: false, timeout: 50 });

    expect(mockedExecute).toHaveBeenCalledWith('ffmpeg', ['-i', 'in.mkv', 'out.mp4'], { timeout: 50 });
  });

  it('reports a non-zero exit', async () => {
    mockedExecute.mockResolvedValue(result(1, 'Unknown encoder'));

    const failure = new FFmpeg().execute(['-i', 'in.mkv', 'out.mp4']);

    await expect(failure).rejects.toBeInstanceOf(TranscodeFailedError);
    await expect(failure).rejects.toMatchObject({
      message: 'ffmpeg failed with exit code 1',
      code: 'TRANSCODE_FAILED',
      exitCode: 70,
      details: { command: 'ffmpeg -y -i in.mkv out.mp4', exitCode: 1, stderr: 'Unknown encoder', timedOut: false },
    });
  });

  it('reports a timeout', async () => {
    mockedExecute.mockResolvedValue(result(-1, '', true));

    await expect(new FFmpeg().execute(['-i', 'in.mkv', 'out.mp4'])).rejects.toMatchObject({
      message: 'ffmpeg timed out',
    });
  });

  it('reports a spawn failure', async () => {
    mockedExecute.mockRejectedValue(new Error('spawn ffmpeg ENOENT'));

    await expect(new FFmpeg().execute(['-version'])).rejects.toMatchObject({
      details: { exitCode: 127, stderr: 'spawn ffmpeg ENOENT' },
    });
  });

  it('checks availability', async () => {
    mockedExecute.mockResolvedValueOnce(result(0));
    mockedExecute.mockRejectedValueOnce(new Error('spawn ffmpeg ENOENT'));
    const ffmpeg = new FFmpeg();

    await expect(ffmpeg.isAvailable()).resolves.toBe(true);
    await expect(ffmpeg.isAvailable()).resolves.toBe(false);
  });
});
