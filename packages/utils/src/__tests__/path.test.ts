import { describe, expect, it } from 'vitest';
import { getBasename } from '../path.js';

describe('getBasename', () => {
  it('strips directory and extension', () => {
    expect(getBasename('/media/incoming/Show.S01E01.mkv')).toBe('Show.S01E01');
    expect(getBasename('clip')).toBe('clip');
  });
});
