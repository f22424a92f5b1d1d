import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '@remuxer/core';
import { loadConfig } from '../config/index.js';
import { parseLanguage, parseQualityMode, resolveRemuxSettings } from '../commands/remux.js';

const config = loadConfig({
  REMUX_URL_PREFIX: 'https://env.example.com/',
  REMUX_OUTPUT_DIR: '/env/out',
  REMUX_LANGUAGE: 'fre',
  REMUX_QUALITY_MODE: 'exact',
});

describe('parseQualityMode', () => {
  it('accepts known modes', () => {
    expect(parseQualityMode('strict')).toBe('strict');
  });

  it('rejects anything else', () => {
    expect(() => parseQualityMode('best')).toThrow(ConfigurationError);
    expect(() => parseQualityMode('best')).toThrow(
      'Invalid configuration for quality: expected one of exact, snap, strict, got "best"'
    );
  });
});

describe('parseLanguage', () => {
  it('accepts tags a probed track can carry', () => {
    expect(parseLanguage('eng')).toBe('eng');
    expect(parseLanguage('engl')).toBe('engl');
  });

  it('rejects tags no probed track can match', () => {
    expect(() => parseLanguage('english')).toThrow(ConfigurationError);
    expect(() => parseLanguage('english')).toThrow(
      'Invalid configuration for language: expected 1 to 4 characters, got "english"'
    );
    expect(() => parseLanguage('')).toThrow(ConfigurationError);
  });
});

describe('resolveRemuxSettings', () => {
  it('falls back to the environment', () => {
    expect(resolveRemuxSettings({}, config)).toEqual({
      outputDir: '/env/out',
      urlPrefix: 'https://env.example.com/',
      preferredLanguage: 'fre',
      qualityMode: 'exact',
      videoOnlySource: false,
      title: undefined,
      dryRun: false,
    });
  });

  it('validates the language flag', () => {
    expect(() => resolveRemuxSettings({ language: 'english' }, config)).toThrow(ConfigurationError);
  });

  it('lets flags override the environment', () => {
    expect(resolveRemuxSettings({
      output: './out',
      urlPrefix: '',
      language: 'eng',
      quality: 'snap',
      videoOnlySource: true,
      title: 'Pilot',
      dryRun: true,
    }, config)).toEqual({
      outputDir: './out',
      urlPrefix: '',
      preferredLanguage: 'eng',
      qualityMode: 'snap',
      videoOnlySource: true,
      title: 'Pilot',
      dryRun: true,
    });
  });
});
