import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { describe, expect, it } from 'vitest';
import { buildLanguageLabel, languageName, loadLanguageTable, manifestLanguage } from '../languages.js';

describe('languageName', () => {
  it('resolves bibliographic and terminology codes', () => {
    expect(languageName('eng')).toBe('English');
    expect(languageName('ger')).toBe('German');
    expect(languageName('deu')).toBe('German');
  });

  it('falls back to the code itself', () => {
    expect(languageName('qaa')).toBe('qaa');
    expect(languageName('unknown')).toBe('unknown');
  });
});

describe('manifestLanguage', () => {
  it('maps to the two-letter code', () => {
    expect(manifestLanguage('jpn')).toBe('ja');
    expect(manifestLanguage('fre')).toBe('fr');
  });

  it('keeps codes without a two-letter form', () => {
    expect(manifestLanguage('und')).toBe('und');
    expect(manifestLanguage('tlh')).toBe('tlh');
  });
});

describe('buildLanguageLabel', () => {
  it('appends the track title in parentheses', () => {
    expect(buildLanguageLabel('jpn', 'Commentary')).toBe('Japanese (Commentary)');
  });

  it('returns the name alone without a title', () => {
    expect(buildLanguageLabel('spa')).toBe('Spanish');
  });

  it('uses the raw code for unknown languages', () => {
    expect(buildLanguageLabel('xx', 'Director')).toBe('xx (Director)');
    expect(buildLanguageLabel('xx')).toBe('xx');
  });
});

describe('loadLanguageTable', () => {
  it('reads a table file', () => {
    const dir = mkdtempSync(join(tmpdir(), 'languages-'));
    const file = join(dir, 'languages.json');
    writeFileSync(file, JSON.stringify({ tlh: { name: 'Klingon' } }));

    expect(loadLanguageTable(pathToFileURL(file))).toEqual({ tlh: { name: 'Klingon' } });
  });

  it('rejects entries without a name', () => {
    const dir = mkdtempSync(join(tmpdir(), 'languages-'));
    const file = join(dir, 'languages.json');
    writeFileSync(file, JSON.stringify({ tlh: { code: 'tl' } }));

    expect(() => loadLanguageTable(pathToFileURL(file))).toThrow();
  });
});
