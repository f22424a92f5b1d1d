/**
 * Language Labels
 * 
 * Human-readable names and player language codes for the ISO 639-2 tags
 * found in media files. The table is read once when the module loads.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const languageTableSchema = z.record(
  z.string().min(1),
  z.object({
    name: z.string().min(1),
    // ISO 639-1 code the player expects, when one exists
    code: z.string().min(2).optional(),
  })
);

export type LanguageTable = z.infer<typeof languageTableSchema>;

const LANGUAGE_TABLE_URL = new URL('../data/languages.json', import.meta.url);

export function loadLanguageTable(source: URL = LANGUAGE_TABLE_URL): LanguageTable {
  const raw: unknown = JSON.parse(readFileSync(source, 'utf-8'));
  return languageTableSchema.parse(raw);
}

const LANGUAGES: ReadonlyMap<string, LanguageTable[string]> = new Map(
  Object.entries(loadLanguageTable())
);

/**
 * Name for a language code, or the code itself if it is not in the table.
 */
export function languageName(code: string): string {
  return LANGUAGES.get(code)?.name ?? code;
}

/**
 * Code to declare in the manifest, or the code itself if it has no mapping.
 */
export function manifestLanguage(code: string): string {
  return LANGUAGES.get(code)?.code ?? code;
}

/**
 * `"<Name> (<title>)"`, or just `"<Name>"` without a title.
 */
export function buildLanguageLabel(code: string, title?: string): string {
  const name = languageName(code);
  return title ? `${name} (${title})` : name;
}
