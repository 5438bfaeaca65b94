import { readFileSync } from 'node:fs';
import { z } from 'zod';

const LanguageEntrySchema = z.object({
  name: z.string().min(1),
  clarification: z.string().min(1).optional(),
});

const LanguageCatalogSchema = z.record(LanguageEntrySchema);

export type LanguageEntry = z.infer<typeof LanguageEntrySchema>;

export interface Language extends LanguageEntry {
  code: string;
}

function loadCatalog(): ReadonlyMap<string, LanguageEntry> {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../data/languages.json', import.meta.url), 'utf8')
  );
  const entries = LanguageCatalogSchema.parse(raw);
  return new Map(Object.entries(entries).map(([code, entry]) => [code, Object.freeze(entry)]));
}

const catalog = loadCatalog();

/**
 * Display name for a language code, or the code itself when the catalog
 * does not know it.
 */
export function getLanguageName(code: string): string {
  return catalog.get(code)?.name ?? code;
}

/**
 * Script hint for languages models tend to mix up, formatted to be appended
 * directly after the display name: `" (한국어, using Hangul script, NOT Chinese)"`.
 * Empty when there is none.
 */
export function getLanguageClarification(code: string): string {
  const clarification = catalog.get(code)?.clarification;
  return clarification ? ` (${clarification})` : '';
}

export function isKnownLanguage(code: string): boolean {
  return catalog.has(code);
}

export function listLanguages(): Language[] {
  return Array.from(catalog, ([code, entry]) => ({ code, ...entry }));
}
