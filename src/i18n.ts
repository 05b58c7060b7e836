// src/i18n.ts
import { readFileSync } from 'node:fs';
import { z } from 'zod';

export const LANGS = ['en', 'hi', 'mr'] as const;
export type Lang = (typeof LANGS)[number];
export const DEFAULT_LANG: Lang = 'en';

export type Params = Record<string, string | number>;

const Catalog = z.record(z.string(), z.string());
type Dict = Record<Lang, Record<string, string>>;

function loadCatalog(lang: Lang): Record<string, string> {
  const file = new URL(`../locales/${lang}.json`, import.meta.url);
  return Catalog.parse(JSON.parse(readFileSync(file, 'utf8')));
}

/** Every catalog must carry exactly the English key set. */
export function catalogMismatch(
  base: Record<string, string>,
  other: Record<string, string>
): { missing: string[]; extra: string[] } {
  const missing = Object.keys(base).filter((k) => !(k in other));
  const extra = Object.keys(other).filter((k) => !(k in base));
  return { missing, extra };
}

function loadAll(): Dict {
  const dict: Dict = { en: loadCatalog('en'), hi: loadCatalog('hi'), mr: loadCatalog('mr') };
  for (const lang of LANGS) {
    const { missing, extra } = catalogMismatch(dict.en, dict[lang]);
    if (missing.length || extra.length) {
      throw new Error(
        `[i18n] catalog "${lang}" out of sync (missing: ${missing.join(', ') || '-'}; extra: ${extra.join(', ') || '-'})`
      );
    }
  }
  return dict;
}

const dict = loadAll();

export function messageKeys(): string[] {
  return Object.keys(dict.en);
}

function interpolate(template: string, params?: Params): string {
  if (!params) return template;
  return template.replace(/\{(\w+)\}/g, (_, k: string) => String(params[k] ?? `{${k}}`));
}

export function t(lang: Lang, key: string, params?: Params): string {
  const msg = dict[lang][key];
  if (msg === undefined) throw new Error(`[i18n] unknown message key "${key}"`);
  return interpolate(msg, params);
}

export function parseLanguageChoice(choice: string): Lang | undefined {
  if (choice === '1') return 'en';
  if (choice === '2') return 'hi';
  if (choice === '3') return 'mr';
  return undefined;
}
