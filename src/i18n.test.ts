import { describe, expect, it } from 'vitest';
import { catalogMismatch, LANGS, messageKeys, parseLanguageChoice, t } from './i18n.js';

describe('i18n', () => {
  it('interpolates named placeholders', () => {
    expect(t('en', 'plot_not_found', { plot_no: '99' })).toBe(
      'Plot *99* was not found in this village. Please check the number and try again.'
    );
    expect(t('en', 'error_generic', { error: 'boom' })).toBe('❌ Something went wrong: boom');
  });

  it('leaves unknown placeholders as they are', () => {
    expect(t('en', 'error_generic')).toBe('❌ Something went wrong: {error}');
  });

  it('throws on an unknown key', () => {
    expect(() => t('en', 'no_such_key')).toThrow('[i18n] unknown message key "no_such_key"');
  });

  it('ships every key in every language', () => {
    const keys = messageKeys();
    expect(keys.length).toBeGreaterThan(50);
    for (const lang of LANGS) {
      for (const key of keys) expect(t(lang, key).length).toBeGreaterThan(0);
    }
  });

  it('reports missing and extra keys between catalogs', () => {
    expect(catalogMismatch({ a: '1', b: '2' }, { b: '2', c: '3' })).toEqual({ missing: ['a'], extra: ['c'] });
  });

  it('maps menu numbers to languages', () => {
    expect(parseLanguageChoice('1')).toBe('en');
    expect(parseLanguageChoice('2')).toBe('hi');
    expect(parseLanguageChoice('3')).toBe('mr');
    expect(parseLanguageChoice('4')).toBeUndefined();
    expect(parseLanguageChoice('english')).toBeUndefined();
  });
});
