/**
 * Tests for locale mapping and body helpers
 */

import { describe, it, expect } from '@jest/globals';
import {
  DEFAULT_LOCALE,
  PLACEHOLDER_BODY,
  ensureBody,
  mapLocale,
  parseLocaleMap,
} from '../../lib/migration/locale-map';
import { HelpCenterConfigError } from '../../lib/zendesk/errors';

describe('mapLocale', () => {
  it('should substitute mapped locales', () => {
    expect(mapLocale('de', { de: 'de-ch' })).toBe('de-ch');
  });

  it('should pass unmapped locales through', () => {
    expect(mapLocale('fr', { de: 'de-ch' })).toBe('fr');
    expect(mapLocale('fr')).toBe('fr');
  });

  it('should default a missing locale to en-us before mapping', () => {
    expect(mapLocale(undefined)).toBe(DEFAULT_LOCALE);
    expect(mapLocale(null, {})).toBe('en-us');
    expect(mapLocale('', { 'en-us': 'en-gb' })).toBe('en-gb');
  });

  it('should not resolve inherited object keys', () => {
    expect(mapLocale('constructor', {})).toBe('constructor');
  });
});

describe('ensureBody', () => {
  it('should replace empty bodies with the placeholder', () => {
    expect(ensureBody('')).toBe(PLACEHOLDER_BODY);
    expect(ensureBody(null)).toBe(PLACEHOLDER_BODY);
    expect(ensureBody(undefined)).toBe(PLACEHOLDER_BODY);
    expect(ensureBody(' \n\t ')).toBe(PLACEHOLDER_BODY);
  });

  it('should keep non-empty bodies unchanged', () => {
    expect(ensureBody('<p>Hi</p>')).toBe('<p>Hi</p>');
    expect(ensureBody(' x ')).toBe(' x ');
  });
});

describe('parseLocaleMap', () => {
  it('should return an empty map for blank input', () => {
    expect(parseLocaleMap(undefined)).toEqual({});
    expect(parseLocaleMap('   ')).toEqual({});
  });

  it('should parse JSON objects', () => {
    expect(parseLocaleMap('{"de":"de-ch","FR":"fr-CH"}')).toEqual({ de: 'de-ch', fr: 'fr-ch' });
  });

  it('should parse comma-separated pairs', () => {
    expect(parseLocaleMap('de:de-ch, fr:fr-ch,')).toEqual({ de: 'de-ch', fr: 'fr-ch' });
  });

  it('should reject malformed JSON', () => {
    expect(() => parseLocaleMap('{"de":')).toThrow(HelpCenterConfigError);
  });

  it('should reject JSON that is not an object of strings', () => {
    expect(() => parseLocaleMap('{"de":1}')).toThrow('Locale map value for "de" must be a string');
  });

  it('should reject pairs without a separator', () => {
    expect(() => parseLocaleMap('de-ch')).toThrow('Locale map entry "de-ch" must look like from:to');
  });

  it('should reject values that are not locales', () => {
    expect(() => parseLocaleMap('de:not a locale')).toThrow(HelpCenterConfigError);
  });
});
