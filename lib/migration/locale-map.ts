/**
 * Locale substitution and body helpers applied to every destination write
 */

import { HelpCenterConfigError } from '../zendesk/errors';
import { LocaleMap } from './types';

export const DEFAULT_LOCALE = 'en-us';

/** Written in place of a blank article or article-translation body */
export const PLACEHOLDER_BODY = '<p>&nbsp;</p>';

/**
 * Map a source locale onto the destination; unmapped locales pass through.
 * A missing locale falls back to `en-us` before mapping.
 */
export function mapLocale(locale: string | null | undefined, localeMap: LocaleMap = {}): string {
  const source = locale || DEFAULT_LOCALE;
  return Object.prototype.hasOwnProperty.call(localeMap, source) ? localeMap[source] : source;
}

/**
 * Replace an empty or whitespace-only body with the placeholder
 */
export function ensureBody(body: string | null | undefined): string {
  if (!body || !body.trim()) {
    return PLACEHOLDER_BODY;
  }
  return body;
}

const LOCALE_PATTERN = /^[a-z]{2,3}(-[a-z0-9]{2,8})*$/i;

function assertLocale(value: string, raw: string): string {
  const trimmed = value.trim();
  if (!LOCALE_PATTERN.test(trimmed)) {
    throw new HelpCenterConfigError(`Invalid locale "${value}" in locale map: ${raw}`);
  }
  return trimmed.toLowerCase();
}

/**
 * Parse a locale map from JSON (`{"de":"de-ch"}`) or comma-separated
 * `from:to` pairs (`de:de-ch,fr:fr-ch`). Locales are lower-cased.
 *
 * @throws {HelpCenterConfigError} On malformed input
 */
export function parseLocaleMap(raw: string | undefined): LocaleMap {
  if (!raw || !raw.trim()) {
    return {};
  }

  const trimmed = raw.trim();
  const map: Record<string, string> = {};

  if (trimmed.startsWith('{')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (error) {
      throw new HelpCenterConfigError(
        `Locale map is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new HelpCenterConfigError('Locale map JSON must be an object of locale pairs');
    }

    for (const [from, to] of Object.entries(parsed)) {
      if (typeof to !== 'string') {
        throw new HelpCenterConfigError(`Locale map value for "${from}" must be a string`);
      }
      map[assertLocale(from, raw)] = assertLocale(to, raw);
    }
    return map;
  }

  for (const entry of trimmed.split(',')) {
    if (!entry.trim()) continue;
    const parts = entry.split(':');
    if (parts.length !== 2) {
      throw new HelpCenterConfigError(`Locale map entry "${entry.trim()}" must look like from:to`);
    }
    map[assertLocale(parts[0], raw)] = assertLocale(parts[1], raw);
  }

  return map;
}
