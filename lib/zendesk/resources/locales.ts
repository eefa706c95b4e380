/**
 * Help Center locale helpers
 */

import { HelpCenterHttpClient } from '../http/client';
import { HelpCenterLocales } from '../types';

/**
 * Locales enabled in the Help Center
 * GET /help_center/locales.json
 */
export async function getLocales(client: HelpCenterHttpClient): Promise<HelpCenterLocales> {
  const response = await client.get<Partial<HelpCenterLocales>>('/help_center/locales.json');
  return {
    locales: response.locales ?? [],
    default_locale: response.default_locale,
  };
}
