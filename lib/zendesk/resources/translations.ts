/**
 * Translation resource helpers, shared by categories, sections and articles
 * Endpoint: https://{subdomain}.zendesk.com/api/v2/help_center/{kind}/{id}/translations
 */

import { HelpCenterHttpClient } from '../http/client';
import { Translation, TranslationPayload } from '../types';

export type TranslatableKind = 'categories' | 'sections' | 'articles';

/**
 * Get every translation of a node
 * GET /help_center/{kind}/{id}/translations.json
 */
export async function listTranslations(
  client: HelpCenterHttpClient,
  kind: TranslatableKind,
  id: number
): Promise<Translation[]> {
  return client.paginate<'translations', Translation>(
    `/help_center/${kind}/${id}/translations.json`,
    'translations'
  );
}

/**
 * Add a translation to a node
 * POST /help_center/{kind}/{id}/translations.json
 */
export async function createTranslation(
  client: HelpCenterHttpClient,
  kind: TranslatableKind,
  id: number,
  payload: TranslationPayload
): Promise<Translation> {
  return client.createRecord<'translation', Translation>(
    `/help_center/${kind}/${id}/translations.json`,
    'translation',
    payload
  );
}
