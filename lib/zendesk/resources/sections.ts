/**
 * Section resource helpers
 * Endpoint: https://{subdomain}.zendesk.com/api/v2/help_center/sections
 */

import { HelpCenterHttpClient } from '../http/client';
import { Section, SectionPayload } from '../types';

/**
 * Get all sections across every category
 * GET /help_center/sections.json
 */
export async function listSections(client: HelpCenterHttpClient): Promise<Section[]> {
  return client.paginate<'sections', Section>('/help_center/sections.json?per_page=100', 'sections');
}

/**
 * Create a section inside the payload's category
 * POST /help_center/categories/{category_id}/sections.json
 */
export async function createSection(
  client: HelpCenterHttpClient,
  payload: SectionPayload
): Promise<Section> {
  return client.createRecord<'section', Section>(
    `/help_center/categories/${payload.category_id}/sections.json`,
    'section',
    payload
  );
}
