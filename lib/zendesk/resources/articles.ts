/**
 * Article resource helpers
 * Endpoint: https://{subdomain}.zendesk.com/api/v2/help_center/articles
 */

import { HelpCenterHttpClient } from '../http/client';
import { Article, ArticlePayload } from '../types';

/**
 * Get all articles across every section
 * GET /help_center/articles.json
 */
export async function listArticles(client: HelpCenterHttpClient): Promise<Article[]> {
  return client.paginate<'articles', Article>('/help_center/articles.json?per_page=100', 'articles');
}

/**
 * Create an article in a section
 * POST /help_center/sections/{section_id}/articles.json
 *
 * @param sectionId - Destination section; selects the endpoint only
 */
export async function createArticle(
  client: HelpCenterHttpClient,
  sectionId: number,
  payload: ArticlePayload
): Promise<Article> {
  return client.createRecord<'article', Article>(
    `/help_center/sections/${sectionId}/articles.json`,
    'article',
    payload
  );
}
