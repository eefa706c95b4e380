/**
 * Category resource helpers
 * Endpoint: https://{subdomain}.zendesk.com/api/v2/help_center/categories
 */

import { HelpCenterHttpClient } from '../http/client';
import { Category, CategoryPayload } from '../types';

/**
 * Get all categories, all pages
 * GET /help_center/categories.json
 */
export async function listCategories(client: HelpCenterHttpClient): Promise<Category[]> {
  return client.paginate<'categories', Category>('/help_center/categories.json?per_page=100', 'categories');
}

/**
 * Create a category
 * POST /help_center/categories.json
 */
export async function createCategory(
  client: HelpCenterHttpClient,
  payload: CategoryPayload
): Promise<Category> {
  return client.createRecord<'category', Category>('/help_center/categories.json', 'category', payload);
}

/**
 * Delete a category. Its sections and articles are removed with it.
 * DELETE /help_center/categories/{category_id}.json
 */
export async function deleteCategory(client: HelpCenterHttpClient, categoryId: number): Promise<void> {
  await client.delete<void>(`/help_center/categories/${categoryId}.json`);
}
