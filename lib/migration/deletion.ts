/**
 * Bulk deletion of every top-level category in a Help Center.
 * Sections and articles are removed server-side with their category.
 * Confirmation is the caller's job.
 */

import type { HelpCenterGateway } from '../zendesk/gateway';
import { describeError } from '../zendesk/errors';
import { logger } from './logging';
import { DeletionResult } from './types';

export type DeletionItemResult =
  | { status: 'deleted'; name: string; categoryId: number }
  | { status: 'failed'; name: string; categoryId: number; error: string };

export interface DeletionObserver {
  onStart?(total: number): void;
  onItem?(result: DeletionItemResult): void;
}

export async function deleteAllCategories(
  gateway: HelpCenterGateway,
  observer: DeletionObserver = {}
): Promise<DeletionResult> {
  const categories = await gateway.listCategories();
  observer.onStart?.(categories.length);

  let deletedCount = 0;
  let failedCount = 0;

  for (const category of categories) {
    try {
      await gateway.deleteCategory(category.id);
      deletedCount++;
      observer.onItem?.({ status: 'deleted', name: category.name, categoryId: category.id });
    } catch (error) {
      failedCount++;
      logger.error(`Failed to delete category '${category.name}'`, {
        host: gateway.label,
        categoryId: category.id,
        error: describeError(error),
      });
      observer.onItem?.({
        status: 'failed',
        name: category.name,
        categoryId: category.id,
        error: describeError(error),
      });
    }
  }

  logger.info('Category deletion finished', {
    host: gateway.label,
    deletedCount,
    failedCount,
  });

  return { deletedCount, failedCount };
}
