/**
 * Help Center migration engine
 *
 * Runs six strictly sequential phases against a source and a destination
 * gateway:
 *
 *   categories → category translations → sections → section translations
 *   → articles → article translations
 *
 * Every run starts from an empty correspondence table and rediscovers
 * existing destination content by name/title, so re-running after an
 * interruption skips what is already there.
 */

import { randomUUID } from 'crypto';
import type { HelpCenterGateway } from '../zendesk/gateway';
import { CorrespondenceTable } from './correspondence';
import { logMigrationEvent } from './logging';
import { PhaseContext, emptyStats } from './phases/context';
import { migrateCategories, migrateSections, migrateArticles, DEFAULT_PERMISSION_GROUP_ID } from './phases/nodes';
import { migrateNodeTranslations, migrateArticleTranslations } from './phases/translations';
import {
  MigrationOptions,
  MigrationPhase,
  MigrationReport,
  PhaseStats,
} from './types';

export class HelpCenterMigrator {
  private readonly ctx: PhaseContext;

  constructor(
    source: HelpCenterGateway,
    destination: HelpCenterGateway,
    options: MigrationOptions = {}
  ) {
    const runId = options.runId ?? randomUUID();
    const observer = options.observer ?? {};

    this.ctx = {
      runId,
      source,
      destination,
      table: new CorrespondenceTable(),
      localeMap: options.localeMap ?? {},
      observer,
      articleExtraFields: options.articleExtraFields ?? [],
      fallbackPermissionGroupId: options.fallbackPermissionGroupId ?? DEFAULT_PERMISSION_GROUP_ID,
      collisions: [],
      articleSourceLocales: new Map(),
      log: (level, message, context) => {
        if (observer.log) {
          observer.log(level, message, context);
        } else {
          logMigrationEvent(runId, message, context, level);
        }
      },
    };
  }

  get correspondence(): CorrespondenceTable {
    return this.ctx.table;
  }

  /**
   * Execute all phases and return the run report.
   * Item failures are counted; listing failures propagate.
   */
  async run(): Promise<MigrationReport> {
    const { ctx } = this;
    const startedAt = new Date();

    const phases: Record<MigrationPhase, PhaseStats> = {
      categories: emptyStats(),
      category_translations: emptyStats(),
      sections: emptyStats(),
      section_translations: emptyStats(),
      articles: emptyStats(),
      article_translations: emptyStats(),
    };

    logMigrationEvent(ctx.runId, 'migration_started', {
      source: ctx.source.label,
      destination: ctx.destination.label,
      localeMap: ctx.localeMap,
    }, 'debug');

    const complete = (phase: MigrationPhase, stats: PhaseStats) => {
      phases[phase] = stats;
      ctx.observer.onPhaseComplete?.(phase, stats);
      logMigrationEvent(ctx.runId, 'phase_completed', { phase, ...stats }, 'debug');
    };

    complete('categories', await migrateCategories(ctx));
    complete('category_translations', await migrateNodeTranslations(ctx, 'category_translations', 'categories'));
    complete('sections', await migrateSections(ctx));
    complete('section_translations', await migrateNodeTranslations(ctx, 'section_translations', 'sections'));

    const articles = await migrateArticles(ctx);
    complete('articles', articles.stats);

    const articleTranslations = await migrateArticleTranslations(ctx);
    complete('article_translations', articleTranslations.stats);

    const completedAt = new Date();
    const report: MigrationReport = {
      runId: ctx.runId,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      source: ctx.source.label,
      destination: ctx.destination.label,
      phases,
      correspondence: ctx.table.toJSON(),
      collisions: ctx.collisions,
      rejectedLocales: articleTranslations.rejectedLocales,
      permissionGroupId: articles.permissionGroupId,
    };

    logMigrationEvent(ctx.runId, 'migration_completed', {
      durationMs: completedAt.getTime() - startedAt.getTime(),
      collisions: report.collisions.length,
      rejectedLocales: report.rejectedLocales,
    }, 'debug');

    return report;
  }
}

/**
 * Migrate all Help Center content from `source` to `destination`
 */
export function runMigration(
  source: HelpCenterGateway,
  destination: HelpCenterGateway,
  options: MigrationOptions = {}
): Promise<MigrationReport> {
  return new HelpCenterMigrator(source, destination, options).run();
}
