/**
 * Category, section and article passes.
 * Each pass fully populates its level of the correspondence table
 * (create or match by name/title) before the next pass begins.
 */

import { describeError, getRawErrorBody } from '../../zendesk/errors';
import {
  Article,
  ArticlePayload,
  Category,
  CategoryPayload,
  Section,
  SectionPayload,
} from '../../zendesk/types';
import { ensureBody, mapLocale } from '../locale-map';
import { ArticleExtraField, LocaleMap, PhaseStats } from '../types';
import {
  PhaseContext,
  DestinationIndex,
  attempt,
  beginPhase,
  scopedKey,
} from './context';

export const DEFAULT_PERMISSION_GROUP_ID = 1;

export function buildCategoryPayload(category: Category, localeMap: LocaleMap): CategoryPayload {
  return {
    name: category.name,
    description: category.description ?? '',
    locale: mapLocale(category.locale, localeMap),
    position: category.position ?? 0,
  };
}

export function buildSectionPayload(
  section: Section,
  destinationCategoryId: number,
  localeMap: LocaleMap
): SectionPayload {
  return {
    name: section.name,
    description: section.description ?? '',
    locale: mapLocale(section.locale, localeMap),
    position: section.position ?? 0,
    category_id: destinationCategoryId,
  };
}

/**
 * Minimal article creation body. Source flags such as `draft` and
 * `promoted` are only copied when listed in `extraFields`.
 */
export function buildArticlePayload(
  article: Article,
  permissionGroupId: number,
  localeMap: LocaleMap,
  extraFields: readonly ArticleExtraField[] = []
): ArticlePayload {
  const payload: ArticlePayload = {
    title: article.title,
    body: ensureBody(article.body),
    locale: mapLocale(article.locale, localeMap),
    permission_group_id: permissionGroupId,
    user_segment_id: null,
  };

  for (const field of extraFields) {
    switch (field) {
      case 'draft':
        if (article.draft !== undefined) payload.draft = article.draft;
        break;
      case 'promoted':
        if (article.promoted !== undefined) payload.promoted = article.promoted;
        break;
      case 'position':
        if (article.position !== undefined) payload.position = article.position;
        break;
    }
  }

  return payload;
}

function warnOnCollision(
  ctx: PhaseContext,
  index: DestinationIndex,
  key: string,
  sourceId: number,
  destinationId: number
): void {
  const collision = index.claim(key, sourceId, destinationId);
  if (collision) {
    ctx.log('warn', 'Source nodes share a name and were merged into one destination node', {
      level: collision.level,
      key,
      sourceIds: collision.sourceIds,
      destinationId,
    });
  }
}

/**
 * Copy categories, matching existing destination categories by name
 */
export async function migrateCategories(ctx: PhaseContext): Promise<PhaseStats> {
  const sourceCategories = await ctx.source.listCategories();
  const destinationCategories = await ctx.destination.listCategories();

  const index = new DestinationIndex('categories', ctx.collisions);
  for (const category of destinationCategories) {
    index.add(category.name, category.id);
  }

  const tally = beginPhase(ctx, 'categories', sourceCategories.length);

  for (const category of sourceCategories) {
    const existingId = index.find(category.name);
    if (existingId !== undefined) {
      ctx.table.record('categories', category.id, existingId);
      warnOnCollision(ctx, index, category.name, category.id, existingId);
      tally.add({ status: 'matched', label: category.name, sourceId: category.id, destinationId: existingId });
      continue;
    }

    const payload = buildCategoryPayload(category, ctx.localeMap);
    const outcome = await attempt(() => ctx.destination.createCategory(payload));

    if (!outcome.ok) {
      ctx.log('error', `Error copying category '${category.name}'`, {
        categoryId: category.id,
        error: describeError(outcome.error),
      });
      tally.add({ status: 'failed', label: category.name, error: describeError(outcome.error) });
      continue;
    }

    const createdId = outcome.value.id;
    ctx.table.record('categories', category.id, createdId);
    index.add(category.name, createdId);
    warnOnCollision(ctx, index, category.name, category.id, createdId);
    tally.add({ status: 'created', label: category.name, sourceId: category.id, destinationId: createdId });
  }

  return tally.stats;
}

/**
 * Copy sections under their already-migrated categories.
 * Names are matched per destination category.
 */
export async function migrateSections(ctx: PhaseContext): Promise<PhaseStats> {
  const sourceSections = await ctx.source.listSections();
  const destinationSections = await ctx.destination.listSections();

  const index = new DestinationIndex('sections', ctx.collisions);
  for (const section of destinationSections) {
    index.add(scopedKey(section.category_id, section.name), section.id);
  }

  const tally = beginPhase(ctx, 'sections', sourceSections.length);

  for (const section of sourceSections) {
    const destinationCategoryId = ctx.table.resolve('categories', section.category_id);
    if (destinationCategoryId === undefined) {
      ctx.log('warn', `Skipping section '${section.name}' - category not found`, {
        sectionId: section.id,
        categoryId: section.category_id,
      });
      tally.add({ status: 'unresolved', label: section.name, reason: 'category not migrated' });
      continue;
    }

    const key = scopedKey(destinationCategoryId, section.name);
    const existingId = index.find(key);
    if (existingId !== undefined) {
      ctx.table.record('sections', section.id, existingId);
      warnOnCollision(ctx, index, key, section.id, existingId);
      tally.add({ status: 'matched', label: section.name, sourceId: section.id, destinationId: existingId });
      continue;
    }

    const payload = buildSectionPayload(section, destinationCategoryId, ctx.localeMap);
    const outcome = await attempt(() => ctx.destination.createSection(payload));

    if (!outcome.ok) {
      ctx.log('error', `Error copying section '${section.name}'`, {
        sectionId: section.id,
        error: describeError(outcome.error),
      });
      tally.add({ status: 'failed', label: section.name, error: describeError(outcome.error) });
      continue;
    }

    const createdId = outcome.value.id;
    ctx.table.record('sections', section.id, createdId);
    index.add(key, createdId);
    warnOnCollision(ctx, index, key, section.id, createdId);
    tally.add({ status: 'created', label: section.name, sourceId: section.id, destinationId: createdId });
  }

  return tally.stats;
}

/**
 * Pick the permission group stamped on new articles: the destination's
 * first group, or the fallback when the lookup fails or is empty.
 */
export async function resolvePermissionGroup(ctx: PhaseContext): Promise<number> {
  const outcome = await attempt(() => ctx.destination.listPermissionGroups());

  if (outcome.ok && outcome.value.length > 0) {
    return outcome.value[0].id;
  }

  ctx.log('warn', 'Could not resolve a destination permission group, using fallback', {
    fallbackPermissionGroupId: ctx.fallbackPermissionGroupId,
    error: outcome.ok ? 'no permission groups returned' : describeError(outcome.error),
  });
  return ctx.fallbackPermissionGroupId;
}

export interface ArticlePhaseResult {
  stats: PhaseStats;
  permissionGroupId: number;
}

/**
 * Copy articles into their already-migrated sections.
 * Titles are matched per destination section.
 */
export async function migrateArticles(ctx: PhaseContext): Promise<ArticlePhaseResult> {
  const permissionGroupId = await resolvePermissionGroup(ctx);
  const sourceArticles = await ctx.source.listArticles();
  const destinationArticles = await ctx.destination.listArticles();

  const index = new DestinationIndex('articles', ctx.collisions);
  for (const article of destinationArticles) {
    index.add(scopedKey(article.section_id, article.title), article.id);
  }

  const tally = beginPhase(ctx, 'articles', sourceArticles.length);
  let diagnosticsEmitted = false;

  for (const article of sourceArticles) {
    const destinationSectionId = ctx.table.resolve('sections', article.section_id);
    if (destinationSectionId === undefined) {
      ctx.log('warn', `Skipping article '${article.title}' - section not found`, {
        articleId: article.id,
        sectionId: article.section_id,
      });
      tally.add({ status: 'unresolved', label: article.title, reason: 'section not migrated' });
      continue;
    }

    const key = scopedKey(destinationSectionId, article.title);
    const existingId = index.find(key);
    if (existingId !== undefined) {
      ctx.table.record('articles', article.id, existingId);
      ctx.articleSourceLocales.set(article.id, article.source_locale);
      warnOnCollision(ctx, index, key, article.id, existingId);
      tally.add({ status: 'matched', label: article.title, sourceId: article.id, destinationId: existingId });
      continue;
    }

    const payload = buildArticlePayload(article, permissionGroupId, ctx.localeMap, ctx.articleExtraFields);
    const outcome = await attempt(() => ctx.destination.createArticle(destinationSectionId, payload));

    if (!outcome.ok) {
      if (!diagnosticsEmitted) {
        diagnosticsEmitted = true;
        ctx.log('error', `Error copying article '${article.title}'`, {
          articleId: article.id,
          title: article.title,
          originalPermissionGroupId: article.permission_group_id ?? null,
          sectionId: destinationSectionId,
          payload,
          error: describeError(outcome.error),
          rawErrorBody: getRawErrorBody(outcome.error) ?? null,
        });
      }
      tally.add({ status: 'failed', label: article.title, error: describeError(outcome.error) });
      continue;
    }

    const createdId = outcome.value.id;
    ctx.table.record('articles', article.id, createdId);
    ctx.articleSourceLocales.set(article.id, article.source_locale);
    index.add(key, createdId);
    warnOnCollision(ctx, index, key, article.id, createdId);
    tally.add({ status: 'created', label: article.title, sourceId: article.id, destinationId: createdId });
  }

  return { stats: tally.stats, permissionGroupId };
}
