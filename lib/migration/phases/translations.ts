/**
 * Translation passes. Run after their level's node pass so every
 * parent already has a destination id.
 *
 * Each pass fetches all translations before announcing the phase, so the
 * announced total equals the number of items it reports.
 */

import { describeError, isClientRejection } from '../../zendesk/errors';
import { Translation, TranslationPayload } from '../../zendesk/types';
import { NodeLevel } from '../correspondence';
import { ensureBody, mapLocale } from '../locale-map';
import { MigrationPhase, PhaseStats } from '../types';
import { Outcome, PhaseContext, attempt, beginPhase } from './context';

interface TranslationAccess {
  fetchSource(sourceId: number): Promise<Translation[]>;
  fetchDestination(destinationId: number): Promise<Translation[]>;
  create(destinationId: number, payload: TranslationPayload): Promise<Translation>;
}

function nodeTranslationAccess(ctx: PhaseContext, level: 'categories' | 'sections'): TranslationAccess {
  if (level === 'categories') {
    return {
      fetchSource: id => ctx.source.getCategoryTranslations(id),
      fetchDestination: id => ctx.destination.getCategoryTranslations(id),
      create: (id, payload) => ctx.destination.createCategoryTranslation(id, payload),
    };
  }
  return {
    fetchSource: id => ctx.source.getSectionTranslations(id),
    fetchDestination: id => ctx.destination.getSectionTranslations(id),
    create: (id, payload) => ctx.destination.createSectionTranslation(id, payload),
  };
}

/**
 * Translations fetched for one correspondence pair. A failed fetch
 * stands for a single item.
 */
interface PairWork {
  sourceId: number;
  destinationId: number;
  candidates: Outcome<{ translations: Translation[]; present: Set<string> }>;
}

function countItems(work: PairWork[]): number {
  return work.reduce((sum, pair) => sum + (pair.candidates.ok ? pair.candidates.value.translations.length : 1), 0);
}

/**
 * Copy category or section translations whose mapped locale the
 * destination node does not have yet. Failures are logged and counted
 * as skipped.
 */
export async function migrateNodeTranslations(
  ctx: PhaseContext,
  phase: MigrationPhase,
  level: Extract<NodeLevel, 'categories' | 'sections'>
): Promise<PhaseStats> {
  const access = nodeTranslationAccess(ctx, level);
  const work: PairWork[] = [];

  for (const [sourceId, destinationId] of ctx.table.pairs(level)) {
    const sourceTranslations = await attempt(() => access.fetchSource(sourceId));
    if (!sourceTranslations.ok) {
      ctx.log('warn', 'Could not fetch source translations', {
        level,
        sourceId,
        error: describeError(sourceTranslations.error),
      });
      work.push({ sourceId, destinationId, candidates: sourceTranslations });
      continue;
    }

    const destinationTranslations = await attempt(() => access.fetchDestination(destinationId));
    if (!destinationTranslations.ok) {
      ctx.log('warn', 'Could not fetch destination translations', {
        level,
        destinationId,
        error: describeError(destinationTranslations.error),
      });
      work.push({ sourceId, destinationId, candidates: destinationTranslations });
      continue;
    }

    work.push({
      sourceId,
      destinationId,
      candidates: {
        ok: true,
        value: {
          translations: sourceTranslations.value,
          present: new Set(destinationTranslations.value.map(t => t.locale)),
        },
      },
    });
  }

  const tally = beginPhase(ctx, phase, countItems(work));

  for (const { sourceId, destinationId, candidates } of work) {
    if (!candidates.ok) {
      tally.add({
        status: 'skipped',
        label: `${level}:${sourceId}`,
        reason: `translations unavailable: ${describeError(candidates.error)}`,
      });
      continue;
    }

    const { translations, present } = candidates.value;

    for (const translation of translations) {
      const locale = mapLocale(translation.locale, ctx.localeMap);
      const itemLabel = `${translation.title} [${locale}]`;

      if (present.has(locale)) {
        tally.add({ status: 'skipped', label: itemLabel, reason: 'translation already present' });
        continue;
      }

      const payload: TranslationPayload = {
        locale,
        title: translation.title,
        body: translation.body ?? '',
      };
      const outcome = await attempt(() => access.create(destinationId, payload));

      if (!outcome.ok) {
        ctx.log('warn', `Error copying translation '${translation.title}'`, {
          level,
          destinationId,
          locale,
          error: describeError(outcome.error),
        });
        tally.add({ status: 'skipped', label: itemLabel, reason: `create failed: ${describeError(outcome.error)}` });
        continue;
      }

      present.add(locale);
      tally.add({ status: 'created', label: itemLabel, destinationId });
    }
  }

  return tally.stats;
}

export interface ArticleTranslationResult {
  stats: PhaseStats;
  /** Locales the destination rejected with a client error */
  rejectedLocales: string[];
}

/**
 * Copy article translations, leaving out each article's primary-locale
 * translation (already carried by the article itself)
 */
export async function migrateArticleTranslations(ctx: PhaseContext): Promise<ArticleTranslationResult> {
  const pairs = ctx.table.pairs('articles');

  // Existing destination locales per destination article
  const existing = new Map<number, Set<string>>();
  for (const [, destinationId] of pairs) {
    const outcome = await attempt(() => ctx.destination.getArticleTranslations(destinationId));
    if (outcome.ok) {
      existing.set(destinationId, new Set(outcome.value.map(t => t.locale)));
    } else {
      ctx.log('warn', 'Could not fetch destination article translations, assuming none', {
        destinationId,
        error: describeError(outcome.error),
      });
      existing.set(destinationId, new Set());
    }
  }

  const work: PairWork[] = [];
  for (const [sourceId, destinationId] of pairs) {
    const sourceTranslations = await attempt(() => ctx.source.getArticleTranslations(sourceId));
    if (!sourceTranslations.ok) {
      ctx.log('warn', 'Could not fetch source article translations', {
        sourceId,
        error: describeError(sourceTranslations.error),
      });
      work.push({ sourceId, destinationId, candidates: sourceTranslations });
      continue;
    }

    const articleSourceLocale = ctx.articleSourceLocales.get(sourceId);
    const secondary = sourceTranslations.value.filter(
      translation => translation.locale !== (translation.source_locale ?? articleSourceLocale)
    );
    const present = existing.get(destinationId) ?? new Set<string>();
    existing.set(destinationId, present);
    work.push({ sourceId, destinationId, candidates: { ok: true, value: { translations: secondary, present } } });
  }

  const tally = beginPhase(ctx, 'article_translations', countItems(work));
  const failuresByLocale = new Map<string, unknown[]>();

  for (const { sourceId, destinationId, candidates } of work) {
    if (!candidates.ok) {
      tally.add({ status: 'failed', label: `articles:${sourceId}`, error: describeError(candidates.error) });
      continue;
    }

    const { translations, present } = candidates.value;

    for (const translation of translations) {
      const locale = mapLocale(translation.locale, ctx.localeMap);
      const itemLabel = `${translation.title} [${locale}]`;

      if (present.has(locale)) {
        tally.add({ status: 'skipped', label: itemLabel, reason: 'translation already present' });
        continue;
      }

      const payload: TranslationPayload = {
        locale,
        title: translation.title,
        body: ensureBody(translation.body),
      };
      const outcome = await attempt(() => ctx.destination.createArticleTranslation(destinationId, payload));

      if (!outcome.ok) {
        const errors = failuresByLocale.get(locale) ?? [];
        errors.push(outcome.error);
        failuresByLocale.set(locale, errors);

        ctx.log(isClientRejection(outcome.error) ? 'debug' : 'warn', 'Article translation failed', {
          destinationId,
          locale,
          error: describeError(outcome.error),
        });
        tally.add({ status: 'failed', label: itemLabel, error: describeError(outcome.error) });
        continue;
      }

      present.add(locale);
      tally.add({ status: 'created', label: itemLabel, destinationId });
    }
  }

  const rejectedLocales = [...failuresByLocale.entries()]
    .filter(([, errors]) => errors.some(isClientRejection))
    .map(([locale]) => locale);

  if (rejectedLocales.length > 0) {
    ctx.log(
      'warn',
      `The destination rejected article translations for locale(s): ${rejectedLocales.join(', ')}. ` +
        'Enable these locales in the destination Help Center language settings and run the copy again.',
      {
        rejectedLocales,
        failures: Object.fromEntries(rejectedLocales.map(l => [l, failuresByLocale.get(l)?.length ?? 0])),
      }
    );
  }

  return { stats: tally.stats, rejectedLocales };
}
