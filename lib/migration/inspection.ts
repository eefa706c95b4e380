/**
 * Read-only summary of a Help Center: node counts, enabled locales and
 * the translations of the first node at each level. Used to check a
 * destination after a copy.
 */

import type { HelpCenterGateway } from '../zendesk/gateway';
import { describeError } from '../zendesk/errors';
import { HelpCenterLocales, Translation } from '../zendesk/types';
import { NodeLevel } from './correspondence';
import { logger } from './logging';

export interface TranslationSummary {
  locale: string;
  title: string;
  /** 'published', or the draft/hidden/outdated flags that apply */
  status: string;
}

export interface NodeSample {
  level: NodeLevel;
  id: number;
  name: string;
  translations: TranslationSummary[];
}

export interface HelpCenterInspection {
  host: string;
  counts: Record<NodeLevel, number>;
  /** null when the locale lookup failed */
  locales: HelpCenterLocales | null;
  samples: NodeSample[];
}

export function describeTranslationStatus(translation: Translation): string {
  const flags: string[] = [];
  if (translation.draft) flags.push('draft');
  if (translation.hidden) flags.push('hidden');
  if (translation.outdated) flags.push('outdated');
  return flags.length > 0 ? flags.join(', ') : 'published';
}

function summarize(translations: Translation[]): TranslationSummary[] {
  return translations.map(t => ({
    locale: t.locale,
    title: t.title,
    status: describeTranslationStatus(t),
  }));
}

export async function inspectHelpCenter(gateway: HelpCenterGateway): Promise<HelpCenterInspection> {
  const categories = await gateway.listCategories();
  const sections = await gateway.listSections();
  const articles = await gateway.listArticles();

  let locales: HelpCenterLocales | null = null;
  try {
    locales = await gateway.listLocales();
  } catch (error) {
    logger.warn('Could not list Help Center locales', {
      host: gateway.label,
      error: describeError(error),
    });
  }

  const samples: NodeSample[] = [];
  if (categories.length > 0) {
    const [first] = categories;
    samples.push({
      level: 'categories',
      id: first.id,
      name: first.name,
      translations: summarize(await gateway.getCategoryTranslations(first.id)),
    });
  }
  if (sections.length > 0) {
    const [first] = sections;
    samples.push({
      level: 'sections',
      id: first.id,
      name: first.name,
      translations: summarize(await gateway.getSectionTranslations(first.id)),
    });
  }
  if (articles.length > 0) {
    const [first] = articles;
    samples.push({
      level: 'articles',
      id: first.id,
      name: first.title,
      translations: summarize(await gateway.getArticleTranslations(first.id)),
    });
  }

  return {
    host: gateway.label,
    counts: {
      categories: categories.length,
      sections: sections.length,
      articles: articles.length,
    },
    locales,
    samples,
  };
}
