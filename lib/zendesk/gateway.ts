/**
 * Help Center gateway: the read/write surface the migration and
 * deletion engines run against, one instance per tenant.
 */

import { TenantConfig } from './config';
import { HelpCenterHttpClient, HelpCenterHttpClientOptions } from './http/client';
import { createRetryConfig } from './http/retry';
import { logger } from './logging';
import { listCategories, createCategory, deleteCategory } from './resources/categories';
import { listSections, createSection } from './resources/sections';
import { listArticles, createArticle } from './resources/articles';
import { listTranslations, createTranslation } from './resources/translations';
import { listPermissionGroups } from './resources/permission-groups';
import { getLocales } from './resources/locales';
import {
  Article,
  ArticlePayload,
  Category,
  CategoryPayload,
  HelpCenterLocales,
  PermissionGroup,
  Section,
  SectionPayload,
  Translation,
  TranslationPayload,
} from './types';

export interface HelpCenterGateway {
  /** Host label used in logs and prompts */
  readonly label: string;

  listCategories(): Promise<Category[]>;
  listSections(): Promise<Section[]>;
  listArticles(): Promise<Article[]>;
  listPermissionGroups(): Promise<PermissionGroup[]>;
  listLocales(): Promise<HelpCenterLocales>;

  getCategoryTranslations(categoryId: number): Promise<Translation[]>;
  getSectionTranslations(sectionId: number): Promise<Translation[]>;
  getArticleTranslations(articleId: number): Promise<Translation[]>;

  createCategory(payload: CategoryPayload): Promise<Category>;
  createSection(payload: SectionPayload): Promise<Section>;
  createArticle(sectionId: number, payload: ArticlePayload): Promise<Article>;

  createCategoryTranslation(categoryId: number, payload: TranslationPayload): Promise<Translation>;
  createSectionTranslation(sectionId: number, payload: TranslationPayload): Promise<Translation>;
  createArticleTranslation(articleId: number, payload: TranslationPayload): Promise<Translation>;

  deleteCategory(categoryId: number): Promise<void>;

  /** Lightweight reachability check; never throws */
  testConnection(): Promise<boolean>;
}

/**
 * Gateway backed by the Zendesk Help Center REST API
 */
export class ZendeskHelpCenter implements HelpCenterGateway {
  readonly label: string;

  constructor(private readonly client: HelpCenterHttpClient, label?: string) {
    this.label = label ?? new URL(client.apiBase).host;
  }

  listCategories(): Promise<Category[]> {
    return listCategories(this.client);
  }

  listSections(): Promise<Section[]> {
    return listSections(this.client);
  }

  listArticles(): Promise<Article[]> {
    return listArticles(this.client);
  }

  listPermissionGroups(): Promise<PermissionGroup[]> {
    return listPermissionGroups(this.client);
  }

  listLocales(): Promise<HelpCenterLocales> {
    return getLocales(this.client);
  }

  getCategoryTranslations(categoryId: number): Promise<Translation[]> {
    return listTranslations(this.client, 'categories', categoryId);
  }

  getSectionTranslations(sectionId: number): Promise<Translation[]> {
    return listTranslations(this.client, 'sections', sectionId);
  }

  getArticleTranslations(articleId: number): Promise<Translation[]> {
    return listTranslations(this.client, 'articles', articleId);
  }

  createCategory(payload: CategoryPayload): Promise<Category> {
    return createCategory(this.client, payload);
  }

  createSection(payload: SectionPayload): Promise<Section> {
    return createSection(this.client, payload);
  }

  createArticle(sectionId: number, payload: ArticlePayload): Promise<Article> {
    return createArticle(this.client, sectionId, payload);
  }

  createCategoryTranslation(categoryId: number, payload: TranslationPayload): Promise<Translation> {
    return createTranslation(this.client, 'categories', categoryId, payload);
  }

  createSectionTranslation(sectionId: number, payload: TranslationPayload): Promise<Translation> {
    return createTranslation(this.client, 'sections', sectionId, payload);
  }

  createArticleTranslation(articleId: number, payload: TranslationPayload): Promise<Translation> {
    return createTranslation(this.client, 'articles', articleId, payload);
  }

  deleteCategory(categoryId: number): Promise<void> {
    return deleteCategory(this.client, categoryId);
  }

  async testConnection(): Promise<boolean> {
    try {
      // Single attempt so bad credentials fail fast
      await this.client.get('/help_center/categories.json?per_page=1', {
        retryConfig: createRetryConfig({ maxAttempts: 1 }),
      });
      return true;
    } catch (error) {
      logger.warn('Connection test failed', {
        host: this.label,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}

/**
 * Build a gateway for a tenant
 */
export function createHelpCenterGateway(
  config: TenantConfig,
  options?: HelpCenterHttpClientOptions
): HelpCenterGateway {
  return new ZendeskHelpCenter(new HelpCenterHttpClient(config, options));
}
