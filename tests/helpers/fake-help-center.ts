/**
 * In-memory Help Center used as a stand-in for the Zendesk API in tests
 */

import type { HelpCenterGateway } from '../../lib/zendesk/gateway';
import { HelpCenterApiError } from '../../lib/zendesk/errors';
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
} from '../../lib/zendesk/types';

type Kind = 'categories' | 'sections' | 'articles';

/**
 * Hooks that make an operation throw; return an error to fail the call
 */
export interface FakeFailures {
  createCategory?: (payload: CategoryPayload) => Error | undefined;
  createSection?: (payload: SectionPayload) => Error | undefined;
  createArticle?: (sectionId: number, payload: ArticlePayload) => Error | undefined;
  createTranslation?: (kind: Kind, id: number, payload: TranslationPayload) => Error | undefined;
  getTranslations?: (kind: Kind, id: number) => Error | undefined;
  listPermissionGroups?: () => Error | undefined;
  listLocales?: () => Error | undefined;
  deleteCategory?: (id: number) => Error | undefined;
}

export interface RecordedTranslation {
  kind: Kind;
  id: number;
  payload: TranslationPayload;
}

export function clientError(status: number, message = 'Invalid locale'): HelpCenterApiError {
  return new HelpCenterApiError(
    message,
    status,
    'RecordInvalid',
    undefined,
    { headers: {}, body: { error: 'RecordInvalid', description: message } },
    JSON.stringify({ error: 'RecordInvalid', description: message })
  );
}

export class FakeHelpCenter implements HelpCenterGateway {
  categories: Category[] = [];
  sections: Section[] = [];
  articles: Article[] = [];
  permissionGroups: PermissionGroup[] = [{ id: 42, name: 'Admins' }];
  locales: HelpCenterLocales = { locales: ['en-us'], default_locale: 'en-us' };
  failures: FakeFailures = {};

  readonly created: {
    categories: CategoryPayload[];
    sections: SectionPayload[];
    articles: Array<{ sectionId: number; payload: ArticlePayload }>;
    translations: RecordedTranslation[];
  } = { categories: [], sections: [], articles: [], translations: [] };
  readonly deleted: number[] = [];

  private readonly translations: Record<Kind, Map<number, Translation[]>> = {
    categories: new Map(),
    sections: new Map(),
    articles: new Map(),
  };

  constructor(
    readonly label: string,
    private nextId = 1000
  ) {}

  addCategory(category: Category): this {
    this.categories.push(category);
    return this;
  }

  addSection(section: Section): this {
    this.sections.push(section);
    return this;
  }

  addArticle(article: Article): this {
    this.articles.push(article);
    return this;
  }

  addTranslation(kind: Kind, id: number, translation: Translation): this {
    const list = this.translations[kind].get(id) ?? [];
    list.push(translation);
    this.translations[kind].set(id, list);
    return this;
  }

  translationsOf(kind: Kind, id: number): Translation[] {
    return this.translations[kind].get(id) ?? [];
  }

  async listCategories(): Promise<Category[]> {
    return [...this.categories];
  }

  async listSections(): Promise<Section[]> {
    return [...this.sections];
  }

  async listArticles(): Promise<Article[]> {
    return [...this.articles];
  }

  async listPermissionGroups(): Promise<PermissionGroup[]> {
    const error = this.failures.listPermissionGroups?.();
    if (error) throw error;
    return [...this.permissionGroups];
  }

  async listLocales(): Promise<HelpCenterLocales> {
    const error = this.failures.listLocales?.();
    if (error) throw error;
    return this.locales;
  }

  getCategoryTranslations(id: number): Promise<Translation[]> {
    return this.getTranslations('categories', id);
  }

  getSectionTranslations(id: number): Promise<Translation[]> {
    return this.getTranslations('sections', id);
  }

  getArticleTranslations(id: number): Promise<Translation[]> {
    return this.getTranslations('articles', id);
  }

  async createCategory(payload: CategoryPayload): Promise<Category> {
    const error = this.failures.createCategory?.(payload);
    if (error) throw error;
    this.created.categories.push(payload);
    const category: Category = { id: this.nextId++, ...payload, source_locale: payload.locale };
    this.categories.push(category);
    this.addTranslation('categories', category.id, {
      locale: payload.locale,
      title: payload.name,
      body: payload.description,
      source_locale: payload.locale,
    });
    return category;
  }

  async createSection(payload: SectionPayload): Promise<Section> {
    const error = this.failures.createSection?.(payload);
    if (error) throw error;
    this.created.sections.push(payload);
    const section: Section = { id: this.nextId++, ...payload, source_locale: payload.locale };
    this.sections.push(section);
    this.addTranslation('sections', section.id, {
      locale: payload.locale,
      title: payload.name,
      body: payload.description,
      source_locale: payload.locale,
    });
    return section;
  }

  async createArticle(sectionId: number, payload: ArticlePayload): Promise<Article> {
    const error = this.failures.createArticle?.(sectionId, payload);
    if (error) throw error;
    this.created.articles.push({ sectionId, payload });
    const article: Article = {
      id: this.nextId++,
      title: payload.title,
      body: payload.body,
      locale: payload.locale,
      source_locale: payload.locale,
      section_id: sectionId,
      permission_group_id: payload.permission_group_id,
      user_segment_id: payload.user_segment_id,
    };
    this.articles.push(article);
    this.addTranslation('articles', article.id, {
      locale: payload.locale,
      title: payload.title,
      body: payload.body,
      source_locale: payload.locale,
    });
    return article;
  }

  createCategoryTranslation(id: number, payload: TranslationPayload): Promise<Translation> {
    return this.createTranslation('categories', id, payload);
  }

  createSectionTranslation(id: number, payload: TranslationPayload): Promise<Translation> {
    return this.createTranslation('sections', id, payload);
  }

  createArticleTranslation(id: number, payload: TranslationPayload): Promise<Translation> {
    return this.createTranslation('articles', id, payload);
  }

  async deleteCategory(id: number): Promise<void> {
    const error = this.failures.deleteCategory?.(id);
    if (error) throw error;
    this.deleted.push(id);
    this.categories = this.categories.filter(c => c.id !== id);
  }

  async testConnection(): Promise<boolean> {
    return true;
  }

  private async getTranslations(kind: Kind, id: number): Promise<Translation[]> {
    const error = this.failures.getTranslations?.(kind, id);
    if (error) throw error;
    return [...this.translationsOf(kind, id)];
  }

  private async createTranslation(kind: Kind, id: number, payload: TranslationPayload): Promise<Translation> {
    const error = this.failures.createTranslation?.(kind, id, payload);
    if (error) throw error;
    this.created.translations.push({ kind, id, payload });
    const translation: Translation = { ...payload };
    this.addTranslation(kind, id, translation);
    return translation;
  }
}
