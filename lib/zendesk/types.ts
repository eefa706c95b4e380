/**
 * Shared type definitions for Zendesk Help Center resources
 * Only the fields the migration reads are modelled; records carry more.
 */

/**
 * Help Center category
 */
export interface Category {
  id: number;
  name: string;
  description?: string | null;
  locale?: string;
  source_locale?: string;
  position?: number;
}

/**
 * Help Center section, owned by one category
 */
export interface Section {
  id: number;
  name: string;
  description?: string | null;
  locale?: string;
  source_locale?: string;
  position?: number;
  category_id: number;
}

/**
 * Help Center article, owned by one section
 */
export interface Article {
  id: number;
  title: string;
  body?: string | null;
  locale?: string;
  source_locale?: string;
  position?: number;
  section_id: number;
  draft?: boolean;
  promoted?: boolean;
  permission_group_id?: number | null;
  user_segment_id?: number | null;
}

/**
 * Per-locale translation of a category, section or article
 */
export interface Translation {
  id?: number;
  locale: string;
  title: string;
  body?: string | null;
  draft?: boolean;
  hidden?: boolean;
  outdated?: boolean;
  source_locale?: string;
}

/**
 * Guide permission group
 */
export interface PermissionGroup {
  id: number;
  name?: string;
}

/**
 * Locales enabled in a Help Center
 */
export interface HelpCenterLocales {
  locales: string[];
  default_locale?: string;
}

export interface CategoryPayload {
  name: string;
  description: string;
  locale: string;
  position: number;
}

export interface SectionPayload {
  name: string;
  description: string;
  locale: string;
  position: number;
  category_id: number;
}

/**
 * Article creation body. The target section is passed separately
 * because it only selects the endpoint.
 */
export interface ArticlePayload {
  title: string;
  body: string;
  locale: string;
  permission_group_id: number;
  user_segment_id: number | null;
  draft?: boolean;
  promoted?: boolean;
  position?: number;
}

export interface TranslationPayload {
  locale: string;
  title: string;
  body: string;
}

/**
 * One page of a paginated list response, records under `K`
 */
export type ListPage<K extends string, T> = {
  [P in K]?: T[];
} & {
  next_page?: string | null;
};
