/**
 * Migration engine types
 */

import type { LogLevel } from '../zendesk/logging';
import type { NodeLevel, CorrespondenceSnapshot } from './correspondence';

/**
 * Migration phases, in execution order
 */
export const MIGRATION_PHASES = [
  'categories',
  'category_translations',
  'sections',
  'section_translations',
  'articles',
  'article_translations',
] as const;

export type MigrationPhase = (typeof MIGRATION_PHASES)[number];

/**
 * Outcome of a single item within a phase
 */
export type ItemResult =
  | { status: 'created'; label: string; sourceId?: number; destinationId: number }
  | { status: 'matched'; label: string; sourceId: number; destinationId: number }
  | { status: 'skipped'; label: string; reason: string }
  | { status: 'unresolved'; label: string; reason: string }
  | { status: 'failed'; label: string; error: string };

/**
 * Per-phase counters
 */
export interface PhaseStats {
  /** Items that produced a result */
  processed: number;
  /** Newly written to the destination */
  created: number;
  /** Matched an existing destination node, or translation already present */
  skipped: number;
  /** Parent did not resolve; never submitted */
  unresolved: number;
  /** Write or read failed */
  failed: number;
}

/**
 * Extra article fields that may be forwarded on creation.
 * None are sent by default: the destination rejects unexpected fields.
 */
export type ArticleExtraField = 'draft' | 'promoted' | 'position';

/**
 * sourceLocale → destinationLocale substitutions
 */
export type LocaleMap = Readonly<Record<string, string>>;

/**
 * Two or more source nodes that resolved onto the same destination node
 * because they share a name/title under the same parent
 */
export interface NameCollision {
  level: NodeLevel;
  key: string;
  sourceIds: number[];
  destinationId: number;
}

/**
 * Progress and log sink supplied by the caller
 */
export interface MigrationObserver {
  onPhaseStart?(phase: MigrationPhase, total: number): void;
  onItem?(phase: MigrationPhase, result: ItemResult): void;
  onPhaseComplete?(phase: MigrationPhase, stats: PhaseStats): void;
  log?(level: LogLevel, message: string, context?: Record<string, unknown>): void;
}

export interface MigrationOptions {
  localeMap?: LocaleMap;
  observer?: MigrationObserver;
  /** Source article fields to forward on creation (default: none) */
  articleExtraFields?: ArticleExtraField[];
  /** Permission group used when the destination lookup fails (default: 1) */
  fallbackPermissionGroupId?: number;
  runId?: string;
}

export interface MigrationReport {
  runId: string;
  startedAt: string;
  completedAt: string;
  source: string;
  destination: string;
  phases: Record<MigrationPhase, PhaseStats>;
  correspondence: CorrespondenceSnapshot;
  collisions: NameCollision[];
  /** Destination locales that rejected article translations */
  rejectedLocales: string[];
  permissionGroupId?: number;
}

/**
 * Result of a bulk delete
 */
export interface DeletionResult {
  deletedCount: number;
  failedCount: number;
}
