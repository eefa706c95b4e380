/**
 * Shared state and helpers for the migration phases
 */

import type { HelpCenterGateway } from '../../zendesk/gateway';
import type { LogLevel, LogContext } from '../../zendesk/logging';
import { CorrespondenceTable, NodeLevel } from '../correspondence';
import {
  ArticleExtraField,
  ItemResult,
  LocaleMap,
  MigrationObserver,
  MigrationPhase,
  NameCollision,
  PhaseStats,
} from '../types';

/**
 * Result of a gateway call that must not unwind the phase loop
 */
export type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

export async function attempt<T>(operation: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await operation() };
  } catch (error) {
    return { ok: false, error };
  }
}

export function emptyStats(): PhaseStats {
  return { processed: 0, created: 0, skipped: 0, unresolved: 0, failed: 0 };
}

/**
 * Aggregates item results for one phase and forwards them to the observer
 */
export class PhaseTally {
  readonly stats: PhaseStats = emptyStats();

  constructor(
    private readonly phase: MigrationPhase,
    private readonly observer: MigrationObserver
  ) {}

  add(result: ItemResult): void {
    this.stats.processed++;
    switch (result.status) {
      case 'created':
        this.stats.created++;
        break;
      case 'matched':
      case 'skipped':
        this.stats.skipped++;
        break;
      case 'unresolved':
        this.stats.unresolved++;
        break;
      case 'failed':
        this.stats.failed++;
        break;
    }
    this.observer.onItem?.(this.phase, result);
  }
}

export interface PhaseContext {
  runId: string;
  source: HelpCenterGateway;
  destination: HelpCenterGateway;
  table: CorrespondenceTable;
  localeMap: LocaleMap;
  observer: MigrationObserver;
  articleExtraFields: readonly ArticleExtraField[];
  fallbackPermissionGroupId: number;
  collisions: NameCollision[];
  /** Source locale of each migrated article, by source article id */
  articleSourceLocales: Map<number, string | undefined>;
  log(level: LogLevel, message: string, context?: LogContext): void;
}

/**
 * Announce a phase to the observer and return its tally
 */
export function beginPhase(ctx: PhaseContext, phase: MigrationPhase, total: number): PhaseTally {
  ctx.observer.onPhaseStart?.(phase, total);
  return new PhaseTally(phase, ctx.observer);
}

/**
 * Destination lookup for one level, keyed by name/title (scoped by
 * parent where names are only unique within a parent). The first
 * destination node listed under a key wins. Tracks which source nodes
 * claimed each key so collapses can be reported.
 */
export class DestinationIndex {
  private readonly ids = new Map<string, number>();
  private readonly claims = new Map<string, number[]>();

  constructor(
    private readonly level: NodeLevel,
    private readonly collisions: NameCollision[]
  ) {}

  add(key: string, destinationId: number): void {
    if (!this.ids.has(key)) {
      this.ids.set(key, destinationId);
    }
  }

  find(key: string): number | undefined {
    return this.ids.get(key);
  }

  /**
   * Register that `sourceId` resolved to `key`. Returns the collision
   * record once a second source node lands on the same key.
   */
  claim(key: string, sourceId: number, destinationId: number): NameCollision | undefined {
    const claimants = this.claims.get(key) ?? [];
    claimants.push(sourceId);
    this.claims.set(key, claimants);

    if (claimants.length < 2) {
      return undefined;
    }

    let collision = this.collisions.find(c => c.level === this.level && c.key === key);
    if (!collision) {
      collision = { level: this.level, key, sourceIds: [], destinationId };
      this.collisions.push(collision);
    }
    collision.sourceIds = [...claimants];
    return collision;
  }
}

/**
 * Key for nodes whose names are unique only within a parent
 */
export function scopedKey(parentId: number, name: string): string {
  return `${parentId}/${name}`;
}
