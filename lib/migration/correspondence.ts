/**
 * Identity correspondence between source and destination nodes,
 * one map per tree level. Lives for a single run.
 */

export type NodeLevel = 'categories' | 'sections' | 'articles';

export type CorrespondenceSnapshot = Record<NodeLevel, Record<string, number>>;

export class CorrespondenceTable {
  private readonly maps: Record<NodeLevel, Map<number, number>> = {
    categories: new Map(),
    sections: new Map(),
    articles: new Map(),
  };

  /**
   * Record that a source node lives at `destinationId` in the destination,
   * whether it was just created or matched by name
   */
  record(level: NodeLevel, sourceId: number, destinationId: number): void {
    this.maps[level].set(sourceId, destinationId);
  }

  resolve(level: NodeLevel, sourceId: number): number | undefined {
    return this.maps[level].get(sourceId);
  }

  /**
   * `[sourceId, destinationId]` pairs in insertion order
   */
  pairs(level: NodeLevel): Array<[number, number]> {
    return [...this.maps[level].entries()];
  }

  toJSON(): CorrespondenceSnapshot {
    return {
      categories: Object.fromEntries(this.maps.categories),
      sections: Object.fromEntries(this.maps.sections),
      articles: Object.fromEntries(this.maps.articles),
    };
  }
}
