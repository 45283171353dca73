/**
 * Feedkeeper — Deduplication Store
 *
 * Remembers which fingerprints were already delivered, per feed. This is
 * the only state that survives a restart.
 */

export interface SeenStore {
  hasSeen(feedId: string, fingerprint: string): Promise<boolean>;

  /**
   * Record a delivered item. Idempotent: marking an existing record keeps
   * its original first-seen time.
   */
  markSeen(feedId: string, fingerprint: string, at: Date): Promise<void>;

  /** Remove records first seen before `cutoff`; resolves with the count */
  evictOlderThan(cutoff: Date): Promise<number>;

  close?(): Promise<void>;
}

/**
 * In-process store for tests and dry runs.
 */
export class MemorySeenStore implements SeenStore {
  private readonly partitions = new Map<string, Map<string, Date>>();

  async hasSeen(feedId: string, fingerprint: string): Promise<boolean> {
    return this.partitions.get(feedId)?.has(fingerprint) ?? false;
  }

  async markSeen(feedId: string, fingerprint: string, at: Date): Promise<void> {
    let partition = this.partitions.get(feedId);
    if (!partition) {
      partition = new Map();
      this.partitions.set(feedId, partition);
    }
    if (!partition.has(fingerprint)) {
      partition.set(fingerprint, new Date(at.getTime()));
    }
  }

  async evictOlderThan(cutoff: Date): Promise<number> {
    let removed = 0;
    for (const partition of this.partitions.values()) {
      for (const [fingerprint, firstSeen] of partition) {
        if (firstSeen.getTime() < cutoff.getTime()) {
          partition.delete(fingerprint);
          removed++;
        }
      }
    }
    return removed;
  }

  firstSeenAt(feedId: string, fingerprint: string): Date | undefined {
    return this.partitions.get(feedId)?.get(fingerprint);
  }

  size(feedId?: string): number {
    if (feedId !== undefined) return this.partitions.get(feedId)?.size ?? 0;
    let total = 0;
    for (const partition of this.partitions.values()) total += partition.size;
    return total;
  }
}
