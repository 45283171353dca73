/**
 * Feedkeeper — Supabase Dedup Store
 *
 * Seen records in the `seen_items` table, keyed by (feed_id, fingerprint).
 * See supabase/migrations for the schema.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { SeenStore } from './seen-store';
import { describeSupabaseError, isMissingTable } from '../db/client';
import type { SeenItemRow } from '../db/client';
import { StoreError, describeError } from '../lib/errors';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'supabase-store' });

const TABLE = 'seen_items';

function toStoreError(operation: string, error: unknown): StoreError {
  if (isMissingTable(error)) {
    return new StoreError('Corrupt', `${operation}: table "${TABLE}" is missing. ${describeSupabaseError(error)}`);
  }
  return new StoreError('Unavailable', `${operation}: ${describeSupabaseError(error)}`);
}

export class SupabaseSeenStore implements SeenStore {
  constructor(private readonly client: SupabaseClient) {}

  async hasSeen(feedId: string, fingerprint: string): Promise<boolean> {
    const { data, error } = await this.run('hasSeen', () =>
      this.client
        .from(TABLE)
        .select('fingerprint')
        .eq('feed_id', feedId)
        .eq('fingerprint', fingerprint)
        .limit(1)
    );

    if (error) throw toStoreError('hasSeen', error);
    return Array.isArray(data) && data.length > 0;
  }

  async markSeen(feedId: string, fingerprint: string, at: Date): Promise<void> {
    const row: SeenItemRow = {
      feed_id: feedId,
      fingerprint,
      first_seen_at: at.toISOString(),
    };

    // ignoreDuplicates keeps the existing first_seen_at
    const { error } = await this.run('markSeen', () =>
      this.client.from(TABLE).upsert(row, { onConflict: 'feed_id,fingerprint', ignoreDuplicates: true })
    );

    if (error) throw toStoreError('markSeen', error);
  }

  async evictOlderThan(cutoff: Date): Promise<number> {
    const { count, error } = await this.run('evictOlderThan', () =>
      this.client.from(TABLE).delete({ count: 'exact' }).lt('first_seen_at', cutoff.toISOString())
    );

    if (error) throw toStoreError('evictOlderThan', error);

    const removed = count ?? 0;
    if (removed > 0) {
      log.info('Evicted seen records', { removed, cutoff: cutoff.toISOString() });
    }
    return removed;
  }

  /**
   * Await a query, turning a thrown transport failure into StoreError.
   */
  private async run<T>(operation: string, query: () => PromiseLike<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      throw new StoreError('Unavailable', `${operation}: ${describeError(error)}`, { cause: error });
    }
  }
}
