/**
 * Feedkeeper — Output Sink
 */

import type { FeedItem } from '../types';

/**
 * Receives new items in document order. `emit` resolves once the item
 * is accepted and rejects with SinkError otherwise.
 */
export interface ItemSink {
  emit(item: FeedItem): Promise<void>;
  /** Delete output written before `cutoff`; resolves with the count */
  prune?(cutoff: Date): Promise<number>;
  close?(): Promise<void>;
}

/** One JSON line per item, shared by the file and stdout sinks */
export function serializeItem(item: FeedItem): string {
  return `${JSON.stringify(item)}\n`;
}

/**
 * Accepts everything and keeps nothing. Used for dry runs.
 */
export class NullSink implements ItemSink {
  emitted = 0;

  async emit(): Promise<void> {
    this.emitted++;
  }
}
