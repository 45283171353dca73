/**
 * Feedkeeper — Feed Item Types
 *
 * Raw entries as the parser sees them, and the canonical item every
 * other stage works with.
 */

// ============================================================
// PARSER OUTPUT
// ============================================================

export type FeedDialect = 'rss' | 'rdf' | 'atom' | 'json';

/**
 * One entry exactly as the document carried it. Every field is the
 * raw text; cleaning happens in the normalizer.
 */
export interface RawEntry {
  guid?: string;
  link?: string;
  title?: string;
  summary?: string;
  published?: string;
  updated?: string;
  author?: string;
  /** Publisher named by the entry, e.g. RSS `<source>` */
  source?: string;
}

export interface ParsedFeed {
  dialect: FeedDialect;
  title?: string;
  entries: RawEntry[];
  /** Entries dropped because they could not be read */
  skipped: number;
  /** True when the lenient pass had to recover the document */
  recovered: boolean;
}

// ============================================================
// CANONICAL ITEM
// ============================================================

export type TimestampSource = 'published' | 'updated' | 'fetch_time';

export interface FeedItem {
  readonly feedId: string;
  readonly guid?: string;
  readonly title: string;
  readonly link?: string;
  /** ISO 8601, always UTC */
  readonly publishedAt: string;
  readonly timestampSource: TimestampSource;
  readonly summary: string;
  readonly author?: string;
  /** Publisher name, or the link's host when the feed gives none */
  readonly source?: string;
  readonly fingerprint: string;
}

export type DowngradeReason = 'published_missing' | 'published_unparsable';

/**
 * Recorded whenever the published timestamp had to be substituted.
 */
export interface TimestampDowngrade {
  /** guid, link or title of the entry, whichever exists first */
  entry: string;
  reason: DowngradeReason;
  resolvedFrom: Exclude<TimestampSource, 'published'>;
}

// ============================================================
// DEDUP STATE
// ============================================================

export interface SeenRecord {
  feedId: string;
  fingerprint: string;
  firstSeenAt: string;
}
