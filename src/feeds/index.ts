/**
 * Feedkeeper — Feeds Layer
 *
 * Fetch, parse and normalize syndication feeds.
 */

export { FeedFetcher } from './fetcher';
export type {
  ConditionalValidators,
  SourceFetchRecord,
  RawFetchResult,
  FetchSignals,
  FeedFetcherOptions,
} from './fetcher';
export { parseFeed, textOf } from './parser';
export {
  normalizeEntry,
  parseTimestamp,
  computeFingerprint,
  normalizeWhitespace,
  stripHtml,
} from './normalizer';
export type { NormalizedEntry } from './normalizer';
export { buildGoogleNewsUrl } from './google-news';
