/**
 * Feedkeeper — Type Exports
 */

export type {
  FeedDefaults,
  FeedQuery,
  FeedEntryConfig,
  FeedsFile,
  FeedSource,
} from './feed-source';
export {
  FeedDefaultsSchema,
  FeedQuerySchema,
  FeedEntryConfigSchema,
  FeedsFileSchema,
} from './feed-source';

export type {
  FeedDialect,
  RawEntry,
  ParsedFeed,
  TimestampSource,
  FeedItem,
  DowngradeReason,
  TimestampDowngrade,
  SeenRecord,
} from './feed-item';

export type {
  CycleOutcome,
  CycleCounts,
  CycleReport,
  SkipReason,
  SkipEvent,
} from './cycle-report';
export { emptyCounts } from './cycle-report';
