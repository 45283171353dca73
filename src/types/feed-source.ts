/**
 * Feedkeeper — Feed Source Types
 *
 * Schema for the feeds configuration file. A source is frozen once
 * loaded and never changes during a run.
 */

import { z } from 'zod';

// ============================================================
// SHARED FIELDS
// ============================================================

function isHttpUrl(value: string): boolean {
  try {
    return /^https?:$/.test(new URL(value).protocol);
  } catch {
    return false;
  }
}

const HttpUrlSchema = z
  .string()
  .url()
  .refine(isHttpUrl, { message: 'Only http(s) URLs are supported' });

const HeadersSchema = z.record(z.string().min(1), z.string());

/** Longest delay a Node timer accepts, in whole seconds */
const MAX_INTERVAL_SECONDS = 2_147_483;
const IntervalSchema = z.number().int().min(10).max(MAX_INTERVAL_SECONDS);

export const FeedDefaultsSchema = z.object({
  intervalSeconds: IntervalSchema.default(900),
  timeoutMs: z.number().int().positive().optional(),
  headers: HeadersSchema.optional(),
});
export type FeedDefaults = z.infer<typeof FeedDefaultsSchema>;

// ============================================================
// KEYWORD QUERY (Google News search)
// ============================================================

export const FeedQuerySchema = z.object({
  terms: z.string().trim().min(1),
  language: z.string().min(2).default('en'),
  country: z.string().length(2).default('US'),
});
export type FeedQuery = z.infer<typeof FeedQuerySchema>;

// ============================================================
// SOURCE ENTRY
// ============================================================

export const FeedEntryConfigSchema = z
  .object({
    id: z
      .string()
      .min(1)
      .max(128)
      .regex(/^[A-Za-z0-9._-]+$/, 'Use letters, digits, dot, dash or underscore'),
    url: HttpUrlSchema.optional(),
    query: FeedQuerySchema.optional(),
    intervalSeconds: IntervalSchema.optional(),
    timeoutMs: z.number().int().positive().optional(),
    headers: HeadersSchema.optional(),
    enabled: z.boolean().default(true),
  })
  .refine(entry => (entry.url === undefined) !== (entry.query === undefined), {
    message: 'Exactly one of "url" or "query" is required',
  });
export type FeedEntryConfig = z.infer<typeof FeedEntryConfigSchema>;

export const FeedsFileSchema = z.object({
  defaults: FeedDefaultsSchema.default({}),
  feeds: z.array(FeedEntryConfigSchema).min(1),
});
export type FeedsFile = z.infer<typeof FeedsFileSchema>;

// ============================================================
// RESOLVED SOURCE
// ============================================================

/**
 * A feed source after defaults are applied and the URL is resolved.
 */
export interface FeedSource {
  readonly id: string;
  readonly url: string;
  readonly intervalSeconds: number;
  readonly timeoutMs?: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly enabled: boolean;
}
