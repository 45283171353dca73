/**
 * Feedkeeper — Configuration
 *
 * Environment settings (validated with zod after dotenv loads `.env`)
 * and the feeds file. Both are read once at startup.
 */

import 'dotenv/config';
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { FeedsFileSchema } from '../types';
import type { FeedsFile, FeedSource } from '../types';
import { buildGoogleNewsUrl } from '../feeds/google-news';
import { ConfigError, describeError } from './errors';
import { logger } from './logger';

const log = logger.child({ component: 'config' });

// ============================================================
// ENVIRONMENT
// ============================================================

/** Treat `KEY=` the same as an unset key */
const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const intWithDefault = (fallback: number, min = 0) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().min(min).default(fallback));

const EnvSchema = z.object({
  FEEDS_CONFIG: z.preprocess(blankAsUndefined, z.string().default('./config/feeds.json')),
  USER_AGENT: z.preprocess(blankAsUndefined, z.string().default('Feedkeeper/0.1 (+feed collector)')),

  STORE_BACKEND: z.preprocess(
    blankAsUndefined,
    z.enum(['file', 'supabase', 'memory']).default('file')
  ),
  STORE_DIR: z.preprocess(blankAsUndefined, z.string().default('./data/seen')),
  RETENTION_DAYS: intWithDefault(30, 1),
  EVICTION_INTERVAL_MINUTES: intWithDefault(60, 1),
  SUPABASE_URL: z.preprocess(blankAsUndefined, z.string().url().optional()),
  SUPABASE_SERVICE_ROLE_KEY: z.preprocess(blankAsUndefined, z.string().optional()),

  MAX_CONCURRENT_FETCHES: intWithDefault(4, 1),
  FETCH_TIMEOUT_MS: intWithDefault(15_000, 1),
  FETCH_MAX_BYTES: intWithDefault(5 * 1024 * 1024, 1),
  RETRY_MAX_ATTEMPTS: intWithDefault(4, 1),
  RETRY_BASE_DELAY_MS: intWithDefault(1000),
  RETRY_MAX_DELAY_MS: intWithDefault(30_000),

  CYCLE_TIMEOUT_MS: intWithDefault(120_000, 1),
  SHUTDOWN_GRACE_MS: intWithDefault(10_000),

  OUTPUT: z.preprocess(blankAsUndefined, z.enum(['jsonl', 'stdout']).default('jsonl')),
  OUTPUT_DIR: z.preprocess(blankAsUndefined, z.string().default('./output')),
  OUTPUT_RETENTION_DAYS: intWithDefault(30, 1),
  STATUS_PORT: z.preprocess(blankAsUndefined, z.coerce.number().int().min(1).max(65535).optional()),
});

export type StoreBackend = 'file' | 'supabase' | 'memory';
export type OutputKind = 'jsonl' | 'stdout';

export interface AppConfig {
  feedsConfigPath: string;
  userAgent: string;
  store: {
    backend: StoreBackend;
    dir: string;
    retentionDays: number;
    evictionIntervalMs: number;
    supabaseUrl?: string;
    supabaseKey?: string;
  };
  fetch: {
    maxConcurrent: number;
    timeoutMs: number;
    maxBytes: number;
    retry: {
      maxAttempts: number;
      baseDelayMs: number;
      maxDelayMs: number;
      jitter: number;
    };
  };
  cycleTimeoutMs: number;
  shutdownGraceMs: number;
  output: {
    kind: OutputKind;
    dir: string;
    /** Daily output files older than this are pruned with the eviction pass */
    retentionDays: number;
  };
  statusPort?: number;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Build the application config from environment variables.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError('Invalid environment configuration', formatIssues(parsed.error));
  }

  const e = parsed.data;

  if (e.STORE_BACKEND === 'supabase' && (!e.SUPABASE_URL || !e.SUPABASE_SERVICE_ROLE_KEY)) {
    throw new ConfigError(
      'STORE_BACKEND=supabase requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY'
    );
  }

  return {
    feedsConfigPath: e.FEEDS_CONFIG,
    userAgent: e.USER_AGENT,
    store: {
      backend: e.STORE_BACKEND,
      dir: e.STORE_DIR,
      retentionDays: e.RETENTION_DAYS,
      evictionIntervalMs: e.EVICTION_INTERVAL_MINUTES * 60_000,
      supabaseUrl: e.SUPABASE_URL,
      supabaseKey: e.SUPABASE_SERVICE_ROLE_KEY,
    },
    fetch: {
      maxConcurrent: e.MAX_CONCURRENT_FETCHES,
      timeoutMs: e.FETCH_TIMEOUT_MS,
      maxBytes: e.FETCH_MAX_BYTES,
      retry: {
        maxAttempts: e.RETRY_MAX_ATTEMPTS,
        baseDelayMs: e.RETRY_BASE_DELAY_MS,
        maxDelayMs: e.RETRY_MAX_DELAY_MS,
        jitter: 0.5,
      },
    },
    cycleTimeoutMs: e.CYCLE_TIMEOUT_MS,
    shutdownGraceMs: e.SHUTDOWN_GRACE_MS,
    output: {
      kind: e.OUTPUT,
      dir: e.OUTPUT_DIR,
      retentionDays: e.OUTPUT_RETENTION_DAYS,
    },
    statusPort: e.STATUS_PORT,
  };
}

// ============================================================
// FEEDS FILE
// ============================================================

/**
 * Validate a parsed feeds document and resolve it into frozen sources.
 */
export function resolveFeedSources(input: unknown): FeedSource[] {
  const parsed = FeedsFileSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError('Invalid feeds configuration', formatIssues(parsed.error));
  }

  const file: FeedsFile = parsed.data;
  const seenIds = new Set<string>();
  const duplicates: string[] = [];

  const sources = file.feeds.map(entry => {
    if (seenIds.has(entry.id)) duplicates.push(entry.id);
    seenIds.add(entry.id);

    const url = entry.url ?? (entry.query ? buildGoogleNewsUrl(entry.query) : '');
    const timeoutMs = entry.timeoutMs ?? file.defaults.timeoutMs;

    const source: FeedSource = {
      id: entry.id,
      url,
      intervalSeconds: entry.intervalSeconds ?? file.defaults.intervalSeconds,
      ...(timeoutMs !== undefined ? { timeoutMs } : {}),
      headers: Object.freeze({ ...file.defaults.headers, ...entry.headers }),
      enabled: entry.enabled,
    };

    return Object.freeze(source);
  });

  if (duplicates.length > 0) {
    throw new ConfigError('Duplicate feed ids', duplicates.map(id => `feeds: "${id}" is defined more than once`));
  }

  return sources;
}

/**
 * Read and resolve the feeds file at `path`.
 */
export async function loadFeedSources(path: string): Promise<FeedSource[]> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read feeds file ${path}`, [describeError(error)]);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Feeds file ${path} is not valid JSON`, [describeError(error)]);
  }

  const sources = resolveFeedSources(json);

  log.info('Feeds loaded', {
    path,
    total: sources.length,
    enabled: sources.filter(s => s.enabled).length,
  });

  return sources;
}
