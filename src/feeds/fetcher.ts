/**
 * Feedkeeper — Feed Fetcher
 *
 * Downloads feed documents over HTTP(S) with a per-request timeout, a
 * byte ceiling, conditional requests and retry with backoff.
 *
 * Cancellation has two levels:
 * - stopSignal: graceful. The attempt in flight completes, but no new
 *   attempt or backoff wait starts.
 * - abortSignal: hard. The in-flight request is aborted as well.
 */

import type { FeedSource } from '../types';
import { FetchError, describeError } from '../lib/errors';
import { backoffDelay, shouldRetry, sleep as defaultSleep, DEFAULT_RETRY_POLICY } from '../lib/retry';
import type { RetryPolicy, Sleep } from '../lib/retry';
import { linkedController } from '../lib/concurrency';
import { logger } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export interface ConditionalValidators {
  etag?: string;
  lastModified?: string;
}

/**
 * Per-source record owned by the fetcher. Validators change only
 * through `commitValidators`.
 */
export interface SourceFetchRecord extends ConditionalValidators {
  lastAttemptAt?: string;
  lastStatus?: number;
}

interface FetchResultBase {
  feedId: string;
  fetchedAt: Date;
  attempts: number;
}

export type RawFetchResult =
  | (FetchResultBase & {
      outcome: 'fetched';
      body: Buffer;
      httpStatus: number;
      contentType?: string;
      validators: ConditionalValidators;
    })
  | (FetchResultBase & {
      outcome: 'not_modified';
      httpStatus: 304;
    })
  | (FetchResultBase & {
      outcome: 'failed';
      error: FetchError;
      httpStatus?: number;
    });

export interface FetchSignals {
  stopSignal?: AbortSignal;
  abortSignal?: AbortSignal;
}

export interface FeedFetcherOptions {
  retry?: RetryPolicy;
  timeoutMs?: number;
  maxBytes?: number;
  userAgent?: string;
  fetch?: typeof fetch;
  sleep?: Sleep;
  random?: () => number;
  now?: () => Date;
}

const log = logger.child({ component: 'fetcher' });

const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_MAX_BYTES = 5 * 1024 * 1024;
const ACCEPT =
  'application/rss+xml, application/atom+xml, application/feed+json, application/xml;q=0.9, text/xml;q=0.9, */*;q=0.8';

// ============================================================
// FETCHER
// ============================================================

export class FeedFetcher {
  private readonly records = new Map<string, SourceFetchRecord>();
  private readonly retry: RetryPolicy;
  private readonly timeoutMs: number;
  private readonly maxBytes: number;
  private readonly userAgent: string;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(options: FeedFetcherOptions = {}) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
    this.userAgent = options.userAgent ?? 'Feedkeeper/0.1';
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  getRecord(feedId: string): Readonly<SourceFetchRecord> | undefined {
    return this.records.get(feedId);
  }

  /**
   * Remember validators for the next conditional request. Called by the
   * orchestrator once the items from that download were delivered.
   */
  commitValidators(feedId: string, validators: ConditionalValidators): void {
    const record = this.records.get(feedId) ?? {};
    this.records.set(feedId, {
      ...record,
      etag: validators.etag,
      lastModified: validators.lastModified,
    });
  }

  /**
   * Fetch a source, retrying transient failures. Never throws.
   */
  async fetch(source: FeedSource, signals: FetchSignals = {}): Promise<RawFetchResult> {
    let attempts = 0;

    while (true) {
      if (signals.stopSignal?.aborted || signals.abortSignal?.aborted) {
        return this.failure(
          source,
          { error: new FetchError('Cancelled', `Fetch of ${source.url} cancelled before attempt ${attempts + 1}`) },
          attempts
        );
      }

      attempts++;
      const result = await this.attempt(source, signals.abortSignal);
      this.touchRecord(source.id, result.httpStatus);

      if (result.outcome !== 'failed') {
        return { ...result, feedId: source.id, fetchedAt: this.now(), attempts };
      }

      const { error } = result;
      const stopped = signals.stopSignal?.aborted || signals.abortSignal?.aborted;
      if (!error.retryable || !shouldRetry(attempts, this.retry) || stopped) {
        return this.failure(source, result, attempts);
      }

      const delayMs = backoffDelay(attempts, this.retry, this.random);
      log.warn('Fetch attempt failed, retrying', {
        feedId: source.id,
        attempt: attempts,
        kind: error.kind,
        httpStatus: error.httpStatus,
        error: error.message,
        delayMs,
      });

      const { controller, dispose } = linkedController(signals.stopSignal, signals.abortSignal);
      const waited = await this.sleep(delayMs, controller.signal);
      dispose();

      if (!waited) {
        return this.failure(source, result, attempts);
      }
    }
  }

  private failure(
    source: FeedSource,
    failed: { error: FetchError; httpStatus?: number },
    attempts: number
  ): RawFetchResult {
    log.warn('Fetch failed', {
      feedId: source.id,
      attempts,
      kind: failed.error.kind,
      httpStatus: failed.httpStatus,
      error: failed.error.message,
    });

    return {
      feedId: source.id,
      outcome: 'failed',
      error: failed.error,
      ...(failed.httpStatus !== undefined ? { httpStatus: failed.httpStatus } : {}),
      fetchedAt: this.now(),
      attempts,
    };
  }

  // ============================================================
  // SINGLE ATTEMPT
  // ============================================================

  private async attempt(
    source: FeedSource,
    abortSignal?: AbortSignal
  ): Promise<
    | { outcome: 'fetched'; body: Buffer; httpStatus: number; contentType?: string; validators: ConditionalValidators }
    | { outcome: 'not_modified'; httpStatus: 304 }
    | { outcome: 'failed'; error: FetchError; httpStatus?: number }
  > {
    const timeoutMs = source.timeoutMs ?? this.timeoutMs;
    const timeout = new AbortController();
    const timer = setTimeout(() => timeout.abort(new Error(`Request timed out after ${timeoutMs}ms`)), timeoutMs);
    const { controller, dispose } = linkedController(abortSignal, timeout.signal);

    try {
      const response = await this.fetchImpl(source.url, {
        method: 'GET',
        headers: this.buildHeaders(source),
        redirect: 'follow',
        signal: controller.signal,
      });

      if (response.status === 304) {
        await discardBody(response);
        return { outcome: 'not_modified', httpStatus: 304 };
      }

      if (!response.ok) {
        await discardBody(response);
        return {
          outcome: 'failed',
          httpStatus: response.status,
          error: new FetchError('HttpStatus', `HTTP ${response.status} from ${source.url}`, response.status),
        };
      }

      const body = await readBody(response, this.maxBytes);
      if (body === null) {
        return {
          outcome: 'failed',
          httpStatus: response.status,
          error: new FetchError('TooLarge', `Payload from ${source.url} exceeds ${this.maxBytes} bytes`, response.status),
        };
      }

      return {
        outcome: 'fetched',
        body,
        httpStatus: response.status,
        contentType: response.headers.get('content-type') ?? undefined,
        validators: {
          etag: response.headers.get('etag') ?? undefined,
          lastModified: response.headers.get('last-modified') ?? undefined,
        },
      };
    } catch (error) {
      const reason = controller.signal.aborted ? describeError(controller.signal.reason) : describeError(error);
      return {
        outcome: 'failed',
        error: new FetchError('Network', `Request to ${source.url} failed: ${reason}`, undefined, { cause: error }),
      };
    } finally {
      clearTimeout(timer);
      dispose();
    }
  }

  private buildHeaders(source: FeedSource): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Accept: ACCEPT,
      ...source.headers,
    };

    const record = this.records.get(source.id);
    if (record?.etag) headers['If-None-Match'] = record.etag;
    if (record?.lastModified) headers['If-Modified-Since'] = record.lastModified;

    return headers;
  }

  private touchRecord(feedId: string, httpStatus?: number): void {
    const record = this.records.get(feedId) ?? {};
    this.records.set(feedId, {
      ...record,
      lastAttemptAt: this.now().toISOString(),
      lastStatus: httpStatus,
    });
  }
}

// ============================================================
// BODY HELPERS
// ============================================================

/**
 * Read the body, giving up as soon as it passes `maxBytes`.
 * Returns null when the payload is too large.
 */
async function readBody(response: Response, maxBytes: number): Promise<Buffer | null> {
  const declared = Number(response.headers.get('content-length'));
  if (Number.isFinite(declared) && declared > maxBytes) {
    await discardBody(response);
    return null;
  }

  if (!response.body) return Buffer.alloc(0);

  const reader = response.body.getReader();
  const chunks: Buffer[] = [];
  let total = 0;

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;

    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      return null;
    }
    chunks.push(Buffer.from(value));
  }

  return Buffer.concat(chunks, total);
}

async function discardBody(response: Response): Promise<void> {
  if (!response.body || response.bodyUsed) return;
  await response.body.cancel().catch((error: unknown) => {
    log.debug('Discarding response body failed', { error: describeError(error) });
  });
}
