/**
 * Feedkeeper — Collection Cycle
 *
 * One cycle for one feed:
 *   fetch -> parse -> normalize -> hasSeen -> emit -> markSeen
 *   -> commit conditional-fetch validators -> CycleReport
 *
 * Never throws. Every outcome, including timeouts and store corruption,
 * comes back as a report.
 */

import { nanoid } from 'nanoid';
import type { CycleCounts, CycleReport, FeedSource, TimestampDowngrade } from '../types';
import { emptyCounts } from '../types';
import type { FeedFetcher, FetchSignals, RawFetchResult } from '../feeds/fetcher';
import { parseFeed } from '../feeds/parser';
import { normalizeEntry } from '../feeds/normalizer';
import type { NormalizedEntry } from '../feeds/normalizer';
import type { SeenStore } from '../store';
import type { ItemSink } from '../delivery';
import type { Semaphore } from '../lib/concurrency';
import { abortReason, linkedController } from '../lib/concurrency';
import {
  CycleTimeoutError,
  FetchError,
  SinkError,
  StoreError,
  describeError,
  toReportError,
} from '../lib/errors';
import type { ReportError } from '../lib/errors';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'cycle' });

export interface CycleDeps {
  fetcher: FeedFetcher;
  store: SeenStore;
  sink: ItemSink;
  /** Bounds simultaneous fetches across feeds */
  limiter?: Semaphore;
  cycleTimeoutMs: number;
  now?: () => Date;
}

export type CycleSignals = FetchSignals;

/** Mutable tally while a cycle runs, so a timeout can still report it */
interface CycleProgress {
  counts: CycleCounts;
  attempts: number;
  httpStatus?: number;
  bytes: number;
  downgrades: TimestampDowngrade[];
}

type CycleResult = { outcome: CycleReport['outcome']; error?: unknown };

export async function runCycle(
  source: FeedSource,
  deps: CycleDeps,
  signals: CycleSignals = {}
): Promise<CycleReport> {
  const now = deps.now ?? (() => new Date());
  const cycleId = nanoid();
  const startedAt = now();
  const progress: CycleProgress = { counts: emptyCounts(), attempts: 0, bytes: 0, downgrades: [] };

  const timeout = new AbortController();
  const timer = setTimeout(
    () => timeout.abort(new CycleTimeoutError(source.id, deps.cycleTimeoutMs)),
    deps.cycleTimeoutMs
  );
  const { controller, dispose } = linkedController(signals.abortSignal, timeout.signal);

  const timedOut = new Promise<never>((_, reject) => {
    timeout.signal.addEventListener('abort', () => reject(abortReason(timeout.signal)), { once: true });
  });

  const execution = execute(source, deps, { stopSignal: signals.stopSignal, abortSignal: controller.signal }, progress);

  let result: CycleResult;
  try {
    result = await Promise.race([execution, timedOut]);
  } catch (error) {
    result = { outcome: 'failed', error };
    if (timeout.signal.aborted) {
      // The feed stays busy until the abandoned steps unwind
      await execution.then(
        () => undefined,
        (unwound: unknown) => log.debug('Timed-out cycle unwound', { feedId: source.id, error: describeError(unwound) })
      );
    }
  } finally {
    clearTimeout(timer);
    dispose();
  }

  const finishedAt = now();
  const error: ReportError | undefined = result.error === undefined ? undefined : toReportError(result.error);

  return {
    cycleId,
    feedId: source.id,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: finishedAt.getTime() - startedAt.getTime(),
    outcome: result.outcome,
    counts: progress.counts,
    attempts: progress.attempts,
    ...(progress.httpStatus !== undefined ? { httpStatus: progress.httpStatus } : {}),
    bytes: progress.bytes,
    downgrades: progress.downgrades,
    ...(error ? { error } : {}),
    fatal: result.error instanceof StoreError && result.error.fatal,
  };
}

// ============================================================
// STEPS
// ============================================================

async function execute(
  source: FeedSource,
  deps: CycleDeps,
  signals: { stopSignal?: AbortSignal; abortSignal: AbortSignal },
  progress: CycleProgress
): Promise<CycleResult> {
  const now = deps.now ?? (() => new Date());
  const fetched = await fetchWithinLimit(source, deps, signals);

  progress.attempts = fetched.attempts;
  progress.httpStatus = fetched.httpStatus;

  if (fetched.outcome === 'failed') {
    return { outcome: 'failed', error: fetched.error };
  }
  if (fetched.outcome === 'not_modified') {
    return { outcome: 'not_modified' };
  }

  progress.bytes = fetched.body.byteLength;
  const parsed = await parseFeed(fetched.body);

  const { counts } = progress;
  counts.parsed = parsed.entries.length;
  counts.skipped = parsed.skipped;
  counts.fetched = parsed.entries.length + parsed.skipped;

  const inThisCycle = new Set<string>();
  let cycleError: unknown;

  for (const entry of parsed.entries) {
    if (signals.abortSignal.aborted) {
      throw abortReason(signals.abortSignal);
    }

    let normalized: NormalizedEntry;
    try {
      normalized = normalizeEntry(source.id, entry, fetched.fetchedAt);
    } catch (error) {
      counts.failed++;
      log.debug('Entry could not be normalized', { feedId: source.id, error: describeError(error) });
      continue;
    }

    const { item, downgrade } = normalized;
    if (downgrade) progress.downgrades.push(downgrade);

    if (inThisCycle.has(item.fingerprint)) {
      counts.duplicate++;
      continue;
    }
    inThisCycle.add(item.fingerprint);

    let seen: boolean;
    try {
      seen = await deps.store.hasSeen(source.id, item.fingerprint);
    } catch (error) {
      if (isFatal(error)) throw error;
      // Cannot tell new from old: stop emitting for this cycle
      cycleError = error;
      break;
    }

    if (seen) {
      counts.duplicate++;
      continue;
    }

    try {
      await deps.sink.emit(item);
    } catch (error) {
      counts.failed++;
      cycleError =
        error instanceof SinkError
          ? error
          : new SinkError(`Sink rejected item: ${describeError(error)}`, { cause: error });
      break;
    }
    counts.new++;

    try {
      await deps.store.markSeen(source.id, item.fingerprint, now());
    } catch (error) {
      if (isFatal(error)) throw error;
      log.warn('Emitted item could not be marked seen', {
        feedId: source.id,
        fingerprint: item.fingerprint,
        error: describeError(error),
      });
      cycleError ??= error;
    }
  }

  if (cycleError !== undefined) {
    return { outcome: 'failed', error: cycleError };
  }
  if (signals.abortSignal.aborted) {
    throw abortReason(signals.abortSignal);
  }

  deps.fetcher.commitValidators(source.id, fetched.validators);
  return { outcome: 'success' };
}

/**
 * Fetch inside the shared semaphore. A graceful stop while the cycle is
 * still queued for a permit cancels the fetch before any request.
 */
async function fetchWithinLimit(
  source: FeedSource,
  deps: CycleDeps,
  signals: { stopSignal?: AbortSignal; abortSignal: AbortSignal }
): Promise<RawFetchResult> {
  const fetchOnce = () => deps.fetcher.fetch(source, signals);
  if (!deps.limiter) return fetchOnce();

  const { controller, dispose } = linkedController(signals.stopSignal, signals.abortSignal);
  try {
    return await deps.limiter.run(fetchOnce, controller.signal);
  } catch (error) {
    if (signals.abortSignal.aborted || !signals.stopSignal?.aborted) throw error;
    return {
      feedId: source.id,
      outcome: 'failed',
      error: new FetchError('Cancelled', `Fetch of ${source.url} cancelled while waiting for a slot`),
      fetchedAt: (deps.now ?? (() => new Date()))(),
      attempts: 0,
    };
  } finally {
    dispose();
  }
}

function isFatal(error: unknown): boolean {
  return error instanceof StoreError && error.fatal;
}
