/**
 * Feedkeeper — Collector
 *
 * Wires fetcher, dedup store, sink, telemetry and scheduler from the
 * application config.
 */

import type { AppConfig } from '../lib/config';
import type { CycleReport, FeedSource } from '../types';
import { FeedFetcher } from '../feeds/fetcher';
import { createSeenStore } from '../store';
import type { SeenStore } from '../store';
import { createSink } from '../delivery';
import type { ItemSink } from '../delivery';
import { ReportHistory } from '../telemetry/history';
import { Scheduler } from '../scheduler/scheduler';
import { Semaphore } from '../lib/concurrency';
import { describeError } from '../lib/errors';
import { logger } from '../lib/logger';
import { runCycle } from './cycle';
import type { CycleDeps } from './cycle';

export { runCycle } from './cycle';
export type { CycleDeps, CycleSignals } from './cycle';

const log = logger.child({ component: 'collector' });

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CollectorOptions {
  /** Use an in-memory store and drop every item */
  dryRun?: boolean;
  store?: SeenStore;
  sink?: ItemSink;
  fetch?: typeof fetch;
  now?: () => Date;
}

export interface Collector {
  scheduler: Scheduler;
  history: ReportHistory;
  store: SeenStore;
  deps: CycleDeps;
  /** Run the given feeds once, concurrently, and resolve with their reports */
  runOnce(sources: FeedSource[]): Promise<CycleReport[]>;
  close(): Promise<void>;
}

export function createCollector(
  config: AppConfig,
  sources: FeedSource[],
  options: CollectorOptions = {}
): Collector {
  const now = options.now ?? (() => new Date());
  const store =
    options.store ??
    createSeenStore(options.dryRun ? { ...config.store, backend: 'memory' } : config.store, {
      fetch: options.fetch,
    });
  const sink = options.sink ?? createSink(config.output, { dryRun: options.dryRun });
  const history = new ReportHistory();

  const deps: CycleDeps = {
    fetcher: new FeedFetcher({
      retry: config.fetch.retry,
      timeoutMs: config.fetch.timeoutMs,
      maxBytes: config.fetch.maxBytes,
      userAgent: config.userAgent,
      fetch: options.fetch,
      now,
    }),
    store,
    sink,
    limiter: new Semaphore(config.fetch.maxConcurrent),
    cycleTimeoutMs: config.cycleTimeoutMs,
    now,
  };

  const daysAgo = (days: number) => new Date(now().getTime() - days * DAY_MS);

  /** Evict old dedup records, then prune old output files */
  const maintain = async (): Promise<number> => {
    const evicted = await store.evictOlderThan(daysAgo(config.store.retentionDays));
    const pruned = (await sink.prune?.(daysAgo(config.output.retentionDays))) ?? 0;
    log.debug('Maintenance pass finished', { evicted, pruned });
    return evicted;
  };

  const scheduler = new Scheduler({
    sources,
    runCycle: (source, signals) => runCycle(source, deps, signals),
    telemetry: history,
    gracePeriodMs: config.shutdownGraceMs,
    eviction: {
      intervalMs: config.store.evictionIntervalMs,
      run: maintain,
    },
    now,
  });

  return {
    scheduler,
    history,
    store,
    deps,
    async runOnce(selected) {
      const reports = await Promise.all(selected.map(source => runCycle(source, deps)));
      reports.forEach(report => history.report(report));

      if (!reports.some(report => report.fatal)) {
        try {
          await maintain();
        } catch (error) {
          log.error('Maintenance pass failed', { error: describeError(error) });
        }
      }
      return reports;
    },
    async close() {
      await sink.close?.();
      await store.close?.();
      log.debug('Collector closed');
    },
  };
}
