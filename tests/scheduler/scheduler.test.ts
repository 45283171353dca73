/**
 * Feedkeeper — Scheduler Tests
 *
 * Tests for:
 * - Per-feed cadence and overlap skips
 * - Manual triggers, enable and disable
 * - Two-phase shutdown and fatal halts
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Scheduler } from '../../src/scheduler/scheduler';
import type { SchedulerOptions } from '../../src/scheduler/scheduler';
import { runCycle } from '../../src/collector/cycle';
import type { CycleSignals } from '../../src/collector/cycle';
import { FeedFetcher } from '../../src/feeds/fetcher';
import { MemorySeenStore } from '../../src/store';
import type { ItemSink } from '../../src/delivery';
import type { TelemetrySink } from '../../src/telemetry/history';
import { emptyCounts } from '../../src/types';
import type { CycleReport, FeedSource } from '../../src/types';

function feed(id: string, intervalSeconds: number, enabled = true): FeedSource {
  return { id, url: `https://example.com/${id}.xml`, intervalSeconds, headers: {}, enabled };
}

function makeReport(feedId: string, overrides: Partial<CycleReport> = {}): CycleReport {
  return {
    cycleId: `cycle-${feedId}`,
    feedId,
    startedAt: '2024-04-01T10:00:00.000Z',
    finishedAt: '2024-04-01T10:00:00.000Z',
    durationMs: 0,
    outcome: 'success',
    counts: emptyCounts(),
    attempts: 1,
    bytes: 0,
    downgrades: [],
    fatal: false,
    ...overrides,
  };
}

type RunCycle = SchedulerOptions['runCycle'];

function createTelemetry() {
  return {
    report: vi.fn<TelemetrySink['report']>(),
    skip: vi.fn<TelemetrySink['skip']>(),
  };
}

const immediate = () => vi.fn<RunCycle>(async source => makeReport(source.id));

describe('Scheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('skips a trigger while the feed is still running', async () => {
    const finishers: Array<() => void> = [];
    const runCycle = vi.fn<RunCycle>(
      source =>
        new Promise<CycleReport>(resolve => {
          finishers.push(() => resolve(makeReport(source.id)));
        })
    );
    const telemetry = createTelemetry();
    const scheduler = new Scheduler({
      sources: [feed('a', 10)],
      runCycle,
      telemetry,
      gracePeriodMs: 1000,
      runOnStart: false,
    });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(10_000);
    expect(runCycle).toHaveBeenCalledTimes(1);
    expect(scheduler.state('a')?.status).toBe('running');

    await vi.advanceTimersByTimeAsync(10_000);
    expect(runCycle).toHaveBeenCalledTimes(1);
    expect(telemetry.skip).toHaveBeenCalledTimes(1);
    expect(telemetry.skip.mock.calls[0]?.[0]).toMatchObject({ feedId: 'a', reason: 'overlap' });

    finishers[0]?.();
    await vi.advanceTimersByTimeAsync(0);
    expect(scheduler.state('a')?.status).toBe('idle');
    expect(telemetry.report).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(10_000);
    expect(runCycle).toHaveBeenCalledTimes(2);

    finishers[1]?.();
    await scheduler.stop();
  });

  it('runs each feed at its own cadence', async () => {
    const runCycle = immediate();
    const scheduler = new Scheduler({
      sources: [feed('fast', 10), feed('slow', 30)],
      runCycle,
      telemetry: createTelemetry(),
      gracePeriodMs: 1000,
      runOnStart: false,
    });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(30_000);

    const runsFor = (id: string) => runCycle.mock.calls.filter(([source]) => source.id === id).length;
    expect(runsFor('fast')).toBe(3);
    expect(runsFor('slow')).toBe(1);

    await scheduler.stop();
  });

  it('runs enabled feeds immediately on start by default', async () => {
    const runCycle = immediate();
    const scheduler = new Scheduler({
      sources: [feed('a', 60), feed('b', 60, false)],
      runCycle,
      telemetry: createTelemetry(),
      gracePeriodMs: 1000,
    });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(runCycle.mock.calls.map(([source]) => source.id)).toEqual(['a']);
    await scheduler.stop();
  });

  it('answers manual triggers', async () => {
    const telemetry = createTelemetry();
    const scheduler = new Scheduler({
      sources: [feed('a', 60), feed('off', 60, false)],
      runCycle: immediate(),
      telemetry,
      gracePeriodMs: 1000,
      runOnStart: false,
    });
    scheduler.start();

    expect(scheduler.trigger('a')).toBe('started');
    expect(scheduler.trigger('a')).toBe('skipped');
    expect(scheduler.trigger('missing')).toBe('unknown');
    expect(scheduler.trigger('off')).toBe('disabled');
    expect(telemetry.skip.mock.calls.map(([event]) => event.reason)).toEqual(['overlap', 'disabled']);

    scheduler.enable('off');
    expect(scheduler.trigger('off')).toBe('started');

    await scheduler.stop();
    expect(scheduler.trigger('a')).toBe('stopped');
  });

  it('lets a running cycle finish when the feed is disabled', async () => {
    let finish: () => void = () => undefined;
    const scheduler = new Scheduler({
      sources: [feed('a', 60)],
      runCycle: source =>
        new Promise<CycleReport>(resolve => {
          finish = () => resolve(makeReport(source.id));
        }),
      telemetry: createTelemetry(),
      gracePeriodMs: 1000,
      runOnStart: false,
    });
    scheduler.start();

    scheduler.trigger('a');
    scheduler.disable('a');
    expect(scheduler.state('a')?.status).toBe('running');

    finish();
    await vi.advanceTimersByTimeAsync(0);
    expect(scheduler.state('a')?.status).toBe('disabled');

    await scheduler.stop();
  });

  it('reports a snapshot of every feed', () => {
    const scheduler = new Scheduler({
      sources: [feed('a', 60), feed('b', 120, false)],
      runCycle: immediate(),
      telemetry: createTelemetry(),
      gracePeriodMs: 1000,
    });

    expect(scheduler.snapshot()).toEqual([
      { feedId: 'a', intervalSeconds: 60, status: 'idle', enabled: true, runs: 0 },
      { feedId: 'b', intervalSeconds: 120, status: 'disabled', enabled: false, runs: 0 },
    ]);
  });

  describe('stop', () => {
    it('lets cycles finish within the grace period', async () => {
      let signals: CycleSignals = {};
      const scheduler = new Scheduler({
        sources: [feed('a', 60)],
        runCycle: (source, received) => {
          signals = received;
          return new Promise<CycleReport>(resolve => {
            received.stopSignal?.addEventListener('abort', () => resolve(makeReport(source.id)));
          });
        },
        telemetry: createTelemetry(),
        gracePeriodMs: 5000,
      });
      scheduler.start();

      const result = await scheduler.stop();

      expect(result.abandoned).toEqual([]);
      expect(signals.stopSignal?.aborted).toBe(true);
      expect(signals.abortSignal?.aborted).toBe(false);
      await expect(scheduler.done).resolves.toBeUndefined();
    });

    it('hard-aborts and reports feeds still running after the grace period', async () => {
      let signals: CycleSignals = {};
      const scheduler = new Scheduler({
        sources: [feed('a', 60)],
        runCycle: (source, received) => {
          signals = received;
          return new Promise<CycleReport>(resolve => {
            received.abortSignal?.addEventListener('abort', () =>
              resolve(makeReport(source.id, { outcome: 'failed' }))
            );
          });
        },
        telemetry: createTelemetry(),
        gracePeriodMs: 1000,
      });
      scheduler.start();

      const stopping = scheduler.stop();
      expect(signals.stopSignal?.aborted).toBe(true);
      expect(signals.abortSignal?.aborted).toBe(false);

      await vi.advanceTimersByTimeAsync(1000);
      const result = await stopping;

      expect(result.abandoned).toEqual(['a']);
      expect(signals.abortSignal?.aborted).toBe(true);
    });

    it('returns the same result when called twice', async () => {
      const scheduler = new Scheduler({
        sources: [feed('a', 60)],
        runCycle: immediate(),
        telemetry: createTelemetry(),
        gracePeriodMs: 1000,
        runOnStart: false,
      });

      expect(scheduler.stop()).toBe(scheduler.stop());
      await scheduler.stop();
    });
  });

  it('halts collection on a fatal report', async () => {
    const telemetry = createTelemetry();
    const scheduler = new Scheduler({
      sources: [feed('a', 60)],
      runCycle: async source =>
        makeReport(source.id, {
          outcome: 'failed',
          fatal: true,
          error: { type: 'StoreError', kind: 'Corrupt', message: 'partition unreadable' },
        }),
      telemetry,
      gracePeriodMs: 1000,
    });

    scheduler.start();

    await expect(scheduler.done).rejects.toThrow('Feed "a" hit a fatal failure: partition unreadable');
    expect(scheduler.isStopping).toBe(true);
    expect(telemetry.report).toHaveBeenCalledTimes(1);
  });

  it('runs eviction on its own interval', async () => {
    const evict = vi.fn(async () => 3);
    const scheduler = new Scheduler({
      sources: [feed('a', 3600)],
      runCycle: immediate(),
      telemetry: createTelemetry(),
      gracePeriodMs: 1000,
      runOnStart: false,
      eviction: { intervalMs: 60_000, run: evict },
    });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(120_000);

    expect(evict).toHaveBeenCalledTimes(2);
    await scheduler.stop();
  });

  describe('with a real cycle', () => {
    beforeEach(() => {
      vi.useRealTimers();
    });

    it('keeps a timed-out feed running until its cycle has unwound', async () => {
      let active = 0;
      let maxActive = 0;
      const slowSink: ItemSink = {
        emit: async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await new Promise(resolve => setTimeout(resolve, 150));
          active--;
        },
      };
      const body = `<rss version="2.0"><channel><title>Slow</title>
        <item><guid>one</guid><title>One</title><pubDate>Mon, 01 Apr 2024 10:00:00 GMT</pubDate></item>
      </channel></rss>`;
      const deps = {
        fetcher: new FeedFetcher({ fetch: async () => new Response(body, { status: 200 }) }),
        store: new MemorySeenStore(),
        sink: slowSink,
        cycleTimeoutMs: 50,
      };
      const telemetry = createTelemetry();
      const scheduler = new Scheduler({
        sources: [feed('a', 3600)],
        runCycle: (source, signals) => runCycle(source, deps, signals),
        telemetry,
        gracePeriodMs: 1000,
        runOnStart: false,
      });
      scheduler.start();

      expect(scheduler.trigger('a')).toBe('started');
      await new Promise(resolve => setTimeout(resolve, 90));

      expect(scheduler.state('a')?.status).toBe('running');
      expect(scheduler.trigger('a')).toBe('skipped');

      await vi.waitFor(() => expect(telemetry.report).toHaveBeenCalledTimes(1), { timeout: 2000 });
      expect(telemetry.report.mock.calls[0]?.[0].error).toMatchObject({ type: 'TimeoutError' });
      expect(scheduler.state('a')?.status).toBe('idle');
      expect(maxActive).toBe(1);

      await scheduler.stop();
    });
  });
});
