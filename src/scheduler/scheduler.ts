/**
 * Feedkeeper — Scheduler
 *
 * Drives every feed on its own timer. Each feed moves through
 * idle -> running -> idle, or sits in disabled. A trigger that lands
 * while the feed is running is skipped, never queued.
 *
 * Shutdown is two-phase: stop() signals a graceful stop, waits up to the
 * grace period, then hard-aborts whatever is still running.
 */

import type { CycleReport, FeedSource, SkipReason } from '../types';
import type { CycleSignals } from '../collector/cycle';
import type { TelemetrySink } from '../telemetry/history';
import { StoreError, describeError } from '../lib/errors';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'scheduler' });

// ============================================================
// TYPES
// ============================================================

export type FeedRunStatus = 'idle' | 'running' | 'disabled';

export interface FeedRunState {
  status: FeedRunStatus;
  /** Whether the feed returns to idle (true) or disabled (false) after a run */
  enabled: boolean;
  runs: number;
  lastStartedAt?: string;
  lastFinishedAt?: string;
}

export type TriggerResult = 'started' | 'skipped' | 'disabled' | 'stopped' | 'unknown';

export interface FeedStatus extends FeedRunState {
  feedId: string;
  intervalSeconds: number;
}

export interface StopResult {
  /** Feeds still running when the grace period ran out */
  abandoned: string[];
}

export interface SchedulerOptions {
  sources: FeedSource[];
  runCycle: (source: FeedSource, signals: CycleSignals) => Promise<CycleReport>;
  telemetry: TelemetrySink;
  gracePeriodMs: number;
  /** Opportunistic eviction of old dedup records */
  eviction?: {
    intervalMs: number;
    run: () => Promise<number>;
  };
  /** Run every enabled feed once as soon as the scheduler starts */
  runOnStart?: boolean;
  now?: () => Date;
}

interface InFlight {
  abort: AbortController;
  settled: Promise<void>;
}

// ============================================================
// SCHEDULER
// ============================================================

export class Scheduler {
  private readonly sources = new Map<string, FeedSource>();
  private readonly states = new Map<string, FeedRunState>();
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly inFlight = new Map<string, InFlight>();
  private readonly stopController = new AbortController();
  private readonly now: () => Date;

  private evictionTimer?: NodeJS.Timeout;
  private evicting = false;
  private started = false;
  private stopping?: Promise<StopResult>;

  private readonly resolveDone: () => void;
  private readonly rejectDone: (error: Error) => void;

  /** Resolves after stop(); rejects when a fatal report halted collection */
  readonly done: Promise<void>;

  constructor(private readonly options: SchedulerOptions) {
    this.now = options.now ?? (() => new Date());

    for (const source of options.sources) {
      this.sources.set(source.id, source);
      this.states.set(source.id, {
        status: source.enabled ? 'idle' : 'disabled',
        enabled: source.enabled,
        runs: 0,
      });
    }

    let resolveDone: () => void = () => undefined;
    let rejectDone: (error: Error) => void = () => undefined;
    this.done = new Promise<void>((resolve, reject) => {
      resolveDone = resolve;
      rejectDone = reject;
    });
    this.resolveDone = resolveDone;
    this.rejectDone = rejectDone;
    // Callers that never await `done` must not see an unhandled rejection
    void this.done.catch(error => log.debug('Scheduler finished with error', { error: describeError(error) }));
  }

  get isStopping(): boolean {
    return this.stopping !== undefined;
  }

  start(): void {
    if (this.started || this.stopping) return;
    this.started = true;

    for (const [feedId, state] of this.states) {
      if (state.enabled) this.schedule(feedId);
    }

    const { eviction } = this.options;
    if (eviction) {
      this.evictionTimer = setInterval(() => this.evict(), eviction.intervalMs);
    }

    log.info('Scheduler started', {
      feeds: this.states.size,
      enabled: [...this.states.values()].filter(state => state.enabled).length,
    });

    if (this.options.runOnStart ?? true) {
      for (const [feedId, state] of this.states) {
        if (state.enabled) this.trigger(feedId);
      }
    }
  }

  /**
   * Start a cycle for `feedId` now, unless it is running, disabled or
   * the scheduler is stopping. Timers and manual requests both land here.
   */
  trigger(feedId: string): TriggerResult {
    const source = this.sources.get(feedId);
    const state = this.states.get(feedId);
    if (!source || !state) return 'unknown';

    if (this.stopping) {
      this.recordSkip(feedId, 'stopping');
      return 'stopped';
    }
    if (state.status === 'disabled') {
      this.recordSkip(feedId, 'disabled');
      return 'disabled';
    }
    if (state.status === 'running') {
      this.recordSkip(feedId, 'overlap');
      return 'skipped';
    }

    state.status = 'running';
    state.runs++;
    state.lastStartedAt = this.now().toISOString();

    const abort = new AbortController();
    const settled = this.options
      .runCycle(source, { stopSignal: this.stopController.signal, abortSignal: abort.signal })
      .then(report => this.complete(feedId, report))
      .catch(error => {
        log.error('Cycle runner threw', { feedId, error: describeError(error) });
        this.finish(feedId);
      });

    this.inFlight.set(feedId, { abort, settled });
    return 'started';
  }

  enable(feedId: string): boolean {
    const state = this.states.get(feedId);
    if (!state) return false;

    state.enabled = true;
    if (state.status === 'disabled') state.status = 'idle';
    if (this.started && !this.stopping) this.schedule(feedId);

    log.info('Feed enabled', { feedId });
    return true;
  }

  /**
   * Disable a feed. A cycle already running finishes, then the feed
   * stays disabled.
   */
  disable(feedId: string): boolean {
    const state = this.states.get(feedId);
    if (!state) return false;

    state.enabled = false;
    if (state.status === 'idle') state.status = 'disabled';
    this.unschedule(feedId);

    log.info('Feed disabled', { feedId });
    return true;
  }

  snapshot(): FeedStatus[] {
    return [...this.states].map(([feedId, state]) => ({
      feedId,
      intervalSeconds: this.sources.get(feedId)?.intervalSeconds ?? 0,
      ...state,
    }));
  }

  state(feedId: string): Readonly<FeedRunState> | undefined {
    return this.states.get(feedId);
  }

  stop(): Promise<StopResult> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  // ============================================================
  // TRANSITIONS
  // ============================================================

  private complete(feedId: string, report: CycleReport): void {
    this.finish(feedId);
    this.options.telemetry.report(report);

    if (report.fatal) {
      const cause = report.error?.message ?? 'unknown cause';
      log.error('Fatal failure, stopping collection', { feedId, error: cause });
      this.rejectDone(new StoreError('Corrupt', `Feed "${feedId}" hit a fatal failure: ${cause}`));
      void this.stop();
    }
  }

  private finish(feedId: string): void {
    this.inFlight.delete(feedId);

    const state = this.states.get(feedId);
    if (!state) return;
    state.status = state.enabled ? 'idle' : 'disabled';
    state.lastFinishedAt = this.now().toISOString();
  }

  private recordSkip(feedId: string, reason: SkipReason): void {
    this.options.telemetry.skip({ feedId, at: this.now().toISOString(), reason });
  }

  private schedule(feedId: string): void {
    const source = this.sources.get(feedId);
    if (!source || this.timers.has(feedId)) return;

    const timer = setInterval(() => this.trigger(feedId), source.intervalSeconds * 1000);
    this.timers.set(feedId, timer);
  }

  private unschedule(feedId: string): void {
    const timer = this.timers.get(feedId);
    if (timer) clearInterval(timer);
    this.timers.delete(feedId);
  }

  private evict(): void {
    const { eviction } = this.options;
    if (!eviction || this.evicting || this.stopping) return;

    this.evicting = true;
    eviction
      .run()
      .then(removed => log.debug('Eviction pass finished', { removed }))
      .catch(error => log.error('Eviction pass failed', { error: describeError(error) }))
      .finally(() => {
        this.evicting = false;
      });
  }

  // ============================================================
  // SHUTDOWN
  // ============================================================

  private async shutdown(): Promise<StopResult> {
    for (const feedId of [...this.timers.keys()]) this.unschedule(feedId);
    if (this.evictionTimer) clearInterval(this.evictionTimer);

    this.stopController.abort(new Error('Scheduler stopping'));

    const running = [...this.inFlight.values()];
    log.info('Scheduler stopping', { running: running.length, gracePeriodMs: this.options.gracePeriodMs });

    if (running.length > 0) {
      let graceTimer: NodeJS.Timeout | undefined;
      const grace = new Promise<void>(resolve => {
        graceTimer = setTimeout(resolve, this.options.gracePeriodMs);
      });
      await Promise.race([Promise.all(running.map(entry => entry.settled)), grace]);
      clearTimeout(graceTimer);
    }

    const abandoned = [...this.inFlight.keys()];
    for (const feedId of abandoned) {
      this.inFlight.get(feedId)?.abort.abort(new Error('Shutdown grace period elapsed'));
    }

    if (abandoned.length > 0) {
      log.warn('Abandoned feeds still running after grace period', { feeds: abandoned });
    }

    log.info('Scheduler stopped');
    this.resolveDone();
    return { abandoned };
  }
}
