/**
 * Feedkeeper — Telemetry
 *
 * Every cycle report and skip event passes through a TelemetrySink.
 * ReportHistory logs them and keeps a bounded per-feed history for the
 * status endpoint.
 */

import type { CycleReport, SkipEvent, SkipReason } from '../types';
import { logger } from '../lib/logger';
import type { Logger } from '../lib/logger';

export interface TelemetrySink {
  report(report: CycleReport): void;
  skip(event: SkipEvent): void;
}

export interface FeedHistory {
  reports: CycleReport[];
  skips: Record<SkipReason, number>;
  lastSkip?: SkipEvent;
}

const DEFAULT_LIMIT = 20;

export class ReportHistory implements TelemetrySink {
  private readonly feeds = new Map<string, FeedHistory>();

  constructor(
    private readonly limit: number = DEFAULT_LIMIT,
    private readonly log: Logger = logger.child({ component: 'telemetry' })
  ) {}

  report(report: CycleReport): void {
    const history = this.historyFor(report.feedId);
    history.reports.push(report);
    if (history.reports.length > this.limit) {
      history.reports.splice(0, history.reports.length - this.limit);
    }

    const context = {
      feedId: report.feedId,
      cycleId: report.cycleId,
      outcome: report.outcome,
      durationMs: report.durationMs,
      attempts: report.attempts,
      httpStatus: report.httpStatus,
      ...report.counts,
      downgrades: report.downgrades.length,
      error: report.error,
    };

    if (report.fatal) {
      this.log.error('Cycle failed fatally', context);
    } else if (report.outcome === 'failed' || report.error) {
      this.log.warn('Cycle failed', context);
    } else {
      this.log.info('Cycle completed', context);
    }
  }

  skip(event: SkipEvent): void {
    const history = this.historyFor(event.feedId);
    history.skips[event.reason]++;
    history.lastSkip = event;
    this.log.info('Cycle skipped', { feedId: event.feedId, reason: event.reason });
  }

  lastReport(feedId: string): CycleReport | undefined {
    const reports = this.feeds.get(feedId)?.reports;
    return reports?.[reports.length - 1];
  }

  get(feedId: string): FeedHistory | undefined {
    return this.feeds.get(feedId);
  }

  all(): CycleReport[] {
    return [...this.feeds.values()].flatMap(history => history.reports);
  }

  private historyFor(feedId: string): FeedHistory {
    let history = this.feeds.get(feedId);
    if (!history) {
      history = { reports: [], skips: { overlap: 0, disabled: 0, stopping: 0 } };
      this.feeds.set(feedId, history);
    }
    return history;
  }
}
