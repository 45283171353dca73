/**
 * Feedkeeper — Status Server Tests
 *
 * Tests for:
 * - Health and status endpoints
 * - Manual run triggers
 */

import { describe, it, expect, afterEach } from 'vitest';
import request from 'supertest';
import { createStatusApp } from '../../src/server/status';
import { Scheduler } from '../../src/scheduler/scheduler';
import { ReportHistory } from '../../src/telemetry/history';
import { emptyCounts } from '../../src/types';
import type { CycleReport, FeedSource } from '../../src/types';

const NOW = new Date('2024-04-01T12:00:00.000Z');

function feed(id: string, enabled = true): FeedSource {
  return { id, url: `https://example.com/${id}.xml`, intervalSeconds: 3600, headers: {}, enabled };
}

function makeReport(feedId: string): CycleReport {
  return {
    cycleId: `cycle-${feedId}`,
    feedId,
    startedAt: NOW.toISOString(),
    finishedAt: NOW.toISOString(),
    durationMs: 12,
    outcome: 'success',
    counts: { ...emptyCounts(), fetched: 2, parsed: 2, new: 2 },
    attempts: 1,
    httpStatus: 200,
    bytes: 512,
    downgrades: [],
    fatal: false,
  };
}

function setup() {
  const history = new ReportHistory();
  const scheduler = new Scheduler({
    sources: [feed('news'), feed('paused', false)],
    runCycle: async source => makeReport(source.id),
    telemetry: history,
    gracePeriodMs: 1000,
    runOnStart: false,
    now: () => NOW,
  });
  const app = createStatusApp({ scheduler, history, now: () => NOW });
  return { app, scheduler, history };
}

describe('status server', () => {
  let scheduler: Scheduler | undefined;

  afterEach(async () => {
    await scheduler?.stop();
    scheduler = undefined;
  });

  it('GET /health reports ok while running', async () => {
    const setupResult = setup();
    scheduler = setupResult.scheduler;

    const res = await request(setupResult.app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok', timestamp: '2024-04-01T12:00:00.000Z' });
  });

  it('GET /health reports stopping after stop()', async () => {
    const setupResult = setup();
    scheduler = setupResult.scheduler;
    await scheduler.stop();

    const res = await request(setupResult.app).get('/health');

    expect(res.body.status).toBe('stopping');
  });

  it('GET /status lists every feed with its last report', async () => {
    const setupResult = setup();
    scheduler = setupResult.scheduler;
    setupResult.history.report(makeReport('news'));

    const res = await request(setupResult.app).get('/status');

    expect(res.status).toBe(200);
    expect(res.body.stopping).toBe(false);
    expect(res.body.feeds).toHaveLength(2);
    expect(res.body.feeds[0]).toMatchObject({
      feedId: 'news',
      status: 'idle',
      enabled: true,
      intervalSeconds: 3600,
      skips: { overlap: 0, disabled: 0, stopping: 0 },
      lastReport: { cycleId: 'cycle-news', outcome: 'success' },
    });
    expect(res.body.feeds[1]).toMatchObject({ feedId: 'paused', status: 'disabled', lastReport: null });
  });

  it('POST /feeds/:id/run starts a cycle', async () => {
    const setupResult = setup();
    scheduler = setupResult.scheduler;

    const res = await request(setupResult.app).post('/feeds/news/run');

    expect(res.status).toBe(202);
    expect(res.body).toEqual({ feedId: 'news', result: 'started' });
    expect(scheduler.state('news')?.runs).toBe(1);
  });

  it('POST /feeds/:id/run reports a disabled feed', async () => {
    const setupResult = setup();
    scheduler = setupResult.scheduler;

    const res = await request(setupResult.app).post('/feeds/paused/run');

    expect(res.status).toBe(202);
    expect(res.body).toEqual({ feedId: 'paused', result: 'disabled' });
    expect(setupResult.history.get('paused')?.skips.disabled).toBe(1);
  });

  it('POST /feeds/:id/run returns 404 for an unknown feed', async () => {
    const setupResult = setup();
    scheduler = setupResult.scheduler;

    const res = await request(setupResult.app).post('/feeds/nope/run');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Unknown feed "nope"' });
  });

  it('POST /feeds/:id/run returns 503 once stopping', async () => {
    const setupResult = setup();
    scheduler = setupResult.scheduler;
    await scheduler.stop();

    const res = await request(setupResult.app).post('/feeds/news/run');

    expect(res.status).toBe(503);
    expect(res.body).toEqual({ feedId: 'news', result: 'stopped' });
  });
});
