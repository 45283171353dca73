/**
 * Feedkeeper — Status Server
 *
 * Small Express app for operators:
 * - GET  /health          liveness
 * - GET  /status          per-feed run state, skips and last report
 * - POST /feeds/:id/run   manual "run now" trigger
 */

import express, { Request, Response, NextFunction } from 'express';
import type { Server } from 'http';
import type { Scheduler } from '../scheduler/scheduler';
import type { ReportHistory } from '../telemetry/history';
import { describeError } from '../lib/errors';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'status-server' });

export interface StatusAppDeps {
  scheduler: Scheduler;
  history: ReportHistory;
  now?: () => Date;
}

export function createStatusApp({ scheduler, history, now = () => new Date() }: StatusAppDeps): express.Express {
  const app = express();

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: scheduler.isStopping ? 'stopping' : 'ok',
      timestamp: now().toISOString(),
    });
  });

  app.get('/status', (_req: Request, res: Response) => {
    const feeds = scheduler.snapshot().map(feed => {
      const feedHistory = history.get(feed.feedId);
      return {
        ...feed,
        skips: feedHistory?.skips ?? { overlap: 0, disabled: 0, stopping: 0 },
        lastReport: history.lastReport(feed.feedId) ?? null,
      };
    });

    res.json({ stopping: scheduler.isStopping, feeds });
  });

  app.post('/feeds/:id/run', (req: Request, res: Response) => {
    const feedId = req.params.id ?? '';
    const result = scheduler.trigger(feedId);

    if (result === 'unknown') {
      res.status(404).json({ error: `Unknown feed "${feedId}"` });
      return;
    }
    if (result === 'stopped') {
      res.status(503).json({ feedId, result });
      return;
    }

    log.info('Manual trigger', { feedId, result });
    res.status(202).json({ feedId, result });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    log.error('Unhandled status server error', { error: describeError(err) });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export function startStatusServer(deps: StatusAppDeps, port: number): Server {
  return createStatusApp(deps).listen(port, () => {
    log.info(`Status server listening on port ${port}`);
  });
}
