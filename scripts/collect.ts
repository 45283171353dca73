/**
 * Feedkeeper — Collect Script
 *
 * Usage:
 *   npm start                             # Scheduler, runs until SIGINT/SIGTERM
 *   npm run collect                       # Every enabled feed once, then exit
 *   npm run collect -- --feed <id>        # One feed
 *   npm run collect -- --dry-run          # Memory store, no output files
 *   npm start -- --config ./feeds.json    # Other feeds file
 */

import 'dotenv/config';
import type { Server } from 'http';
import { logger } from '../src/lib/logger';
import { loadAppConfig, loadFeedSources } from '../src/lib/config';
import { ConfigError, describeError } from '../src/lib/errors';
import { createCollector } from '../src/collector';
import { startStatusServer } from '../src/server/status';

// ============================================================
// CONFIGURATION
// ============================================================

interface CollectOptions {
  once: boolean;
  dryRun: boolean;
  feedId?: string;
  configPath?: string;
}

function parseArgs(): CollectOptions {
  const args = process.argv.slice(2);
  const options: CollectOptions = {
    once: false,
    dryRun: false,
  };

  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if (args[i] === '--once') {
      options.once = true;
    } else if (args[i] === '--dry-run') {
      options.dryRun = true;
    } else if (args[i] === '--feed' && next) {
      options.feedId = next;
      i++;
    } else if (args[i] === '--config' && next) {
      options.configPath = next;
      i++;
    }
  }

  return options;
}

// ============================================================
// MAIN
// ============================================================

async function main(): Promise<void> {
  const options = parseArgs();
  const config = loadAppConfig();
  const sources = await loadFeedSources(options.configPath ?? config.feedsConfigPath);

  const selected = options.feedId ? sources.filter(source => source.id === options.feedId) : sources;
  if (selected.length === 0) {
    throw new ConfigError(`No feed with id "${options.feedId ?? ''}"`);
  }

  const collector = createCollector(config, selected, { dryRun: options.dryRun });

  if (options.once) {
    const enabled = options.feedId ? selected : selected.filter(source => source.enabled);
    logger.info('Running feeds once', { feeds: enabled.length, dryRun: options.dryRun });

    const reports = await collector.runOnce(enabled);
    await collector.close();

    const fatal = reports.filter(report => report.fatal);
    const totals = reports.reduce(
      (sum, report) => ({ new: sum.new + report.counts.new, failed: sum.failed + (report.outcome === 'failed' ? 1 : 0) }),
      { new: 0, failed: 0 }
    );
    logger.info('Collection finished', { feeds: reports.length, newItems: totals.new, failedFeeds: totals.failed });

    if (fatal.length > 0) {
      logger.error('Fatal store failure', {
        feeds: fatal.map(report => report.feedId),
        error: fatal[0]?.error?.message,
      });
      process.exit(1);
    }
    return;
  }

  const { scheduler, history } = collector;
  let server: Server | undefined;
  if (config.statusPort !== undefined) {
    server = startStatusServer({ scheduler, history }, config.statusPort);
  }

  const shutdown = (signal: string) => {
    logger.info('Shutdown requested', { signal });
    scheduler
      .stop()
      .then(result => {
        if (result.abandoned.length > 0) {
          logger.warn('Feeds abandoned at shutdown', { feeds: result.abandoned });
        }
      })
      .catch(error => logger.error('Shutdown failed', { error: describeError(error) }));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  scheduler.start();

  try {
    await scheduler.done;
  } finally {
    // Fatal path: make sure in-flight work is wound down before exiting
    await scheduler.stop();
    server?.close();
    await collector.close();
  }
}

main().catch(error => {
  logger.error('Collector failed', { error: describeError(error) });
  process.exit(1);
});
