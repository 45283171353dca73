/**
 * Feedkeeper — JSONL Sink
 *
 * Appends each item to OUTPUT_DIR/YYYY-MM-DD.jsonl, one file per UTC day
 * of emission.
 */

import { appendFile, mkdir, readdir, unlink } from 'fs/promises';
import { join } from 'path';
import type { FeedItem } from '../types';
import type { ItemSink } from './sink';
import { serializeItem } from './sink';
import { SinkError, describeError } from '../lib/errors';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'jsonl-sink' });

const DAILY_FILE = /^(\d{4}-\d{2}-\d{2})\.jsonl$/;

export function dailyFileName(at: Date): string {
  return `${at.toISOString().slice(0, 10)}.jsonl`;
}

export class JsonlFileSink implements ItemSink {
  private dirReady = false;

  constructor(
    private readonly dir: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async emit(item: FeedItem): Promise<void> {
    const path = join(this.dir, dailyFileName(this.now()));
    try {
      if (!this.dirReady) {
        await mkdir(this.dir, { recursive: true });
        this.dirReady = true;
      }
      await appendFile(path, serializeItem(item), 'utf-8');
    } catch (error) {
      throw new SinkError(`Cannot append to ${path}: ${describeError(error)}`, { cause: error });
    }
  }

  /**
   * Remove daily files whose whole UTC day lies before `cutoff`. Files
   * that do not follow the daily naming are left alone.
   */
  async prune(cutoff: Date): Promise<number> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (error) {
      if (isNotFound(error)) return 0;
      throw new SinkError(`Cannot list ${this.dir}: ${describeError(error)}`, { cause: error });
    }

    const cutoffDay = cutoff.toISOString().slice(0, 10);
    let removed = 0;

    for (const name of names.sort()) {
      const day = DAILY_FILE.exec(name)?.[1];
      if (day === undefined || day >= cutoffDay) continue;

      try {
        await unlink(join(this.dir, name));
        removed++;
      } catch (error) {
        if (isNotFound(error)) continue;
        throw new SinkError(`Cannot remove ${name}: ${describeError(error)}`, { cause: error });
      }
    }

    if (removed > 0) log.info('Pruned old output files', { dir: this.dir, removed, before: cutoffDay });
    return removed;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
