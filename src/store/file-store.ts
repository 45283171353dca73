/**
 * Feedkeeper — File Dedup Store
 *
 * One JSON partition file per feed under a directory. A partition is
 * loaded on first use and rewritten whole on every change, through a
 * temp file and a rename. Operations on the same feed run one at a time.
 */

import { mkdir, readdir, readFile, rename, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { SeenStore } from './seen-store';
import { StoreError, describeError } from '../lib/errors';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'file-store' });

const PARTITION_SUFFIX = '.json';

const PartitionSchema = z.object({
  version: z.literal(1),
  feedId: z.string(),
  records: z.record(z.string(), z.string().datetime()),
});
type PartitionFile = z.infer<typeof PartitionSchema>;

function errorCode(error: unknown): unknown {
  return error instanceof Error && 'code' in error ? error.code : undefined;
}

export class FileSeenStore implements SeenStore {
  private readonly partitions = new Map<string, Map<string, string>>();
  private readonly queues = new Map<string, Promise<unknown>>();
  private tempCounter = 0;

  constructor(private readonly dir: string) {}

  async hasSeen(feedId: string, fingerprint: string): Promise<boolean> {
    return this.exclusive(feedId, async () => {
      const partition = await this.load(feedId);
      return partition.has(fingerprint);
    });
  }

  async markSeen(feedId: string, fingerprint: string, at: Date): Promise<void> {
    await this.exclusive(feedId, async () => {
      const partition = await this.load(feedId);
      if (partition.has(fingerprint)) return;

      partition.set(fingerprint, at.toISOString());
      try {
        await this.persist(feedId, partition);
      } catch (error) {
        partition.delete(fingerprint);
        throw error;
      }
    });
  }

  async evictOlderThan(cutoff: Date): Promise<number> {
    const feedIds = new Set<string>(this.partitions.keys());
    for (const feedId of await this.listPartitions()) feedIds.add(feedId);

    let removed = 0;
    for (const feedId of feedIds) {
      removed += await this.exclusive(feedId, async () => {
        const partition = await this.load(feedId);
        const before = new Map(partition);
        let count = 0;

        for (const [fingerprint, firstSeen] of partition) {
          if (Date.parse(firstSeen) < cutoff.getTime()) {
            partition.delete(fingerprint);
            count++;
          }
        }

        if (count === 0) return 0;

        try {
          await this.persist(feedId, partition);
        } catch (error) {
          this.partitions.set(feedId, before);
          throw error;
        }
        return count;
      });
    }

    if (removed > 0) {
      log.info('Evicted seen records', { removed, cutoff: cutoff.toISOString() });
    }
    return removed;
  }

  async close(): Promise<void> {
    await Promise.all(this.queues.values());
  }

  // ============================================================
  // PARTITION I/O
  // ============================================================

  private pathFor(feedId: string): string {
    return join(this.dir, `${encodeURIComponent(feedId)}${PARTITION_SUFFIX}`);
  }

  private async load(feedId: string): Promise<Map<string, string>> {
    const cached = this.partitions.get(feedId);
    if (cached) return cached;

    const path = this.pathFor(feedId);
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        const empty = new Map<string, string>();
        this.partitions.set(feedId, empty);
        return empty;
      }
      throw new StoreError('Unavailable', `Cannot read ${path}: ${describeError(error)}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StoreError('Corrupt', `Partition ${path} is not valid JSON`, { cause: error });
    }

    const parsed = PartitionSchema.safeParse(json);
    if (!parsed.success || parsed.data.feedId !== feedId) {
      throw new StoreError('Corrupt', `Partition ${path} does not match the expected format`);
    }

    const partition = new Map(Object.entries(parsed.data.records));
    this.partitions.set(feedId, partition);
    return partition;
  }

  private async persist(feedId: string, partition: Map<string, string>): Promise<void> {
    const path = this.pathFor(feedId);
    const temp = `${path}.${process.pid}.${++this.tempCounter}.tmp`;
    const file: PartitionFile = {
      version: 1,
      feedId,
      records: Object.fromEntries(partition),
    };

    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(temp, JSON.stringify(file), 'utf-8');
      await rename(temp, path);
    } catch (error) {
      await unlink(temp).catch((cleanupError: unknown) => {
        log.debug('Temp partition cleanup failed', { path: temp, error: describeError(cleanupError) });
      });
      throw new StoreError('Unavailable', `Cannot write ${path}: ${describeError(error)}`, { cause: error });
    }
  }

  private async listPartitions(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return [];
      throw new StoreError('Unavailable', `Cannot list ${this.dir}: ${describeError(error)}`, { cause: error });
    }

    return names
      .filter(name => name.endsWith(PARTITION_SUFFIX))
      .map(name => decodeURIComponent(name.slice(0, -PARTITION_SUFFIX.length)));
  }

  /**
   * Run `task` after every earlier task for the same feed has settled.
   */
  private exclusive<T>(feedId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(feedId) ?? Promise.resolve();
    const next = previous.then(task, task);
    const settled = next.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(feedId, settled);
    void settled.then(() => {
      if (this.queues.get(feedId) === settled) this.queues.delete(feedId);
    });
    return next;
  }
}
