/**
 * Feedkeeper — File Store Tests
 *
 * Tests for:
 * - Persisted partitions and write ordering
 * - Eviction
 * - Corrupt and unavailable storage
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileSeenStore } from '../../src/store';
import { StoreError } from '../../src/lib/errors';

describe('FileSeenStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'feedkeeper-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('persists marks across instances', async () => {
    const first = new FileSeenStore(dir);
    await first.markSeen('blog', 'fp1', new Date('2024-04-01T00:00:00Z'));

    const second = new FileSeenStore(dir);
    expect(await second.hasSeen('blog', 'fp1')).toBe(true);
    expect(await second.hasSeen('blog', 'fp2')).toBe(false);
    expect(await second.hasSeen('other', 'fp1')).toBe(false);
  });

  it('writes one partition file per feed', async () => {
    const store = new FileSeenStore(dir);
    await store.markSeen('blog', 'fp1', new Date('2024-04-01T00:00:00Z'));
    await store.markSeen('news/world', 'fp2', new Date('2024-04-01T00:00:00Z'));

    expect((await readdir(dir)).sort()).toEqual(['blog.json', 'news%2Fworld.json']);

    const partition = JSON.parse(await readFile(join(dir, 'blog.json'), 'utf-8'));
    expect(partition).toEqual({
      version: 1,
      feedId: 'blog',
      records: { fp1: '2024-04-01T00:00:00.000Z' },
    });
  });

  it('keeps the first-seen time on repeated marks', async () => {
    const store = new FileSeenStore(dir);
    await store.markSeen('blog', 'fp1', new Date('2024-04-01T00:00:00Z'));
    await store.markSeen('blog', 'fp1', new Date('2024-04-02T00:00:00Z'));

    const partition = JSON.parse(await readFile(join(dir, 'blog.json'), 'utf-8'));
    expect(partition.records).toEqual({ fp1: '2024-04-01T00:00:00.000Z' });
  });

  it('serializes concurrent marks on the same feed', async () => {
    const store = new FileSeenStore(dir);
    const at = new Date('2024-04-01T00:00:00Z');

    await Promise.all(Array.from({ length: 20 }, (_, i) => store.markSeen('blog', `fp${i}`, at)));

    const partition = JSON.parse(await readFile(join(dir, 'blog.json'), 'utf-8'));
    expect(Object.keys(partition.records)).toHaveLength(20);
    expect(await readdir(dir)).toEqual(['blog.json']);
  });

  it('evicts old records across all partitions on disk', async () => {
    const writer = new FileSeenStore(dir);
    await writer.markSeen('a', 'old', new Date('2024-01-01T00:00:00Z'));
    await writer.markSeen('a', 'new', new Date('2024-04-01T00:00:00Z'));
    await writer.markSeen('b', 'old', new Date('2024-01-05T00:00:00Z'));

    const store = new FileSeenStore(dir);
    const removed = await store.evictOlderThan(new Date('2024-03-01T00:00:00Z'));

    expect(removed).toBe(2);
    expect(await store.hasSeen('a', 'old')).toBe(false);
    expect(await store.hasSeen('a', 'new')).toBe(true);

    const partition = JSON.parse(await readFile(join(dir, 'b.json'), 'utf-8'));
    expect(partition.records).toEqual({});
  });

  it('returns 0 when the directory does not exist yet', async () => {
    const store = new FileSeenStore(join(dir, 'missing'));
    expect(await store.evictOlderThan(new Date())).toBe(0);
  });

  it('reports an unreadable partition as Corrupt', async () => {
    await writeFile(join(dir, 'blog.json'), '{not json');
    const store = new FileSeenStore(dir);

    await expect(store.hasSeen('blog', 'fp1')).rejects.toMatchObject({ type: 'StoreError', kind: 'Corrupt' });
  });

  it('reports a partition with the wrong shape as Corrupt', async () => {
    await writeFile(join(dir, 'blog.json'), JSON.stringify({ version: 2, records: [] }));
    const store = new FileSeenStore(dir);

    const error = await store.hasSeen('blog', 'fp1').catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(StoreError);
    if (error instanceof StoreError) {
      expect(error.kind).toBe('Corrupt');
      expect(error.fatal).toBe(true);
    }
  });

  it('reports I/O failures as Unavailable', async () => {
    const blocker = join(dir, 'blocker');
    await writeFile(blocker, 'not a directory');
    const store = new FileSeenStore(join(blocker, 'seen'));

    await expect(store.hasSeen('blog', 'fp1')).rejects.toMatchObject({ kind: 'Unavailable' });
  });

  it('forgets a mark whose write failed', async () => {
    const target = join(dir, 'seen');
    await mkdir(target);
    const store = new FileSeenStore(target);
    expect(await store.hasSeen('blog', 'fp1')).toBe(false);

    // Replace the directory with a file so the write fails
    await rm(target, { recursive: true });
    await writeFile(target, 'blocker');

    await expect(store.markSeen('blog', 'fp1', new Date())).rejects.toMatchObject({ kind: 'Unavailable' });
    expect(await store.hasSeen('blog', 'fp1')).toBe(false);
  });
});
