/**
 * Feedkeeper — Supabase Store Tests
 *
 * Tests for:
 * - Client construction
 * - PostgREST queries for lookups, marks and eviction
 * - Error mapping
 *
 * The client talks to an in-process fetch stand-in that records each
 * PostgREST request and answers with a canned response.
 */

import { describe, it, expect, vi } from 'vitest';
import { createServiceClient } from '../../src/db/client';
import { SupabaseSeenStore, createSeenStore } from '../../src/store';
import { StoreError } from '../../src/lib/errors';

interface RecordedRequest {
  method: string;
  url: URL;
  headers: Headers;
  body?: string;
}

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

function createStore(respond: () => Response | Promise<Response>) {
  const requests: RecordedRequest[] = [];
  const fetchMock = vi.fn<typeof fetch>(async (input, init) => {
    requests.push({
      method: init?.method ?? 'GET',
      url: new URL(urlOf(input)),
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : undefined,
    });
    return respond();
  });

  const client = createServiceClient({
    url: 'http://localhost:54321',
    serviceRoleKey: 'test-secret',
    fetch: fetchMock,
  });

  return { store: new SupabaseSeenStore(client), requests };
}

function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

describe('createServiceClient', () => {
  it('builds a client without a global WebSocket', () => {
    const store = createSeenStore({
      backend: 'supabase',
      dir: './data/seen',
      retentionDays: 30,
      evictionIntervalMs: 3_600_000,
      supabaseUrl: 'http://localhost:54321',
      supabaseKey: 'test-secret',
    });

    expect(store).toBeInstanceOf(SupabaseSeenStore);
  });

  it('raises Unavailable when the client cannot be built', () => {
    const build = () => createServiceClient({ url: '', serviceRoleKey: 'test-secret' });

    expect(build).toThrow(StoreError);
    expect(build).toThrow('Could not create Supabase client');
  });
});

describe('SupabaseSeenStore', () => {
  it('queries seen_items by feed and fingerprint', async () => {
    const { store, requests } = createStore(() => json([{ fingerprint: 'fp1' }]));

    expect(await store.hasSeen('blog', 'fp1')).toBe(true);

    const [request] = requests;
    expect(request?.method).toBe('GET');
    expect(request?.url.pathname).toBe('/rest/v1/seen_items');
    expect(request?.url.searchParams.get('feed_id')).toBe('eq.blog');
    expect(request?.url.searchParams.get('fingerprint')).toBe('eq.fp1');
    expect(request?.url.searchParams.get('limit')).toBe('1');
  });

  it('returns false when no row matches', async () => {
    const { store } = createStore(() => json([]));
    expect(await store.hasSeen('blog', 'fp1')).toBe(false);
  });

  it('upserts marks without overwriting the first-seen time', async () => {
    const { store, requests } = createStore(() => new Response(null, { status: 201 }));

    await store.markSeen('blog', 'fp1', new Date('2024-04-01T00:00:00Z'));

    const [request] = requests;
    expect(request?.method).toBe('POST');
    expect(request?.url.searchParams.get('on_conflict')).toBe('feed_id,fingerprint');
    expect(request?.headers.get('prefer')).toContain('resolution=ignore-duplicates');
    expect(JSON.parse(request?.body ?? 'null')).toEqual({
      feed_id: 'blog',
      fingerprint: 'fp1',
      first_seen_at: '2024-04-01T00:00:00.000Z',
    });
  });

  it('deletes rows older than the cutoff and returns the count', async () => {
    const { store, requests } = createStore(
      () => new Response(null, { status: 200, headers: { 'Content-Range': '*/3' } })
    );

    const removed = await store.evictOlderThan(new Date('2024-03-01T00:00:00Z'));

    expect(removed).toBe(3);
    const [request] = requests;
    expect(request?.method).toBe('DELETE');
    expect(request?.url.searchParams.get('first_seen_at')).toBe('lt.2024-03-01T00:00:00.000Z');
    expect(request?.headers.get('prefer')).toContain('count=exact');
  });

  it('maps a missing table to Corrupt', async () => {
    const { store } = createStore(() =>
      json({ code: '42P01', message: 'relation "public.seen_items" does not exist', details: null, hint: null }, 404)
    );

    await expect(store.hasSeen('blog', 'fp1')).rejects.toMatchObject({ type: 'StoreError', kind: 'Corrupt' });
  });

  it('maps other errors to Unavailable', async () => {
    const { store } = createStore(() =>
      json({ code: 'PGRST000', message: 'Could not connect to the database', details: null, hint: null }, 503)
    );

    await expect(store.markSeen('blog', 'fp1', new Date())).rejects.toMatchObject({ kind: 'Unavailable' });
  });

  it('maps transport failures to Unavailable', async () => {
    const { store } = createStore(() => {
      throw new TypeError('fetch failed');
    });

    await expect(store.hasSeen('blog', 'fp1')).rejects.toMatchObject({ kind: 'Unavailable' });
  });
});
