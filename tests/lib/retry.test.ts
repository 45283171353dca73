/**
 * Feedkeeper — Retry Policy Tests
 *
 * Tests for:
 * - Backoff delays
 * - Retry decisions
 * - Cancellable sleep
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { backoffDelay, shouldRetry, sleep, DEFAULT_RETRY_POLICY } from '../../src/lib/retry';
import type { RetryPolicy } from '../../src/lib/retry';

const noJitter: RetryPolicy = { maxAttempts: 4, baseDelayMs: 1000, maxDelayMs: 30_000, jitter: 0 };

describe('backoffDelay', () => {
  it('doubles the delay for each failed attempt', () => {
    expect(backoffDelay(1, noJitter)).toBe(1000);
    expect(backoffDelay(2, noJitter)).toBe(2000);
    expect(backoffDelay(3, noJitter)).toBe(4000);
  });

  it('caps the delay at maxDelayMs', () => {
    expect(backoffDelay(10, noJitter)).toBe(30_000);
  });

  it('returns 0 before any failure', () => {
    expect(backoffDelay(0, noJitter)).toBe(0);
  });

  it('randomizes only the jitter fraction', () => {
    const policy = { ...noJitter, jitter: 0.5 };
    expect(backoffDelay(1, policy, () => 0)).toBe(500);
    expect(backoffDelay(1, policy, () => 1)).toBe(1000);
    expect(backoffDelay(2, policy, () => 0.5)).toBe(1500);
  });

  it('clamps out-of-range random values', () => {
    const policy = { ...noJitter, jitter: 1 };
    expect(backoffDelay(1, policy, () => 7)).toBe(1000);
    expect(backoffDelay(1, policy, () => -3)).toBe(0);
  });
});

describe('shouldRetry', () => {
  it('allows retries until maxAttempts attempts were made', () => {
    expect(shouldRetry(1, DEFAULT_RETRY_POLICY)).toBe(true);
    expect(shouldRetry(3, DEFAULT_RETRY_POLICY)).toBe(true);
    expect(shouldRetry(4, DEFAULT_RETRY_POLICY)).toBe(false);
  });
});

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves true once the delay elapsed', async () => {
    vi.useFakeTimers();
    const waiting = sleep(100);
    await vi.advanceTimersByTimeAsync(100);
    await expect(waiting).resolves.toBe(true);
  });

  it('resolves false when aborted during the wait', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const waiting = sleep(10_000, controller.signal);
    await vi.advanceTimersByTimeAsync(50);
    controller.abort();
    await expect(waiting).resolves.toBe(false);
  });

  it('resolves false immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(10_000, controller.signal)).resolves.toBe(false);
  });
});
