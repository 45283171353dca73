/**
 * Feedkeeper — Retry Policy
 *
 * Backoff is a pure function of the attempt number so it can be tested
 * without timers. The fetcher consumes it; nothing else sleeps ad hoc.
 */

export interface RetryPolicy {
  /** Total attempts, including the first one */
  maxAttempts: number;
  /** Delay before the second attempt, before jitter */
  baseDelayMs: number;
  /** Upper bound for any single wait */
  maxDelayMs: number;
  /** Fraction of the delay that is randomized (0 = none, 1 = full jitter) */
  jitter: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  jitter: 0.5,
};

/**
 * Delay to wait after `failedAttempts` attempts have failed.
 *
 *   exp   = min(maxDelay, base * 2^(failedAttempts - 1))
 *   delay = exp * (1 - jitter) + exp * jitter * random
 *
 * `random` is injected so callers (and tests) control the jitter.
 */
export function backoffDelay(
  failedAttempts: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  if (failedAttempts < 1) return 0;

  const exponential = Math.min(
    policy.maxDelayMs,
    policy.baseDelayMs * 2 ** (failedAttempts - 1)
  );
  const jitter = Math.min(1, Math.max(0, policy.jitter));
  const roll = Math.min(1, Math.max(0, random()));

  return Math.round(exponential * (1 - jitter) + exponential * jitter * roll);
}

export function shouldRetry(failedAttempts: number, policy: RetryPolicy): boolean {
  return failedAttempts < policy.maxAttempts;
}

// ============================================================
// CANCELLABLE WAIT
// ============================================================

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<boolean>;

/**
 * Wait `ms`, resolving `true` when the full delay elapsed and `false`
 * when `signal` aborted first. Never rejects.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<boolean>(resolve => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
