/**
 * Feedkeeper — Concurrency Helpers
 *
 * A counting semaphore for bounding simultaneous fetches, and signal
 * plumbing for cancellation.
 */

// ============================================================
// SEMAPHORE
// ============================================================

export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.available = capacity;
  }

  get inUse(): number {
    return this.capacity - this.available;
  }

  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Resolve with a release function once a permit is free.
   * Rejects with the signal's reason if it aborts while waiting.
   */
  acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    if (this.available > 0) {
      this.available--;
      return Promise.resolve(this.releaser());
    }

    return new Promise((resolve, reject) => {
      const grant = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve(this.releaser());
      };

      const onAbort = () => {
        const index = this.waiters.indexOf(grant);
        if (index !== -1) this.waiters.splice(index, 1);
        reject(abortReason(signal));
      };

      this.waiters.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        // Permit passes straight to the next waiter
        next();
      } else {
        this.available++;
      }
    };
  }
}

// ============================================================
// SIGNALS
// ============================================================

export function abortReason(signal?: AbortSignal): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason;
  return new Error(reason === undefined ? 'Aborted' : String(reason));
}

/**
 * Controller that aborts when any of `parents` aborts, carrying the
 * parent's reason. `dispose` detaches the listeners.
 */
export function linkedController(
  ...parents: Array<AbortSignal | undefined>
): { controller: AbortController; dispose: () => void } {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  for (const parent of parents) {
    if (!parent) continue;

    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }

    const onAbort = () => controller.abort(parent.reason);
    parent.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => parent.removeEventListener('abort', onAbort));
  }

  return {
    controller,
    dispose: () => cleanups.forEach(cleanup => cleanup()),
  };
}
