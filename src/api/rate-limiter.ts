/**
 * Per-client request limiting with two interchangeable backends.
 *
 * - SlidingWindowRateLimiter keeps every request timestamp inside the trailing
 *   window in process memory. Exact, but private to one process.
 * - SharedCounterRateLimiter increments a TTL'd counter in a shared store
 *   (Redis in production). Shared across processes, but a fixed-window
 *   approximation: a burst straddling a window boundary can pass up to 2×max.
 *
 * The backend is chosen once at startup by configuration.
 */

import { logger } from "../config/logger.js";

export interface RateLimiter {
  /** Backend name, for logs and status output. */
  readonly backend: "memory" | "shared";
  /** Count one request from `clientId`. Resolves true when it must be rejected. */
  isLimited(clientId: string): Promise<boolean>;
}

export interface RateLimitPolicy {
  /** Requests allowed per window. */
  max: number;
  /** Window length in seconds. */
  windowSeconds: number;
}

// ---------------------------------------------------------------------------
// In-memory sliding window
// ---------------------------------------------------------------------------

export class SlidingWindowRateLimiter implements RateLimiter {
  readonly backend = "memory";
  private readonly windowMs: number;

  /**
   * @param hits - per-client timestamps (ms), oldest first. Owned by this
   *   limiter from construction on; pass one in only to observe it in tests.
   */
  constructor(
    private readonly policy: RateLimitPolicy,
    private readonly hits: Map<string, number[]> = new Map(),
    private readonly now: () => number = Date.now,
  ) {
    this.windowMs = policy.windowSeconds * 1000;
  }

  // Synchronous body: trim, check and append cannot interleave with another
  // request from the same client.
  async isLimited(clientId: string): Promise<boolean> {
    const now = this.now();
    const cutoff = now - this.windowMs;
    const timestamps = this.hits.get(clientId) ?? [];

    let expired = 0;
    while (expired < timestamps.length && timestamps[expired] <= cutoff) {
      expired++;
    }
    if (expired > 0) timestamps.splice(0, expired);

    if (timestamps.length >= this.policy.max) {
      this.hits.set(clientId, timestamps);
      return true;
    }

    timestamps.push(now);
    this.hits.set(clientId, timestamps);
    return false;
  }

  /** Drop clients with no request inside the window. Returns how many were removed. */
  prune(): number {
    const cutoff = this.now() - this.windowMs;
    let removed = 0;
    for (const [clientId, timestamps] of this.hits) {
      const newest = timestamps[timestamps.length - 1];
      if (newest === undefined || newest <= cutoff) {
        this.hits.delete(clientId);
        removed++;
      }
    }
    return removed;
  }

  /** Clients currently tracked. */
  get size(): number {
    return this.hits.size;
  }
}

// ---------------------------------------------------------------------------
// Shared counter (fixed window)
// ---------------------------------------------------------------------------

/** Atomic increment-with-expiry, implemented by a store every process can reach. */
export interface SharedCounterStore {
  /**
   * Increment `key` and return the new value. The key expires `ttlSeconds`
   * after its first increment.
   */
  increment(key: string, ttlSeconds: number): Promise<number>;
}

export interface SharedCounterRateLimiterOptions {
  /** Upper bound on one store round trip before failing open. */
  timeoutMs: number;
  /** Counter key prefix (default "rate:"). */
  keyPrefix?: string;
}

class CounterTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Shared counter did not answer within ${timeoutMs}ms`);
    this.name = "CounterTimeoutError";
  }
}

export class SharedCounterRateLimiter implements RateLimiter {
  readonly backend = "shared";
  private readonly keyPrefix: string;

  constructor(
    private readonly store: SharedCounterStore,
    private readonly policy: RateLimitPolicy,
    private readonly opts: SharedCounterRateLimiterOptions,
  ) {
    this.keyPrefix = opts.keyPrefix ?? "rate:";
  }

  /** Fails OPEN: store errors and timeouts let the request through. */
  async isLimited(clientId: string): Promise<boolean> {
    try {
      const count = await this.withTimeout(this.store.increment(`${this.keyPrefix}${clientId}`, this.policy.windowSeconds));
      return count > this.policy.max;
    } catch (err) {
      logger.warn("Shared rate-limit store unavailable; allowing request", {
        clientId,
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }

  private async withTimeout<T>(work: Promise<T>): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new CounterTimeoutError(this.opts.timeoutMs)), this.opts.timeoutMs);
    });
    try {
      return await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
