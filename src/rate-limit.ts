import { performance } from 'node:perf_hooks';
import type { RuntimeConfig } from './config.ts';
import { invariant } from './invariant.ts';
import { KeyedLock } from './keyed-lock.ts';
import type { ClientKey, RateLimitSnapshot, Timestamp } from './types.ts';

type Clock = () => Timestamp;

type Decision = {
  allowed: boolean;
  size: number;
  oldest: Timestamp;
  at: Timestamp;
};

/**
 * Sliding-window log limiter. Each key keeps the timestamps of its admitted
 * requests inside the trailing window, so membership is the half-open
 * interval (now - window, now].
 */
export class RateLimiter {
  private readonly windows = new Map<ClientKey, Timestamp[]>();
  private readonly lock = new KeyedLock();
  private readonly windowMs: number;

  constructor(
    private readonly config: Pick<RuntimeConfig, 'rateLimitCapacity' | 'rateLimitWindowSeconds'>,
    private readonly clock: Clock = () => performance.now(),
  ) {
    assertLimits(config.rateLimitCapacity, config.rateLimitWindowSeconds * 1000);
    this.windowMs = config.rateLimitWindowSeconds * 1000;
  }

  async admit(key: ClientKey, now: Timestamp, capacity: number, windowMs: number): Promise<boolean> {
    assertLimits(capacity, windowMs);
    const decision = await this.lock.run(key, () => this.decide(key, now, capacity, windowMs));
    return decision.allowed;
  }

  /**
   * Admission against the configured limits. The clock is read inside the
   * key's critical section so timestamps enter each window in order.
   */
  async evaluate(key: ClientKey, now?: Timestamp): Promise<RateLimitSnapshot> {
    const capacity = this.config.rateLimitCapacity;
    const decision = await this.lock.run(key, () =>
      this.decide(key, now ?? this.clock(), capacity, this.windowMs),
    );

    const retryAfterMs = decision.allowed ? 0 : decision.oldest + this.windowMs - decision.at;
    return {
      allowed: decision.allowed,
      remaining: Math.max(0, capacity - decision.size),
      limit: capacity,
      window_seconds: this.config.rateLimitWindowSeconds,
      retry_after_seconds: Math.max(decision.allowed ? 0 : 1, Math.ceil(retryAfterMs / 1000)),
    };
  }

  /** Drops keys whose entries have all left the window; returns how many went. */
  async sweep(now?: Timestamp, windowMs: number = this.windowMs): Promise<number> {
    invariant(windowMs > 0, `rate-limit window must be positive, got ${windowMs}`);
    let evicted = 0;
    for (const key of [...this.windows.keys()]) {
      await this.lock.run(key, () => {
        const window = this.windows.get(key);
        if (!window) return;
        const live = prune(window, (now ?? this.clock()) - windowMs);
        if (live.length === 0) {
          this.windows.delete(key);
          evicted += 1;
        } else {
          this.windows.set(key, live);
        }
      });
    }
    return evicted;
  }

  get size(): number {
    return this.windows.size;
  }

  private decide(key: ClientKey, now: Timestamp, capacity: number, windowMs: number): Decision {
    const window = prune(this.windows.get(key) ?? [], now - windowMs);
    const allowed = window.length < capacity;
    if (allowed) {
      insertOrdered(window, now);
    }
    this.windows.set(key, window);
    return { allowed, size: window.length, oldest: window[0] ?? now, at: now };
  }
}

function assertLimits(capacity: number, windowMs: number): void {
  invariant(Number.isInteger(capacity) && capacity > 0, `rate-limit capacity must be a positive integer, got ${capacity}`);
  invariant(windowMs > 0, `rate-limit window must be positive, got ${windowMs}`);
}

// Entries at or before the cutoff are expired.
function prune(window: Timestamp[], cutoff: Timestamp): Timestamp[] {
  const firstLive = window.findIndex((t) => t > cutoff);
  return firstLive === -1 ? [] : firstLive === 0 ? window : window.slice(firstLive);
}

function insertOrdered(window: Timestamp[], at: Timestamp): void {
  let index = window.length;
  while (index > 0 && window[index - 1] > at) index -= 1;
  window.splice(index, 0, at);
}
