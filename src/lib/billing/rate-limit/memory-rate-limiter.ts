// src/lib/billing/rate-limit/memory-rate-limiter.ts
import { RateLimitOptions, RateLimitUsage, RateLimiter } from './types';

export const DEFAULT_RATE_LIMIT: RateLimitOptions = {
  limit: 100,
  windowMs: 3600 * 1000
};

interface RateWindow {
  count: number;
  resetAt: number;
}

/** Fixed-window counter per identity, kept in process memory. */
export class InMemoryRateLimiter implements RateLimiter {
  private windows: Map<string, RateWindow> = new Map();
  private options: RateLimitOptions;
  private nextPruneAt: number;

  constructor(options: Partial<RateLimitOptions> = {}, private now: () => number = Date.now) {
    this.options = { ...DEFAULT_RATE_LIMIT, ...options };
    this.nextPruneAt = this.now() + this.options.windowMs;
  }

  async isAllowed(identity: string): Promise<boolean> {
    if (this.now() >= this.nextPruneAt) {
      this.prune();
    }

    const window = this.activeWindow(identity);

    if (!window) {
      this.windows.set(identity, { count: 1, resetAt: this.now() + this.options.windowMs });
      return true;
    }

    if (window.count >= this.options.limit) {
      return false;
    }

    window.count++;
    return true;
  }

  async currentUsage(identity: string): Promise<RateLimitUsage> {
    const window = this.activeWindow(identity);
    const count = window ? window.count : 0;

    return {
      count,
      limit: this.options.limit,
      remaining: Math.max(0, this.options.limit - count),
      resetAt: new Date(window ? window.resetAt : this.now() + this.options.windowMs)
    };
  }

  async reset(identity: string): Promise<boolean> {
    return this.windows.delete(identity);
  }

  /**
   * Drops expired windows; returns how many were removed. `isAllowed` runs it
   * once per window length.
   */
  prune(): number {
    let removed = 0;
    const now = this.now();
    this.nextPruneAt = now + this.options.windowMs;
    for (const [identity, window] of this.windows) {
      if (window.resetAt <= now) {
        this.windows.delete(identity);
        removed++;
      }
    }
    return removed;
  }

  /** Number of identities currently holding a window. */
  size(): number {
    return this.windows.size;
  }

  private activeWindow(identity: string): RateWindow | undefined {
    const window = this.windows.get(identity);
    if (window && window.resetAt <= this.now()) {
      this.windows.delete(identity);
      return undefined;
    }
    return window;
  }
}
