// src/lib/billing/rate-limit/types.ts
export interface RateLimitUsage {
  count: number;
  limit: number;
  remaining: number;
  resetAt: Date;
}

export interface RateLimitOptions {
  limit: number;
  windowMs: number;
}

/**
 * Consulted by the HTTP boundary only. `isAllowed` counts the request when it
 * lets it through; a refused request is not counted.
 */
export interface RateLimiter {
  isAllowed(identity: string): Promise<boolean>;
  currentUsage(identity: string): Promise<RateLimitUsage>;
  reset(identity: string): Promise<boolean>;
}
