/**
 * Fixed-window rate limiter.
 *
 * Each client key owns an independent bucket in a {@link CounterStore}.
 * The first request after the window has elapsed restarts the bucket at
 * the current time; every request increments it, and a count above the
 * limit is refused. Allowed or not, the result always carries the limit,
 * the remaining budget and the window reset time.
 *
 * @module services/rateLimiter
 */

import type { RateLimitConfig } from '../config/appConfig.js';
import type { CounterStore } from '../store/types.js';
import type { RateLimitResult } from '../types/index.js';

export interface RateLimiter {
  readonly limit: number;
  readonly windowSeconds: number;
  allow(clientKey: string): Promise<RateLimitResult>;
  reset(clientKey: string): Promise<void>;
}

export interface RateLimiterOptions {
  config: Pick<RateLimitConfig, 'maxRequests' | 'windowSeconds'>;
  store: CounterStore;
  now?: () => number;
}

/** Fixed-window limiter: `maxRequests` per client per `windowSeconds`. */
export function createRateLimiter(options: RateLimiterOptions): RateLimiter {
  const { store } = options;
  const limit = options.config.maxRequests;
  const windowSeconds = options.config.windowSeconds;
  const windowMs = windowSeconds * 1000;
  const now = options.now ?? Date.now;

  async function allow(clientKey: string): Promise<RateLimitResult> {
    const bucket = await store.increment(clientKey, windowMs, now());

    return {
      allowed: bucket.count <= limit,
      limit,
      remaining: Math.max(0, limit - bucket.count),
      resetAt: new Date(bucket.windowStart + windowMs),
    };
  }

  async function reset(clientKey: string): Promise<void> {
    await store.reset(clientKey);
  }

  return { limit, windowSeconds, allow, reset };
}
