/**
 * Redis-backed implementations of the keyed stores, shared by every
 * worker process behind the load balancer.
 *
 * - {@link RedisStateStore} keeps JSON documents and applies updates as an
 *   optimistic compare-and-swap: the new value is written by a Lua script
 *   only if the stored value is still the one the mutator saw.
 * - {@link RedisCounterStore} runs the fixed-window reset-and-increment
 *   in a single Lua script.
 *
 * Every key carries a TTL, so abandoned entries expire inside Redis and
 * `sweep` has nothing to do.
 *
 * @module store/redisStores
 */

import { Redis } from 'ioredis';
import type { RedisOptions } from 'ioredis';
import type { Logger } from '../logging/logger.js';
import type { RateBucket } from '../types/index.js';
import { StoreConflictError } from './types.js';
import type { CounterStore, Decoder, Mutator, StateStore } from './types.js';

/** Maximum compare-and-swap attempts before an update is abandoned. */
export const MAX_CAS_ATTEMPTS = 8;

const SCAN_BATCH_SIZE = 100;

/**
 * Open the shared client. Commands fail after one retry so a Redis outage
 * surfaces as a store fault; connection errors are logged, not thrown.
 */
export function createRedisClient(url: string, logger: Logger, options: RedisOptions = {}): Redis {
  const redisLogger = logger.child({ component: 'redis' });
  const redis = new Redis(url, { maxRetriesPerRequest: 1, ...options });
  redis.on('error', (err: Error) => {
    redisLogger.error('Redis connection error', err);
  });
  return redis;
}

/**
 * KEYS[1] = key
 * ARGV[1] = expected current value ('' when absent)
 * ARGV[2] = new value ('' deletes the key)
 * ARGV[3] = TTL in milliseconds
 */
const COMPARE_AND_SWAP_SCRIPT = `
  local current = redis.call('GET', KEYS[1])
  if (current or '') ~= ARGV[1] then
    return 0
  end
  if ARGV[2] == '' then
    redis.call('DEL', KEYS[1])
  else
    redis.call('SET', KEYS[1], ARGV[2], 'PX', ARGV[3])
  end
  return 1
`;

/**
 * KEYS[1] = bucket key
 * ARGV[1] = now (ms)
 * ARGV[2] = window length (ms)
 * Returns { windowStart, count } after the increment.
 */
const FIXED_WINDOW_SCRIPT = `
  local now = tonumber(ARGV[1])
  local window = tonumber(ARGV[2])
  local start = redis.call('HGET', KEYS[1], 'start')
  if (not start) or (now - tonumber(start) >= window) then
    redis.call('HSET', KEYS[1], 'start', ARGV[1], 'count', 1)
    redis.call('PEXPIRE', KEYS[1], window)
    return { ARGV[1], 1 }
  end
  local count = redis.call('HINCRBY', KEYS[1], 'count', 1)
  return { start, count }
`;

function parseJson(raw: string | null): unknown {
  if (raw === null) return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function toFiniteNumber(value: unknown): number | undefined {
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

// ─── State Store ─────────────────────────────────────────────────────────────

export class RedisStateStore<T> implements StateStore<T> {
  constructor(
    private readonly redis: Redis,
    private readonly prefix: string,
    private readonly decode: Decoder<T>,
  ) {}

  async get(key: string): Promise<T | undefined> {
    return this.decode(parseJson(await this.redis.get(this.prefix + key)));
  }

  async update(key: string, mutate: Mutator<T>, ttlMs: number): Promise<T | undefined> {
    const redisKey = this.prefix + key;

    for (let attempt = 1; attempt <= MAX_CAS_ATTEMPTS; attempt++) {
      const raw = await this.redis.get(redisKey);
      const next = mutate(this.decode(parseJson(raw)));
      const serialized = next === undefined ? '' : JSON.stringify(next);

      const swapped = await this.redis.eval(
        COMPARE_AND_SWAP_SCRIPT,
        1,
        redisKey,
        raw ?? '',
        serialized,
        String(Math.max(1, Math.ceil(ttlMs))),
      );

      if (toFiniteNumber(swapped) === 1) return next;
    }

    throw new StoreConflictError(key, MAX_CAS_ATTEMPTS);
  }

  async delete(key: string): Promise<boolean> {
    return (await this.redis.del(this.prefix + key)) > 0;
  }

  async entries(): Promise<Array<[string, T]>> {
    const result: Array<[string, T]> = [];
    let cursor = '0';

    do {
      const [nextCursor, keys] = await this.redis.scan(
        cursor,
        'MATCH',
        `${this.prefix}*`,
        'COUNT',
        SCAN_BATCH_SIZE,
      );
      cursor = nextCursor;

      if (keys.length > 0) {
        const values = await this.redis.mget(...keys);
        keys.forEach((redisKey, index) => {
          const value = this.decode(parseJson(values[index] ?? null));
          if (value !== undefined) result.push([redisKey.slice(this.prefix.length), value]);
        });
      }
    } while (cursor !== '0');

    return result;
  }

  async sweep(): Promise<number> {
    return 0;
  }
}

// ─── Counter Store ───────────────────────────────────────────────────────────

export class RedisCounterStore implements CounterStore {
  constructor(
    private readonly redis: Redis,
    private readonly prefix: string,
  ) {}

  async get(key: string): Promise<RateBucket | undefined> {
    const fields = await this.redis.hgetall(this.prefix + key);
    const windowStart = toFiniteNumber(fields['start']);
    const count = toFiniteNumber(fields['count']);
    if (windowStart === undefined || count === undefined) return undefined;
    return { windowStart, count };
  }

  async increment(key: string, windowMs: number, now: number): Promise<RateBucket> {
    const reply = await this.redis.eval(
      FIXED_WINDOW_SCRIPT,
      1,
      this.prefix + key,
      String(now),
      String(windowMs),
    );

    if (Array.isArray(reply)) {
      const windowStart = toFiniteNumber(reply[0]);
      const count = toFiniteNumber(reply[1]);
      if (windowStart !== undefined && count !== undefined) return { windowStart, count };
    }
    throw new Error(`Unexpected reply from rate-limit script for "${key}"`);
  }

  async reset(key: string): Promise<void> {
    await this.redis.del(this.prefix + key);
  }

  async sweep(): Promise<number> {
    return 0;
  }
}
