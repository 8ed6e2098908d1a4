/**
 * In-process implementations of the keyed stores.
 *
 * Every mutation runs to completion synchronously inside a single call,
 * so two requests handled concurrently by the event loop can never
 * interleave a read-modify-write on the same key. Values are cloned on
 * the way in and out; callers only ever see snapshots.
 *
 * @module store/memoryStores
 */

import type { RateBucket } from '../types/index.js';
import type { CounterStore, Mutator, StateStore } from './types.js';

export type Clock = () => number;

interface StateEntry<T> {
  value: T;
  expiresAt: number;
}

export class InMemoryStateStore<T> implements StateStore<T> {
  private readonly entriesByKey = new Map<string, StateEntry<T>>();

  constructor(private readonly clock: Clock = Date.now) {}

  async get(key: string): Promise<T | undefined> {
    const entry = this.liveEntry(key, this.clock());
    return entry ? structuredClone(entry.value) : undefined;
  }

  async update(key: string, mutate: Mutator<T>, ttlMs: number): Promise<T | undefined> {
    const now = this.clock();
    const entry = this.liveEntry(key, now);
    const next = mutate(entry ? structuredClone(entry.value) : undefined);

    if (next === undefined) {
      this.entriesByKey.delete(key);
      return undefined;
    }

    this.entriesByKey.set(key, { value: structuredClone(next), expiresAt: now + ttlMs });
    return structuredClone(next);
  }

  async delete(key: string): Promise<boolean> {
    return this.entriesByKey.delete(key);
  }

  async entries(): Promise<Array<[string, T]>> {
    const now = this.clock();
    const live: Array<[string, T]> = [];
    for (const [key, entry] of this.entriesByKey) {
      if (entry.expiresAt > now) live.push([key, structuredClone(entry.value)]);
    }
    return live;
  }

  async sweep(now: number): Promise<number> {
    let removed = 0;
    for (const [key, entry] of this.entriesByKey) {
      if (entry.expiresAt <= now) {
        this.entriesByKey.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Number of stored keys, expired ones included until swept. */
  get size(): number {
    return this.entriesByKey.size;
  }

  private liveEntry(key: string, now: number): StateEntry<T> | undefined {
    const entry = this.entriesByKey.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= now) {
      this.entriesByKey.delete(key);
      return undefined;
    }
    return entry;
  }
}

interface CounterEntry extends RateBucket {
  windowMs: number;
}

export class InMemoryCounterStore implements CounterStore {
  private readonly buckets = new Map<string, CounterEntry>();

  async get(key: string): Promise<RateBucket | undefined> {
    const bucket = this.buckets.get(key);
    return bucket ? { windowStart: bucket.windowStart, count: bucket.count } : undefined;
  }

  async increment(key: string, windowMs: number, now: number): Promise<RateBucket> {
    let bucket = this.buckets.get(key);
    if (!bucket || now - bucket.windowStart >= windowMs) {
      bucket = { windowStart: now, count: 0, windowMs };
      this.buckets.set(key, bucket);
    }
    bucket.count += 1;
    return { windowStart: bucket.windowStart, count: bucket.count };
  }

  async reset(key: string): Promise<void> {
    this.buckets.delete(key);
  }

  async sweep(now: number): Promise<number> {
    let removed = 0;
    for (const [key, bucket] of this.buckets) {
      if (now - bucket.windowStart >= bucket.windowMs) {
        this.buckets.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.buckets.size;
  }
}
