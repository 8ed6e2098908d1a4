/**
 * Narrow interfaces over the only shared mutable state of the security
 * layer: per-identity login histories, per-session CSRF records and
 * per-client rate buckets. Call sites depend on these interfaces alone,
 * so an in-memory map and a Redis keyspace are interchangeable.
 *
 * @module store/types
 */

import type { RateBucket } from '../types/index.js';

/**
 * Computes the next value of a key from its current value.
 * Returning `undefined` deletes the key.
 */
export type Mutator<T> = (current: T | undefined) => T | undefined;

/** Validates a value read back from an external store. */
export type Decoder<T> = (raw: unknown) => T | undefined;

export interface StateStore<T> {
  /** Snapshot of the value under `key`, or undefined when absent or expired. */
  get(key: string): Promise<T | undefined>;

  /**
   * Atomic read-modify-write. No other `update` of the same key is applied
   * between the read handed to `mutate` and the write of its result.
   */
  update(key: string, mutate: Mutator<T>, ttlMs: number): Promise<T | undefined>;

  /** Remove a key. Resolves true when something was removed. */
  delete(key: string): Promise<boolean>;

  /** All live entries. Intended for administrative views, not hot paths. */
  entries(): Promise<Array<[string, T]>>;

  /** Drop expired entries. Resolves to the number removed. */
  sweep(now: number): Promise<number>;
}

export interface CounterStore {
  get(key: string): Promise<RateBucket | undefined>;

  /**
   * Fixed-window increment: when `windowMs` has elapsed since the bucket's
   * window start, the bucket restarts at `now` with a count of zero before
   * the increment. Resolves to the bucket after the increment.
   */
  increment(key: string, windowMs: number, now: number): Promise<RateBucket>;

  reset(key: string): Promise<void>;

  sweep(now: number): Promise<number>;
}

/** Raised when an optimistic update keeps losing the race for a key. */
export class StoreConflictError extends Error {
  constructor(key: string, attempts: number) {
    super(`Update of "${key}" abandoned after ${attempts} conflicting attempts`);
    this.name = 'StoreConflictError';
  }
}
