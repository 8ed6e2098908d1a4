/**
 * Login attempt tracker and lockout evaluation.
 *
 * Keeps a short history of login outcomes per identity. When the
 * consecutive failures inside the tracking window reach the threshold,
 * the identity is locked for the lockout duration; every further failure
 * recorded at or above the threshold pushes the lock end forward. A single
 * success clears the failures and the lock.
 *
 * Each `record` is one atomic {@link StateStore.update}, so concurrent
 * attempts for the same identity never lose an update, and readers only
 * ever see whole snapshots.
 *
 * The login path uses `admit` and `complete` instead of `record`. `admit`
 * checks the lock and counts the attempt as a failure in the same update,
 * before the password is compared, so a burst of parallel guesses cannot
 * all slip past the lock check. `complete` turns an admitted attempt into
 * a success when the credentials turn out to be valid.
 *
 * @module services/attemptTracker
 */

import type { LockoutConfig } from '../config/appConfig.js';
import type { Logger } from '../logging/logger.js';
import type { StateStore } from '../store/types.js';
import type {
  AttemptHistory,
  AttemptStats,
  LockedIdentity,
  LoginAttemptRecord,
} from '../types/index.js';

/** Upper bound on stored records per identity; the oldest are dropped first. */
export const MAX_RECORDS_PER_IDENTITY = 100;

/** Outcome of {@link AttemptTracker.admit}. */
export type AttemptAdmission =
  | { admitted: true }
  | { admitted: false; lockedUntil: number };

export interface AttemptTracker {
  /**
   * Refuse a locked identity, or reserve the attempt as a counted failure.
   * Reaching the threshold through reservations locks the identity.
   */
  admit(identity: string, source: string, userAgent?: string): Promise<AttemptAdmission>;
  /** Settle an admitted attempt. A failure is already counted by `admit`. */
  complete(identity: string, source: string, success: boolean, userAgent?: string): Promise<void>;
  record(
    identity: string,
    source: string,
    success: boolean,
    userAgent?: string,
  ): Promise<AttemptHistory>;
  isLocked(identity: string): Promise<boolean>;
  failedCount(identity: string): Promise<number>;
  /** Seconds until the lock ends, or null when not locked. */
  lockoutRemaining(identity: string): Promise<number | null>;
  /** Administrative unlock. Resolves false when the identity was never tracked. */
  unlock(identity: string): Promise<boolean>;
  lockedIdentities(): Promise<LockedIdentity[]>;
  stats(): Promise<AttemptStats>;
}

export interface AttemptTrackerOptions {
  config: LockoutConfig;
  store: StateStore<AttemptHistory>;
  logger: Logger;
  now?: () => number;
}

// ─── Pure Helpers ────────────────────────────────────────────────────────────

function isAttemptRecord(value: unknown): value is LoginAttemptRecord {
  if (typeof value !== 'object' || value === null) return false;
  const record = value as Record<string, unknown>;
  return (
    typeof record['identity'] === 'string' &&
    typeof record['source'] === 'string' &&
    typeof record['timestamp'] === 'number' &&
    typeof record['success'] === 'boolean' &&
    (record['userAgent'] === undefined || typeof record['userAgent'] === 'string')
  );
}

/** Decoder for attempt histories read back from an external store. */
export function decodeAttemptHistory(raw: unknown): AttemptHistory | undefined {
  if (typeof raw !== 'object' || raw === null) return undefined;
  const { attempts, lockedUntil, totalAttempts } = raw as Record<string, unknown>;
  if (!Array.isArray(attempts) || !attempts.every(isAttemptRecord)) return undefined;
  if (typeof totalAttempts !== 'number') return undefined;
  if (lockedUntil === null) return { attempts, lockedUntil: null, totalAttempts };
  if (typeof lockedUntil !== 'number') return undefined;
  return { attempts, lockedUntil, totalAttempts };
}

/** Failures recorded after the most recent success. */
export function consecutiveFailures(attempts: readonly LoginAttemptRecord[]): number {
  let count = 0;
  for (let i = attempts.length - 1; i >= 0; i--) {
    if (attempts[i]?.success) break;
    count++;
  }
  return count;
}

function withinWindow(
  attempts: readonly LoginAttemptRecord[],
  now: number,
  windowMs: number,
): LoginAttemptRecord[] {
  return attempts.filter((attempt) => attempt.timestamp > now - windowMs);
}

// ─── Tracker ─────────────────────────────────────────────────────────────────

/**
 * Create the tracker over an attempt-history store. Histories expire
 * after the longer of the tracking window and the lockout duration.
 */
export function createAttemptTracker(options: AttemptTrackerOptions): AttemptTracker {
  const { config, store } = options;
  const logger = options.logger.child({ component: 'attempts' });
  const now = options.now ?? Date.now;
  const windowMs = config.windowSeconds * 1000;
  const lockoutMs = config.durationSeconds * 1000;

  // Every lock and every counted record ends within this long of the last write.
  const historyTtlMs = Math.max(windowMs, lockoutMs);

  async function record(
    identity: string,
    source: string,
    success: boolean,
    userAgent?: string,
  ): Promise<AttemptHistory> {
    const at = now();
    const attempt = attemptRecord(identity, source, success, at, userAgent);

    let lockedNow = false;
    let updated: AttemptHistory = { attempts: [attempt], lockedUntil: null, totalAttempts: 1 };

    await store.update(
      identity,
      (current) => {
        lockedNow = false;
        const previous = current ?? { attempts: [], lockedUntil: null, totalAttempts: 0 };
        let attempts = [...withinWindow(previous.attempts, at, windowMs), attempt];
        let lockedUntil = previous.lockedUntil;

        if (success) {
          attempts = attempts.filter((entry) => entry.success);
          lockedUntil = null;
        } else if (consecutiveFailures(attempts) >= config.threshold) {
          lockedNow = lockedUntil === null || lockedUntil <= at;
          lockedUntil = at + lockoutMs;
        }

        updated = {
          attempts: attempts.slice(-MAX_RECORDS_PER_IDENTITY),
          lockedUntil,
          totalAttempts: previous.totalAttempts + 1,
        };
        return updated;
      },
      historyTtlMs,
    );

    if (success) {
      logger.info('Successful login attempt', { identity, source });
    } else {
      logger.warn('Failed login attempt', { identity, source });
    }
    if (lockedNow) {
      logger.warn('Identity locked after repeated failures', {
        identity,
        source,
        lockoutSeconds: config.durationSeconds,
      });
    }

    return updated;
  }

  function attemptRecord(
    identity: string,
    source: string,
    success: boolean,
    at: number,
    userAgent?: string,
  ): LoginAttemptRecord {
    const attempt: LoginAttemptRecord = { identity, source, timestamp: at, success };
    if (userAgent) attempt.userAgent = userAgent;
    return attempt;
  }

  async function admit(
    identity: string,
    source: string,
    userAgent?: string,
  ): Promise<AttemptAdmission> {
    const at = now();
    const attempt = attemptRecord(identity, source, false, at, userAgent);

    let admission: AttemptAdmission = { admitted: true };
    let lockedNow = false;

    await store.update(
      identity,
      (current) => {
        lockedNow = false;
        if (current && current.lockedUntil !== null && current.lockedUntil > at) {
          admission = { admitted: false, lockedUntil: current.lockedUntil };
          return current;
        }
        admission = { admitted: true };

        const previous = current ?? { attempts: [], lockedUntil: null, totalAttempts: 0 };
        const attempts = [...withinWindow(previous.attempts, at, windowMs), attempt];
        let lockedUntil = previous.lockedUntil;
        if (consecutiveFailures(attempts) >= config.threshold) {
          lockedNow = true;
          lockedUntil = at + lockoutMs;
        }

        return {
          attempts: attempts.slice(-MAX_RECORDS_PER_IDENTITY),
          lockedUntil,
          totalAttempts: previous.totalAttempts + 1,
        };
      },
      historyTtlMs,
    );

    if (lockedNow) {
      logger.warn('Identity locked after repeated failures', {
        identity,
        source,
        lockoutSeconds: config.durationSeconds,
      });
    }
    return admission;
  }

  async function complete(
    identity: string,
    source: string,
    success: boolean,
    userAgent?: string,
  ): Promise<void> {
    if (!success) {
      logger.warn('Failed login attempt', { identity, source });
      return;
    }

    const at = now();
    const attempt = attemptRecord(identity, source, true, at, userAgent);
    await store.update(
      identity,
      (current) => {
        const previous = current ?? { attempts: [], lockedUntil: null, totalAttempts: 1 };
        const successes = withinWindow(previous.attempts, at, windowMs).filter(
          (entry) => entry.success,
        );
        return {
          attempts: [...successes, attempt].slice(-MAX_RECORDS_PER_IDENTITY),
          lockedUntil: null,
          totalAttempts: previous.totalAttempts,
        };
      },
      historyTtlMs,
    );
    logger.info('Successful login attempt', { identity, source });
  }

  async function lockedUntilOf(identity: string, at: number): Promise<number | null> {
    const history = await store.get(identity);
    if (!history || history.lockedUntil === null || history.lockedUntil <= at) return null;
    return history.lockedUntil;
  }

  async function isLocked(identity: string): Promise<boolean> {
    return (await lockedUntilOf(identity, now())) !== null;
  }

  async function failedCount(identity: string): Promise<number> {
    const history = await store.get(identity);
    if (!history) return 0;
    return consecutiveFailures(withinWindow(history.attempts, now(), windowMs));
  }

  async function lockoutRemaining(identity: string): Promise<number | null> {
    const at = now();
    const lockedUntil = await lockedUntilOf(identity, at);
    return lockedUntil === null ? null : Math.ceil((lockedUntil - at) / 1000);
  }

  async function unlock(identity: string): Promise<boolean> {
    let tracked = false;
    await store.update(
      identity,
      (current) => {
        tracked = current !== undefined;
        if (!current) return undefined;
        return {
          attempts: current.attempts.filter((entry) => entry.success),
          lockedUntil: null,
          totalAttempts: current.totalAttempts,
        };
      },
      historyTtlMs,
    );
    if (tracked) logger.info('Identity unlocked by administrator', { identity });
    return tracked;
  }

  async function lockedIdentities(): Promise<LockedIdentity[]> {
    const at = now();
    const locked: LockedIdentity[] = [];

    for (const [identity, history] of await store.entries()) {
      if (history.lockedUntil === null || history.lockedUntil <= at) continue;
      const last = history.attempts[history.attempts.length - 1];
      locked.push({
        identity,
        lockedUntil: new Date(history.lockedUntil),
        remainingSeconds: Math.ceil((history.lockedUntil - at) / 1000),
        failedAttempts: consecutiveFailures(history.attempts),
        lastSource: last ? last.source : null,
      });
    }

    return locked.sort((a, b) => a.lockedUntil.getTime() - b.lockedUntil.getTime());
  }

  async function stats(): Promise<AttemptStats> {
    const at = now();
    const sources = new Set<string>();
    let totalAttempts = 0;
    let successfulAttempts = 0;
    let lockedCount = 0;

    const entries = await store.entries();
    for (const [, history] of entries) {
      if (history.lockedUntil !== null && history.lockedUntil > at) lockedCount++;
      for (const attempt of withinWindow(history.attempts, at, windowMs)) {
        totalAttempts++;
        if (attempt.success) successfulAttempts++;
        sources.add(attempt.source);
      }
    }

    return {
      trackedIdentities: entries.length,
      totalAttempts,
      successfulAttempts,
      failedAttempts: totalAttempts - successfulAttempts,
      lockedIdentities: lockedCount,
      uniqueSources: sources.size,
      successRate: totalAttempts === 0 ? 0 : (successfulAttempts / totalAttempts) * 100,
    };
  }

  return {
    admit,
    complete,
    record,
    isLocked,
    failedCount,
    lockoutRemaining,
    unlock,
    lockedIdentities,
    stats,
  };
}
