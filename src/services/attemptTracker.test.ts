import { describe, it, expect, beforeEach } from 'vitest';
import fc from 'fast-check';
import {
  consecutiveFailures,
  createAttemptTracker,
  decodeAttemptHistory,
  MAX_RECORDS_PER_IDENTITY,
} from './attemptTracker.js';
import type { AttemptTracker } from './attemptTracker.js';
import { InMemoryStateStore } from '../store/memoryStores.js';
import type { AttemptHistory, LoginAttemptRecord } from '../types/index.js';
import { createLogCapture } from '../test/mockCollectors.js';
import type { LogCapture } from '../test/mockCollectors.js';
import { CLOCK_START, createTestClock } from '../test/fixtures.js';
import type { TestClock } from '../test/fixtures.js';

const LOCKOUT = { threshold: 5, durationSeconds: 1800, windowSeconds: 3600 };
const IP = '10.0.0.1';

describe('attemptTracker', () => {
  let clock: TestClock;
  let logs: LogCapture;
  let store: InMemoryStateStore<AttemptHistory>;
  let tracker: AttemptTracker;

  async function fail(identity: string, times: number, source = IP): Promise<void> {
    for (let i = 0; i < times; i++) {
      await tracker.record(identity, source, false);
    }
  }

  beforeEach(() => {
    clock = createTestClock();
    logs = createLogCapture();
    store = new InMemoryStateStore<AttemptHistory>(clock.now);
    tracker = createAttemptTracker({ config: LOCKOUT, store, logger: logs.logger, now: clock.now });
  });

  describe('lockout', () => {
    it('should not lock below the threshold', async () => {
      await fail('alice', 4);

      expect(await tracker.isLocked('alice')).toBe(false);
      expect(await tracker.failedCount('alice')).toBe(4);
      expect(await tracker.lockoutRemaining('alice')).toBeNull();
    });

    it('should lock on the failure that reaches the threshold', async () => {
      await fail('alice', 5);

      expect(await tracker.isLocked('alice')).toBe(true);
      expect(await tracker.lockoutRemaining('alice')).toBe(1800);
      expect(logs.messages('warn')).toContain('Identity locked after repeated failures');
    });

    it('should lock for the configured duration', async () => {
      await fail('alice', 5);

      clock.advance(1800 * 1000 - 1);
      expect(await tracker.isLocked('alice')).toBe(true);
      expect(await tracker.lockoutRemaining('alice')).toBe(1);

      clock.advance(1);
      expect(await tracker.isLocked('alice')).toBe(false);
    });

    it('should extend the lock with every further failure', async () => {
      await fail('alice', 5);
      clock.advance(60_000);
      await fail('alice', 1);

      expect(await tracker.lockoutRemaining('alice')).toBe(1800);
    });

    it('should lock again on the next failure while earlier failures are still in the window', async () => {
      await fail('alice', 5);
      clock.advance(1800 * 1000);
      expect(await tracker.isLocked('alice')).toBe(false);

      await fail('alice', 1);
      expect(await tracker.isLocked('alice')).toBe(true);
    });

    it('should lock identities independently of one another', async () => {
      await fail('alice', 5);
      expect(await tracker.isLocked('bob')).toBe(false);
    });

    it('should count failures per identity across sources', async () => {
      await fail('alice', 3, '10.0.0.1');
      await fail('alice', 2, '10.0.0.2');
      expect(await tracker.isLocked('alice')).toBe(true);
    });
  });

  describe('success', () => {
    it('should clear the failure streak', async () => {
      await fail('alice', 4);
      await tracker.record('alice', IP, true);

      expect(await tracker.failedCount('alice')).toBe(0);

      await fail('alice', 4);
      expect(await tracker.isLocked('alice')).toBe(false);
    });
  });

  describe('window', () => {
    it('should forget failures older than the window', async () => {
      await fail('alice', 4);
      clock.advance(3600 * 1000);
      await fail('alice', 1);

      expect(await tracker.failedCount('alice')).toBe(1);
      expect(await tracker.isLocked('alice')).toBe(false);
    });

    it('should keep at most the newest records per identity', async () => {
      for (let i = 0; i < MAX_RECORDS_PER_IDENTITY + 20; i++) {
        await tracker.record('alice', IP, true);
      }

      const history = await store.get('alice');
      expect(history?.attempts).toHaveLength(MAX_RECORDS_PER_IDENTITY);
      expect(history?.totalAttempts).toBe(MAX_RECORDS_PER_IDENTITY + 20);
    });
  });

  describe('concurrency', () => {
    it('should not lose records when failures arrive concurrently', async () => {
      await Promise.all(Array.from({ length: 20 }, () => tracker.record('alice', IP, false)));

      expect((await store.get('alice'))?.totalAttempts).toBe(20);
      expect(await tracker.isLocked('alice')).toBe(true);
    });

    it('should admit no more than the threshold from a concurrent burst', async () => {
      const admissions = await Promise.all(
        Array.from({ length: 12 }, () => tracker.admit('alice', IP)),
      );

      expect(admissions.filter((a) => a.admitted)).toHaveLength(5);
      expect(admissions.filter((a) => !a.admitted)).toHaveLength(7);
      expect((await store.get('alice'))?.totalAttempts).toBe(5);
      expect(await tracker.lockoutRemaining('alice')).toBe(1800);
    });
  });

  describe('admission', () => {
    it('should count an admitted attempt as a failure until it completes', async () => {
      expect(await tracker.admit('alice', IP, 'TestAgent/1.0')).toEqual({ admitted: true });

      expect(await tracker.failedCount('alice')).toBe(1);
      expect((await store.get('alice'))?.attempts[0]).toEqual({
        identity: 'alice',
        source: IP,
        timestamp: CLOCK_START,
        success: false,
        userAgent: 'TestAgent/1.0',
      });
    });

    it('should refuse a locked identity without counting the attempt', async () => {
      await fail('alice', 5);

      expect(await tracker.admit('alice', IP)).toEqual({
        admitted: false,
        lockedUntil: CLOCK_START + 1800 * 1000,
      });
      expect((await store.get('alice'))?.totalAttempts).toBe(5);
    });

    it('should turn an admitted attempt into a success', async () => {
      await tracker.admit('alice', IP);
      await tracker.admit('alice', IP);
      await tracker.complete('alice', IP, false);
      await tracker.admit('alice', IP);
      await tracker.complete('alice', IP, true);

      const history = await store.get('alice');
      expect(await tracker.failedCount('alice')).toBe(0);
      expect(history?.totalAttempts).toBe(3);
      expect(history?.attempts.map((a) => a.success)).toEqual([true]);
      expect(logs.messages('info')).toContain('Successful login attempt');
    });

    it('should not write again when an admitted attempt fails', async () => {
      await tracker.admit('alice', IP);
      const before = await store.get('alice');

      await tracker.complete('alice', IP, false);

      expect(await store.get('alice')).toEqual(before);
      expect(logs.messages('warn')).toContain('Failed login attempt');
    });

    it('should clear the lock when an admitted attempt succeeds', async () => {
      for (let i = 0; i < 5; i++) await tracker.admit('alice', IP);
      expect(await tracker.isLocked('alice')).toBe(true);

      await tracker.complete('alice', IP, true);

      expect(await tracker.isLocked('alice')).toBe(false);
    });
  });

  describe('unlock', () => {
    it('should clear the lock and the failures of a tracked identity', async () => {
      await fail('alice', 5);

      expect(await tracker.unlock('alice')).toBe(true);
      expect(await tracker.isLocked('alice')).toBe(false);
      expect(await tracker.failedCount('alice')).toBe(0);
    });

    it('should report an untracked identity', async () => {
      expect(await tracker.unlock('nobody')).toBe(false);
      expect(await store.get('nobody')).toBeUndefined();
    });
  });

  describe('admin views', () => {
    it('should list locked identities with their remaining time', async () => {
      await fail('alice', 5, '10.0.0.9');
      clock.advance(600_000);
      await fail('bob', 2);

      expect(await tracker.lockedIdentities()).toEqual([
        {
          identity: 'alice',
          lockedUntil: new Date(CLOCK_START + 1800 * 1000),
          remainingSeconds: 1200,
          failedAttempts: 5,
          lastSource: '10.0.0.9',
        },
      ]);
    });

    it('should summarise attempts in the window', async () => {
      await fail('alice', 5, '10.0.0.1');
      await tracker.record('bob', '10.0.0.2', true);

      const stats = await tracker.stats();

      expect(stats).toMatchObject({
        trackedIdentities: 2,
        totalAttempts: 6,
        successfulAttempts: 1,
        failedAttempts: 5,
        lockedIdentities: 1,
        uniqueSources: 2,
      });
      expect(stats.successRate).toBeCloseTo(16.667, 2);
    });
  });
});

describe('consecutiveFailures', () => {
  const at = (success: boolean): LoginAttemptRecord => ({
    identity: 'x',
    source: IP,
    timestamp: 0,
    success,
  });

  it('should count the failures after the last success', () => {
    expect(consecutiveFailures([at(false), at(true), at(false), at(false)])).toBe(2);
    expect(consecutiveFailures([at(false), at(true)])).toBe(0);
    expect(consecutiveFailures([])).toBe(0);
  });

  it('should never exceed the number of records', () => {
    fc.assert(
      fc.property(fc.array(fc.boolean(), { maxLength: 30 }), (outcomes) => {
        const count = consecutiveFailures(outcomes.map(at));
        expect(count).toBeGreaterThanOrEqual(0);
        expect(count).toBeLessThanOrEqual(outcomes.length);
      }),
    );
  });
});

describe('decodeAttemptHistory', () => {
  it('should accept stored histories and reject malformed ones', () => {
    const history = {
      attempts: [{ identity: 'a', source: IP, timestamp: 1, success: false }],
      lockedUntil: null,
      totalAttempts: 1,
    };

    expect(decodeAttemptHistory(history)).toEqual(history);
    expect(decodeAttemptHistory({ ...history, lockedUntil: 5 })).toEqual({ ...history, lockedUntil: 5 });
    expect(decodeAttemptHistory({ ...history, lockedUntil: '5' })).toBeUndefined();
    expect(decodeAttemptHistory({ ...history, attempts: [{ identity: 'a' }] })).toBeUndefined();
    expect(decodeAttemptHistory('x')).toBeUndefined();
  });
});
