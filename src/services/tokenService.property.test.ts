/**
 * Property-based tests for access tokens.
 *
 * - Any token the service issues verifies to the claims it was given.
 * - Changing any single character of a token makes it invalid.
 * - A token is valid strictly before its expiry and invalid from then on.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import fc from 'fast-check';
import { createTokenService } from './tokenService.js';
import { ROLES } from '../types/index.js';
import type { IdentityClaims } from '../types/index.js';
import { identityArb } from '../test/arbitraries.js';
import { silentLogger } from '../test/mockCollectors.js';
import { CLOCK_START, createTestClock, TEST_JWT_SECRET } from '../test/fixtures.js';

const CONFIG = {
  secret: TEST_JWT_SECRET,
  algorithm: 'HS256' as const,
  issuer: 'field-service-api',
  ttlSeconds: 1800,
};

const BASE64URL = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_';

const claimsArb: fc.Arbitrary<IdentityClaims> = fc.record({
  sub: identityArb,
  userId: fc.integer({ min: 1, max: 1_000_000 }),
  userType: fc.constantFrom('master' as const, 'employee' as const, 'administrator' as const),
  role: fc.constantFrom(...ROLES),
});

describe('tokenService properties', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should verify every issued token to the issued claims', () => {
    const clock = createTestClock();
    const tokens = createTokenService({ config: CONFIG, logger: silentLogger(), now: clock.now });

    fc.assert(
      fc.property(claimsArb, (claims) => {
        const result = tokens.verify(tokens.issue(claims).token);
        expect(result.valid).toBe(true);
        if (result.valid) {
          expect(result.claims).toMatchObject(claims);
        }
      }),
      { numRuns: 50 },
    );
  });

  it('should reject a token with any single character changed', () => {
    const clock = createTestClock();
    const tokens = createTokenService({ config: CONFIG, logger: silentLogger(), now: clock.now });
    const { token } = tokens.issue({ sub: 'admin', userId: 1, userType: 'administrator', role: 'admin' });

    fc.assert(
      fc.property(
        fc.nat({ max: token.length - 1 }),
        fc.constantFrom(...BASE64URL.split('')),
        (index, replacement) => {
          fc.pre(token[index] !== replacement && token[index] !== '.');
          const tampered = token.slice(0, index) + replacement + token.slice(index + 1);
          expect(tokens.verify(tampered)).toEqual({ valid: false });
        },
      ),
      { numRuns: 200 },
    );
  });

  it('should expire a one-second token once the clock reaches its expiry', () => {
    vi.useFakeTimers();
    vi.setSystemTime(CLOCK_START);
    const tokens = createTokenService({ config: CONFIG, logger: silentLogger() });

    fc.assert(
      fc.property(fc.integer({ min: 0, max: 5000 }), (elapsedMs) => {
        vi.setSystemTime(CLOCK_START);
        const { token } = tokens.issue({ sub: 'm', userId: 2, userType: 'master', role: 'master' }, 1);

        vi.setSystemTime(CLOCK_START + elapsedMs);
        expect(tokens.verify(token).valid).toBe(elapsedMs < 1000);
      }),
      { numRuns: 100 },
    );
  });
});
