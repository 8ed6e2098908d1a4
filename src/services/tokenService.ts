/**
 * Token service: issues and verifies signed, time-bound access tokens.
 *
 * Tokens are JWTs signed with a single shared secret from configuration.
 * On top of the identity claims supplied by the caller every token
 * carries `iat`, `exp`, a random `jti` and the configured issuer, so its
 * staleness can always be decided from the token alone.
 *
 * Verification never throws for a bad token. Callers get `{ valid: false }`
 * whatever the cause; the cause itself only reaches the log.
 *
 * @module services/tokenService
 */

import { randomBytes } from 'node:crypto';
import jwt from 'jsonwebtoken';
import type { TokenConfig } from '../config/appConfig.js';
import type { Logger } from '../logging/logger.js';
import { ROLES } from '../types/index.js';
import type {
  AccessTokenClaims,
  IdentityClaims,
  IssuedToken,
  Role,
  TokenFailureReason,
  TokenVerification,
  UserType,
} from '../types/index.js';

/** Bytes of randomness in the token id. */
export const JTI_BYTE_LENGTH = 16;

/** Clock skew tolerated when checking that `iat` is not in the future. */
export const ISSUED_AT_LEEWAY_SECONDS = 5;

export interface TokenService {
  issue(claims: IdentityClaims, ttlSeconds?: number): IssuedToken;
  verify(token: string): TokenVerification;
}

export interface TokenServiceOptions {
  config: TokenConfig;
  logger: Logger;
  /** Current time in milliseconds. Defaults to Date.now. */
  now?: () => number;
}

const USER_TYPES: readonly UserType[] = ['master', 'employee', 'administrator'];

function isUserType(value: unknown): value is UserType {
  return typeof value === 'string' && USER_TYPES.some((type) => type === value);
}

function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLES.some((role) => role === value);
}

/**
 * Narrow a decoded payload to the claim set this service issues.
 * Returns null when any claim is missing or has the wrong type.
 */
export function parseAccessTokenClaims(payload: unknown): AccessTokenClaims | null {
  if (typeof payload !== 'object' || payload === null) return null;

  const { sub, userId, userType, role, iat, exp, jti, iss } = payload as Record<string, unknown>;

  if (typeof sub !== 'string' || sub.length === 0) return null;
  if (typeof userId !== 'number' || !Number.isInteger(userId)) return null;
  if (!isUserType(userType) || !isRole(role)) return null;
  if (typeof iat !== 'number' || typeof exp !== 'number') return null;
  if (typeof jti !== 'string' || jti.length === 0) return null;
  if (typeof iss !== 'string') return null;

  return { sub, userId, userType, role, iat, exp, jti, iss };
}

function classifyJwtError(err: unknown): TokenFailureReason {
  if (err instanceof jwt.TokenExpiredError) return 'expired';
  if (err instanceof jwt.JsonWebTokenError) {
    if (err.message.includes('signature')) return 'signature';
    if (err.message.includes('issuer')) return 'issuer';
  }
  return 'malformed';
}

/**
 * Create the access-token service.
 *
 * Tokens are signed with the configured HMAC algorithm and carry a random
 * `jti`, the fixed issuer and an `exp` derived from the injected clock.
 * `verify` never throws for a bad token; the failure reason is logged and
 * the caller only sees `{ valid: false }`.
 *
 * @throws {Error} When the signing secret is empty.
 */
export function createTokenService(options: TokenServiceOptions): TokenService {
  const { config } = options;
  const logger = options.logger.child({ component: 'tokens' });
  const now = options.now ?? Date.now;

  if (!config.secret) {
    throw new Error('Token signing secret is not configured');
  }

  function issue(claims: IdentityClaims, ttlSeconds: number = config.ttlSeconds): IssuedToken {
    if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
      throw new RangeError(`Token TTL must be a positive number of seconds, got ${ttlSeconds}`);
    }

    const iat = Math.floor(now() / 1000);
    const exp = iat + Math.ceil(ttlSeconds);
    const jti = randomBytes(JTI_BYTE_LENGTH).toString('base64url');

    const payload: AccessTokenClaims = {
      sub: claims.sub,
      userId: claims.userId,
      userType: claims.userType,
      role: claims.role,
      iat,
      exp,
      jti,
      iss: config.issuer,
    };

    const token = jwt.sign(payload, config.secret, { algorithm: config.algorithm });

    return { token, jti, expiresAt: new Date(exp * 1000) };
  }

  function reject(reason: TokenFailureReason, metadata: Record<string, unknown> = {}) {
    logger.info('Access token rejected', { reason, ...metadata });
    return { valid: false } as const;
  }

  function verify(token: string): TokenVerification {
    if (!token) return reject('malformed');

    let decoded: unknown;
    try {
      decoded = jwt.verify(token, config.secret, {
        algorithms: [config.algorithm],
        issuer: config.issuer,
        clockTimestamp: Math.floor(now() / 1000),
      });
    } catch (err) {
      return reject(classifyJwtError(err));
    }

    const claims = parseAccessTokenClaims(decoded);
    if (!claims) return reject('claims');

    if (claims.iat > Math.floor(now() / 1000) + ISSUED_AT_LEEWAY_SECONDS) {
      return reject('issued_in_future', { jti: claims.jti });
    }

    return { valid: true, claims };
  }

  return { issue, verify };
}
