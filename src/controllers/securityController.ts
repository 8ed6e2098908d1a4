/**
 * Administrative views over the attempt tracker and the CSRF guard.
 *
 * @module controllers/securityController
 */

import type { AttemptTracker } from '../services/attemptTracker.js';
import type { CsrfGuard } from '../services/csrfService.js';
import { SECURITY_ERROR_CODES } from '../types/index.js';
import type { SweepReport } from '../security/sweeper.js';
import { failure, fromStore } from './authController.js';
import type { CallerContext, ControllerResult } from './authController.js';

export interface SecurityDependencies {
  tracker: AttemptTracker;
  csrf: CsrfGuard;
  /** Runs one sweep of expired security state. */
  sweep: () => Promise<SweepReport>;
}

// ─── Response Shapes ─────────────────────────────────────────────────────────

export interface LoginAttemptStatsResponse {
  tracked_identities: number;
  total_attempts: number;
  successful_attempts: number;
  failed_attempts: number;
  locked_accounts: number;
  unique_sources: number;
  success_rate: number;
}

export interface LockedAccountView {
  identity: string;
  locked_until: string;
  remaining_seconds: number;
  failed_attempts: number;
  last_source: string | null;
}

export interface LockedAccountsResponse {
  count: number;
  accounts: LockedAccountView[];
}

export interface UnlockResponse {
  success: true;
  identity: string;
  message: string;
}

export interface CsrfStatsResponse {
  total_tokens: number;
  valid_tokens: number;
  expired_tokens: number;
}

export interface CleanupResponse {
  removed: Record<string, number>;
  timestamp: string;
}

// ─── Handlers ────────────────────────────────────────────────────────────────

export async function loginAttemptStats(
  context: CallerContext,
  deps: SecurityDependencies,
): Promise<ControllerResult<LoginAttemptStatsResponse>> {
  const stats = await fromStore(context, 'attempts.stats', () => deps.tracker.stats());
  if (!stats.ok) return failure(SECURITY_ERROR_CODES.SERVICE_UNAVAILABLE, context.requestId);

  const value = stats.value;
  return {
    status: 200,
    body: {
      tracked_identities: value.trackedIdentities,
      total_attempts: value.totalAttempts,
      successful_attempts: value.successfulAttempts,
      failed_attempts: value.failedAttempts,
      locked_accounts: value.lockedIdentities,
      unique_sources: value.uniqueSources,
      success_rate: Math.round(value.successRate * 100) / 100,
    },
  };
}

export async function lockedAccounts(
  context: CallerContext,
  deps: SecurityDependencies,
): Promise<ControllerResult<LockedAccountsResponse>> {
  const locked = await fromStore(context, 'attempts.locked', () => deps.tracker.lockedIdentities());
  if (!locked.ok) return failure(SECURITY_ERROR_CODES.SERVICE_UNAVAILABLE, context.requestId);

  const accounts = locked.value.map((entry) => ({
    identity: entry.identity,
    locked_until: entry.lockedUntil.toISOString(),
    remaining_seconds: entry.remainingSeconds,
    failed_attempts: entry.failedAttempts,
    last_source: entry.lastSource,
  }));
  return { status: 200, body: { count: accounts.length, accounts } };
}

/** Clear the lock and failure history of one identity. 404 when it was never tracked. */
export async function unlockAccount(
  body: unknown,
  context: CallerContext,
  deps: SecurityDependencies,
): Promise<ControllerResult<UnlockResponse>> {
  const identity =
    typeof body === 'object' && body !== null && 'identity' in body ? body.identity : undefined;
  if (typeof identity !== 'string' || identity.trim().length === 0) {
    return failure(SECURITY_ERROR_CODES.VALIDATION_ERROR, context.requestId);
  }
  const target = identity.trim();

  const unlocked = await fromStore(context, 'attempts.unlock', () => deps.tracker.unlock(target));
  if (!unlocked.ok) return failure(SECURITY_ERROR_CODES.SERVICE_UNAVAILABLE, context.requestId);
  if (!unlocked.value) return failure(SECURITY_ERROR_CODES.NOT_FOUND, context.requestId);

  context.logger.info('Account unlocked', { identity: target });
  return {
    status: 200,
    body: { success: true, identity: target, message: 'Account unlocked.' },
  };
}

export async function csrfTokenStats(
  context: CallerContext,
  deps: SecurityDependencies,
): Promise<ControllerResult<CsrfStatsResponse>> {
  const stats = await fromStore(context, 'csrf.stats', () => deps.csrf.stats());
  if (!stats.ok) return failure(SECURITY_ERROR_CODES.SERVICE_UNAVAILABLE, context.requestId);

  return {
    status: 200,
    body: {
      total_tokens: stats.value.total,
      valid_tokens: stats.value.valid,
      expired_tokens: stats.value.expired,
    },
  };
}

export async function cleanupExpired(
  context: CallerContext,
  deps: SecurityDependencies,
): Promise<ControllerResult<CleanupResponse>> {
  const report = await deps.sweep();
  context.logger.info('Expired security state cleaned up', { ...report.removed });
  return {
    status: 200,
    body: { removed: report.removed, timestamp: report.sweptAt.toISOString() },
  };
}
