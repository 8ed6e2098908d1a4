/**
 * Authentication controller: login, logout, CSRF token issue and the
 * current caller's identity.
 *
 * Controllers are plain functions over injected dependencies. They return
 * a status and a body; cookie writes go through a {@link CookieResponse}
 * so they can be exercised without Express.
 *
 * @module controllers/authController
 */

import type { Logger } from '../logging/logger.js';
import { toError } from '../logging/logger.js';
import type { UserDirectory } from '../repositories/userDirectory.js';
import type { AttemptTracker } from '../services/attemptTracker.js';
import type { CredentialVerifier } from '../services/credentialService.js';
import type { CsrfGuard } from '../services/csrfService.js';
import type { TokenService } from '../services/tokenService.js';
import { SECURITY_ERROR_CODES } from '../types/index.js';
import type {
  AccessTokenClaims,
  ErrorResponse,
  LoginRequest,
  LoginResponse,
  Role,
  SecurityErrorCode,
  UserType,
} from '../types/index.js';
import {
  clearAuthCookies,
  ensureSession,
  generateSessionId,
  setAccessTokenCookie,
  setSessionCookie,
} from '../utils/cookies.js';
import type { CookieRequest, CookieResponse } from '../utils/cookies.js';
import { formatErrorResponse, getHttpStatusForError } from '../utils/responses.js';

// ─── Shared Types ────────────────────────────────────────────────────────────

/** Who is calling, as seen by the HTTP layer. */
export interface CallerContext {
  requestId: string;
  ipAddress: string;
  userAgent: string;
  logger: Logger;
  /** Session id from the caller's cookie, if any. */
  sessionId?: string;
}

export interface ControllerResult<T> {
  status: number;
  body: T | ErrorResponse;
}

export function failure(code: SecurityErrorCode, requestId: string): ControllerResult<never> {
  return { status: getHttpStatusForError(code), body: formatErrorResponse(code, requestId) };
}

/**
 * Run a call against a security store. A store fault is logged and
 * reported as `{ ok: false }` so the caller can fail closed.
 */
export async function fromStore<T>(
  context: CallerContext,
  operation: string,
  call: () => Promise<T>,
): Promise<{ ok: true; value: T } | { ok: false }> {
  try {
    return { ok: true, value: await call() };
  } catch (err) {
    context.logger.error('Security store unavailable', toError(err), { operation });
    return { ok: false };
  }
}

// ─── Dependencies ────────────────────────────────────────────────────────────

export interface LoginDependencies {
  directory: UserDirectory;
  verifier: CredentialVerifier;
  tracker: AttemptTracker;
  tokens: TokenService;
  csrf: CsrfGuard;
  cookieSecure: boolean;
  now?: () => number;
}

export interface SessionDependencies {
  csrf: CsrfGuard;
  cookieSecure: boolean;
}

// ─── Validation ──────────────────────────────────────────────────────────────

export const MAX_IDENTITY_LENGTH = 100;
export const MAX_PASSWORD_LENGTH = 1024;

/** Narrow an untrusted body to a login request, or null when malformed. */
export function parseLoginRequest(body: unknown): LoginRequest | null {
  if (typeof body !== 'object' || body === null) return null;
  const { identity, password } = body as Record<string, unknown>;

  if (typeof identity !== 'string' || typeof password !== 'string') return null;
  const trimmed = identity.trim();
  if (trimmed.length === 0 || trimmed.length > MAX_IDENTITY_LENGTH) return null;
  if (password.length === 0 || password.length > MAX_PASSWORD_LENGTH) return null;

  return { identity: trimmed, password };
}

// ─── Login ───────────────────────────────────────────────────────────────────

/**
 * Handle a password login.
 *
 * Flow:
 * 1. Validate the body (400)
 * 2. Admit the attempt with the tracker: a locked identity is refused
 *    (423), otherwise the attempt is counted as a failure up front
 * 3. Look up the account and compare the password; unknown identities are
 *    compared against a dummy digest
 * 4. Complete the attempt, which turns it into a success when valid
 * 5. On success issue the access token, a fresh session and its CSRF token
 *
 * Unknown identity, wrong password and inactive account produce the same
 * 401 response. A security store fault answers 503.
 */
export async function login(
  body: unknown,
  context: CallerContext,
  deps: LoginDependencies,
  res: CookieResponse,
): Promise<ControllerResult<LoginResponse>> {
  const { requestId, logger } = context;
  const request = parseLoginRequest(body);
  if (!request) {
    return failure(SECURITY_ERROR_CODES.VALIDATION_ERROR, requestId);
  }
  const { identity, password } = request;

  // The lock check and the failure count are one atomic step, taken before
  // the password is compared.
  const admission = await fromStore(context, 'admit', () =>
    deps.tracker.admit(identity, context.ipAddress, context.userAgent),
  );
  if (!admission.ok) return failure(SECURITY_ERROR_CODES.SERVICE_UNAVAILABLE, requestId);
  if (!admission.value.admitted) {
    logger.warn('Login refused for locked identity', { identity, clientIp: context.ipAddress });
    return failure(SECURITY_ERROR_CODES.ACCOUNT_LOCKED, requestId);
  }

  const credential = await deps.directory.findByIdentity(identity);
  const passwordValid = credential
    ? await deps.verifier.verify(password, credential.passwordHash)
    : await deps.verifier.verifyAgainstDummy(password);
  const succeeded = credential !== null && passwordValid && credential.status === 'active';

  const completed = await fromStore(context, 'complete', () =>
    deps.tracker.complete(identity, context.ipAddress, succeeded, context.userAgent),
  );
  if (!completed.ok) return failure(SECURITY_ERROR_CODES.SERVICE_UNAVAILABLE, requestId);

  if (!credential || !passwordValid || credential.status !== 'active') {
    logger.warn('Login failed', {
      identity,
      clientIp: context.ipAddress,
      reason: !credential ? 'unknown_identity' : !passwordValid ? 'wrong_password' : 'inactive',
    });
    return failure(SECURITY_ERROR_CODES.INVALID_CREDENTIALS, requestId);
  }

  const issued = deps.tokens.issue({
    sub: credential.identity,
    userId: credential.userId,
    userType: credential.userType,
    role: credential.role,
  });

  // A login always starts a new session; the previous one loses its CSRF token.
  const sessionId = generateSessionId();
  const previousSession = context.sessionId;
  const csrfToken = await fromStore(context, 'csrf.generate', async () => {
    if (previousSession) await deps.csrf.revoke(previousSession);
    return deps.csrf.generate(sessionId);
  });
  if (!csrfToken.ok) return failure(SECURITY_ERROR_CODES.SERVICE_UNAVAILABLE, requestId);

  const now = deps.now ?? Date.now;
  const maxAgeMs = Math.max(0, issued.expiresAt.getTime() - now());
  setAccessTokenCookie(res, issued.token, maxAgeMs, deps.cookieSecure);
  setSessionCookie(res, sessionId, maxAgeMs, deps.cookieSecure);

  logger.info('Login succeeded', {
    identity,
    userId: credential.userId,
    userType: credential.userType,
    clientIp: context.ipAddress,
  });

  return {
    status: 200,
    body: {
      access_token: issued.token,
      token_type: 'bearer',
      expires_at: issued.expiresAt.toISOString(),
      user_type: credential.userType,
      role: credential.role,
      user_id: credential.userId,
      csrf_token: csrfToken.value,
    },
  };
}

// ─── Logout ──────────────────────────────────────────────────────────────────

export interface LogoutResponse {
  success: true;
  message: string;
}

/**
 * End the caller's session: its CSRF token is revoked and both auth
 * cookies are cleared. The access token itself stays valid until it
 * expires.
 */
export async function logout(
  context: CallerContext,
  deps: SessionDependencies,
  res: CookieResponse,
): Promise<ControllerResult<LogoutResponse>> {
  clearAuthCookies(res, deps.cookieSecure);

  const sessionId = context.sessionId;
  if (sessionId) {
    const revoked = await fromStore(context, 'csrf.revoke', () => deps.csrf.revoke(sessionId));
    if (!revoked.ok) return failure(SECURITY_ERROR_CODES.SERVICE_UNAVAILABLE, context.requestId);
  }

  context.logger.info('Logged out');
  return { status: 200, body: { success: true, message: 'Logged out.' } };
}

// ─── CSRF Token ──────────────────────────────────────────────────────────────

export interface CsrfTokenResponse {
  csrf_token: string;
}

/** Issue a CSRF token for the caller's session, starting a session if needed. */
export async function issueCsrfToken(
  req: CookieRequest,
  context: CallerContext,
  deps: SessionDependencies,
  res: CookieResponse,
): Promise<ControllerResult<CsrfTokenResponse>> {
  const { sessionId } = ensureSession(req, res, deps.cookieSecure);

  const token = await fromStore(context, 'csrf.generate', () => deps.csrf.generate(sessionId));
  if (!token.ok) return failure(SECURITY_ERROR_CODES.SERVICE_UNAVAILABLE, context.requestId);

  return { status: 200, body: { csrf_token: token.value } };
}

// ─── Current Caller ──────────────────────────────────────────────────────────

export interface CurrentUserResponse {
  sub: string;
  user_id: number;
  user_type: UserType;
  role: Role;
  expires_at: string;
}

export function currentUser(claims: AccessTokenClaims): ControllerResult<CurrentUserResponse> {
  return {
    status: 200,
    body: {
      sub: claims.sub,
      user_id: claims.userId,
      user_type: claims.userType,
      role: claims.role,
      expires_at: new Date(claims.exp * 1000).toISOString(),
    },
  };
}
