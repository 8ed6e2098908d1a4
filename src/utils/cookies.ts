/**
 * Cookie helpers for the access token and the session identifier.
 *
 * Both cookies are httpOnly. The session cookie is the stable per-caller
 * identifier that CSRF tokens are bound to.
 *
 * @module utils/cookies
 */

import { randomBytes } from 'node:crypto';

// ─── Constants ───────────────────────────────────────────────────────────────

export const ACCESS_TOKEN_COOKIE = 'access_token';

export const SESSION_COOKIE = 'session_id';

/** Random bytes in a session id (base64url encoded). */
export const SESSION_ID_BYTES = 32;

/** Lifetime of the session cookie when no login sets a shorter one. */
export const DEFAULT_SESSION_MAX_AGE_MS = 24 * 60 * 60 * 1000;

// ─── Types ───────────────────────────────────────────────────────────────────

export interface CookieOptions {
  httpOnly: boolean;
  secure: boolean;
  sameSite: 'strict' | 'lax' | 'none';
  path: string;
  maxAge?: number;
}

/**
 * Minimal response shape for setting/clearing cookies.
 * Compatible with Express Response but decoupled for testability.
 */
export interface CookieResponse {
  cookie(name: string, value: string, options: CookieOptions): unknown;
  clearCookie(name: string, options: Omit<CookieOptions, 'maxAge'>): unknown;
}

/** Minimal request shape for reading cookies. */
export interface CookieRequest {
  cookies?: Record<string, unknown>;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function baseOptions(secure: boolean): Omit<CookieOptions, 'maxAge'> {
  return { httpOnly: true, secure, sameSite: 'lax', path: '/' };
}

export function readCookie(req: CookieRequest, name: string): string | undefined {
  const value = req.cookies?.[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function generateSessionId(): string {
  return randomBytes(SESSION_ID_BYTES).toString('base64url');
}

export function setAccessTokenCookie(
  res: CookieResponse,
  token: string,
  maxAgeMs: number,
  secure: boolean,
): void {
  res.cookie(ACCESS_TOKEN_COOKIE, token, { ...baseOptions(secure), maxAge: maxAgeMs });
}

export function setSessionCookie(
  res: CookieResponse,
  sessionId: string,
  maxAgeMs: number,
  secure: boolean,
): void {
  res.cookie(SESSION_COOKIE, sessionId, { ...baseOptions(secure), maxAge: maxAgeMs });
}

export function clearAuthCookies(res: CookieResponse, secure: boolean): void {
  for (const name of [ACCESS_TOKEN_COOKIE, SESSION_COOKIE]) {
    res.clearCookie(name, baseOptions(secure));
  }
}

/**
 * Return the caller's session id, issuing a fresh session cookie when the
 * caller has none.
 */
export function ensureSession(
  req: CookieRequest,
  res: CookieResponse,
  secure: boolean,
): { sessionId: string; created: boolean } {
  const existing = readCookie(req, SESSION_COOKIE);
  if (existing) return { sessionId: existing, created: false };

  const sessionId = generateSessionId();
  setSessionCookie(res, sessionId, DEFAULT_SESSION_MAX_AGE_MS, secure);
  return { sessionId, created: true };
}
