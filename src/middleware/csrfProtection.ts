/**
 * CSRF protection for state-changing requests.
 *
 * Safe methods (GET, HEAD, OPTIONS) pass through. Every other request
 * must present the token issued for its session, either in the
 * `x-csrf-token` header or in the `_csrf` body field. The session is
 * identified by the `session_id` cookie. Login and health checks are
 * exempt: a caller has no session before logging in.
 *
 * Failures are rejected with 403 and `CSRF_MISMATCH`.
 *
 * @module middleware/csrfProtection
 */

import type { Request, RequestHandler } from 'express';
import type { Logger } from '../logging/logger.js';
import type { CsrfGuard } from '../services/csrfService.js';
import { SECURITY_ERROR_CODES } from '../types/index.js';
import { readCookie, SESSION_COOKIE } from '../utils/cookies.js';
import { asyncHandler } from './asyncHandler.js';
import { sendError } from './errorHandler.js';
import { loggerFor } from './requestContext.js';

// ─── Constants ───────────────────────────────────────────────────────────────

/** Header name clients use to submit the CSRF token. */
export const CSRF_HEADER_NAME = 'x-csrf-token';

/** Body field name clients can use to submit the CSRF token. */
export const CSRF_BODY_FIELD = '_csrf';

/** HTTP methods that are considered safe and skip CSRF validation. */
export const SAFE_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);

export const DEFAULT_EXEMPT_PATHS: readonly string[] = ['/api/v1/auth/login', '/api/v1/health'];

// ─── Token Extraction ────────────────────────────────────────────────────────

/**
 * Extract the CSRF token submitted by the client.
 * Checks the `x-csrf-token` header first, then falls back to the
 * `_csrf` field in the request body.
 */
export function extractClientToken(req: Request): string | undefined {
  const headerValue = req.get(CSRF_HEADER_NAME);
  if (headerValue) return headerValue;

  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && CSRF_BODY_FIELD in body) {
    const field: unknown = Reflect.get(body, CSRF_BODY_FIELD);
    if (typeof field === 'string' && field.length > 0) return field;
  }

  return undefined;
}

// ─── Middleware ───────────────────────────────────────────────────────────────

export interface CsrfProtectionOptions {
  guard: CsrfGuard;
  logger: Logger;
  exemptPaths?: readonly string[];
}

/**
 * CSRF protection bound to the `session_id` cookie.
 *
 * 1. Safe methods and `exemptPaths` pass through.
 * 2. Other requests must submit the session's active token in the
 *    CSRF header or the `_csrf` body field.
 * 3. Anything else answers 403 `CSRF_MISMATCH`; the reason is logged only.
 */
export function csrfProtection(options: CsrfProtectionOptions): RequestHandler {
  const { guard } = options;
  const exempt = new Set(options.exemptPaths ?? DEFAULT_EXEMPT_PATHS);

  return asyncHandler(async (req, res, next) => {
    if (SAFE_METHODS.has(req.method.toUpperCase()) || exempt.has(req.path)) {
      next();
      return;
    }

    const token = extractClientToken(req);
    const sessionId = readCookie(req, SESSION_COOKIE);

    if (await guard.validate(token, sessionId)) {
      next();
      return;
    }

    loggerFor(res, options.logger).warn('CSRF validation failed', {
      method: req.method,
      path: req.originalUrl,
      reason: !token ? 'missing_token' : !sessionId ? 'missing_session' : 'invalid_token',
    });
    sendError(res, SECURITY_ERROR_CODES.CSRF_MISMATCH);
  });
}
