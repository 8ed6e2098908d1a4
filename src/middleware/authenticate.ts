/**
 * Access-token authentication and role checks.
 *
 * The token is read from `Authorization: Bearer <token>`, falling back to
 * the `access_token` cookie. Every failure looks the same to the client:
 * 401 `TOKEN_INVALID` with `WWW-Authenticate: Bearer`.
 *
 * @module middleware/authenticate
 */

import type { Request, RequestHandler } from 'express';
import type { Logger } from '../logging/logger.js';
import type { TokenService } from '../services/tokenService.js';
import { SECURITY_ERROR_CODES } from '../types/index.js';
import type { Role } from '../types/index.js';
import { ACCESS_TOKEN_COOKIE, readCookie } from '../utils/cookies.js';
import { sendError } from './errorHandler.js';
import { getAuthClaims, setAuthClaims } from './requestContext.js';

/** Role sets used by route guards. */
export const ROLE_GROUPS = {
  admin: ['admin'],
} as const satisfies Record<string, readonly Role[]>;

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

export function extractAccessToken(req: Request): string | undefined {
  const header = req.get('authorization');
  if (header) {
    const match = BEARER_PATTERN.exec(header);
    if (match?.[1]) return match[1];
  }
  return readCookie(req, ACCESS_TOKEN_COOKIE);
}

/**
 * Require a valid access token and attach its claims to the request
 * context. See {@link getAuthClaims}.
 */
export function authenticate(tokenService: TokenService, logger: Logger): RequestHandler {
  return (req, res, next) => {
    const token = extractAccessToken(req);
    const result = token ? tokenService.verify(token) : { valid: false as const };

    if (!result.valid) {
      res.setHeader('WWW-Authenticate', 'Bearer');
      sendError(res, SECURITY_ERROR_CODES.TOKEN_INVALID);
      return;
    }

    setAuthClaims(res, result.claims, logger);
    next();
  };
}

/** Admit only authenticated callers whose role is in `roles`. */
export function requireRoles(roles: readonly Role[]): RequestHandler {
  return (_req, res, next) => {
    const claims = getAuthClaims(res);
    if (!claims) {
      res.setHeader('WWW-Authenticate', 'Bearer');
      sendError(res, SECURITY_ERROR_CODES.TOKEN_INVALID);
      return;
    }
    if (!roles.includes(claims.role)) {
      sendError(res, SECURITY_ERROR_CODES.INSUFFICIENT_PERMISSIONS);
      return;
    }
    next();
  };
}
