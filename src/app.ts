/**
 * Express application factory with dependency injection.
 *
 * Creates an app with middleware wired in this order:
 * 1. Request id and request logging
 * 2. Security headers (locked against later changes)
 * 3. Response sanitizer
 * 4. Per-client rate limiting
 * 5. Request size limit
 * 6. JSON body and cookie parsing
 * 7. CSRF protection for state-changing requests
 * 8. Routes under /api/v1
 * 9. Not-found and error handlers
 *
 * @module app
 */

import express from 'express';
import cookieParser from 'cookie-parser';
import type { Request, Response } from 'express';

import type { AppConfig } from './config/appConfig.js';
import type { Logger } from './logging/logger.js';
import type { UserDirectory } from './repositories/userDirectory.js';
import type { AttemptTracker } from './services/attemptTracker.js';
import type { CredentialVerifier } from './services/credentialService.js';
import type { CsrfGuard } from './services/csrfService.js';
import type { RateLimiter } from './services/rateLimiter.js';
import type { TokenService } from './services/tokenService.js';
import { sweepSecurityState } from './security/sweeper.js';
import type { SweepTargets } from './security/sweeper.js';

import { asyncHandler } from './middleware/asyncHandler.js';
import { authenticate, requireRoles, ROLE_GROUPS } from './middleware/authenticate.js';
import { csrfProtection } from './middleware/csrfProtection.js';
import { errorHandler, notFoundHandler, sendError } from './middleware/errorHandler.js';
import { rateLimitMiddleware } from './middleware/rateLimiter.js';
import {
  clientAddress,
  getAuthClaims,
  loggerFor,
  requestContext,
  getRequestId,
} from './middleware/requestContext.js';
import { requestSizeLimit } from './middleware/requestSizeLimit.js';
import { responseSanitizer } from './middleware/responseSanitizer.js';
import { securityHeadersMiddleware } from './middleware/securityMiddleware.js';

import {
  currentUser,
  issueCsrfToken,
  login,
  logout,
} from './controllers/authController.js';
import type {
  CallerContext,
  ControllerResult,
  LoginDependencies,
  SessionDependencies,
} from './controllers/authController.js';
import {
  cleanupExpired,
  csrfTokenStats,
  lockedAccounts,
  loginAttemptStats,
  unlockAccount,
} from './controllers/securityController.js';
import type { SecurityDependencies } from './controllers/securityController.js';
import { SECURITY_ERROR_CODES } from './types/index.js';
import { generateRequestId } from './utils/responses.js';
import { readCookie, SESSION_COOKIE } from './utils/cookies.js';

// ─── Dependency Types ────────────────────────────────────────────────────────

/** Everything the application needs, built by the server entry or a test. */
export interface AppDependencies {
  config: AppConfig;
  logger: Logger;
  directory: UserDirectory;
  verifier: CredentialVerifier;
  tokens: TokenService;
  csrf: CsrfGuard;
  tracker: AttemptTracker;
  rateLimiter: RateLimiter;
  /** Stores swept by the admin cleanup endpoint. */
  sweepTargets: SweepTargets;
  now?: () => number;
}

export const API_PREFIX = '/api/v1';

// ─── Helpers ─────────────────────────────────────────────────────────────────

function callerContext(req: Request, res: Response, logger: Logger): CallerContext {
  const context: CallerContext = {
    requestId: getRequestId(res) ?? generateRequestId(),
    ipAddress: clientAddress(req),
    userAgent: req.get('user-agent') ?? 'unknown',
    logger: loggerFor(res, logger),
  };
  const sessionId = readCookie(req, SESSION_COOKIE);
  if (sessionId) context.sessionId = sessionId;
  return context;
}

function send<T>(res: Response, result: ControllerResult<T>): void {
  res.status(result.status).json(result.body);
}

// ─── Application Factory ────────────────────────────────────────────────────

export function createApp(deps: AppDependencies): express.Express {
  const { config, logger } = deps;
  const now = deps.now ?? Date.now;
  const app = express();

  app.set('trust proxy', config.trustProxy);
  app.disable('x-powered-by');

  // ── Global Middleware (order matters) ──────────────────────────────────

  app.use(requestContext(logger));
  app.use(securityHeadersMiddleware({ hsts: config.env === 'production' }));
  app.use(responseSanitizer());
  app.use(
    rateLimitMiddleware({
      limiter: deps.rateLimiter,
      logger,
      failOpen: config.rateLimit.failOpen,
      now,
    }),
  );
  app.use(requestSizeLimit(config.maxBodyBytes));
  app.use(express.json({ limit: config.maxBodyBytes }));
  app.use(cookieParser());
  app.use(csrfProtection({ guard: deps.csrf, logger }));

  const requireAuth = authenticate(deps.tokens, logger);

  // ── Auth Routes ───────────────────────────────────────────────────────

  const loginDeps: LoginDependencies = {
    directory: deps.directory,
    verifier: deps.verifier,
    tracker: deps.tracker,
    tokens: deps.tokens,
    csrf: deps.csrf,
    cookieSecure: config.cookieSecure,
    now,
  };
  const sessionDeps: SessionDependencies = { csrf: deps.csrf, cookieSecure: config.cookieSecure };

  const auth = express.Router();

  auth.post(
    '/login',
    asyncHandler(async (req, res) => {
      send(res, await login(req.body, callerContext(req, res, logger), loginDeps, res));
    }),
  );

  auth.post(
    '/logout',
    requireAuth,
    asyncHandler(async (req, res) => {
      send(res, await logout(callerContext(req, res, logger), sessionDeps, res));
    }),
  );

  auth.get(
    '/csrf-token',
    asyncHandler(async (req, res) => {
      send(res, await issueCsrfToken(req, callerContext(req, res, logger), sessionDeps, res));
    }),
  );

  auth.get('/me', requireAuth, (_req, res) => {
    const claims = getAuthClaims(res);
    if (!claims) {
      sendError(res, SECURITY_ERROR_CODES.TOKEN_INVALID);
      return;
    }
    send(res, currentUser(claims));
  });

  app.use(`${API_PREFIX}/auth`, auth);

  // ── Security Administration ───────────────────────────────────────────

  const securityDeps: SecurityDependencies = {
    tracker: deps.tracker,
    csrf: deps.csrf,
    sweep: () => sweepSecurityState(deps.sweepTargets, logger, now()),
  };

  const security = express.Router();
  security.use(requireAuth, requireRoles(ROLE_GROUPS.admin));

  security.get(
    '/login-attempts',
    asyncHandler(async (req, res) => {
      send(res, await loginAttemptStats(callerContext(req, res, logger), securityDeps));
    }),
  );

  security.get(
    '/locked-accounts',
    asyncHandler(async (req, res) => {
      send(res, await lockedAccounts(callerContext(req, res, logger), securityDeps));
    }),
  );

  security.post(
    '/unlock-account',
    asyncHandler(async (req, res) => {
      send(res, await unlockAccount(req.body, callerContext(req, res, logger), securityDeps));
    }),
  );

  security.get(
    '/csrf-tokens',
    asyncHandler(async (req, res) => {
      send(res, await csrfTokenStats(callerContext(req, res, logger), securityDeps));
    }),
  );

  security.post(
    '/cleanup-expired',
    asyncHandler(async (req, res) => {
      send(res, await cleanupExpired(callerContext(req, res, logger), securityDeps));
    }),
  );

  app.use(`${API_PREFIX}/security`, security);

  // ── Health ────────────────────────────────────────────────────────────

  app.get(`${API_PREFIX}/health`, (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date(now()).toISOString() });
  });

  // ── Fallthrough ───────────────────────────────────────────────────────

  app.use(notFoundHandler());
  app.use(errorHandler(logger));

  return app;
}
