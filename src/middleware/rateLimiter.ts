/**
 * Per-client rate limiting for every request.
 *
 * Every response carries `X-RateLimit-Limit`, `X-RateLimit-Remaining` and
 * `X-RateLimit-Reset` (unix seconds). A refused request gets 429 with
 * `Retry-After`. When the counter store cannot be reached the request is
 * refused with 503, unless the limiter is configured to fail open.
 *
 * @module middleware/rateLimiter
 */

import type { RequestHandler } from 'express';
import type { Logger } from '../logging/logger.js';
import { toError } from '../logging/logger.js';
import type { RateLimiter } from '../services/rateLimiter.js';
import { SECURITY_ERROR_CODES } from '../types/index.js';
import { sendError } from './errorHandler.js';
import { asyncHandler } from './asyncHandler.js';
import { clientAddress, loggerFor } from './requestContext.js';

export interface RateLimitMiddlewareOptions {
  limiter: RateLimiter;
  logger: Logger;
  failOpen?: boolean;
  now?: () => number;
}

/** Rate limit keyed by the client address Express resolved for the request. */
export function rateLimitMiddleware(options: RateLimitMiddlewareOptions): RequestHandler {
  const { limiter, failOpen = false } = options;
  const now = options.now ?? Date.now;

  return asyncHandler(async (req, res, next) => {
    const clientKey = clientAddress(req);
    const logger = loggerFor(res, options.logger);

    const result = await limiter.allow(clientKey).catch((err: unknown) => {
      logger.error('Rate limit store unavailable', toError(err), { failOpen });
      return null;
    });

    if (result === null) {
      if (failOpen) {
        next();
      } else {
        sendError(res, SECURITY_ERROR_CODES.SERVICE_UNAVAILABLE);
      }
      return;
    }

    const resetSeconds = Math.ceil(result.resetAt.getTime() / 1000);
    res.setHeader('X-RateLimit-Limit', String(result.limit));
    res.setHeader('X-RateLimit-Remaining', String(result.remaining));
    res.setHeader('X-RateLimit-Reset', String(resetSeconds));

    if (!result.allowed) {
      const retryAfter = Math.max(1, Math.ceil((result.resetAt.getTime() - now()) / 1000));
      res.setHeader('Retry-After', String(retryAfter));
      logger.warn('Rate limit exceeded', { clientIp: clientKey, path: req.originalUrl });
      sendError(res, SECURITY_ERROR_CODES.RATE_LIMIT_EXCEEDED);
      return;
    }

    next();
  });
}
