/**
 * Per-request context: request id, request-scoped logger and, once the
 * caller is authenticated, the verified token claims.
 *
 * The context lives in a WeakMap keyed by the response object, so it is
 * typed end to end and disappears with the response.
 *
 * @module middleware/requestContext
 */

import type { Request, RequestHandler, Response } from 'express';
import type { Logger } from '../logging/logger.js';
import type { AccessTokenClaims } from '../types/index.js';
import { generateRequestId } from '../utils/responses.js';

export const REQUEST_ID_HEADER = 'X-Request-Id';

/** Incoming request ids are echoed only when they are short and log-safe. */
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

interface RequestContext {
  requestId: string;
  logger: Logger;
  auth?: AccessTokenClaims;
}

const contexts = new WeakMap<Response, RequestContext>();

export function getRequestId(res: Response): string | undefined {
  return contexts.get(res)?.requestId;
}

export function getAuthClaims(res: Response): AccessTokenClaims | undefined {
  return contexts.get(res)?.auth;
}

export function setAuthClaims(res: Response, claims: AccessTokenClaims, fallback: Logger): void {
  const context = contexts.get(res);
  if (context) {
    context.auth = claims;
    context.logger = context.logger.child({ userId: String(claims.userId) });
    return;
  }
  contexts.set(res, { requestId: generateRequestId(), logger: fallback, auth: claims });
}

/** The request-scoped logger, or `fallback` outside the pipeline. */
export function loggerFor(res: Response, fallback: Logger): Logger {
  return contexts.get(res)?.logger ?? fallback;
}

/** Client address as resolved by Express, honouring the `trust proxy` setting. */
export function clientAddress(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

/**
 * Assign a request id, echo it in `X-Request-Id`, and log one line per
 * completed request.
 */
export function requestContext(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const incoming = req.get(REQUEST_ID_HEADER);
    const requestId =
      incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : generateRequestId();
    const requestLogger = logger.child({ requestId });

    contexts.set(res, { requestId, logger: requestLogger });
    res.setHeader(REQUEST_ID_HEADER, requestId);

    const start = Date.now();
    res.on('finish', () => {
      loggerFor(res, requestLogger).info('Request completed', {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - start,
        clientIp: clientAddress(req),
      });
    });

    next();
  };
}
