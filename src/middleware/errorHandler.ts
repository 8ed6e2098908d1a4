/**
 * Error responses and the terminal error handlers of the pipeline.
 *
 * @module middleware/errorHandler
 */

import type { ErrorRequestHandler, RequestHandler, Response } from 'express';
import type { Logger } from '../logging/logger.js';
import { toError } from '../logging/logger.js';
import { SECURITY_ERROR_CODES } from '../types/index.js';
import type { SecurityErrorCode } from '../types/index.js';
import { formatErrorResponse, getHttpStatusForError } from '../utils/responses.js';
import { getRequestId, loggerFor } from './requestContext.js';

/** Write the standard error envelope for `code`. */
export function sendError(res: Response, code: SecurityErrorCode, message?: string): void {
  res.status(getHttpStatusForError(code)).json(formatErrorResponse(code, getRequestId(res), message));
}

/** `type` set by body-parser on the errors it raises. */
function bodyParserErrorType(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string') {
    return err.type;
  }
  return undefined;
}

export function notFoundHandler(): RequestHandler {
  return (_req, res) => {
    sendError(res, SECURITY_ERROR_CODES.NOT_FOUND);
  };
}

/**
 * Convert anything thrown downstream into an error envelope. Body parser
 * failures keep their meaning; everything else is an internal error whose
 * details stay in the log.
 */
export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    switch (bodyParserErrorType(err)) {
      case 'entity.too.large':
        sendError(res, SECURITY_ERROR_CODES.PAYLOAD_TOO_LARGE);
        return;
      case 'entity.parse.failed':
      case 'encoding.unsupported':
      case 'charset.unsupported':
        sendError(res, SECURITY_ERROR_CODES.VALIDATION_ERROR);
        return;
    }

    loggerFor(res, logger).error('Unhandled error', toError(err), {
      method: req.method,
      path: req.originalUrl,
    });
    sendError(res, SECURITY_ERROR_CODES.INTERNAL_ERROR);
  };
}
