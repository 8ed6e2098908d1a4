/**
 * Rejects requests whose declared body exceeds the configured maximum.
 * Bodies without a Content-Length are bounded by the body parser limit.
 *
 * @module middleware/requestSizeLimit
 */

import type { RequestHandler } from 'express';
import { SECURITY_ERROR_CODES } from '../types/index.js';
import { sendError } from './errorHandler.js';

export function requestSizeLimit(maxBytes: number): RequestHandler {
  return (req, res, next) => {
    const declared = req.get('content-length');
    if (declared !== undefined && Number(declared) > maxBytes) {
      sendError(res, SECURITY_ERROR_CODES.PAYLOAD_TOO_LARGE);
      return;
    }
    next();
  };
}
