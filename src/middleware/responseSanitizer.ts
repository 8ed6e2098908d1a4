/**
 * Escapes markup in every JSON body before it is serialised.
 *
 * @module middleware/responseSanitizer
 */

import type { RequestHandler } from 'express';
import { sanitize } from '../utils/sanitize.js';

export function responseSanitizer(): RequestHandler {
  return (_req, res, next) => {
    const json = res.json.bind(res);
    res.json = (body?: unknown) => json(sanitize(body));
    next();
  };
}
