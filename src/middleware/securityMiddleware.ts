/**
 * Security header injection for every response.
 *
 * Headers are applied before any handler runs and are then locked: later
 * attempts by a handler to overwrite or remove a managed header are
 * ignored, as are attempts to set a header that discloses the server
 * stack.
 *
 * @module middleware/securityMiddleware
 */

import type { RequestHandler, Response } from 'express';
import { DISCLOSING_HEADERS, SecurityHeaders } from '../security/securityHeaders.js';
import type { SecurityHeadersOptions } from '../security/securityHeaders.js';

const DISCLOSING = new Set<string>(DISCLOSING_HEADERS.map((name) => name.toLowerCase()));

function lockHeaders(res: Response, managed: Set<string>): void {
  const setHeader = res.setHeader.bind(res);
  const removeHeader = res.removeHeader.bind(res);

  res.setHeader = (name: string, value: number | string | readonly string[]) => {
    const lower = name.toLowerCase();
    if (managed.has(lower) || DISCLOSING.has(lower)) return res;
    return setHeader(name, value);
  };

  res.removeHeader = (name: string) => {
    if (managed.has(name.toLowerCase())) return;
    removeHeader(name);
  };
}

export function securityHeadersMiddleware(options?: SecurityHeadersOptions): RequestHandler {
  const securityHeaders = new SecurityHeaders(options);
  const managed = securityHeaders.managedNames();

  return (_req, res, next) => {
    for (const name of DISCLOSING_HEADERS) {
      res.removeHeader(name);
    }
    securityHeaders.applyHeaders(res);
    lockHeaders(res, managed);
    next();
  };
}
