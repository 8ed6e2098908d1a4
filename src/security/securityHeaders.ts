/**
 * Hardening headers attached to every response.
 *
 * The set is fixed at construction time and never derived from request
 * content. HSTS is only added in production, where the service sits
 * behind TLS.
 *
 * @module security/securityHeaders
 */

/** Map of header name to header value. */
export type HeaderMap = Record<string, string>;

export interface SecurityHeadersOptions {
  /** Add Strict-Transport-Security. */
  hsts?: boolean;
}

export const CONTENT_SECURITY_POLICY = [
  "default-src 'self'",
  "script-src 'self'",
  "style-src 'self'",
  "img-src 'self'",
  "frame-ancestors 'none'",
  "base-uri 'self'",
  "form-action 'self'",
].join('; ');

export const STRICT_TRANSPORT_SECURITY = 'max-age=31536000; includeSubDomains';

const BASE_HEADERS: HeaderMap = {
  'X-Content-Type-Options': 'nosniff',
  'X-Frame-Options': 'DENY',
  'X-XSS-Protection': '1; mode=block',
  'Content-Security-Policy': CONTENT_SECURITY_POLICY,
  'Referrer-Policy': 'strict-origin-when-cross-origin',
  'Permissions-Policy': 'camera=(), microphone=(), geolocation=()',
};

/** Headers that reveal the server stack and are always stripped. */
export const DISCLOSING_HEADERS = ['X-Powered-By', 'Server'] as const;

export class SecurityHeaders {
  private readonly headers: HeaderMap;

  constructor(options: SecurityHeadersOptions = {}) {
    this.headers = { ...BASE_HEADERS };
    if (options.hsts) {
      this.headers['Strict-Transport-Security'] = STRICT_TRANSPORT_SECURITY;
    }
  }

  getHeaders(): HeaderMap {
    return { ...this.headers };
  }

  /** Lower-cased names of the managed headers. */
  managedNames(): Set<string> {
    return new Set(Object.keys(this.headers).map((name) => name.toLowerCase()));
  }

  applyHeaders(response: { setHeader: (name: string, value: string) => unknown }): HeaderMap {
    const headers = this.getHeaders();
    for (const [name, value] of Object.entries(headers)) {
      response.setHeader(name, value);
    }
    return headers;
  }
}
