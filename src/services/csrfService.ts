/**
 * CSRF guard: per-session anti-forgery tokens.
 *
 * A token has the form `<issuedAtMs>.<nonce>.<mac>`, where the MAC is an
 * HMAC-SHA256 over the session id, the issue time and the nonce, keyed
 * with the CSRF secret. That secret is separate from the access-token
 * signing key. Each session holds at most one active token; issuing a new
 * one supersedes the previous token immediately.
 *
 * @module services/csrfService
 */

import { createHmac, randomBytes, timingSafeEqual } from 'node:crypto';
import type { CsrfConfig } from '../config/appConfig.js';
import type { Logger } from '../logging/logger.js';
import type { StateStore } from '../store/types.js';
import type { CsrfRecord, CsrfStats } from '../types/index.js';

/** Bytes of randomness in the nonce part of a token. */
export const CSRF_NONCE_BYTES = 32;

export interface CsrfGuard {
  generate(sessionId: string): Promise<string>;
  validate(token: string | undefined, sessionId: string | undefined): Promise<boolean>;
  revoke(sessionId: string): Promise<void>;
  stats(): Promise<CsrfStats>;
}

export interface CsrfGuardOptions {
  config: CsrfConfig;
  store: StateStore<CsrfRecord>;
  logger: Logger;
  now?: () => number;
}

/** Decoder for CSRF records read back from an external store. */
export function decodeCsrfRecord(raw: unknown): CsrfRecord | undefined {
  if (typeof raw !== 'object' || raw === null) return undefined;
  const { token, issuedAt, expiresAt } = raw as Record<string, unknown>;
  if (typeof token !== 'string' || typeof issuedAt !== 'number' || typeof expiresAt !== 'number') {
    return undefined;
  }
  return { token, issuedAt, expiresAt };
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * Create the CSRF guard.
 *
 * A token is `<issuedAt>.<nonce>.<mac>`, where the MAC binds issue time and
 * nonce to the session id under the CSRF secret. Each session holds one
 * active token in the store; generating a new one replaces it.
 */
export function createCsrfGuard(options: CsrfGuardOptions): CsrfGuard {
  const { config, store } = options;
  const logger = options.logger.child({ component: 'csrf' });
  const now = options.now ?? Date.now;
  const ttlMs = config.ttlSeconds * 1000;

  function sign(sessionId: string, issuedAt: number, nonce: string): string {
    return createHmac('sha256', config.secret)
      .update(`${sessionId}.${issuedAt}.${nonce}`)
      .digest('base64url');
  }

  async function generate(sessionId: string): Promise<string> {
    if (!sessionId) {
      throw new Error('A session id is required to issue a CSRF token');
    }

    const issuedAt = now();
    const nonce = randomBytes(CSRF_NONCE_BYTES).toString('base64url');
    const token = `${issuedAt}.${nonce}.${sign(sessionId, issuedAt, nonce)}`;

    await store.update(sessionId, () => ({ token, issuedAt, expiresAt: issuedAt + ttlMs }), ttlMs);
    return token;
  }

  async function validate(
    token: string | undefined,
    sessionId: string | undefined,
  ): Promise<boolean> {
    if (!token || !sessionId) return false;

    const parts = token.split('.');
    if (parts.length !== 3) return false;
    const [issuedAtPart = '', nonce = '', mac = ''] = parts;
    const issuedAt = Number(issuedAtPart);
    if (!Number.isSafeInteger(issuedAt) || !nonce || !mac) return false;

    // Binding check first: a token minted for another session fails here.
    if (!safeEqual(mac, sign(sessionId, issuedAt, nonce))) {
      logger.warn('CSRF token does not match session');
      return false;
    }

    const current = now();
    if (current >= issuedAt + ttlMs) return false;

    const active = await store.get(sessionId);
    if (!active) return false;

    if (current >= active.expiresAt) {
      await store.delete(sessionId);
      return false;
    }

    return safeEqual(active.token, token);
  }

  async function revoke(sessionId: string): Promise<void> {
    await store.delete(sessionId);
  }

  async function stats(): Promise<CsrfStats> {
    const current = now();
    const records = await store.entries();
    const expired = records.filter(([, record]) => current >= record.expiresAt).length;
    return { total: records.length, valid: records.length - expired, expired };
  }

  return { generate, validate, revoke, stats };
}
