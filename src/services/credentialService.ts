/**
 * Credential verifier.
 *
 * Hashes passwords with bcrypt at a configurable cost and checks them
 * against stored digests. A mismatch is a `false` result, never an
 * exception; bcrypt's own comparison is timing-safe.
 *
 * @module services/credentialService
 */

import bcrypt from 'bcrypt';
import type { Logger } from '../logging/logger.js';
import { toError } from '../logging/logger.js';

/** Default bcrypt cost factor (number of salt rounds). */
export const DEFAULT_BCRYPT_COST = 12;

export interface CredentialVerifier {
  hash(password: string): Promise<string>;
  verify(password: string, digest: string): Promise<boolean>;
  /**
   * Spend the time of one comparison against a throwaway digest. Used for
   * unknown identities so they cost as much as a wrong password.
   * Always resolves to false.
   */
  verifyAgainstDummy(password: string): Promise<false>;
}

export interface CredentialVerifierOptions {
  cost?: number;
  logger: Logger;
}

export function createCredentialVerifier(options: CredentialVerifierOptions): CredentialVerifier {
  const cost = options.cost ?? DEFAULT_BCRYPT_COST;
  const logger = options.logger.child({ component: 'credentials' });
  let dummyDigest: Promise<string> | null = null;

  async function hash(password: string): Promise<string> {
    const salt = await bcrypt.genSalt(cost);
    return bcrypt.hash(password, salt);
  }

  async function verify(password: string, digest: string): Promise<boolean> {
    if (!password || !digest) return false;

    try {
      return await bcrypt.compare(password, digest);
    } catch (err) {
      // A digest bcrypt cannot parse never matches.
      logger.warn('Stored password digest could not be compared', {
        reason: toError(err).message,
      });
      return false;
    }
  }

  async function verifyAgainstDummy(password: string): Promise<false> {
    if (!dummyDigest) {
      dummyDigest = hash('dummy-password-for-timing');
    }
    await verify(password || 'x', await dummyDigest);
    return false;
  }

  return { hash, verify, verifyAgainstDummy };
}
