/**
 * Core type definitions for the request-authentication and
 * abuse-protection layer.
 */

// ─── Identity ────────────────────────────────────────────────────────────────

/** The three account tables a caller can authenticate against. */
export type UserType = 'master' | 'employee' | 'administrator';

/** Role names used by the field-service business, highest privilege first. */
export const ROLES = ['admin', 'director', 'manager', 'avitolog', 'callcentr', 'master'] as const;

export type Role = (typeof ROLES)[number];

export type AccountStatus = 'active' | 'inactive';

/** A stored, hashed password for one identity. Never holds plaintext. */
export interface Credential {
  identity: string;
  userId: number;
  userType: UserType;
  role: Role;
  passwordHash: string;
  status: AccountStatus;
}

// ─── Tokens ──────────────────────────────────────────────────────────────────

/** Identity facts supplied by the caller when a token is issued. */
export interface IdentityClaims {
  sub: string;
  userId: number;
  userType: UserType;
  role: Role;
}

/** Claims carried by an issued access token. */
export interface AccessTokenClaims extends IdentityClaims {
  iat: number;
  exp: number;
  jti: string;
  iss: string;
}

export interface IssuedToken {
  token: string;
  jti: string;
  expiresAt: Date;
}

export type TokenVerification =
  | { valid: true; claims: AccessTokenClaims }
  | { valid: false };

/** Internal classification of a failed verification. Logged, never returned. */
export type TokenFailureReason =
  | 'malformed'
  | 'signature'
  | 'expired'
  | 'issuer'
  | 'claims'
  | 'issued_in_future';

// ─── CSRF ────────────────────────────────────────────────────────────────────

export interface CsrfRecord {
  token: string;
  issuedAt: number;
  expiresAt: number;
}

export interface CsrfStats {
  total: number;
  valid: number;
  expired: number;
}

// ─── Login Attempts ──────────────────────────────────────────────────────────

export interface LoginAttemptRecord {
  identity: string;
  source: string;
  timestamp: number;
  success: boolean;
  userAgent?: string;
}

export interface AttemptHistory {
  attempts: LoginAttemptRecord[];
  lockedUntil: number | null;
  totalAttempts: number;
}

export interface LockedIdentity {
  identity: string;
  lockedUntil: Date;
  remainingSeconds: number;
  failedAttempts: number;
  lastSource: string | null;
}

export interface AttemptStats {
  trackedIdentities: number;
  totalAttempts: number;
  successfulAttempts: number;
  failedAttempts: number;
  lockedIdentities: number;
  uniqueSources: number;
  successRate: number;
}

// ─── Rate Limiting ───────────────────────────────────────────────────────────

export interface RateBucket {
  windowStart: number;
  count: number;
}

export interface RateLimitResult {
  allowed: boolean;
  limit: number;
  remaining: number;
  resetAt: Date;
}

// ─── API Shapes ──────────────────────────────────────────────────────────────

export interface LoginRequest {
  identity: string;
  password: string;
}

export interface LoginResponse {
  access_token: string;
  token_type: 'bearer';
  expires_at: string;
  user_type: UserType;
  role: Role;
  user_id: number;
  csrf_token: string;
}

export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
  };
  requestId: string;
}

// ─── Error Codes ─────────────────────────────────────────────────────────────

export const SECURITY_ERROR_CODES = {
  INVALID_CREDENTIALS: 'INVALID_CREDENTIALS',
  ACCOUNT_LOCKED: 'ACCOUNT_LOCKED',
  TOKEN_INVALID: 'TOKEN_INVALID',
  TOKEN_EXPIRED: 'TOKEN_EXPIRED',
  CSRF_MISMATCH: 'CSRF_MISMATCH',
  RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INSUFFICIENT_PERMISSIONS: 'INSUFFICIENT_PERMISSIONS',
  NOT_FOUND: 'NOT_FOUND',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type SecurityErrorCode = (typeof SECURITY_ERROR_CODES)[keyof typeof SECURITY_ERROR_CODES];
