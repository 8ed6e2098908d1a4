/**
 * Error envelope formatting and error-code to HTTP status mapping.
 *
 * Every error leaves the service as
 * `{ success: false, error: { code, message }, requestId }`.
 *
 * @module utils/responses
 */

import { v4 as uuidv4 } from 'uuid';
import { SECURITY_ERROR_CODES } from '../types/index.js';
import type { ErrorResponse, SecurityErrorCode } from '../types/index.js';

// ─── Error Code to HTTP Status Mapping ───────────────────────────────────────

const ERROR_STATUS_MAP: Record<SecurityErrorCode, number> = {
  INVALID_CREDENTIALS: 401,
  ACCOUNT_LOCKED: 423,
  TOKEN_INVALID: 401,
  TOKEN_EXPIRED: 401,
  CSRF_MISMATCH: 403,
  RATE_LIMIT_EXCEEDED: 429,
  PAYLOAD_TOO_LARGE: 413,
  VALIDATION_ERROR: 400,
  INSUFFICIENT_PERMISSIONS: 403,
  NOT_FOUND: 404,
  SERVICE_UNAVAILABLE: 503,
  INTERNAL_ERROR: 500,
};

/** Client-facing messages. Deliberately generic. */
export const ERROR_MESSAGES: Record<SecurityErrorCode, string> = {
  INVALID_CREDENTIALS: 'Incorrect login or password.',
  ACCOUNT_LOCKED: 'Account temporarily locked. Try again later.',
  TOKEN_INVALID: 'Could not validate credentials.',
  TOKEN_EXPIRED: 'Could not validate credentials.',
  CSRF_MISMATCH: 'CSRF token missing or invalid.',
  RATE_LIMIT_EXCEEDED: 'Too many requests. Please try again later.',
  PAYLOAD_TOO_LARGE: 'Request body too large.',
  VALIDATION_ERROR: 'Invalid input data.',
  INSUFFICIENT_PERMISSIONS: 'Not enough permissions.',
  NOT_FOUND: 'Resource not found.',
  SERVICE_UNAVAILABLE: 'Service temporarily unavailable.',
  INTERNAL_ERROR: 'An unexpected error occurred. Please try again later.',
};

// ─── Correlation ID ──────────────────────────────────────────────────────────

/** Generate a unique request correlation ID (UUID v4). */
export function generateRequestId(): string {
  return uuidv4();
}

// ─── Formatters ──────────────────────────────────────────────────────────────

/**
 * Map an error code to the code a client is allowed to see. Expired tokens
 * are reported exactly like invalid ones.
 */
export function publicErrorCode(code: SecurityErrorCode): SecurityErrorCode {
  return code === SECURITY_ERROR_CODES.TOKEN_EXPIRED ? SECURITY_ERROR_CODES.TOKEN_INVALID : code;
}

export function formatErrorResponse(
  code: SecurityErrorCode,
  requestId?: string,
  message?: string,
): ErrorResponse {
  const visible = publicErrorCode(code);
  return {
    success: false,
    error: {
      code: visible,
      message: message ?? ERROR_MESSAGES[visible],
    },
    requestId: requestId ?? generateRequestId(),
  };
}

export function getHttpStatusForError(code: SecurityErrorCode): number {
  return ERROR_STATUS_MAP[code];
}
