/**
 * Unit tests for the authentication controller.
 *
 * All dependencies are injected as plain objects, so no vi.mock is
 * needed. Tests cover validation, the lockout check, the uniform failure
 * response, session rotation on login, store faults and logout.
 *
 * @module controllers/authController.test
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  currentUser,
  issueCsrfToken,
  login,
  logout,
  MAX_IDENTITY_LENGTH,
  parseLoginRequest,
} from './authController.js';
import type { CallerContext, LoginDependencies, SessionDependencies } from './authController.js';
import type { AttemptTracker } from '../services/attemptTracker.js';
import type { Credential, ErrorResponse } from '../types/index.js';
import type { CookieOptions, CookieResponse } from '../utils/cookies.js';
import { CLOCK_START } from '../test/fixtures.js';
import { createLogCapture } from '../test/mockCollectors.js';
import type { LogCapture } from '../test/mockCollectors.js';

// ─── Helpers ─────────────────────────────────────────────────────────────────

const EXPIRES_AT = new Date(CLOCK_START + 30 * 60 * 1000);

function fakeCredential(overrides: Partial<Credential> = {}): Credential {
  return {
    identity: 'master_ivanov',
    userId: 17,
    userType: 'master',
    role: 'master',
    passwordHash: '$2b$04$hashedvalue',
    status: 'active',
    ...overrides,
  };
}

interface CookieCall {
  name: string;
  value: string;
  options: CookieOptions;
}

function createMockResponse() {
  const cookies: CookieCall[] = [];
  const cleared: string[] = [];
  const res: CookieResponse = {
    cookie(name, value, options) {
      cookies.push({ name, value, options });
    },
    clearCookie(name) {
      cleared.push(name);
    },
  };
  return { res, cookies, cleared };
}

function isError(body: unknown): body is ErrorResponse {
  return typeof body === 'object' && body !== null && 'success' in body && body.success === false;
}

function createMocks() {
  return {
    findByIdentity: vi.fn().mockResolvedValue(fakeCredential()),
    verify: vi.fn().mockResolvedValue(true),
    verifyAgainstDummy: vi.fn().mockResolvedValue(false),
    admit: vi.fn<AttemptTracker['admit']>().mockResolvedValue({
      admitted: true,
    }),
    complete: vi.fn().mockResolvedValue(undefined),
    issue: vi.fn().mockReturnValue({ token: 'signed.jwt.value', jti: 'jti-1', expiresAt: EXPIRES_AT }),
    generate: vi.fn().mockResolvedValue('1736935200000.nonce.mac'),
    revoke: vi.fn().mockResolvedValue(undefined),
  };
}

type Mocks = ReturnType<typeof createMocks>;

function buildDeps(mocks: Mocks): LoginDependencies {
  return {
    directory: { findByIdentity: mocks.findByIdentity },
    verifier: {
      hash: vi.fn(),
      verify: mocks.verify,
      verifyAgainstDummy: mocks.verifyAgainstDummy,
    },
    tracker: {
      admit: mocks.admit,
      complete: mocks.complete,
      record: vi.fn(),
      isLocked: vi.fn(),
      failedCount: vi.fn(),
      lockoutRemaining: vi.fn(),
      unlock: vi.fn(),
      lockedIdentities: vi.fn(),
      stats: vi.fn(),
    },
    tokens: { issue: mocks.issue, verify: vi.fn() },
    csrf: { generate: mocks.generate, validate: vi.fn(), revoke: mocks.revoke, stats: vi.fn() },
    cookieSecure: true,
    now: () => CLOCK_START,
  };
}

const VALID_BODY = { identity: 'master_ivanov', password: 'master-password-1' };

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('parseLoginRequest', () => {
  it('should trim the identity and keep the password as given', () => {
    expect(parseLoginRequest({ identity: '  admin ', password: ' p ' })).toEqual({
      identity: 'admin',
      password: ' p ',
    });
  });

  it('should reject malformed bodies', () => {
    expect(parseLoginRequest(null)).toBeNull();
    expect(parseLoginRequest('admin')).toBeNull();
    expect(parseLoginRequest({ identity: 'admin' })).toBeNull();
    expect(parseLoginRequest({ identity: 5, password: 'x' })).toBeNull();
    expect(parseLoginRequest({ identity: '   ', password: 'x' })).toBeNull();
    expect(parseLoginRequest({ identity: 'admin', password: '' })).toBeNull();
    expect(parseLoginRequest({ identity: 'a'.repeat(MAX_IDENTITY_LENGTH + 1), password: 'x' })).toBeNull();
  });
});

describe('login', () => {
  let mocks: Mocks;
  let deps: LoginDependencies;
  let logs: LogCapture;
  let context: CallerContext;

  beforeEach(() => {
    mocks = createMocks();
    deps = buildDeps(mocks);
    logs = createLogCapture();
    context = {
      requestId: 'req-1',
      ipAddress: '10.0.0.1',
      userAgent: 'TestAgent/1.0',
      logger: logs.logger,
    };
  });

  it('should return 400 for an invalid body without touching the tracker', async () => {
    const { res } = createMockResponse();

    const result = await login({ identity: 'x' }, context, deps, res);

    expect(result.status).toBe(400);
    expect(mocks.admit).not.toHaveBeenCalled();
  });

  it('should issue a token, a session and a CSRF token on success', async () => {
    const { res, cookies } = createMockResponse();

    const result = await login(VALID_BODY, context, deps, res);

    expect(result).toEqual({
      status: 200,
      body: {
        access_token: 'signed.jwt.value',
        token_type: 'bearer',
        expires_at: EXPIRES_AT.toISOString(),
        user_type: 'master',
        role: 'master',
        user_id: 17,
        csrf_token: '1736935200000.nonce.mac',
      },
    });
    expect(mocks.issue).toHaveBeenCalledWith({
      sub: 'master_ivanov',
      userId: 17,
      userType: 'master',
      role: 'master',
    });
    expect(mocks.admit).toHaveBeenCalledWith('master_ivanov', '10.0.0.1', 'TestAgent/1.0');
    expect(mocks.complete).toHaveBeenCalledWith('master_ivanov', '10.0.0.1', true, 'TestAgent/1.0');

    expect(cookies.map((c) => c.name)).toEqual(['access_token', 'session_id']);
    expect(cookies[0]?.value).toBe('signed.jwt.value');
    expect(cookies[0]?.options).toEqual({
      httpOnly: true,
      secure: true,
      sameSite: 'lax',
      path: '/',
      maxAge: 30 * 60 * 1000,
    });
    expect(mocks.generate).toHaveBeenCalledWith(cookies[1]?.value);
    expect(logs.messages('info')).toContain('Login succeeded');
  });

  it('should rotate the session and revoke the old CSRF token', async () => {
    const { res, cookies } = createMockResponse();

    await login(VALID_BODY, { ...context, sessionId: 'old-session' }, deps, res);

    expect(mocks.revoke).toHaveBeenCalledWith('old-session');
    expect(cookies[1]?.value).not.toBe('old-session');
  });

  it('should refuse a locked identity before checking the password', async () => {
    mocks.admit.mockResolvedValue({ admitted: false, lockedUntil: CLOCK_START + 60_000 });
    const { res, cookies } = createMockResponse();

    const result = await login(VALID_BODY, context, deps, res);

    expect(result.status).toBe(423);
    expect(isError(result.body) && result.body.error.code).toBe('ACCOUNT_LOCKED');
    expect(mocks.findByIdentity).not.toHaveBeenCalled();
    expect(mocks.verify).not.toHaveBeenCalled();
    expect(mocks.complete).not.toHaveBeenCalled();
    expect(cookies).toHaveLength(0);
  });

  it('should settle the attempt as a failure and answer 401 for a wrong password', async () => {
    mocks.verify.mockResolvedValue(false);
    const { res, cookies } = createMockResponse();

    const result = await login(VALID_BODY, context, deps, res);

    expect(result.status).toBe(401);
    expect(mocks.complete).toHaveBeenCalledWith('master_ivanov', '10.0.0.1', false, 'TestAgent/1.0');
    expect(logs.find('Login failed')?.metadata).toMatchObject({ reason: 'wrong_password' });
    expect(cookies).toHaveLength(0);
  });

  it('should compare against a dummy digest for an unknown identity', async () => {
    mocks.findByIdentity.mockResolvedValue(null);
    const { res } = createMockResponse();

    const result = await login(VALID_BODY, context, deps, res);

    expect(result.status).toBe(401);
    expect(mocks.verifyAgainstDummy).toHaveBeenCalledWith('master-password-1');
    expect(mocks.verify).not.toHaveBeenCalled();
    expect(logs.find('Login failed')?.metadata).toMatchObject({ reason: 'unknown_identity' });
  });

  it('should give unknown identity, wrong password and inactive account the same body', async () => {
    const bodies: unknown[] = [];

    mocks.findByIdentity.mockResolvedValueOnce(null);
    bodies.push((await login(VALID_BODY, context, deps, createMockResponse().res)).body);

    mocks.verify.mockResolvedValueOnce(false);
    bodies.push((await login(VALID_BODY, context, deps, createMockResponse().res)).body);

    mocks.findByIdentity.mockResolvedValueOnce(fakeCredential({ status: 'inactive' }));
    bodies.push((await login(VALID_BODY, context, deps, createMockResponse().res)).body);

    const expected = {
      success: false,
      error: { code: 'INVALID_CREDENTIALS', message: 'Incorrect login or password.' },
      requestId: 'req-1',
    };
    expect(bodies).toEqual([expected, expected, expected]);
  });

  it('should answer 503 when the attempt store is unavailable', async () => {
    mocks.admit.mockRejectedValue(new Error('connection refused'));
    const { res } = createMockResponse();

    const result = await login(VALID_BODY, context, deps, res);

    expect(result.status).toBe(503);
    expect(logs.find('Security store unavailable')?.metadata).toEqual({ operation: 'admit' });
    expect(mocks.verify).not.toHaveBeenCalled();
  });

  it('should not set cookies when the CSRF store fails after a good password', async () => {
    mocks.generate.mockRejectedValue(new Error('connection refused'));
    const { res, cookies } = createMockResponse();

    const result = await login(VALID_BODY, context, deps, res);

    expect(result.status).toBe(503);
    expect(cookies).toHaveLength(0);
  });
});

describe('logout', () => {
  let deps: SessionDependencies;
  let revoke: ReturnType<typeof vi.fn>;
  let context: CallerContext;

  beforeEach(() => {
    revoke = vi.fn().mockResolvedValue(undefined);
    deps = {
      csrf: { generate: vi.fn(), validate: vi.fn(), revoke, stats: vi.fn() },
      cookieSecure: false,
    };
    context = {
      requestId: 'req-2',
      ipAddress: '10.0.0.1',
      userAgent: 'TestAgent/1.0',
      logger: createLogCapture().logger,
      sessionId: 'session-a',
    };
  });

  it('should clear both cookies and revoke the session CSRF token', async () => {
    const { res, cleared } = createMockResponse();

    const result = await logout(context, deps, res);

    expect(result).toEqual({ status: 200, body: { success: true, message: 'Logged out.' } });
    expect(cleared).toEqual(['access_token', 'session_id']);
    expect(revoke).toHaveBeenCalledWith('session-a');
  });

  it('should succeed without a session', async () => {
    const { res } = createMockResponse();
    const withoutSession: CallerContext = {
      requestId: context.requestId,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
      logger: context.logger,
    };

    const result = await logout(withoutSession, deps, res);

    expect(result.status).toBe(200);
    expect(revoke).not.toHaveBeenCalled();
  });
});

describe('issueCsrfToken', () => {
  it('should start a session when the caller has none', async () => {
    const generate = vi.fn().mockResolvedValue('csrf-token');
    const deps: SessionDependencies = {
      csrf: { generate, validate: vi.fn(), revoke: vi.fn(), stats: vi.fn() },
      cookieSecure: false,
    };
    const { res, cookies } = createMockResponse();
    const context: CallerContext = {
      requestId: 'req-3',
      ipAddress: '10.0.0.1',
      userAgent: 'TestAgent/1.0',
      logger: createLogCapture().logger,
    };

    const result = await issueCsrfToken({}, context, deps, res);

    expect(result).toEqual({ status: 200, body: { csrf_token: 'csrf-token' } });
    expect(cookies[0]?.name).toBe('session_id');
    expect(generate).toHaveBeenCalledWith(cookies[0]?.value);
  });

  it('should reuse the caller session', async () => {
    const generate = vi.fn().mockResolvedValue('csrf-token');
    const deps: SessionDependencies = {
      csrf: { generate, validate: vi.fn(), revoke: vi.fn(), stats: vi.fn() },
      cookieSecure: false,
    };
    const { res, cookies } = createMockResponse();
    const context: CallerContext = {
      requestId: 'req-4',
      ipAddress: '10.0.0.1',
      userAgent: 'TestAgent/1.0',
      logger: createLogCapture().logger,
    };

    await issueCsrfToken({ cookies: { session_id: 'session-a' } }, context, deps, res);

    expect(cookies).toHaveLength(0);
    expect(generate).toHaveBeenCalledWith('session-a');
  });
});

describe('currentUser', () => {
  it('should expose the caller identity from the claims', () => {
    const exp = Math.floor(EXPIRES_AT.getTime() / 1000);

    expect(
      currentUser({
        sub: 'admin',
        userId: 1,
        userType: 'administrator',
        role: 'admin',
        iat: exp - 1800,
        exp,
        jti: 'jti-1',
        iss: 'field-service-api',
      }),
    ).toEqual({
      status: 200,
      body: {
        sub: 'admin',
        user_id: 1,
        user_type: 'administrator',
        role: 'admin',
        expires_at: EXPIRES_AT.toISOString(),
      },
    });
  });
});
