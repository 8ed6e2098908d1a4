/**
 * Shared fixtures: a test configuration, an in-memory user directory and
 * an application wired to in-memory stores.
 *
 * @module test/fixtures
 */

import bcrypt from 'bcrypt';
import type { Express } from 'express';

import { createApp } from '../app.js';
import type { AppDependencies } from '../app.js';
import { buildAppDependencies, createMemoryStores } from '../bootstrap.js';
import type { SecurityStores } from '../bootstrap.js';
import { loadConfig } from '../config/appConfig.js';
import type { AppConfig, Env } from '../config/appConfig.js';
import type { UserDirectory } from '../repositories/userDirectory.js';
import type { Credential } from '../types/index.js';
import { createLogCapture } from './mockCollectors.js';
import type { LogCapture } from './mockCollectors.js';

export const TEST_JWT_SECRET = 'test-secret-for-access-tokens-0000000000';
export const TEST_CSRF_SECRET = 'test-secret-for-csrf-binding-1111111111';

/** Lowest cost bcrypt accepts; keeps hashing fast in tests. */
export const TEST_BCRYPT_COST = 4;

export const TEST_ENV: Env = {
  NODE_ENV: 'test',
  JWT_SECRET: TEST_JWT_SECRET,
  CSRF_SECRET: TEST_CSRF_SECRET,
  BCRYPT_COST: String(TEST_BCRYPT_COST),
  LOG_LEVEL: 'debug',
};

export function testConfig(overrides: Env = {}): AppConfig {
  return loadConfig({ ...TEST_ENV, ...overrides });
}

/** A controllable clock starting at a fixed instant. */
export interface TestClock {
  now: () => number;
  advance(ms: number): void;
  set(ms: number): void;
}

export const CLOCK_START = Date.UTC(2025, 0, 15, 10, 0, 0);

export function createTestClock(start: number = CLOCK_START): TestClock {
  let current = start;
  return {
    now: () => current,
    advance(ms) {
      current += ms;
    },
    set(ms) {
      current = ms;
    },
  };
}

export interface TestAccount {
  identity: string;
  password: string;
  userId: number;
  userType: Credential['userType'];
  role: Credential['role'];
  status?: Credential['status'];
}

export const ADMIN_ACCOUNT: TestAccount = {
  identity: 'admin',
  password: 'admin-password-1',
  userId: 1,
  userType: 'administrator',
  role: 'admin',
};

export const MASTER_ACCOUNT: TestAccount = {
  identity: 'master_ivanov',
  password: 'master-password-1',
  userId: 17,
  userType: 'master',
  role: 'master',
};

export const INACTIVE_ACCOUNT: TestAccount = {
  identity: 'former_operator',
  password: 'operator-password-1',
  userId: 23,
  userType: 'employee',
  role: 'callcentr',
  status: 'inactive',
};

/** A user directory over a fixed list of accounts, hashed at cost 4. */
export function createMemoryDirectory(accounts: readonly TestAccount[]): UserDirectory {
  const credentials = new Map<string, Credential>(
    accounts.map((account) => [
      account.identity,
      {
        identity: account.identity,
        userId: account.userId,
        userType: account.userType,
        role: account.role,
        passwordHash: bcrypt.hashSync(account.password, TEST_BCRYPT_COST),
        status: account.status ?? 'active',
      },
    ]),
  );

  return {
    async findByIdentity(identity) {
      return credentials.get(identity) ?? null;
    },
  };
}

export interface TestApp {
  app: Express;
  deps: AppDependencies;
  stores: SecurityStores;
  clock: TestClock;
  logs: LogCapture;
}

export interface TestAppOptions {
  env?: Env;
  accounts?: readonly TestAccount[];
  stores?: SecurityStores;
}

/** The full application on in-memory stores and an injected clock. */
export function createTestApp(options: TestAppOptions = {}): TestApp {
  const clock = createTestClock();
  const logs = createLogCapture();
  const config = testConfig(options.env);
  const stores = options.stores ?? createMemoryStores(clock.now);
  const directory = createMemoryDirectory(
    options.accounts ?? [ADMIN_ACCOUNT, MASTER_ACCOUNT, INACTIVE_ACCOUNT],
  );

  const deps = buildAppDependencies({
    config,
    logger: logs.logger,
    stores,
    directory,
    now: clock.now,
  });

  return { app: createApp(deps), deps, stores, clock, logs };
}
