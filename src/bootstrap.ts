/**
 * Composition of stores and services from a loaded configuration.
 *
 * @module bootstrap
 */

import type { Redis } from 'ioredis';

import type { AppDependencies } from './app.js';
import type { AppConfig } from './config/appConfig.js';
import type { Logger } from './logging/logger.js';
import type { UserDirectory } from './repositories/userDirectory.js';
import { createAttemptTracker, decodeAttemptHistory } from './services/attemptTracker.js';
import { createCredentialVerifier } from './services/credentialService.js';
import { createCsrfGuard, decodeCsrfRecord } from './services/csrfService.js';
import { createRateLimiter } from './services/rateLimiter.js';
import { createTokenService } from './services/tokenService.js';
import { InMemoryCounterStore, InMemoryStateStore } from './store/memoryStores.js';
import type { Clock } from './store/memoryStores.js';
import { RedisCounterStore, RedisStateStore } from './store/redisStores.js';
import type { CounterStore, StateStore } from './store/types.js';
import type { AttemptHistory, CsrfRecord } from './types/index.js';

export interface SecurityStores {
  csrf: StateStore<CsrfRecord>;
  attempts: StateStore<AttemptHistory>;
  rateBuckets: CounterStore;
}

/** Redis key prefixes, one namespace per store. */
export const REDIS_PREFIXES = {
  csrf: 'auth:csrf:',
  attempts: 'auth:attempts:',
  rateBuckets: 'auth:rl:',
} as const;

/** Stores for a single process. */
export function createMemoryStores(clock?: Clock): SecurityStores {
  return {
    csrf: new InMemoryStateStore<CsrfRecord>(clock),
    attempts: new InMemoryStateStore<AttemptHistory>(clock),
    rateBuckets: new InMemoryCounterStore(),
  };
}

/** Stores shared by every process connected to the same Redis. */
export function createRedisStores(redis: Redis): SecurityStores {
  return {
    csrf: new RedisStateStore(redis, REDIS_PREFIXES.csrf, decodeCsrfRecord),
    attempts: new RedisStateStore(redis, REDIS_PREFIXES.attempts, decodeAttemptHistory),
    rateBuckets: new RedisCounterStore(redis, REDIS_PREFIXES.rateBuckets),
  };
}

export interface BuildOptions {
  config: AppConfig;
  logger: Logger;
  stores: SecurityStores;
  directory: UserDirectory;
  now?: () => number;
}

/** Build every service and return the dependencies `createApp` takes. */
export function buildAppDependencies(options: BuildOptions): AppDependencies {
  const { config, logger, stores, directory, now } = options;

  return {
    config,
    logger,
    directory,
    verifier: createCredentialVerifier({ cost: config.bcryptCost, logger }),
    tokens: createTokenService({ config: config.token, logger, now }),
    csrf: createCsrfGuard({ config: config.csrf, store: stores.csrf, logger, now }),
    tracker: createAttemptTracker({ config: config.lockout, store: stores.attempts, logger, now }),
    rateLimiter: createRateLimiter({ config: config.rateLimit, store: stores.rateBuckets, now }),
    sweepTargets: { ...stores },
    now,
  };
}
