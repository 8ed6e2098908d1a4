/**
 * Environment-sourced configuration for the security layer.
 *
 * Settings are read once at startup into an immutable {@link AppConfig}.
 * Anything that would leave the signing or CSRF secrets weak, or the
 * counters meaningless, throws a {@link ConfigError} so the process
 * refuses to start.
 *
 * @module config/appConfig
 */

import type { LogLevel } from '../logging/logger.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export type Environment = 'development' | 'test' | 'production';

export const SUPPORTED_JWT_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;

export type JwtAlgorithm = (typeof SUPPORTED_JWT_ALGORITHMS)[number];

export interface TokenConfig {
  secret: string;
  algorithm: JwtAlgorithm;
  issuer: string;
  ttlSeconds: number;
}

export interface CsrfConfig {
  secret: string;
  ttlSeconds: number;
}

export interface LockoutConfig {
  threshold: number;
  durationSeconds: number;
  windowSeconds: number;
}

export interface RateLimitConfig {
  maxRequests: number;
  windowSeconds: number;
  /** Admit requests when the counter store is unreachable. */
  failOpen: boolean;
}

/** PostgreSQL connection settings for the account directory. */
export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  poolMax: number;
  idleTimeoutMs: number;
  connectTimeoutMs: number;
  ssl: boolean;
}

export interface AppConfig {
  env: Environment;
  port: number;
  logLevel: LogLevel;
  token: TokenConfig;
  csrf: CsrfConfig;
  bcryptCost: number;
  lockout: LockoutConfig;
  rateLimit: RateLimitConfig;
  maxBodyBytes: number;
  trustProxy: boolean;
  cookieSecure: boolean;
  sweepIntervalSeconds: number;
  redisUrl: string | null;
  database: DatabaseConfig;
}

export type Env = Record<string, string | undefined>;

// ─── Errors ──────────────────────────────────────────────────────────────────

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const MIN_SECRET_LENGTH = 32;

/** Secrets shorter than this only warn, and only in production. */
export const RECOMMENDED_PRODUCTION_SECRET_LENGTH = 64;

export const MIN_BCRYPT_COST = 4;
export const MAX_BCRYPT_COST = 15;

const PLACEHOLDER_SECRET_PREFIXES = ['replace-with', 'your-secret', 'changeme', 'change-me'];

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

// ─── Parsing Helpers ─────────────────────────────────────────────────────────

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  return ['true', '1', 'yes'].includes(raw.trim().toLowerCase());
}

function readEnvironment(env: Env): Environment {
  const raw = env['NODE_ENV'] ?? 'development';
  if (raw === 'production' || raw === 'test' || raw === 'development') return raw;
  throw new ConfigError(`NODE_ENV must be development, test or production, got "${raw}"`);
}

function readLogLevel(env: Env): LogLevel {
  const raw = (env['LOG_LEVEL'] ?? 'info').toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === raw);
  if (!level) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return level;
}

function readAlgorithm(env: Env): JwtAlgorithm {
  const raw = env['JWT_ALGORITHM'] ?? 'HS256';
  const algorithm = SUPPORTED_JWT_ALGORITHMS.find((candidate) => candidate === raw);
  if (!algorithm) {
    throw new ConfigError(
      `JWT_ALGORITHM must be one of ${SUPPORTED_JWT_ALGORITHMS.join(', ')}, got "${raw}"`,
    );
  }
  return algorithm;
}

/**
 * Read a signing secret and reject values that are missing, too short,
 * or left at an example placeholder.
 */
export function readSecret(env: Env, name: string): string {
  const secret = env[name];
  if (!secret) {
    throw new ConfigError(`${name} environment variable is not set`);
  }
  const lowered = secret.toLowerCase();
  if (PLACEHOLDER_SECRET_PREFIXES.some((prefix) => lowered.startsWith(prefix))) {
    throw new ConfigError(`${name} is still set to an example value`);
  }
  if (secret.length < MIN_SECRET_LENGTH) {
    throw new ConfigError(
      `${name} is too short (${secret.length} chars), minimum is ${MIN_SECRET_LENGTH}`,
    );
  }
  return secret;
}

// ─── Loader ──────────────────────────────────────────────────────────────────

/**
 * Build the application configuration from environment variables.
 *
 * @throws {ConfigError} When a required setting is missing or invalid.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const appEnv = readEnvironment(env);
  const jwtSecret = readSecret(env, 'JWT_SECRET');
  const csrfSecret = readSecret(env, 'CSRF_SECRET');

  if (jwtSecret === csrfSecret) {
    throw new ConfigError('CSRF_SECRET must differ from JWT_SECRET');
  }

  const bcryptCost = readInt(env, 'BCRYPT_COST', 12);
  if (bcryptCost < MIN_BCRYPT_COST || bcryptCost > MAX_BCRYPT_COST) {
    throw new ConfigError(
      `BCRYPT_COST must be between ${MIN_BCRYPT_COST} and ${MAX_BCRYPT_COST}, got ${bcryptCost}`,
    );
  }

  const redisUrl = env['REDIS_URL']?.trim();

  return Object.freeze({
    env: appEnv,
    port: readInt(env, 'PORT', 8000),
    logLevel: readLogLevel(env),
    token: {
      secret: jwtSecret,
      algorithm: readAlgorithm(env),
      issuer: env['JWT_ISSUER'] ?? 'field-service-api',
      ttlSeconds: readInt(env, 'ACCESS_TOKEN_TTL_MINUTES', 30) * 60,
    },
    csrf: {
      secret: csrfSecret,
      ttlSeconds: readInt(env, 'CSRF_TOKEN_TTL_MINUTES', 60) * 60,
    },
    bcryptCost,
    lockout: {
      threshold: readInt(env, 'LOCKOUT_THRESHOLD', 5),
      durationSeconds: readInt(env, 'LOCKOUT_DURATION_MINUTES', 30) * 60,
      windowSeconds: readInt(env, 'ATTEMPT_WINDOW_MINUTES', 60) * 60,
    },
    rateLimit: {
      maxRequests: readInt(env, 'RATE_LIMIT_MAX_REQUESTS', 100),
      windowSeconds: readInt(env, 'RATE_LIMIT_WINDOW_SECONDS', 60),
      failOpen: readBool(env, 'RATE_LIMIT_FAIL_OPEN', false),
    },
    maxBodyBytes: readInt(env, 'MAX_BODY_BYTES', 1024 * 1024),
    trustProxy: readBool(env, 'TRUST_PROXY', false),
    cookieSecure: readBool(env, 'COOKIE_SECURE', appEnv === 'production'),
    sweepIntervalSeconds: readInt(env, 'SWEEP_INTERVAL_SECONDS', 300),
    redisUrl: redisUrl ? redisUrl : null,
    database: {
      host: env['DB_HOST'] ?? 'localhost',
      port: readInt(env, 'DB_PORT', 5432),
      database: env['DB_NAME'] ?? 'field_service',
      user: env['DB_USER'] ?? 'postgres',
      password: env['DB_PASSWORD'] ?? '',
      poolMax: readInt(env, 'DB_POOL_MAX', 20),
      idleTimeoutMs: readInt(env, 'DB_IDLE_TIMEOUT', 30_000),
      connectTimeoutMs: readInt(env, 'DB_CONNECT_TIMEOUT', 5_000),
      ssl: readBool(env, 'DB_SSL', false),
    },
  });
}

/**
 * Non-fatal findings about a loaded configuration, meant to be logged
 * once at startup.
 */
export function configWarnings(config: AppConfig): string[] {
  const warnings: string[] = [];
  if (config.env !== 'production') return warnings;

  for (const [name, secret] of [
    ['JWT_SECRET', config.token.secret],
    ['CSRF_SECRET', config.csrf.secret],
  ] as const) {
    if (secret.length < RECOMMENDED_PRODUCTION_SECRET_LENGTH) {
      warnings.push(
        `${name} should be at least ${RECOMMENDED_PRODUCTION_SECRET_LENGTH} characters in production`,
      );
    }
    if (new Set(secret).size < 16) {
      warnings.push(`${name} appears to have low entropy`);
    }
  }
  if (!config.cookieSecure) {
    warnings.push('COOKIE_SECURE is disabled in production');
  }
  if (config.rateLimit.failOpen) {
    warnings.push('RATE_LIMIT_FAIL_OPEN is enabled: requests pass unthrottled when the store fails');
  }
  if (config.database.password === '') {
    warnings.push('DB_PASSWORD is empty in production');
  }
  return warnings;
}
