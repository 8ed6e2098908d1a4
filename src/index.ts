/**
 * Field Service Auth: request authentication and abuse protection for the
 * field-service API.
 *
 * @module field-service-auth
 */

// ─── Application ───
export { createApp, API_PREFIX } from './app.js';
export type { AppDependencies } from './app.js';
export {
  buildAppDependencies,
  createMemoryStores,
  createRedisStores,
  REDIS_PREFIXES,
} from './bootstrap.js';
export type { SecurityStores } from './bootstrap.js';

// ─── Configuration & Logging ───
export { loadConfig, configWarnings, ConfigError } from './config/appConfig.js';
export type { AppConfig } from './config/appConfig.js';
export { createLogger } from './logging/logger.js';
export type { Logger, LogEntry, LogLevel } from './logging/logger.js';

// ─── Services ───
export { createCredentialVerifier } from './services/credentialService.js';
export type { CredentialVerifier } from './services/credentialService.js';
export { createTokenService } from './services/tokenService.js';
export type { TokenService } from './services/tokenService.js';
export { createCsrfGuard } from './services/csrfService.js';
export type { CsrfGuard } from './services/csrfService.js';
export { createAttemptTracker } from './services/attemptTracker.js';
export type { AttemptAdmission, AttemptTracker } from './services/attemptTracker.js';
export { createRateLimiter } from './services/rateLimiter.js';
export type { RateLimiter } from './services/rateLimiter.js';
export { sanitize, escapeHtml } from './utils/sanitize.js';
export { SecurityHeaders } from './security/securityHeaders.js';
export { startSecuritySweeper, sweepSecurityState } from './security/sweeper.js';

// ─── Middleware ───
export { authenticate, requireRoles, ROLE_GROUPS } from './middleware/authenticate.js';

// ─── Stores ───
export { InMemoryCounterStore, InMemoryStateStore } from './store/memoryStores.js';
export { createRedisClient, RedisCounterStore, RedisStateStore } from './store/redisStores.js';
export type { CounterStore, StateStore } from './store/types.js';

// ─── Collaborators ───
export { pgUserDirectory } from './repositories/userDirectory.js';
export type { UserDirectory } from './repositories/userDirectory.js';

// ─── Types ───
export { ROLES, SECURITY_ERROR_CODES } from './types/index.js';
export type {
  AccessTokenClaims,
  AttemptHistory,
  AttemptStats,
  Credential,
  CsrfRecord,
  CsrfStats,
  ErrorResponse,
  IdentityClaims,
  IssuedToken,
  LockedIdentity,
  LoginAttemptRecord,
  LoginRequest,
  LoginResponse,
  RateLimitResult,
  Role,
  SecurityErrorCode,
  TokenVerification,
  UserType,
} from './types/index.js';
