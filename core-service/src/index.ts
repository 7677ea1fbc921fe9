/**
 * Core Service
 *
 * Shared infrastructure for services:
 *   - Logging: logger, createChildLogger, correlation ids, log streaming
 *   - Errors: ServiceError, createServiceError, error code registry
 *   - MongoDB: connectDatabase, withSession, registerIndexes, health checks
 *   - Redis: connectRedis, createRedisCache, cached
 *   - Validation: validateInput (arktype)
 *   - Resilience: retry, calculateDelay
 *   - Utilities: date arithmetic, id and code generation
 */

// ═══════════════════════════════════════════════════════════════════
// Logging
// ═══════════════════════════════════════════════════════════════════

export {
  logger,
  configureLogger,
  createChildLogger,
  subscribeToLogs,
  getCorrelationId,
  generateCorrelationId,
  withCorrelationId,
  isLogLevel,
  isLogFormat,
} from './common/logger.js';
export type { Logger, LogLevel, LogFormat, LogEntry, LogSubscriber, LoggerConfig } from './common/logger.js';

// ═══════════════════════════════════════════════════════════════════
// Errors
// ═══════════════════════════════════════════════════════════════════

export {
  getErrorMessage,
  normalizeError,
  formatToCapitalCamelCase,
  ServiceError,
  createServiceError,
  registerServiceErrorCodes,
  getAllErrorCodes,
  getErrorStatus,
  extractServiceFromCode,
} from './common/errors.js';

export { isDuplicateKeyError, insertIgnoringDuplicate } from './common/mongodb-errors.js';

// ═══════════════════════════════════════════════════════════════════
// Databases
// ═══════════════════════════════════════════════════════════════════

export {
  connectDatabase,
  getClient,
  closeDatabase,
  withSession,
  checkDatabaseHealth,
  registerIndexes,
  ensureIndexes,
} from './databases/mongodb/connection.js';
export type { MongoConfig } from './databases/mongodb/connection.js';

export {
  connectRedis,
  checkRedisHealth,
  closeRedis,
  createRedisCache,
  cached,
} from './common/redis.js';
export type { RedisConfig, CacheHandle } from './common/redis.js';

// ═══════════════════════════════════════════════════════════════════
// Validation & Resilience
// ═══════════════════════════════════════════════════════════════════

export { validateInput } from './common/validation/arktype.js';
export type { ValidationResult } from './common/validation/arktype.js';

export { retry, calculateDelay } from './common/resilience/retry.js';
export type { RetryConfig, RetryResult, RetryStrategy } from './common/resilience/retry.js';

// ═══════════════════════════════════════════════════════════════════
// Utilities
// ═══════════════════════════════════════════════════════════════════

export {
  addMinutes,
  addDays,
  startOfUtcDay,
  secondsBetween,
  daysBetween,
  generateId,
  generateCode,
  normalizeEmail,
} from './common/utils.js';
