/**
 * Rewards Service Configuration
 *
 * Priority order:
 * 1. Environment variables (highest priority)
 * 2. Registered defaults (config-defaults.ts)
 */

import { logger, isLogLevel, isLogFormat, type LogLevel, type LogFormat } from 'core-service';
import { REWARDS_CONFIG_DEFAULTS } from './config-defaults.js';

export interface RewardsConfig {
  // Service
  serviceName: string;
  nodeEnv: string;

  // Database
  mongoUri: string;
  mongoDbName: string;
  redisUrl?: string;
  useMongoTransactions: boolean;

  // Logging
  logLevel: LogLevel;
  logFormat: LogFormat;

  // Email
  smtpHost?: string;
  smtpPort: number;
  smtpSecure: boolean;
  smtpUser?: string;
  smtpPassword?: string;
  smtpFrom: string;

  // Chat
  teamsWebhookUrl?: string;

  // Notifications
  notificationTimeoutMs: number;
  templatesDir?: string;
  outboxBatchSize: number;
  outboxMaxAttempts: number;
  outboxIntervalMs: number;
  outboxBaseDelayMs: number;
  outboxMaxDelayMs: number;

  // Scheduler
  schedulerTickMs: number;
  schedulerEnabled: boolean;

  // Marketplace
  tiersCacheTtlSeconds: number;
}

type Env = Record<string, string | undefined>;

const defaults = {
  database: REWARDS_CONFIG_DEFAULTS.database.value,
  logging: REWARDS_CONFIG_DEFAULTS.logging.value,
  smtp: REWARDS_CONFIG_DEFAULTS.smtp.value,
  teams: REWARDS_CONFIG_DEFAULTS.teams.value,
  notifications: REWARDS_CONFIG_DEFAULTS.notifications.value,
  outbox: REWARDS_CONFIG_DEFAULTS.outbox.value,
  scheduler: REWARDS_CONFIG_DEFAULTS.scheduler.value,
  marketplace: REWARDS_CONFIG_DEFAULTS.marketplace.value,
};

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function int(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  return parseInt(value, 10);
}

function bool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Load configuration from environment variables over registered defaults.
 * Invalid values are kept as-is and reported by validateConfig().
 */
export function loadConfig(env: Env = process.env): RewardsConfig {
  const level = env.LOG_LEVEL ?? defaults.logging.level;
  const format = env.LOG_FORMAT ?? defaults.logging.format;

  return {
    serviceName: env.SERVICE_NAME || 'rewards-service',
    nodeEnv: env.NODE_ENV || 'development',

    mongoUri: env.MONGO_URI || defaults.database.mongoUri,
    mongoDbName: env.MONGO_DB_NAME || defaults.database.dbName,
    redisUrl: optional(env.REDIS_URL) ?? optional(defaults.database.redisUrl),
    useMongoTransactions: bool(env.USE_MONGO_TRANSACTIONS, defaults.database.useTransactions),

    logLevel: isLogLevel(level) ? level : 'info',
    logFormat: isLogFormat(format) ? format : 'json',

    smtpHost: optional(env.SMTP_HOST) ?? optional(defaults.smtp.host),
    smtpPort: int(env.SMTP_PORT, defaults.smtp.port),
    smtpSecure: bool(env.SMTP_SECURE, defaults.smtp.secure),
    smtpUser: optional(env.SMTP_USER) ?? optional(defaults.smtp.user),
    smtpPassword: optional(env.SMTP_PASSWORD) ?? optional(defaults.smtp.password),
    smtpFrom: env.SMTP_FROM || defaults.smtp.from,

    teamsWebhookUrl: optional(env.TEAMS_WEBHOOK_URL) ?? optional(defaults.teams.webhookUrl),

    notificationTimeoutMs: int(env.NOTIFICATION_TIMEOUT_MS, defaults.notifications.timeoutMs),
    templatesDir: optional(env.TEMPLATES_DIR) ?? optional(defaults.notifications.templatesDir),
    outboxBatchSize: int(env.OUTBOX_BATCH_SIZE, defaults.outbox.batchSize),
    outboxMaxAttempts: int(env.OUTBOX_MAX_ATTEMPTS, defaults.outbox.maxAttempts),
    outboxIntervalMs: int(env.OUTBOX_INTERVAL_MS, defaults.outbox.intervalMs),
    outboxBaseDelayMs: defaults.outbox.baseDelayMs,
    outboxMaxDelayMs: defaults.outbox.maxDelayMs,

    schedulerTickMs: int(env.SCHEDULER_TICK_MS, defaults.scheduler.tickMs),
    schedulerEnabled: bool(env.SCHEDULER_ENABLED, defaults.scheduler.enabled),

    tiersCacheTtlSeconds: int(env.TIERS_CACHE_TTL_SECONDS, defaults.marketplace.tiersCacheTtlSeconds),
  };
}

/**
 * Validate required configuration
 */
export function validateConfig(config: RewardsConfig): void {
  const errors: string[] = [];

  if (!/^mongodb(\+srv)?:\/\//.test(config.mongoUri)) {
    errors.push('MONGO_URI must be a mongodb:// or mongodb+srv:// URI');
  }
  if (config.redisUrl && !/^rediss?:\/\//.test(config.redisUrl)) {
    errors.push('REDIS_URL must be a redis:// or rediss:// URL');
  }
  if (!Number.isInteger(config.smtpPort) || config.smtpPort < 1 || config.smtpPort > 65535) {
    errors.push('SMTP_PORT must be between 1 and 65535');
  }
  if (config.teamsWebhookUrl && !config.teamsWebhookUrl.startsWith('https://')) {
    errors.push('TEAMS_WEBHOOK_URL must be an https:// URL');
  }

  const positive: Array<[string, number]> = [
    ['NOTIFICATION_TIMEOUT_MS', config.notificationTimeoutMs],
    ['OUTBOX_BATCH_SIZE', config.outboxBatchSize],
    ['OUTBOX_MAX_ATTEMPTS', config.outboxMaxAttempts],
    ['OUTBOX_INTERVAL_MS', config.outboxIntervalMs],
    ['SCHEDULER_TICK_MS', config.schedulerTickMs],
    ['TIERS_CACHE_TTL_SECONDS', config.tiersCacheTtlSeconds],
  ];
  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value <= 0) {
      errors.push(`${name} must be a positive integer`);
    }
  }

  if (errors.length > 0) {
    throw new Error(`Configuration errors:\n${errors.join('\n')}`);
  }
}

function redactUri(uri: string): string {
  return uri.replace(/\/\/([^@/]+)@/, '//***@');
}

/**
 * Print configuration summary (for debugging)
 */
export function printConfigSummary(config: RewardsConfig): void {
  logger.info('Rewards Service Configuration:', {
    Environment: config.nodeEnv,
    MongoDB: `${redactUri(config.mongoUri)} (db: ${config.mongoDbName})`,
    Transactions: config.useMongoTransactions,
    Redis: config.redisUrl ? redactUri(config.redisUrl) : 'not configured',
    SMTP: config.smtpHost ? `${config.smtpHost}:${config.smtpPort}` : 'not configured',
    Teams: config.teamsWebhookUrl ? 'configured' : 'not configured',
    Outbox: `${config.outboxBatchSize} per batch, ${config.outboxMaxAttempts} attempts`,
    Scheduler: config.schedulerEnabled ? `tick ${config.schedulerTickMs}ms` : 'disabled',
  });
}
