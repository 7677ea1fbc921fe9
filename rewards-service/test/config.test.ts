/**
 * Configuration loading and validation
 */

import { describe, it, expect } from 'vitest';
import { loadConfig, validateConfig } from '../src/index.js';

describe('loadConfig', () => {
  it('should fall back to the registered defaults', () => {
    expect(loadConfig({})).toEqual({
      serviceName: 'rewards-service',
      nodeEnv: 'development',
      mongoUri: 'mongodb://localhost:27017/rewards?directConnection=true',
      mongoDbName: 'rewards',
      redisUrl: undefined,
      useMongoTransactions: false,
      logLevel: 'info',
      logFormat: 'json',
      smtpHost: undefined,
      smtpPort: 587,
      smtpSecure: false,
      smtpUser: undefined,
      smtpPassword: undefined,
      smtpFrom: 'rewards@example.com',
      teamsWebhookUrl: undefined,
      notificationTimeoutMs: 10000,
      templatesDir: undefined,
      outboxBatchSize: 50,
      outboxMaxAttempts: 5,
      outboxIntervalMs: 60000,
      outboxBaseDelayMs: 30000,
      outboxMaxDelayMs: 3600000,
      schedulerTickMs: 15000,
      schedulerEnabled: true,
      tiersCacheTtlSeconds: 300,
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      MONGO_URI: 'mongodb+srv://cluster.example.com/rewards',
      REDIS_URL: 'redis://localhost:6379',
      USE_MONGO_TRANSACTIONS: 'yes',
      LOG_LEVEL: 'debug',
      LOG_FORMAT: 'pretty',
      SMTP_HOST: ' smtp.example.com ',
      SMTP_PORT: '2525',
      SMTP_SECURE: 'TRUE',
      SMTP_PASSWORD: 'test-secret',
      TEAMS_WEBHOOK_URL: 'https://example.com/hook',
      SCHEDULER_ENABLED: 'off',
      OUTBOX_BATCH_SIZE: '10',
    });

    expect(config).toMatchObject({
      mongoUri: 'mongodb+srv://cluster.example.com/rewards',
      redisUrl: 'redis://localhost:6379',
      useMongoTransactions: true,
      logLevel: 'debug',
      logFormat: 'pretty',
      smtpHost: 'smtp.example.com',
      smtpPort: 2525,
      smtpSecure: true,
      smtpPassword: 'test-secret',
      teamsWebhookUrl: 'https://example.com/hook',
      schedulerEnabled: false,
      outboxBatchSize: 10,
    });
  });

  it('should replace unknown log settings', () => {
    expect(loadConfig({ LOG_LEVEL: 'chatty', LOG_FORMAT: 'xml' })).toMatchObject({ logLevel: 'info', logFormat: 'json' });
  });

  it('should treat blank values as unset', () => {
    expect(loadConfig({ SMTP_PORT: ' ', REDIS_URL: '  ' })).toMatchObject({ smtpPort: 587, redisUrl: undefined });
  });
});

describe('validateConfig', () => {
  it('should accept the defaults', () => {
    expect(() => validateConfig(loadConfig({}))).not.toThrow();
  });

  it('should list every problem', () => {
    const config = loadConfig({
      MONGO_URI: 'postgres://localhost/rewards',
      REDIS_URL: 'http://localhost:6379',
      SMTP_PORT: '70000',
      TEAMS_WEBHOOK_URL: 'http://example.com/hook',
      OUTBOX_BATCH_SIZE: 'ten',
      SCHEDULER_TICK_MS: '0',
    });

    expect(() => validateConfig(config)).toThrow(
      [
        'Configuration errors:',
        'MONGO_URI must be a mongodb:// or mongodb+srv:// URI',
        'REDIS_URL must be a redis:// or rediss:// URL',
        'SMTP_PORT must be between 1 and 65535',
        'TEAMS_WEBHOOK_URL must be an https:// URL',
        'OUTBOX_BATCH_SIZE must be a positive integer',
        'SCHEDULER_TICK_MS must be a positive integer',
      ].join('\n')
    );
  });
});
