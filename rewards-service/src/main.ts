/**
 * Rewards Service
 *
 * Startup: error codes, configuration, logging, MongoDB (and Redis when
 * configured), indexes, the service context and the job scheduler.
 */

import {
  checkDatabaseHealth,
  checkRedisHealth,
  closeDatabase,
  closeRedis,
  configureLogger,
  connectDatabase,
  connectRedis,
  createRedisCache,
  getClient,
  getErrorMessage,
  normalizeError,
  logger,
  registerServiceErrorCodes,
  type CacheHandle,
} from 'core-service';
import { loadConfig, printConfigSummary, validateConfig } from './config.js';
import { REWARD_ERROR_CODES, REWARD_ERROR_STATUS } from './error-codes.js';
import { createMongoOutboxStore, registerOutboxIndexes } from './notifications/outbox-persistence.js';
import { SmtpEmailSender, TeamsChatSender } from './notifications/senders.js';
import { TeamsCelebrationNotifier } from './notifications/teams.js';
import { DEFAULT_TEMPLATES_DIR, HandlebarsTemplates } from './notifications/templates.js';
import { computedRewardJobs, defaultJobs } from './scheduler/jobs.js';
import { IntervalScheduler } from './scheduler/scheduler.js';
import { createServiceContext } from './service-context.js';
import { createMongoFeedbackStore, createMongoTargetResolvers, registerFeedbackIndexes } from './services/feedback/persistence.js';
import { createMongoMarketplaceStore, registerMarketplaceIndexes } from './services/marketplace/persistence.js';
import {
  createMongoActivityReader,
  createMongoRewardStore,
  createMongoUserDirectory,
  registerRewardIndexes,
} from './services/reward-engine/persistence.js';

async function main(): Promise<void> {
  // ═══════════════════════════════════════════════════════════════════
  // Configuration
  // ═══════════════════════════════════════════════════════════════════

  registerServiceErrorCodes(REWARD_ERROR_CODES, REWARD_ERROR_STATUS);

  const config = loadConfig();
  validateConfig(config);
  configureLogger({ level: config.logLevel, format: config.logFormat, service: config.serviceName });
  printConfigSummary(config);

  // ═══════════════════════════════════════════════════════════════════
  // Databases
  // ═══════════════════════════════════════════════════════════════════

  // Indexes are created on connect, so they are registered first
  registerRewardIndexes();
  registerOutboxIndexes();
  registerMarketplaceIndexes();
  registerFeedbackIndexes();

  const db = await connectDatabase(config.mongoUri, { dbName: config.mongoDbName });
  logger.info('MongoDB health', await checkDatabaseHealth());

  let cache: CacheHandle | undefined;
  if (config.redisUrl) {
    cache = createRedisCache(await connectRedis(config.redisUrl), config.serviceName);
    logger.info('Redis health', await checkRedisHealth());
  }

  // ═══════════════════════════════════════════════════════════════════
  // Services
  // ═══════════════════════════════════════════════════════════════════

  const templates = new HandlebarsTemplates(config.templatesDir ?? DEFAULT_TEMPLATES_DIR);
  const webhook = { timeoutMs: config.notificationTimeoutMs };

  const ctx = createServiceContext({
    config,
    connections: {
      rewards: createMongoRewardStore(db, { client: getClient(), transactions: config.useMongoTransactions }),
      users: createMongoUserDirectory(db),
      activity: createMongoActivityReader(db),
      outbox: createMongoOutboxStore(db),
    },
    marketplaceStore: createMongoMarketplaceStore(db),
    feedbackStore: createMongoFeedbackStore(db),
    targets: createMongoTargetResolvers(db),
    templates,
    celebrations: new TeamsCelebrationNotifier(webhook),
    chat: new TeamsChatSender(config.teamsWebhookUrl, webhook),
    email: new SmtpEmailSender(
      {
        host: config.smtpHost,
        port: config.smtpPort,
        secure: config.smtpSecure,
        user: config.smtpUser,
        password: config.smtpPassword,
        from: config.smtpFrom,
        timeoutMs: config.notificationTimeoutMs,
      },
      templates
    ),
    cache,
  });

  await ctx.engine.load();

  // ═══════════════════════════════════════════════════════════════════
  // Scheduler
  // ═══════════════════════════════════════════════════════════════════

  const scheduler = new IntervalScheduler(ctx, { tickMs: config.schedulerTickMs });
  const jobs = [
    ...defaultJobs({ outboxEveryMinutes: Math.max(1, Math.round(config.outboxIntervalMs / 60_000)) }),
    ...computedRewardJobs(ctx.engine),
  ];
  for (const job of jobs) {
    scheduler.register(job);
  }
  if (config.schedulerEnabled) {
    scheduler.start();
  } else {
    logger.info('Scheduler disabled; jobs are expected to run externally', { jobs: jobs.length });
  }

  const shutdown = async (signal: string) => {
    logger.info('Shutting down rewards-service', { signal });
    scheduler.stop();
    try {
      await closeRedis();
      await closeDatabase();
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', { error: getErrorMessage(error) });
      process.exit(1);
    }
  };
  process.once('SIGINT', signal => void shutdown(signal));
  process.once('SIGTERM', signal => void shutdown(signal));

  logger.info('Rewards service started', { rewards: ctx.engine.list().length, jobs: jobs.length });
}

main().catch(error => {
  logger.error('Failed to start rewards-service', normalizeError(error));
  process.exit(1);
});

process.on('unhandledRejection', reason => {
  logger.error('Unhandled rejection in rewards-service', { error: getErrorMessage(reason) });
});
