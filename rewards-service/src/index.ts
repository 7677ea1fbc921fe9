/**
 * Rewards Service
 *
 * Public surface: the reward engine, the prize marketplace and mystery box,
 * feedback, notifications, the scheduler and the service context.
 * The process entry point is main.ts.
 */

export * from './services/reward-engine/index.js';

export { MarketplaceService, effectiveQuantity, stockStatus, REDEMPTION_CODE_ALPHABET } from './services/marketplace/marketplace-service.js';
export type { MarketplaceOptions, StatusUpdateExtra } from './services/marketplace/marketplace-service.js';
export { MysteryBoxService, rollTier, weightedChoice, sampleWinners } from './services/marketplace/mystery-box.js';
export type { MysteryBoxRequest, MysteryBoxOptions } from './services/marketplace/mystery-box.js';
export { DEFAULT_TIERS, loadTiers, applyTierOverrides } from './services/marketplace/tiers.js';
export { createMongoMarketplaceStore, registerMarketplaceIndexes } from './services/marketplace/persistence.js';
export type * from './services/marketplace/types.js';

export { FeedbackService, POINTS_FOR_GIVER, POINTS_FOR_RECEIVER } from './services/feedback/feedback-service.js';
export { createMongoFeedbackStore, createMongoTargetResolvers, registerFeedbackIndexes } from './services/feedback/persistence.js';
export type * from './services/feedback/types.js';

export { OutboxDispatcher, createRewardAwardedMessage } from './notifications/outbox.js';
export type { DrainSummary, OutboxDispatcherOptions } from './notifications/outbox.js';
export { HandlebarsTemplates } from './notifications/templates.js';
export type { TemplateRenderer } from './notifications/templates.js';
export { TeamsCelebrationNotifier } from './notifications/teams.js';
export type { CelebrationNotifier, DeliveryResult } from './notifications/teams.js';
export { TeamsChatSender, SmtpEmailSender } from './notifications/senders.js';
export type { ChatSender, EmailSender } from './notifications/senders.js';

export { IntervalScheduler, isDue } from './scheduler/scheduler.js';
export { defaultJobs, computedRewardJobs, randomMysteryBoxEvent, expireOldPrizes, runComputedRewards, drainOutbox } from './scheduler/jobs.js';
export type { JobDescriptor, JobTrigger, Scheduler } from './scheduler/types.js';

export { createServiceContext } from './service-context.js';
export type { ServiceContext, ServiceContextDeps } from './service-context.js';

export { loadConfig, validateConfig } from './config.js';
export type { RewardsConfig } from './config.js';
export { REWARD_ERRORS, REWARD_ERROR_CODES } from './error-codes.js';
export type * from './types.js';
