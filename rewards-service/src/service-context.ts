/**
 * Service Context
 *
 * Everything a request handler or scheduled job needs, built once at
 * startup from the stores and transports handed in.
 */

import type { CacheHandle } from 'core-service';
import type { RewardsConfig } from './config.js';
import type { RandomSource } from './random.js';
import { OutboxDispatcher } from './notifications/outbox.js';
import type { ChatSender, EmailSender } from './notifications/senders.js';
import type { CelebrationNotifier } from './notifications/teams.js';
import type { TemplateRenderer } from './notifications/templates.js';
import { FeedbackService } from './services/feedback/feedback-service.js';
import type { FeedbackStore, TargetResolvers } from './services/feedback/types.js';
import { MarketplaceService } from './services/marketplace/marketplace-service.js';
import { MysteryBoxService } from './services/marketplace/mystery-box.js';
import type { MarketplaceStore } from './services/marketplace/types.js';
import { RewardEngine } from './services/reward-engine/engine.js';
import type { RewardConnections } from './services/reward-engine/types.js';

export interface ServiceContext {
  config: RewardsConfig;
  connections: RewardConnections;
  engine: RewardEngine;
  marketplace: MarketplaceService;
  mysteryBox: MysteryBoxService;
  feedback: FeedbackService;
  outbox: OutboxDispatcher;
  clock: () => Date;
}

export interface ServiceContextDeps {
  config: RewardsConfig;
  connections: RewardConnections;
  marketplaceStore: MarketplaceStore;
  feedbackStore: FeedbackStore;
  targets: TargetResolvers;
  templates: TemplateRenderer;
  celebrations: CelebrationNotifier;
  chat: ChatSender;
  email: EmailSender;
  cache?: CacheHandle;
  random?: RandomSource;
  clock?: () => Date;
}

export function createServiceContext(deps: ServiceContextDeps): ServiceContext {
  const clock = deps.clock ?? (() => new Date());
  const { config } = deps;

  const marketplace = new MarketplaceService(deps.marketplaceStore, {
    cache: deps.cache,
    tiersCacheTtlSeconds: config.tiersCacheTtlSeconds,
    clock,
  });

  return {
    config,
    connections: deps.connections,
    engine: new RewardEngine({
      connections: deps.connections,
      celebrations: deps.celebrations,
      templates: deps.templates,
      cache: deps.cache,
      random: deps.random,
    }),
    marketplace,
    mysteryBox: new MysteryBoxService(deps.marketplaceStore, marketplace, deps.connections.users, {
      random: deps.random,
      cache: deps.cache,
      tiersCacheTtlSeconds: config.tiersCacheTtlSeconds,
      clock,
    }),
    feedback: new FeedbackService(deps.feedbackStore, deps.targets, { clock }),
    outbox: new OutboxDispatcher(
      deps.connections.outbox,
      { templates: deps.templates, chat: deps.chat, email: deps.email },
      {
        batchSize: config.outboxBatchSize,
        maxAttempts: config.outboxMaxAttempts,
        baseDelayMs: config.outboxBaseDelayMs,
        maxDelayMs: config.outboxMaxDelayMs,
      }
    ),
    clock,
  };
}
