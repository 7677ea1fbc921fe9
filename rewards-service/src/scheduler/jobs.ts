/**
 * Scheduled Jobs
 *
 * Plain callables over the service context; they know nothing about the
 * scheduler that runs them.
 */

import { type } from 'arktype';
import { createChildLogger, ServiceError, validateInput } from 'core-service';
import { REWARD_ERRORS } from '../error-codes.js';
import type { ServiceContext } from '../service-context.js';
import type { ComputedRunSummary } from '../services/reward-engine/computed-reward.js';
import type { RewardEngine } from '../services/reward-engine/engine.js';
import type { DrainSummary } from '../notifications/outbox.js';
import type { MysteryBoxResult } from '../services/marketplace/types.js';
import { WEEKDAYS, type JobArgs, type JobDescriptor } from './types.js';

const log = createChildLogger({ service: 'rewards-service', metadata: { component: 'jobs' } });

const mysteryBoxArgsSchema = type({
  'eventName?': 'string > 0',
  'description?': 'string',
  'winnersCount?': 'number.integer > 0',
  'expiresInDays?': 'number.integer > 0',
  'tierOverrides?': 'Record<string, number>',
  'userIds?': 'number.integer[]',
  'criteria?': {
    'minTenureDays?': 'number.integer >= 0',
    'groups?': 'string[]',
  },
});

const computedArgsSchema = type({
  'rewardId?': 'number.integer > 0',
});

// ═══════════════════════════════════════════════════════════════════
// Jobs
// ═══════════════════════════════════════════════════════════════════

export async function randomMysteryBoxEvent(ctx: ServiceContext, args: JobArgs = {}): Promise<MysteryBoxResult> {
  const validation = validateInput(mysteryBoxArgsSchema(args));
  if (!validation.ok) {
    throw new ServiceError(REWARD_ERRORS.InvalidMarketplaceInput, { job: 'mystery_box', errors: validation.errors });
  }
  const options = validation.value;
  const result = await ctx.mysteryBox.executeMysteryBox({
    eventName: options.eventName ?? 'Mystery Box Event',
    description: options.description,
    winnersCount: options.winnersCount ?? 1,
    expiresInDays: options.expiresInDays ?? 30,
    tierOverrides: options.tierOverrides,
    userIds: options.userIds,
    criteria: options.criteria,
    triggeredBy: 'scheduler',
  });

  if (result.success) {
    log.info('Scheduled mystery box completed', { eventId: result.eventId, winners: result.winners.length });
  } else {
    log.warn('Scheduled mystery box failed', { eventId: result.eventId, error: result.error });
  }
  return result;
}

export async function expireOldPrizes(ctx: ServiceContext): Promise<number> {
  return ctx.marketplace.expireOldAwards(ctx.clock());
}

/**
 * With `rewardId`, run that computed reward; otherwise run every computed
 * reward that has no schedule of its own.
 */
export async function runComputedRewards(ctx: ServiceContext, args: JobArgs = {}): Promise<ComputedRunSummary[]> {
  const validation = validateInput(computedArgsSchema(args));
  if (!validation.ok) {
    throw new ServiceError(REWARD_ERRORS.InvalidRuleParams, { job: 'computed_rewards', errors: validation.errors });
  }
  const now = ctx.clock();
  const { rewardId } = validation.value;
  if (rewardId !== undefined) {
    const summary = await ctx.engine.runComputedReward(rewardId, now);
    return summary ? [summary] : [];
  }
  return ctx.engine.runComputed(now, reward => !reward.definition.job);
}

export async function drainOutbox(ctx: ServiceContext): Promise<DrainSummary> {
  return ctx.outbox.drain(ctx.clock());
}

// ═══════════════════════════════════════════════════════════════════
// Default Schedule
// ═══════════════════════════════════════════════════════════════════

export function defaultJobs(options: { outboxEveryMinutes?: number } = {}): JobDescriptor[] {
  return [
    {
      id: 'mystery_box_workday',
      name: 'Workday Mystery Box',
      trigger: { kind: 'interval', everyMinutes: 30, hours: [9, 17], weekdays: WEEKDAYS },
      handler: randomMysteryBoxEvent,
      args: { eventName: 'Workday Mystery Box', winnersCount: 1, expiresInDays: 30 },
    },
    {
      id: 'mystery_box_lunch',
      name: 'Lunch Special Mystery Box',
      trigger: { kind: 'daily', hour: 12, minute: 0, weekdays: WEEKDAYS },
      handler: randomMysteryBoxEvent,
      args: {
        eventName: 'Lunch Special Mystery Box',
        winnersCount: 3,
        expiresInDays: 30,
        tierOverrides: { '5': 0.08, '4': 0.15 },
      },
    },
    {
      id: 'prize_expiration_check',
      name: 'Daily Prize Expiration',
      trigger: { kind: 'daily', hour: 2, minute: 0 },
      handler: expireOldPrizes,
    },
    {
      id: 'computed_rewards',
      name: 'Computed Rewards',
      trigger: { kind: 'daily', hour: 8, minute: 0 },
      handler: runComputedRewards,
    },
    {
      id: 'outbox_drain',
      name: 'Outbox Drain',
      trigger: { kind: 'interval', everyMinutes: options.outboxEveryMinutes ?? 1 },
      handler: drainOutbox,
    },
  ];
}

/**
 * One daily job per computed reward that declares its own `job` schedule.
 */
export function computedRewardJobs(engine: RewardEngine): JobDescriptor[] {
  return engine
    .computedRewards()
    .filter(reward => reward.definition.job)
    .map((reward): JobDescriptor => ({
      id: `computed_reward_${reward.rewardId}`,
      name: reward.name,
      trigger: {
        kind: 'daily',
        hour: reward.definition.job?.hour ?? 8,
        minute: reward.definition.job?.minute ?? 0,
      },
      handler: runComputedRewards,
      args: { rewardId: reward.rewardId },
    }));
}
