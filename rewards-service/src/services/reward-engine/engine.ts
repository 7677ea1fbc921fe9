/**
 * Reward Engine (Facade Pattern)
 *
 * Loads reward definitions, builds RewardObject / ComputedReward instances
 * through the rule registry and runs the award pipeline:
 *
 *   fits -> evaluate -> hasAwarded -> apply
 */

import { createChildLogger, getErrorMessage, type CacheHandle } from 'core-service';
import { REWARD_ERRORS, type RewardErrorCode } from '../../error-codes.js';
import type { RandomSource } from '../../random.js';
import type { AwardOverrides, AwardRecord, RewardDefinition } from '../../types.js';
import type { TemplateRenderer } from '../../notifications/templates.js';
import type { CelebrationNotifier } from '../../notifications/teams.js';
import { ComputedReward, type ComputedRunSummary } from './computed-reward.js';
import type { EvalContext } from './context.js';
import { Environment } from './environment.js';
import { RewardObject } from './reward-object.js';
import { createRules, ruleRegistry, type RuleRegistry } from './rule-registry.js';
import type { FailedCondition, RewardConnections } from './types.js';

const log = createChildLogger({ service: 'rewards-service', metadata: { component: 'reward-engine' } });

export interface RewardEngineDeps {
  connections: RewardConnections;
  celebrations: CelebrationNotifier;
  templates?: TemplateRenderer;
  cache?: CacheHandle;
  registry?: RuleRegistry;
  random?: RandomSource;
}

export type AwardOutcome =
  | { success: true; award: AwardRecord }
  | { success: false; error: string; code: RewardErrorCode; failed?: FailedCondition[]; details?: string };

export interface AwardOptions {
  now?: Date;
  overrides?: AwardOverrides;
}

/** Structured apply errors mapped to their codes */
const APPLY_ERROR_CODES: Readonly<Record<string, RewardErrorCode>> = {
  'Cannot reward yourself.': REWARD_ERRORS.CannotRewardYourself,
  'Reward already awarded for this timeframe': REWARD_ERRORS.AlreadyAwarded,
  'Error Validating Reward Payload': REWARD_ERRORS.InvalidAwardPayload,
  'Error on Rewards Database': REWARD_ERRORS.RewardsDatabaseError,
  'Error Creating Reward': REWARD_ERRORS.AwardCreationFailed,
};

export class RewardEngine {
  private readonly rewards = new Map<number, RewardObject>();
  private readonly registry: RuleRegistry;

  constructor(private readonly deps: RewardEngineDeps) {
    this.registry = deps.registry ?? ruleRegistry;
    this.registry.initialize();
  }

  // ═══════════════════════════════════════════════════════════════════
  // Definitions
  // ═══════════════════════════════════════════════════════════════════

  /**
   * (Re)load every enabled definition. Definitions whose rules cannot be
   * built are logged and left out.
   */
  async load(): Promise<number> {
    const definitions = await this.deps.connections.rewards.listDefinitions({ enabledOnly: true });
    this.rewards.clear();
    for (const definition of definitions) {
      try {
        this.rewards.set(definition.rewardId, this.build(definition));
      } catch (error) {
        log.error('Reward definition not loaded', { rewardId: definition.rewardId, error: getErrorMessage(error) });
      }
    }
    log.info('Reward definitions loaded', { count: this.rewards.size });
    return this.rewards.size;
  }

  /**
   * Build the reward object for a definition. Unknown rules or invalid
   * rule params throw.
   */
  build(definition: RewardDefinition): RewardObject {
    const rules = createRules(
      definition.rules,
      { rewardId: definition.rewardId, random: this.deps.random },
      this.registry
    );
    const options = { templates: this.deps.templates };
    return definition.rewardType === 'computed'
      ? new ComputedReward(definition, rules, options)
      : new RewardObject(definition, rules, options);
  }

  get(rewardId: number): RewardObject | undefined {
    return this.rewards.get(rewardId);
  }

  list(): RewardObject[] {
    return Array.from(this.rewards.values());
  }

  computedRewards(): ComputedReward[] {
    return this.list().filter((reward): reward is ComputedReward => reward instanceof ComputedReward);
  }

  /**
   * Rewards bound to `eventName`, with the binding each declares.
   */
  rewardsForEvent(eventName: string): Array<{ reward: RewardObject; binding: unknown }> {
    const bound: Array<{ reward: RewardObject; binding: unknown }> = [];
    for (const reward of this.rewards.values()) {
      const binding = reward.fitsEvent(eventName);
      if (binding !== undefined) bound.push({ reward, binding });
    }
    return bound;
  }

  environment(now?: Date): Environment {
    return new Environment(this.deps.connections, { timestamp: now, cache: this.deps.cache });
  }

  // ═══════════════════════════════════════════════════════════════════
  // Awarding
  // ═══════════════════════════════════════════════════════════════════

  async award(rewardId: number, ctx: EvalContext, options: AwardOptions = {}): Promise<AwardOutcome> {
    const reward = await this.resolve(rewardId);
    if (!reward) {
      return { success: false, error: 'Reward not found', code: REWARD_ERRORS.RewardNotFound };
    }
    if (!reward.isEnabled()) {
      return { success: false, error: 'Reward is disabled', code: REWARD_ERRORS.RewardNotEligible };
    }

    const env = this.environment(options.now);

    const failed: FailedCondition[] = [];
    if (!reward.fits(ctx, env, failed) || !(await reward.evaluate(ctx, env, failed))) {
      log.debug('Reward not eligible', { rewardId, userId: ctx.user.userId, failed });
      return { success: false, error: 'User is not eligible for this reward', code: REWARD_ERRORS.RewardNotEligible, failed };
    }

    if (await reward.hasAwarded(ctx.user, env)) {
      return { success: false, error: 'Reward already awarded', code: REWARD_ERRORS.AlreadyAwarded };
    }

    const result = await reward.apply(ctx, env, options.overrides);
    if (result.ok) {
      return { success: true, award: result.award };
    }
    return {
      success: false,
      error: result.error.message,
      code: APPLY_ERROR_CODES[result.error.message] ?? REWARD_ERRORS.AwardCreationFailed,
      details: result.error.error,
    };
  }

  /**
   * Run the loaded computed rewards once (all of them, or those `include`
   * accepts). A failing reward is logged and does not stop the others.
   */
  async runComputed(now?: Date, include: (reward: ComputedReward) => boolean = () => true): Promise<ComputedRunSummary[]> {
    const summaries: ComputedRunSummary[] = [];
    for (const reward of this.computedRewards().filter(include)) {
      const summary = await this.runOne(reward, now);
      if (summary) summaries.push(summary);
    }
    return summaries;
  }

  /** Run one computed reward; null when it is not loaded or the run failed */
  async runComputedReward(rewardId: number, now?: Date): Promise<ComputedRunSummary | null> {
    const reward = this.rewards.get(rewardId);
    if (!(reward instanceof ComputedReward)) {
      log.warn('Computed reward not loaded', { rewardId });
      return null;
    }
    return this.runOne(reward, now);
  }

  private async runOne(reward: ComputedReward, now?: Date): Promise<ComputedRunSummary | null> {
    try {
      return await reward.callReward({
        connections: this.deps.connections,
        celebrations: this.deps.celebrations,
        cache: this.deps.cache,
        now,
      });
    } catch (error) {
      log.error('Computed reward run failed', { rewardId: reward.rewardId, error: getErrorMessage(error) });
      return null;
    }
  }

  private async resolve(rewardId: number): Promise<RewardObject | null> {
    const loaded = this.rewards.get(rewardId);
    if (loaded) return loaded;

    const definition = await this.deps.connections.rewards.findDefinition(rewardId);
    if (!definition) return null;
    const reward = this.build(definition);
    this.rewards.set(rewardId, reward);
    return reward;
  }
}
