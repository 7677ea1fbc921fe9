/**
 * RewardObject
 *
 * Wraps one reward definition with its rules:
 *   fits()        synchronous gate (environment, programs, context keys, assigner, rule fits)
 *   evaluate()    awardee check + concurrent rule evaluation
 *   hasAwarded()  prior-award lookup by multiplicity, timeframe bucket or cooldown
 *   apply()       persist the award with its outbox message, then check collectives
 *
 * fits() and evaluate() record failed checks in a list the caller passes in,
 * so concurrent checks of one reward never share failures.
 */

import { MongoError } from 'mongodb';
import { createChildLogger, generateId, getErrorMessage, ServiceError, type Logger } from 'core-service';
import { REWARD_ERRORS } from '../../error-codes.js';
import type {
  ApplyResult,
  AudienceFilter,
  AwardOverrides,
  AwardRecord,
  CollectiveUnlock,
  RewardDefinition,
  RewardUser,
} from '../../types.js';
import type { TemplateRenderer } from '../../notifications/templates.js';
import { createRewardAwardedMessage } from '../../notifications/outbox.js';
import { evaluateEnvironment } from './availability.js';
import type { EvalContext } from './context.js';
import type { Environment } from './environment.js';
import { parseAssignerString, validateAwardRecord } from './schemas.js';
import { awardBucket, epochMinutes, isTimeframe, timeframeKey } from './timeframe.js';
import type { FailedCondition, FitCheck, Rule } from './types.js';

export const DEFAULT_REWARD_MESSAGE = "Congratulations! You've received a Badge!";

export interface RewardObjectOptions {
  /** Context keys required by this reward; defaults to the definition's `conditions` */
  conditions?: Record<string, unknown>;
  templates?: TemplateRenderer;
  logger?: Logger;
}

function matchesAudience(filter: AudienceFilter, jobCode: unknown, groups: unknown): boolean {
  if (filter.jobCode?.length && typeof jobCode === 'string' && filter.jobCode.includes(jobCode)) {
    return true;
  }
  if (filter.groups?.length && Array.isArray(groups)) {
    return groups.some(group => typeof group === 'string' && (filter.groups ?? []).includes(group));
  }
  return false;
}

export class RewardObject {
  protected readonly log: Logger;
  protected readonly templates?: TemplateRenderer;
  private readonly conditions: Record<string, unknown>;

  constructor(
    readonly definition: RewardDefinition,
    readonly rules: Rule[] = [],
    options: RewardObjectOptions = {}
  ) {
    this.conditions = options.conditions ?? definition.conditions ?? {};
    this.templates = options.templates;
    this.log = options.logger ?? createChildLogger({
      service: 'rewards-service',
      metadata: { component: 'reward', rewardId: definition.rewardId },
    });
  }

  get rewardId(): number {
    return this.definition.rewardId;
  }

  get name(): string {
    return this.definition.reward;
  }

  isEnabled(): boolean {
    return this.definition.isEnabled;
  }

  /**
   * Binding value of `eventName` when the reward declares it, otherwise undefined.
   */
  fitsEvent(eventName: string): unknown {
    for (const event of this.definition.events ?? []) {
      if (Object.prototype.hasOwnProperty.call(event, eventName)) {
        return event[eventName];
      }
    }
    return undefined;
  }

  // ═══════════════════════════════════════════════════════════════════
  // Fit
  // ═══════════════════════════════════════════════════════════════════

  fits(ctx: EvalContext, env: Environment, failed: FailedCondition[] = []): boolean {
    const checks: Array<[FitCheck, () => boolean]> = [
      ['environment', () => evaluateEnvironment(this.definition.availabilityRule, env)],
      ['programs', () => this.checkPrograms(ctx)],
      ['context', () => this.checkContext(ctx)],
      ['assigner', () => this.checkAssigner(ctx)],
      ['rules', () => this.checkRuleFits(ctx, env, failed)],
    ];

    let fit = true;
    for (const [check, run] of checks) {
      let passed: boolean;
      try {
        passed = run();
      } catch (error) {
        this.log.warn('Fit check raised', { check, error: getErrorMessage(error) });
        passed = false;
      }
      if (!passed) {
        failed.push({ check });
        fit = false;
      }
    }
    return fit;
  }

  checkPrograms(ctx: EvalContext): boolean {
    const programs = this.definition.programs ?? [];
    if (programs.length === 0) return true;
    return ctx.programs.some(program => programs.includes(program));
  }

  checkContext(ctx: EvalContext): boolean {
    const keys = Object.keys(this.conditions);
    if (keys.length === 0) return true;
    return keys.some(key => ctx.hasKey(key));
  }

  /**
   * The acting session must match at least one assigner entry: a user id,
   * an email, or a job-code / group filter.
   */
  checkAssigner(ctx: EvalContext): boolean {
    const assigner = this.definition.assigner ?? [];
    if (assigner.length === 0) return true;
    const { session } = ctx;

    return assigner.some(entry => {
      if (typeof entry === 'number') return entry === session.userId;
      if (typeof entry === 'string') {
        const filter = parseAssignerString(entry);
        if (filter) return matchesAudience(filter, session.jobCode, session.groups);
        const value = entry.trim().toLowerCase();
        return value === String(session.userId) || value === session.email.toLowerCase();
      }
      return matchesAudience(entry, session.jobCode, session.groups);
    });
  }

  private checkRuleFits(ctx: EvalContext, env: Environment, failed: FailedCondition[]): boolean {
    let fit = true;
    for (const rule of this.rules) {
      try {
        if (!rule.fits(ctx, env)) {
          failed.push({ check: 'rule', rule: rule.name });
          fit = false;
        }
      } catch (error) {
        failed.push({ check: 'rule', rule: rule.name, error: getErrorMessage(error) });
        fit = false;
      }
    }
    return fit;
  }

  // ═══════════════════════════════════════════════════════════════════
  // Evaluate
  // ═══════════════════════════════════════════════════════════════════

  /**
   * The receiving user must match at least one awardee filter.
   */
  async checkAwardee(ctx: EvalContext): Promise<boolean> {
    const awardee = this.definition.awardee ?? [];
    if (awardee.length === 0) return true;
    return awardee.some(filter => matchesAudience(filter, ctx.store.jobCode, ctx.store.groups));
  }

  async evaluate(ctx: EvalContext, env: Environment, failed: FailedCondition[] = []): Promise<boolean> {
    if (!(await this.checkAwardee(ctx))) {
      failed.push({ check: 'awardee' });
      return false;
    }
    const results = await Promise.all(this.rules.map(rule => this.evaluateRule(rule, ctx, env, failed)));
    return results.every(Boolean);
  }

  private async evaluateRule(rule: Rule, ctx: EvalContext, env: Environment, failed: FailedCondition[]): Promise<boolean> {
    try {
      const passed = await rule.evaluate(ctx, env);
      if (!passed) failed.push({ check: 'rule', rule: rule.name });
      return passed;
    } catch (error) {
      const message = getErrorMessage(error);
      this.log.warn('Rule evaluation failed', { rule: rule.name, userId: ctx.user.userId, error: message });
      failed.push({ check: 'rule', rule: rule.name, error: message });
      return false;
    }
  }

  // ═══════════════════════════════════════════════════════════════════
  // Prior Awards
  // ═══════════════════════════════════════════════════════════════════

  /**
   * True when a new award would repeat one the user already holds.
   * An unknown timeframe is a configuration error and throws.
   */
  async hasAwarded(
    user: Pick<RewardUser, 'userId'>,
    env: Environment,
    timeframe: string | null | undefined = this.definition.timeframe
  ): Promise<boolean> {
    if (timeframe && !isTimeframe(timeframe)) {
      throw new ServiceError(REWARD_ERRORS.InvalidTimeframe, { timeframe, rewardId: this.rewardId });
    }

    const awards = await env.connection.rewards.findAwards(this.rewardId, user.userId);
    if (awards.length === 0) return false;
    if (!this.definition.multiple) return true;

    if (timeframe) {
      const current = timeframeKey(timeframe, env.timestamp);
      return awards.some(award => timeframeKey(timeframe, award.awardedAt) === current);
    }

    const cooldown = this.definition.cooldownMinutes ?? 0;
    if (cooldown > 0) {
      const newest = Math.max(...awards.map(award => award.awardedAt.getTime()));
      return env.timestamp.getTime() - newest < cooldown * 60000;
    }

    const minute = epochMinutes(env.timestamp);
    return awards.some(award => epochMinutes(award.awardedAt) === minute);
  }

  // ═══════════════════════════════════════════════════════════════════
  // Apply
  // ═══════════════════════════════════════════════════════════════════

  async apply(ctx: EvalContext, env: Environment, overrides: AwardOverrides = {}): Promise<ApplyResult> {
    const { user, session } = ctx;

    if (overrides.giverUser !== undefined && overrides.giverUser === user.userId) {
      return { ok: false, error: { message: 'Cannot reward yourself.', error: REWARD_ERRORS.CannotRewardYourself } };
    }

    const giver: Partial<AwardRecord> =
      overrides.giverUser === undefined && ctx.hasGiver
        ? {
            giverUser: session.userId,
            giverEmail: session.email,
            giverEmployee: session.associateId,
            giverName: session.displayName,
          }
        : {};

    const candidate: AwardRecord = {
      // core
      awardId: generateId(),
      rewardId: this.definition.rewardId,
      reward: this.definition.reward,
      timeframeBucket: awardBucket(this.definition, overrides.awardedAt ?? env.timestamp),
      // receiver
      receiverUser: user.userId,
      receiverEmail: user.email,
      receiverEmployee: user.associateId,
      receiverName: user.displayName,
      // details
      points: this.definition.points,
      awardedAt: env.timestamp,
      rewardType: this.definition.rewardType,
      message: overrides.message ?? this.renderMessage(ctx, env, overrides),
      ...giver,
      ...overrides,
    };

    const validation = validateAwardRecord(candidate);
    if (!validation.ok) {
      return { ok: false, error: { message: 'Error Validating Reward Payload', error: validation.errors.join('; ') } };
    }
    const award = validation.value;

    try {
      const outcome = await env.connection.rewards.insertAward(
        award,
        createRewardAwardedMessage(this.definition, award, env.timestamp)
      );
      if (outcome === 'duplicate') {
        this.log.info('Award already exists for bucket', { userId: user.userId, bucket: award.timeframeBucket });
        return {
          ok: false,
          error: { message: 'Reward already awarded for this timeframe', error: REWARD_ERRORS.AlreadyAwarded },
        };
      }
    } catch (error) {
      if (error instanceof MongoError) {
        this.log.error('Award insert failed', { userId: user.userId, error: error.message });
        return { ok: false, error: { message: 'Error on Rewards Database', error: error.message } };
      }
      this.log.error('Award creation failed', { userId: user.userId, error: getErrorMessage(error) });
      return { ok: false, error: { message: 'Error Creating Reward', error: getErrorMessage(error) } };
    }

    this.log.info('Reward awarded', { email: user.email, reward: this.name, awardedAt: award.awardedAt });

    try {
      await this.checkCollectives(this.rewardId, user.userId, env);
    } catch (error) {
      this.log.warn('Collective check failed', { userId: user.userId, error: getErrorMessage(error) });
    }

    return { ok: true, award };
  }

  /**
   * Render the reward message; a failed render leaves the source text as-is.
   */
  protected renderMessage(ctx: EvalContext, env: Environment, overrides: AwardOverrides): string {
    const source = this.definition.message ?? DEFAULT_REWARD_MESSAGE;
    if (!this.templates) return source;
    try {
      return this.templates.renderString(source, {
        user: ctx.user,
        session: ctx.session,
        env: { timestamp: env.timestamp, curdate: env.curdate, ...env.attributes },
        args: ctx.args,
        reward: this.definition.reward,
        points: this.definition.points,
        ...overrides,
      });
    } catch (error) {
      this.log.warn('Reward message render failed', { error: getErrorMessage(error) });
      return source;
    }
  }

  // ═══════════════════════════════════════════════════════════════════
  // Collectives
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Unlock every collective containing `rewardId` once the user holds all
   * of its rewards. Returns the unlocks inserted by this call.
   */
  async checkCollectives(rewardId: number, userId: number, env: Environment): Promise<CollectiveUnlock[]> {
    const store = env.connection.rewards;
    const collectives = await store.findCollectivesForReward(rewardId);
    const unlocked: CollectiveUnlock[] = [];

    for (const collective of collectives) {
      const required = new Set(collective.rewardIds);
      if (required.size === 0) continue;
      const held = await store.countDistinctHeld(userId, Array.from(required));
      if (held !== required.size) continue;

      const unlock: CollectiveUnlock = { collectiveId: collective.collectiveId, userId, unlockedAt: env.timestamp };
      if (await store.insertCollectiveUnlock(unlock)) {
        this.log.info('Collective unlocked', { collectiveId: collective.collectiveId, userId });
        unlocked.push(unlock);
      }
    }
    return unlocked;
  }
}
