/**
 * Performance Rules
 *
 * Read recorded user metrics through the ActivityReader:
 * - best_seller: top performers of a period (dataset rule)
 * - attendance: attended days in a period reach a minimum
 * - achievement: metric total reaches a threshold
 */

import { type } from 'arktype';
import { BaseDatasetRule, BaseRule, parseRuleParams } from '../base-rule.js';
import { EvalContext } from '../context.js';
import type { Environment } from '../environment.js';
import type { RuleDeps } from '../types.js';
import { periodRange, type DateRange } from './periods.js';

const period = "'day' | 'week' | 'month' | 'quarter' | 'year'";

// ═══════════════════════════════════════════════════════════════════
// Best Seller
// ═══════════════════════════════════════════════════════════════════

const bestSellerParams = type({
  'metric?': 'string > 0',
  'period?': period,
  'top?': 'number.integer > 0',
  'minValue?': 'number',
  /** Rank the period before the evaluation date (default true) */
  'previous?': 'boolean',
});

export class BestSellerRule extends BaseDatasetRule<typeof bestSellerParams.infer> {
  readonly name = 'best_seller';

  constructor(params: Record<string, unknown>, deps: RuleDeps) {
    super(parseRuleParams('best_seller', bestSellerParams(params)), deps);
  }

  private range(env: Environment): DateRange {
    return periodRange(this.params.period ?? 'month', env.timestamp, this.params.previous ?? true);
  }

  private async leaders(env: Environment) {
    const { from, to } = this.range(env);
    const leaders = await env.connection.activity.topPerformers(
      this.params.metric ?? 'sales',
      from,
      to,
      this.params.top ?? 1
    );
    const minValue = this.params.minValue ?? 0;
    return leaders.filter(leader => leader.value > minValue);
  }

  async evaluate(ctx: EvalContext, env: Environment): Promise<boolean> {
    const leaders = await this.leaders(env);
    return leaders.some(leader => leader.userId === ctx.user.userId);
  }

  async evaluateDataset(env: Environment): Promise<EvalContext[]> {
    const leaders = await this.leaders(env);
    if (leaders.length === 0) return [];
    const users = await env.connection.users.findByIds(leaders.map(l => l.userId));
    const byId = new Map(users.map(user => [user.userId, user]));
    const contexts: EvalContext[] = [];
    leaders.forEach((leader, index) => {
      const user = byId.get(leader.userId);
      if (user?.isActive) {
        contexts.push(EvalContext.forUser(user, { rank: index + 1, total: leader.value }));
      }
    });
    return contexts;
  }
}

// ═══════════════════════════════════════════════════════════════════
// Attendance
// ═══════════════════════════════════════════════════════════════════

const attendanceParams = type({
  minDays: 'number.integer > 0',
  'metric?': 'string > 0',
  'period?': period,
  'previous?': 'boolean',
});

export class AttendanceRule extends BaseRule<typeof attendanceParams.infer> {
  readonly name = 'attendance';

  constructor(params: Record<string, unknown>, deps: RuleDeps) {
    super(parseRuleParams('attendance', attendanceParams(params)), deps);
  }

  async evaluate(ctx: EvalContext, env: Environment): Promise<boolean> {
    const { from, to } = periodRange(this.params.period ?? 'month', env.timestamp, this.params.previous ?? false);
    const days = await env.connection.activity.getMetric(ctx.user.userId, this.params.metric ?? 'attendance', from, to);
    return days >= this.params.minDays;
  }
}

// ═══════════════════════════════════════════════════════════════════
// Achievement
// ═══════════════════════════════════════════════════════════════════

const achievementParams = type({
  metric: 'string > 0',
  threshold: 'number',
  /** Omit to count all-time */
  'period?': period,
});

export class AchievementRule extends BaseRule<typeof achievementParams.infer> {
  readonly name = 'achievement';

  constructor(params: Record<string, unknown>, deps: RuleDeps) {
    super(parseRuleParams('achievement', achievementParams(params)), deps);
  }

  async evaluate(ctx: EvalContext, env: Environment): Promise<boolean> {
    const { from, to } = this.params.period
      ? periodRange(this.params.period, env.timestamp)
      : { from: new Date(0), to: env.timestamp };
    const total = await env.connection.activity.getMetric(ctx.user.userId, this.params.metric, from, to);
    return total >= this.params.threshold;
  }
}
