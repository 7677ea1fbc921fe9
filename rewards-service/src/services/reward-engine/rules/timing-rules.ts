/**
 * Timing Rules
 *
 * Gate on where the evaluation instant falls in the day, week, month,
 * quarter or year. All read the Environment only; quarter_end_champion
 * may additionally require a metric total for the quarter.
 */

import { type } from 'arktype';
import { BaseRule, parseRuleParams } from '../base-rule.js';
import type { EvalContext } from '../context.js';
import type { Environment } from '../environment.js';
import type { RuleDeps } from '../types.js';
import { businessDaysRemainingInMonth, daysUntilPeriodEnd, periodRange } from './periods.js';

/** Environment-only rules evaluate exactly like they fit */
abstract class EnvironmentRule<P> extends BaseRule<P> {
  protected abstract matches(env: Environment): boolean;

  fits(_ctx: EvalContext, env: Environment): boolean {
    return this.matches(env);
  }

  async evaluate(_ctx: EvalContext, env: Environment): Promise<boolean> {
    return this.matches(env);
  }
}

function numberAttribute(env: Environment, key: string): number {
  const value = env.get(key);
  return typeof value === 'number' ? value : NaN;
}

// ═══════════════════════════════════════════════════════════════════
// Early Bird
// ═══════════════════════════════════════════════════════════════════

const earlyBirdParams = type({
  'beforeHour?': '0 <= number.integer <= 23',
});

export class EarlyBirdRule extends EnvironmentRule<typeof earlyBirdParams.infer> {
  readonly name = 'early_bird';

  constructor(params: Record<string, unknown>, deps: RuleDeps) {
    super(parseRuleParams('early_bird', earlyBirdParams(params)), deps);
  }

  protected matches(env: Environment): boolean {
    return numberAttribute(env, 'hour') < (this.params.beforeHour ?? 9);
  }
}

// ═══════════════════════════════════════════════════════════════════
// Mid-week Motivator
// ═══════════════════════════════════════════════════════════════════

export class MidWeekMotivatorRule extends EnvironmentRule<Record<string, never>> {
  readonly name = 'mid_week_motivator';

  constructor(_params: Record<string, unknown>, deps: RuleDeps) {
    super({}, deps);
  }

  protected matches(env: Environment): boolean {
    return numberAttribute(env, 'dayOfWeek') === 3;
  }
}

// ═══════════════════════════════════════════════════════════════════
// Week Position
// ═══════════════════════════════════════════════════════════════════

const WEEK_POSITIONS = {
  start: [1, 2],
  middle: [3, 4],
  end: [5],
  weekend: [6, 7],
} as const;

const weekPositionParams = type({
  position: "'start' | 'middle' | 'end' | 'weekend'",
});

export class WeekPositionRule extends EnvironmentRule<typeof weekPositionParams.infer> {
  readonly name = 'week_position';

  constructor(params: Record<string, unknown>, deps: RuleDeps) {
    super(parseRuleParams('week_position', weekPositionParams(params)), deps);
  }

  protected matches(env: Environment): boolean {
    const days: readonly number[] = WEEK_POSITIONS[this.params.position];
    return days.includes(numberAttribute(env, 'dayOfWeek'));
  }
}

// ═══════════════════════════════════════════════════════════════════
// Business Days Remaining
// ═══════════════════════════════════════════════════════════════════

const businessDaysParams = type({
  'maxDays?': 'number.integer >= 0',
});

export class BusinessDaysRemainingRule extends EnvironmentRule<typeof businessDaysParams.infer> {
  readonly name = 'business_days_remaining';

  constructor(params: Record<string, unknown>, deps: RuleDeps) {
    super(parseRuleParams('business_days_remaining', businessDaysParams(params)), deps);
  }

  protected matches(env: Environment): boolean {
    return businessDaysRemainingInMonth(env.timestamp) <= (this.params.maxDays ?? 3);
  }
}

// ═══════════════════════════════════════════════════════════════════
// Quarter-end Champion
// ═══════════════════════════════════════════════════════════════════

const quarterEndParams = type({
  'withinDays?': 'number.integer >= 0',
  'metric?': 'string > 0',
  'threshold?': 'number',
});

export class QuarterEndChampionRule extends BaseRule<typeof quarterEndParams.infer> {
  readonly name = 'quarter_end_champion';

  constructor(params: Record<string, unknown>, deps: RuleDeps) {
    super(parseRuleParams('quarter_end_champion', quarterEndParams(params)), deps);
  }

  fits(_ctx: EvalContext, env: Environment): boolean {
    return daysUntilPeriodEnd('quarter', env.timestamp) <= (this.params.withinDays ?? 7);
  }

  async evaluate(ctx: EvalContext, env: Environment): Promise<boolean> {
    if (!this.fits(ctx, env)) return false;
    if (!this.params.metric) return true;
    const { from, to } = periodRange('quarter', env.timestamp);
    const total = await env.connection.activity.getMetric(ctx.user.userId, this.params.metric, from, to);
    return total >= (this.params.threshold ?? 0);
  }
}

// ═══════════════════════════════════════════════════════════════════
// Seasonal Bonus
// ═══════════════════════════════════════════════════════════════════

const SEASONS = {
  winter: [12, 1, 2],
  spring: [3, 4, 5],
  summer: [6, 7, 8],
  autumn: [9, 10, 11],
} as const;

const seasonalParams = type({
  'season?': "'winter' | 'spring' | 'summer' | 'autumn'",
  'months?': '(1 <= number.integer <= 12)[]',
});

export class SeasonalBonusRule extends EnvironmentRule<typeof seasonalParams.infer> {
  readonly name = 'seasonal_bonus';
  private readonly months: readonly number[];

  constructor(params: Record<string, unknown>, deps: RuleDeps) {
    super(parseRuleParams('seasonal_bonus', seasonalParams(params)), deps);
    this.months = this.params.months ?? (this.params.season ? SEASONS[this.params.season] : []);
  }

  protected matches(env: Environment): boolean {
    return this.months.includes(numberAttribute(env, 'month'));
  }
}
