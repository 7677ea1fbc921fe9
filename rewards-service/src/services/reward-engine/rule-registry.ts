/**
 * Rule Registry (Registry + Factory Pattern)
 *
 * Maps rule names used in reward definitions to constructors. Built-in rules
 * are registered on first use; custom rules can be added at startup.
 */

import { logger, ServiceError } from 'core-service';
import { REWARD_ERRORS } from '../../error-codes.js';
import { defaultRandom } from '../../random.js';
import type { RuleSpec } from '../../types.js';
import type { Rule, RuleDeps, RuleFactory } from './types.js';

import { BirthdayRule, WorkAnniversaryRule } from './rules/calendar-rules.js';
import { EmploymentDurationRule } from './rules/tenure-rules.js';
import { RandomUsersRule } from './rules/random-users.js';
import { BestSellerRule, AttendanceRule, AchievementRule } from './rules/performance-rules.js';
import {
  EarlyBirdRule,
  MidWeekMotivatorRule,
  WeekPositionRule,
  BusinessDaysRemainingRule,
  QuarterEndChampionRule,
  SeasonalBonusRule,
} from './rules/timing-rules.js';

// ═══════════════════════════════════════════════════════════════════
// Rule Registry
// ═══════════════════════════════════════════════════════════════════

export class RuleRegistry {
  private factories = new Map<string, RuleFactory>();
  private initialized = false;

  /**
   * Register all built-in rules.
   */
  initialize(): void {
    if (this.initialized) return;
    this.initialized = true;

    // Calendar
    this.register('birthday', (params, deps) => new BirthdayRule(params, deps));
    this.register('work_anniversary', (params, deps) => new WorkAnniversaryRule(params, deps));
    this.register('employment_duration', (params, deps) => new EmploymentDurationRule(params, deps));

    // Selection & performance
    this.register('random_users', (params, deps) => new RandomUsersRule(params, deps));
    this.register('best_seller', (params, deps) => new BestSellerRule(params, deps));
    this.register('attendance', (params, deps) => new AttendanceRule(params, deps));
    this.register('achievement', (params, deps) => new AchievementRule(params, deps));

    // Timing
    this.register('early_bird', (params, deps) => new EarlyBirdRule(params, deps));
    this.register('mid_week_motivator', (params, deps) => new MidWeekMotivatorRule(params, deps));
    this.register('week_position', (params, deps) => new WeekPositionRule(params, deps));
    this.register('business_days_remaining', (params, deps) => new BusinessDaysRemainingRule(params, deps));
    this.register('quarter_end_champion', (params, deps) => new QuarterEndChampionRule(params, deps));
    this.register('seasonal_bonus', (params, deps) => new SeasonalBonusRule(params, deps));

    logger.info('Rule registry initialized', {
      rules: this.getRegisteredNames(),
      count: this.factories.size,
    });
  }

  register(name: string, factory: RuleFactory): void {
    if (this.factories.has(name)) {
      logger.warn('Overwriting existing rule', { rule: name });
    }
    this.factories.set(name, factory);
  }

  unregister(name: string): boolean {
    return this.factories.delete(name);
  }

  has(name: string): boolean {
    this.initialize();
    return this.factories.has(name);
  }

  getRegisteredNames(): string[] {
    return Array.from(this.factories.keys()).sort();
  }

  /**
   * Build a rule from its spec. Unknown names and invalid params are
   * configuration errors and throw.
   */
  create(spec: RuleSpec, deps: Partial<RuleDeps> & Pick<RuleDeps, 'rewardId'>): Rule {
    this.initialize();
    const factory = this.factories.get(spec.type);
    if (!factory) {
      throw new ServiceError(REWARD_ERRORS.UnknownRule, { rule: spec.type, rewardId: deps.rewardId });
    }
    return factory(spec.params ?? {}, { random: deps.random ?? defaultRandom, rewardId: deps.rewardId });
  }
}

// ═══════════════════════════════════════════════════════════════════
// Singleton Export
// ═══════════════════════════════════════════════════════════════════

export const ruleRegistry = new RuleRegistry();

/**
 * Factory function: build every rule of a reward definition.
 */
export function createRules(
  specs: RuleSpec[] | undefined,
  deps: Partial<RuleDeps> & Pick<RuleDeps, 'rewardId'>,
  registry: RuleRegistry = ruleRegistry
): Rule[] {
  return (specs ?? []).map(spec => registry.create(spec, deps));
}
