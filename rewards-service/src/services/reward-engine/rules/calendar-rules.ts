/**
 * Calendar Rules - birthdays and work anniversaries
 *
 * Both are dataset rules: a computed reward scans active users for today's
 * celebrations. They also gate single-user evaluation the same way.
 */

import { type } from 'arktype';
import type { RewardUser } from '../../../types.js';
import { BaseDatasetRule, parseRuleParams } from '../base-rule.js';
import { EvalContext } from '../context.js';
import type { Environment } from '../environment.js';
import type { RuleDeps } from '../types.js';

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * True when month/day of `date` falls on `at` (UTC). Feb 29 is observed on
 * Feb 28 in non-leap years.
 */
export function isSameMonthDay(month: number, day: number, at: Date): boolean {
  return at.getUTCMonth() + 1 === month && at.getUTCDate() === observedDay(month, day, at.getUTCFullYear());
}

function observedDay(month: number, day: number, year: number): number {
  return month === 2 && day === 29 && !isLeapYear(year) ? 28 : day;
}

export function isBirthday(user: RewardUser, at: Date): boolean {
  const match = user.birthday ? /^\d{4}-(\d{2})-(\d{2})/.exec(user.birthday) : null;
  if (!match) return false;
  return isSameMonthDay(Number(match[1]), Number(match[2]), at);
}

export function yearsEmployed(user: RewardUser, at: Date): number | null {
  if (!user.startDate) return null;
  const start = user.startDate;
  let years = at.getUTCFullYear() - start.getUTCFullYear();
  const anniversaryDay = observedDay(start.getUTCMonth() + 1, start.getUTCDate(), at.getUTCFullYear());
  const beforeAnniversary =
    at.getUTCMonth() < start.getUTCMonth() ||
    (at.getUTCMonth() === start.getUTCMonth() && at.getUTCDate() < anniversaryDay);
  if (beforeAnniversary) years--;
  return years;
}

// ═══════════════════════════════════════════════════════════════════
// Birthday
// ═══════════════════════════════════════════════════════════════════

const birthdayParams = type({});

export class BirthdayRule extends BaseDatasetRule<typeof birthdayParams.infer> {
  readonly name = 'birthday';

  constructor(params: Record<string, unknown>, deps: RuleDeps) {
    super(parseRuleParams('birthday', birthdayParams(params)), deps);
  }

  fits(ctx: EvalContext): boolean {
    return Boolean(ctx.user.birthday);
  }

  async evaluate(ctx: EvalContext, env: Environment): Promise<boolean> {
    return isBirthday(ctx.user, env.timestamp);
  }

  async evaluateDataset(env: Environment): Promise<EvalContext[]> {
    const users = await env.connection.users.listActive(undefined, env.timestamp);
    return users
      .filter(user => isBirthday(user, env.timestamp))
      .map(user => EvalContext.forUser(user, { birthday: user.birthday }));
  }
}

// ═══════════════════════════════════════════════════════════════════
// Work Anniversary
// ═══════════════════════════════════════════════════════════════════

const anniversaryParams = type({
  'minYears?': 'number.integer >= 1',
});

export class WorkAnniversaryRule extends BaseDatasetRule<typeof anniversaryParams.infer> {
  readonly name = 'work_anniversary';

  constructor(params: Record<string, unknown>, deps: RuleDeps) {
    super(parseRuleParams('work_anniversary', anniversaryParams(params)), deps);
  }

  private isAnniversary(user: RewardUser, at: Date): number | null {
    if (!user.startDate) return null;
    if (!isSameMonthDay(user.startDate.getUTCMonth() + 1, user.startDate.getUTCDate(), at)) return null;
    const years = yearsEmployed(user, at) ?? 0;
    return years >= (this.params.minYears ?? 1) ? years : null;
  }

  fits(ctx: EvalContext): boolean {
    return ctx.user.startDate !== undefined;
  }

  async evaluate(ctx: EvalContext, env: Environment): Promise<boolean> {
    return this.isAnniversary(ctx.user, env.timestamp) !== null;
  }

  async evaluateDataset(env: Environment): Promise<EvalContext[]> {
    const users = await env.connection.users.listActive(undefined, env.timestamp);
    const contexts: EvalContext[] = [];
    for (const user of users) {
      const years = this.isAnniversary(user, env.timestamp);
      if (years !== null) {
        contexts.push(EvalContext.forUser(user, { yearsEmployed: years }));
      }
    }
    return contexts;
  }
}
