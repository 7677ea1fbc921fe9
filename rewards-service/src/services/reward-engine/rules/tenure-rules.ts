/**
 * Employment duration rule: receiver has been employed within a band of years.
 */

import { type } from 'arktype';
import { BaseRule, parseRuleParams } from '../base-rule.js';
import type { EvalContext } from '../context.js';
import type { Environment } from '../environment.js';
import type { RuleDeps } from '../types.js';
import { yearsEmployed } from './calendar-rules.js';

const durationParams = type({
  'minYears?': 'number.integer >= 0',
  'maxYears?': 'number.integer >= 0',
});

export class EmploymentDurationRule extends BaseRule<typeof durationParams.infer> {
  readonly name = 'employment_duration';

  constructor(params: Record<string, unknown>, deps: RuleDeps) {
    super(parseRuleParams('employment_duration', durationParams(params)), deps);
  }

  fits(ctx: EvalContext): boolean {
    return ctx.user.startDate !== undefined;
  }

  async evaluate(ctx: EvalContext, env: Environment): Promise<boolean> {
    const years = yearsEmployed(ctx.user, env.timestamp);
    if (years === null) return false;
    if (years < (this.params.minYears ?? 0)) return false;
    return this.params.maxYears === undefined || years <= this.params.maxYears;
  }
}
