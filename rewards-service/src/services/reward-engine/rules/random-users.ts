/**
 * Random users rule: picks `count` active users at random (optionally
 * within groups) as candidates for a computed reward.
 */

import { type } from 'arktype';
import { sample } from '../../../random.js';
import { BaseDatasetRule, parseRuleParams } from '../base-rule.js';
import { EvalContext } from '../context.js';
import type { Environment } from '../environment.js';
import type { RuleDeps } from '../types.js';

const randomUsersParams = type({
  'count?': 'number.integer > 0',
  'groups?': 'string[]',
});

export class RandomUsersRule extends BaseDatasetRule<typeof randomUsersParams.infer> {
  readonly name = 'random_users';

  constructor(params: Record<string, unknown>, deps: RuleDeps) {
    super(parseRuleParams('random_users', randomUsersParams(params)), deps);
  }

  async evaluateDataset(env: Environment): Promise<EvalContext[]> {
    const criteria = this.params.groups ? { groups: this.params.groups } : undefined;
    const users = await env.connection.users.listActive(criteria, env.timestamp);
    return sample(users, this.params.count ?? 1, this.deps.random).map(user => EvalContext.forUser(user, { randomPick: true }));
  }
}
