/**
 * Abstract Base Rules
 *
 * Rules default to passing both gates; subclasses override the step they
 * constrain. Params are validated with arktype when the rule is built.
 */

import { validateInput, ServiceError } from 'core-service';
import { type } from 'arktype';
import { REWARD_ERRORS } from '../../error-codes.js';
import type { EvalContext } from './context.js';
import type { Environment } from './environment.js';
import type { DatasetRule, Rule, RuleDeps } from './types.js';

/**
 * Validate rule params against an arktype schema, throwing a configuration error.
 */
export function parseRuleParams<T>(rule: string, result: T | InstanceType<typeof type.errors>): T {
  const validation = validateInput(result);
  if (!validation.ok) {
    throw new ServiceError(REWARD_ERRORS.InvalidRuleParams, { rule, errors: validation.errors });
  }
  return validation.value;
}

export abstract class BaseRule<P> implements Rule {
  abstract readonly name: string;

  constructor(protected readonly params: P, protected readonly deps: RuleDeps) {}

  fits(_ctx: EvalContext, _env: Environment): boolean {
    return true;
  }

  async evaluate(_ctx: EvalContext, _env: Environment): Promise<boolean> {
    return true;
  }

  toString(): string {
    return this.name;
  }
}

export abstract class BaseDatasetRule<P> extends BaseRule<P> implements DatasetRule {
  fitsComputed(_env: Environment): boolean {
    return true;
  }

  abstract evaluateDataset(env: Environment): Promise<EvalContext[]>;
}
