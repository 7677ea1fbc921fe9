/**
 * Turns an arktype validator's output into a tagged result.
 *
 * @example
 * const parsed = validateInput(PrizeInput(body));
 * if (!parsed.ok) return reject(REWARD_ERRORS.InvalidPrize, parsed.errors.join('; '));
 */

import { type } from 'arktype';

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; errors: string[] };

export function validateInput<T>(output: T | InstanceType<typeof type.errors>): ValidationResult<T> {
  return output instanceof type.errors ? { ok: false, errors: [output.summary] } : { ok: true, value: output };
}
