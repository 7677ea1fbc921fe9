/**
 * Reward Engine Schemas
 *
 * arktype validators for stored reward definitions and award records.
 */

import { type } from 'arktype';
import { validateInput, ServiceError } from 'core-service';
import { REWARD_ERRORS } from '../../error-codes.js';
import type { AwardRecord, RewardDefinition } from '../../types.js';

const attributeValue = type('string | number | boolean');

export const attributeMatcherSchema = attributeValue
  .or(attributeValue.array())
  .or({ from: 'number', to: 'number' });

export const audienceFilterSchema = type({
  'jobCode?': 'string[]',
  'groups?': 'string[]',
});

export const availabilityRuleSchema = type({
  'startTime?': 'string',
  'endTime?': 'string',
  'startDate?': 'string',
  'endDate?': 'string',
  'matchers?': type({ '[string]': attributeMatcherSchema }),
});

export const ruleSpecSchema = type({
  type: 'string > 0',
  'params?': 'Record<string, unknown>',
});

export const rewardDefinitionSchema = type({
  rewardId: 'number.integer > 0',
  reward: 'string > 0',
  'description?': 'string',
  'icon?': 'string',
  'emoji?': 'string',
  points: 'number >= 0',
  rewardType: "'manual' | 'computed' | 'collective'",
  'rewardCategory?': 'string',
  multiple: 'boolean',
  'timeframe?': "'hourly' | 'daily' | 'weekly' | 'monthly' | null",
  'cooldownMinutes?': 'number.integer >= 0',
  'availabilityRule?': availabilityRuleSchema,
  'assigner?': type('string | number').or(audienceFilterSchema).array(),
  'awardee?': audienceFilterSchema.array(),
  'programs?': 'string[]',
  'events?': type('Record<string, unknown>').array(),
  'conditions?': 'Record<string, unknown>',
  'message?': 'string',
  'notificationKind?': "'birthday' | 'anniversary' | 'generic'",
  'teamsWebhook?': 'string',
  'attributes?': 'Record<string, unknown>',
  isEnabled: 'boolean',
  'rules?': ruleSpecSchema.array(),
  'job?': {
    'hour?': '0 <= number.integer <= 23',
    'minute?': '0 <= number.integer <= 59',
  },
});

export const awardRecordSchema = type({
  awardId: 'string > 0',
  rewardId: 'number.integer > 0',
  reward: 'string > 0',
  receiverUser: 'number.integer',
  receiverEmail: 'string.email',
  'receiverEmployee?': 'string | undefined',
  receiverName: 'string',
  'giverUser?': 'number.integer | undefined',
  'giverEmail?': 'string | undefined',
  'giverEmployee?': 'string | undefined',
  'giverName?': 'string | undefined',
  points: 'number >= 0',
  awardedAt: 'Date',
  rewardType: "'manual' | 'computed' | 'collective'",
  message: 'string',
  timeframeBucket: 'string > 0',
});

export type AwardRecordValidation = { ok: true; value: AwardRecord } | { ok: false; errors: string[] };

export function validateAwardRecord(record: unknown): AwardRecordValidation {
  return validateInput(awardRecordSchema(record));
}

/**
 * Validate a stored definition. Invalid definitions are configuration errors.
 */
export function parseRewardDefinition(input: unknown): RewardDefinition {
  const result = validateInput(rewardDefinitionSchema(input));
  if (!result.ok) {
    throw new ServiceError(REWARD_ERRORS.InvalidRewardDefinition, { errors: result.errors });
  }
  return result.value;
}

/**
 * Assigner strings holding a JSON object are read as audience filters.
 */
export function parseAssignerString(value: string): { jobCode?: string[]; groups?: string[] } | null {
  const trimmed = value.trim();
  if (!trimmed.startsWith('{')) return null;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    const result = validateInput(audienceFilterSchema(parsed));
    return result.ok ? result.value : null;
  } catch {
    return null;
  }
}
