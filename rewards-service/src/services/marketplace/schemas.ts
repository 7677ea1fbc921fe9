/**
 * Marketplace input schemas (arktype)
 */

import { type } from 'arktype';
import type { PrizeTier } from './types.js';

export const prizeInputSchema = type({
  prizeName: 'string > 0',
  'description?': 'string',
  'shortDescription?': 'string',
  'categoryId?': 'number.integer > 0',
  'tierId?': 'number.integer > 0',
  'pointsCost?': 'number.integer >= 0',
  'monetaryValue?': 'number >= 0',
  'totalQuantity?': 'number.integer >= 0 | null',
  'imageUrl?': 'string',
  'thumbnailUrl?': 'string',
  'maxPerUser?': 'number.integer > 0',
  'cooldownDays?': 'number.integer >= 0',
  'requiresApproval?': 'boolean',
  'isMysteryEligible?': 'boolean',
  'mysteryWeight?': 'number.integer > 0',
  'linkedRewardId?': 'number.integer > 0',
  'fulfillmentType?': "'automatic' | 'manual' | 'external'",
  'fulfillmentInstructions?': 'string',
  'validityDays?': 'number.integer > 0',
  'tags?': 'string[]',
  'attributes?': 'Record<string, unknown>',
  'isActive?': 'boolean',
  'isFeatured?': 'boolean',
});

export type PrizeInput = typeof prizeInputSchema.infer;

export const prizeUpdateSchema = prizeInputSchema.partial();

export type PrizeUpdate = typeof prizeUpdateSchema.infer;

export const awardPrizeInputSchema = type({
  prizeId: 'number.integer > 0',
  userId: 'number.integer',
  userEmail: 'string.email',
  'userEmployeeId?': 'string',
  'source?': "'badge' | 'mystery_box' | 'purchase' | 'manual' | 'campaign' | 'milestone' | 'referral' | 'lottery'",
  'sourceReferenceId?': 'string',
  'sourceReferenceType?': 'string',
  'linkedAwardId?': 'string',
  'awardedByUserId?': 'number.integer',
  'awardedByEmail?': 'string',
  'awardMessage?': 'string',
  'expiresInDays?': 'number.integer > 0',
  'metadata?': 'Record<string, unknown>',
});

export type AwardPrizeInput = typeof awardPrizeInputSchema.infer;

export const redemptionInputSchema = type({
  'fulfillmentMethod?': 'string > 0',
  'shippingAddress?': 'Record<string, unknown>',
  'metadata?': 'Record<string, unknown>',
});

export type RedemptionInput = typeof redemptionInputSchema.infer;

export const redemptionFeedbackSchema = type({
  rating: '1 <= number.integer <= 5',
  'feedback?': 'string',
});

export const prizeTierSchema = type({
  tierId: 'number.integer > 0',
  tierName: 'string',
  tierLevel: 'number.integer > 0',
  dropRate: '0 <= number <= 1',
  'description?': 'string',
  'colorCode?': 'string',
});

export const prizeTierListSchema = prizeTierSchema.array();

/** Cached tier tables are re-validated when read back */
export function reviveTiers(raw: unknown): PrizeTier[] | null {
  const result = prizeTierListSchema(raw);
  return result instanceof type.errors ? null : result;
}
