/**
 * Rewards Service Error Codes
 *
 * Complete list of all error codes used by rewards-service, with the HTTP
 * status each maps to when surfaced by an API layer.
 *
 * Usage: Import constants and use directly with ServiceError
 * ```typescript
 * import { ServiceError } from 'core-service';
 * import { REWARD_ERRORS } from './error-codes.js';
 *
 * throw new ServiceError(REWARD_ERRORS.InvalidTimeframe, { timeframe });
 * ```
 *
 * Constants are the single source of truth - array is derived from them
 */
export const REWARD_ERRORS = {
  // Configuration
  InvalidTimeframe: 'MSRewardsInvalidTimeframe',
  UnknownRule: 'MSRewardsUnknownRule',
  InvalidRuleParams: 'MSRewardsInvalidRuleParams',
  InvalidRewardDefinition: 'MSRewardsInvalidRewardDefinition',
  RewardNotFound: 'MSRewardsRewardNotFound',

  // Awarding
  CannotRewardYourself: 'MSRewardsCannotRewardYourself',
  RewardNotEligible: 'MSRewardsRewardNotEligible',
  AlreadyAwarded: 'MSRewardsAlreadyAwarded',
  InvalidAwardPayload: 'MSRewardsInvalidAwardPayload',
  RewardsDatabaseError: 'MSRewardsRewardsDatabaseError',
  AwardCreationFailed: 'MSRewardsAwardCreationFailed',

  // Marketplace
  PrizeNotFound: 'MSRewardsPrizeNotFound',
  PrizeNotActive: 'MSRewardsPrizeNotActive',
  PrizeOutOfStock: 'MSRewardsPrizeOutOfStock',
  PrizeLimitReached: 'MSRewardsPrizeLimitReached',
  PrizeCooldownActive: 'MSRewardsPrizeCooldownActive',
  InvalidPrize: 'MSRewardsInvalidPrize',
  InvalidMarketplaceInput: 'MSRewardsInvalidMarketplaceInput',
  AwardNotFound: 'MSRewardsAwardNotFound',
  AwardNotOwned: 'MSRewardsAwardNotOwned',
  AwardNotRedeemable: 'MSRewardsAwardNotRedeemable',
  AwardExpired: 'MSRewardsAwardExpired',
  RedemptionNotFound: 'MSRewardsRedemptionNotFound',
  InvalidRedemptionTransition: 'MSRewardsInvalidRedemptionTransition',
  TrackingNumberRequired: 'MSRewardsTrackingNumberRequired',
  InvalidRating: 'MSRewardsInvalidRating',
  NoPrizesAvailable: 'MSRewardsNoPrizesAvailable',
  MysteryBoxEventNotFound: 'MSRewardsMysteryBoxEventNotFound',

  // Feedback
  FeedbackOnOwnRecognition: 'MSRewardsFeedbackOnOwnRecognition',
  FeedbackTargetNotFound: 'MSRewardsFeedbackTargetNotFound',
  FeedbackCooldown: 'MSRewardsFeedbackCooldown',
  FeedbackDailyLimit: 'MSRewardsFeedbackDailyLimit',
  FeedbackAlreadySubmitted: 'MSRewardsFeedbackAlreadySubmitted',
  InvalidFeedback: 'MSRewardsInvalidFeedback',

  // Scheduler
  JobNotFound: 'MSRewardsJobNotFound',
} as const;

/**
 * Array derived from constants - no duplication, automatically synced
 * Used for error code registration at startup
 */
export const REWARD_ERROR_CODES: readonly string[] = Object.values(REWARD_ERRORS);

export type RewardErrorCode = typeof REWARD_ERRORS[keyof typeof REWARD_ERRORS];

/**
 * HTTP status per code. Codes not listed here resolve to 500.
 */
export const REWARD_ERROR_STATUS: Readonly<Record<string, number>> = {
  [REWARD_ERRORS.RewardNotFound]: 404,
  [REWARD_ERRORS.CannotRewardYourself]: 400,
  [REWARD_ERRORS.RewardNotEligible]: 400,
  [REWARD_ERRORS.AlreadyAwarded]: 409,
  [REWARD_ERRORS.InvalidAwardPayload]: 400,
  [REWARD_ERRORS.PrizeNotFound]: 404,
  [REWARD_ERRORS.PrizeNotActive]: 400,
  [REWARD_ERRORS.PrizeOutOfStock]: 400,
  [REWARD_ERRORS.PrizeLimitReached]: 400,
  [REWARD_ERRORS.PrizeCooldownActive]: 400,
  [REWARD_ERRORS.InvalidPrize]: 400,
  [REWARD_ERRORS.InvalidMarketplaceInput]: 400,
  [REWARD_ERRORS.AwardNotFound]: 404,
  [REWARD_ERRORS.AwardNotOwned]: 403,
  [REWARD_ERRORS.AwardNotRedeemable]: 400,
  [REWARD_ERRORS.AwardExpired]: 400,
  [REWARD_ERRORS.RedemptionNotFound]: 404,
  [REWARD_ERRORS.InvalidRedemptionTransition]: 400,
  [REWARD_ERRORS.TrackingNumberRequired]: 400,
  [REWARD_ERRORS.InvalidRating]: 400,
  [REWARD_ERRORS.NoPrizesAvailable]: 400,
  [REWARD_ERRORS.MysteryBoxEventNotFound]: 404,
  [REWARD_ERRORS.FeedbackOnOwnRecognition]: 400,
  [REWARD_ERRORS.FeedbackTargetNotFound]: 404,
  [REWARD_ERRORS.FeedbackCooldown]: 429,
  [REWARD_ERRORS.FeedbackDailyLimit]: 429,
  [REWARD_ERRORS.FeedbackAlreadySubmitted]: 409,
  [REWARD_ERRORS.InvalidFeedback]: 400,
  [REWARD_ERRORS.JobNotFound]: 404,
};

/** Business outcome returned (not thrown) by marketplace and feedback operations */
export type Rejection = { success: false; error: string; code: RewardErrorCode };

export function reject(code: RewardErrorCode, error: string): Rejection {
  return { success: false, error, code };
}
