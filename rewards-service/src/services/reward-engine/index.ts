/**
 * Reward Engine Module
 *
 * ┌─────────────────────────────────────────────────────────────────┐
 * │                       RewardEngine (facade)                     │
 * │  load definitions, award, run computed rewards                  │
 * └────────────────────────────┬────────────────────────────────────┘
 *                              │
 * ┌────────────────────────────┴────────────────────────────────────┐
 * │            RewardObject / ComputedReward                        │
 * │  fits -> evaluate -> hasAwarded -> apply -> collectives         │
 * └────────────────────────────┬────────────────────────────────────┘
 *                              │
 * ┌────────────────────────────┴────────────────────────────────────┐
 * │  Rules (registry)        Environment / EvalContext              │
 * └────────────────────────────┬────────────────────────────────────┘
 *                              │
 * ┌────────────────────────────┴────────────────────────────────────┐
 * │  Stores: RewardStore, UserDirectory, ActivityReader, Outbox     │
 * └─────────────────────────────────────────────────────────────────┘
 */

export { RewardEngine } from './engine.js';
export type { RewardEngineDeps, AwardOutcome, AwardOptions } from './engine.js';

export { RewardObject, DEFAULT_REWARD_MESSAGE } from './reward-object.js';
export type { RewardObjectOptions } from './reward-object.js';
export { ComputedReward } from './computed-reward.js';
export type { ComputedRuntime, ComputedRunSummary } from './computed-reward.js';

export { EvalContext, sessionFromUser } from './context.js';
export { Environment, calendarAttributes } from './environment.js';
export type { EnvironmentOptions } from './environment.js';

export { RuleRegistry, ruleRegistry, createRules } from './rule-registry.js';
export { BaseRule, BaseDatasetRule, parseRuleParams } from './base-rule.js';

export { evaluateEnvironment, matchesAttribute } from './availability.js';
export { TIMEFRAMES, isTimeframe, timeframeKey, awardBucket } from './timeframe.js';
export type { Timeframe } from './timeframe.js';
export { parseRewardDefinition, validateAwardRecord } from './schemas.js';

export {
  registerRewardIndexes,
  createMongoRewardStore,
  createMongoUserDirectory,
  createMongoActivityReader,
  insertAwardThenEnqueue,
} from './persistence.js';
export type { MetricEntry, RewardPersistenceOptions } from './persistence.js';

export { isDatasetRule } from './types.js';
export type {
  Rule,
  DatasetRule,
  RuleDeps,
  RuleFactory,
  FailedCondition,
  RewardStore,
  UserDirectory,
  UserCriteria,
  ActivityReader,
  OutboxStore,
  RewardConnections,
} from './types.js';
