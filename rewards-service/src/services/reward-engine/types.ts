/**
 * Reward Engine Types
 *
 * Rule contracts and the store interfaces the engine reads and writes through.
 */

import type {
  RewardDefinition,
  RewardUser,
  AwardRecord,
  Collective,
  CollectiveUnlock,
  OutboxMessage,
} from '../../types.js';
import type { EvalContext } from './context.js';
import type { Environment } from './environment.js';
import type { RandomSource } from '../../random.js';

// ═══════════════════════════════════════════════════════════════════
// Rules
// ═══════════════════════════════════════════════════════════════════

/**
 * Eligibility rule. `fits` is the cheap synchronous gate; `evaluate` may
 * read stores and must not write.
 */
export interface Rule {
  readonly name: string;
  fits(ctx: EvalContext, env: Environment): boolean;
  evaluate(ctx: EvalContext, env: Environment): Promise<boolean>;
}

/**
 * Rule that can produce its own candidate set for computed (scheduled) rewards.
 */
export interface DatasetRule extends Rule {
  fitsComputed(env: Environment): boolean;
  evaluateDataset(env: Environment): Promise<EvalContext[]>;
}

export function isDatasetRule(rule: Rule): rule is DatasetRule {
  return 'evaluateDataset' in rule && 'fitsComputed' in rule;
}

export interface RuleDeps {
  random: RandomSource;
  /** Owning reward id, for rules that look at the reward's own history */
  rewardId: number;
}

export type RuleFactory = (params: Record<string, unknown>, deps: RuleDeps) => Rule;

export type FitCheck = 'environment' | 'programs' | 'context' | 'assigner' | 'rules';

export type FailedCondition =
  | { check: FitCheck }
  | { check: 'rule'; rule: string; error?: string }
  | { check: 'awardee' };

// ═══════════════════════════════════════════════════════════════════
// Stores
// ═══════════════════════════════════════════════════════════════════

export type InsertOutcome = 'inserted' | 'duplicate';

export interface RewardStore {
  listDefinitions(filter?: { enabledOnly?: boolean; rewardType?: RewardDefinition['rewardType'] }): Promise<RewardDefinition[]>;
  findDefinition(rewardId: number): Promise<RewardDefinition | null>;
  saveDefinition(definition: RewardDefinition): Promise<void>;
  /** Prior awards of a reward to a user, newest first */
  findAwards(rewardId: number, userId: number): Promise<AwardRecord[]>;
  /**
   * Insert the award and its notification message as one unit of work.
   * Returns 'duplicate' when (rewardId, receiverUser, timeframeBucket) already exists.
   */
  insertAward(award: AwardRecord, notification: OutboxMessage): Promise<InsertOutcome>;
  findCollectivesForReward(rewardId: number): Promise<Collective[]>;
  /** Distinct reward ids from `rewardIds` the user holds */
  countDistinctHeld(userId: number, rewardIds: number[]): Promise<number>;
  /** false when the unlock already existed */
  insertCollectiveUnlock(unlock: CollectiveUnlock): Promise<boolean>;
  listCollectiveUnlocks(userId: number): Promise<CollectiveUnlock[]>;
}

export interface UserCriteria {
  minTenureDays?: number;
  groups?: string[];
}

export interface UserDirectory {
  findById(userId: number): Promise<RewardUser | null>;
  findByIds(userIds: number[]): Promise<RewardUser[]>;
  listActive(criteria?: UserCriteria, now?: Date): Promise<RewardUser[]>;
}

export interface MetricTotal {
  userId: number;
  value: number;
}

/** Read-only view over recorded user metrics (sales, attendance, achievements) */
export interface ActivityReader {
  getMetric(userId: number, metric: string, from: Date, to: Date): Promise<number>;
  topPerformers(metric: string, from: Date, to: Date, limit: number): Promise<MetricTotal[]>;
}

export interface OutboxStore {
  enqueue(message: OutboxMessage): Promise<void>;
  /** Claim up to `limit` due pending messages, moving them to 'processing' */
  claimDue(now: Date, limit: number): Promise<OutboxMessage[]>;
  markSent(id: string, delivered: OutboxMessage['delivered'], at: Date): Promise<void>;
  markRetry(id: string, update: Pick<OutboxMessage, 'attempts' | 'delivered' | 'nextAttemptAt' | 'lastError'>): Promise<void>;
  markFailed(id: string, update: Pick<OutboxMessage, 'attempts' | 'delivered' | 'lastError'>): Promise<void>;
  countByStatus(): Promise<Record<OutboxMessage['status'], number>>;
}

/** Connection bundle carried by an Environment */
export interface RewardConnections {
  rewards: RewardStore;
  users: UserDirectory;
  activity: ActivityReader;
  outbox: OutboxStore;
}
