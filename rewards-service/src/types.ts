/**
 * Rewards Service Types
 *
 * Shared domain types: reward definitions, users, award records,
 * collectives and outbox messages.
 */

// ═══════════════════════════════════════════════════════════════════
// Reward Definitions
// ═══════════════════════════════════════════════════════════════════

export type RewardType = 'manual' | 'computed' | 'collective';

export const NOTIFICATION_KINDS = ['birthday', 'anniversary', 'generic'] as const;
export type NotificationKind = typeof NOTIFICATION_KINDS[number];

export type AttributeValue = string | number | boolean;

/**
 * Environment attribute matcher. Arrays and `{ from, to }` ranges test
 * membership; a scalar tests strict equality.
 */
export type AttributeMatcher = AttributeValue | AttributeValue[] | { from: number; to: number };

export interface AvailabilityRule {
  /** HH:MM or HH:MM:SS, inclusive */
  startTime?: string;
  endTime?: string;
  /** MM-DD or DD/MM in the current year, inclusive */
  startDate?: string;
  endDate?: string;
  matchers?: Record<string, AttributeMatcher>;
}

/** Group / job-code audience filter used by assigner and awardee constraints */
export interface AudienceFilter {
  jobCode?: string[];
  groups?: string[];
}

/** User id, email (or a JSON-encoded AudienceFilter), or an audience filter */
export type AssignerEntry = string | number | AudienceFilter;

export interface RuleSpec {
  type: string;
  params?: Record<string, unknown>;
}

/** Schedule for computed rewards run by the scheduler (defaults to daily 08:00 UTC) */
export interface ComputedJobSpec {
  hour?: number;
  minute?: number;
}

export interface RewardDefinition {
  rewardId: number;
  reward: string;
  description?: string;
  icon?: string;
  emoji?: string;
  points: number;
  rewardType: RewardType;
  rewardCategory?: string;
  multiple: boolean;
  /** hourly | daily | weekly | monthly; anything else is a configuration error */
  timeframe?: string | null;
  cooldownMinutes?: number;
  availabilityRule?: AvailabilityRule;
  assigner?: AssignerEntry[];
  awardee?: AudienceFilter[];
  programs?: string[];
  events?: Array<Record<string, unknown>>;
  conditions?: Record<string, unknown>;
  message?: string;
  notificationKind?: NotificationKind;
  teamsWebhook?: string;
  attributes?: Record<string, unknown>;
  isEnabled: boolean;
  rules?: RuleSpec[];
  job?: ComputedJobSpec;
}

// ═══════════════════════════════════════════════════════════════════
// Users
// ═══════════════════════════════════════════════════════════════════

export interface RewardUser {
  userId: number;
  email: string;
  displayName: string;
  firstName?: string;
  lastName?: string;
  associateId?: string;
  /** YYYY-MM-DD */
  birthday?: string;
  startDate?: Date;
  groups: string[];
  programs: string[];
  jobCode?: string;
  workerType?: string;
  isActive: boolean;
  createdAt?: Date;
}

/** Acting session: the user performing the request (the giver for manual awards) */
export interface SessionInfo {
  userId: number;
  email: string;
  displayName?: string;
  associateId?: string;
  groups: string[];
  programs: string[];
  jobCode?: string;
  extra?: Record<string, unknown>;
}

// ═══════════════════════════════════════════════════════════════════
// Awards
// ═══════════════════════════════════════════════════════════════════

export interface AwardRecord {
  awardId: string;
  rewardId: number;
  reward: string;
  receiverUser: number;
  receiverEmail: string;
  receiverEmployee?: string;
  receiverName: string;
  giverUser?: number;
  giverEmail?: string;
  giverEmployee?: string;
  giverName?: string;
  points: number;
  awardedAt: Date;
  rewardType: RewardType;
  message: string;
  /** Idempotency bucket; unique together with rewardId and receiverUser */
  timeframeBucket: string;
}

export type AwardOverrides = Partial<Omit<AwardRecord, 'awardId' | 'timeframeBucket'>>;

export interface ApplyError {
  message: string;
  error: string;
}

export type ApplyResult =
  | { ok: true; award: AwardRecord }
  | { ok: false; error: ApplyError };

// ═══════════════════════════════════════════════════════════════════
// Collectives
// ═══════════════════════════════════════════════════════════════════

export interface Collective {
  collectiveId: number;
  name: string;
  description?: string;
  rewardIds: number[];
}

export interface CollectiveUnlock {
  collectiveId: number;
  userId: number;
  unlockedAt: Date;
}

// ═══════════════════════════════════════════════════════════════════
// Outbox
// ═══════════════════════════════════════════════════════════════════

export type OutboxStatus = 'pending' | 'processing' | 'sent' | 'failed';
export type DeliveryChannel = 'chat' | 'email';

export interface RewardAwardedPayload {
  awardId: string;
  rewardId: number;
  reward: string;
  icon?: string;
  emoji?: string;
  points: number;
  message: string;
  /** Unrendered reward message, used as the email body */
  rewardMessage?: string;
  receiverUser: number;
  receiverEmail: string;
  receiverName: string;
  giverName?: string;
  awardedAt: Date;
}

export interface OutboxMessage {
  id: string;
  kind: 'reward.awarded';
  payload: RewardAwardedPayload;
  status: OutboxStatus;
  attempts: number;
  delivered: DeliveryChannel[];
  nextAttemptAt: Date;
  createdAt: Date;
  claimedAt?: Date;
  sentAt?: Date;
  lastError?: string;
}
