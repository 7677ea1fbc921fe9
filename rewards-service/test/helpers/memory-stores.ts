/**
 * In-memory stand-ins for the Mongo-backed stores.
 *
 * Each mirrors the query semantics of its Mongo adapter (unique indexes,
 * compare-and-set updates, half-open date ranges) closely enough for the
 * services under test to behave as they do against the database.
 */

import { addDays } from 'core-service';
import type {
  AwardRecord,
  Collective,
  CollectiveUnlock,
  OutboxMessage,
  OutboxStatus,
  RewardDefinition,
  RewardType,
  RewardUser,
} from '../../src/types.js';
import type {
  ActivityReader,
  InsertOutcome,
  MetricTotal,
  OutboxStore,
  RewardConnections,
  RewardStore,
  UserCriteria,
  UserDirectory,
} from '../../src/services/reward-engine/types.js';
import { insertAwardThenEnqueue } from '../../src/services/reward-engine/persistence.js';
import type {
  AwardStatus,
  MarketplaceStore,
  MysteryBoxEvent,
  Prize,
  PrizeActivity,
  PrizeAward,
  PrizeCategory,
  PrizeFilter,
  PrizeRedemption,
  PrizeTier,
  RedemptionHistoryEntry,
  RedemptionStatus,
} from '../../src/services/marketplace/types.js';
import type {
  FeedbackReceiver,
  FeedbackStore,
  FeedbackTargetType,
  FeedbackType,
  PointsEntry,
  TargetResolvers,
  UserFeedback,
} from '../../src/services/feedback/types.js';

// ═══════════════════════════════════════════════════════════════════
// Reward Engine
// ═══════════════════════════════════════════════════════════════════

export class MemoryRewardStore implements RewardStore {
  readonly definitions = new Map<number, RewardDefinition>();
  readonly awards: AwardRecord[] = [];
  readonly collectives: Collective[] = [];
  readonly unlocks: CollectiveUnlock[] = [];
  /** Thrown by the next insertAward call */
  failNextInsert?: Error;

  constructor(private readonly outbox?: OutboxStore) {}

  async listDefinitions(filter: { enabledOnly?: boolean; rewardType?: RewardType } = {}) {
    return Array.from(this.definitions.values()).filter(
      definition =>
        (!filter.enabledOnly || definition.isEnabled) &&
        (!filter.rewardType || definition.rewardType === filter.rewardType)
    );
  }

  async findDefinition(rewardId: number) {
    return this.definitions.get(rewardId) ?? null;
  }

  async saveDefinition(definition: RewardDefinition) {
    this.definitions.set(definition.rewardId, definition);
  }

  async findAwards(rewardId: number, userId: number) {
    return this.awards
      .filter(award => award.rewardId === rewardId && award.receiverUser === userId)
      .sort((a, b) => b.awardedAt.getTime() - a.awardedAt.getTime());
  }

  async insertAward(award: AwardRecord, notification: OutboxMessage): Promise<InsertOutcome> {
    const failure = this.failNextInsert;
    if (failure) {
      this.failNextInsert = undefined;
      throw failure;
    }
    const duplicate = this.awards.some(
      existing =>
        existing.rewardId === award.rewardId &&
        existing.receiverUser === award.receiverUser &&
        existing.timeframeBucket === award.timeframeBucket
    );
    if (duplicate) return 'duplicate';
    return insertAwardThenEnqueue(
      award,
      async () => {
        this.awards.push({ ...award });
      },
      async () => {
        await this.outbox?.enqueue(notification);
      }
    );
  }

  async findCollectivesForReward(rewardId: number) {
    return this.collectives.filter(collective => collective.rewardIds.includes(rewardId));
  }

  async countDistinctHeld(userId: number, rewardIds: number[]) {
    const held = new Set(
      this.awards.filter(award => award.receiverUser === userId && rewardIds.includes(award.rewardId)).map(award => award.rewardId)
    );
    return held.size;
  }

  async insertCollectiveUnlock(unlock: CollectiveUnlock) {
    if (this.unlocks.some(existing => existing.collectiveId === unlock.collectiveId && existing.userId === unlock.userId)) {
      return false;
    }
    this.unlocks.push({ ...unlock });
    return true;
  }

  async listCollectiveUnlocks(userId: number) {
    return this.unlocks.filter(unlock => unlock.userId === userId);
  }
}

export class MemoryUserDirectory implements UserDirectory {
  constructor(readonly users: RewardUser[] = []) {}

  async findById(userId: number) {
    return this.users.find(user => user.userId === userId) ?? null;
  }

  async findByIds(userIds: number[]) {
    return this.users.filter(user => userIds.includes(user.userId));
  }

  async listActive(criteria: UserCriteria = {}, now: Date = new Date()) {
    return this.users
      .filter(user => user.isActive)
      .filter(user => !criteria.groups?.length || user.groups.some(group => criteria.groups?.includes(group)))
      .filter(user => {
        if (criteria.minTenureDays === undefined) return true;
        return user.startDate !== undefined && user.startDate.getTime() <= addDays(now, -criteria.minTenureDays).getTime();
      })
      .sort((a, b) => a.userId - b.userId);
  }
}

export interface MetricRow {
  userId: number;
  metric: string;
  value: number;
  recordedAt: Date;
}

export class MemoryActivityReader implements ActivityReader {
  constructor(readonly rows: MetricRow[] = []) {}

  private inRange(row: MetricRow, metric: string, from: Date, to: Date): boolean {
    return row.metric === metric && row.recordedAt.getTime() >= from.getTime() && row.recordedAt.getTime() < to.getTime();
  }

  async getMetric(userId: number, metric: string, from: Date, to: Date) {
    return this.rows
      .filter(row => row.userId === userId && this.inRange(row, metric, from, to))
      .reduce((sum, row) => sum + row.value, 0);
  }

  async topPerformers(metric: string, from: Date, to: Date, limit: number): Promise<MetricTotal[]> {
    const totals = new Map<number, number>();
    for (const row of this.rows) {
      if (this.inRange(row, metric, from, to)) {
        totals.set(row.userId, (totals.get(row.userId) ?? 0) + row.value);
      }
    }
    return Array.from(totals, ([userId, value]) => ({ userId, value }))
      .sort((a, b) => b.value - a.value || a.userId - b.userId)
      .slice(0, limit);
  }
}

export class MemoryOutboxStore implements OutboxStore {
  readonly messages: OutboxMessage[] = [];
  /** Thrown by the next enqueue call */
  failNextEnqueue?: Error;

  async enqueue(message: OutboxMessage) {
    const failure = this.failNextEnqueue;
    if (failure) {
      this.failNextEnqueue = undefined;
      throw failure;
    }
    this.messages.push({ ...message, delivered: [...message.delivered] });
  }

  async claimDue(now: Date, limit: number) {
    const due = this.messages
      .filter(message => message.status === 'pending' && message.nextAttemptAt.getTime() <= now.getTime())
      .sort((a, b) => a.nextAttemptAt.getTime() - b.nextAttemptAt.getTime())
      .slice(0, limit);
    for (const message of due) {
      message.status = 'processing';
      message.claimedAt = now;
    }
    return due.map(message => ({ ...message, delivered: [...message.delivered] }));
  }

  private find(id: string): OutboxMessage {
    const message = this.messages.find(candidate => candidate.id === id);
    if (!message) throw new Error(`Outbox message ${id} not found`);
    return message;
  }

  async markSent(id: string, delivered: OutboxMessage['delivered'], at: Date) {
    Object.assign(this.find(id), { status: 'sent', delivered, sentAt: at });
  }

  async markRetry(id: string, update: Pick<OutboxMessage, 'attempts' | 'delivered' | 'nextAttemptAt' | 'lastError'>) {
    Object.assign(this.find(id), { ...update, status: 'pending' });
  }

  async markFailed(id: string, update: Pick<OutboxMessage, 'attempts' | 'delivered' | 'lastError'>) {
    Object.assign(this.find(id), { ...update, status: 'failed' });
  }

  async countByStatus() {
    const counts: Record<OutboxStatus, number> = { pending: 0, processing: 0, sent: 0, failed: 0 };
    for (const message of this.messages) counts[message.status]++;
    return counts;
  }
}

export interface MemoryConnections extends RewardConnections {
  rewards: MemoryRewardStore;
  users: MemoryUserDirectory;
  activity: MemoryActivityReader;
  outbox: MemoryOutboxStore;
}

export function createMemoryConnections(users: RewardUser[] = [], metrics: MetricRow[] = []): MemoryConnections {
  const outbox = new MemoryOutboxStore();
  return {
    rewards: new MemoryRewardStore(outbox),
    users: new MemoryUserDirectory(users),
    activity: new MemoryActivityReader(metrics),
    outbox,
  };
}

// ═══════════════════════════════════════════════════════════════════
// Marketplace
// ═══════════════════════════════════════════════════════════════════

export class MemoryMarketplaceStore implements MarketplaceStore {
  readonly prizes = new Map<number, Prize>();
  readonly categories: PrizeCategory[] = [];
  tiers: PrizeTier[] = [];
  readonly awards = new Map<string, PrizeAward>();
  readonly redemptions = new Map<string, PrizeRedemption>();
  readonly history: RedemptionHistoryEntry[] = [];
  readonly events = new Map<string, MysteryBoxEvent>();
  /** Thrown by the next insertAward call */
  failNextAwardInsert?: Error;
  /** Thrown by the next insertRedemption call */
  failNextRedemptionInsert?: Error;
  /** Thrown by the next appendHistory call */
  failNextHistoryAppend?: Error;
  private sequence = 0;

  async nextPrizeId() {
    this.sequence = Math.max(this.sequence, ...this.prizes.keys()) + 1;
    return this.sequence;
  }

  async listPrizes(filter: Pick<PrizeFilter, 'activeOnly' | 'categoryId' | 'tierId' | 'mysteryEligible' | 'featured'> = {}) {
    return Array.from(this.prizes.values()).filter(
      prize =>
        (!filter.activeOnly || prize.isActive) &&
        (filter.categoryId === undefined || prize.categoryId === filter.categoryId) &&
        (filter.tierId === undefined || prize.tierId === filter.tierId) &&
        (filter.mysteryEligible === undefined || prize.isMysteryEligible === filter.mysteryEligible) &&
        (filter.featured === undefined || prize.isFeatured === filter.featured)
    );
  }

  async findPrize(prizeId: number) {
    const prize = this.prizes.get(prizeId);
    return prize ? { ...prize } : null;
  }

  async insertPrize(prize: Prize) {
    this.prizes.set(prize.prizeId, { ...prize });
  }

  async updatePrize(prizeId: number, patch: Partial<Prize>) {
    const existing = this.prizes.get(prizeId);
    if (!existing) return null;
    const updated = { ...existing, ...patch };
    this.prizes.set(prizeId, updated);
    return { ...updated };
  }

  async listCategories(activeOnly: boolean) {
    return this.categories.filter(category => !activeOnly || category.isActive);
  }

  async listTiers() {
    return this.tiers.map(tier => ({ ...tier }));
  }

  async saveTiers(tiers: PrizeTier[]) {
    this.tiers = tiers.map(tier => ({ ...tier }));
  }

  async reserveUnit(prizeId: number) {
    const prize = this.prizes.get(prizeId);
    if (!prize) return false;
    if (prize.totalQuantity === null) return true;
    if ((prize.availableQuantity ?? 0) - prize.reservedQuantity <= 0) return false;
    prize.availableQuantity = (prize.availableQuantity ?? 0) - 1;
    return true;
  }

  async releaseUnit(prizeId: number) {
    const prize = this.prizes.get(prizeId);
    if (!prize || prize.totalQuantity === null) return;
    prize.availableQuantity = Math.min(prize.totalQuantity, (prize.availableQuantity ?? 0) + 1);
  }

  async insertAward(award: PrizeAward) {
    const failure = this.failNextAwardInsert;
    if (failure) {
      this.failNextAwardInsert = undefined;
      throw failure;
    }
    this.awards.set(award.awardId, { ...award });
  }

  async findAward(awardId: string) {
    const award = this.awards.get(awardId);
    return award ? { ...award } : null;
  }

  async listAwardsForUser(userId: number) {
    return Array.from(this.awards.values())
      .filter(award => award.userId === userId)
      .map(award => ({ ...award }));
  }

  async userPrizeHistory(prizeId: number, userId: number) {
    const awards = Array.from(this.awards.values()).filter(
      award => award.prizeId === prizeId && award.userId === userId && award.status !== 'cancelled'
    );
    const latest = awards.reduce<Date | null>(
      (max, award) => (max === null || award.awardedAt.getTime() > max.getTime() ? award.awardedAt : max),
      null
    );
    return { count: awards.length, lastAwardedAt: latest };
  }

  async transitionAward(awardId: string, from: AwardStatus, patch: Partial<PrizeAward>) {
    const award = this.awards.get(awardId);
    if (!award || award.status !== from) return null;
    const updated = { ...award, ...patch };
    this.awards.set(awardId, updated);
    return { ...updated };
  }

  async expireDue(now: Date) {
    let changed = 0;
    for (const award of this.awards.values()) {
      if (award.status === 'available' && award.expiresAt !== null && award.expiresAt.getTime() < now.getTime()) {
        award.status = 'expired';
        award.statusChangedAt = now;
        changed++;
      }
    }
    return changed;
  }

  async prizeActivity() {
    const activity = new Map<number, PrizeActivity>();
    for (const award of this.awards.values()) {
      const entry = activity.get(award.prizeId) ?? { prizeId: award.prizeId, awardCount: 0, completedRedemptions: 0 };
      entry.awardCount++;
      entry.completedRedemptions += Array.from(this.redemptions.values()).filter(
        redemption => redemption.awardId === award.awardId && redemption.status === 'completed'
      ).length;
      activity.set(award.prizeId, entry);
    }
    return Array.from(activity.values());
  }

  async insertRedemption(redemption: PrizeRedemption) {
    const failure = this.failNextRedemptionInsert;
    if (failure) {
      this.failNextRedemptionInsert = undefined;
      throw failure;
    }
    this.redemptions.set(redemption.redemptionId, { ...redemption });
  }

  async findRedemption(redemptionId: string) {
    const redemption = this.redemptions.get(redemptionId);
    return redemption ? { ...redemption } : null;
  }

  async transitionRedemption(redemptionId: string, from: RedemptionStatus, patch: Partial<PrizeRedemption>) {
    const redemption = this.redemptions.get(redemptionId);
    if (!redemption || redemption.status !== from) return null;
    const updated = { ...redemption, ...patch };
    this.redemptions.set(redemptionId, updated);
    return { ...updated };
  }

  async updateRedemption(redemptionId: string, patch: Partial<PrizeRedemption>) {
    const redemption = this.redemptions.get(redemptionId);
    if (redemption) this.redemptions.set(redemptionId, { ...redemption, ...patch });
  }

  async listRedemptions(range: { from?: Date; to?: Date } = {}) {
    return Array.from(this.redemptions.values())
      .filter(redemption => !range.from || redemption.initiatedAt.getTime() >= range.from.getTime())
      .filter(redemption => !range.to || redemption.initiatedAt.getTime() < range.to.getTime())
      .sort((a, b) => b.initiatedAt.getTime() - a.initiatedAt.getTime());
  }

  async listRedemptionsForAwards(awardIds: string[]) {
    return Array.from(this.redemptions.values()).filter(redemption => awardIds.includes(redemption.awardId));
  }

  async appendHistory(entry: RedemptionHistoryEntry) {
    const failure = this.failNextHistoryAppend;
    if (failure) {
      this.failNextHistoryAppend = undefined;
      throw failure;
    }
    this.history.push({ ...entry });
  }

  async listHistory(redemptionId: string) {
    return this.history
      .filter(entry => entry.redemptionId === redemptionId)
      .sort((a, b) => a.changedAt.getTime() - b.changedAt.getTime());
  }

  async insertEvent(event: MysteryBoxEvent) {
    this.events.set(event.eventId, { ...event });
  }

  async updateEvent(eventId: string, patch: Partial<MysteryBoxEvent>) {
    const event = this.events.get(eventId);
    if (event) this.events.set(eventId, { ...event, ...patch });
  }

  async findEvent(eventId: string) {
    return this.events.get(eventId) ?? null;
  }

  async listEvents(limit: number) {
    return Array.from(this.events.values())
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit);
  }
}

// ═══════════════════════════════════════════════════════════════════
// Feedback
// ═══════════════════════════════════════════════════════════════════

export class MemoryFeedbackStore implements FeedbackStore {
  readonly feedback: UserFeedback[] = [];
  readonly points: PointsEntry[] = [];
  types: FeedbackType[] = [];

  private byGiver(giverUserId: number, targetType: FeedbackTargetType): UserFeedback[] {
    return this.feedback.filter(entry => entry.giverUserId === giverUserId && entry.targetType === targetType);
  }

  async lastFeedbackAt(giverUserId: number, targetType: FeedbackTargetType) {
    return this.byGiver(giverUserId, targetType).reduce<Date | null>(
      (max, entry) => (max === null || entry.createdAt.getTime() > max.getTime() ? entry.createdAt : max),
      null
    );
  }

  async countSince(giverUserId: number, targetType: FeedbackTargetType, since: Date) {
    return this.byGiver(giverUserId, targetType).filter(entry => entry.createdAt.getTime() >= since.getTime()).length;
  }

  async exists(giverUserId: number, targetType: FeedbackTargetType, targetId: string) {
    return this.byGiver(giverUserId, targetType).some(entry => entry.targetId === targetId);
  }

  async insert(feedback: UserFeedback): Promise<'inserted' | 'duplicate'> {
    if (await this.exists(feedback.giverUserId, feedback.targetType, feedback.targetId)) return 'duplicate';
    this.feedback.push({ ...feedback });
    return 'inserted';
  }

  async listForTarget(targetType: FeedbackTargetType, targetId: string) {
    return this.feedback
      .filter(entry => entry.targetType === targetType && entry.targetId === targetId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async listGivenBy(userId: number) {
    return this.feedback.filter(entry => entry.giverUserId === userId);
  }

  async listReceivedBy(userId: number) {
    return this.feedback.filter(entry => entry.receiverUserId === userId);
  }

  async recordPoints(entries: PointsEntry[]) {
    this.points.push(...entries);
  }

  async listTypes() {
    return this.types.map(kind => ({ ...kind }));
  }

  async saveTypes(types: FeedbackType[]) {
    this.types = types.map(kind => ({ ...kind }));
  }
}

/** Receivers keyed by target id, per target kind */
export function createMemoryTargetResolvers(targets: {
  badge?: Record<string, FeedbackReceiver>;
  kudos?: Record<string, FeedbackReceiver>;
  nomination?: Record<string, FeedbackReceiver>;
}): TargetResolvers {
  return {
    badge: async target => targets.badge?.[target.awardId] ?? null,
    kudos: async target => targets.kudos?.[target.kudosId] ?? null,
    nomination: async target => targets.nomination?.[target.nominationId] ?? null,
  };
}
