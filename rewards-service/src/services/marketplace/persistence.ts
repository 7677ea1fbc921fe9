/**
 * Marketplace Persistence (MongoDB)
 *
 * Collections: prize_catalog, prize_categories, prize_tiers, prize_awards,
 * prize_redemptions, redemption_status_history, mystery_box_events and the
 * `counters` sequence used for prize ids.
 *
 * Stock and status changes are single conditional updates, so concurrent
 * awards cannot oversell and a redemption moves out of a status only once.
 */

import type { Db, Filter } from 'mongodb';
import { registerIndexes } from 'core-service';
import type {
  MarketplaceStore,
  MysteryBoxEvent,
  Prize,
  PrizeActivity,
  PrizeAward,
  PrizeCategory,
  PrizeRedemption,
  PrizeTier,
  RedemptionHistoryEntry,
} from './types.js';

interface Counter {
  _id: string;
  seq: number;
}

// ═══════════════════════════════════════════════════════════════════
// Indexes
// ═══════════════════════════════════════════════════════════════════

export function registerMarketplaceIndexes(): void {
  registerIndexes('prize_catalog', [
    { key: { prizeId: 1 }, unique: true },
    { key: { isActive: 1, categoryId: 1 } },
    { key: { isMysteryEligible: 1, tierId: 1 } },
  ]);
  registerIndexes('prize_categories', [{ key: { categoryId: 1 }, unique: true }]);
  registerIndexes('prize_tiers', [{ key: { tierId: 1 }, unique: true }]);
  registerIndexes('prize_awards', [
    { key: { awardId: 1 }, unique: true },
    { key: { userId: 1, awardedAt: -1 } },
    { key: { prizeId: 1, userId: 1 } },
    { key: { status: 1, expiresAt: 1 } },
  ]);
  registerIndexes('prize_redemptions', [
    { key: { redemptionId: 1 }, unique: true },
    { key: { redemptionCode: 1 }, unique: true },
    { key: { awardId: 1 } },
    { key: { initiatedAt: -1 } },
  ]);
  registerIndexes('redemption_status_history', [{ key: { redemptionId: 1, changedAt: 1 } }]);
  registerIndexes('mystery_box_events', [{ key: { eventId: 1 }, unique: true }, { key: { createdAt: -1 } }]);
}

// ═══════════════════════════════════════════════════════════════════
// Store
// ═══════════════════════════════════════════════════════════════════

export function createMongoMarketplaceStore(db: Db): MarketplaceStore {
  const prizes = db.collection<Prize>('prize_catalog');
  const categories = db.collection<PrizeCategory>('prize_categories');
  const tiers = db.collection<PrizeTier>('prize_tiers');
  const awards = db.collection<PrizeAward>('prize_awards');
  const redemptions = db.collection<PrizeRedemption>('prize_redemptions');
  const history = db.collection<RedemptionHistoryEntry>('redemption_status_history');
  const events = db.collection<MysteryBoxEvent>('mystery_box_events');
  const counters = db.collection<Counter>('counters');

  const noId = { projection: { _id: 0 } };

  return {
    // ═══════════════════════════════════════════════════════════════════
    // Catalog
    // ═══════════════════════════════════════════════════════════════════

    async nextPrizeId() {
      const counter = await counters.findOneAndUpdate(
        { _id: 'prize_catalog' },
        { $inc: { seq: 1 } },
        { upsert: true, returnDocument: 'after' }
      );
      return counter?.seq ?? 1;
    },

    async listPrizes(filter = {}) {
      const query: Filter<Prize> = { deletedAt: { $exists: false } };
      if (filter.activeOnly) query.isActive = true;
      if (filter.categoryId !== undefined) query.categoryId = filter.categoryId;
      if (filter.tierId !== undefined) query.tierId = filter.tierId;
      if (filter.mysteryEligible !== undefined) query.isMysteryEligible = filter.mysteryEligible;
      if (filter.featured !== undefined) query.isFeatured = filter.featured;
      return prizes.find(query, noId).sort({ isFeatured: -1, prizeId: 1 }).toArray();
    },

    async findPrize(prizeId) {
      return prizes.findOne({ prizeId }, noId);
    },

    async insertPrize(prize) {
      await prizes.insertOne({ ...prize });
    },

    async updatePrize(prizeId, patch) {
      return prizes.findOneAndUpdate({ prizeId }, { $set: patch }, { returnDocument: 'after', ...noId });
    },

    async listCategories(activeOnly) {
      return categories.find(activeOnly ? { isActive: true } : {}, noId).sort({ displayOrder: 1 }).toArray();
    },

    async listTiers() {
      return tiers.find({}, noId).sort({ tierLevel: 1 }).toArray();
    },

    async saveTiers(list) {
      if (list.length === 0) return;
      await tiers.bulkWrite(
        list.map(tier => ({
          replaceOne: { filter: { tierId: tier.tierId }, replacement: { ...tier }, upsert: true },
        }))
      );
    },

    async reserveUnit(prizeId) {
      // Pipeline update: availableQuantity is nullable, which $inc's typing rejects
      const taken = await prizes.updateOne(
        {
          prizeId,
          totalQuantity: { $ne: null },
          $expr: { $gt: [{ $subtract: ['$availableQuantity', '$reservedQuantity'] }, 0] },
        },
        [{ $set: { availableQuantity: { $subtract: ['$availableQuantity', 1] } } }]
      );
      if (taken.modifiedCount === 1) return true;

      const prize = await prizes.findOne({ prizeId }, { projection: { _id: 0, totalQuantity: 1 } });
      return prize !== null && prize.totalQuantity === null;
    },

    async releaseUnit(prizeId) {
      await prizes.updateOne({ prizeId, totalQuantity: { $ne: null } }, [
        { $set: { availableQuantity: { $min: ['$totalQuantity', { $add: ['$availableQuantity', 1] }] } } },
      ]);
    },

    // ═══════════════════════════════════════════════════════════════════
    // Awards
    // ═══════════════════════════════════════════════════════════════════

    async insertAward(award) {
      await awards.insertOne({ ...award });
    },

    async findAward(awardId) {
      return awards.findOne({ awardId }, noId);
    },

    async listAwardsForUser(userId) {
      return awards.find({ userId }, noId).sort({ awardedAt: -1 }).toArray();
    },

    async userPrizeHistory(prizeId, userId) {
      const query: Filter<PrizeAward> = { prizeId, userId, status: { $ne: 'cancelled' } };
      const [count, latest] = await Promise.all([
        awards.countDocuments(query),
        awards.find(query, { projection: { _id: 0, awardedAt: 1 } }).sort({ awardedAt: -1 }).limit(1).next(),
      ]);
      return { count, lastAwardedAt: latest?.awardedAt ?? null };
    },

    async transitionAward(awardId, from, patch) {
      return awards.findOneAndUpdate(
        { awardId, status: from },
        { $set: patch },
        { returnDocument: 'after', ...noId }
      );
    },

    async expireDue(now) {
      const result = await awards.updateMany(
        { status: 'available', expiresAt: { $ne: null, $lt: now } },
        { $set: { status: 'expired', statusChangedAt: now } }
      );
      return result.modifiedCount;
    },

    async prizeActivity() {
      return awards
        .aggregate<PrizeActivity>([
          {
            $lookup: {
              from: 'prize_redemptions',
              localField: 'awardId',
              foreignField: 'awardId',
              as: 'redemptions',
            },
          },
          {
            $group: {
              _id: '$prizeId',
              awardCount: { $sum: 1 },
              completedRedemptions: {
                $sum: {
                  $size: {
                    $filter: { input: '$redemptions', as: 'r', cond: { $eq: ['$$r.status', 'completed'] } },
                  },
                },
              },
            },
          },
          { $project: { _id: 0, prizeId: '$_id', awardCount: 1, completedRedemptions: 1 } },
        ])
        .toArray();
    },

    // ═══════════════════════════════════════════════════════════════════
    // Redemptions
    // ═══════════════════════════════════════════════════════════════════

    async insertRedemption(redemption) {
      await redemptions.insertOne({ ...redemption });
    },

    async findRedemption(redemptionId) {
      return redemptions.findOne({ redemptionId }, noId);
    },

    async transitionRedemption(redemptionId, from, patch) {
      return redemptions.findOneAndUpdate(
        { redemptionId, status: from },
        { $set: patch },
        { returnDocument: 'after', ...noId }
      );
    },

    async updateRedemption(redemptionId, patch) {
      await redemptions.updateOne({ redemptionId }, { $set: patch });
    },

    async listRedemptions(range = {}) {
      const query: Filter<PrizeRedemption> = {};
      if (range.from || range.to) {
        query.initiatedAt = {
          ...(range.from ? { $gte: range.from } : {}),
          ...(range.to ? { $lt: range.to } : {}),
        };
      }
      return redemptions.find(query, noId).sort({ initiatedAt: -1 }).toArray();
    },

    async listRedemptionsForAwards(awardIds) {
      if (awardIds.length === 0) return [];
      return redemptions.find({ awardId: { $in: awardIds } }, noId).toArray();
    },

    async appendHistory(entry) {
      await history.insertOne({ ...entry });
    },

    async listHistory(redemptionId) {
      return history.find({ redemptionId }, noId).sort({ changedAt: 1 }).toArray();
    },

    // ═══════════════════════════════════════════════════════════════════
    // Mystery Box Events
    // ═══════════════════════════════════════════════════════════════════

    async insertEvent(event) {
      await events.insertOne({ ...event });
    },

    async updateEvent(eventId, patch) {
      await events.updateOne({ eventId }, { $set: patch });
    },

    async findEvent(eventId) {
      return events.findOne({ eventId }, noId);
    },

    async listEvents(limit) {
      return events.find({}, noId).sort({ createdAt: -1 }).limit(limit).toArray();
    },
  };
}
