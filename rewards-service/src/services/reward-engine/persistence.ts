/**
 * Persistence Layer for the Reward Engine
 *
 * MongoDB-backed stores behind the engine's interfaces:
 * - reward definitions (`rewards`) and awards (`user_rewards`)
 * - collectives (`collectives`, `collectives_unlocked`)
 * - the user directory (`users`) and recorded metrics (`user_metrics`)
 *
 * Award uniqueness is enforced by the (rewardId, receiverUser, timeframeBucket)
 * index; a duplicate key on insert is reported as 'duplicate'.
 */

import type { ClientSession, Db, Filter, MongoClient } from 'mongodb';
import {
  insertIgnoringDuplicate,
  isDuplicateKeyError,
  logger,
  registerIndexes,
  withSession,
  getErrorMessage,
  addDays,
} from 'core-service';
import type {
  AwardRecord,
  Collective,
  CollectiveUnlock,
  OutboxMessage,
  RewardDefinition,
  RewardUser,
} from '../../types.js';
import { parseRewardDefinition } from './schemas.js';
import type { ActivityReader, InsertOutcome, MetricTotal, RewardStore, UserCriteria, UserDirectory } from './types.js';

// ═══════════════════════════════════════════════════════════════════
// Indexes
// ═══════════════════════════════════════════════════════════════════

export function registerRewardIndexes(): void {
  registerIndexes('rewards', [{ key: { rewardId: 1 }, unique: true }]);
  registerIndexes('user_rewards', [
    { key: { rewardId: 1, receiverUser: 1, timeframeBucket: 1 }, unique: true, name: 'award_bucket_unique' },
    { key: { receiverUser: 1, awardedAt: -1 } },
  ]);
  registerIndexes('collectives', [{ key: { rewardIds: 1 } }]);
  registerIndexes('collectives_unlocked', [{ key: { collectiveId: 1, userId: 1 }, unique: true }]);
  registerIndexes('users', [{ key: { userId: 1 }, unique: true }, { key: { isActive: 1 } }]);
  registerIndexes('user_metrics', [{ key: { metric: 1, recordedAt: 1, userId: 1 } }]);
}

/** One recorded metric value (sales amount, attendance day, achievement count) */
export interface MetricEntry {
  userId: number;
  metric: string;
  value: number;
  recordedAt: Date;
}

// ═══════════════════════════════════════════════════════════════════
// Reward Store
// ═══════════════════════════════════════════════════════════════════

export interface RewardPersistenceOptions {
  /** Client for sessions; award and outbox message share a transaction when `transactions` is set */
  client?: MongoClient;
  transactions?: boolean;
}

/**
 * Insert an award, then queue its notification, without a transaction.
 * Once the award is stored a failed enqueue is logged and the outcome is
 * still 'inserted'; only the notification is lost.
 */
export async function insertAwardThenEnqueue(
  award: Pick<AwardRecord, 'awardId' | 'rewardId' | 'receiverUser'>,
  insert: () => Promise<void>,
  enqueue: () => Promise<void>
): Promise<InsertOutcome> {
  try {
    await insert();
  } catch (error) {
    if (isDuplicateKeyError(error)) return 'duplicate';
    throw error;
  }

  try {
    await enqueue();
  } catch (error) {
    logger.error('Failed to enqueue award notification', {
      awardId: award.awardId,
      rewardId: award.rewardId,
      userId: award.receiverUser,
      error: getErrorMessage(error),
    });
  }
  return 'inserted';
}

export function createMongoRewardStore(db: Db, options: RewardPersistenceOptions = {}): RewardStore {
  const definitions = db.collection<RewardDefinition>('rewards');
  const awards = db.collection<AwardRecord>('user_rewards');
  const outbox = db.collection<OutboxMessage>('outbox');
  const collectives = db.collection<Collective>('collectives');
  const unlocked = db.collection<CollectiveUnlock>('collectives_unlocked');

  const insertBoth = async (award: AwardRecord, notification: OutboxMessage, session: ClientSession) => {
    await awards.insertOne({ ...award }, { session });
    await outbox.insertOne({ ...notification }, { session });
  };

  return {
    async listDefinitions(filter = {}) {
      const query: Filter<RewardDefinition> = {};
      if (filter.enabledOnly) query.isEnabled = true;
      if (filter.rewardType) query.rewardType = filter.rewardType;

      const docs = await definitions.find(query, { projection: { _id: 0 } }).sort({ rewardId: 1 }).toArray();
      const valid: RewardDefinition[] = [];
      for (const doc of docs) {
        try {
          valid.push(parseRewardDefinition(doc));
        } catch (error) {
          logger.error('Skipping invalid reward definition', { rewardId: doc.rewardId, error: getErrorMessage(error) });
        }
      }
      return valid;
    },

    async findDefinition(rewardId) {
      const doc = await definitions.findOne({ rewardId }, { projection: { _id: 0 } });
      return doc ? parseRewardDefinition(doc) : null;
    },

    async saveDefinition(definition) {
      const valid = parseRewardDefinition(definition);
      await definitions.replaceOne({ rewardId: valid.rewardId }, valid, { upsert: true });
    },

    async findAwards(rewardId, userId) {
      return awards
        .find({ rewardId, receiverUser: userId }, { projection: { _id: 0 } })
        .sort({ awardedAt: -1 })
        .toArray();
    },

    async insertAward(award, notification): Promise<InsertOutcome> {
      const { client } = options;
      if (!client || !options.transactions) {
        return insertAwardThenEnqueue(
          award,
          async () => {
            await awards.insertOne({ ...award });
          },
          async () => {
            await outbox.insertOne({ ...notification });
          }
        );
      }
      try {
        await withSession(client, { transaction: true }, session => insertBoth(award, notification, session));
        return 'inserted';
      } catch (error) {
        if (isDuplicateKeyError(error)) return 'duplicate';
        throw error;
      }
    },

    async findCollectivesForReward(rewardId) {
      return collectives.find({ rewardIds: rewardId }, { projection: { _id: 0 } }).toArray();
    },

    async countDistinctHeld(userId, rewardIds) {
      const held = await awards.distinct('rewardId', { receiverUser: userId, rewardId: { $in: rewardIds } });
      return held.length;
    },

    async insertCollectiveUnlock(unlock) {
      return insertIgnoringDuplicate(unlocked, { ...unlock });
    },

    async listCollectiveUnlocks(userId) {
      return unlocked.find({ userId }, { projection: { _id: 0 } }).sort({ unlockedAt: -1 }).toArray();
    },
  };
}

// ═══════════════════════════════════════════════════════════════════
// User Directory
// ═══════════════════════════════════════════════════════════════════

export function createMongoUserDirectory(db: Db): UserDirectory {
  const users = db.collection<RewardUser>('users');

  return {
    async findById(userId) {
      return users.findOne({ userId }, { projection: { _id: 0 } });
    },

    async findByIds(userIds) {
      if (userIds.length === 0) return [];
      return users.find({ userId: { $in: userIds } }, { projection: { _id: 0 } }).toArray();
    },

    async listActive(criteria: UserCriteria = {}, now: Date = new Date()) {
      const query: Filter<RewardUser> = { isActive: true };
      if (criteria.groups?.length) {
        query.groups = { $in: criteria.groups };
      }
      if (criteria.minTenureDays !== undefined) {
        query.startDate = { $lte: addDays(now, -criteria.minTenureDays) };
      }
      return users.find(query, { projection: { _id: 0 } }).sort({ userId: 1 }).toArray();
    },
  };
}

// ═══════════════════════════════════════════════════════════════════
// Activity
// ═══════════════════════════════════════════════════════════════════

export function createMongoActivityReader(db: Db): ActivityReader {
  const metrics = db.collection<MetricEntry>('user_metrics');

  return {
    async getMetric(userId, metric, from, to) {
      const [row] = await metrics
        .aggregate<{ total: number }>([
          { $match: { userId, metric, recordedAt: { $gte: from, $lt: to } } },
          { $group: { _id: null, total: { $sum: '$value' } } },
        ])
        .toArray();
      return row?.total ?? 0;
    },

    async topPerformers(metric, from, to, limit): Promise<MetricTotal[]> {
      return metrics
        .aggregate<MetricTotal>([
          { $match: { metric, recordedAt: { $gte: from, $lt: to } } },
          { $group: { _id: '$userId', value: { $sum: '$value' } } },
          { $sort: { value: -1, _id: 1 } },
          { $limit: limit },
          { $project: { _id: 0, userId: '$_id', value: 1 } },
        ])
        .toArray();
    },
  };
}
