/**
 * Feedback Persistence (MongoDB)
 *
 * `user_feedback` holds one document per (giver, target); `user_points`
 * is the points ledger; `feedback_types` the selectable kinds.
 */

import type { Db } from 'mongodb';
import { isDuplicateKeyError, registerIndexes } from 'core-service';
import type { AwardRecord } from '../../types.js';
import type { FeedbackStore, FeedbackType, PointsEntry, TargetResolvers, UserFeedback } from './types.js';

interface KudosDocument {
  kudosId: string;
  receiverUserId: number;
  receiverEmail?: string;
  receiverName?: string;
  isActive: boolean;
}

interface NominationDocument {
  nominationId: string;
  nomineeUserId: number;
  nomineeEmail?: string;
  nomineeName?: string;
  isActive: boolean;
}

export function registerFeedbackIndexes(): void {
  registerIndexes('user_feedback', [
    { key: { giverUserId: 1, targetType: 1, targetId: 1 }, unique: true, name: 'feedback_giver_target_unique' },
    { key: { targetType: 1, targetId: 1, createdAt: -1 } },
    { key: { giverUserId: 1, targetType: 1, createdAt: -1 } },
    { key: { receiverUserId: 1 } },
  ]);
  registerIndexes('user_points', [{ key: { userId: 1, createdAt: -1 } }]);
  registerIndexes('feedback_types', [{ key: { typeName: 1 }, unique: true }]);
  registerIndexes('kudos', [{ key: { kudosId: 1 }, unique: true }]);
  registerIndexes('nominations', [{ key: { nominationId: 1 }, unique: true }]);
}

export function createMongoFeedbackStore(db: Db): FeedbackStore {
  const feedback = db.collection<UserFeedback>('user_feedback');
  const points = db.collection<PointsEntry>('user_points');
  const types = db.collection<FeedbackType>('feedback_types');
  const noId = { projection: { _id: 0 } };

  return {
    async lastFeedbackAt(giverUserId, targetType) {
      const latest = await feedback
        .find({ giverUserId, targetType }, { projection: { _id: 0, createdAt: 1 } })
        .sort({ createdAt: -1 })
        .limit(1)
        .next();
      return latest?.createdAt ?? null;
    },

    async countSince(giverUserId, targetType, since) {
      return feedback.countDocuments({ giverUserId, targetType, createdAt: { $gte: since } });
    },

    async exists(giverUserId, targetType, targetId) {
      return (await feedback.countDocuments({ giverUserId, targetType, targetId }, { limit: 1 })) > 0;
    },

    async insert(entry) {
      try {
        await feedback.insertOne({ ...entry });
        return 'inserted';
      } catch (error) {
        if (isDuplicateKeyError(error)) return 'duplicate';
        throw error;
      }
    },

    async listForTarget(targetType, targetId) {
      return feedback.find({ targetType, targetId }, noId).sort({ createdAt: -1 }).toArray();
    },

    async listGivenBy(userId) {
      return feedback.find({ giverUserId: userId }, noId).toArray();
    },

    async listReceivedBy(userId) {
      return feedback.find({ receiverUserId: userId }, noId).toArray();
    },

    async recordPoints(entries) {
      if (entries.length === 0) return;
      await points.insertMany(entries.map(entry => ({ ...entry })));
    },

    async listTypes() {
      return types.find({}, noId).sort({ typeName: 1 }).toArray();
    },

    async saveTypes(list) {
      if (list.length === 0) return;
      await types.bulkWrite(
        list.map(kind => ({ replaceOne: { filter: { typeName: kind.typeName }, replacement: { ...kind }, upsert: true } }))
      );
    },
  };
}

/**
 * Target lookups: badges in `user_rewards`, plus the `kudos` and
 * `nominations` collections written by the recognition front ends.
 */
export function createMongoTargetResolvers(db: Db): TargetResolvers {
  const awards = db.collection<AwardRecord>('user_rewards');
  const kudos = db.collection<KudosDocument>('kudos');
  const nominations = db.collection<NominationDocument>('nominations');

  return {
    async badge(target) {
      const award = await awards.findOne({ awardId: target.awardId });
      return award
        ? { receiverUserId: award.receiverUser, receiverEmail: award.receiverEmail, receiverName: award.receiverName }
        : null;
    },

    async kudos(target) {
      const doc = await kudos.findOne({ kudosId: target.kudosId, isActive: true });
      return doc
        ? { receiverUserId: doc.receiverUserId, receiverEmail: doc.receiverEmail, receiverName: doc.receiverName }
        : null;
    },

    async nomination(target) {
      const doc = await nominations.findOne({ nominationId: target.nominationId, isActive: true });
      return doc
        ? { receiverUserId: doc.nomineeUserId, receiverEmail: doc.nomineeEmail, receiverName: doc.nomineeName }
        : null;
    },
  };
}
