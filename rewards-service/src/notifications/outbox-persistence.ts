/**
 * Outbox Persistence (MongoDB `outbox` collection)
 *
 * Claiming moves a message to 'processing' with findOneAndUpdate, so two
 * dispatchers never hold the same message. A message left in 'processing'
 * longer than `staleAfterMs` is claimable again.
 */

import type { Db, Filter } from 'mongodb';
import { registerIndexes } from 'core-service';
import type { OutboxMessage, OutboxStatus } from '../types.js';
import type { OutboxStore } from '../services/reward-engine/types.js';

export function registerOutboxIndexes(): void {
  registerIndexes('outbox', [
    { key: { id: 1 }, unique: true },
    { key: { status: 1, nextAttemptAt: 1 } },
  ]);
}

export function createMongoOutboxStore(db: Db, staleAfterMs = 10 * 60 * 1000): OutboxStore {
  const outbox = db.collection<OutboxMessage>('outbox');

  return {
    async enqueue(message) {
      await outbox.insertOne({ ...message });
    },

    async claimDue(now, limit) {
      const due: Filter<OutboxMessage> = {
        $or: [
          { status: 'pending', nextAttemptAt: { $lte: now } },
          { status: 'processing', claimedAt: { $lte: new Date(now.getTime() - staleAfterMs) } },
        ],
      };
      const claimed: OutboxMessage[] = [];
      while (claimed.length < limit) {
        const message = await outbox.findOneAndUpdate(
          due,
          { $set: { status: 'processing', claimedAt: now } },
          { sort: { nextAttemptAt: 1 }, returnDocument: 'after', projection: { _id: 0 } }
        );
        if (!message) break;
        claimed.push(message);
      }
      return claimed;
    },

    async markSent(id, delivered, at) {
      await outbox.updateOne({ id }, { $set: { status: 'sent', delivered, sentAt: at }, $unset: { lastError: '' } });
    },

    async markRetry(id, update) {
      await outbox.updateOne({ id }, { $set: { status: 'pending', ...update } });
    },

    async markFailed(id, update) {
      await outbox.updateOne({ id }, { $set: { status: 'failed', ...update } });
    },

    async countByStatus() {
      const counts: Record<OutboxStatus, number> = { pending: 0, processing: 0, sent: 0, failed: 0 };
      const rows = await outbox
        .aggregate<{ _id: OutboxStatus; count: number }>([{ $group: { _id: '$status', count: { $sum: 1 } } }])
        .toArray();
      for (const row of rows) {
        counts[row._id] = row.count;
      }
      return counts;
    },
  };
}
