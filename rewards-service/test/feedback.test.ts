/**
 * Feedback on recognitions
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { FeedbackService, POINTS_FOR_GIVER, POINTS_FOR_RECEIVER } from '../src/index.js';
import type { UserFeedback } from '../src/index.js';
import { createMemoryTargetResolvers, MemoryFeedbackStore } from './helpers/memory-stores.js';

const receiver = { receiverUserId: 1, receiverEmail: 'user1@example.com', receiverName: 'User 1' };
const giver = { userId: 2, email: 'user2@example.com', displayName: 'User 2' };

let clock: Date;
let store: MemoryFeedbackStore;
let service: FeedbackService;

const at = (time: string) => new Date(`2025-03-14T${time}Z`);

beforeEach(() => {
  clock = at('10:00:00');
  store = new MemoryFeedbackStore();
  service = new FeedbackService(
    store,
    createMemoryTargetResolvers({
      badge: { a1: receiver },
      kudos: { k1: receiver, k2: receiver, k3: { receiverUserId: 3 } },
      nomination: { n1: receiver },
    }),
    { clock: () => clock }
  );
});

describe('submitFeedback', () => {
  it('should record feedback and credit both sides', async () => {
    const result = await service.submitFeedback(giver, { type: 'badge', awardId: 'a1' }, {
      rating: 5,
      message: 'Deserved it',
      feedbackType: 'impact',
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.message).toBe('Feedback submitted! You earned 5 points.');
    expect(result.pointsAwarded).toEqual({ giver: POINTS_FOR_GIVER, receiver: POINTS_FOR_RECEIVER });
    expect(result.feedback).toMatchObject({
      targetType: 'badge',
      targetId: 'a1',
      giverUserId: 2,
      giverEmail: 'user2@example.com',
      giverName: 'User 2',
      receiverUserId: 1,
      receiverName: 'User 1',
      feedbackType: 'impact',
      rating: 5,
      message: 'Deserved it',
      pointsGiven: 5,
      pointsReceived: 10,
      createdAt: clock,
    });
    expect(store.points.map(entry => [entry.userId, entry.points, entry.reason])).toEqual([
      [2, 5, 'feedback_given'],
      [1, 10, 'feedback_received'],
    ]);
  });

  it('should accept empty and null fields', async () => {
    const result = await service.submitFeedback(giver, { type: 'nomination', nominationId: 'n1' }, { rating: null, message: null });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.feedback.rating).toBeUndefined();
    expect(result.feedback.message).toBeUndefined();
  });

  it('should cap long messages', async () => {
    const result = await service.submitFeedback(giver, { type: 'kudos', kudosId: 'k1' }, { message: 'x'.repeat(600) });
    expect(result.success && result.feedback.message?.length).toBe(500);
  });

  it('should validate rating and type', async () => {
    expect(await service.submitFeedback(giver, { type: 'kudos', kudosId: 'k1' }, { rating: 0 })).toEqual({
      success: false,
      error: 'Rating must be between 1 and 5',
      code: 'MSRewardsInvalidRating',
    });
    expect(await service.submitFeedback(giver, { type: 'kudos', kudosId: 'k1' }, { rating: 'five' })).toMatchObject({
      success: false,
      code: 'MSRewardsInvalidFeedback',
    });
    expect(await service.submitFeedback(giver, { type: 'kudos', kudosId: 'k1' }, { feedbackType: 'bogus' })).toEqual({
      success: false,
      error: 'Unknown feedback type: bogus',
      code: 'MSRewardsInvalidFeedback',
    });
  });

  it('should reject missing targets and own recognitions', async () => {
    expect(await service.submitFeedback(giver, { type: 'kudos', kudosId: 'missing' })).toEqual({
      success: false,
      error: 'Target kudos/missing not found or inactive',
      code: 'MSRewardsFeedbackTargetNotFound',
    });
    expect(await service.submitFeedback({ userId: 1 }, { type: 'kudos', kudosId: 'k1' })).toEqual({
      success: false,
      error: 'Cannot give feedback on your own recognition',
      code: 'MSRewardsFeedbackOnOwnRecognition',
    });
  });

  it('should enforce the cooldown per target kind', async () => {
    expect((await service.submitFeedback(giver, { type: 'kudos', kudosId: 'k1' })).success).toBe(true);

    clock = at('10:00:30');
    expect(await service.submitFeedback(giver, { type: 'kudos', kudosId: 'k2' })).toEqual({
      success: false,
      error: 'Please wait 1 minute(s) between feedback',
      code: 'MSRewardsFeedbackCooldown',
    });
    expect((await service.submitFeedback(giver, { type: 'badge', awardId: 'a1' })).success).toBe(true);

    clock = at('10:01:00');
    expect((await service.submitFeedback(giver, { type: 'kudos', kudosId: 'k2' })).success).toBe(true);
  });

  it('should refuse a second feedback on the same item', async () => {
    await service.submitFeedback(giver, { type: 'kudos', kudosId: 'k1' });
    clock = at('10:05:00');
    expect(await service.submitFeedback(giver, { type: 'kudos', kudosId: 'k1' })).toEqual({
      success: false,
      error: 'You have already given feedback on this item',
      code: 'MSRewardsFeedbackAlreadySubmitted',
    });
  });

  it('should stop at the daily limit', async () => {
    const seeded = (index: number, createdAt: Date): UserFeedback => ({
      feedbackId: `seed-${index}`,
      targetType: 'kudos',
      targetId: `old-${index}`,
      giverUserId: 2,
      receiverUserId: 1,
      pointsGiven: 5,
      pointsReceived: 10,
      createdAt,
    });
    store.feedback.push(seeded(99, new Date('2025-03-13T23:59:00Z')));
    for (let index = 0; index < 19; index++) {
      store.feedback.push(seeded(index, new Date(at('08:00:00').getTime() + index * 60_000)));
    }

    expect((await service.submitFeedback(giver, { type: 'kudos', kudosId: 'k1' })).success).toBe(true);
    clock = at('10:02:00');
    expect(await service.submitFeedback(giver, { type: 'kudos', kudosId: 'k2' })).toEqual({
      success: false,
      error: 'Daily feedback limit (20) reached',
      code: 'MSRewardsFeedbackDailyLimit',
    });
  });
});

describe('Feedback reporting', () => {
  it('should summarise feedback on a target', async () => {
    await service.submitFeedback(giver, { type: 'badge', awardId: 'a1' }, { rating: 4, feedbackType: 'impact' });
    clock = at('10:10:00');
    await service.submitFeedback({ userId: 3 }, { type: 'badge', awardId: 'a1' }, { rating: 5, feedbackType: 'appreciation' });

    const summary = await service.getFeedbackForTarget({ type: 'badge', awardId: 'a1' });
    expect(summary).toMatchObject({
      targetType: 'badge',
      targetId: 'a1',
      feedbackCount: 2,
      avgRating: 4.5,
      feedbackTypes: ['appreciation', 'impact'],
    });
    expect(summary.feedback.map(entry => entry.giverUserId)).toEqual([3, 2]);
  });

  it('should total points given and received', async () => {
    await service.submitFeedback(giver, { type: 'badge', awardId: 'a1' }, { rating: 3 });
    await service.submitFeedback(giver, { type: 'kudos', kudosId: 'k3' });

    expect(await service.getUserFeedbackStats(2)).toEqual({
      userId: 2,
      feedbackGiven: 2,
      pointsEarnedGiving: 10,
      feedbackReceived: 0,
      pointsEarnedReceiving: 0,
      avgRatingReceived: null,
    });
    expect(await service.getUserFeedbackStats(1)).toMatchObject({ feedbackReceived: 1, pointsEarnedReceiving: 10, avgRatingReceived: 3 });
  });

  it('should seed the default feedback types once', async () => {
    const types = await service.listFeedbackTypes();
    expect(types).toHaveLength(10);
    expect(types[0]).toMatchObject({ typeName: 'appreciation', emoji: '🙏' });

    store.types = store.types.map(kind => ({ ...kind, isActive: kind.typeName !== 'growth' }));
    expect((await service.listFeedbackTypes()).map(kind => kind.typeName)).not.toContain('growth');
  });
});
