/**
 * Feedback Service
 *
 * Users leave feedback on someone else's recognition. Checks, in order:
 * input, target exists, not self, cooldown, daily limit, duplicate.
 * Each accepted feedback earns the giver and the receiver points.
 */

import { type } from 'arktype';
import { createChildLogger, generateId, startOfUtcDay, validateInput } from 'core-service';
import { REWARD_ERRORS, reject } from '../../error-codes.js';
import type {
  FeedbackGiver,
  FeedbackReceiver,
  FeedbackStore,
  FeedbackSummary,
  FeedbackTarget,
  FeedbackType,
  SubmitFeedbackResult,
  TargetResolvers,
  UserFeedback,
  UserFeedbackStats,
} from './types.js';

const log = createChildLogger({ service: 'rewards-service', metadata: { component: 'feedback' } });

export const POINTS_FOR_GIVER = 5;
export const POINTS_FOR_RECEIVER = 10;
export const MAX_FEEDBACK_PER_DAY = 20;
export const COOLDOWN_MINUTES = 1;
export const MAX_MESSAGE_LENGTH = 500;

export const DEFAULT_FEEDBACK_TYPES: readonly FeedbackType[] = [
  { typeName: 'appreciation', displayName: 'Appreciation', description: 'Grateful for this recognition', emoji: '🙏', category: 'gratitude', isActive: true },
  { typeName: 'impact', displayName: 'Great Impact', description: 'This had significant positive impact', emoji: '💥', category: 'performance', isActive: true },
  { typeName: 'inspiring', displayName: 'Inspiring', description: 'This inspired me or others', emoji: '✨', category: 'motivation', isActive: true },
  { typeName: 'well_deserved', displayName: 'Well Deserved', description: 'Completely earned this recognition', emoji: '🏆', category: 'validation', isActive: true },
  { typeName: 'teamwork', displayName: 'Team Player', description: 'Exemplifies great teamwork', emoji: '🤝', category: 'collaboration', isActive: true },
  { typeName: 'growth', displayName: 'Shows Growth', description: 'Demonstrates personal/professional growth', emoji: '📈', category: 'development', isActive: true },
  { typeName: 'leadership', displayName: 'Leadership', description: 'Shows excellent leadership qualities', emoji: '👑', category: 'leadership', isActive: true },
  { typeName: 'innovation', displayName: 'Innovative', description: 'Creative and innovative approach', emoji: '💡', category: 'innovation', isActive: true },
  { typeName: 'dedication', displayName: 'Dedication', description: 'Shows remarkable dedication', emoji: '💪', category: 'commitment', isActive: true },
  { typeName: 'excellence', displayName: 'Excellence', description: 'Exemplifies excellence in work', emoji: '⭐', category: 'quality', isActive: true },
];

const feedbackInputSchema = type({
  'rating?': 'number.integer | null',
  'message?': 'string | null',
  'feedbackType?': 'string | null',
});

export function targetId(target: FeedbackTarget): string {
  switch (target.type) {
    case 'badge':
      return target.awardId;
    case 'kudos':
      return target.kudosId;
    case 'nomination':
      return target.nominationId;
  }
}

export function resolveTarget(resolvers: TargetResolvers, target: FeedbackTarget): Promise<FeedbackReceiver | null> {
  switch (target.type) {
    case 'badge':
      return resolvers.badge(target);
    case 'kudos':
      return resolvers.kudos(target);
    case 'nomination':
      return resolvers.nomination(target);
  }
}

function average(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export class FeedbackService {
  private readonly clock: () => Date;

  constructor(
    private readonly store: FeedbackStore,
    private readonly resolvers: TargetResolvers,
    options: { clock?: () => Date } = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async submitFeedback(giver: FeedbackGiver, target: FeedbackTarget, input: unknown = {}): Promise<SubmitFeedbackResult> {
    const validation = validateInput(feedbackInputSchema(input));
    if (!validation.ok) {
      return reject(REWARD_ERRORS.InvalidFeedback, validation.errors.join('; '));
    }
    const { rating, message, feedbackType } = validation.value;
    if (rating !== undefined && rating !== null && (rating < 1 || rating > 5)) {
      return reject(REWARD_ERRORS.InvalidRating, 'Rating must be between 1 and 5');
    }
    if (feedbackType) {
      const types = await this.listFeedbackTypes();
      if (!types.some(candidate => candidate.typeName === feedbackType)) {
        return reject(REWARD_ERRORS.InvalidFeedback, `Unknown feedback type: ${feedbackType}`);
      }
    }

    const id = targetId(target);
    const receiver = await resolveTarget(this.resolvers, target);
    if (!receiver) {
      return reject(REWARD_ERRORS.FeedbackTargetNotFound, `Target ${target.type}/${id} not found or inactive`);
    }
    if (receiver.receiverUserId === giver.userId) {
      return reject(REWARD_ERRORS.FeedbackOnOwnRecognition, 'Cannot give feedback on your own recognition');
    }

    const now = this.clock();
    const limited = await this.checkRateLimit(giver.userId, target.type, now);
    if (limited) return limited;

    if (await this.store.exists(giver.userId, target.type, id)) {
      return reject(REWARD_ERRORS.FeedbackAlreadySubmitted, 'You have already given feedback on this item');
    }

    const feedback: UserFeedback = {
      feedbackId: generateId(),
      targetType: target.type,
      targetId: id,
      giverUserId: giver.userId,
      giverEmail: giver.email,
      giverName: giver.displayName,
      receiverUserId: receiver.receiverUserId,
      receiverEmail: receiver.receiverEmail,
      receiverName: receiver.receiverName,
      feedbackType: feedbackType ?? undefined,
      rating: rating ?? undefined,
      message: message ? message.slice(0, MAX_MESSAGE_LENGTH) : undefined,
      pointsGiven: POINTS_FOR_GIVER,
      pointsReceived: POINTS_FOR_RECEIVER,
      createdAt: now,
    };

    if ((await this.store.insert(feedback)) === 'duplicate') {
      return reject(REWARD_ERRORS.FeedbackAlreadySubmitted, 'You have already given feedback on this item');
    }
    await this.store.recordPoints([
      { userId: giver.userId, points: POINTS_FOR_GIVER, reason: 'feedback_given', feedbackId: feedback.feedbackId, createdAt: now },
      {
        userId: receiver.receiverUserId,
        points: POINTS_FOR_RECEIVER,
        reason: 'feedback_received',
        feedbackId: feedback.feedbackId,
        createdAt: now,
      },
    ]);

    log.info('Feedback submitted', { feedbackId: feedback.feedbackId, target: `${target.type}/${id}`, giver: giver.userId });
    return {
      success: true,
      feedback,
      pointsAwarded: { giver: POINTS_FOR_GIVER, receiver: POINTS_FOR_RECEIVER },
      message: `Feedback submitted! You earned ${POINTS_FOR_GIVER} points.`,
    };
  }

  private async checkRateLimit(giverUserId: number, targetType: FeedbackTarget['type'], now: Date) {
    const last = await this.store.lastFeedbackAt(giverUserId, targetType);
    if (!last) return null;

    if (now.getTime() - last.getTime() < COOLDOWN_MINUTES * 60_000) {
      return reject(REWARD_ERRORS.FeedbackCooldown, `Please wait ${COOLDOWN_MINUTES} minute(s) between feedback`);
    }
    const today = await this.store.countSince(giverUserId, targetType, startOfUtcDay(now));
    if (today >= MAX_FEEDBACK_PER_DAY) {
      return reject(REWARD_ERRORS.FeedbackDailyLimit, `Daily feedback limit (${MAX_FEEDBACK_PER_DAY}) reached`);
    }
    return null;
  }

  async getFeedbackForTarget(target: FeedbackTarget): Promise<FeedbackSummary> {
    const id = targetId(target);
    const feedback = await this.store.listForTarget(target.type, id);
    const ratings = feedback.map(entry => entry.rating).filter((rating): rating is number => rating !== undefined);
    const kinds = new Set<string>();
    for (const entry of feedback) {
      if (entry.feedbackType) kinds.add(entry.feedbackType);
    }
    return {
      targetType: target.type,
      targetId: id,
      feedbackCount: feedback.length,
      avgRating: average(ratings),
      feedbackTypes: Array.from(kinds).sort(),
      feedback,
    };
  }

  async getUserFeedbackStats(userId: number): Promise<UserFeedbackStats> {
    const [given, received] = await Promise.all([this.store.listGivenBy(userId), this.store.listReceivedBy(userId)]);
    return {
      userId,
      feedbackGiven: given.length,
      pointsEarnedGiving: given.reduce((sum, entry) => sum + entry.pointsGiven, 0),
      feedbackReceived: received.length,
      pointsEarnedReceiving: received.reduce((sum, entry) => sum + entry.pointsReceived, 0),
      avgRatingReceived: average(
        received.map(entry => entry.rating).filter((rating): rating is number => rating !== undefined)
      ),
    };
  }

  /** Active feedback types; the defaults are stored on first use */
  async listFeedbackTypes(): Promise<FeedbackType[]> {
    const stored = await this.store.listTypes();
    if (stored.length > 0) return stored.filter(kind => kind.isActive);

    const seeded = DEFAULT_FEEDBACK_TYPES.map(kind => ({ ...kind }));
    await this.store.saveTypes(seeded);
    return seeded;
  }
}
