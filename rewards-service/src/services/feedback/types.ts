/**
 * Feedback Types
 *
 * Feedback is left on a recognition (a badge award, a kudos or a
 * nomination). Each target kind resolves its receiver through its own resolver.
 */

import type { Rejection } from '../../error-codes.js';

export type FeedbackTarget =
  | { type: 'badge'; awardId: string }
  | { type: 'kudos'; kudosId: string }
  | { type: 'nomination'; nominationId: string };

export type FeedbackTargetType = FeedbackTarget['type'];

export interface FeedbackReceiver {
  receiverUserId: number;
  receiverEmail?: string;
  receiverName?: string;
}

/** One resolver per target kind; null when the target is missing or inactive */
export type TargetResolvers = {
  [K in FeedbackTargetType]: (target: Extract<FeedbackTarget, { type: K }>) => Promise<FeedbackReceiver | null>;
};

export interface FeedbackGiver {
  userId: number;
  email?: string;
  displayName?: string;
}

export interface FeedbackType {
  typeName: string;
  displayName: string;
  description: string;
  emoji: string;
  category: string;
  isActive: boolean;
}

export interface UserFeedback {
  feedbackId: string;
  targetType: FeedbackTargetType;
  targetId: string;
  giverUserId: number;
  giverEmail?: string;
  giverName?: string;
  receiverUserId: number;
  receiverEmail?: string;
  receiverName?: string;
  feedbackType?: string;
  rating?: number;
  message?: string;
  pointsGiven: number;
  pointsReceived: number;
  createdAt: Date;
}

export interface PointsEntry {
  userId: number;
  points: number;
  reason: 'feedback_given' | 'feedback_received';
  feedbackId: string;
  createdAt: Date;
}

export interface FeedbackSummary {
  targetType: FeedbackTargetType;
  targetId: string;
  feedbackCount: number;
  avgRating: number | null;
  feedbackTypes: string[];
  feedback: UserFeedback[];
}

export interface UserFeedbackStats {
  userId: number;
  feedbackGiven: number;
  pointsEarnedGiving: number;
  feedbackReceived: number;
  pointsEarnedReceiving: number;
  avgRatingReceived: number | null;
}

export type SubmitFeedbackResult =
  | { success: true; feedback: UserFeedback; pointsAwarded: { giver: number; receiver: number }; message: string }
  | Rejection;

export interface FeedbackStore {
  /** Most recent feedback time by a giver for one target kind */
  lastFeedbackAt(giverUserId: number, targetType: FeedbackTargetType): Promise<Date | null>;
  countSince(giverUserId: number, targetType: FeedbackTargetType, since: Date): Promise<number>;
  exists(giverUserId: number, targetType: FeedbackTargetType, targetId: string): Promise<boolean>;
  /** 'duplicate' when the (giver, target) pair is already present */
  insert(feedback: UserFeedback): Promise<'inserted' | 'duplicate'>;
  listForTarget(targetType: FeedbackTargetType, targetId: string): Promise<UserFeedback[]>;
  listGivenBy(userId: number): Promise<UserFeedback[]>;
  listReceivedBy(userId: number): Promise<UserFeedback[]>;
  recordPoints(entries: PointsEntry[]): Promise<void>;
  listTypes(): Promise<FeedbackType[]>;
  saveTypes(types: FeedbackType[]): Promise<void>;
}
