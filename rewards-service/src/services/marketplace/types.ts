/**
 * Marketplace Types
 *
 * Prizes, prize awards, redemptions and mystery-box events, plus the store
 * interface the marketplace and mystery box read and write through.
 */

import type { Rejection } from '../../error-codes.js';

// ═══════════════════════════════════════════════════════════════════
// Enums
// ═══════════════════════════════════════════════════════════════════

export const AWARD_STATUSES = ['pending', 'available', 'reserved', 'redeemed', 'expired', 'cancelled', 'failed'] as const;
export type AwardStatus = typeof AWARD_STATUSES[number];

export const AWARD_SOURCES = [
  'badge',
  'mystery_box',
  'purchase',
  'manual',
  'campaign',
  'milestone',
  'referral',
  'lottery',
] as const;
export type AwardSource = typeof AWARD_SOURCES[number];

export const REDEMPTION_STATUSES = [
  'initiated',
  'pending_approval',
  'approved',
  'processing',
  'shipped',
  'completed',
  'rejected',
  'cancelled',
  'failed',
] as const;
export type RedemptionStatus = typeof REDEMPTION_STATUSES[number];

export const TERMINAL_REDEMPTION_STATUSES: readonly RedemptionStatus[] = ['completed', 'rejected', 'cancelled', 'failed'];

export const FULFILLMENT_TYPES = ['automatic', 'manual', 'external'] as const;
export type FulfillmentType = typeof FULFILLMENT_TYPES[number];

export type StockStatus = 'unlimited' | 'in_stock' | 'low_stock' | 'out_of_stock';

export type MysteryBoxStatus = 'scheduled' | 'running' | 'completed' | 'failed';

// ═══════════════════════════════════════════════════════════════════
// Catalog
// ═══════════════════════════════════════════════════════════════════

export interface PrizeCategory {
  categoryId: number;
  categoryName: string;
  description?: string;
  icon?: string;
  displayOrder: number;
  isActive: boolean;
}

export interface PrizeTier {
  tierId: number;
  tierName: string;
  /** 1 = most common */
  tierLevel: number;
  /** Probability in [0, 1] used by mystery-box rolls */
  dropRate: number;
  description?: string;
  colorCode?: string;
}

export interface Prize {
  prizeId: number;
  prizeName: string;
  description?: string;
  shortDescription?: string;
  categoryId?: number;
  tierId?: number;
  /** Points required to purchase (0 = not purchasable) */
  pointsCost: number;
  monetaryValue?: number;
  /** null = unlimited */
  totalQuantity: number | null;
  availableQuantity: number | null;
  reservedQuantity: number;
  imageUrl?: string;
  thumbnailUrl?: string;
  maxPerUser?: number;
  cooldownDays: number;
  requiresApproval: boolean;
  isMysteryEligible: boolean;
  /** Relative weight within its tier; higher drops more often */
  mysteryWeight: number;
  linkedRewardId?: number;
  fulfillmentType: FulfillmentType;
  fulfillmentInstructions?: string;
  /** Days an award of this prize stays redeemable */
  validityDays?: number;
  tags?: string[];
  attributes?: Record<string, unknown>;
  isActive: boolean;
  isFeatured: boolean;
  createdAt: Date;
  createdBy?: string;
  updatedAt: Date;
  updatedBy?: string;
  deletedAt?: Date;
  deletedBy?: string;
}

export interface PrizeView extends Prize {
  stockStatus: StockStatus;
  /** null when unlimited */
  effectiveQuantity: number | null;
  tierName?: string;
  categoryName?: string;
}

export interface PrizeFilter {
  activeOnly?: boolean;
  categoryId?: number;
  tierId?: number;
  mysteryEligible?: boolean;
  featured?: boolean;
  inStockOnly?: boolean;
}

// ═══════════════════════════════════════════════════════════════════
// Awards & Redemptions
// ═══════════════════════════════════════════════════════════════════

export interface PrizeAward {
  awardId: string;
  prizeId: number;
  userId: number;
  userEmail: string;
  userEmployeeId?: string;
  source: AwardSource;
  sourceReferenceId?: string;
  sourceReferenceType?: string;
  linkedAwardId?: string;
  awardedByUserId?: number;
  awardedByEmail?: string;
  awardedAt: Date;
  awardMessage?: string;
  status: AwardStatus;
  statusChangedAt: Date;
  statusChangedBy?: string;
  expiresAt: Date | null;
  pointsValue: number;
  monetaryValue?: number;
  metadata: Record<string, unknown>;
}

export interface PrizeRedemption {
  redemptionId: string;
  awardId: string;
  prizeId: number;
  userId: number;
  redemptionCode: string;
  status: RedemptionStatus;
  initiatedAt: Date;
  approvedAt?: Date;
  approvedBy?: number;
  processingStartedAt?: Date;
  completedAt?: Date;
  cancelledAt?: Date;
  cancelledBy?: number;
  cancelledReason?: string;
  fulfillmentMethod: string;
  fulfillmentDetails: Record<string, unknown>;
  shippingAddress?: Record<string, unknown>;
  trackingNumber?: string;
  shippedAt?: Date;
  userRating?: number;
  userFeedback?: string;
  feedbackAt?: Date;
  timeToApproveSeconds?: number;
  timeToCompleteSeconds?: number;
  totalProcessingSeconds?: number;
  adminNotes?: string;
  metadata: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

export interface RedemptionHistoryEntry {
  redemptionId: string;
  previousStatus: RedemptionStatus | null;
  newStatus: RedemptionStatus;
  changedAt: Date;
  changedBy?: string;
  reason?: string;
}

/** Who performed a status change */
export interface Actor {
  userId?: number;
  email?: string;
}

// ═══════════════════════════════════════════════════════════════════
// Wallet & Metrics
// ═══════════════════════════════════════════════════════════════════

export interface WalletEntry extends PrizeAward {
  prizeName: string;
  shortDescription?: string;
  imageUrl?: string;
  tierName?: string;
  tierColor?: string;
  categoryName?: string;
  redemptionId?: string;
  redemptionStatus?: RedemptionStatus;
  redemptionCode?: string;
  redemptionInitiatedAt?: Date;
  redemptionCompletedAt?: Date;
  isExpired: boolean;
  canRedeem: boolean;
  daysUntilExpiry: number | null;
}

export interface WalletStats {
  available: number;
  redeemed: number;
  expired: number;
  pending: number;
  availableValue: number;
  redeemedValue: number;
  expiringSoon: number;
}

export interface RedemptionMetrics {
  total: number;
  byStatus: Record<RedemptionStatus, number>;
  completed: number;
  cancelled: number;
  failed: number;
  inProgress: number;
  avgApproveSeconds: number | null;
  avgCompletionSeconds: number | null;
  medianCompletionSeconds: number | null;
  avgRating: number | null;
}

export interface PrizePopularity {
  prizeId: number;
  prizeName: string;
  imageUrl?: string;
  tierName?: string;
  awardCount: number;
  redemptionCount: number;
  /** Percentage of awards with a completed redemption, null without awards */
  redemptionRate: number | null;
}

export interface PrizeActivity {
  prizeId: number;
  awardCount: number;
  completedRedemptions: number;
}

// ═══════════════════════════════════════════════════════════════════
// Mystery Box
// ═══════════════════════════════════════════════════════════════════

export interface MysteryPrizeAwarded {
  userId: number;
  userEmail: string;
  prizeId: number;
  prizeName: string;
  tierId: number;
  tierName: string;
  awardId: string;
}

export interface MysteryBoxEvent {
  eventId: string;
  eventName: string;
  description?: string;
  scheduledAt: Date;
  executedAt?: Date;
  eligibleUserCount?: number;
  winnersCount: number;
  prizesAwarded: MysteryPrizeAwarded[];
  status: MysteryBoxStatus;
  errorMessage?: string;
  createdBy?: string;
  createdAt: Date;
}

// ═══════════════════════════════════════════════════════════════════
// Results
// ═══════════════════════════════════════════════════════════════════

export type AwardPrizeResult = { success: true; award: PrizeAward; message: string } | Rejection;

export type RedemptionResult = { success: true; redemption: PrizeRedemption; message: string } | Rejection;

export type PrizeResult = { success: true; prize: Prize } | Rejection;

export type MysteryBoxResult =
  | { success: true; eventId: string; eligibleUsers: number; winners: MysteryPrizeAwarded[]; message: string }
  | (Rejection & { eventId: string });

// ═══════════════════════════════════════════════════════════════════
// Store
// ═══════════════════════════════════════════════════════════════════

export interface MarketplaceStore {
  // Catalog
  nextPrizeId(): Promise<number>;
  listPrizes(filter?: Pick<PrizeFilter, 'activeOnly' | 'categoryId' | 'tierId' | 'mysteryEligible' | 'featured'>): Promise<Prize[]>;
  findPrize(prizeId: number): Promise<Prize | null>;
  insertPrize(prize: Prize): Promise<void>;
  updatePrize(prizeId: number, patch: Partial<Prize>): Promise<Prize | null>;
  listCategories(activeOnly: boolean): Promise<PrizeCategory[]>;
  listTiers(): Promise<PrizeTier[]>;
  saveTiers(tiers: PrizeTier[]): Promise<void>;

  /**
   * Take one unit of a limited prize: succeeds only while
   * availableQuantity - reservedQuantity > 0. Unlimited prizes always succeed.
   */
  reserveUnit(prizeId: number): Promise<boolean>;
  /** Give back a unit taken by reserveUnit */
  releaseUnit(prizeId: number): Promise<void>;

  // Awards
  insertAward(award: PrizeAward): Promise<void>;
  findAward(awardId: string): Promise<PrizeAward | null>;
  listAwardsForUser(userId: number): Promise<PrizeAward[]>;
  /** Non-cancelled awards of a prize to a user */
  userPrizeHistory(prizeId: number, userId: number): Promise<{ count: number; lastAwardedAt: Date | null }>;
  /**
   * Compare-and-set on status. Returns the updated award, or null when the
   * award is missing or no longer in `from`.
   */
  transitionAward(awardId: string, from: AwardStatus, patch: Partial<PrizeAward>): Promise<PrizeAward | null>;
  /** Flip due 'available' awards to 'expired'; returns how many changed */
  expireDue(now: Date): Promise<number>;
  prizeActivity(): Promise<PrizeActivity[]>;

  // Redemptions
  insertRedemption(redemption: PrizeRedemption): Promise<void>;
  findRedemption(redemptionId: string): Promise<PrizeRedemption | null>;
  /** Compare-and-set on status; null when the redemption moved on */
  transitionRedemption(
    redemptionId: string,
    from: RedemptionStatus,
    patch: Partial<PrizeRedemption>
  ): Promise<PrizeRedemption | null>;
  updateRedemption(redemptionId: string, patch: Partial<PrizeRedemption>): Promise<void>;
  listRedemptions(range?: { from?: Date; to?: Date }): Promise<PrizeRedemption[]>;
  listRedemptionsForAwards(awardIds: string[]): Promise<PrizeRedemption[]>;
  appendHistory(entry: RedemptionHistoryEntry): Promise<void>;
  listHistory(redemptionId: string): Promise<RedemptionHistoryEntry[]>;

  // Mystery box events
  insertEvent(event: MysteryBoxEvent): Promise<void>;
  updateEvent(eventId: string, patch: Partial<MysteryBoxEvent>): Promise<void>;
  findEvent(eventId: string): Promise<MysteryBoxEvent | null>;
  listEvents(limit: number): Promise<MysteryBoxEvent[]>;
}
