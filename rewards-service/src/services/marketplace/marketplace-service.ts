/**
 * Marketplace Service
 *
 * Prize catalog, prize awards (stock and per-user limits), the redemption
 * lifecycle with its status-history ledger, user wallets and metrics.
 *
 * Business rejections are returned as `{ success: false, error, code }`;
 * only store failures throw.
 */

import {
  addDays,
  createChildLogger,
  daysBetween,
  generateCode,
  generateId,
  getErrorMessage,
  secondsBetween,
  validateInput,
  type CacheHandle,
} from 'core-service';
import { REWARD_ERRORS, reject, type Rejection } from '../../error-codes.js';
import {
  awardPrizeInputSchema,
  prizeInputSchema,
  prizeUpdateSchema,
  redemptionFeedbackSchema,
  redemptionInputSchema,
} from './schemas.js';
import { loadTiers } from './tiers.js';
import {
  REDEMPTION_STATUSES,
  TERMINAL_REDEMPTION_STATUSES,
  type Actor,
  type AwardPrizeResult,
  type AwardStatus,
  type MarketplaceStore,
  type Prize,
  type PrizeAward,
  type PrizeCategory,
  type PrizeFilter,
  type PrizePopularity,
  type PrizeRedemption,
  type PrizeResult,
  type PrizeTier,
  type PrizeView,
  type RedemptionHistoryEntry,
  type RedemptionMetrics,
  type RedemptionResult,
  type RedemptionStatus,
  type StockStatus,
  type WalletEntry,
  type WalletStats,
} from './types.js';

const log = createChildLogger({ service: 'rewards-service', metadata: { component: 'marketplace' } });

export const REDEMPTION_CODE_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';
export const EXPIRING_SOON_DAYS = 7;
const LOW_STOCK_RATIO = 0.1;
const IN_PROGRESS_STATUSES: readonly RedemptionStatus[] = ['initiated', 'pending_approval', 'approved', 'processing', 'shipped'];

export interface MarketplaceOptions {
  cache?: CacheHandle;
  tiersCacheTtlSeconds?: number;
  clock?: () => Date;
  generateRedemptionCode?: () => string;
}

export interface StatusUpdateExtra {
  reason?: string;
  trackingNumber?: string;
  fulfillmentDetails?: Record<string, unknown>;
  adminNotes?: string;
}

// ═══════════════════════════════════════════════════════════════════
// Stock
// ═══════════════════════════════════════════════════════════════════

export function isLimited(prize: Pick<Prize, 'totalQuantity'>): boolean {
  return prize.totalQuantity !== null && prize.totalQuantity !== undefined;
}

/** availableQuantity - reservedQuantity; null when unlimited */
export function effectiveQuantity(prize: Pick<Prize, 'totalQuantity' | 'availableQuantity' | 'reservedQuantity'>): number | null {
  if (!isLimited(prize)) return null;
  return (prize.availableQuantity ?? 0) - (prize.reservedQuantity ?? 0);
}

export function stockStatus(prize: Pick<Prize, 'totalQuantity' | 'availableQuantity' | 'reservedQuantity'>): StockStatus {
  const effective = effectiveQuantity(prize);
  if (effective === null) return 'unlimited';
  if (effective <= 0) return 'out_of_stock';
  if (effective <= (prize.totalQuantity ?? 0) * LOW_STOCK_RATIO) return 'low_stock';
  return 'in_stock';
}

function isExpired(award: Pick<PrizeAward, 'expiresAt'>, now: Date): boolean {
  return award.expiresAt !== null && award.expiresAt.getTime() < now.getTime();
}

function emptyStatusCounts(): Record<RedemptionStatus, number> {
  return {
    initiated: 0,
    pending_approval: 0,
    approved: 0,
    processing: 0,
    shipped: 0,
    completed: 0,
    rejected: 0,
    cancelled: 0,
    failed: 0,
  };
}

function average(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function median(values: number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

// ═══════════════════════════════════════════════════════════════════
// Marketplace Service
// ═══════════════════════════════════════════════════════════════════

export class MarketplaceService {
  private readonly clock: () => Date;
  private readonly newRedemptionCode: () => string;

  constructor(readonly store: MarketplaceStore, private readonly options: MarketplaceOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.newRedemptionCode =
      options.generateRedemptionCode ?? (() => generateCode('RDM', [5, 5], REDEMPTION_CODE_ALPHABET));
  }

  // ═══════════════════════════════════════════════════════════════════
  // Catalog
  // ═══════════════════════════════════════════════════════════════════

  async listPrizes(filter: PrizeFilter = {}): Promise<PrizeView[]> {
    const { inStockOnly, ...query } = filter;
    const [prizes, tiers, categories] = await Promise.all([
      this.store.listPrizes({ activeOnly: true, ...query }),
      this.listTiers(),
      this.store.listCategories(false),
    ]);
    return prizes
      .filter(prize => !prize.deletedAt)
      .map(prize => this.toView(prize, tiers, categories))
      .filter(view => !inStockOnly || view.stockStatus !== 'out_of_stock');
  }

  async getPrize(prizeId: number): Promise<PrizeView | null> {
    const prize = await this.store.findPrize(prizeId);
    if (!prize || prize.deletedAt) return null;
    const [tiers, categories] = await Promise.all([this.listTiers(), this.store.listCategories(false)]);
    return this.toView(prize, tiers, categories);
  }

  async createPrize(input: unknown, createdBy?: string): Promise<PrizeResult> {
    const validation = validateInput(prizeInputSchema(input));
    if (!validation.ok) {
      return reject(REWARD_ERRORS.InvalidPrize, validation.errors.join('; '));
    }
    const data = validation.value;
    const now = this.clock();
    const totalQuantity = data.totalQuantity ?? null;

    const prize: Prize = {
      ...data,
      prizeId: await this.store.nextPrizeId(),
      pointsCost: data.pointsCost ?? 0,
      totalQuantity,
      availableQuantity: totalQuantity,
      reservedQuantity: 0,
      cooldownDays: data.cooldownDays ?? 0,
      requiresApproval: data.requiresApproval ?? false,
      isMysteryEligible: data.isMysteryEligible ?? false,
      mysteryWeight: data.mysteryWeight ?? 100,
      fulfillmentType: data.fulfillmentType ?? 'manual',
      isActive: data.isActive ?? true,
      isFeatured: data.isFeatured ?? false,
      createdAt: now,
      createdBy,
      updatedAt: now,
    };
    await this.store.insertPrize(prize);
    log.info('Prize created', { prizeId: prize.prizeId, prizeName: prize.prizeName });
    return { success: true, prize };
  }

  async updatePrize(prizeId: number, input: unknown, updatedBy?: string): Promise<PrizeResult> {
    const validation = validateInput(prizeUpdateSchema(input));
    if (!validation.ok) {
      return reject(REWARD_ERRORS.InvalidPrize, validation.errors.join('; '));
    }
    const existing = await this.store.findPrize(prizeId);
    if (!existing || existing.deletedAt) {
      return reject(REWARD_ERRORS.PrizeNotFound, 'Prize not found');
    }

    const { totalQuantity, ...rest } = validation.value;
    const patch: Partial<Prize> = { ...rest, updatedAt: this.clock(), updatedBy };
    if (totalQuantity !== undefined) {
      // Restocking keeps units already handed out accounted for
      const given = isLimited(existing) ? (existing.totalQuantity ?? 0) - (existing.availableQuantity ?? 0) : 0;
      patch.totalQuantity = totalQuantity;
      patch.availableQuantity = totalQuantity === null ? null : Math.max(0, totalQuantity - given);
    }

    const prize = await this.store.updatePrize(prizeId, patch);
    if (!prize) {
      return reject(REWARD_ERRORS.PrizeNotFound, 'Prize not found');
    }
    return { success: true, prize };
  }

  /** Soft delete: the prize stays for award history but leaves the catalog */
  async deletePrize(prizeId: number, deletedBy?: string): Promise<PrizeResult> {
    const existing = await this.store.findPrize(prizeId);
    if (!existing || existing.deletedAt) {
      return reject(REWARD_ERRORS.PrizeNotFound, 'Prize not found');
    }
    const now = this.clock();
    const prize = await this.store.updatePrize(prizeId, { deletedAt: now, deletedBy, isActive: false, updatedAt: now });
    if (!prize) {
      return reject(REWARD_ERRORS.PrizeNotFound, 'Prize not found');
    }
    log.info('Prize deleted', { prizeId, deletedBy });
    return { success: true, prize };
  }

  async listCategories(activeOnly = true): Promise<PrizeCategory[]> {
    const categories = await this.store.listCategories(activeOnly);
    return [...categories].sort((a, b) => a.displayOrder - b.displayOrder);
  }

  async listTiers(): Promise<PrizeTier[]> {
    return loadTiers(this.store, this.options.cache, this.options.tiersCacheTtlSeconds ?? 300);
  }

  private toView(prize: Prize, tiers: PrizeTier[], categories: PrizeCategory[]): PrizeView {
    return {
      ...prize,
      stockStatus: stockStatus(prize),
      effectiveQuantity: effectiveQuantity(prize),
      tierName: tiers.find(tier => tier.tierId === prize.tierId)?.tierName,
      categoryName: categories.find(category => category.categoryId === prize.categoryId)?.categoryName,
    };
  }

  // ═══════════════════════════════════════════════════════════════════
  // Awards
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Award a prize. Checks run in order: existence, active, stock, per-user
   * limit, cooldown. The stock unit is taken atomically before the insert.
   */
  async awardPrize(input: unknown): Promise<AwardPrizeResult> {
    const validation = validateInput(awardPrizeInputSchema(input));
    if (!validation.ok) {
      return reject(REWARD_ERRORS.InvalidMarketplaceInput, validation.errors.join('; '));
    }
    const request = validation.value;
    const now = this.clock();

    const prize = await this.store.findPrize(request.prizeId);
    if (!prize || prize.deletedAt) {
      return reject(REWARD_ERRORS.PrizeNotFound, 'Prize not found');
    }
    if (!prize.isActive) {
      return reject(REWARD_ERRORS.PrizeNotActive, 'Prize is not active');
    }
    const effective = effectiveQuantity(prize);
    if (effective !== null && effective <= 0) {
      return reject(REWARD_ERRORS.PrizeOutOfStock, 'Prize is out of stock');
    }

    const ineligible = await this.checkUserEligibility(prize, request.userId, now);
    if (ineligible) return ineligible;

    if (!(await this.store.reserveUnit(prize.prizeId))) {
      return reject(REWARD_ERRORS.PrizeOutOfStock, 'Prize is out of stock');
    }

    const validityDays = request.expiresInDays ?? prize.validityDays;
    const award: PrizeAward = {
      awardId: generateId(),
      prizeId: prize.prizeId,
      userId: request.userId,
      userEmail: request.userEmail,
      userEmployeeId: request.userEmployeeId,
      source: request.source ?? 'manual',
      sourceReferenceId: request.sourceReferenceId,
      sourceReferenceType: request.sourceReferenceType,
      linkedAwardId: request.linkedAwardId,
      awardedByUserId: request.awardedByUserId,
      awardedByEmail: request.awardedByEmail,
      awardedAt: now,
      awardMessage: request.awardMessage,
      status: 'available',
      statusChangedAt: now,
      expiresAt: validityDays ? addDays(now, validityDays) : null,
      pointsValue: prize.pointsCost,
      monetaryValue: prize.monetaryValue,
      metadata: request.metadata ?? {},
    };

    try {
      await this.store.insertAward(award);
    } catch (error) {
      await this.store.releaseUnit(prize.prizeId);
      log.error('Prize award insert failed', { prizeId: prize.prizeId, userId: request.userId, error: getErrorMessage(error) });
      throw error;
    }

    log.info('Prize awarded', { prizeId: prize.prizeId, userId: request.userId, awardId: award.awardId, source: award.source });
    return { success: true, award, message: `Prize '${prize.prizeName}' successfully awarded` };
  }

  private async checkUserEligibility(prize: Prize, userId: number, now: Date): Promise<Rejection | null> {
    if (!prize.maxPerUser && prize.cooldownDays <= 0) return null;

    const history = await this.store.userPrizeHistory(prize.prizeId, userId);
    if (prize.maxPerUser && history.count >= prize.maxPerUser) {
      return reject(REWARD_ERRORS.PrizeLimitReached, 'Maximum awards per user reached');
    }
    if (prize.cooldownDays > 0 && history.lastAwardedAt) {
      if (now.getTime() < addDays(history.lastAwardedAt, prize.cooldownDays).getTime()) {
        return reject(REWARD_ERRORS.PrizeCooldownActive, 'Prize cooldown active');
      }
    }
    return null;
  }

  async getAward(awardId: string): Promise<PrizeAward | null> {
    return this.store.findAward(awardId);
  }

  async expireOldAwards(now: Date = this.clock()): Promise<number> {
    const expired = await this.store.expireDue(now);
    if (expired > 0) {
      log.info('Expired old prize awards', { count: expired });
    }
    return expired;
  }

  // ═══════════════════════════════════════════════════════════════════
  // Redemptions
  // ═══════════════════════════════════════════════════════════════════

  async initiateRedemption(awardId: string, userId: number, input: unknown = {}): Promise<RedemptionResult> {
    const validation = validateInput(redemptionInputSchema(input));
    if (!validation.ok) {
      return reject(REWARD_ERRORS.InvalidMarketplaceInput, validation.errors.join('; '));
    }
    const now = this.clock();

    const award = await this.store.findAward(awardId);
    if (!award) {
      return reject(REWARD_ERRORS.AwardNotFound, 'Award not found');
    }
    if (award.userId !== userId) {
      return reject(REWARD_ERRORS.AwardNotOwned, 'Award does not belong to this user');
    }
    if (award.status !== 'available') {
      return reject(REWARD_ERRORS.AwardNotRedeemable, `Award cannot be redeemed (status: ${award.status})`);
    }
    if (isExpired(award, now)) {
      await this.store.transitionAward(awardId, 'available', { status: 'expired', statusChangedAt: now });
      return reject(REWARD_ERRORS.AwardExpired, 'Award has expired');
    }

    const prize = await this.store.findPrize(award.prizeId);
    if (!prize) {
      return reject(REWARD_ERRORS.PrizeNotFound, 'Prize not found');
    }

    const reserved = await this.store.transitionAward(awardId, 'available', {
      status: 'reserved',
      statusChangedAt: now,
      statusChangedBy: String(userId),
    });
    if (!reserved) {
      return reject(REWARD_ERRORS.AwardNotRedeemable, 'Award cannot be redeemed (status changed)');
    }

    const status: RedemptionStatus = prize.requiresApproval ? 'pending_approval' : 'initiated';
    const redemption: PrizeRedemption = {
      redemptionId: generateId(),
      awardId,
      prizeId: award.prizeId,
      userId,
      redemptionCode: this.newRedemptionCode(),
      status,
      initiatedAt: now,
      fulfillmentMethod: validation.value.fulfillmentMethod ?? prize.fulfillmentType,
      fulfillmentDetails: {},
      shippingAddress: validation.value.shippingAddress,
      metadata: validation.value.metadata ?? {},
      createdAt: now,
      updatedAt: now,
    };
    let inserted = false;
    try {
      await this.store.insertRedemption(redemption);
      inserted = true;
      await this.store.appendHistory({
        redemptionId: redemption.redemptionId,
        previousStatus: null,
        newStatus: status,
        changedAt: now,
        changedBy: String(userId),
      });
    } catch (error) {
      log.error('Redemption insert failed', { awardId, redemptionId: redemption.redemptionId, error: getErrorMessage(error) });
      await this.store.transitionAward(awardId, 'reserved', { status: 'available', statusChangedAt: now });
      if (inserted) {
        await this.store.transitionRedemption(redemption.redemptionId, status, { status: 'failed', updatedAt: now });
      }
      throw error;
    }

    log.info('Redemption initiated', { redemptionId: redemption.redemptionId, awardId, status });
    return {
      success: true,
      redemption,
      message: prize.requiresApproval ? 'Redemption submitted for approval' : 'Redemption initiated',
    };
  }

  async getRedemption(redemptionId: string): Promise<PrizeRedemption | null> {
    return this.store.findRedemption(redemptionId);
  }

  async getRedemptionHistory(redemptionId: string): Promise<RedemptionHistoryEntry[]> {
    return this.store.listHistory(redemptionId);
  }

  /**
   * Move a redemption to `status`. Any non-terminal redemption may move to
   * any other status; each change appends a history row.
   */
  async updateRedemptionStatus(
    redemptionId: string,
    status: RedemptionStatus,
    actor: Actor = {},
    extra: StatusUpdateExtra = {}
  ): Promise<RedemptionResult> {
    if (!REDEMPTION_STATUSES.includes(status)) {
      return reject(REWARD_ERRORS.InvalidRedemptionTransition, `Unknown redemption status: ${status}`);
    }
    const now = this.clock();
    const current = await this.store.findRedemption(redemptionId);
    if (!current) {
      return reject(REWARD_ERRORS.RedemptionNotFound, 'Redemption not found');
    }
    if (TERMINAL_REDEMPTION_STATUSES.includes(current.status) || current.status === status) {
      return reject(REWARD_ERRORS.InvalidRedemptionTransition, `Redemption is already ${current.status}`);
    }
    const trackingNumber = extra.trackingNumber ?? current.trackingNumber;
    if (status === 'shipped' && !trackingNumber) {
      return reject(REWARD_ERRORS.TrackingNumberRequired, 'Tracking number is required to ship a redemption');
    }

    const patch: Partial<PrizeRedemption> = { status, updatedAt: now };
    if (extra.fulfillmentDetails) {
      patch.fulfillmentDetails = { ...current.fulfillmentDetails, ...extra.fulfillmentDetails };
    }
    if (extra.trackingNumber) patch.trackingNumber = extra.trackingNumber;
    if (extra.adminNotes) patch.adminNotes = extra.adminNotes;
    if (extra.reason) patch.cancelledReason = extra.reason;

    switch (status) {
      case 'approved':
        patch.approvedAt = now;
        patch.approvedBy = actor.userId;
        patch.timeToApproveSeconds = secondsBetween(current.initiatedAt, now);
        break;
      case 'processing':
        patch.processingStartedAt = now;
        break;
      case 'shipped':
        patch.shippedAt = now;
        break;
      case 'completed':
        patch.completedAt = now;
        patch.timeToCompleteSeconds = secondsBetween(current.initiatedAt, now);
        patch.totalProcessingSeconds = secondsBetween(current.createdAt, now);
        break;
      case 'cancelled':
      case 'rejected':
        patch.cancelledBy = actor.userId;
        patch.cancelledAt = now;
        break;
      case 'failed':
        patch.cancelledAt = now;
        break;
      default:
        break;
    }

    const updated = await this.store.transitionRedemption(redemptionId, current.status, patch);
    if (!updated) {
      return reject(REWARD_ERRORS.InvalidRedemptionTransition, 'Redemption status changed concurrently');
    }

    await this.store.appendHistory({
      redemptionId,
      previousStatus: current.status,
      newStatus: status,
      changedAt: now,
      changedBy: actor.email ?? (actor.userId !== undefined ? String(actor.userId) : undefined),
      reason: extra.reason,
    });
    await this.settleAward(updated, status, actor, now);

    log.info('Redemption status updated', { redemptionId, from: current.status, to: status });
    return { success: true, redemption: updated, message: `Redemption updated to ${status}` };
  }

  /**
   * Completion redeems the award; cancellation, rejection and failure
   * return it to the wallet (or to 'expired' once past its expiry).
   */
  private async settleAward(redemption: PrizeRedemption, status: RedemptionStatus, actor: Actor, now: Date): Promise<void> {
    let next: AwardStatus | null = null;
    if (status === 'completed') {
      next = 'redeemed';
    } else if (status === 'cancelled' || status === 'rejected' || status === 'failed') {
      const award = await this.store.findAward(redemption.awardId);
      next = award && isExpired(award, now) ? 'expired' : 'available';
    }
    if (!next) return;

    const changedBy = actor.email ?? (actor.userId !== undefined ? String(actor.userId) : undefined);
    const settled = await this.store.transitionAward(redemption.awardId, 'reserved', {
      status: next,
      statusChangedAt: now,
      statusChangedBy: changedBy,
    });
    if (!settled) {
      log.warn('Award was not reserved when settling redemption', { awardId: redemption.awardId, status });
    }
  }

  async cancelRedemption(redemptionId: string, cancelledByUserId: number, reason: string): Promise<RedemptionResult> {
    return this.updateRedemptionStatus(redemptionId, 'cancelled', { userId: cancelledByUserId }, { reason });
  }

  async completeRedemption(
    redemptionId: string,
    options: { fulfillmentDetails?: Record<string, unknown>; completedByEmail?: string } = {}
  ): Promise<RedemptionResult> {
    return this.updateRedemptionStatus(
      redemptionId,
      'completed',
      { email: options.completedByEmail },
      { fulfillmentDetails: options.fulfillmentDetails }
    );
  }

  async submitRedemptionFeedback(redemptionId: string, userId: number, input: unknown): Promise<RedemptionResult> {
    const validation = validateInput(redemptionFeedbackSchema(input));
    if (!validation.ok) {
      return reject(REWARD_ERRORS.InvalidRating, validation.errors.join('; '));
    }
    const redemption = await this.store.findRedemption(redemptionId);
    if (!redemption) {
      return reject(REWARD_ERRORS.RedemptionNotFound, 'Redemption not found');
    }
    if (redemption.userId !== userId) {
      return reject(REWARD_ERRORS.AwardNotOwned, 'Redemption does not belong to this user');
    }
    if (redemption.status !== 'completed') {
      return reject(REWARD_ERRORS.InvalidRedemptionTransition, 'Feedback can only be left on completed redemptions');
    }
    if (redemption.userRating !== undefined) {
      return reject(REWARD_ERRORS.FeedbackAlreadySubmitted, 'Feedback already submitted');
    }

    const now = this.clock();
    const patch: Partial<PrizeRedemption> = {
      userRating: validation.value.rating,
      userFeedback: validation.value.feedback,
      feedbackAt: now,
      updatedAt: now,
    };
    await this.store.updateRedemption(redemptionId, patch);
    return { success: true, redemption: { ...redemption, ...patch }, message: 'Feedback recorded' };
  }

  // ═══════════════════════════════════════════════════════════════════
  // Wallet
  // ═══════════════════════════════════════════════════════════════════

  async getUserWallet(
    userId: number,
    options: { status?: AwardStatus[]; includeExpired?: boolean } = {}
  ): Promise<WalletEntry[]> {
    const now = this.clock();
    const awards = await this.store.listAwardsForUser(userId);
    if (awards.length === 0) return [];

    const [prizes, tiers, categories, redemptions] = await Promise.all([
      Promise.all(Array.from(new Set(awards.map(award => award.prizeId))).map(id => this.store.findPrize(id))),
      this.listTiers(),
      this.store.listCategories(false),
      this.store.listRedemptionsForAwards(awards.map(award => award.awardId)),
    ]);

    const entries = awards.map((award): WalletEntry => {
      const prize = prizes.find(candidate => candidate?.prizeId === award.prizeId);
      const tier = tiers.find(candidate => candidate.tierId === prize?.tierId);
      const redemption = redemptions
        .filter(candidate => candidate.awardId === award.awardId)
        .sort((a, b) => b.initiatedAt.getTime() - a.initiatedAt.getTime())[0];
      const expired = isExpired(award, now);
      return {
        ...award,
        prizeName: prize?.prizeName ?? `Prize ${award.prizeId}`,
        shortDescription: prize?.shortDescription,
        imageUrl: prize?.imageUrl,
        tierName: tier?.tierName,
        tierColor: tier?.colorCode,
        categoryName: categories.find(category => category.categoryId === prize?.categoryId)?.categoryName,
        redemptionId: redemption?.redemptionId,
        redemptionStatus: redemption?.status,
        redemptionCode: redemption?.redemptionCode,
        redemptionInitiatedAt: redemption?.initiatedAt,
        redemptionCompletedAt: redemption?.completedAt,
        isExpired: expired,
        canRedeem: award.status === 'available' && !expired,
        daysUntilExpiry: award.expiresAt ? daysBetween(now, award.expiresAt) : null,
      };
    });

    return entries
      .filter(entry => !options.status?.length || options.status.includes(entry.status))
      .filter(entry => options.includeExpired || !entry.isExpired)
      .sort((a, b) => b.awardedAt.getTime() - a.awardedAt.getTime());
  }

  async getWalletStats(userId: number): Promise<WalletStats> {
    const wallet = await this.getUserWallet(userId, { includeExpired: true });
    const stats: WalletStats = {
      available: 0,
      redeemed: 0,
      expired: 0,
      pending: 0,
      availableValue: 0,
      redeemedValue: 0,
      expiringSoon: 0,
    };
    for (const entry of wallet) {
      if (entry.status === 'available' && !entry.isExpired) {
        stats.available++;
        stats.availableValue += entry.monetaryValue ?? 0;
        if (entry.daysUntilExpiry !== null && entry.daysUntilExpiry <= EXPIRING_SOON_DAYS) {
          stats.expiringSoon++;
        }
      }
      if (entry.status === 'redeemed') {
        stats.redeemed++;
        stats.redeemedValue += entry.monetaryValue ?? 0;
      }
      if (entry.status === 'expired' || entry.isExpired) stats.expired++;
      if (entry.status === 'reserved') stats.pending++;
    }
    return stats;
  }

  // ═══════════════════════════════════════════════════════════════════
  // Metrics
  // ═══════════════════════════════════════════════════════════════════

  async getRedemptionMetrics(range: { from?: Date; to?: Date } = {}): Promise<RedemptionMetrics> {
    const redemptions = await this.store.listRedemptions(range);
    const byStatus = emptyStatusCounts();
    for (const redemption of redemptions) {
      byStatus[redemption.status]++;
    }

    const completed = redemptions.filter(redemption => redemption.status === 'completed');
    const completionTimes = completed
      .map(redemption => redemption.timeToCompleteSeconds)
      .filter((value): value is number => value !== undefined);
    const approveTimes = redemptions
      .map(redemption => redemption.timeToApproveSeconds)
      .filter((value): value is number => value !== undefined);
    const ratings = redemptions
      .map(redemption => redemption.userRating)
      .filter((value): value is number => value !== undefined);

    return {
      total: redemptions.length,
      byStatus,
      completed: byStatus.completed,
      cancelled: byStatus.cancelled,
      failed: byStatus.failed,
      inProgress: IN_PROGRESS_STATUSES.reduce((sum, status) => sum + byStatus[status], 0),
      avgApproveSeconds: average(approveTimes),
      avgCompletionSeconds: average(completionTimes),
      medianCompletionSeconds: median(completionTimes),
      avgRating: average(ratings),
    };
  }

  async getPrizePopularity(limit = 10): Promise<PrizePopularity[]> {
    const [prizes, activity, tiers] = await Promise.all([
      this.store.listPrizes({ activeOnly: true }),
      this.store.prizeActivity(),
      this.listTiers(),
    ]);

    return prizes
      .filter(prize => !prize.deletedAt)
      .map((prize): PrizePopularity => {
        const stats = activity.find(entry => entry.prizeId === prize.prizeId);
        const awardCount = stats?.awardCount ?? 0;
        const redemptionCount = stats?.completedRedemptions ?? 0;
        return {
          prizeId: prize.prizeId,
          prizeName: prize.prizeName,
          imageUrl: prize.imageUrl,
          tierName: tiers.find(tier => tier.tierId === prize.tierId)?.tierName,
          awardCount,
          redemptionCount,
          redemptionRate: awardCount > 0 ? Math.round((redemptionCount / awardCount) * 10000) / 100 : null,
        };
      })
      .sort((a, b) => b.awardCount - a.awardCount || a.prizeId - b.prizeId)
      .slice(0, limit);
  }
}
