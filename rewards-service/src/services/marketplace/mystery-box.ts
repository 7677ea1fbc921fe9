/**
 * Mystery Box
 *
 * Picks winners from an eligible user pool and awards each a prize from a
 * randomly rolled tier. Event lifecycle: scheduled -> running -> completed | failed.
 *
 * Tier roll: cumulative walk over tiers in ascending level order; the first
 * tier whose running sum reaches the draw wins. A draw past the end (rates
 * summing below 1) falls back to the first tier. A rolled tier without
 * prizes falls back to the common tier's pool.
 */

import { createChildLogger, generateId, getErrorMessage, type CacheHandle } from 'core-service';
import { REWARD_ERRORS } from '../../error-codes.js';
import { defaultRandom, sample, type RandomSource } from '../../random.js';
import type { RewardUser } from '../../types.js';
import type { UserCriteria, UserDirectory } from '../reward-engine/types.js';
import { effectiveQuantity, type MarketplaceService } from './marketplace-service.js';
import { applyTierOverrides, COMMON_TIER_ID, loadTiers, sortTiers } from './tiers.js';
import type {
  MarketplaceStore,
  MysteryBoxEvent,
  MysteryBoxResult,
  MysteryPrizeAwarded,
  Prize,
  PrizeTier,
} from './types.js';

const log = createChildLogger({ service: 'rewards-service', metadata: { component: 'mystery-box' } });

export const DEFAULT_MYSTERY_WEIGHT = 100;
export const DEFAULT_MYSTERY_EXPIRY_DAYS = 30;

export interface MysteryBoxRequest {
  eventName: string;
  winnersCount: number;
  description?: string;
  /** Explicit pool; takes precedence over `criteria` */
  userIds?: number[];
  criteria?: UserCriteria;
  /** Drop-rate replacements keyed by tier id */
  tierOverrides?: Record<string, number>;
  triggeredBy?: string;
  expiresInDays?: number;
}

export interface MysteryBoxOptions {
  random?: RandomSource;
  cache?: CacheHandle;
  tiersCacheTtlSeconds?: number;
  clock?: () => Date;
}

// ═══════════════════════════════════════════════════════════════════
// Draws
// ═══════════════════════════════════════════════════════════════════

/**
 * Select a tier for a uniform draw in [0, 1). Returns null only for an
 * empty tier list.
 */
export function rollTier(tiers: readonly PrizeTier[], draw: number): PrizeTier | null {
  const ordered = sortTiers(tiers);
  if (ordered.length === 0) return null;

  let cumulative = 0;
  for (const tier of ordered) {
    cumulative += tier.dropRate;
    if (draw <= cumulative) return tier;
  }
  return ordered[0];
}

export function totalWeight(prizes: readonly Pick<Prize, 'mysteryWeight'>[]): number {
  return prizes.reduce((sum, prize) => sum + (prize.mysteryWeight ?? DEFAULT_MYSTERY_WEIGHT), 0);
}

/**
 * Weighted choice for an integer draw in [1, totalWeight]: the first item
 * whose cumulative weight covers the draw.
 */
export function weightedChoice<T extends Pick<Prize, 'mysteryWeight'>>(items: readonly T[], draw: number): T | null {
  if (items.length === 0) return null;
  let cumulative = 0;
  for (const item of items) {
    cumulative += item.mysteryWeight ?? DEFAULT_MYSTERY_WEIGHT;
    if (draw <= cumulative) return item;
  }
  return items[0];
}

export function sampleWinners<T>(pool: readonly T[], count: number, random: RandomSource = defaultRandom): T[] {
  return sample(pool, count, random);
}

export function groupPrizesByTier(prizes: readonly Prize[]): Map<number, Prize[]> {
  const grouped = new Map<number, Prize[]>();
  for (const prize of prizes) {
    const tierId = prize.tierId ?? COMMON_TIER_ID;
    const bucket = grouped.get(tierId);
    if (bucket) {
      bucket.push(prize);
    } else {
      grouped.set(tierId, [prize]);
    }
  }
  return grouped;
}

// ═══════════════════════════════════════════════════════════════════
// Mystery Box Service
// ═══════════════════════════════════════════════════════════════════

export class MysteryBoxService {
  private readonly random: RandomSource;
  private readonly clock: () => Date;

  constructor(
    private readonly store: MarketplaceStore,
    private readonly marketplace: MarketplaceService,
    private readonly users: UserDirectory,
    private readonly options: MysteryBoxOptions = {}
  ) {
    this.random = options.random ?? defaultRandom;
    this.clock = options.clock ?? (() => new Date());
  }

  async executeMysteryBox(request: MysteryBoxRequest): Promise<MysteryBoxResult> {
    const now = this.clock();
    const eventId = generateId();
    const event: MysteryBoxEvent = {
      eventId,
      eventName: request.eventName,
      description: request.description,
      scheduledAt: now,
      winnersCount: request.winnersCount,
      prizesAwarded: [],
      status: 'running',
      createdBy: request.triggeredBy,
      createdAt: now,
    };
    await this.store.insertEvent(event);
    log.info('Mystery box event started', { eventId, eventName: request.eventName, winnersCount: request.winnersCount });

    const pool = await this.resolveUsers(request, now);
    if (pool.length === 0) {
      await this.store.updateEvent(eventId, {
        status: 'completed',
        executedAt: this.clock(),
        eligibleUserCount: 0,
        winnersCount: 0,
      });
      return { success: true, eventId, eligibleUsers: 0, winners: [], message: 'No eligible users' };
    }

    const tiers = applyTierOverrides(
      await loadTiers(this.store, this.options.cache, this.options.tiersCacheTtlSeconds ?? 300),
      request.tierOverrides
    );
    const prizesByTier = groupPrizesByTier(await this.mysteryPrizes());
    if (prizesByTier.size === 0) {
      await this.store.updateEvent(eventId, {
        status: 'failed',
        executedAt: this.clock(),
        eligibleUserCount: pool.length,
        winnersCount: 0,
        errorMessage: 'No prizes available',
      });
      log.warn('Mystery box event failed', { eventId, reason: 'No prizes available' });
      return { success: false, eventId, error: 'No prizes available', code: REWARD_ERRORS.NoPrizesAvailable };
    }

    const winners = sampleWinners(pool, request.winnersCount, this.random);
    const awarded: MysteryPrizeAwarded[] = [];
    for (const winner of winners) {
      const result = await this.awardWinner(winner, tiers, prizesByTier, eventId, request);
      if (result) awarded.push(result);
    }

    await this.store.updateEvent(eventId, {
      status: 'completed',
      executedAt: this.clock(),
      eligibleUserCount: pool.length,
      winnersCount: awarded.length,
      prizesAwarded: awarded,
    });
    log.info('Mystery box event completed', { eventId, eligible: pool.length, awarded: awarded.length });

    return {
      success: true,
      eventId,
      eligibleUsers: pool.length,
      winners: awarded,
      message: `Awarded ${awarded.length} prize(s) to ${winners.length} winner(s)`,
    };
  }

  async listMysteryBoxEvents(limit = 20): Promise<MysteryBoxEvent[]> {
    return this.store.listEvents(limit);
  }

  async getMysteryBoxEvent(eventId: string): Promise<MysteryBoxEvent | null> {
    return this.store.findEvent(eventId);
  }

  private async resolveUsers(request: MysteryBoxRequest, now: Date): Promise<RewardUser[]> {
    if (request.userIds?.length) {
      const found = await this.users.findByIds(request.userIds);
      return found.filter(user => user.isActive);
    }
    return this.users.listActive(request.criteria ?? {}, now);
  }

  /** Active, non-deleted, mystery-eligible prizes with stock left (or unlimited) */
  private async mysteryPrizes(): Promise<Prize[]> {
    const prizes = await this.store.listPrizes({ activeOnly: true, mysteryEligible: true });
    return prizes.filter(prize => {
      if (prize.deletedAt) return false;
      const effective = effectiveQuantity(prize);
      return effective === null || effective > 0;
    });
  }

  /**
   * Roll, pick and award one prize. Failures are logged and skip the winner.
   */
  private async awardWinner(
    winner: RewardUser,
    tiers: PrizeTier[],
    prizesByTier: Map<number, Prize[]>,
    eventId: string,
    request: MysteryBoxRequest
  ): Promise<MysteryPrizeAwarded | null> {
    try {
      const tier = rollTier(tiers, this.random.next());
      const tierId = tier?.tierId ?? COMMON_TIER_ID;
      const candidates = prizesByTier.get(tierId) ?? prizesByTier.get(COMMON_TIER_ID) ?? [];
      const prize = weightedChoice(candidates, this.random.int(1, Math.max(1, totalWeight(candidates))));
      if (!prize) {
        log.warn('No prize for rolled tier', { eventId, tierId, userId: winner.userId });
        return null;
      }

      const result = await this.marketplace.awardPrize({
        prizeId: prize.prizeId,
        userId: winner.userId,
        userEmail: winner.email,
        ...(winner.associateId ? { userEmployeeId: winner.associateId } : {}),
        source: 'mystery_box',
        sourceReferenceId: eventId,
        sourceReferenceType: 'mystery_box_event',
        awardMessage: `You won a mystery box prize from ${request.eventName}!`,
        expiresInDays: request.expiresInDays ?? DEFAULT_MYSTERY_EXPIRY_DAYS,
        metadata: { mysteryBoxEventId: eventId, tierRolled: tierId, eventName: request.eventName },
      });
      if (!result.success) {
        log.info('Mystery box winner skipped', { eventId, userId: winner.userId, prizeId: prize.prizeId, reason: result.error });
        return null;
      }

      const prizeTier = tiers.find(candidate => candidate.tierId === (prize.tierId ?? COMMON_TIER_ID));
      return {
        userId: winner.userId,
        userEmail: winner.email,
        prizeId: prize.prizeId,
        prizeName: prize.prizeName,
        tierId: prizeTier?.tierId ?? tierId,
        tierName: prizeTier?.tierName ?? tier?.tierName ?? 'Common',
        awardId: result.award.awardId,
      };
    } catch (error) {
      log.error('Mystery box award failed', { eventId, userId: winner.userId, error: getErrorMessage(error) });
      return null;
    }
  }
}
