/**
 * Prize Tiers
 *
 * Tier table read from the store (seeded with the defaults when empty) and
 * cached under `rewards:tiers`.
 */

import { cached, createChildLogger, type CacheHandle } from 'core-service';
import { reviveTiers } from './schemas.js';
import type { MarketplaceStore, PrizeTier } from './types.js';

const log = createChildLogger({ service: 'rewards-service', metadata: { component: 'tiers' } });

export const TIERS_CACHE_KEY = 'rewards:tiers';

/** Tier assumed for prizes without one, and the fallback pool of a roll */
export const COMMON_TIER_ID = 1;

export const DEFAULT_TIERS: readonly PrizeTier[] = [
  { tierId: 1, tierName: 'Common', tierLevel: 1, dropRate: 0.4, colorCode: '#9E9E9E' },
  { tierId: 2, tierName: 'Uncommon', tierLevel: 2, dropRate: 0.3, colorCode: '#4CAF50' },
  { tierId: 3, tierName: 'Rare', tierLevel: 3, dropRate: 0.18, colorCode: '#2196F3' },
  { tierId: 4, tierName: 'Epic', tierLevel: 4, dropRate: 0.09, colorCode: '#9C27B0' },
  { tierId: 5, tierName: 'Legendary', tierLevel: 5, dropRate: 0.03, colorCode: '#FF9800' },
];

export function sortTiers(tiers: readonly PrizeTier[]): PrizeTier[] {
  return [...tiers].sort((a, b) => a.tierLevel - b.tierLevel);
}

/**
 * Tiers ordered by level, ascending.
 */
export async function loadTiers(store: MarketplaceStore, cache: CacheHandle | undefined, ttlSeconds: number): Promise<PrizeTier[]> {
  return cached(
    cache,
    TIERS_CACHE_KEY,
    ttlSeconds,
    async () => {
      const stored = await store.listTiers();
      if (stored.length > 0) return sortTiers(stored);
      log.info('Seeding default prize tiers', { count: DEFAULT_TIERS.length });
      const seeded = DEFAULT_TIERS.map(tier => ({ ...tier }));
      await store.saveTiers(seeded);
      return seeded;
    },
    raw => {
      const tiers = reviveTiers(raw);
      return tiers ? sortTiers(tiers) : null;
    }
  );
}

/**
 * Replace drop rates by tier id. Rates are not renormalized.
 */
export function applyTierOverrides(tiers: readonly PrizeTier[], overrides: Readonly<Record<string, number>> = {}): PrizeTier[] {
  return tiers.map(tier => {
    const override = overrides[String(tier.tierId)];
    return override === undefined ? { ...tier } : { ...tier, dropRate: override };
  });
}
