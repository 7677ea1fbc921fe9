/**
 * Injectable randomness for draws (rule sampling, tier rolls, weighted choice).
 */

import crypto from 'node:crypto';

export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
  /** Uniform integer in [min, max] (inclusive) */
  int(min: number, max: number): number;
}

export const defaultRandom: RandomSource = {
  next: () => Math.random(),
  int: (min, max) => crypto.randomInt(min, max + 1),
};

/**
 * Uniform sample of `count` items without replacement (partial Fisher-Yates).
 */
export function sample<T>(items: readonly T[], count: number, random: RandomSource = defaultRandom): T[] {
  const pool = [...items];
  const size = Math.max(0, Math.min(count, pool.length));
  for (let i = 0; i < size; i++) {
    const j = random.int(i, pool.length - 1);
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, size);
}
