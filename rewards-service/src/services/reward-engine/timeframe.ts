/**
 * Timeframe bucketing (UTC).
 *
 * hourly  -> 2025-03-14T09
 * daily   -> 2025-03-14
 * weekly  -> 2025-W11 (ISO year-week)
 * monthly -> 2025-03
 */

import { ServiceError } from 'core-service';
import { REWARD_ERRORS } from '../../error-codes.js';
import type { RewardDefinition } from '../../types.js';

export const TIMEFRAMES = ['hourly', 'daily', 'weekly', 'monthly'] as const;
export type Timeframe = typeof TIMEFRAMES[number];

const pad = (value: number, size = 2) => String(value).padStart(size, '0');

export function isTimeframe(value: string): value is Timeframe {
  return TIMEFRAMES.some(t => t === value);
}

export function isoWeek(date: Date): { year: number; week: number } {
  const day = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
  // Thursday of this week decides the ISO year
  const dayOfWeek = day.getUTCDay() || 7;
  day.setUTCDate(day.getUTCDate() + 4 - dayOfWeek);
  const yearStart = Date.UTC(day.getUTCFullYear(), 0, 1);
  const week = Math.ceil(((day.getTime() - yearStart) / 86400000 + 1) / 7);
  return { year: day.getUTCFullYear(), week };
}

/**
 * Bucket key of `at` for the given timeframe. Throws on an unknown timeframe.
 */
export function timeframeKey(timeframe: string, at: Date): string {
  if (!isTimeframe(timeframe)) {
    throw new ServiceError(REWARD_ERRORS.InvalidTimeframe, { timeframe });
  }
  const date = `${at.getUTCFullYear()}-${pad(at.getUTCMonth() + 1)}-${pad(at.getUTCDate())}`;
  switch (timeframe) {
    case 'hourly':
      return `${date}T${pad(at.getUTCHours())}`;
    case 'daily':
      return date;
    case 'weekly': {
      const { year, week } = isoWeek(at);
      return `${year}-W${pad(week)}`;
    }
    case 'monthly':
      return `${at.getUTCFullYear()}-${pad(at.getUTCMonth() + 1)}`;
  }
}

export function epochMinutes(at: Date): number {
  return Math.floor(at.getTime() / 60000);
}

/**
 * Idempotency bucket stored on each award. Two awards of one reward to one
 * user can never share a bucket:
 * - single-award rewards: 'once'
 * - timeframe: the timeframe key
 * - cooldown only: the N-minute window the award falls in
 * - otherwise: the award minute
 */
export function awardBucket(
  definition: Pick<RewardDefinition, 'multiple' | 'timeframe' | 'cooldownMinutes'>,
  at: Date
): string {
  if (!definition.multiple) return 'once';
  if (definition.timeframe) {
    return `${definition.timeframe}:${timeframeKey(definition.timeframe, at)}`;
  }
  const cooldown = definition.cooldownMinutes ?? 0;
  if (cooldown > 0) {
    return `cooldown:${Math.floor(epochMinutes(at) / cooldown)}`;
  }
  return `minute:${epochMinutes(at)}`;
}
