/**
 * Evaluation Environment
 *
 * Point-in-time snapshot shared by one evaluation batch: timestamp, derived
 * calendar attributes (UTC), the store bundle and an optional cache.
 */

import type { CacheHandle } from 'core-service';
import type { AttributeValue } from '../../types.js';
import type { RewardConnections } from './types.js';
import { isoWeek } from './timeframe.js';

export interface EnvironmentOptions {
  timestamp?: Date;
  cache?: CacheHandle;
  /** Extra attributes matched by availability rules; override derived ones */
  attributes?: Record<string, AttributeValue>;
}

export class Environment {
  readonly timestamp: Date;
  /** YYYY-MM-DD (UTC) */
  readonly curdate: string;
  readonly attributes: Readonly<Record<string, AttributeValue>>;
  readonly cache?: CacheHandle;

  constructor(readonly connection: RewardConnections, options: EnvironmentOptions = {}) {
    this.timestamp = options.timestamp ?? new Date();
    this.cache = options.cache;
    this.curdate = this.timestamp.toISOString().slice(0, 10);
    this.attributes = { ...calendarAttributes(this.timestamp), ...options.attributes };
  }

  get(key: string): AttributeValue | undefined {
    return this.attributes[key];
  }

  /** Same connections and cache at another instant */
  at(timestamp: Date): Environment {
    return new Environment(this.connection, { timestamp, cache: this.cache });
  }
}

/**
 * dayOfWeek is ISO (1 = Monday ... 7 = Sunday)
 */
export function calendarAttributes(at: Date): Record<string, AttributeValue> {
  const dayOfWeek = at.getUTCDay() || 7;
  const month = at.getUTCMonth() + 1;
  return {
    hour: at.getUTCHours(),
    minute: at.getUTCMinutes(),
    dayOfWeek,
    dayOfMonth: at.getUTCDate(),
    month,
    quarter: Math.ceil(month / 3),
    year: at.getUTCFullYear(),
    isoWeek: isoWeek(at).week,
    isWeekend: dayOfWeek >= 6,
  };
}
