/**
 * Availability window and attribute matching against an Environment.
 */

import type { AttributeMatcher, AttributeValue, AvailabilityRule } from '../../types.js';
import type { Environment } from './environment.js';

/** HH:MM[:SS] -> seconds since midnight */
export function parseTimeOfDay(value: string): number {
  const match = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid time of day: ${value}`);
  }
  const [, h, m, s] = match;
  return Number(h) * 3600 + Number(m) * 60 + Number(s ?? 0);
}

/** MM-DD or DD/MM -> MMDD ordinal for comparison within one year */
export function parseMonthDay(value: string): number {
  const trimmed = value.trim();
  const dash = /^(\d{1,2})-(\d{1,2})$/.exec(trimmed);
  const slash = /^(\d{1,2})\/(\d{1,2})$/.exec(trimmed);
  let month: number;
  let day: number;
  if (dash) {
    month = Number(dash[1]);
    day = Number(dash[2]);
  } else if (slash) {
    day = Number(slash[1]);
    month = Number(slash[2]);
  } else {
    throw new Error(`Invalid month-day: ${value}`);
  }
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    throw new Error(`Invalid month-day: ${value}`);
  }
  return month * 100 + day;
}

export function isRangeMatcher(matcher: AttributeMatcher): matcher is { from: number; to: number } {
  return typeof matcher === 'object' && !Array.isArray(matcher);
}

/**
 * Membership for arrays and ranges, strict equality otherwise.
 * A missing attribute never matches.
 */
export function matchesAttribute(actual: AttributeValue | undefined, matcher: AttributeMatcher): boolean {
  if (actual === undefined) return false;
  if (Array.isArray(matcher)) return matcher.includes(actual);
  if (isRangeMatcher(matcher)) {
    return typeof actual === 'number' && actual >= matcher.from && actual <= matcher.to;
  }
  return actual === matcher;
}

export function evaluateEnvironment(rule: AvailabilityRule | undefined, env: Environment): boolean {
  if (!rule) return true;

  if (rule.startTime && rule.endTime) {
    const t = env.timestamp;
    const now = t.getUTCHours() * 3600 + t.getUTCMinutes() * 60 + t.getUTCSeconds();
    if (now < parseTimeOfDay(rule.startTime) || now > parseTimeOfDay(rule.endTime)) {
      return false;
    }
  }

  if (rule.startDate && rule.endDate) {
    const today = (env.timestamp.getUTCMonth() + 1) * 100 + env.timestamp.getUTCDate();
    if (today < parseMonthDay(rule.startDate) || today > parseMonthDay(rule.endDate)) {
      return false;
    }
  }

  return Object.entries(rule.matchers ?? {}).every(([key, matcher]) => matchesAttribute(env.get(key), matcher));
}
