/**
 * Calendar periods (UTC) used by metric-based rules.
 */

export type Period = 'day' | 'week' | 'month' | 'quarter' | 'year';

export interface DateRange {
  from: Date;
  /** exclusive */
  to: Date;
}

function startOf(period: Period, at: Date): Date {
  const y = at.getUTCFullYear();
  const m = at.getUTCMonth();
  switch (period) {
    case 'day':
      return new Date(Date.UTC(y, m, at.getUTCDate()));
    case 'week': {
      const dayOfWeek = at.getUTCDay() || 7;
      return new Date(Date.UTC(y, m, at.getUTCDate() - dayOfWeek + 1));
    }
    case 'month':
      return new Date(Date.UTC(y, m, 1));
    case 'quarter':
      return new Date(Date.UTC(y, m - (m % 3), 1));
    case 'year':
      return new Date(Date.UTC(y, 0, 1));
  }
}

function shift(period: Period, start: Date, count: number): Date {
  const y = start.getUTCFullYear();
  const m = start.getUTCMonth();
  const d = start.getUTCDate();
  switch (period) {
    case 'day':
      return new Date(Date.UTC(y, m, d + count));
    case 'week':
      return new Date(Date.UTC(y, m, d + 7 * count));
    case 'month':
      return new Date(Date.UTC(y, m + count, 1));
    case 'quarter':
      return new Date(Date.UTC(y, m + 3 * count, 1));
    case 'year':
      return new Date(Date.UTC(y + count, 0, 1));
  }
}

/**
 * The period containing `at`, or the one before it when `previous` is set.
 */
export function periodRange(period: Period, at: Date, previous = false): DateRange {
  const current = startOf(period, at);
  const from = previous ? shift(period, current, -1) : current;
  return { from, to: shift(period, from, 1) };
}

/** Whole days from `at` (UTC date) to the last day of its period */
export function daysUntilPeriodEnd(period: Period, at: Date): number {
  const { to } = periodRange(period, at);
  const today = Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate());
  return Math.round((to.getTime() - today) / 86400000) - 1;
}

/** Weekdays (Mon-Fri) after `at` up to the end of its month */
export function businessDaysRemainingInMonth(at: Date): number {
  const y = at.getUTCFullYear();
  const m = at.getUTCMonth();
  const lastDay = new Date(Date.UTC(y, m + 1, 0)).getUTCDate();
  let count = 0;
  for (let day = at.getUTCDate() + 1; day <= lastDay; day++) {
    const dow = new Date(Date.UTC(y, m, day)).getUTCDay();
    if (dow !== 0 && dow !== 6) count++;
  }
  return count;
}
