/**
 * Generic Utilities
 *
 * Common utility functions used across services.
 * These are generic helpers that don't depend on service-specific logic.
 * All calendar helpers work in UTC.
 */

import crypto from 'node:crypto';

// ═══════════════════════════════════════════════════════════════════
// Date/Time Utilities
// ═══════════════════════════════════════════════════════════════════

const MS_PER_MINUTE = 60 * 1000;
const MS_PER_DAY = 24 * 60 * MS_PER_MINUTE;

/**
 * Add minutes to a date
 */
export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * MS_PER_MINUTE);
}

/**
 * Add days to a date
 */
export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

/**
 * Midnight (UTC) of the given instant
 */
export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/**
 * Whole seconds elapsed between two instants (never negative)
 */
export function secondsBetween(from: Date, to: Date): number {
  return Math.max(0, Math.floor((to.getTime() - from.getTime()) / 1000));
}

/**
 * Whole days elapsed between two instants (UTC calendar days)
 */
export function daysBetween(from: Date, to: Date): number {
  return Math.floor((startOfUtcDay(to).getTime() - startOfUtcDay(from).getTime()) / MS_PER_DAY);
}

// ═══════════════════════════════════════════════════════════════════
// Identifier Utilities
// ═══════════════════════════════════════════════════════════════════

/**
 * Generate a unique identifier (UUID v4)
 */
export function generateId(): string {
  return crypto.randomUUID();
}

/**
 * Generate a random code from the given alphabet, split into dash-separated groups.
 *
 * @example
 * generateCode('RDM', [5, 5], 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789') // "RDM-7KQ2M-XC4PA"
 */
export function generateCode(prefix: string, groups: number[], alphabet: string): string {
  const parts = groups.map(size => {
    let part = '';
    for (let i = 0; i < size; i++) {
      part += alphabet[crypto.randomInt(alphabet.length)];
    }
    return part;
  });
  return [prefix, ...parts].join('-');
}

/**
 * Normalize email address (lowercase and trim)
 */
export function normalizeEmail(email: string): string {
  return email.toLowerCase().trim();
}
