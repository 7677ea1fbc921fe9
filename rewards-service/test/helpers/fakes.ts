/**
 * Test doubles for transports, the cache and randomness, plus record factories.
 */

import type { CacheHandle } from 'core-service';
import type { RandomSource } from '../../src/random.js';
import type { NotificationKind, RewardDefinition, RewardUser } from '../../src/types.js';
import type { ChatSender, EmailSender, Recipient } from '../../src/notifications/senders.js';
import type { CelebratedUser, CelebrationNotifier, DeliveryResult } from '../../src/notifications/teams.js';
import type { TemplateRenderer } from '../../src/notifications/templates.js';
import type { Prize } from '../../src/services/marketplace/types.js';

// ═══════════════════════════════════════════════════════════════════
// Transports
// ═══════════════════════════════════════════════════════════════════

export class FakeChatSender implements ChatSender {
  readonly sent: Array<{ recipient: Recipient; message: string }> = [];
  /** Results returned in order; 'delivered' once exhausted */
  results: DeliveryResult[] = [];

  async sendChatMessage(recipient: Recipient, message: string): Promise<DeliveryResult> {
    this.sent.push({ recipient, message });
    return this.results.shift() ?? { status: 'delivered' };
  }
}

export class FakeEmailSender implements EmailSender {
  readonly sent: Array<{ recipient: Recipient; subject: string; body: string; templateName?: string }> = [];
  results: DeliveryResult[] = [];

  async sendEmail(recipient: Recipient, subject: string, body: string, templateName?: string): Promise<DeliveryResult> {
    this.sent.push({ recipient, subject, body, templateName });
    return this.results.shift() ?? { status: 'delivered' };
  }
}

export class FakeCelebrations implements CelebrationNotifier {
  readonly calls: Array<{ url: string; kind: NotificationKind; users: CelebratedUser[]; reward: { name: string; icon?: string } }> = [];
  result: DeliveryResult = { status: 'delivered' };

  async sendCelebration(url: string, kind: NotificationKind, users: CelebratedUser[], reward: { name: string; icon?: string }) {
    this.calls.push({ url, kind, users, reward });
    return this.result;
  }
}

/** Renders `<name>:<reward>` for file templates and returns inline sources unchanged */
export class EchoTemplates implements TemplateRenderer {
  async render(name: string, params: Record<string, unknown>): Promise<string> {
    return `${name}:${String(params.reward)}`;
  }

  renderString(source: string): string {
    return source;
  }
}

// ═══════════════════════════════════════════════════════════════════
// Cache & Randomness
// ═══════════════════════════════════════════════════════════════════

export class MemoryCache implements CacheHandle {
  readonly entries = new Map<string, string>();
  readonly ttls = new Map<string, number | undefined>();

  async get(key: string) {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, value: string, ttlSeconds?: number) {
    this.entries.set(key, value);
    this.ttls.set(key, ttlSeconds);
  }

  async del(key: string) {
    this.entries.delete(key);
  }
}

/**
 * Replays scripted draws. `next` falls back to 0 and `int` to `min` once
 * the scripts run out.
 */
export class ScriptedRandom implements RandomSource {
  constructor(private readonly floats: number[] = [], private readonly ints: number[] = []) {}

  next(): number {
    return this.floats.shift() ?? 0;
  }

  int(min: number, max: number): number {
    const value = this.ints.shift();
    if (value === undefined) return min;
    return Math.min(max, Math.max(min, value));
  }
}

// ═══════════════════════════════════════════════════════════════════
// Factories
// ═══════════════════════════════════════════════════════════════════

export function makeUser(userId: number, overrides: Partial<RewardUser> = {}): RewardUser {
  return {
    userId,
    email: `user${userId}@example.com`,
    displayName: `User ${userId}`,
    groups: [],
    programs: [],
    isActive: true,
    ...overrides,
  };
}

export function makeDefinition(rewardId: number, overrides: Partial<RewardDefinition> = {}): RewardDefinition {
  return {
    rewardId,
    reward: `Reward ${rewardId}`,
    points: 10,
    rewardType: 'manual',
    multiple: false,
    isEnabled: true,
    ...overrides,
  };
}

export function makePrize(prizeId: number, overrides: Partial<Prize> = {}): Prize {
  const created = new Date('2025-01-01T00:00:00Z');
  return {
    prizeId,
    prizeName: `Prize ${prizeId}`,
    pointsCost: 100,
    totalQuantity: null,
    availableQuantity: null,
    reservedQuantity: 0,
    cooldownDays: 0,
    requiresApproval: false,
    isMysteryEligible: true,
    mysteryWeight: 100,
    fulfillmentType: 'manual',
    isActive: true,
    isFeatured: false,
    createdAt: created,
    updatedAt: created,
    ...overrides,
  };
}
