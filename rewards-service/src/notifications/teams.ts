/**
 * Teams Incoming Webhooks
 *
 * Adaptive Card builders for computed-reward celebrations and direct award
 * messages, and the webhook poster shared by both.
 */

import { createChildLogger, getErrorMessage, retry } from 'core-service';
import type { NotificationKind } from '../types.js';

const log = createChildLogger({ service: 'rewards-service', metadata: { component: 'teams' } });

// ═══════════════════════════════════════════════════════════════════
// Card Types
// ═══════════════════════════════════════════════════════════════════

export interface TextBlock {
  type: 'TextBlock';
  text: string;
  wrap?: boolean;
  weight?: 'Bolder';
  size?: 'Large' | 'Medium';
  color?: 'Accent';
  spacing?: 'Medium';
  horizontalAlignment?: 'Center';
}

export interface ImageBlock {
  type: 'Image';
  url: string;
  size: 'Medium';
  horizontalAlignment: 'Center';
}

export interface ContainerBlock {
  type: 'Container';
  items: TextBlock[];
  style: 'emphasis';
  bleed: boolean;
  spacing: 'Medium';
}

export type CardElement = TextBlock | ImageBlock | ContainerBlock;

export interface AdaptiveCard {
  $schema: string;
  type: 'AdaptiveCard';
  version: string;
  body: CardElement[];
}

export interface WebhookMessage {
  type: 'message';
  attachments: Array<{
    contentType: 'application/vnd.microsoft.card.adaptive';
    contentUrl: null;
    content: AdaptiveCard;
  }>;
}

export type DeliveryResult =
  | { status: 'delivered' }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: string };

export interface CelebratedUser {
  displayName: string;
  email: string;
  yearsEmployed?: number;
}

// ═══════════════════════════════════════════════════════════════════
// Card Builders
// ═══════════════════════════════════════════════════════════════════

interface CelebrationCopy {
  title: string;
  intro: string;
  row: (user: CelebratedUser) => string;
  footer: (rewardName: string) => string;
}

const CELEBRATION_COPY: Record<NotificationKind, CelebrationCopy> = {
  birthday: {
    title: '🎉 Birthday Celebrations Today! 🎉',
    intro: 'Please join us in wishing a Happy Birthday to our team members:',
    row: user => `🎂 **${user.displayName}**`,
    footer: name => `🏆 They've been awarded the **${name}**!`,
  },
  anniversary: {
    title: '🏆 Work Anniversaries Today! 🏆',
    intro: 'Congratulations to our team members celebrating their work anniversaries:',
    row: user => `🎊 **${user.displayName}** - ${user.yearsEmployed ?? '?'} year(s)!`,
    footer: name => `🎉 They've been awarded the **${name}**!`,
  },
  generic: {
    title: '🌟 Congratulations! 🌟',
    intro: 'Please join us in congratulating our team members:',
    row: user => `⭐ **${user.displayName}**`,
    footer: name => `🏆 They've been awarded the **${name}**!`,
  },
};

function newCard(body: CardElement[], icon?: string): AdaptiveCard {
  return {
    $schema: 'http://adaptivecards.io/schemas/adaptive-card.json',
    type: 'AdaptiveCard',
    version: '1.5',
    body: icon ? [{ type: 'Image', url: icon, size: 'Medium', horizontalAlignment: 'Center' }, ...body] : body,
  };
}

export function buildCelebrationCard(
  kind: NotificationKind,
  users: CelebratedUser[],
  reward: { name: string; icon?: string }
): AdaptiveCard {
  const copy = CELEBRATION_COPY[kind];
  return newCard(
    [
      { type: 'TextBlock', text: copy.title, weight: 'Bolder', size: 'Large', horizontalAlignment: 'Center', color: 'Accent' },
      { type: 'TextBlock', text: copy.intro, wrap: true, spacing: 'Medium' },
      {
        type: 'Container',
        items: users.map((user): TextBlock => ({ type: 'TextBlock', text: copy.row(user), wrap: true })),
        style: 'emphasis',
        bleed: true,
        spacing: 'Medium',
      },
      { type: 'TextBlock', text: copy.footer(reward.name), wrap: true, spacing: 'Medium', horizontalAlignment: 'Center' },
    ],
    reward.icon
  );
}

export function buildDirectMessageCard(recipientName: string, markdown: string): AdaptiveCard {
  return newCard([
    { type: 'TextBlock', text: `To: **${recipientName}**`, weight: 'Bolder' },
    { type: 'TextBlock', text: markdown, wrap: true, spacing: 'Medium' },
  ]);
}

export function wrapCard(card: AdaptiveCard): WebhookMessage {
  return {
    type: 'message',
    attachments: [{ contentType: 'application/vnd.microsoft.card.adaptive', contentUrl: null, content: card }],
  };
}

// ═══════════════════════════════════════════════════════════════════
// Delivery
// ═══════════════════════════════════════════════════════════════════

class WebhookStatusError extends Error {
  constructor(readonly status: number, body: string) {
    super(`Teams webhook failed: ${status} - ${body.slice(0, 200)}`);
    this.name = 'WebhookStatusError';
  }
}

/** Client errors are final; network failures, timeouts and 5xx are retried */
function isRetryableWebhookError(error: unknown): boolean {
  return !(error instanceof WebhookStatusError) || error.status >= 500 || error.status === 429;
}

export type FetchLike = (url: string, init: { method: string; headers: Record<string, string>; body: string; signal: AbortSignal }) =>
  Promise<{ ok: boolean; status: number; text(): Promise<string> }>;

export interface WebhookOptions {
  timeoutMs: number;
  maxRetries?: number;
  fetch?: FetchLike;
}

/**
 * Post an Adaptive Card. Never throws: failures are logged and returned.
 */
export async function postAdaptiveCard(url: string, card: AdaptiveCard, options: WebhookOptions): Promise<DeliveryResult> {
  const send: FetchLike = options.fetch ?? fetch;
  try {
    await retry(
      async () => {
        const response = await send(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(wrapCard(card)),
          signal: AbortSignal.timeout(options.timeoutMs),
        });
        if (!response.ok) {
          throw new WebhookStatusError(response.status, await response.text());
        }
      },
      { maxRetries: options.maxRetries ?? 2, baseDelay: 500, name: 'TeamsWebhook', isRetryable: isRetryableWebhookError }
    );
    log.info('Teams webhook notification sent');
    return { status: 'delivered' };
  } catch (error) {
    log.error('Teams webhook delivery failed', { error: getErrorMessage(error) });
    return { status: 'failed', error: getErrorMessage(error) };
  }
}

/**
 * Channel-level celebrations for computed-reward batches.
 */
export interface CelebrationNotifier {
  sendCelebration(
    webhookUrl: string,
    kind: NotificationKind,
    users: CelebratedUser[],
    reward: { name: string; icon?: string }
  ): Promise<DeliveryResult>;
}

export class TeamsCelebrationNotifier implements CelebrationNotifier {
  constructor(private readonly options: WebhookOptions) {}

  async sendCelebration(
    webhookUrl: string,
    kind: NotificationKind,
    users: CelebratedUser[],
    reward: { name: string; icon?: string }
  ): Promise<DeliveryResult> {
    if (users.length === 0) {
      return { status: 'skipped', reason: 'no users to celebrate' };
    }
    return postAdaptiveCard(webhookUrl, buildCelebrationCard(kind, users, reward), this.options);
  }
}
