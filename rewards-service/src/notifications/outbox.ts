/**
 * Notification Outbox
 *
 * Awards enqueue a `reward.awarded` message in the same unit of work as the
 * award insert. The dispatcher drains due messages, delivers each channel
 * once, and reschedules failures with exponential backoff until
 * `maxAttempts`, after which the message is parked as 'failed'.
 */

import { calculateDelay, createChildLogger, generateId, getErrorMessage } from 'core-service';
import type { AwardRecord, DeliveryChannel, OutboxMessage, RewardDefinition } from '../types.js';
import type { OutboxStore } from '../services/reward-engine/types.js';
import type { ChatSender, EmailSender, Recipient } from './senders.js';
import type { TemplateRenderer } from './templates.js';
import type { DeliveryResult } from './teams.js';

const log = createChildLogger({ service: 'rewards-service', metadata: { component: 'outbox' } });

// ═══════════════════════════════════════════════════════════════════
// Message Factory
// ═══════════════════════════════════════════════════════════════════

export function createRewardAwardedMessage(
  definition: Pick<RewardDefinition, 'icon' | 'emoji' | 'message'>,
  award: AwardRecord,
  now: Date = new Date()
): OutboxMessage {
  return {
    id: generateId(),
    kind: 'reward.awarded',
    payload: {
      awardId: award.awardId,
      rewardId: award.rewardId,
      reward: award.reward,
      icon: definition.icon,
      emoji: definition.emoji,
      points: award.points,
      message: award.message,
      rewardMessage: definition.message,
      receiverUser: award.receiverUser,
      receiverEmail: award.receiverEmail,
      receiverName: award.receiverName,
      giverName: award.giverName,
      awardedAt: award.awardedAt,
    },
    status: 'pending',
    attempts: 0,
    delivered: [],
    nextAttemptAt: now,
    createdAt: now,
  };
}

// ═══════════════════════════════════════════════════════════════════
// Dispatcher
// ═══════════════════════════════════════════════════════════════════

export interface OutboxDispatcherOptions {
  batchSize: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface DrainSummary {
  processed: number;
  sent: number;
  retried: number;
  failed: number;
}

export interface OutboxDeps {
  templates: TemplateRenderer;
  chat: ChatSender;
  email: EmailSender;
}

export class OutboxDispatcher {
  private draining = false;

  constructor(
    private readonly outbox: OutboxStore,
    private readonly deps: OutboxDeps,
    private readonly options: OutboxDispatcherOptions
  ) {}

  /**
   * Deliver due messages. Overlapping calls return an empty summary.
   */
  async drain(now: Date = new Date()): Promise<DrainSummary> {
    const summary: DrainSummary = { processed: 0, sent: 0, retried: 0, failed: 0 };
    if (this.draining) return summary;
    this.draining = true;

    try {
      const messages = await this.outbox.claimDue(now, this.options.batchSize);
      for (const message of messages) {
        summary.processed++;
        const outcome = await this.dispatch(message, now);
        summary[outcome]++;
      }
    } finally {
      this.draining = false;
    }

    if (summary.processed > 0) {
      log.info('Outbox drained', { ...summary });
    }
    return summary;
  }

  private async dispatch(message: OutboxMessage, now: Date): Promise<'sent' | 'retried' | 'failed'> {
    const delivered = new Set<DeliveryChannel>(message.delivered);
    const errors: string[] = [];

    for (const channel of ['chat', 'email'] as const) {
      if (delivered.has(channel)) continue;
      const result = await this.deliver(channel, message);
      if (result.status === 'failed') {
        errors.push(`${channel}: ${result.error}`);
      } else {
        delivered.add(channel);
      }
    }

    const deliveredList = Array.from(delivered);
    if (errors.length === 0) {
      await this.outbox.markSent(message.id, deliveredList, now);
      return 'sent';
    }

    const attempts = message.attempts + 1;
    const lastError = errors.join('; ');
    if (attempts >= this.options.maxAttempts) {
      await this.outbox.markFailed(message.id, { attempts, delivered: deliveredList, lastError });
      log.error('Outbox message failed permanently', { id: message.id, kind: message.kind, attempts, lastError });
      return 'failed';
    }

    const delay = calculateDelay(attempts, 'exponential', this.options.baseDelayMs, this.options.maxDelayMs);
    await this.outbox.markRetry(message.id, {
      attempts,
      delivered: deliveredList,
      nextAttemptAt: new Date(now.getTime() + delay),
      lastError,
    });
    log.warn('Outbox message rescheduled', { id: message.id, attempts, delayMs: delay, lastError });
    return 'retried';
  }

  private async deliver(channel: DeliveryChannel, message: OutboxMessage): Promise<DeliveryResult> {
    const { payload } = message;
    const recipient: Recipient = { name: payload.receiverName || payload.receiverEmail, address: payload.receiverEmail };
    const params: Record<string, unknown> = { ...payload };

    try {
      if (channel === 'chat') {
        const text = await this.deps.templates.render('to_user', params);
        return await this.deps.chat.sendChatMessage(recipient, text);
      }
      return await this.deps.email.sendEmail(
        recipient,
        `Congratulations! You've received a reward: ${payload.reward}`,
        this.emailBody(message),
        'email',
        params
      );
    } catch (error) {
      return { status: 'failed', error: getErrorMessage(error) };
    }
  }

  private emailBody(message: OutboxMessage): string {
    const { payload } = message;
    if (!payload.rewardMessage) return payload.message;
    try {
      return this.deps.templates.renderString(payload.rewardMessage, { ...payload });
    } catch (error) {
      log.warn('Email body render failed, using raw message', { id: message.id, error: getErrorMessage(error) });
      return payload.rewardMessage;
    }
  }
}
