/**
 * Message Senders
 *
 * Best-effort transports used by the outbox dispatcher:
 * - chat: Teams incoming webhook (direct award message card)
 * - email: nodemailer SMTP transport, HTML body from a Handlebars template
 *
 * Neither throws: an unconfigured sender reports 'skipped', a failed send
 * reports 'failed' with the error.
 */

import nodemailer from 'nodemailer';
import { createChildLogger, getErrorMessage } from 'core-service';
import type { TemplateRenderer } from './templates.js';
import { buildDirectMessageCard, postAdaptiveCard, type DeliveryResult, type WebhookOptions } from './teams.js';

const log = createChildLogger({ service: 'rewards-service', metadata: { component: 'senders' } });

export interface Recipient {
  name: string;
  address: string;
}

export interface ChatSender {
  sendChatMessage(recipient: Recipient, message: string): Promise<DeliveryResult>;
}

export interface EmailSender {
  sendEmail(
    recipient: Recipient,
    subject: string,
    body: string,
    templateName?: string,
    params?: Record<string, unknown>
  ): Promise<DeliveryResult>;
}

// ═══════════════════════════════════════════════════════════════════
// Chat (Teams)
// ═══════════════════════════════════════════════════════════════════

export class TeamsChatSender implements ChatSender {
  constructor(private readonly webhookUrl: string | undefined, private readonly options: WebhookOptions) {}

  isConfigured(): boolean {
    return Boolean(this.webhookUrl);
  }

  async sendChatMessage(recipient: Recipient, message: string): Promise<DeliveryResult> {
    if (!this.webhookUrl) {
      return { status: 'skipped', reason: 'chat webhook not configured' };
    }
    return postAdaptiveCard(this.webhookUrl, buildDirectMessageCard(recipient.name, message), this.options);
  }
}

// ═══════════════════════════════════════════════════════════════════
// Email (SMTP)
// ═══════════════════════════════════════════════════════════════════

export interface SmtpConfig {
  host?: string;
  port: number;
  secure: boolean;
  user?: string;
  password?: string;
  from: string;
  timeoutMs: number;
}

/** The part of a nodemailer transporter the sender uses */
export interface MailTransport {
  sendMail(mail: { from: string; to: string; subject: string; text: string; html?: string }): Promise<{ messageId: string }>;
}

export class SmtpEmailSender implements EmailSender {
  private readonly transport?: MailTransport;

  constructor(
    private readonly config: SmtpConfig,
    private readonly templates: TemplateRenderer,
    transport?: MailTransport
  ) {
    if (transport) {
      this.transport = transport;
    } else if (config.host) {
      this.transport = nodemailer.createTransport({
        host: config.host,
        port: config.port,
        secure: config.secure,
        auth: config.user ? { user: config.user, pass: config.password } : undefined,
        connectionTimeout: config.timeoutMs,
        socketTimeout: config.timeoutMs,
      });
      log.info('Email sender initialized', { host: config.host, port: config.port });
    }
  }

  isConfigured(): boolean {
    return this.transport !== undefined;
  }

  async sendEmail(
    recipient: Recipient,
    subject: string,
    body: string,
    templateName?: string,
    params: Record<string, unknown> = {}
  ): Promise<DeliveryResult> {
    if (!this.transport) {
      return { status: 'skipped', reason: 'SMTP not configured' };
    }

    try {
      const html = templateName ? await this.templates.render(templateName, { ...params, body }) : undefined;
      const result = await this.transport.sendMail({
        from: this.config.from,
        to: recipient.name ? `"${recipient.name.replace(/"/g, '')}" <${recipient.address}>` : recipient.address,
        subject,
        text: body,
        html,
      });
      log.info('Email sent', { messageId: result.messageId, to: recipient.address });
      return { status: 'delivered' };
    } catch (error) {
      log.error('Failed to send email', { error: getErrorMessage(error), to: recipient.address });
      return { status: 'failed', error: getErrorMessage(error) };
    }
  }
}
