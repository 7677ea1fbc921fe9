/**
 * ComputedReward
 *
 * Scheduler-driven variant of RewardObject: dataset rules supply the
 * candidates, each candidate runs fits -> awardee -> prior awards -> apply,
 * and one channel celebration is posted for everyone awarded in the run.
 */

import type { CacheHandle } from 'core-service';
import { getErrorMessage } from 'core-service';
import type { NotificationKind } from '../../types.js';
import type { CelebratedUser, CelebrationNotifier } from '../../notifications/teams.js';
import { Environment } from './environment.js';
import { RewardObject } from './reward-object.js';
import { isDatasetRule, type FailedCondition, type RewardConnections } from './types.js';

export interface ComputedRuntime {
  connections: RewardConnections;
  celebrations: CelebrationNotifier;
  cache?: CacheHandle;
  /** Evaluation instant; defaults to now */
  now?: Date;
}

export interface ComputedRunSummary {
  rewardId: number;
  candidates: number;
  awarded: CelebratedUser[];
  skipped: number;
  errors: number;
  notified: boolean;
}

export class ComputedReward extends RewardObject {
  get notificationKind(): NotificationKind {
    return this.definition.notificationKind ?? 'generic';
  }

  /**
   * Channel webhook: the definition's own, or one carried in its attributes.
   */
  get webhookUrl(): string | undefined {
    if (this.definition.teamsWebhook) return this.definition.teamsWebhook;
    const attributes = this.definition.attributes ?? {};
    for (const key of ['teamsWebhook', 'teams_webhook']) {
      const value = attributes[key];
      if (typeof value === 'string' && value.length > 0) return value;
    }
    return undefined;
  }

  async callReward(runtime: ComputedRuntime): Promise<ComputedRunSummary> {
    const env = new Environment(runtime.connections, { timestamp: runtime.now, cache: runtime.cache });
    const summary: ComputedRunSummary = {
      rewardId: this.rewardId,
      candidates: 0,
      awarded: [],
      skipped: 0,
      errors: 0,
      notified: false,
    };

    for (const rule of this.rules) {
      if (!isDatasetRule(rule) || !rule.fitsComputed(env)) continue;

      const candidates = await rule.evaluateDataset(env);
      summary.candidates += candidates.length;

      for (const ctx of candidates) {
        const failed: FailedCondition[] = [];
        if (!this.fits(ctx, env, failed) || !(await this.checkAwardee(ctx)) || (await this.hasAwarded(ctx.user, env))) {
          this.log.debug('Candidate skipped', { userId: ctx.user.userId, failed });
          summary.skipped++;
          continue;
        }

        const result = await this.apply(ctx, env);
        if (!result.ok) {
          this.log.warn('Computed award failed', { userId: ctx.user.userId, error: result.error });
          summary.errors++;
          continue;
        }

        const years = ctx.args.yearsEmployed;
        summary.awarded.push({
          displayName: ctx.user.displayName,
          email: ctx.user.email,
          ...(typeof years === 'number' ? { yearsEmployed: years } : {}),
        });
      }
    }

    summary.notified = await this.celebrate(runtime.celebrations, summary.awarded);
    this.log.info('Computed reward run finished', {
      reward: this.name,
      candidates: summary.candidates,
      awarded: summary.awarded.length,
      skipped: summary.skipped,
      errors: summary.errors,
    });
    return summary;
  }

  /**
   * One celebration per run. Failures are logged and never fail the batch.
   */
  private async celebrate(notifier: CelebrationNotifier, users: CelebratedUser[]): Promise<boolean> {
    const url = this.webhookUrl;
    if (!url || users.length === 0) return false;

    try {
      const result = await notifier.sendCelebration(url, this.notificationKind, users, {
        name: this.name,
        icon: this.definition.icon,
      });
      if (result.status === 'failed') {
        this.log.warn('Celebration webhook failed', { reward: this.name, error: result.error });
        return false;
      }
      return result.status === 'delivered';
    } catch (error) {
      this.log.warn('Celebration webhook failed', { reward: this.name, error: getErrorMessage(error) });
      return false;
    }
  }
}
