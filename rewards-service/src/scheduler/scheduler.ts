/**
 * Interval Scheduler
 *
 * Ticks with setInterval and runs every job whose trigger matches the
 * current UTC minute. A job fires at most once per minute and never
 * overlaps itself; job errors are logged. Each run gets its own correlation id.
 */

import { createChildLogger, generateCorrelationId, getErrorMessage, ServiceError, withCorrelationId } from 'core-service';
import { REWARD_ERRORS } from '../error-codes.js';
import type { ServiceContext } from '../service-context.js';
import type { JobDescriptor, JobTrigger, Scheduler } from './types.js';

const log = createChildLogger({ service: 'rewards-service', metadata: { component: 'scheduler' } });

export interface IntervalSchedulerOptions {
  tickMs?: number;
  clock?: () => Date;
}

export function isDue(trigger: JobTrigger, now: Date): boolean {
  const minute = now.getUTCMinutes();
  const hour = now.getUTCHours();
  if (trigger.weekdays && !trigger.weekdays.includes(now.getUTCDay())) return false;

  if (trigger.kind === 'daily') {
    return hour === trigger.hour && minute === trigger.minute;
  }
  if (trigger.hours && (hour < trigger.hours[0] || hour > trigger.hours[1])) return false;
  return minute % trigger.everyMinutes === 0;
}

/** Identifies a UTC minute so each job fires once per matching minute */
function minuteKey(now: Date): number {
  return Math.floor(now.getTime() / 60_000);
}

export class IntervalScheduler implements Scheduler {
  private readonly jobs = new Map<string, JobDescriptor>();
  private readonly lastFired = new Map<string, number>();
  private readonly running = new Set<string>();
  private timer: NodeJS.Timeout | null = null;
  private readonly tickMs: number;
  private readonly clock: () => Date;

  constructor(private readonly ctx: ServiceContext, options: IntervalSchedulerOptions = {}) {
    this.tickMs = options.tickMs ?? 15_000;
    this.clock = options.clock ?? (() => new Date());
  }

  register(job: JobDescriptor): void {
    if (job.trigger.kind === 'interval' && (!Number.isInteger(job.trigger.everyMinutes) || job.trigger.everyMinutes <= 0)) {
      throw new Error(`Job ${job.id}: everyMinutes must be a positive integer`);
    }
    this.jobs.set(job.id, job);
    log.debug('Job registered', { id: job.id, trigger: job.trigger });
  }

  list(): JobDescriptor[] {
    return Array.from(this.jobs.values());
  }

  start(): void {
    if (this.timer) {
      log.warn('Scheduler already running');
      return;
    }
    log.info('Starting scheduler', { jobs: this.jobs.size, tickMs: this.tickMs });
    this.timer = setInterval(() => {
      void this.tick();
    }, this.tickMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    log.info('Stopped scheduler');
  }

  /**
   * Fire the jobs due at `now`. Returns the ids started on this tick.
   */
  async tick(now: Date = this.clock()): Promise<string[]> {
    const key = minuteKey(now);
    const due = this.list().filter(job => isDue(job.trigger, now) && this.lastFired.get(job.id) !== key);
    for (const job of due) {
      this.lastFired.set(job.id, key);
    }
    await Promise.all(due.map(job => this.execute(job)));
    return due.map(job => job.id);
  }

  async runNow(id: string): Promise<unknown> {
    const job = this.jobs.get(id);
    if (!job) {
      throw new ServiceError(REWARD_ERRORS.JobNotFound, { id });
    }
    return job.handler(this.ctx, job.args ?? {});
  }

  private async execute(job: JobDescriptor): Promise<void> {
    if (this.running.has(job.id)) {
      log.warn('Job still running, skipping', { id: job.id });
      return;
    }
    this.running.add(job.id);
    const started = Date.now();
    try {
      await withCorrelationId(generateCorrelationId(), async () => {
        await job.handler(this.ctx, job.args ?? {});
        log.debug('Job finished', { id: job.id, durationMs: Date.now() - started });
      });
    } catch (error) {
      log.error('Job failed', { id: job.id, error: getErrorMessage(error) });
    } finally {
      this.running.delete(job.id);
    }
  }
}
