/**
 * Scheduler Types
 *
 * Jobs are plain descriptors: an id, a trigger, a handler taking the
 * service context, and the argument bag passed to it. Triggers are
 * evaluated in UTC.
 */

import type { ServiceContext } from '../service-context.js';

export type JobArgs = Record<string, unknown>;

export type JobTrigger =
  | {
      kind: 'interval';
      /** Fires on minutes divisible by this value (0 and 30 for 30) */
      everyMinutes: number;
      /** Inclusive hour window */
      hours?: [from: number, to: number];
      /** 0 = Sunday ... 6 = Saturday */
      weekdays?: number[];
    }
  | { kind: 'daily'; hour: number; minute: number; weekdays?: number[] };

export type JobHandler = (ctx: ServiceContext, args: JobArgs) => Promise<unknown>;

export interface JobDescriptor {
  id: string;
  name?: string;
  trigger: JobTrigger;
  handler: JobHandler;
  args?: JobArgs;
}

export interface Scheduler {
  /** Adds the job, replacing any job registered under the same id */
  register(job: JobDescriptor): void;
  start(): void;
  stop(): void;
  runNow(id: string): Promise<unknown>;
}

export const WEEKDAYS = [1, 2, 3, 4, 5];
