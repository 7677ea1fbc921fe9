/**
 * Backoff and retry for outbound calls (webhooks, SMTP, outbox redelivery).
 *
 * `calculateDelay` is shared with the outbox, which stores the next attempt
 * time instead of sleeping in-process.
 */

import { logger } from '../logger.js';
import { getErrorMessage } from '../errors.js';

export type RetryStrategy = 'exponential' | 'linear' | 'fixed';

export interface RetryConfig {
  /** Retries after the first call (default 3) */
  maxRetries?: number;
  strategy?: RetryStrategy;
  /** Milliseconds (default 100) */
  baseDelay?: number;
  /** Milliseconds (default 5000) */
  maxDelay?: number;
  /** Sleep a random share of the computed delay (default true) */
  jitter?: boolean;
  /** Label used in log lines */
  name?: string;
  isRetryable?: (error: unknown) => boolean;
}

export interface RetryResult<T> {
  result: T;
  attempts: number;
  totalDelay: number;
}

const backoff: Record<RetryStrategy, (attempt: number, base: number) => number> = {
  exponential: (attempt, base) => base * 2 ** (attempt - 1),
  linear: (attempt, base) => base * attempt,
  fixed: (_attempt, base) => base,
};

/**
 * Delay before retry number `attempt` (1-based), capped at `maxDelay`.
 */
export function calculateDelay(attempt: number, strategy: RetryStrategy, baseDelay: number, maxDelay: number): number {
  return Math.min(backoff[strategy](attempt, baseDelay), maxDelay);
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export async function retry<T>(fn: () => Promise<T>, config: RetryConfig = {}): Promise<RetryResult<T>> {
  const maxRetries = config.maxRetries ?? 3;
  const strategy = config.strategy ?? 'exponential';
  const label = config.name ?? 'Retry';
  const retryable = config.isRetryable ?? (() => true);

  let attempts = 0;
  let totalDelay = 0;

  for (;;) {
    attempts++;
    try {
      const result = await fn();
      if (attempts > 1) {
        logger.info(`${label} succeeded on attempt ${attempts}`, { totalDelay });
      }
      return { result, attempts, totalDelay };
    } catch (error) {
      if (!retryable(error)) {
        logger.debug(`${label} failed with a final error`, { error: getErrorMessage(error), attempts });
        throw error;
      }
      if (attempts > maxRetries) {
        logger.error(`${label} gave up after ${attempts} attempts`, { totalDelay, error: getErrorMessage(error) });
        throw error;
      }

      const computed = calculateDelay(attempts, strategy, config.baseDelay ?? 100, config.maxDelay ?? 5000);
      const wait = config.jitter === false ? computed : Math.floor(Math.random() * computed);
      totalDelay += wait;
      logger.debug(`${label} retrying in ${wait}ms`, { attempt: attempts, strategy });
      await sleep(wait);
    }
  }
}
