import { RetryPolicy } from '../types';
import { RETRY_DEFAULTS } from '../constants';
import { Logger } from './logger';

export interface RetryOptions {
  logger?: Logger;
  // Shown in the warning, e.g. the request target
  label?: string;
  sleep?: (ms: number) => Promise<void>;
  // Uniform in [0, 1)
  random?: () => number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: RETRY_DEFAULTS.MAX_ATTEMPTS,
  baseDelayMs: RETRY_DEFAULTS.BASE_DELAY_MS
};

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Full-jitter exponential backoff: uniform in [0, baseDelayMs * 2^attemptIndex)
 */
export function backoffDelay(attemptIndex: number, baseDelayMs: number, random: () => number = Math.random): number {
  return random() * baseDelayMs * Math.pow(2, attemptIndex);
}

/**
 * Run `operation` up to `policy.maxAttempts` times. Every failure except the
 * last is logged as a warning and followed by a jittered sleep; the last one
 * is rethrown.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {}
): Promise<T> {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${policy.maxAttempts}`);
  }

  const wait = options.sleep ?? sleep;
  const random = options.random ?? Math.random;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt + 1 >= policy.maxAttempts) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, policy.baseDelayMs, random);
      const reason = error instanceof Error ? error.message : String(error);
      const target = options.label ? ` ${options.label}` : '';
      options.logger?.warn(
        `Attempt ${attempt + 1}/${policy.maxAttempts}${target} failed: ${reason}; retrying in ${Math.round(delayMs)}ms`
      );
      await wait(delayMs);
    }
  }
}
