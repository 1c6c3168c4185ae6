/**
 * Reconnection backoff
 */
import type { RetryPolicy } from '../types/index.js';

/**
 * Capped exponential backoff: base * multiplier^(attempt-1), never above maxDelayMs.
 * attempt is 1-based.
 */
export function computeBackoffDelay(attempt: number, policy: RetryPolicy): number {
  if (attempt < 1) {
    return 0;
  }
  const delay = policy.baseDelayMs * Math.pow(policy.multiplier, attempt - 1);
  return Math.min(policy.maxDelayMs, Math.round(delay));
}

/**
 * Whether another reconnection may be attempted after `attempt` failures
 */
export function canRetry(attempt: number, policy: RetryPolicy): boolean {
  return attempt <= policy.maxAttempts;
}

/**
 * Time source. Injected so session timestamps are deterministic in tests.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
