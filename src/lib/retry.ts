/**
 * Tracker Relay — Retry Helpers
 *
 * Exponential backoff shared by the source fetcher and the publish client.
 */

import type { RetryPolicy } from '../types';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 2_000,
};

/**
 * Delay before the attempt after `attempt` (0-based): `base * 2^attempt`.
 */
export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * Math.pow(2, attempt);
}

/**
 * Whether another attempt follows `attempt` (0-based) under the policy.
 */
export function hasNextAttempt(attempt: number, policy: RetryPolicy): boolean {
  return attempt < policy.maxAttempts - 1;
}
