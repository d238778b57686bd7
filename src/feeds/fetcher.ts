/**
 * Tracker Relay — Source Fetcher
 *
 * Retrieves the raw text of one tracker list.
 *
 * - Timeouts and connection errors are retried with exponential backoff
 * - An HTTP error status is definitive and returned at once as `HTTP <code>`
 * - Exhausting the attempts yields `max_retries_exhausted`
 */

import type { RetryPolicy, SourceFailure } from '../types';
import type { Clock } from '../lib/clock';
import { systemClock } from '../lib/clock';
import { classifyFetchError, isTransient } from '../lib/errors';
import type { TransportError } from '../lib/errors';
import { logger as defaultLogger } from '../lib/logger';
import type { Logger } from '../lib/logger';
import { fail, ok } from '../lib/result';
import type { Result } from '../lib/result';
import { DEFAULT_RETRY_POLICY, backoffDelay, hasNextAttempt } from '../lib/retry';

// ============================================================
// TYPES
// ============================================================

export interface FetchSourceOptions {
  /** Per-attempt timeout in ms (default: 10000) */
  timeoutMs?: number;
  retry?: RetryPolicy;
  fetchImpl?: typeof fetch;
  clock?: Clock;
  logger?: Logger;
}

export const DEFAULT_SOURCE_TIMEOUT_MS = 10_000;

export const MAX_RETRIES_EXHAUSTED = 'max_retries_exhausted';

// ============================================================
// FETCH
// ============================================================

/**
 * Fetch one source, returning its body or a typed failure.
 */
export async function fetchSource(
  url: string,
  options: FetchSourceOptions = {}
): Promise<Result<string, SourceFailure>> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_SOURCE_TIMEOUT_MS;
  const policy = options.retry ?? DEFAULT_RETRY_POLICY;
  const fetchImpl = options.fetchImpl ?? fetch;
  const clock = options.clock ?? systemClock;
  const log = (options.logger ?? defaultLogger).child({ url });

  let lastError: TransportError | undefined;

  for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetchImpl(url, { signal: controller.signal });

      if (!response.ok) {
        log.error('Source returned an error status', { status: response.status });
        return fail({ kind: 'http-status', url, reason: `HTTP ${response.status}` });
      }

      const body = await response.text();
      log.info('Source fetched', { attempt: attempt + 1, bytes: body.length });
      return ok(body);
    } catch (error) {
      const transportError = classifyFetchError(error);

      if (!isTransient(transportError)) {
        log.error('Source fetch failed', { error: transportError.message });
        return fail({
          kind: 'unexpected',
          url,
          reason: transportError.message,
          cause: transportError.message,
        });
      }

      lastError = transportError;
      const willRetry = hasNextAttempt(attempt, policy);
      const delayMs = willRetry ? backoffDelay(attempt, policy.baseDelayMs) : 0;

      log.warn(transportError.kind === 'timeout' ? 'Source request timed out' : 'Source connection error', {
        attempt: attempt + 1,
        maxAttempts: policy.maxAttempts,
        error: transportError.message,
        retryInMs: willRetry ? delayMs : undefined,
      });

      if (willRetry) {
        await clock.sleep(delayMs);
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }

  return fail({
    kind: 'retries-exhausted',
    url,
    reason: MAX_RETRIES_EXHAUSTED,
    cause: lastError?.message,
  });
}
