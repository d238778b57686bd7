/**
 * Tracker Relay — HTTP Tracker Check
 *
 * GETs `<endpoint>/announce` and treats any 2xx as alive. No announce
 * parameters are sent; the check only proves the tracker answers.
 */

import type { CheckResult, TrackerEndpoint } from '../types';
import type { Clock } from '../lib/clock';
import { systemClock } from '../lib/clock';
import { classifyFetchError } from '../lib/errors';
import { logger as defaultLogger } from '../lib/logger';
import type { Logger } from '../lib/logger';

export interface HttpProbeOptions {
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  clock?: Clock;
  logger?: Logger;
}

export const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

export const PROBE_USER_AGENT = 'BitTorrent/2.0';

/**
 * Announce URL probed for an HTTP tracker (trailing slashes dropped first).
 */
export function buildAnnounceUrl(endpoint: TrackerEndpoint): string {
  return `${endpoint.replace(/\/+$/, '')}/announce`;
}

export async function checkHttpTracker(
  endpoint: TrackerEndpoint,
  options: HttpProbeOptions = {}
): Promise<CheckResult> {
  if (!endpoint.startsWith('http://') && !endpoint.startsWith('https://')) {
    return { alive: false, latencyMs: 0 };
  }

  const timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  const fetchImpl = options.fetchImpl ?? fetch;
  const clock = options.clock ?? systemClock;
  const log = options.logger ?? defaultLogger;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const start = clock.now();

  try {
    const response = await fetchImpl(buildAnnounceUrl(endpoint), {
      signal: controller.signal,
      headers: { 'User-Agent': PROBE_USER_AGENT },
    });
    await response.arrayBuffer();

    return {
      alive: response.status >= 200 && response.status < 300,
      latencyMs: clock.now() - start,
    };
  } catch (error) {
    const { kind, message } = classifyFetchError(error);
    log.debug('HTTP tracker check failed', { endpoint, kind, error: message });
    return { alive: false, latencyMs: timeoutMs };
  } finally {
    clearTimeout(timeoutId);
  }
}
