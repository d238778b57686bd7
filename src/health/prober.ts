/**
 * Tracker Relay — Health Prober
 *
 * Dispatches each endpoint to the check for its scheme and scores the result.
 * Probes are independent, so they run through the worker pool and come back
 * in completion order.
 */

import type { ProbeResult, TrackerEndpoint } from '../types';
import { systemClock } from '../lib/clock';
import { logger as defaultLogger } from '../lib/logger';
import { runPool } from '../lib/pool';
import { checkHttpTracker } from './http-probe';
import type { HttpProbeOptions } from './http-probe';
import { checkUdpTracker } from './udp-probe';
import type { UdpProbeOptions } from './udp-probe';
import { classifyScheme, scoreProbe } from './scoring';

export interface ProbeOptions extends HttpProbeOptions, UdpProbeOptions {
  /** Concurrent probes (default: 4) */
  poolWidth?: number;
}

const DEFAULT_POOL_WIDTH = 4;

/**
 * Probe a single endpoint. Never throws: every failure is a dead tracker.
 */
export async function checkTrackerHealth(
  endpoint: TrackerEndpoint,
  options: ProbeOptions = {}
): Promise<ProbeResult> {
  const scheme = classifyScheme(endpoint);

  switch (scheme) {
    case 'udp': {
      const { alive, latencyMs } = await checkUdpTracker(endpoint, options);
      return { endpoint, scheme, alive, latencyMs, score: scoreProbe(alive, latencyMs) };
    }
    case 'http':
    case 'https': {
      const { alive, latencyMs } = await checkHttpTracker(endpoint, options);
      return { endpoint, scheme, alive, latencyMs, score: scoreProbe(alive, latencyMs) };
    }
    case 'other':
      return { endpoint, scheme, alive: false, latencyMs: 0, score: 0 };
  }
}

/**
 * Probe every endpoint with bounded concurrency.
 */
export async function probeEndpoints(
  endpoints: readonly TrackerEndpoint[],
  options: ProbeOptions = {}
): Promise<ProbeResult[]> {
  const log = options.logger ?? defaultLogger;
  const poolWidth = options.poolWidth ?? DEFAULT_POOL_WIDTH;
  const clock = options.clock ?? systemClock;
  const startTime = clock.now();

  log.info('Probing tracker health', { endpoints: endpoints.length, poolWidth });

  const results = await runPool(endpoints, poolWidth, endpoint => checkTrackerHealth(endpoint, options), {
    onResult: result =>
      log.debug('Tracker probed', {
        endpoint: result.endpoint,
        alive: result.alive,
        latencyMs: result.latencyMs,
        score: result.score,
      }),
  });

  log.info('Tracker health probed', {
    endpoints: results.length,
    alive: results.filter(r => r.alive).length,
    durationMs: clock.now() - startTime,
  });

  return results;
}
