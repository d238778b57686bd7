/**
 * Tracker Relay — Feed Aggregator
 *
 * Orchestrates list ingestion:
 * 1. Fetch every source through the worker pool
 * 2. Parse each body into a set of endpoints
 * 3. Merge once all fetches have settled
 * 4. Return the sorted union and per-source outcomes
 *
 * A failed source contributes nothing and never removes what others found.
 */

import type { AggregateResult, SourceResult, TrackerEndpoint } from '../types';
import { systemClock } from '../lib/clock';
import { logger as defaultLogger } from '../lib/logger';
import { runPool } from '../lib/pool';
import { fetchSource } from './fetcher';
import type { FetchSourceOptions } from './fetcher';

// ============================================================
// TYPES
// ============================================================

export interface AggregatorOptions extends FetchSourceOptions {
  /** Concurrent fetches (default: 4) */
  poolWidth?: number;
}

interface FetchedSource {
  index: number;
  result: SourceResult;
  endpoints: Set<TrackerEndpoint>;
}

const DEFAULT_POOL_WIDTH = 4;

// ============================================================
// PARSING & MERGING
// ============================================================

/**
 * Split a list body into trimmed, non-empty lines.
 */
export function parseTrackerList(body: string): Set<TrackerEndpoint> {
  const endpoints = new Set<TrackerEndpoint>();

  for (const line of body.split(/\r\n|\r|\n/)) {
    const trimmed = line.trim();
    if (trimmed) {
      endpoints.add(trimmed);
    }
  }

  return endpoints;
}

/**
 * Code-unit order, independent of locale.
 */
export function compareEndpoints(a: TrackerEndpoint, b: TrackerEndpoint): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Union of endpoint sets as a sorted list.
 * Commutative and idempotent: input order never changes the output.
 */
export function mergeTrackerSets(sets: Iterable<Iterable<TrackerEndpoint>>): TrackerEndpoint[] {
  const union = new Set<TrackerEndpoint>();

  for (const set of sets) {
    for (const endpoint of set) {
      union.add(endpoint);
    }
  }

  return [...union].sort(compareEndpoints);
}

// ============================================================
// MAIN AGGREGATOR
// ============================================================

/**
 * Fetch all sources and merge their endpoints.
 */
export async function fetchAndAggregate(
  sources: readonly string[],
  options: AggregatorOptions = {}
): Promise<AggregateResult> {
  const clock = options.clock ?? systemClock;
  const startTime = clock.now();
  const log = options.logger ?? defaultLogger;
  const poolWidth = options.poolWidth ?? DEFAULT_POOL_WIDTH;

  log.info('Fetching tracker sources', { sources: sources.length, poolWidth });

  const fetched = await runPool(sources, poolWidth, async (url, index): Promise<FetchedSource> => {
    const sourceStart = clock.now();
    const result = await fetchSource(url, options);
    const durationMs = clock.now() - sourceStart;

    if (!result.ok) {
      return {
        index,
        result: { url, outcome: { status: 'failed', failure: result.error }, durationMs },
        endpoints: new Set(),
      };
    }

    const endpoints = parseTrackerList(result.value);
    log.info('Source parsed', { url, trackers: endpoints.size });

    return {
      index,
      result: { url, outcome: { status: 'success', count: endpoints.size }, durationMs },
      endpoints,
    };
  });

  const endpoints = mergeTrackerSets(fetched.map(f => f.endpoints));
  const sourceResults = fetched
    .sort((a, b) => a.index - b.index)
    .map(f => f.result);

  const failed = sourceResults.filter(s => s.outcome.status === 'failed').length;
  const durationMs = clock.now() - startTime;

  log.info('Tracker sources aggregated', {
    sources: sources.length,
    failed,
    unique: endpoints.length,
    durationMs,
  });

  return { endpoints, sources: sourceResults, durationMs };
}
