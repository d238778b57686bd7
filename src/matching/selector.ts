/**
 * Tracker Relay — Selector
 *
 * Final ranking and capping of probe results.
 * Probe results arrive in completion order, so equal scores are broken by
 * endpoint string to keep the output identical across runs.
 */

import type { ProbeResult, RankedSelection } from '../types';
import { compareEndpoints } from '../feeds/aggregator';

// ============================================================
// CONFIGURATION
// ============================================================

/** Results at or below this score are never selected */
export const MIN_SELECTION_SCORE = 0.5;

export const DEFAULT_TOP_N = 4;

// ============================================================
// RANKING AND CAPPING
// ============================================================

/**
 * Score descending, then endpoint ascending.
 */
export function compareProbeResults(a: ProbeResult, b: ProbeResult): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  return compareEndpoints(a.endpoint, b.endpoint);
}

/**
 * Keep results scoring above 0.5, best first, at most `topN`.
 * An empty selection is a normal outcome.
 */
export function selectBest(
  results: readonly ProbeResult[],
  topN: number = DEFAULT_TOP_N
): RankedSelection {
  const selected = results
    .filter(r => r.score > MIN_SELECTION_SCORE)
    .sort(compareProbeResults)
    .slice(0, Math.max(0, topN));

  return {
    endpoints: selected.map(r => r.endpoint),
    results: selected,
  };
}
