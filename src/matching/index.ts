/**
 * Tracker Relay — Matching Module
 *
 * Probe → Select. Produces the best-subset artifact's contents.
 */

import type { ProbeResult, RankedSelection, TrackerEndpoint } from '../types';
import { logger as defaultLogger } from '../lib/logger';
import { probeEndpoints } from '../health';
import type { ProbeOptions } from '../health';
import { DEFAULT_TOP_N, selectBest } from './selector';

export { selectBest, compareProbeResults, MIN_SELECTION_SCORE, DEFAULT_TOP_N } from './selector';

export interface ProbeAndSelectResult extends RankedSelection {
  /** Every probe result, in completion order */
  probed: ProbeResult[];
}

/**
 * Probe all endpoints and pick the best `topN`.
 */
export async function probeAndSelect(
  endpoints: readonly TrackerEndpoint[],
  topN: number = DEFAULT_TOP_N,
  options: ProbeOptions = {}
): Promise<ProbeAndSelectResult> {
  const log = options.logger ?? defaultLogger;

  const probed = await probeEndpoints(endpoints, options);
  const selection = selectBest(probed, topN);

  log.info('Best trackers selected', {
    probed: probed.length,
    selected: selection.endpoints.length,
    topN,
  });

  return { ...selection, probed };
}
