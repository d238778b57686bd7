/**
 * Tracker Relay — Tracker Types
 *
 * Endpoints collected from tracker lists and the results of probing them.
 */

// ============================================================
// ENDPOINTS
// ============================================================

/**
 * Scheme of a tracker endpoint, decided by its prefix only.
 */
export type TrackerScheme = 'http' | 'https' | 'udp' | 'other';

/**
 * A trimmed, non-empty line from a tracker list.
 * Identity is exact string equality: no case folding, no URL normalization.
 */
export type TrackerEndpoint = string;

// ============================================================
// PROBING
// ============================================================

export interface ProbeResult {
  endpoint: TrackerEndpoint;
  scheme: TrackerScheme;
  alive: boolean;
  /** Wall-clock duration of the probe, or the full timeout when it failed */
  latencyMs: number;
  /** 0..1, always 0 when not alive */
  score: number;
}

/**
 * Outcome of a single protocol check, before scoring.
 */
export interface CheckResult {
  alive: boolean;
  latencyMs: number;
}

/**
 * Best endpoints in publish order (score descending).
 */
export interface RankedSelection {
  endpoints: TrackerEndpoint[];
  results: ProbeResult[];
}
