/**
 * Tracker Relay — Source Types
 *
 * A source is one remote tracker list. Sources live for a single run:
 * they are fetched once, merged, and discarded.
 */

import type { TrackerEndpoint } from './tracker';

// ============================================================
// FAILURES
// ============================================================

export type SourceFailureKind =
  | 'http-status'        // definitive status from the server, not retried
  | 'retries-exhausted'  // every attempt hit a timeout or connection error
  | 'unexpected';        // anything else, not retried

export interface SourceFailure {
  kind: SourceFailureKind;
  url: string;
  /** Short reason, e.g. `HTTP 404` or `max_retries_exhausted` */
  reason: string;
  /** Underlying error text, when there was one */
  cause?: string;
}

// ============================================================
// OUTCOMES
// ============================================================

export type SourceOutcome =
  | { status: 'success'; count: number }
  | { status: 'failed'; failure: SourceFailure };

export interface SourceResult {
  url: string;
  outcome: SourceOutcome;
  durationMs: number;
}

export interface AggregateResult {
  /** Unique endpoints, lexicographically sorted */
  endpoints: TrackerEndpoint[];
  /** Per-source outcomes, in the order the sources were given */
  sources: SourceResult[];
  durationMs: number;
}
