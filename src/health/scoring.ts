/**
 * Tracker Relay — Scheme Classification & Scoring
 */

import type { TrackerEndpoint, TrackerScheme } from '../types';

/** Latency at which a live tracker's score reaches 0 */
export const SCORE_WINDOW_MS = 5_000;

export function classifyScheme(endpoint: TrackerEndpoint): TrackerScheme {
  if (endpoint.startsWith('udp://')) return 'udp';
  if (endpoint.startsWith('https://')) return 'https';
  if (endpoint.startsWith('http://')) return 'http';
  return 'other';
}

/**
 * `max(0, 1 - latency / window)` for live trackers, 0 otherwise.
 */
export function scoreProbe(alive: boolean, latencyMs: number): number {
  if (!alive) return 0;
  const score = 1 - latencyMs / SCORE_WINDOW_MS;
  return Math.min(1, Math.max(0, score));
}
