/**
 * Tracker Relay — Content Store
 *
 * Transport seam between the publish client and the remote repository.
 * Implementations report HTTP status and rate-limit state instead of
 * throwing; only transport failures (timeouts, resets) are thrown.
 */

import type { RateLimitState, RemoteArtifact } from '../types';

// ============================================================
// TYPES
// ============================================================

export interface StoreResponse {
  status: number;
  /** Null when the response carried no `X-RateLimit-Remaining` header */
  rateLimit: RateLimitState | null;
  /** Error text from the remote, for non-2xx responses */
  message?: string;
}

export interface ReadFileResponse extends StoreResponse {
  /** Present for a 200 on a regular file */
  file: RemoteArtifact | null;
}

export interface WriteFileRequest {
  message: string;
  /** Plain text; the store handles the wire encoding */
  content: string;
  /** Version token read earlier; omitted only for a first-time create */
  sha?: string;
}

export interface WriteFileResponse extends StoreResponse {
  /** Version token of the new content */
  sha?: string;
}

export interface ContentStore {
  getFile(path: string): Promise<ReadFileResponse>;
  putFile(path: string, request: WriteFileRequest): Promise<WriteFileResponse>;
}

// ============================================================
// RATE LIMIT HEADERS
// ============================================================

export type HeaderValues = Record<string, string | number | undefined>;

function headerValue(headers: HeaderValues, name: string): string | number | undefined {
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lower) return value;
  }
  return undefined;
}

function toInteger(value: string | number | undefined): number | null {
  if (value === undefined) return null;
  const parsed = typeof value === 'number' ? value : Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : null;
}

/**
 * Read `X-RateLimit-Remaining` and `X-RateLimit-Reset` (any header case).
 * A missing or unparseable reset counts as 0.
 */
export function parseRateLimit(headers: HeaderValues): RateLimitState | null {
  const remaining = toInteger(headerValue(headers, 'x-ratelimit-remaining'));
  if (remaining === null) return null;

  return {
    remaining,
    resetEpoch: toInteger(headerValue(headers, 'x-ratelimit-reset')) ?? 0,
  };
}
