/**
 * Tracker Relay — Publish Types
 *
 * Remote artifacts, rate-limit state and the closed set of publish outcomes.
 */

// ============================================================
// REMOTE STATE
// ============================================================

/**
 * A file as currently stored in the remote repository.
 * `sha` is the version token a later write must present.
 */
export interface RemoteArtifact {
  path: string;
  content: string;
  sha: string;
}

/**
 * Parsed from `X-RateLimit-Remaining` / `X-RateLimit-Reset`.
 * `resetEpoch` is unix seconds, 0 when the header was missing.
 */
export interface RateLimitState {
  remaining: number;
  resetEpoch: number;
}

// ============================================================
// OUTCOMES
// ============================================================

export type PublishFailureKind =
  | 'forbidden'              // 403 without rate-limit headers
  | 'missing-version-token'  // path absent and not allowed to be created
  | 'read-failed'            // current state could not be read
  | 'not-a-file'             // path resolves to a directory or symlink
  | 'retries-exhausted'      // write kept failing up to the attempt cap
  | 'rate-limited';          // too many rate-limit waits in one call

export interface PublishFailure {
  kind: PublishFailureKind;
  path: string;
  cause: string;
}

export type PublishOutcome =
  | { kind: 'updated'; path: string; sha?: string }
  | { kind: 'skipped'; path: string }
  | { kind: 'failed'; path: string; failure: PublishFailure };

export type PublishOutcomeKind = PublishOutcome['kind'];
