/**
 * Tracker Relay — Publish Client
 *
 * Conflict-safe, idempotent writes of one artifact at a time:
 *
 *   FetchCurrent → CompareContent → Write → Updated | Skipped | Failed
 *
 * - The version token (sha) read in FetchCurrent is sent with the write
 * - Content equal to the stored copy after trimming is never written
 * - Only the primary path may be created without a token
 * - `remaining <= 1` on any response defers the next request until the
 *   reset time; a 403 with `remaining <= 1` is retried after that wait,
 *   any other 403 is final
 * - Other failures back off exponentially up to the attempt cap
 */

import type {
  PublishFailure,
  PublishFailureKind,
  PublishOutcome,
  RateLimitState,
  RemoteArtifact,
  RetryPolicy,
} from '../types';
import type { Clock } from '../lib/clock';
import { epochSeconds, systemClock } from '../lib/clock';
import { errorMessage } from '../lib/errors';
import { logger as defaultLogger } from '../lib/logger';
import type { Logger } from '../lib/logger';
import { fail, ok } from '../lib/result';
import type { Result } from '../lib/result';
import { DEFAULT_RETRY_POLICY, backoffDelay, hasNextAttempt } from '../lib/retry';
import type { ContentStore, StoreResponse } from './content-store';

// ============================================================
// TYPES
// ============================================================

export interface PublishClientOptions {
  store: ContentStore;
  /** Path allowed to be created when it has no prior version */
  primaryPath: string;
  retry?: RetryPolicy;
  /** Rate-limit waits allowed per call before giving up (default: 5) */
  maxRateLimitWaits?: number;
  clock?: Clock;
  logger?: Logger;
}

type ReadOutcome =
  | { kind: 'found'; artifact: RemoteArtifact }
  | { kind: 'absent' }
  | { kind: 'failed'; failure: PublishFailure };

type ContentSource =
  | { kind: 'fixed'; content: string }
  | { kind: 'derived'; derive: (current: RemoteArtifact) => string };

/**
 * Rate-limit bookkeeping for one publish call.
 */
interface FlowState {
  rateLimit: RateLimitState | null;
  waits: number;
}

const DEFAULT_MAX_RATE_LIMIT_WAITS = 5;

function failure(kind: PublishFailureKind, path: string, cause: string): PublishFailure {
  return { kind, path, cause };
}

/**
 * A 403 is throttling only when the quota is spent; GitHub sends the
 * rate-limit headers on permission errors too.
 */
function isThrottled(state: RateLimitState | null): state is RateLimitState {
  return state !== null && state.remaining <= 1;
}

function describeStatus(response: StoreResponse): string {
  return response.message ? `HTTP ${response.status}: ${response.message}` : `HTTP ${response.status}`;
}

// ============================================================
// PUBLISH CLIENT
// ============================================================

export class PublishClient {
  private readonly store: ContentStore;
  private readonly primaryPath: string;
  private readonly policy: RetryPolicy;
  private readonly maxRateLimitWaits: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: PublishClientOptions) {
    this.store = options.store;
    this.primaryPath = options.primaryPath;
    this.policy = options.retry ?? DEFAULT_RETRY_POLICY;
    this.maxRateLimitWaits = options.maxRateLimitWaits ?? DEFAULT_MAX_RATE_LIMIT_WAITS;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Write `content` to `path` unless it already holds the same text.
   */
  async publish(path: string, content: string, message: string): Promise<PublishOutcome> {
    return this.publishWith(path, { kind: 'fixed', content }, message);
  }

  /**
   * Rewrite an existing file from its current content, e.g. to patch a
   * README. The file is read once; an absent file is a failure.
   */
  async publishDerived(
    path: string,
    derive: (current: RemoteArtifact) => string,
    message: string
  ): Promise<PublishOutcome> {
    return this.publishWith(path, { kind: 'derived', derive }, message);
  }

  // ----------------------------------------------------------
  // State machine
  // ----------------------------------------------------------

  private async publishWith(
    path: string,
    source: ContentSource,
    message: string
  ): Promise<PublishOutcome> {
    const log = this.logger.child({ path });
    const flow: FlowState = { rateLimit: null, waits: 0 };
    const mayCreate = path === this.primaryPath && source.kind === 'fixed';

    // FetchCurrent
    const read = await this.read(path, flow);
    let current: RemoteArtifact | null = null;

    if (read.kind === 'found') {
      current = read.artifact;
    } else if (read.kind === 'absent') {
      if (!mayCreate) {
        log.warn('No version token for path, refusing to create it');
        return this.failed(failure('missing-version-token', path, 'HTTP 404'));
      }
      log.info('Path does not exist yet, creating it');
    } else if (read.failure.kind === 'read-failed' && mayCreate) {
      // The write carries no token, so an existing file makes it fail
      // instead of being overwritten
      log.warn('Could not read current version, writing as a first-time create', {
        cause: read.failure.cause,
      });
    } else {
      return this.failed(read.failure);
    }

    let content: string;
    if (source.kind === 'fixed') {
      content = source.content;
    } else if (current) {
      content = source.derive(current);
    } else {
      return this.failed(failure('missing-version-token', path, 'No current content to derive from'));
    }

    // CompareContent
    if (current && current.content.trim() === content.trim()) {
      log.info('Content unchanged, skipping update');
      return { kind: 'skipped', path };
    }

    // Write
    return this.write(path, { message, content, sha: current?.sha }, flow);
  }

  private async read(path: string, flow: FlowState): Promise<ReadOutcome> {
    const log = this.logger.child({ path });
    let lastCause = 'no attempt made';

    for (let attempt = 0; attempt < this.policy.maxAttempts; ) {
      if (!(await this.deferIfExhausted(flow, log))) {
        return { kind: 'failed', failure: this.rateLimitFailure(path) };
      }

      const call = await this.call(() => this.store.getFile(path));
      if (!call.ok) {
        lastCause = call.error;
        await this.backoff(attempt, log, 'Read request failed', lastCause);
        attempt++;
        continue;
      }

      const response = call.value;

      flow.rateLimit = response.rateLimit;

      if (response.status === 200) {
        if (!response.file) {
          return { kind: 'failed', failure: failure('not-a-file', path, 'Path is not a regular file') };
        }
        return { kind: 'found', artifact: response.file };
      }

      if (response.status === 404) {
        return { kind: 'absent' };
      }

      if (response.status === 403) {
        if (isThrottled(response.rateLimit)) {
          if (!(await this.deferThrottled(flow, response.rateLimit, log))) {
            return { kind: 'failed', failure: this.rateLimitFailure(path) };
          }
          continue;
        }
        log.error('Permission denied reading path');
        return { kind: 'failed', failure: failure('forbidden', path, describeStatus(response)) };
      }

      lastCause = describeStatus(response);
      await this.backoff(attempt, log, 'Read returned an error status', lastCause);
      attempt++;
    }

    return { kind: 'failed', failure: failure('read-failed', path, lastCause) };
  }

  private async write(
    path: string,
    request: { message: string; content: string; sha?: string },
    flow: FlowState
  ): Promise<PublishOutcome> {
    const log = this.logger.child({ path });
    let lastCause = 'no attempt made';

    for (let attempt = 0; attempt < this.policy.maxAttempts; ) {
      if (!(await this.deferIfExhausted(flow, log))) {
        return this.failed(this.rateLimitFailure(path));
      }

      const call = await this.call(() => this.store.putFile(path, request));
      if (!call.ok) {
        lastCause = call.error;
        await this.backoff(attempt, log, 'Write request failed', lastCause);
        attempt++;
        continue;
      }

      const response = call.value;

      flow.rateLimit = response.rateLimit;

      if (response.status >= 200 && response.status < 300) {
        log.info('File updated', { status: response.status, sha: response.sha });
        return { kind: 'updated', path, sha: response.sha };
      }

      if (response.status === 403) {
        if (isThrottled(response.rateLimit)) {
          if (!(await this.deferThrottled(flow, response.rateLimit, log))) {
            return this.failed(this.rateLimitFailure(path));
          }
          continue;
        }
        log.error('Permission denied writing path');
        return this.failed(failure('forbidden', path, describeStatus(response)));
      }

      lastCause = describeStatus(response);
      await this.backoff(attempt, log, 'Write returned an error status', lastCause);
      attempt++;
    }

    return this.failed(failure('retries-exhausted', path, lastCause));
  }

  // ----------------------------------------------------------
  // Flow control
  // ----------------------------------------------------------

  private secondsUntilReset(resetEpoch: number): number {
    return Math.max(resetEpoch - epochSeconds(this.clock), 1);
  }

  /**
   * Before a request: wait out a quota the last response said was spent.
   * Returns false once the wait cap is reached.
   */
  private async deferIfExhausted(flow: FlowState, log: Logger): Promise<boolean> {
    const state = flow.rateLimit;
    if (!state || state.remaining > 1 || state.resetEpoch <= 0) {
      return true;
    }
    return this.waitForReset(flow, state, log, 'Rate limit nearly exhausted');
  }

  /**
   * After a throttled 403: always wait at least a second, then retry.
   */
  private async deferThrottled(flow: FlowState, state: RateLimitState, log: Logger): Promise<boolean> {
    return this.waitForReset(flow, state, log, 'Rate limited by remote');
  }

  private async waitForReset(
    flow: FlowState,
    state: RateLimitState,
    log: Logger,
    reason: string
  ): Promise<boolean> {
    if (flow.waits >= this.maxRateLimitWaits) {
      log.error('Giving up after repeated rate-limit waits', { waits: flow.waits });
      return false;
    }

    const seconds = this.secondsUntilReset(state.resetEpoch);
    log.warn(reason, { remaining: state.remaining, resetEpoch: state.resetEpoch, waitSeconds: seconds });

    flow.waits++;
    flow.rateLimit = null;
    await this.clock.sleep(seconds * 1000);
    return true;
  }

  private async backoff(attempt: number, log: Logger, message: string, cause: string): Promise<void> {
    const willRetry = hasNextAttempt(attempt, this.policy);
    const delayMs = willRetry ? backoffDelay(attempt, this.policy.baseDelayMs) : 0;

    log.warn(message, {
      attempt: attempt + 1,
      maxAttempts: this.policy.maxAttempts,
      cause,
      retryInMs: willRetry ? delayMs : undefined,
    });

    if (willRetry) {
      await this.clock.sleep(delayMs);
    }
  }

  /**
   * Run a store request, turning a thrown transport error into its message.
   */
  private async call<T>(request: () => Promise<T>): Promise<Result<T, string>> {
    try {
      return ok(await request());
    } catch (error) {
      return fail(errorMessage(error));
    }
  }

  private rateLimitFailure(path: string): PublishFailure {
    return failure('rate-limited', path, `Still rate limited after ${this.maxRateLimitWaits} waits`);
  }

  private failed(publishFailure: PublishFailure): PublishOutcome {
    this.logger.error('Publish failed', { ...publishFailure });
    return { kind: 'failed', path: publishFailure.path, failure: publishFailure };
  }
}
