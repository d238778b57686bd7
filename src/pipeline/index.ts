/**
 * Tracker Relay — Update Pipeline
 *
 * Fetch → Aggregate → (Probe → Select) → Publish
 *
 * Publishing is sequential: the primary list first, then the best subset,
 * then the README. A failed primary write ends the run.
 */

import { nanoid } from 'nanoid';
import type {
  AggregateResult,
  AppConfig,
  PublishFailure,
  PublishOutcome,
} from '../types';
import type { Clock } from '../lib/clock';
import { systemClock } from '../lib/clock';
import { logger as defaultLogger, timeOperation } from '../lib/logger';
import type { Logger } from '../lib/logger';
import { fetchAndAggregate } from '../feeds/aggregator';
import { probeAndSelect } from '../matching';
import type { ProbeAndSelectResult } from '../matching';
import type { ProbeOptions } from '../health';
import type { PublishClient } from '../delivery/publisher';
import {
  bestCommitMessage,
  formatDate,
  primaryCommitMessage,
  renderTrackerList,
} from '../delivery/artifacts';
import { updateReadmeContent } from '../delivery/readme';

// ============================================================
// TYPES
// ============================================================

export interface RunOptions {
  /** Skip health probing; no best-subset list is produced */
  skipProbe?: boolean;
  /** Overrides `config.bestTrackersCount` */
  topN?: number;
}

export interface PipelineDeps {
  /** Absent for a dry run: nothing is published */
  publisher?: PublishClient;
  logger?: Logger;
  clock?: Clock;
  fetchImpl?: typeof fetch;
  socketFactory?: ProbeOptions['socketFactory'];
  runId?: string;
}

export interface PublishSummary {
  primary: PublishOutcome;
  best: PublishOutcome | null;
  readme: PublishOutcome | null;
}

export type RunOutcome =
  | { kind: 'completed'; published: PublishSummary | null }
  | { kind: 'safety-floor'; count: number; minimum: number }
  | { kind: 'primary-publish-failed'; failure: PublishFailure };

export interface RunReport {
  runId: string;
  outcome: RunOutcome;
  aggregate: AggregateResult;
  /** Null when probing was skipped or the floor stopped the run */
  selection: ProbeAndSelectResult | null;
  warnings: string[];
  durationMs: number;
}

/** Runs slower than this get an advisory warning */
export const SLOW_RUN_MS = 30_000;

/** Fewer trackers than this get an advisory warning */
export const LOW_TRACKER_COUNT = 100;

// ============================================================
// PIPELINE
// ============================================================

export async function runUpdate(
  config: AppConfig,
  options: RunOptions = {},
  deps: PipelineDeps = {}
): Promise<RunReport> {
  const clock = deps.clock ?? systemClock;
  const runId = deps.runId ?? nanoid(10);
  const log = (deps.logger ?? defaultLogger).child({ runId });
  const startTime = clock.now();

  log.info('Tracker update started', {
    sources: config.sources.length,
    dryRun: !deps.publisher,
    skipProbe: options.skipProbe ?? false,
  });

  const report = (
    outcome: RunOutcome,
    aggregate: AggregateResult,
    selection: ProbeAndSelectResult | null
  ): RunReport => {
    const durationMs = clock.now() - startTime;
    const warnings = advisoryWarnings(durationMs, aggregate.endpoints.length);
    for (const warning of warnings) {
      log.warn(warning);
    }
    log.info('Tracker update finished', { outcome: outcome.kind, durationMs });
    return { runId, outcome, aggregate, selection, warnings, durationMs };
  };

  // Stage 1: fetch and merge
  const aggregate = await fetchAndAggregate(config.sources, {
    poolWidth: config.poolWidth,
    timeoutMs: config.requestTimeoutMs,
    retry: config.retry,
    fetchImpl: deps.fetchImpl,
    clock,
    logger: log,
  });

  const count = aggregate.endpoints.length;
  if (count < config.minTrackers) {
    log.error('Too few trackers aggregated, nothing will be published', {
      count,
      minimum: config.minTrackers,
    });
    return report({ kind: 'safety-floor', count, minimum: config.minTrackers }, aggregate, null);
  }

  // Stage 2: probe and select
  let selection: ProbeAndSelectResult | null = null;
  if (!options.skipProbe) {
    selection = await timeOperation(
      'Probe stage',
      () =>
        probeAndSelect(aggregate.endpoints, options.topN ?? config.bestTrackersCount, {
          poolWidth: config.poolWidth,
          timeoutMs: config.probeTimeoutMs,
          fetchImpl: deps.fetchImpl,
          socketFactory: deps.socketFactory,
          clock,
          logger: log,
        }),
      log
    );
  }

  if (!deps.publisher) {
    log.info('Dry run, skipping publish');
    return report({ kind: 'completed', published: null }, aggregate, selection);
  }

  // Stage 3: publish
  const publisher = deps.publisher;
  const date = formatDate(new Date(clock.now()));

  const primary = await publisher.publish(
    config.artifacts.trackers,
    renderTrackerList(aggregate.endpoints),
    primaryCommitMessage(date, count)
  );

  if (primary.kind === 'failed') {
    log.error('Primary list was not published, stopping', { cause: primary.failure.cause });
    return report({ kind: 'primary-publish-failed', failure: primary.failure }, aggregate, selection);
  }

  let best: PublishOutcome | null = null;
  if (selection && selection.endpoints.length > 0) {
    best = await publisher.publish(
      config.artifacts.bestTrackers,
      renderTrackerList(selection.endpoints),
      bestCommitMessage(date)
    );
    if (best.kind === 'failed') {
      log.warn('Best trackers list was not published', { cause: best.failure.cause });
    }
  } else if (selection) {
    log.warn('No tracker scored high enough, best trackers list left as is');
  }

  const readme = await publisher.publishDerived(
    config.artifacts.readme,
    current => updateReadmeContent(current.content, date, count),
    primaryCommitMessage(date, count)
  );
  if (readme.kind === 'failed') {
    if (readme.failure.kind === 'missing-version-token') {
      log.warn('README not found, skipping', { path: config.artifacts.readme });
    } else {
      log.error('README was not updated', { cause: readme.failure.cause });
    }
  }

  return report({ kind: 'completed', published: { primary, best, readme } }, aggregate, selection);
}

// ============================================================
// HELPERS
// ============================================================

export function advisoryWarnings(durationMs: number, trackerCount: number): string[] {
  const warnings: string[] = [];
  if (durationMs > SLOW_RUN_MS) {
    warnings.push(`Run took ${(durationMs / 1000).toFixed(1)}s, longer than expected`);
  }
  if (trackerCount < LOW_TRACKER_COUNT) {
    warnings.push(`Only ${trackerCount} trackers found, sources may be failing`);
  }
  return warnings;
}

/**
 * Process exit code for a finished run.
 */
export function exitCodeFor(outcome: RunOutcome): number {
  switch (outcome.kind) {
    case 'completed':
      return 0;
    case 'primary-publish-failed':
      return 1;
    case 'safety-floor':
      return 2;
  }
}
