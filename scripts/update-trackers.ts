/**
 * Tracker Relay — Update Trackers Script
 *
 * Fetches every source, probes the merged list and publishes the results.
 *
 * Usage:
 *   npm run update                         # Fetch, probe, publish
 *   npm run update -- --dry-run            # Fetch and probe only
 *   npm run update -- --skip-probe         # Publish the full list only
 *   npm run update -- --top 8              # Keep 8 best trackers
 */

import 'dotenv/config';
import { loadConfig, requirePublishTarget } from '../src/lib/config';
import { createLogger } from '../src/lib/logger';
import { ConfigError, errorMessage } from '../src/lib/errors';
import { GitHubContentStore } from '../src/delivery/github';
import { PublishClient } from '../src/delivery/publisher';
import { exitCodeFor, runUpdate } from '../src/pipeline';
import { parseUpdateArgs } from '../src/pipeline/args';
import type { PublishSummary, RunReport } from '../src/pipeline';
import type { PublishOutcome } from '../src/types';

// ============================================================
// OUTPUT
// ============================================================

function describeOutcome(outcome: PublishOutcome | null): string {
  if (!outcome) return 'not attempted';
  if (outcome.kind === 'failed') return `failed (${outcome.failure.kind}: ${outcome.failure.cause})`;
  return outcome.kind;
}

function printPublished(published: PublishSummary): void {
  console.log(`Primary list: ${describeOutcome(published.primary)}`);
  console.log(`Best trackers: ${describeOutcome(published.best)}`);
  console.log(`README: ${describeOutcome(published.readme)}`);
}

function printSummary(report: RunReport): void {
  console.log('\n' + '='.repeat(60));
  console.log('SOURCES');
  console.log('='.repeat(60));
  report.aggregate.sources.forEach((source, index) => {
    const detail =
      source.outcome.status === 'success'
        ? `${source.outcome.count} trackers`
        : source.outcome.failure.reason;
    console.log(`${String(index + 1).padStart(2)}. ${source.outcome.status.padEnd(7)} ${source.url} (${detail})`);
  });

  if (report.selection) {
    console.log('\n' + '='.repeat(60));
    console.log('BEST TRACKERS');
    console.log('='.repeat(60));
    if (report.selection.results.length === 0) {
      console.log('No tracker scored above the selection threshold.');
    }
    for (const result of report.selection.results) {
      console.log(`${result.endpoint}  ${result.latencyMs}ms  score ${result.score.toFixed(3)}`);
    }
  }

  console.log('\n' + '='.repeat(60));
  console.log('UPDATE COMPLETE');
  console.log('='.repeat(60));
  console.log(`Run: ${report.runId}`);
  console.log(`Unique trackers: ${report.aggregate.endpoints.length}`);

  switch (report.outcome.kind) {
    case 'completed':
      if (report.outcome.published) {
        printPublished(report.outcome.published);
      } else {
        console.log('Dry run: nothing published');
      }
      break;
    case 'safety-floor':
      console.log(`Not published: ${report.outcome.count} trackers is below the minimum of ${report.outcome.minimum}`);
      break;
    case 'primary-publish-failed':
      console.log(`Primary list failed: ${report.outcome.failure.kind} (${report.outcome.failure.cause})`);
      break;
  }

  console.log(`Duration: ${(report.durationMs / 1000).toFixed(2)}s`);
  for (const warning of report.warnings) {
    console.log(`Warning: ${warning}`);
  }
  console.log('='.repeat(60) + '\n');
}

// ============================================================
// MAIN
// ============================================================

async function main(): Promise<void> {
  const options = parseUpdateArgs(process.argv.slice(2));
  const config = loadConfig();
  const log = createLogger(config.log);

  let publisher: PublishClient | undefined;
  if (!options.dryRun) {
    const target = requirePublishTarget(config);
    publisher = new PublishClient({
      store: new GitHubContentStore({ ...target, timeoutMs: config.requestTimeoutMs }),
      primaryPath: config.artifacts.trackers,
      retry: config.retry,
      maxRateLimitWaits: config.maxRateLimitWaits,
      logger: log,
    });
  }

  console.log('\n' + '='.repeat(60));
  console.log('TRACKER UPDATE');
  console.log('='.repeat(60));
  console.log(`Sources: ${config.sources.length}`);
  console.log(`Dry Run: ${options.dryRun}`);
  console.log(`Skip Probe: ${options.skipProbe}`);
  console.log('='.repeat(60) + '\n');

  const report = await runUpdate(
    config,
    { skipProbe: options.skipProbe, topN: options.topN },
    { publisher, logger: log }
  );

  printSummary(report);
  process.exitCode = exitCodeFor(report.outcome);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`\n${error.message}`);
  } else {
    console.error('\nUpdate failed:', errorMessage(error));
  }
  process.exitCode = 1;
});
