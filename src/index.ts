/**
 * Tracker Relay — Library Entry
 */

export { fetchAndAggregate, parseTrackerList, mergeTrackerSets } from './feeds/aggregator';
export { fetchSource } from './feeds/fetcher';
export { DEFAULT_SOURCES } from './feeds/sources';

export { checkTrackerHealth, probeEndpoints } from './health';
export { probeAndSelect, selectBest } from './matching';

export {
  PublishClient,
  GitHubContentStore,
  updateReadmeContent,
  renderTrackerList,
} from './delivery';
export type { ContentStore } from './delivery';

export { runUpdate, exitCodeFor } from './pipeline';
export type { RunOutcome, RunReport, RunOptions, PipelineDeps } from './pipeline';

export { loadConfig, requirePublishTarget } from './lib/config';
export { createLogger } from './lib/logger';
export type { Logger } from './lib/logger';

export * from './types';
