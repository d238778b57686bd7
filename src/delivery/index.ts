/**
 * Tracker Relay — Delivery Module
 *
 * Publishing of the tracker lists and the README to the content store.
 */

export {
  parseRateLimit,
  type ContentStore,
  type StoreResponse,
  type ReadFileResponse,
  type WriteFileRequest,
  type WriteFileResponse,
  type HeaderValues,
} from './content-store';

export {
  GitHubContentStore,
  createOctokit,
  USER_AGENT,
  type GitHubContentStoreOptions,
} from './github';

export { PublishClient, type PublishClientOptions } from './publisher';

export {
  formatDate,
  renderTrackerList,
  primaryCommitMessage,
  bestCommitMessage,
} from './artifacts';

export { updateReadmeContent, dateBadge, trackerCountLabel } from './readme';
