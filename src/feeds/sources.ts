/**
 * Tracker Relay — Tracker Sources
 *
 * Public tracker lists fetched on every run. The repository we publish to
 * can feed its own previous lists back in, so trackers that dropped out of
 * the upstream lists are kept.
 */

import type { ArtifactPaths } from '../types';

export const DEFAULT_SOURCES: readonly string[] = [
  'https://raw.githubusercontent.com/XIU2/TrackersListCollection/master/all.txt',
  'https://raw.githubusercontent.com/ngosang/trackerslist/master/trackers_all.txt',
  'https://raw.githubusercontent.com/XIU2/TrackersListCollection/master/best.txt',
  'https://raw.githubusercontent.com/ngosang/trackerslist/master/trackers_best.txt',
  'https://raw.githubusercontent.com/DeSireFire/animeTrackerList/master/AT_best.txt',
  'http://github.itzmx.com/1265578519/OpenTracker/master/tracker.txt',
];

const RAW_CONTENT_BASE = 'https://raw.githubusercontent.com';

/**
 * Raw URLs of the lists previously published to `owner/repo`.
 */
export function publishedSources(
  owner: string,
  repo: string,
  paths: Pick<ArtifactPaths, 'trackers' | 'bestTrackers'>,
  branch = 'HEAD'
): string[] {
  return [paths.trackers, paths.bestTrackers].map(
    path => `${RAW_CONTENT_BASE}/${owner}/${repo}/${branch}/${path.replace(/^\/+/, '')}`
  );
}

/**
 * Parse a comma- or newline-separated list of URLs.
 */
export function parseSourceList(value: string): string[] {
  return value
    .split(/[,\r\n]+/)
    .map(url => url.trim())
    .filter(url => url.length > 0);
}

/**
 * Drop repeated URLs, keeping first occurrence order.
 */
export function uniqueSources(urls: readonly string[]): string[] {
  return [...new Set(urls)];
}
