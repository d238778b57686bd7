/**
 * Tracker Relay — Artifact Rendering
 *
 * Text bodies and commit messages for the published lists.
 */

import type { TrackerEndpoint } from '../types';

/**
 * Local calendar date as YYYY/MM/DD.
 */
export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}/${month}/${day}`;
}

/**
 * One endpoint per line, newline-terminated. Order is kept as given.
 */
export function renderTrackerList(endpoints: readonly TrackerEndpoint[]): string {
  if (endpoints.length === 0) return '';
  return endpoints.join('\n') + '\n';
}

export function primaryCommitMessage(date: string, count: number): string {
  return `Update trackers on ${date} - ${count} items`;
}

export function bestCommitMessage(date: string): string {
  return `Update best trackers on ${date}`;
}
