/**
 * Tracker Relay — README Patch
 *
 * Rewrites the "Last update" badge and the tracker count in place.
 * Text that matches neither pattern is left untouched.
 */

const DATE_BADGE_PATTERN =
  /\[!\[Last update\]\(https:\/\/img\.shields\.io\/badge\/Last%20update-\d{4}\/\d{2}\/\d{2}-%232ea043\?style=flat-square&logo=github\)\]\(#\)/g;

const TRACKER_COUNT_PATTERN = /All Tracker list &emsp; \(\d+ trackers\)/g;

export function dateBadge(date: string): string {
  return `[![Last update](https://img.shields.io/badge/Last%20update-${date}-%232ea043?style=flat-square&logo=github)](#)`;
}

export function trackerCountLabel(count: number): string {
  return `All Tracker list &emsp; (${count} trackers)`;
}

/**
 * @param date - YYYY/MM/DD
 */
export function updateReadmeContent(readme: string, date: string, count: number): string {
  return readme
    .replace(DATE_BADGE_PATTERN, () => dateBadge(date))
    .replace(TRACKER_COUNT_PATTERN, () => trackerCountLabel(count));
}
