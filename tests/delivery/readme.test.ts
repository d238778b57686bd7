/**
 * Tests for the README patch
 */

import { describe, it, expect } from 'vitest';
import { dateBadge, trackerCountLabel, updateReadmeContent } from '../../src/delivery/readme';

const README = [
  '# Trackers',
  dateBadge('2024/01/02'),
  '',
  `## ${trackerCountLabel(123)}`,
  'Other text with 999 trackers stays.',
].join('\n');

describe('updateReadmeContent', () => {
  it('should replace the date badge and the tracker count', () => {
    const updated = updateReadmeContent(README, '2026/10/19', 456);

    expect(updated).toBe(
      [
        '# Trackers',
        '[![Last update](https://img.shields.io/badge/Last%20update-2026/10/19-%232ea043?style=flat-square&logo=github)](#)',
        '',
        '## All Tracker list &emsp; (456 trackers)',
        'Other text with 999 trackers stays.',
      ].join('\n')
    );
  });

  it('should replace every occurrence', () => {
    const twice = `${trackerCountLabel(1)}\n${trackerCountLabel(2)}`;

    expect(updateReadmeContent(twice, '2026/10/19', 7)).toBe(`${trackerCountLabel(7)}\n${trackerCountLabel(7)}`);
  });

  it('should leave a README without the fields unchanged', () => {
    const plain = '# Trackers\n\nNothing to patch.';

    expect(updateReadmeContent(plain, '2026/10/19', 7)).toBe(plain);
  });
});
