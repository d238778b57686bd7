/**
 * Tests for artifact rendering
 */

import { describe, it, expect } from 'vitest';
import {
  bestCommitMessage,
  formatDate,
  primaryCommitMessage,
  renderTrackerList,
} from '../../src/delivery/artifacts';

describe('Artifacts', () => {
  it('should format a local date with zero padding', () => {
    expect(formatDate(new Date(2026, 0, 5))).toBe('2026/01/05');
  });

  it('should render one endpoint per line with a final newline', () => {
    expect(renderTrackerList(['udp://a.example:1', 'http://b.example:80'])).toBe(
      'udp://a.example:1\nhttp://b.example:80\n'
    );
    expect(renderTrackerList([])).toBe('');
  });

  it('should build commit messages', () => {
    expect(primaryCommitMessage('2026/10/19', 120)).toBe('Update trackers on 2026/10/19 - 120 items');
    expect(bestCommitMessage('2026/10/19')).toBe('Update best trackers on 2026/10/19');
  });
});
