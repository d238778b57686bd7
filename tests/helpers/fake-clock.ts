/**
 * Clock whose sleep advances time instantly and records each delay.
 */

import type { Clock } from '../../src/lib/clock';

export const START_MS = 1_700_000_000_000;

export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  private current: number;

  constructor(start: number = START_MS) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}
