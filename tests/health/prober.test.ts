/**
 * Tests for the health prober
 */

import { describe, it, expect, vi } from 'vitest';
import { checkTrackerHealth, probeEndpoints } from '../../src/health/prober';
import { silentLogger } from '../../src/lib/logger';
import { FakeClock } from '../helpers/fake-clock';

describe('checkTrackerHealth', () => {
  it('should score an unsupported scheme as dead without probing', async () => {
    const fetchImpl = vi.fn<typeof fetch>();

    const result = await checkTrackerHealth('wss://t.example', { fetchImpl, logger: silentLogger });

    expect(result).toEqual({ endpoint: 'wss://t.example', scheme: 'other', alive: false, latencyMs: 0, score: 0 });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('should score an HTTP tracker from its latency', async () => {
    const clock = new FakeClock();
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      clock.advance(500);
      return new Response('ok');
    });

    const result = await checkTrackerHealth('https://t.example', { fetchImpl, clock, logger: silentLogger });

    expect(result.scheme).toBe('https');
    expect(result.alive).toBe(true);
    expect(result.latencyMs).toBe(500);
    expect(result.score).toBeCloseTo(0.9);
  });

  it('should score a malformed UDP endpoint 0', async () => {
    const result = await checkTrackerHealth('udp://bad', { logger: silentLogger });

    expect(result).toEqual({ endpoint: 'udp://bad', scheme: 'udp', alive: false, latencyMs: 0, score: 0 });
  });
});

describe('probeEndpoints', () => {
  it('should return one result per endpoint', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('ok'));
    const endpoints = ['http://a.example', 'http://b.example', 'udp://bad', 'ftp://c.example'];

    const results = await probeEndpoints(endpoints, {
      fetchImpl,
      clock: new FakeClock(),
      poolWidth: 2,
      logger: silentLogger,
    });

    expect(results.map(r => r.endpoint).sort()).toEqual([...endpoints].sort());
    expect(results.filter(r => r.alive).map(r => r.endpoint).sort()).toEqual([
      'http://a.example',
      'http://b.example',
    ]);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });
});
