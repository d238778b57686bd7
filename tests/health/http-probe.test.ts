/**
 * Tests for the HTTP tracker check
 */

import { describe, it, expect, vi } from 'vitest';
import { buildAnnounceUrl, checkHttpTracker } from '../../src/health/http-probe';
import { silentLogger } from '../../src/lib/logger';
import { FakeClock } from '../helpers/fake-clock';

describe('buildAnnounceUrl', () => {
  it('should append /announce after dropping trailing slashes', () => {
    expect(buildAnnounceUrl('http://t.example:6969')).toBe('http://t.example:6969/announce');
    expect(buildAnnounceUrl('http://t.example:6969//')).toBe('http://t.example:6969/announce');
  });
});

describe('checkHttpTracker', () => {
  it('should report a 2xx answer as alive with its latency', async () => {
    const clock = new FakeClock();
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      clock.advance(1000);
      return new Response('d14:failure reason4:teste');
    });

    const result = await checkHttpTracker('http://t.example:6969/', { fetchImpl, clock, logger: silentLogger });

    expect(result).toEqual({ alive: true, latencyMs: 1000 });
    expect(fetchImpl).toHaveBeenCalledWith(
      'http://t.example:6969/announce',
      expect.objectContaining({ headers: { 'User-Agent': 'BitTorrent/2.0' } })
    );
  });

  it('should report an error status as dead', async () => {
    const clock = new FakeClock();
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      clock.advance(250);
      return new Response('gone', { status: 404 });
    });

    const result = await checkHttpTracker('https://t.example', { fetchImpl, clock, logger: silentLogger });

    expect(result).toEqual({ alive: false, latencyMs: 250 });
  });

  it('should charge the full timeout when the request fails', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });

    const result = await checkHttpTracker('http://t.example', {
      fetchImpl,
      timeoutMs: 3000,
      clock: new FakeClock(),
      logger: silentLogger,
    });

    expect(result).toEqual({ alive: false, latencyMs: 3000 });
  });

  it('should not request a non-HTTP endpoint', async () => {
    const fetchImpl = vi.fn<typeof fetch>();

    const result = await checkHttpTracker('udp://t.example:1337', { fetchImpl, logger: silentLogger });

    expect(result).toEqual({ alive: false, latencyMs: 0 });
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
