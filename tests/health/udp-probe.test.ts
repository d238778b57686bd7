/**
 * Tests for the UDP tracker check
 *
 * A loopback socket plays the tracker.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createSocket } from 'dgram';
import type { Socket } from 'dgram';
import {
  buildConnectRequest,
  checkUdpTracker,
  parseUdpEndpoint,
} from '../../src/health/udp-probe';
import { silentLogger } from '../../src/lib/logger';

let server: Socket | null = null;

async function startTracker(reply: (packet: Buffer) => Buffer | null): Promise<{ port: number; received: Buffer[] }> {
  const socket = createSocket('udp4');
  const received: Buffer[] = [];
  server = socket;

  socket.on('message', (packet, remote) => {
    received.push(packet);
    const answer = reply(packet);
    if (answer) {
      socket.send(answer, remote.port, remote.address);
    }
  });

  await new Promise<void>(resolve => socket.bind(0, '127.0.0.1', () => resolve()));
  return { port: socket.address().port, received };
}

afterEach(() => {
  server?.close();
  server = null;
});

describe('buildConnectRequest', () => {
  it('should lay out protocol id, action and transaction id big-endian', () => {
    expect(buildConnectRequest(0x12345678).toString('hex')).toBe('00000417271019800000000012345678');
  });
});

describe('parseUdpEndpoint', () => {
  it('should accept host and port', () => {
    expect(parseUdpEndpoint('udp://t.example:6969')).toEqual({ host: 't.example', port: 6969 });
  });

  it('should reject a path after the port', () => {
    expect(parseUdpEndpoint('udp://t.example:6969/announce')).toBeNull();
    expect(parseUdpEndpoint('udp://t.example:6969/')).toBeNull();
  });

  it('should reject malformed endpoints', () => {
    expect(parseUdpEndpoint('udp://bad')).toBeNull();
    expect(parseUdpEndpoint('udp://host:notaport')).toBeNull();
    expect(parseUdpEndpoint('udp://host:0')).toBeNull();
    expect(parseUdpEndpoint('udp://host:65536')).toBeNull();
    expect(parseUdpEndpoint('udp://a:1:2')).toBeNull();
    expect(parseUdpEndpoint('udp://:80')).toBeNull();
    expect(parseUdpEndpoint('http://t.example:80')).toBeNull();
  });
});

describe('checkUdpTracker', () => {
  it('should not open a socket for a malformed endpoint', async () => {
    const socketFactory = vi.fn(() => createSocket('udp4'));

    expect(await checkUdpTracker('udp://bad', { socketFactory, logger: silentLogger })).toEqual({
      alive: false,
      latencyMs: 0,
    });
    expect(await checkUdpTracker('udp://host:notaport', { socketFactory, logger: silentLogger })).toEqual({
      alive: false,
      latencyMs: 0,
    });
    expect(
      await checkUdpTracker('udp://127.0.0.1:9/announce', { socketFactory, logger: silentLogger })
    ).toEqual({ alive: false, latencyMs: 0 });
    expect(socketFactory).not.toHaveBeenCalled();
  });

  it('should send a connect request and accept a full reply', async () => {
    const tracker = await startTracker(() => Buffer.alloc(16));

    const result = await checkUdpTracker(`udp://127.0.0.1:${tracker.port}`, {
      timeoutMs: 2000,
      transactionId: () => 7,
      logger: silentLogger,
    });

    expect(result.alive).toBe(true);
    expect(result.latencyMs).toBeGreaterThanOrEqual(0);
    expect(result.latencyMs).toBeLessThan(2000);
    expect(tracker.received).toHaveLength(1);
    expect(tracker.received[0].equals(buildConnectRequest(7))).toBe(true);
  });

  it('should treat a reply shorter than 8 bytes as dead', async () => {
    const tracker = await startTracker(() => Buffer.alloc(4));

    const result = await checkUdpTracker(`udp://127.0.0.1:${tracker.port}`, {
      timeoutMs: 2000,
      logger: silentLogger,
    });

    expect(result.alive).toBe(false);
    expect(result.latencyMs).toBeLessThan(2000);
  });

  it('should time out when the tracker stays silent', async () => {
    const tracker = await startTracker(() => null);

    const result = await checkUdpTracker(`udp://127.0.0.1:${tracker.port}`, {
      timeoutMs: 50,
      logger: silentLogger,
    });

    expect(result).toEqual({ alive: false, latencyMs: 50 });
  });
});
