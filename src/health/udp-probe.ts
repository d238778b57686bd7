/**
 * Tracker Relay — UDP Tracker Check
 *
 * Sends the BitTorrent UDP tracker "connect" request and waits for any
 * reply of at least 8 bytes. Only reachability is tested; the reply is not
 * validated against the transaction id.
 *
 * Request layout (16 bytes, big-endian):
 *   0..7   protocol id 0x0000041727101980
 *   8..11  action 0 (connect)
 *   12..15 transaction id
 */

import { createSocket } from 'dgram';
import type { Socket } from 'dgram';
import { randomBytes } from 'crypto';
import type { CheckResult, TrackerEndpoint } from '../types';
import type { Clock } from '../lib/clock';
import { systemClock } from '../lib/clock';
import { errorMessage } from '../lib/errors';
import { logger as defaultLogger } from '../lib/logger';
import type { Logger } from '../lib/logger';
import { DEFAULT_PROBE_TIMEOUT_MS } from './http-probe';

// ============================================================
// WIRE FORMAT
// ============================================================

export const UDP_PROTOCOL_ID = 0x41727101980n;
export const UDP_ACTION_CONNECT = 0;
export const CONNECT_REQUEST_SIZE = 16;
export const MIN_CONNECT_RESPONSE_SIZE = 8;

export function buildConnectRequest(transactionId: number): Buffer {
  const packet = Buffer.alloc(CONNECT_REQUEST_SIZE);
  packet.writeBigUInt64BE(UDP_PROTOCOL_ID, 0);
  packet.writeUInt32BE(UDP_ACTION_CONNECT, 8);
  packet.writeUInt32BE(transactionId >>> 0, 12);
  return packet;
}

export function randomTransactionId(): number {
  return randomBytes(4).readUInt32BE(0);
}

// ============================================================
// ENDPOINT PARSING
// ============================================================

export interface UdpTarget {
  host: string;
  port: number;
}

/**
 * Parse `udp://host:port`. Returns null unless there is exactly one
 * host:port pair with a valid port and nothing after it (`/announce` included).
 */
export function parseUdpEndpoint(endpoint: TrackerEndpoint): UdpTarget | null {
  if (!endpoint.startsWith('udp://')) return null;

  const parts = endpoint.slice('udp://'.length).split(':');

  if (parts.length !== 2) return null;

  const [host, portText] = parts;
  if (!host || !/^\d{1,5}$/.test(portText)) return null;

  const port = Number(portText);
  if (port < 1 || port > 65535) return null;

  return { host, port };
}

// ============================================================
// CHECK
// ============================================================

export interface UdpProbeOptions {
  timeoutMs?: number;
  clock?: Clock;
  logger?: Logger;
  /** Socket factory; defaults to an IPv4 datagram socket */
  socketFactory?: () => Socket;
  transactionId?: () => number;
}

export async function checkUdpTracker(
  endpoint: TrackerEndpoint,
  options: UdpProbeOptions = {}
): Promise<CheckResult> {
  const target = parseUdpEndpoint(endpoint);
  if (!target) {
    return { alive: false, latencyMs: 0 };
  }

  const timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  const clock = options.clock ?? systemClock;
  const log = (options.logger ?? defaultLogger).child({ endpoint });
  const socket = (options.socketFactory ?? (() => createSocket('udp4')))();
  const packet = buildConnectRequest((options.transactionId ?? randomTransactionId)());

  return new Promise<CheckResult>(resolve => {
    let settled = false;
    const start = clock.now();

    const finish = (result: CheckResult): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      try {
        socket.close();
      } catch (error) {
        log.debug('UDP socket already closed', { error: errorMessage(error) });
      }
      resolve(result);
    };

    const timeoutId = setTimeout(() => {
      log.debug('UDP tracker check timed out', { timeoutMs });
      finish({ alive: false, latencyMs: timeoutMs });
    }, timeoutMs);

    socket.on('error', error => {
      log.debug('UDP tracker check failed', { error: error.message });
      finish({ alive: false, latencyMs: timeoutMs });
    });

    socket.once('message', (message: Buffer) => {
      finish({
        alive: message.length >= MIN_CONNECT_RESPONSE_SIZE,
        latencyMs: clock.now() - start,
      });
    });

    socket.send(packet, target.port, target.host, error => {
      if (error) {
        log.debug('UDP connect request not sent', { error: error.message });
        finish({ alive: false, latencyMs: timeoutMs });
      }
    });
  });
}
