/**
 * Tracker Relay — Health Module
 */

export { classifyScheme, scoreProbe, SCORE_WINDOW_MS } from './scoring';

export {
  checkHttpTracker,
  buildAnnounceUrl,
  DEFAULT_PROBE_TIMEOUT_MS,
  PROBE_USER_AGENT,
  type HttpProbeOptions,
} from './http-probe';

export {
  checkUdpTracker,
  buildConnectRequest,
  parseUdpEndpoint,
  randomTransactionId,
  UDP_PROTOCOL_ID,
  type UdpProbeOptions,
  type UdpTarget,
} from './udp-probe';

export { checkTrackerHealth, probeEndpoints, type ProbeOptions } from './prober';
