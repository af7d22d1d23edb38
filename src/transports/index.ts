import { createStreamTransport } from './stream-transport.js';
import type { Transport, TransportEndpoint } from './types.js';
import { createUdpTransport } from './udp-transport.js';

export type { ReceivedMessage, Transport, TransportEndpoint, TransportKind } from './types.js';
export { createStreamTransport } from './stream-transport.js';
export { createUdpTransport, formatPeerHandle, parsePeerHandle } from './udp-transport.js';

/**
 * Builds the transport variant named by `endpoint.kind`.
 */
export function createTransport(endpoint: TransportEndpoint): Transport {
  switch (endpoint.kind) {
    case 'unix':
    case 'tcp':
      return createStreamTransport(endpoint);
    case 'udp':
      return createUdpTransport(endpoint);
  }
}
