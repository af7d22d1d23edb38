import dgram from 'node:dgram';
import net from 'node:net';

import { BindError, ConnectError, ReceiveError, SendError } from '../common/errors.js';
import type { ClientHandle } from '../types/rpc.js';

import { Inbox } from './inbox.js';
import { readMessage } from './read-buffer.js';
import type { ReceivedMessage, Transport, TransportEndpoint } from './types.js';

export type DatagramEndpoint = Extract<TransportEndpoint, { kind: 'udp' }>;

interface PeerAddress {
  address: string;
  port: number;
}

export function formatPeerHandle(address: string, port: number): ClientHandle {
  return `${address}:${port}`;
}

/**
 * Reads an `<ip>:<port>` handle back into an address, or undefined when it is not one.
 */
export function parsePeerHandle(handle: ClientHandle): PeerAddress | undefined {
  const delimiter = handle.lastIndexOf(':');
  if (delimiter <= 0) {
    return undefined;
  }

  const address = handle.slice(0, delimiter);
  const rawPort = handle.slice(delimiter + 1);
  const port = Number.parseInt(rawPort, 10);

  if (!net.isIPv4(address) || String(port) !== rawPort || port < 1 || port > 65535) {
    return undefined;
  }

  return { address, port };
}

/**
 * Connectionless transport. Each datagram is one message; the handle is the sender address and stays reusable.
 */
export function createUdpTransport(endpoint: DatagramEndpoint): Transport {
  return new UdpTransportImpl(endpoint);
}

class UdpTransportImpl implements Transport {
  readonly kind = 'udp';

  private readonly inbox = new Inbox();

  private socket: dgram.Socket | undefined;

  private closing: Promise<void> | undefined;

  private boundEndpoint: DatagramEndpoint;

  constructor(private readonly configured: DatagramEndpoint) {
    this.boundEndpoint = configured;
  }

  endpoint(): TransportEndpoint {
    return this.boundEndpoint;
  }

  async bind(): Promise<void> {
    const target = `${this.configured.host}:${this.configured.port}`;

    if (this.closing !== undefined) {
      throw new BindError(`Transport closed: ${target}`);
    }

    if (this.socket !== undefined) {
      throw new BindError(`Transport already bound: ${target}`);
    }

    const socket = dgram.createSocket('udp4');

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        socket.close();
        reject(new BindError(`Failed to bind ${target}: ${error.message}`, { cause: error }));
      };

      socket.once('error', onError);
      socket.bind(this.configured.port, this.configured.host, () => {
        socket.off('error', onError);
        resolve();
      });
    });

    socket.on('message', (message, remote) => {
      this.inbox.push({
        payload: readMessage(message),
        handle: formatPeerHandle(remote.address, remote.port),
      });
    });

    socket.on('error', (error) => {
      this.inbox.fail(new ReceiveError(`Failed to receive from ${target}: ${error.message}`, { cause: error }));
    });

    this.socket = socket;
    this.boundEndpoint = { kind: 'udp', host: this.configured.host, port: socket.address().port };
  }

  receive(): Promise<ReceivedMessage> {
    return this.inbox.next();
  }

  async send(payload: string, handle: ClientHandle): Promise<void> {
    const socket = this.socket;
    if (socket === undefined) {
      throw new SendError('Transport is not bound');
    }

    const peer = parsePeerHandle(handle);
    if (peer === undefined) {
      throw new SendError(`Invalid client handle: ${handle}`);
    }

    await new Promise<void>((resolve, reject) => {
      socket.send(payload, peer.port, peer.address, (error) => {
        if (error !== null && error !== undefined) {
          reject(new SendError(`Failed to reply to ${handle}: ${error.message}`, { cause: error }));
          return;
        }

        resolve();
      });
    });
  }

  roundTrip(payload: string): Promise<string> {
    const target = `${this.configured.host}:${this.configured.port}`;

    if (this.closing !== undefined) {
      return Promise.reject(new ConnectError(`Transport closed: ${target}`));
    }

    return new Promise<string>((resolve, reject) => {
      const client = dgram.createSocket('udp4');
      let settled = false;

      const settle = (outcome: () => void): void => {
        if (settled) {
          return;
        }

        settled = true;
        client.close();
        outcome();
      };

      client.once('message', (message) => {
        settle(() => resolve(readMessage(message)));
      });

      client.on('error', (error) => {
        settle(() => reject(new ReceiveError(`Failed to receive reply from ${target}: ${error.message}`, { cause: error })));
      });

      client.send(payload, this.configured.port, this.configured.host, (error) => {
        if (error !== null && error !== undefined) {
          settle(() => reject(new SendError(`Failed to send datagram to ${target}: ${error.message}`, { cause: error })));
        }
      });
    });
  }

  close(): Promise<void> {
    if (this.closing === undefined) {
      this.closing = this.performClose();
    }

    return this.closing;
  }

  private async performClose(): Promise<void> {
    this.inbox.close(new ReceiveError('Transport closed'));

    const socket = this.socket;
    this.socket = undefined;

    if (socket === undefined) {
      return;
    }

    await new Promise<void>((resolve) => {
      socket.close(() => resolve());
    });
  }
}
