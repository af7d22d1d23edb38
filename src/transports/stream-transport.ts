import fs from 'node:fs';
import net from 'node:net';

import { BindError, ConnectError, ReceiveError, SendError } from '../common/errors.js';
import { getErrorMessage, logJsonl } from '../common/logger.js';
import type { ClientHandle } from '../types/rpc.js';

import { Inbox } from './inbox.js';
import { readMessage } from './read-buffer.js';
import type { ReceivedMessage, Transport, TransportEndpoint } from './types.js';

export type StreamEndpoint = Extract<TransportEndpoint, { kind: 'unix' | 'tcp' }>;

function describeEndpoint(endpoint: StreamEndpoint): string {
  return endpoint.kind === 'unix' ? endpoint.path : `${endpoint.host}:${endpoint.port}`;
}

function removeSocketFile(socketPath: string): void {
  try {
    fs.rmSync(socketPath, { force: true });
  } catch (error) {
    logJsonl('WARN', 'socket_file_remove_failed', {
      path: socketPath,
      error: getErrorMessage(error),
    });
  }
}

/**
 * Connection-oriented transport over a UNIX socket path or a TCP port.
 * Every connection carries one request and one reply; the reply ends it.
 */
export function createStreamTransport(endpoint: StreamEndpoint): Transport {
  return new StreamTransportImpl(endpoint);
}

class StreamTransportImpl implements Transport {
  readonly kind: StreamEndpoint['kind'];

  private readonly inbox = new Inbox();

  /**
   * Accepted connections waiting for their reply, by handle.
   */
  private readonly awaitingReply = new Map<ClientHandle, net.Socket>();

  /**
   * Every open accepted socket, so close() can destroy them.
   */
  private readonly sockets = new Set<net.Socket>();

  private server: net.Server | undefined;

  private connectionCounter = 0;

  private closing: Promise<void> | undefined;

  private boundEndpoint: StreamEndpoint;

  constructor(private readonly configured: StreamEndpoint) {
    this.kind = configured.kind;
    this.boundEndpoint = configured;
  }

  endpoint(): TransportEndpoint {
    return this.boundEndpoint;
  }

  async bind(): Promise<void> {
    if (this.closing !== undefined) {
      throw new BindError(`Transport closed: ${describeEndpoint(this.configured)}`);
    }

    if (this.server !== undefined) {
      throw new BindError(`Transport already bound: ${describeEndpoint(this.configured)}`);
    }

    if (this.configured.kind === 'unix') {
      removeSocketFile(this.configured.path);
    }

    // a client may half-close after its request and still read the reply
    const server = net.createServer({ allowHalfOpen: true }, (socket) => {
      this.accept(socket);
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(new BindError(`Failed to bind ${describeEndpoint(this.configured)}: ${error.message}`, { cause: error }));
      };

      server.once('error', onError);

      const onListening = (): void => {
        server.off('error', onError);
        resolve();
      };

      if (this.configured.kind === 'unix') {
        server.listen(this.configured.path, onListening);
      } else {
        server.listen(this.configured.port, this.configured.host, onListening);
      }
    });

    server.on('error', (error) => {
      logJsonl('ERROR', 'transport_server_error', {
        endpoint: describeEndpoint(this.configured),
        error: error.message,
      });
    });

    this.server = server;

    const address = server.address();
    if (this.configured.kind === 'tcp' && address !== null && typeof address !== 'string') {
      this.boundEndpoint = { kind: 'tcp', host: this.configured.host, port: address.port };
    }
  }

  receive(): Promise<ReceivedMessage> {
    return this.inbox.next();
  }

  async send(payload: string, handle: ClientHandle): Promise<void> {
    const socket = this.awaitingReply.get(handle);
    if (socket === undefined) {
      throw new SendError(`Unknown or already answered client handle: ${handle}`);
    }

    this.awaitingReply.delete(handle);

    if (socket.destroyed || !socket.writable) {
      socket.destroy();
      throw new SendError(`Client ${handle} disconnected before the reply`);
    }

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(new SendError(`Failed to reply to client ${handle}: ${error.message}`, { cause: error }));
      };

      socket.once('error', onError);
      socket.end(payload, () => {
        socket.off('error', onError);
        resolve();
      });
    });
  }

  roundTrip(payload: string): Promise<string> {
    if (this.closing !== undefined) {
      return Promise.reject(new ConnectError(`Transport closed: ${describeEndpoint(this.configured)}`));
    }

    const target = describeEndpoint(this.configured);

    return new Promise<string>((resolve, reject) => {
      let connected = false;
      let written = false;
      let settled = false;

      const socket =
        this.configured.kind === 'unix'
          ? net.createConnection(this.configured.path)
          : net.createConnection(this.configured.port, this.configured.host);

      const settle = (outcome: () => void): void => {
        if (settled) {
          return;
        }

        settled = true;
        socket.destroy();
        outcome();
      };

      socket.once('connect', () => {
        connected = true;
        socket.write(payload, (error) => {
          if (error !== undefined && error !== null) {
            settle(() => reject(new SendError(`Failed to write to ${target}: ${error.message}`, { cause: error })));
            return;
          }

          written = true;
        });
      });

      socket.once('data', (chunk: Buffer) => {
        settle(() => resolve(readMessage(chunk)));
      });

      socket.once('end', () => {
        settle(() => reject(new ReceiveError(`Connection to ${target} closed before a reply was read`)));
      });

      socket.on('error', (error) => {
        settle(() => {
          if (!connected) {
            reject(new ConnectError(`Failed to connect to ${target}: ${error.message}`, { cause: error }));
            return;
          }

          if (!written) {
            reject(new SendError(`Failed to write to ${target}: ${error.message}`, { cause: error }));
            return;
          }

          reject(new ReceiveError(`Failed to read reply from ${target}: ${error.message}`, { cause: error }));
        });
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
    this.awaitingReply.clear();

    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();

    const server = this.server;
    this.server = undefined;

    if (server === undefined) {
      return;
    }

    await new Promise<void>((resolve) => {
      server.close((error) => {
        if (error !== undefined) {
          logJsonl('WARN', 'transport_close_failed', {
            endpoint: describeEndpoint(this.configured),
            error: error.message,
          });
        }

        resolve();
      });
    });

    if (this.configured.kind === 'unix') {
      removeSocketFile(this.configured.path);
    }
  }

  /**
   * Reads the first chunk of a new connection as its request.
   */
  private accept(socket: net.Socket): void {
    if (this.closing !== undefined) {
      socket.destroy();
      return;
    }

    const handle = String(++this.connectionCounter);
    let received = false;

    this.sockets.add(socket);

    socket.once('data', (chunk: Buffer) => {
      received = true;
      this.awaitingReply.set(handle, socket);
      this.inbox.push({ payload: readMessage(chunk), handle });
    });

    socket.on('error', (error) => {
      if (!received) {
        received = true;
        this.inbox.fail(new ReceiveError(`Failed to read request from client ${handle}: ${error.message}`, { cause: error }));
      }
    });

    socket.once('end', () => {
      if (!received) {
        socket.destroy();
      }
    });

    socket.once('close', () => {
      this.sockets.delete(socket);
      this.awaitingReply.delete(handle);

      if (!received) {
        received = true;
        this.inbox.fail(new ReceiveError(`Client ${handle} closed the connection before sending a request`));
      }
    });
  }
}
