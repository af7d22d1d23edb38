import dgram from 'node:dgram';

import { afterEach, describe, expect, it } from 'vitest';

import { BindError, ReceiveError } from '@/common/errors.js';
import type { Transport, TransportEndpoint } from '@/transports/index.js';
import { createUdpTransport, formatPeerHandle, parsePeerHandle } from '@/transports/index.js';

function networkPort(endpoint: TransportEndpoint): number {
  if (endpoint.kind === 'unix') {
    throw new Error('Expected a network endpoint');
  }

  return endpoint.port;
}

describe('udp-transport', () => {
  const transports: Transport[] = [];

  const bindUdp = async (port = 0): Promise<Transport> => {
    const transport = createUdpTransport({ kind: 'udp', host: '127.0.0.1', port });
    transports.push(transport);
    await transport.bind();
    return transport;
  };

  const clientFor = (server: Transport): Transport => {
    const transport = createUdpTransport({ kind: 'udp', host: '127.0.0.1', port: networkPort(server.endpoint()) });
    transports.push(transport);
    return transport;
  };

  afterEach(async () => {
    for (const transport of transports.splice(0)) {
      await transport.close();
    }
  });

  it('formats and parses peer handles', () => {
    expect(formatPeerHandle('127.0.0.1', 5000)).toBe('127.0.0.1:5000');
    expect(parsePeerHandle('127.0.0.1:5000')).toEqual({ address: '127.0.0.1', port: 5000 });
    expect(parsePeerHandle('localhost:5000')).toBeUndefined();
    expect(parsePeerHandle('127.0.0.1:0')).toBeUndefined();
    expect(parsePeerHandle('127.0.0.1:65536')).toBeUndefined();
    expect(parsePeerHandle('127.0.0.1:05')).toBeUndefined();
    expect(parsePeerHandle('7')).toBeUndefined();
  });

  it('answers a datagram at the sender address', async () => {
    const server = await bindUdp();
    const client = clientFor(server);

    expect(server.kind).toBe('udp');
    expect(networkPort(server.endpoint())).toBeGreaterThan(0);

    const reply = client.roundTrip('{"command":"ping"}');
    const message = await server.receive();

    expect(message.payload).toBe('{"command":"ping"}');
    expect(message.handle).toMatch(/^127\.0\.0\.1:\d+$/);

    await server.send('{"success":true}', message.handle);
    await expect(reply).resolves.toBe('{"success":true}');
  });

  it('reuses the sender handle for several replies', async () => {
    const server = await bindUdp();
    const peer = dgram.createSocket('udp4');
    const replies: string[] = [];

    try {
      await new Promise<void>((resolve) => {
        peer.bind(0, '127.0.0.1', () => resolve());
      });
      const done = new Promise<void>((resolve) => {
        peer.on('message', (message) => {
          replies.push(message.toString('utf8'));
          if (replies.length === 2) {
            resolve();
          }
        });
      });

      peer.send('hello', networkPort(server.endpoint()), '127.0.0.1');
      const message = await server.receive();

      expect(message.handle).toBe(formatPeerHandle('127.0.0.1', peer.address().port));

      await server.send('one', message.handle);
      await server.send('two', message.handle);
      await done;

      expect(replies).toEqual(['one', 'two']);
    } finally {
      peer.close();
    }
  });

  it('truncates a datagram to the read buffer size', async () => {
    const server = await bindUdp();
    const peer = dgram.createSocket('udp4');

    try {
      peer.send('y'.repeat(3000), networkPort(server.endpoint()), '127.0.0.1');
      const message = await server.receive();

      expect(message.payload).toBe('y'.repeat(2047));
    } finally {
      peer.close();
    }
  });

  it('rejects replies it cannot address', async () => {
    const unbound = createUdpTransport({ kind: 'udp', host: '127.0.0.1', port: 0 });
    transports.push(unbound);
    await expect(unbound.send('{}', '127.0.0.1:5000')).rejects.toThrow('Transport is not bound');

    const server = await bindUdp();
    await expect(server.send('{}', 'nowhere')).rejects.toThrow('Invalid client handle: nowhere');
  });

  it('fails to bind a port that is already taken', async () => {
    const first = await bindUdp();

    await expect(bindUdp(networkPort(first.endpoint()))).rejects.toBeInstanceOf(BindError);
  });

  it('rejects a pending receive on close', async () => {
    const server = await bindUdp();
    const pending = server.receive();

    await server.close();

    await expect(pending).rejects.toBeInstanceOf(ReceiveError);
    await expect(server.bind()).rejects.toThrow(/^Transport closed: /);
  });
});
