import type { ClientHandle } from '../types/rpc.js';

export type TransportEndpoint =
  | { kind: 'unix'; path: string }
  | { kind: 'tcp'; host: string; port: number }
  | { kind: 'udp'; host: string; port: number };

export type TransportKind = TransportEndpoint['kind'];

/**
 * One message taken off the wire, with the handle its reply must go to.
 */
export interface ReceivedMessage {
  payload: string;
  handle: ClientHandle;
}

/**
 * Pluggable message transport. Each `receive` yields exactly one message,
 * at most MAX_MESSAGE_BYTES long; longer messages arrive truncated.
 */
export interface Transport {
  readonly kind: TransportKind;
  /**
   * Starts accepting messages. Rejects with BindError when the endpoint is unavailable.
   */
  bind(): Promise<void>;
  /**
   * Resolves with the next message. Rejects with ReceiveError on I/O failure, or once closed.
   */
  receive(): Promise<ReceivedMessage>;
  /**
   * Server side: replies to the peer behind `handle`.
   */
  send(payload: string, handle: ClientHandle): Promise<void>;
  /**
   * Client side: sends `payload` to the endpoint and resolves with the single reply.
   */
  roundTrip(payload: string): Promise<string>;
  /**
   * Releases every resource. Safe to call more than once.
   */
  close(): Promise<void>;
  /**
   * Bound endpoint once `bind` resolved, the configured one before.
   */
  endpoint(): TransportEndpoint;
}
