import type { Envelope, JsonType } from '../types/rpc.js';

export type RpcErrorCode =
  | 'BIND_FAILED'
  | 'CONNECT_FAILED'
  | 'SEND_FAILED'
  | 'RECEIVE_FAILED'
  | 'PARSE_FAILED'
  | 'VALIDATION_FAILED'
  | 'REMOTE_FAILED'
  | 'POOL_CLOSED';

/**
 * Base of every error raised by this package.
 */
export class RpcError extends Error {
  /**
   * Stable machine-readable code.
   */
  public readonly code: RpcErrorCode;

  constructor(code: RpcErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RpcError';
    this.code = code;
  }
}

export class BindError extends RpcError {
  constructor(message: string, options?: ErrorOptions) {
    super('BIND_FAILED', message, options);
    this.name = 'BindError';
  }
}

export class ConnectError extends RpcError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONNECT_FAILED', message, options);
    this.name = 'ConnectError';
  }
}

export class SendError extends RpcError {
  constructor(message: string, options?: ErrorOptions) {
    super('SEND_FAILED', message, options);
    this.name = 'SendError';
  }
}

export class ReceiveError extends RpcError {
  constructor(message: string, options?: ErrorOptions) {
    super('RECEIVE_FAILED', message, options);
    this.name = 'ReceiveError';
  }
}

/**
 * Payload is not JSON, or its top-level value is not an object.
 */
export class ParseError extends RpcError {
  constructor(message: string, options?: ErrorOptions) {
    super('PARSE_FAILED', message, options);
    this.name = 'ParseError';
  }
}

/**
 * First schema violation found in a request.
 */
export class ValidationError extends RpcError {
  /**
   * Dotted path of the offending key, empty for the top level.
   */
  public readonly path: string;

  public readonly expected: readonly JsonType[];

  public readonly actual: JsonType | 'missing';

  constructor(message: string, path: string, expected: readonly JsonType[], actual: JsonType | 'missing') {
    super('VALIDATION_FAILED', message);
    this.name = 'ValidationError';
    this.path = path;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * The server answered with `success` false or absent.
 */
export class RemoteError extends RpcError {
  /**
   * Text of the response `message` field.
   */
  public readonly remoteMessage: string;

  public readonly response: Envelope;

  constructor(remoteMessage: string, response: Envelope) {
    super('REMOTE_FAILED', `Request failed: ${remoteMessage}`);
    this.name = 'RemoteError';
    this.remoteMessage = remoteMessage;
    this.response = response;
  }
}

export class PoolClosedError extends RpcError {
  constructor(message = 'Cannot enqueue on a stopped or terminated pool') {
    super('POOL_CLOSED', message);
    this.name = 'PoolClosedError';
  }
}
