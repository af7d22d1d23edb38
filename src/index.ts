export type { ClientHandle, Envelope, Handler, JsonObject, JsonType, JsonValue } from './types/rpc.js';

export { ReservedKey, UNKNOWN_COMMAND, MAX_MESSAGE_BYTES, READ_BUFFER_BYTES } from './common/consts.js';
export {
  RpcError,
  BindError,
  ConnectError,
  SendError,
  ReceiveError,
  ParseError,
  ValidationError,
  RemoteError,
  PoolClosedError,
} from './common/errors.js';
export type { RpcErrorCode } from './common/errors.js';
export { resolveEndpoint, resolveServeConfig } from './common/config.js';
export type { ServeConfig } from './common/config.js';

export { decodeEnvelope, encodeEnvelope, failure, isSuccess, okay } from './core/envelope.js';
export { jsonType, jsonTypeOf, nested, types, validate } from './core/schema.js';
export type { Schema, SchemaRule } from './core/schema.js';
export { createRpcServer } from './core/server.js';
export type { RpcServer, RpcServerOptions, ServerState } from './core/server.js';
export type { HandlerOptions } from './core/router.js';
export { createRpcClient } from './core/client.js';
export type { CallCallback, RpcClient } from './core/client.js';

export { createTransport, createStreamTransport, createUdpTransport } from './transports/index.js';
export type { ReceivedMessage, Transport, TransportEndpoint, TransportKind } from './transports/index.js';

export { createWorkerPool } from './workers/worker-pool.js';
export type { Task, WorkerPool, WorkerPoolSnapshot, WorkerPoolStatus } from './workers/worker-pool.js';
export type { WorkerPoolOptions } from './workers/options.js';
