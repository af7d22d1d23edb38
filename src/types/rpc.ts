export type JsonPrimitive = null | boolean | number | string;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * A request or a response on the wire. Requests carry `command`,
 * responses carry `success` and, on failure, `message`.
 */
export type Envelope = JsonObject;

/**
 * Opaque identity of the peer that sent one message, produced by
 * `Transport.receive` and consumed by the matching `Transport.send`.
 */
export type ClientHandle = string;

/**
 * Implements one named command.
 */
export type Handler = (request: Envelope) => Envelope | Promise<Envelope>;

/**
 * Type names the schema validator reports. `number` accepts both
 * `integer` and `float` but is never reported as an actual type.
 */
export type JsonType = 'null' | 'boolean' | 'integer' | 'float' | 'number' | 'string' | 'array' | 'object';
