/**
 * Keys owned by the wire contract. Callers must not use them for payload fields.
 */
export const ReservedKey = {
  Command: 'command',
  Success: 'success',
  Message: 'message',
} as const;

/**
 * Command name used when a request carries no string `command`.
 */
export const UNKNOWN_COMMAND = '<unknown>';

/**
 * Size of the single read buffer each transport uses per message.
 */
export const READ_BUFFER_BYTES = 2048;

/**
 * Longest message a transport accepts; anything longer is cut to this size.
 */
export const MAX_MESSAGE_BYTES = READ_BUFFER_BYTES - 1;

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8080;
export const DEFAULT_WORKER_COUNT = 4;

export const TRANSPORT_KINDS = ['tcp', 'udp', 'unix'] as const;
