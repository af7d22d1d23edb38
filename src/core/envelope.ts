import { ReservedKey, UNKNOWN_COMMAND } from '../common/consts.js';
import { ParseError } from '../common/errors.js';
import type { Envelope, JsonValue } from '../types/rpc.js';

export function isJsonObject(value: unknown): value is Envelope {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function encodeEnvelope(envelope: Envelope): string {
  return JSON.stringify(envelope);
}

/**
 * Parses one message. Scalars, arrays and null are rejected: an envelope is always an object.
 */
export function decodeEnvelope(payload: string): Envelope {
  let parsed: unknown;

  try {
    parsed = JSON.parse(payload);
  } catch (error) {
    throw new ParseError(`Malformed JSON payload: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }

  if (!isJsonObject(parsed)) {
    throw new ParseError('Top-level JSON must be an object');
  }

  return parsed;
}

export function okay(result: Envelope = {}): Envelope {
  return { ...result, [ReservedKey.Success]: true };
}

export function failure(message: string, result: Envelope = {}): Envelope {
  return { ...result, [ReservedKey.Success]: false, [ReservedKey.Message]: message };
}

/**
 * A missing or non-boolean `success` counts as failure.
 */
export function isSuccess(envelope: Envelope): boolean {
  return envelope[ReservedKey.Success] === true;
}

export function getCommand(envelope: Envelope): string {
  const command: JsonValue | undefined = envelope[ReservedKey.Command];
  return typeof command === 'string' ? command : UNKNOWN_COMMAND;
}

export function getFailureMessage(envelope: Envelope, fallback: string): string {
  const message: JsonValue | undefined = envelope[ReservedKey.Message];
  return typeof message === 'string' ? message : fallback;
}

export function withCommand(request: Envelope, command: string): Envelope {
  return { ...request, [ReservedKey.Command]: command };
}
