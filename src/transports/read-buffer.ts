import { MAX_MESSAGE_BYTES } from '../common/consts.js';

/**
 * Decodes one read as a message, cut to the fixed buffer size.
 */
export function readMessage(chunk: Buffer): string {
  const bytes = chunk.length > MAX_MESSAGE_BYTES ? chunk.subarray(0, MAX_MESSAGE_BYTES) : chunk;
  return bytes.toString('utf8');
}
