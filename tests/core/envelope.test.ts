import { describe, expect, it } from 'vitest';

import { ParseError } from '@/common/errors.js';
import {
  decodeEnvelope,
  encodeEnvelope,
  failure,
  getCommand,
  getFailureMessage,
  isSuccess,
  okay,
  withCommand,
} from '@/core/envelope.js';

describe('envelope', () => {
  it('decodes what it encodes', () => {
    const envelope = { command: 'store', nested: { list: [1, 2.5, 'x', null, true] } };

    expect(decodeEnvelope(encodeEnvelope(envelope))).toEqual(envelope);
  });

  it('rejects malformed JSON with a ParseError', () => {
    expect(() => decodeEnvelope('{"command":')).toThrow(ParseError);
    expect(() => decodeEnvelope('')).toThrow(/^Malformed JSON payload: /);
  });

  it.each(['[1,2]', '42', '"text"', 'null', 'true'])('rejects the non-object payload %s', (payload) => {
    expect(() => decodeEnvelope(payload)).toThrow('Top-level JSON must be an object');
  });

  it('builds success and failure envelopes on top of a result', () => {
    expect(okay()).toEqual({ success: true });
    expect(okay({ result: 55, success: false })).toEqual({ result: 55, success: true });
    expect(failure('bad input')).toEqual({ success: false, message: 'bad input' });
    expect(failure('bad input', { field: 'n' })).toEqual({ field: 'n', success: false, message: 'bad input' });
  });

  it('treats only success === true as success', () => {
    expect(isSuccess({ success: true })).toBe(true);
    expect(isSuccess({ success: 'true' })).toBe(false);
    expect(isSuccess({ success: 1 })).toBe(false);
    expect(isSuccess({})).toBe(false);
  });

  it('reads the command or falls back to the sentinel', () => {
    expect(getCommand({ command: 'ping' })).toBe('ping');
    expect(getCommand({ command: 7 })).toBe('<unknown>');
    expect(getCommand({})).toBe('<unknown>');
  });

  it('reads the failure message or falls back', () => {
    expect(getFailureMessage({ success: false, message: 'nope' }, 'fallback')).toBe('nope');
    expect(getFailureMessage({ success: false, message: 3 }, 'fallback')).toBe('fallback');
  });

  it('sets the command without touching the original request', () => {
    const request = { command: 'old', n: 1 };

    expect(withCommand(request, 'new')).toEqual({ command: 'new', n: 1 });
    expect(request.command).toBe('old');
  });
});
