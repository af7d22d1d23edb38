import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createRpcServer } from '@/core/server.js';
import { MAX_FIBONACCI_INPUT, fibonacci, registerDemoHandlers } from '@/demo/handlers.js';

import { FakeTransport } from '../helpers/fake-transport.js';

describe('demo-handlers', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('computes Fibonacci numbers up to the largest safe input', () => {
    expect(fibonacci(0)).toBe(0);
    expect(fibonacci(1)).toBe(1);
    expect(fibonacci(10)).toBe(55);
    expect(fibonacci(MAX_FIBONACCI_INPUT)).toBe(8944394323791464);
    expect(fibonacci(20)).toBe(6765);
  });

  it('serves ping, echo and fibo', async () => {
    const transport = new FakeTransport();
    const server = createRpcServer({ transport });
    registerDemoHandlers(server);
    await server.start();

    try {
      expect(server.getCommands()).toEqual(['echo', 'fibo', 'ping']);

      const ping = transport.deliver('{"command":"ping"}');
      const echo = transport.deliver('{"command":"echo","value":{"a":[1]}}');
      const echoEmpty = transport.deliver('{"command":"echo"}');
      const fibo = transport.deliver('{"command":"fibo","n":10}');
      const tooLarge = transport.deliver('{"command":"fibo","n":79}');
      const negative = transport.deliver('{"command":"fibo","n":-1}');
      const fractional = transport.deliver('{"command":"fibo","n":2.5}');

      await expect(transport.replyTo(ping)).resolves.toEqual({ pong: true, success: true });
      await expect(transport.replyTo(echo)).resolves.toEqual({ value: { a: [1] }, success: true });
      await expect(transport.replyTo(echoEmpty)).resolves.toEqual({ value: null, success: true });
      await expect(transport.replyTo(fibo)).resolves.toEqual({ result: 55, success: true });
      await expect(transport.replyTo(tooLarge)).resolves.toEqual({
        success: false,
        message: 'n must be between 0 and 78',
      });
      await expect(transport.replyTo(negative)).resolves.toEqual({
        success: false,
        message: 'n must be between 0 and 78',
      });
      await expect(transport.replyTo(fractional)).resolves.toEqual({
        success: false,
        message: "Wrong type for key 'n' (expected integer, got float)",
      });
    } finally {
      await server.stop();
    }
  });
});
