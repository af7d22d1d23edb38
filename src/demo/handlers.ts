import { okay } from '../core/envelope.js';
import type { RpcServer } from '../core/server.js';
import { jsonType } from '../core/schema.js';

/**
 * Largest n whose Fibonacci number is still a safe integer.
 */
export const MAX_FIBONACCI_INPUT = 78;

const fibonacciMemo = new Map<number, number>([
  [0, 0],
  [1, 1],
]);

export function fibonacci(n: number): number {
  const cached = fibonacciMemo.get(n);
  if (cached !== undefined) {
    return cached;
  }

  let previous = 0;
  let current = 1;
  for (let i = 2; i <= n; i++) {
    const next = previous + current;
    previous = current;
    current = next;
    fibonacciMemo.set(i, current);
  }

  return current;
}

/**
 * Commands served by `cmdsock serve`: ping, echo and fibo.
 */
export function registerDemoHandlers(server: RpcServer): void {
  server.addHandler('ping', () => okay({ pong: true }));

  server.addHandler('echo', (request) => okay({ value: request.value ?? null }));

  server.addHandler(
    'fibo',
    (request) => {
      const n = request.n;

      if (typeof n !== 'number' || n < 0 || n > MAX_FIBONACCI_INPUT) {
        throw new RangeError(`n must be between 0 and ${MAX_FIBONACCI_INPUT}`);
      }

      return okay({ result: fibonacci(n) });
    },
    { schema: { n: jsonType('integer') } },
  );
}
