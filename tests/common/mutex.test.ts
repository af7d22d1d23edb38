import { describe, expect, it } from 'vitest';

import { createMutex } from '@/common/mutex.js';

import { sleep } from '../helpers/test-utils.js';

describe('mutex', () => {
  it('runs holders one at a time in call order', async () => {
    const mutex = createMutex();
    const events: string[] = [];

    const hold = (name: string, ms: number) =>
      mutex.runExclusive(async () => {
        events.push(`${name}:start`);
        await sleep(ms);
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([hold('a', 15), hold('b', 0), hold('c', 5)]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('releases the lock when a holder throws', async () => {
    const mutex = createMutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error('holder failed');
      }),
    ).rejects.toThrow('holder failed');

    await expect(mutex.runExclusive(() => 'next')).resolves.toBe('next');
  });
});
