export interface Mutex {
  /**
   * Runs `fn` once every earlier holder has released the lock.
   */
  runExclusive<T>(fn: () => T | Promise<T>): Promise<T>;
}

/**
 * Promise-chain mutex: each caller waits on the tail left by the previous one.
 */
export function createMutex(): Mutex {
  let tail: Promise<void> = Promise.resolve();

  return {
    async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
      const previous = tail;
      let release = (): void => {};
      tail = new Promise<void>((resolve) => {
        release = resolve;
      });

      try {
        await previous;
        return await fn();
      } finally {
        release();
      }
    },
  };
}
