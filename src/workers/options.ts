import { DEFAULT_WORKER_COUNT } from '../common/consts.js';

/**
 * Worker pool tuning options.
 */
export interface WorkerPoolOptions {
  /**
   * Number of workers executing tasks at once.
   */
  size: number;
  /**
   * Name used in log events, to tell pools apart.
   */
  name: string;
}

/**
 * Resolves pool options with defaults.
 * ! Size must be a positive integer.
 */
export function resolveWorkerPoolOptions(overrides: Partial<WorkerPoolOptions> = {}): WorkerPoolOptions {
  const size = overrides.size ?? DEFAULT_WORKER_COUNT;

  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`Invalid worker pool size: ${size}`);
  }

  return {
    size,
    name: overrides.name ?? 'pool',
  };
}
