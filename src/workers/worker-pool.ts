import { PoolClosedError } from '../common/errors.js';
import { getErrorMessage, log, logJsonl } from '../common/logger.js';

import type { WorkerPoolOptions } from './options.js';
import { resolveWorkerPoolOptions } from './options.js';

/**
 * Unit of work run by a pool worker.
 */
export type Task<T = unknown> = () => T | Promise<T>;

export type WorkerPoolStatus = 'running' | 'draining' | 'terminating' | 'stopped';

/**
 * Snapshot used for diagnostics.
 */
export interface WorkerPoolSnapshot {
  status: WorkerPoolStatus;
  /**
   * Configured worker count.
   */
  size: number;
  /**
   * Live workers; equals `size` while running, 0 once stopped.
   */
  live: number;
  /**
   * Tasks waiting for a worker.
   */
  queued: number;
  /**
   * Tasks currently executing.
   */
  busy: number;
  completed: number;
  failed: number;
}

/**
 * Fixed-size pool of async workers fed by one FIFO queue.
 */
export interface WorkerPool {
  readonly size: number;
  /**
   * True once immediateStop() was called. Long tasks may poll it to abort early.
   */
  readonly isTerminating: boolean;
  /**
   * Queues a fire-and-forget task. Throws PoolClosedError unless running.
   */
  enqueue(task: Task): void;
  /**
   * Queues a task and resolves with its result, or rejects with its error.
   * Rejects with PoolClosedError when the pool is stopped before the task starts.
   */
  submitWithResult<T>(task: Task<T>): Promise<T>;
  /**
   * Stops accepting tasks, runs everything queued, then waits for every worker to exit.
   */
  gracefulStop(): Promise<void>;
  /**
   * Stops accepting tasks, discards queued ones, lets running ones finish, waits for every worker to exit.
   */
  immediateStop(): Promise<void>;
  getSnapshot(): WorkerPoolSnapshot;
}

/**
 * Queue entry. `abandon` is called instead of `run` when the task is discarded.
 */
interface QueuedTask {
  run: () => Promise<void>;
  abandon: (error: PoolClosedError) => void;
}

export function createWorkerPool(overrides?: Partial<WorkerPoolOptions>): WorkerPool {
  return new WorkerPoolImpl(resolveWorkerPoolOptions(overrides));
}

class WorkerPoolImpl implements WorkerPool {
  readonly size: number;

  private readonly name: string;

  /**
   * Pending tasks, oldest first.
   */
  private readonly queue: QueuedTask[] = [];

  /**
   * Wake-up callbacks of workers parked on an empty queue.
   */
  private readonly idleWorkers: Array<() => void> = [];

  /**
   * One promise per worker loop, settled when that worker exits.
   */
  private readonly workers: Promise<void>[] = [];

  private status: WorkerPoolStatus = 'running';

  private stopping: Promise<void> | undefined;

  private terminateRequested = false;

  private live = 0;

  private busy = 0;

  private completed = 0;

  private failed = 0;

  constructor(options: WorkerPoolOptions) {
    this.size = options.size;
    this.name = options.name;

    for (let i = 0; i < this.size; i++) {
      this.live += 1;
      this.workers.push(this.runWorker(i));
    }

    log('INFO', `[${this.name}] Started worker pool with ${this.size} workers`);
  }

  get isTerminating(): boolean {
    return this.terminateRequested;
  }

  enqueue(task: Task): void {
    this.push({
      run: async () => {
        await task();
      },
      abandon: () => {},
    });
  }

  submitWithResult<T>(task: Task<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.push({
        run: async () => {
          try {
            resolve(await task());
          } catch (error) {
            // the caller owns this failure through the returned promise
            reject(error);
          }
        },
        abandon: reject,
      });
    });
  }

  gracefulStop(): Promise<void> {
    if (this.status === 'running') {
      this.status = 'draining';
      this.releaseIdleWorkers();
      this.stopping = this.join();
    }

    return this.stopping ?? Promise.resolve();
  }

  immediateStop(): Promise<void> {
    if (this.status === 'running' || this.status === 'draining') {
      const wasRunning = this.status === 'running';
      this.status = 'terminating';
      this.terminateRequested = true;

      const abandoned = this.queue.splice(0);
      const error = new PoolClosedError('Task abandoned: pool terminated before it started');
      for (let i = 0; i < abandoned.length; i++) {
        abandoned[i].abandon(error);
      }

      if (abandoned.length > 0) {
        logJsonl('WARN', 'worker_pool_tasks_abandoned', { pool: this.name, count: abandoned.length });
      }

      this.releaseIdleWorkers();

      if (wasRunning) {
        this.stopping = this.join();
      }
    }

    return this.stopping ?? Promise.resolve();
  }

  getSnapshot(): WorkerPoolSnapshot {
    return {
      status: this.status,
      size: this.size,
      live: this.live,
      queued: this.queue.length,
      busy: this.busy,
      completed: this.completed,
      failed: this.failed,
    };
  }

  private push(task: QueuedTask): void {
    if (this.status !== 'running') {
      throw new PoolClosedError();
    }

    // an unstarted task stays queued until a worker shifts it
    this.queue.push(task);
    this.idleWorkers.shift()?.();
  }

  /**
   * Resolves with the next task, or undefined when the worker must exit.
   */
  private async nextTask(): Promise<QueuedTask | undefined> {
    for (;;) {
      if (this.status === 'terminating') {
        return undefined;
      }

      const task = this.queue.shift();
      if (task !== undefined) {
        return task;
      }

      if (this.status === 'draining') {
        return undefined;
      }

      await new Promise<void>((resolve) => {
        this.idleWorkers.push(resolve);
      });
    }
  }

  private async runWorker(index: number): Promise<void> {
    try {
      for (;;) {
        const task = await this.nextTask();
        if (task === undefined) {
          return;
        }

        this.busy += 1;
        try {
          await task.run();
          this.completed += 1;
        } catch (error) {
          // one failing task must not take the worker down
          this.failed += 1;
          logJsonl('ERROR', 'worker_task_failed', {
            pool: this.name,
            worker: index,
            error: getErrorMessage(error),
          });
        } finally {
          this.busy -= 1;
        }
      }
    } finally {
      this.live -= 1;
    }
  }

  private releaseIdleWorkers(): void {
    const idle = this.idleWorkers.splice(0);
    for (let i = 0; i < idle.length; i++) {
      idle[i]();
    }
  }

  private async join(): Promise<void> {
    await Promise.all(this.workers);
    this.status = 'stopped';

    if (!this.terminateRequested) {
      log('INFO', `[${this.name}] All workers joined`);
    } else {
      log('WARN', `[${this.name}] Pool terminated immediately; pending tasks were abandoned`);
    }
  }
}
