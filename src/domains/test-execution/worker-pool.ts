/**
 * Bounded worker pool feeding a single result channel
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { toError } from '../../shared/result.ts';

/**
 * Unbounded async queue with one consumer; items come out in push order
 */
export class ResultChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<{
    resolve: (result: IteratorResult<T>) => void;
    reject: (error: Error) => void;
  }> = [];
  private closed = false;
  private error?: Error;

  push(item: T): void {
    if (this.closed) {
      throw new Error('push on closed channel');
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  fail(error: Error): void {
    this.error = error;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [item] = this.buffer.splice(0, 1);
      return Promise.resolve({ value: item, done: false });
    }
    if (this.error) {
      return Promise.reject(this.error);
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }
}

export interface WorkerPoolOptions {
  readonly workers: number;
  /** Each worker waits a random delay in [0, staggerMs) before its first task */
  readonly staggerMs?: number;
  readonly random?: () => number;
}

/**
 * Runs `handler` over tasks with at most `workers` in flight.
 * A handler that throws is turned into a result by `recover`, so every
 * task yields exactly one result.
 */
export class WorkerPool<T, R> {
  constructor(
    private readonly handler: (task: T) => Promise<R>,
    private readonly recover: (task: T, error: Error) => R,
    private readonly options: WorkerPoolOptions,
  ) {}

  /**
   * Starts the workers. Results for `preResolved` entries are delivered
   * without running anything. The channel closes after the last result.
   */
  run(tasks: readonly T[], preResolved: readonly R[] = []): ResultChannel<R> {
    const channel = new ResultChannel<R>();
    for (const result of preResolved) {
      channel.push(result);
    }

    let next = 0;
    const workerCount = Math.min(Math.max(1, this.options.workers), tasks.length);

    const worker = async (): Promise<void> => {
      await this.stagger(workerCount);
      while (next < tasks.length) {
        const task = tasks[next++];
        let result: R;
        try {
          result = await this.handler(task);
        } catch (error) {
          result = this.recover(task, toError(error));
        }
        channel.push(result);
      }
    };

    const workers = Array.from({ length: workerCount }, () => worker());
    void Promise.all(workers).then(
      () => channel.close(),
      (error: unknown) => channel.fail(toError(error)),
    );

    return channel;
  }

  /**
   * Runs every task and gathers the results in completion order
   */
  async collect(tasks: readonly T[], preResolved: readonly R[] = []): Promise<R[]> {
    const results: R[] = [];
    for await (const result of this.run(tasks, preResolved)) {
      results.push(result);
    }
    return results;
  }

  private async stagger(workerCount: number): Promise<void> {
    const bound = this.options.staggerMs ?? 0;
    if (workerCount <= 1 || bound <= 0) {
      return;
    }
    const random = this.options.random ?? Math.random;
    await sleep(Math.floor(random() * bound));
  }
}
