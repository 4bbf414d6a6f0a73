/**
 * Bounded worker pool for applying independent subtrees.
 *
 * Uses a counter-based slot limiter: a task starts once fewer than
 * `maxConcurrent` tasks are running.
 */

import { InvalidInputError } from '../errors.js';

export class WorkerPool {
  private readonly _maxConcurrent: number;
  private _runningCount: number = 0;
  private _peak: number = 0;
  private readonly _waitQueue: Array<() => void> = [];

  constructor(maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new InvalidInputError(`Concurrency must be a positive integer, got ${maxConcurrent}`);
    }
    this._maxConcurrent = maxConcurrent;
  }

  get maxConcurrent(): number {
    return this._maxConcurrent;
  }

  /** Highest number of tasks seen running at once. */
  get peak(): number {
    return this._peak;
  }

  /**
   * Run every task, at most `maxConcurrent` at a time, and resolve with
   * their results in input order. If any task rejects, the first rejection
   * is rethrown once all tasks have settled.
   */
  async run<T>(tasks: ReadonlyArray<() => Promise<T>>): Promise<T[]> {
    const settled = await Promise.allSettled(tasks.map((task) => this._runTask(task)));
    const results: T[] = [];
    for (const outcome of settled) {
      if (outcome.status === 'rejected') throw outcome.reason;
      results.push(outcome.value);
    }
    return results;
  }

  private async _runTask<T>(task: () => Promise<T>): Promise<T> {
    await this._acquireSlot();
    try {
      return await task();
    } finally {
      this._releaseSlot();
    }
  }

  private _acquireSlot(): Promise<void> {
    if (this._runningCount < this._maxConcurrent) {
      this._claim();
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this._waitQueue.push(() => {
        this._claim();
        resolve();
      });
    });
  }

  private _claim(): void {
    this._runningCount++;
    this._peak = Math.max(this._peak, this._runningCount);
  }

  private _releaseSlot(): void {
    this._runningCount--;
    const next = this._waitQueue.shift();
    if (next !== undefined) next();
  }
}
