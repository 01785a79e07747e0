import os from 'node:os';

export type Task = () => Promise<void>;

/** Pool size used when none is configured: one slot per core, at least two. */
export function defaultConcurrency(): number {
  return Math.max(2, os.availableParallelism());
}

/**
 * Runs tasks with at most `concurrency` in flight.
 *
 * `submit` resolves once the task has a slot, not when it finishes, so a
 * producer awaiting it is held back while every slot is busy. The first task
 * failure is kept and rethrown by `drain`.
 */
export class WorkerPool {
  private permits: number;
  private readonly waiting: Array<() => void> = [];
  private readonly inFlight = new Set<Promise<void>>();
  private failure: { error: unknown } | undefined;

  constructor(readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
    this.permits = concurrency;
  }

  get active(): number {
    return this.inFlight.size;
  }

  async submit(task: Task): Promise<void> {
    await this.acquire();
    const running = this.run(task);
    this.inFlight.add(running);
    void running.finally(() => this.inFlight.delete(running));
  }

  /**
   * Waits for every task already submitted.
   * @throws the first error a task threw
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
    if (this.failure) {
      throw this.failure.error;
    }
  }

  private async run(task: Task): Promise<void> {
    try {
      await task();
    } catch (error) {
      this.failure ??= { error };
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.permits++;
    }
  }
}
