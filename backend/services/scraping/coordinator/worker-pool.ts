// =====================================================
// BOUNDED WORKER POOL
// =====================================================

interface QueuedTask {
  id: string;
  priority: number;
  timestamp: number;
  // Settles the caller's promise; never rejects itself
  run: () => Promise<void>;
}

export interface WorkerPoolStats {
  concurrency: number;
  queueLength: number;
  activeTasks: number;
  oldestTaskAgeMs: number;
  nextTaskId: string | null;
}

/**
 * Runs at most `concurrency` tasks at a time. Higher priority first,
 * FIFO within a priority.
 */
export class WorkerPool {
  private queue: QueuedTask[] = [];
  private activeTasks = 0;

  constructor(
    private readonly concurrency = 5,
    private readonly now: () => number = Date.now,
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`WorkerPool concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  enqueue<R>(id: string, execute: () => Promise<R>, priority = 0): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      const task: QueuedTask = {
        id,
        priority,
        timestamp: this.now(),
        run: async () => {
          try {
            resolve(await execute());
          } catch (error) {
            reject(error);
          }
        },
      };

      // Insert based on priority
      const insertIndex = this.queue.findIndex((queued) => queued.priority < priority);
      if (insertIndex === -1) {
        this.queue.push(task);
      } else {
        this.queue.splice(insertIndex, 0, task);
      }

      this.drain();
    });
  }

  private drain() {
    while (this.activeTasks < this.concurrency) {
      const task = this.queue.shift();
      if (!task) return;

      this.activeTasks++;
      void task.run().finally(() => {
        this.activeTasks--;
        this.drain();
      });
    }
  }

  getStats(): WorkerPoolStats {
    const oldest = this.queue.reduce<number | null>(
      (min, task) => (min === null || task.timestamp < min ? task.timestamp : min),
      null,
    );

    return {
      concurrency: this.concurrency,
      queueLength: this.queue.length,
      activeTasks: this.activeTasks,
      oldestTaskAgeMs: oldest === null ? 0 : this.now() - oldest,
      nextTaskId: this.queue[0]?.id ?? null,
    };
  }
}

/**
 * Settle with `promise`, or reject with `onTimeout()` once `ms` elapse.
 * The underlying work is not cancelled.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
