// src/utils/workerPool.ts — bounded task queue with a fixed number of concurrent slots

export interface WorkerPoolOptions<T> {
  concurrency: number;
  /** Called when a task's handler rejects. The pool keeps going. */
  onError?: (task: T, err: unknown) => void;
}

export interface DrainResult {
  /** False when the budget elapsed before the queue emptied. */
  completed: boolean;
  started: number;
  finished: number;
  /** Tasks never started because the budget ran out. */
  abandonedQueued: number;
  /** Tasks still running when the budget ran out; their outcome is ignored. */
  abandonedInFlight: number;
}

export type TaskHandler<T> = (task: T, pool: { enqueue(task: T): void }) => Promise<void>;

/**
 * At most `concurrency` handlers run at once. Handlers may enqueue follow-up tasks while the
 * pool is draining. Once the drain budget elapses no new task starts and drain() resolves
 * without waiting for the ones still in flight.
 */
export class WorkerPool<T> {
  private readonly queue: T[] = [];
  private readonly concurrency: number;
  private readonly onError?: (task: T, err: unknown) => void;
  private active = 0;
  private started = 0;
  private finished = 0;
  private stopped = false;
  private peak = 0;
  private onIdle: (() => void) | null = null;

  constructor(
    private readonly handler: TaskHandler<T>,
    options: WorkerPoolOptions<T>,
  ) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
    }
    this.concurrency = options.concurrency;
    this.onError = options.onError;
  }

  /** Highest number of handlers observed running at the same time. */
  get peakConcurrency(): number {
    return this.peak;
  }

  enqueue(task: T): void {
    if (this.stopped) return;
    this.queue.push(task);
    this.pump();
  }

  async drain(budgetMs: number): Promise<DrainResult> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const idle = new Promise<boolean>((resolve) => {
      if (this.isIdle()) {
        resolve(true);
        return;
      }
      this.onIdle = () => resolve(true);
    });
    const budget = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), budgetMs);
    });

    const completed = await Promise.race([idle, budget]);
    clearTimeout(timer);
    this.onIdle = null;

    const abandonedQueued = this.queue.length;
    const abandonedInFlight = this.active;
    this.stopped = true;
    this.queue.length = 0;

    return {
      completed,
      started: this.started,
      finished: this.finished,
      abandonedQueued,
      abandonedInFlight,
    };
  }

  private isIdle(): boolean {
    return this.active === 0 && this.queue.length === 0;
  }

  private pump(): void {
    while (!this.stopped && this.active < this.concurrency && this.queue.length > 0) {
      const task = this.queue.shift();
      if (task === undefined) break;
      this.run(task);
    }
    if (this.isIdle()) this.onIdle?.();
  }

  private run(task: T): void {
    this.active++;
    this.started++;
    this.peak = Math.max(this.peak, this.active);
    const enqueue = (next: T) => this.enqueue(next);
    void Promise.resolve()
      .then(() => this.handler(task, { enqueue }))
      .catch((err: unknown) => this.onError?.(task, err))
      .finally(() => {
        this.active--;
        this.finished++;
        this.pump();
      });
  }
}
