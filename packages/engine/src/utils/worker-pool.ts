export type Task = () => Promise<void>;

export interface WorkerPoolOptions {
  /** Tasks allowed to run at once. */
  concurrency: number;
  /** Tasks allowed to wait for a free slot. Default: unbounded */
  maxPending?: number;
  /** Called with whatever a task rejects with. */
  onTaskError?: (err: unknown) => void;
}

/**
 * Bounded pool of async tasks.
 * At most `concurrency` tasks run; the rest wait in FIFO order. Submitters
 * never wait on the tasks they hand over.
 */
export class WorkerPool {
  private readonly concurrency: number;
  private readonly maxPending: number;
  private readonly onTaskError?: (err: unknown) => void;
  private readonly queue: Task[] = [];
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(options: WorkerPoolOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError("concurrency must be a positive integer");
    }
    this.concurrency = options.concurrency;
    this.maxPending = options.maxPending ?? Number.POSITIVE_INFINITY;
    this.onTaskError = options.onTaskError;
  }

  get active(): number {
    return this.running;
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * Start `task` now if a slot is free, otherwise queue it.
   * Returns false, without running it, when the queue is full.
   */
  submit(task: Task): boolean {
    if (this.running < this.concurrency) {
      this.start(task);
      return true;
    }
    if (this.queue.length >= this.maxPending) {
      return false;
    }
    this.queue.push(task);
    return true;
  }

  /** Drop every queued task without running it. Returns how many were dropped. */
  clear(): number {
    const dropped = this.queue.length;
    this.queue.length = 0;
    if (this.running === 0) {
      this.notifyIdle();
    }
    return dropped;
  }

  /** Resolves once nothing is running or queued. */
  onIdle(): Promise<void> {
    if (this.running === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private start(task: Task): void {
    this.running++;
    void this.run(task);
  }

  private async run(task: Task): Promise<void> {
    try {
      await task();
    } catch (err) {
      this.onTaskError?.(err);
    } finally {
      this.running--;
      const next = this.queue.shift();
      if (next) {
        this.start(next);
      } else if (this.running === 0) {
        this.notifyIdle();
      }
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
