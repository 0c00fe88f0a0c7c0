import type { DispatchMode } from "../config/server-config.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { WorkerPool } from "../utils/worker-pool.js";

export type ConnectionTask = (socket: ITcpSocket) => Promise<void>;

/**
 * Hands an accepted connection to the handler. The returned promise is what
 * the accept loop waits on before accepting again.
 */
export interface DispatchStrategy {
  readonly mode: DispatchMode;
  dispatch(socket: ITcpSocket, task: ConnectionTask): Promise<void>;
  /** Resolves when no dispatched work is outstanding. */
  drain(): Promise<void>;
  /** Forget connections that are waiting for a worker. */
  clear(): void;
}

/** Runs the handler inline: one connection at a time, in arrival order. */
export class SequentialDispatch implements DispatchStrategy {
  readonly mode = "sequential";
  private current: Promise<void> = Promise.resolve();

  async dispatch(socket: ITcpSocket, task: ConnectionTask): Promise<void> {
    this.current = task(socket);
    await this.current;
  }

  drain(): Promise<void> {
    return this.current;
  }

  clear(): void {}
}

export interface ConcurrentDispatchOptions {
  maxConcurrency: number;
  maxPending: number;
  logger: Logger;
}

/**
 * Fire-and-forget dispatch onto a bounded worker pool. The accept loop gets
 * control back as soon as the connection is queued; when the queue is full
 * the connection is closed unanswered.
 */
export class ConcurrentDispatch implements DispatchStrategy {
  readonly mode = "concurrent";
  private readonly pool: WorkerPool;
  private readonly logger: Logger;

  constructor(options: ConcurrentDispatchOptions) {
    this.logger = options.logger;
    this.pool = new WorkerPool({
      concurrency: options.maxConcurrency,
      maxPending: options.maxPending,
      onTaskError: (err) => {
        this.logger.error("Connection worker failed:", err);
      },
    });
  }

  dispatch(socket: ITcpSocket, task: ConnectionTask): Promise<void> {
    const accepted = this.pool.submit(() => task(socket));
    if (!accepted) {
      this.logger.warn(
        `Worker queue full (${this.pool.pending} waiting), dropping connection from ${socket.remoteAddress ?? "?"}`,
      );
      socket.close();
    }
    return Promise.resolve();
  }

  drain(): Promise<void> {
    return this.pool.onIdle();
  }

  clear(): void {
    this.pool.clear();
  }
}

export function createDispatchStrategy(
  mode: DispatchMode,
  options: ConcurrentDispatchOptions,
): DispatchStrategy {
  return mode === "sequential"
    ? new SequentialDispatch()
    : new ConcurrentDispatch(options);
}
