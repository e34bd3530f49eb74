import { Completion, type Logger, RequestQueue, type Scheduler } from "@syncbridge/utils";
import { StreamIoError, type StreamOperation } from "../errors.js";

/**
 * Shared collaborators of the read and write pipelines.
 */
export interface PipelineContext {
  scheduler: Scheduler;
  logger: Logger;
  onError: (error: StreamIoError) => void;
}

/** Anything queued in a pipeline: it must be possible to fail it. */
export interface PendingRequest {
  completion: { reject(error: unknown): void };
}

export type Direction = "read" | "write";

/**
 * One direction of the adapter: a FIFO queue drained by at most one
 * scheduled worker at a time.
 *
 * `active` is raised when the worker is handed to the scheduler, not when it
 * starts, so any number of enqueues before the worker runs still schedule a
 * single worker. The worker lowers it in `finally` on every exit path.
 *
 * Subclasses implement `drain()`, which runs synchronously and may throw
 * `StreamIoError`. Such a failure rejects every request still queued with the
 * same error and latches the direction failed.
 */
export abstract class DrainPipeline<R extends PendingRequest> {
  protected readonly queue = new RequestQueue<R>();
  protected failure: StreamIoError | undefined;
  protected disposal: Error | undefined;
  private active = false;
  private idleWaiters: Completion<void>[] = [];

  constructor(
    readonly direction: Direction,
    protected readonly context: PipelineContext,
  ) {}

  /** A worker is scheduled or running. */
  get isActive(): boolean {
    return this.active;
  }

  get pending(): number {
    return this.queue.size;
  }

  get isDisposed(): boolean {
    return this.disposal !== undefined;
  }

  /** The error this direction is latched on, if any. */
  get error(): StreamIoError | undefined {
    return this.failure;
  }

  /**
   * Resolves once nothing is queued and no worker is outstanding.
   * Rejects with the latched error if this direction failed.
   */
  whenIdle(): Promise<void> {
    if (!this.active && this.queue.isEmpty) {
      return this.failure ? Promise.reject(this.failure) : Promise.resolve();
    }
    const waiter = new Completion<void>();
    this.idleWaiters.push(waiter);
    return waiter.promise;
  }

  /**
   * Fails every queued request with `reason`. A scheduled worker will exit
   * without touching the stream.
   */
  dispose(reason: Error): void {
    if (this.disposal) return;
    this.disposal = reason;
    for (const request of this.queue.drain()) {
      request.completion.reject(reason);
    }
    if (!this.active) this.settleIdleWaiters();
  }

  /** Why a new request cannot be queued right now, if it cannot. */
  protected rejection(): Error | undefined {
    return this.disposal ?? this.failure;
  }

  protected enqueue(request: R): void {
    this.queue.push(request);
    this.ensureWorker();
  }

  protected ensureWorker(): void {
    if (this.active) return;
    this.active = true;
    this.context.scheduler(() => this.runWorker());
  }

  /** Runs a blocking call, tagging any failure with the operation it came from. */
  protected invoke<T>(operation: StreamOperation, call: () => T): T {
    try {
      return call();
    } catch (error) {
      throw new StreamIoError(operation, error);
    }
  }

  protected abstract drain(): void;

  /** Logs through the injected logger; a throwing logger is ignored. */
  protected log(level: keyof Logger, ...args: unknown[]): void {
    try {
      this.context.logger[level]?.(...args);
    } catch {
      // Nowhere left to report a failing log sink
    }
  }

  private runWorker(): void {
    try {
      this.log("debug", `${this.direction} worker started`, { pending: this.queue.size });
      if (!this.disposal && !this.failure) {
        this.drain();
      }
    } catch (error) {
      if (!(error instanceof StreamIoError)) throw error;
      this.fail(error);
    } finally {
      this.active = false;
      this.log("debug", `${this.direction} worker finished`, { pending: this.queue.size });
      // Only a non-I/O exception out of drain() can leave entries behind.
      if (this.queue.isEmpty) {
        this.settleIdleWaiters();
      }
    }
  }

  private fail(error: StreamIoError): void {
    this.failure = error;
    const abandoned = this.queue.drain();
    for (const request of abandoned) {
      request.completion.reject(error);
    }
    this.log("error", `${this.direction} pipeline failed, ${abandoned.length} request(s) rejected`, error);
    try {
      this.context.onError(error);
    } catch (hookError) {
      this.log("error", `${this.direction} pipeline onError callback failed`, hookError);
    }
  }

  private settleIdleWaiters(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const waiter of waiters) {
      if (this.failure) {
        waiter.reject(this.failure);
      } else {
        waiter.fulfill();
      }
    }
  }
}
