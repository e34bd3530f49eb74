import { type Logger, microtaskScheduler, noopLogger, type Scheduler } from "@syncbridge/utils";
import type { AsyncByteStream } from "./api/async-byte-stream.js";
import type { BlockingStream } from "./api/blocking-stream.js";
import { InvalidWriteLengthError, StreamDisposedError, type StreamIoError } from "./errors.js";
import { ReadPipeline } from "./pipelines/read-pipeline.js";
import { WritePipeline } from "./pipelines/write-pipeline.js";

/**
 * Options for creating an AsyncStreamWrapper.
 */
export interface AsyncStreamWrapperOptions {
  /** Where drain workers run. Default: `microtaskScheduler` */
  scheduler?: Scheduler;
  /** Worker start/finish at `debug`, stream failures at `error`. Default: silent */
  logger?: Logger;
  /**
   * Called once per stream failure, after the affected requests have been
   * rejected. Useful when nobody is awaiting the failing direction.
   */
  onError?: (error: StreamIoError) => void;
}

/**
 * Promise-based view of a blocking stream.
 *
 * Each direction keeps its own FIFO queue. The first request of a burst
 * schedules a drain worker; the worker performs the blocking calls for every
 * queued request of that direction, settles their promises, and exits when
 * the queue is empty. The worker holds the thread while it runs, which is
 * only appropriate for streams that answer quickly (local files, pipes,
 * in-memory buffers).
 *
 * Buffers are borrowed, not copied: keep a write buffer unchanged, and a
 * read buffer alive, until the returned promise settles.
 *
 * @example
 * ```ts
 * const stream = new AsyncStreamWrapper(blockingStream);
 * await stream.write(encodeString("HELLO"));
 * const buffer = new Uint8Array(16);
 * const count = await stream.tryRead(buffer, 1, 16);
 * stream.shutdownWrite();
 * await stream.whenWritesSettled();
 * ```
 */
export class AsyncStreamWrapper implements AsyncByteStream {
  private readonly writes: WritePipeline;
  private readonly reads: ReadPipeline;

  constructor(stream: BlockingStream, options: AsyncStreamWrapperOptions = {}) {
    const context = {
      scheduler: options.scheduler ?? microtaskScheduler,
      logger: options.logger ?? noopLogger,
      onError: options.onError ?? (() => {}),
    };
    this.writes = new WritePipeline(stream, context);
    this.reads = new ReadPipeline(stream, context);
  }

  write(buffer: Uint8Array, length?: number): Promise<void>;
  write(pieces: readonly Uint8Array[]): Promise<void>;
  write(input: Uint8Array | readonly Uint8Array[], length?: number): Promise<void> {
    if (input instanceof Uint8Array) {
      const size = length ?? input.length;
      if (!Number.isInteger(size) || size < 0 || size > input.length) {
        return Promise.reject(new InvalidWriteLengthError(size, input.length));
      }
      return this.writes.write(input.subarray(0, size));
    }

    const error = this.writes.check();
    if (error) return Promise.reject(error);
    // Each piece is queued in order, so the join order does not matter.
    return Promise.all(input.map((piece) => this.writes.write(piece))).then(() => undefined);
  }

  read(buffer: Uint8Array, minBytes: number, maxBytes = minBytes): Promise<number> {
    return this.reads.read(buffer, minBytes, maxBytes, false);
  }

  tryRead(buffer: Uint8Array, minBytes: number, maxBytes = minBytes): Promise<number> {
    return this.reads.read(buffer, minBytes, maxBytes, true);
  }

  shutdownWrite(): void {
    this.writes.shutdown();
  }

  /**
   * Records that the wrapped stream is exhausted, for integrations that learn
   * it some other way. Afterwards `read()` rejects and `tryRead()` resolves
   * with 0 without touching the stream.
   */
  markEof(): void {
    this.reads.markEof();
  }

  /**
   * Resolves once every queued write is done (and, after `shutdownWrite()`,
   * the stream is flushed). Rejects if the write side failed.
   */
  whenWritesSettled(): Promise<void> {
    return this.writes.whenIdle();
  }

  /** Resolves once every queued read is settled. Rejects if the read side failed. */
  whenReadsSettled(): Promise<void> {
    return this.reads.whenIdle();
  }

  /**
   * Rejects every request still queued with `reason` and stops using the
   * wrapped stream. Later calls are rejected with the same reason.
   */
  dispose(reason: Error = new StreamDisposedError()): void {
    this.writes.dispose(reason);
    this.reads.dispose(reason);
  }

  get pendingWrites(): number {
    return this.writes.pending;
  }

  get pendingReads(): number {
    return this.reads.pending;
  }

  get isWriteShutdown(): boolean {
    return this.writes.isShutdown || this.writes.isDisposed;
  }

  get isEof(): boolean {
    return this.reads.isEof || this.reads.isDisposed;
  }

  get isDisposed(): boolean {
    return this.writes.isDisposed;
  }

  /** The error the write side is latched on, if any. */
  get writeError(): StreamIoError | undefined {
    return this.writes.error;
  }

  /** The error the read side is latched on, if any. */
  get readError(): StreamIoError | undefined {
    return this.reads.error;
  }
}
