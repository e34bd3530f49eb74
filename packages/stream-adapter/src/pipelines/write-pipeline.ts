import { Completion } from "@syncbridge/utils";
import type { BlockingStream } from "../api/blocking-stream.js";
import { WriteAfterShutdownError } from "../errors.js";
import { DrainPipeline, type PipelineContext } from "./drain-pipeline.js";

export interface WriteRequest {
  /** Borrowed view of the caller's buffer. */
  data: Uint8Array;
  completion: Completion<void>;
}

/**
 * Write direction: queued writes go to `writeBlocking()` one at a time, in
 * the order they were issued. After `shutdown()` the queue is drained and the
 * stream flushed exactly once.
 */
export class WritePipeline extends DrainPipeline<WriteRequest> {
  private shutdownRequested = false;
  private flushed = false;

  constructor(
    private readonly stream: BlockingStream,
    context: PipelineContext,
  ) {
    super("write", context);
  }

  get isShutdown(): boolean {
    return this.shutdownRequested;
  }

  get isFlushed(): boolean {
    return this.flushed;
  }

  /** The error a new write would be rejected with, if any. */
  check(): Error | undefined {
    return this.rejection() ?? (this.shutdownRequested ? new WriteAfterShutdownError() : undefined);
  }

  write(data: Uint8Array): Promise<void> {
    const error = this.check();
    if (error) return Promise.reject(error);
    const completion = new Completion<void>();
    this.enqueue({ data, completion });
    return completion.promise;
  }

  shutdown(): void {
    if (this.shutdownRequested) return;
    this.shutdownRequested = true;
    this.ensureWorker();
  }

  protected drain(): void {
    for (;;) {
      const request = this.queue.peek();
      if (!request) break;
      this.invoke("write", () => this.stream.writeBlocking(request.data));
      this.queue.shift();
      request.completion.fulfill();
    }

    if (this.shutdownRequested && !this.flushed) {
      this.invoke("flush", () => this.stream.flushBlocking());
      this.flushed = true;
    }
  }
}
