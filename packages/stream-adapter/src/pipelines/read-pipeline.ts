import { Completion } from "@syncbridge/utils";
import type { BlockingStream } from "../api/blocking-stream.js";
import {
  EndOfStreamError,
  InvalidReadRangeError,
  InvalidReadResultError,
  PrematureEofError,
  ReadAfterEofError,
  StreamIoError,
} from "../errors.js";
import { DrainPipeline, type PipelineContext } from "./drain-pipeline.js";

export interface ReadRequest {
  buffer: Uint8Array;
  minBytes: number;
  maxBytes: number;
  /** Resolve with a short count on end-of-input instead of rejecting. */
  truncateForEof: boolean;
  completion: Completion<number>;
}

/**
 * Read direction.
 *
 * Each request is filled by repeated `readSome()` calls until `minBytes` have
 * arrived or the stream reports end-of-input. Every sub-read may return up to
 * `maxBytes - total`, so a request can end with more than `minBytes`.
 *
 * A request that ran into end-of-input is settled on its own (short count or
 * `PrematureEofError`) and the worker moves on to the next one. Any exception
 * from `readSome()` counts as end-of-input. The pipeline
 * never decides by itself that the stream is exhausted; see `markEof()`.
 */
export class ReadPipeline extends DrainPipeline<ReadRequest> {
  private eof = false;

  constructor(
    private readonly stream: BlockingStream,
    context: PipelineContext,
  ) {
    super("read", context);
  }

  get isEof(): boolean {
    return this.eof;
  }

  /**
   * Records that the stream is exhausted. Later reads are answered without
   * touching the stream; reads already queued still run.
   */
  markEof(): void {
    this.eof = true;
  }

  read(
    buffer: Uint8Array,
    minBytes: number,
    maxBytes: number,
    truncateForEof: boolean,
  ): Promise<number> {
    if (!isValidRange(minBytes, maxBytes, buffer.length)) {
      return Promise.reject(new InvalidReadRangeError(minBytes, maxBytes, buffer.length));
    }
    const error = this.rejection();
    if (error) return Promise.reject(error);
    if (this.eof) {
      return truncateForEof ? Promise.resolve(0) : Promise.reject(new ReadAfterEofError(minBytes));
    }

    const completion = new Completion<number>();
    this.enqueue({ buffer, minBytes, maxBytes, truncateForEof, completion });
    return completion.promise;
  }

  protected drain(): void {
    for (;;) {
      const request = this.queue.peek();
      if (!request) break;
      const total = this.fill(request);
      this.queue.shift();
      if (total >= request.minBytes || request.truncateForEof) {
        request.completion.fulfill(total);
      } else {
        request.completion.reject(new PrematureEofError(total, request.minBytes));
      }
    }
  }

  /** Returns the byte count; fewer than `minBytes` means end-of-input. */
  private fill({ buffer, minBytes, maxBytes }: ReadRequest): number {
    let total = 0;
    while (total < minBytes) {
      const count = this.readSome(buffer.subarray(total, maxBytes));
      if (count === 0) break;
      total += count;
    }
    return total;
  }

  private readSome(target: Uint8Array): number {
    let count: number;
    try {
      count = this.stream.readSome(target);
    } catch (error) {
      // readSome() only throws at end-of-input.
      if (!(error instanceof EndOfStreamError)) {
        this.log("debug", "read ended by stream exception", error);
      }
      return 0;
    }
    if (!Number.isInteger(count) || count < 0 || count > target.length) {
      throw new StreamIoError("read", new InvalidReadResultError(count, target.length));
    }
    return count;
  }
}

function isValidRange(minBytes: number, maxBytes: number, capacity: number): boolean {
  return (
    Number.isInteger(minBytes) &&
    Number.isInteger(maxBytes) &&
    minBytes >= 0 &&
    minBytes <= maxBytes &&
    maxBytes <= capacity
  );
}
