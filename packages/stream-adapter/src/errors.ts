/**
 * Stream adapter error classes.
 */

/** Which blocking call an underlying failure came from. */
export type StreamOperation = "write" | "flush" | "read";

/**
 * Base error for all stream adapter operations.
 */
export class StreamAdapterError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StreamAdapterError";
  }
}

/**
 * `write()` called after `shutdownWrite()`.
 */
export class WriteAfterShutdownError extends StreamAdapterError {
  constructor() {
    super("write() called after shutdownWrite() has been called");
    this.name = "WriteAfterShutdownError";
  }
}

/**
 * Strict `read()` called once the stream is known to be exhausted.
 */
export class ReadAfterEofError extends StreamAdapterError {
  readonly bytesRequested: number;

  constructor(bytesRequested: number) {
    super(`EOF when attempting to read ${bytesRequested} bytes`);
    this.name = "ReadAfterEofError";
    this.bytesRequested = bytesRequested;
  }
}

/**
 * Strict read hit end-of-input before `minBytes` arrived.
 */
export class PrematureEofError extends StreamAdapterError {
  readonly bytesRead: number;
  readonly bytesRequested: number;

  constructor(bytesRead: number, bytesRequested: number) {
    super(`EOF when attempting to read: got ${bytesRead} of ${bytesRequested} bytes`);
    this.name = "PrematureEofError";
    this.bytesRead = bytesRead;
    this.bytesRequested = bytesRequested;
  }
}

export class InvalidReadRangeError extends StreamAdapterError {
  readonly minBytes: number;
  readonly maxBytes: number;
  readonly capacity: number;

  constructor(minBytes: number, maxBytes: number, capacity: number) {
    super(
      `Invalid read range: need 0 <= minBytes (${minBytes}) <= maxBytes (${maxBytes}) <= buffer length (${capacity})`,
    );
    this.name = "InvalidReadRangeError";
    this.minBytes = minBytes;
    this.maxBytes = maxBytes;
    this.capacity = capacity;
  }
}

export class InvalidWriteLengthError extends StreamAdapterError {
  readonly length: number;
  readonly capacity: number;

  constructor(length: number, capacity: number) {
    super(`Invalid write length ${length} for a buffer of ${capacity} bytes`);
    this.name = "InvalidWriteLengthError";
    this.length = length;
    this.capacity = capacity;
  }
}

/**
 * The wrapped stream failed for a reason other than end-of-input.
 *
 * The original error is kept as `cause`.
 */
export class StreamIoError extends StreamAdapterError {
  readonly operation: StreamOperation;

  constructor(operation: StreamOperation, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Blocking ${operation} failed: ${detail}`, { cause });
    this.name = "StreamIoError";
    this.operation = operation;
  }
}

/**
 * `readSome()` returned a count outside `[0, requested]` or not an integer.
 */
export class InvalidReadResultError extends StreamAdapterError {
  readonly result: number;
  readonly requested: number;

  constructor(result: number, requested: number) {
    super(`readSome() returned ${result} for a request of ${requested} bytes`);
    this.name = "InvalidReadResultError";
    this.result = result;
    this.requested = requested;
  }
}

/**
 * Request still queued when the adapter was disposed.
 */
export class StreamDisposedError extends StreamAdapterError {
  constructor(message = "Stream adapter has been disposed") {
    super(message);
    this.name = "StreamDisposedError";
  }
}

/**
 * Thrown by `BlockingStream.readSome()` to signal end-of-input,
 * as an alternative to returning 0.
 */
export class EndOfStreamError extends Error {
  constructor(message = "End of stream") {
    super(message);
    this.name = "EndOfStreamError";
  }
}
