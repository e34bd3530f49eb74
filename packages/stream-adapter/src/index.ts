/**
 * Promise-based access to blocking byte streams.
 *
 * `AsyncStreamWrapper` is the entry point; the pipelines are exported for
 * callers that need only one direction.
 */

export * from "./api/index.js";
export { AsyncStreamWrapper, type AsyncStreamWrapperOptions } from "./async-stream-wrapper.js";
export {
  EndOfStreamError,
  InvalidReadRangeError,
  InvalidReadResultError,
  InvalidWriteLengthError,
  PrematureEofError,
  ReadAfterEofError,
  StreamAdapterError,
  StreamDisposedError,
  StreamIoError,
  type StreamOperation,
  WriteAfterShutdownError,
} from "./errors.js";
export * from "./pipelines/index.js";
export * from "./streams/index.js";
