/**
 * Synchronous byte stream whose every call may block the calling thread.
 *
 * This is the only collaborator the adapter wraps. Implementations may be
 * backed by a file descriptor, a pipe, or an in-memory buffer; the adapter
 * only assumes the calls below.
 */
export interface BlockingStream {
  /**
   * Writes every byte of `data`, blocking until done, or throws.
   * The view is borrowed: implementations must copy what they keep.
   */
  writeBlocking(data: Uint8Array): void;

  /**
   * Blocks until all buffered output has been handed to the device.
   */
  flushBlocking(): void;

  /**
   * Reads at least one and at most `target.length` bytes into `target` and
   * returns the count. A short count is not end-of-input; end-of-input is
   * signalled by returning 0 or by throwing, conventionally
   * `EndOfStreamError`. Any exception is taken as end-of-input, so failures
   * that are not should not be thrown from here.
   */
  readSome(target: Uint8Array): number;
}
