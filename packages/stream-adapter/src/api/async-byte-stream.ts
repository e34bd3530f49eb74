/**
 * Promise-based byte stream.
 *
 * Writes complete in the order they were issued, and so do reads. The two
 * directions are independent of each other.
 */
export interface AsyncByteStream {
  /**
   * Writes the first `length` bytes of `buffer` (all of it by default).
   * The caller must not modify the buffer until the promise settles.
   */
  write(buffer: Uint8Array, length?: number): Promise<void>;

  /**
   * Writes every piece in order; resolves once all of them are written.
   */
  write(pieces: readonly Uint8Array[]): Promise<void>;

  /**
   * Reads between `minBytes` and `maxBytes` bytes (default: exactly
   * `minBytes`) into the start of `buffer` and resolves with the count.
   * Rejects if end-of-input comes first.
   */
  read(buffer: Uint8Array, minBytes: number, maxBytes?: number): Promise<number>;

  /**
   * Like `read()`, but resolves with a short count (possibly 0) on
   * end-of-input instead of rejecting.
   */
  tryRead(buffer: Uint8Array, minBytes: number, maxBytes?: number): Promise<number>;

  /**
   * Stops accepting writes. Writes already queued are completed and the
   * stream is flushed once.
   */
  shutdownWrite(): void;
}
