/**
 * Bidirectional byte channel in the shape transport code consumes:
 * chunks come in through async iteration and `write()` does not wait.
 *
 * @example Drive a duplex backed by a blocking stream
 * ```ts
 * const duplex = createDuplex(new AsyncStreamWrapper(blockingStream));
 * duplex.write(encodeString("ping\n"));
 * for await (const chunk of duplex) {
 *   handle(chunk);
 * }
 * await duplex.close?.();
 * ```
 */
export interface Duplex {
  /** Incoming chunks, in arrival order, until end-of-input. */
  [Symbol.asyncIterator](): AsyncIterator<Uint8Array>;

  /** Queues `data` for sending. Failures surface through `close()`. */
  write(data: Uint8Array): void;

  /**
   * Stops sending and resolves once everything queued went out.
   * Optional - not every channel can be closed from this side.
   */
  close?(): Promise<void>;
}
