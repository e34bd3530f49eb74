import type { Logger } from "@syncbridge/utils";
import type { Duplex } from "../api/duplex.js";
import type { AsyncStreamWrapper } from "../async-stream-wrapper.js";
import { type ReadChunksOptions, readChunks } from "./read-chunks.js";

/**
 * Options for exposing a wrapper as a Duplex.
 */
export interface DuplexBridgeOptions extends ReadChunksOptions {
  /** Failed fire-and-forget writes are reported here. */
  logger?: Logger;
}

/**
 * Expose an AsyncStreamWrapper through the Duplex interface.
 *
 * - iteration yields chunks read with `tryRead()` until end-of-input
 * - `write()` queues the bytes and returns immediately
 * - `close()` shuts the write side down, waits for the flush, and rejects
 *   with the first failed write if there was one
 *
 * Since `write()` cannot report failures, the first one is remembered and
 * rethrown by `close()`.
 */
export function createDuplex(stream: AsyncStreamWrapper, options: DuplexBridgeOptions = {}): Duplex {
  let writeFailure: unknown;
  let failed = false;

  return {
    [Symbol.asyncIterator]() {
      return readChunks(stream, options);
    },

    write(data: Uint8Array) {
      stream.write(data).catch((error: unknown) => {
        options.logger?.error?.("Duplex write failed:", error);
        if (!failed) {
          failed = true;
          writeFailure = error;
        }
      });
    },

    async close() {
      stream.shutdownWrite();
      await stream.whenWritesSettled();
      if (failed) throw writeFailure;
    },
  };
}
