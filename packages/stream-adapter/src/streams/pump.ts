import type { AsyncByteStream } from "../api/async-byte-stream.js";
import { type ReadChunksOptions, readChunks } from "./read-chunks.js";
import { writeAll } from "./write-all.js";

/**
 * Copies `from` into `to` until `from` reports end-of-input.
 * Resolves with the number of bytes copied. Does not shut `to` down.
 */
export function pump(
  from: Pick<AsyncByteStream, "tryRead">,
  to: Pick<AsyncByteStream, "write">,
  options: ReadChunksOptions = {},
): Promise<number> {
  return writeAll(to, readChunks(from, options));
}
