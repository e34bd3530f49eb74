import type { AsyncByteStream } from "../api/async-byte-stream.js";

/**
 * Writes every chunk of `source` in order and resolves with the number of
 * bytes written. Each chunk is awaited before the next one is pulled, so the
 * source is never read ahead of the stream.
 */
export async function writeAll(
  stream: Pick<AsyncByteStream, "write">,
  source: AsyncIterable<Uint8Array> | Iterable<Uint8Array>,
): Promise<number> {
  let total = 0;
  for await (const chunk of source) {
    await stream.write(chunk);
    total += chunk.length;
  }
  return total;
}
