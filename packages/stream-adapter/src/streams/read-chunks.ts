import type { AsyncByteStream } from "../api/async-byte-stream.js";

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * Options for chunked reading.
 */
export interface ReadChunksOptions {
  /** Largest chunk to request per read (default: 64KB) */
  chunkSize?: number;
}

/**
 * Reads a stream to its end as a sequence of chunks.
 *
 * Each chunk is whatever one `tryRead(buffer, 1, chunkSize)` returned, in a
 * freshly allocated buffer, so consumers may keep chunks around. The
 * generator ends on the first empty read.
 */
export async function* readChunks(
  stream: Pick<AsyncByteStream, "tryRead">,
  options: ReadChunksOptions = {},
): AsyncGenerator<Uint8Array, void, unknown> {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  while (true) {
    const buffer = new Uint8Array(chunkSize);
    const count = await stream.tryRead(buffer, 1, chunkSize);
    if (count === 0) return;
    yield buffer.subarray(0, count);
  }
}
