import { concat } from "./concat.js";

/**
 * Collect sync or async iterable items into an array.
 */
export async function toArray<T>(input: Iterable<T> | AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const item of input) {
    result.push(item);
  }
  return result;
}

/**
 * Collect a chunked byte stream into a single Uint8Array.
 *
 * Intended for tests and small payloads; large streams should be consumed
 * chunk by chunk.
 */
export async function collect(
  input: AsyncIterable<Uint8Array> | Iterable<Uint8Array>,
): Promise<Uint8Array> {
  return concat(...(await toArray(input)));
}
