/**
 * BlockingStream over a Node.js file descriptor.
 *
 * Uses the synchronous `fs` calls, which block the thread until the kernel
 * answers. A non-blocking descriptor that answers EAGAIN is retried after a
 * growing pause of up to 50 ms, so an idle pipe parks the thread rather than
 * spinning it. Reads and writes share the descriptor's file position, so use
 * separate descriptors when a file is read and written at the same time.
 */

import { closeSync, fsyncSync, openSync, readSync, writeSync } from "node:fs";
import type { OpenMode } from "node:fs";
import {
  AsyncStreamWrapper,
  type AsyncStreamWrapperOptions,
  type BlockingStream,
} from "@syncbridge/stream-adapter";
import { immediateScheduler } from "../scheduling/index.js";

/** fsync() errors meaning "this descriptor cannot be synced" (pipes, ttys). */
const UNSYNCABLE = new Set(["EINVAL", "ENOTSUP", "EROFS"]);

/** Longest pause between retries on a descriptor answering EAGAIN. */
const MAX_RETRY_DELAY_MS = 50;

const pauseCell = new Int32Array(new SharedArrayBuffer(4));

/** Pause before the `attempt`-th retry (0-based): 1, 2, 4 ... capped ms. */
export function retryDelayMs(attempt: number): number {
  return Math.min(2 ** attempt, MAX_RETRY_DELAY_MS);
}

/** Blocks the thread without spinning; nothing ever notifies the cell. */
function pause(attempt: number): void {
  Atomics.wait(pauseCell, 0, 0, retryDelayMs(attempt));
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export class FdBlockingStream implements BlockingStream {
  constructor(readonly fd: number) {}

  writeBlocking(data: Uint8Array): void {
    let offset = 0;
    let attempt = 0;
    while (offset < data.length) {
      try {
        offset += writeSync(this.fd, data, offset, data.length - offset);
        attempt = 0;
      } catch (error) {
        // Non-blocking pipes answer EAGAIN while full; wait them out.
        if (errorCode(error) !== "EAGAIN") throw error;
        pause(attempt++);
      }
    }
  }

  flushBlocking(): void {
    try {
      fsyncSync(this.fd);
    } catch (error) {
      const code = errorCode(error);
      if (code === undefined || !UNSYNCABLE.has(code)) throw error;
    }
  }

  readSome(target: Uint8Array): number {
    for (let attempt = 0; ; attempt++) {
      try {
        return readSync(this.fd, target, 0, target.length, null);
      } catch (error) {
        if (errorCode(error) !== "EAGAIN") throw error;
        pause(attempt);
      }
    }
  }
}

/**
 * A file opened for blocking access. `close()` releases the descriptor.
 */
export class FileBlockingStream extends FdBlockingStream {
  private closed = false;

  readonly path: string;

  constructor(path: string, flags: OpenMode = "r") {
    super(openSync(path, flags));
    this.path = path;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    closeSync(this.fd);
  }
}

/**
 * Open `path` and wrap it for promise-based access.
 *
 * Workers run on `immediateScheduler` unless `options.scheduler` says
 * otherwise.
 *
 * @example
 * ```typescript
 * const { stream, file } = openFileStream("/tmp/out.log", "w");
 * await stream.write(encodeString("hello\n"));
 * stream.shutdownWrite();
 * await stream.whenWritesSettled();
 * file.close();
 * ```
 */
export function openFileStream(
  path: string,
  flags: OpenMode = "r",
  options: AsyncStreamWrapperOptions = {},
): { stream: AsyncStreamWrapper; file: FileBlockingStream } {
  const file = new FileBlockingStream(path, flags);
  const stream = new AsyncStreamWrapper(file, {
    ...options,
    scheduler: options.scheduler ?? immediateScheduler,
  });
  return { stream, file };
}
