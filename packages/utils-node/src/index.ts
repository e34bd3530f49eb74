/**
 * Node.js-specific pieces for @syncbridge/stream-adapter
 *
 * Blocking streams over file descriptors, and a scheduler that lets other
 * I/O run between drain passes.
 *
 * @example
 * ```ts
 * import { AsyncStreamWrapper } from "@syncbridge/stream-adapter";
 * import { FdBlockingStream, immediateScheduler } from "@syncbridge/utils-node";
 *
 * const stdin = new AsyncStreamWrapper(new FdBlockingStream(0), {
 *   scheduler: immediateScheduler,
 * });
 * ```
 *
 * @packageDocumentation
 */

export * from "./scheduling/index.js";
export * from "./streams/index.js";
