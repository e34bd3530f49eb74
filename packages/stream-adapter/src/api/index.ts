export type { AsyncByteStream } from "./async-byte-stream.js";
export type { BlockingStream } from "./blocking-stream.js";
export type { Duplex } from "./duplex.js";
