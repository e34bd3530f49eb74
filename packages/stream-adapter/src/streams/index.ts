export { createDuplex, type DuplexBridgeOptions } from "./duplex-bridge.js";
export { pump } from "./pump.js";
export { DEFAULT_CHUNK_SIZE, type ReadChunksOptions, readChunks } from "./read-chunks.js";
export { writeAll } from "./write-all.js";
