export * from "./collections/index.js";
export * from "./completion/index.js";
export * from "./logging/index.js";
export * from "./scheduling/index.js";
export { collect, toArray } from "./streams/collect.js";
export { concat } from "./streams/concat.js";
export { decodeString, encodeString } from "./streams/encoding.js";
