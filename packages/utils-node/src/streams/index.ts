export { FdBlockingStream, FileBlockingStream, openFileStream } from "./fd-blocking-stream.js";
