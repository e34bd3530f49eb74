export {
  type Direction,
  DrainPipeline,
  type PendingRequest,
  type PipelineContext,
} from "./drain-pipeline.js";
export { type ReadRequest, ReadPipeline } from "./read-pipeline.js";
export { WritePipeline, type WriteRequest } from "./write-pipeline.js";
