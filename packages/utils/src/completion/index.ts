export { Completion, CompletionSettledError, type CompletionState } from "./completion.js";
