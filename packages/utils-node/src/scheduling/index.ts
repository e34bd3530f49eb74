import type { Scheduler } from "@syncbridge/utils";

/**
 * Runs tasks from the check phase of the Node.js event loop, right after
 * pending I/O callbacks. Suits workers that block on local files: other
 * I/O gets a turn between two drain passes.
 */
export const immediateScheduler: Scheduler = (task) => {
  setImmediate(task);
};
