/**
 * Hands a task to the event loop to run later, on the same thread.
 *
 * Implementations must never run the task synchronously: callers rely on
 * finishing their own bookkeeping before the task starts.
 */
export type Scheduler = (task: () => void) => void;

/** Runs tasks from the microtask queue, before any pending I/O callback. */
export const microtaskScheduler: Scheduler = (task) => {
  queueMicrotask(task);
};

/**
 * Runs tasks from the timer queue, letting I/O callbacks and other
 * macrotasks run between them.
 */
export const timeoutScheduler: Scheduler = (task) => {
  setTimeout(task, 0);
};
