export { microtaskScheduler, type Scheduler, timeoutScheduler } from "./scheduler.js";
