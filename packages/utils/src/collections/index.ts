export { RequestQueue } from "./request-queue.js";
