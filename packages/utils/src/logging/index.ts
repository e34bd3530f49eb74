export { consoleLogger, type Logger, noopLogger } from "./logger.js";
