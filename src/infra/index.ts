export { logger, type LogLevel } from "./logger.js";
export * from "./errors.js";
