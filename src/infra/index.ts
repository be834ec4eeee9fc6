export { logger, type LogLevel } from "./logger.js";
export { runCommand, type RunOptions, type RunResult } from "./process.js";
export * from "./errors.js";
