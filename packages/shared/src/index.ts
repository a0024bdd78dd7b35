export { extractErrorCode, reasonFromCode, readBytes } from "./file-utils.js";
export { createLogger, levelFromVerbosity, LOG_LEVELS } from "./logger.js";
export type { LogLevel, Logger, LoggerOptions } from "./logger.js";
