/**
 * Logging Module
 *
 * Console logging and error helpers shared by every package.
 */

export type { Logger, LoggerOptions } from "./logger.js";
export { createLogger } from "./logger.js";
export { isNotFoundError, isPermissionError, getErrorMessage } from "./error-utils.js";
