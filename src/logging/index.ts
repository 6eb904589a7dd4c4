/**
 * Logging exports.
 */

export { type Logger, type LoggerOptions, type LogLevel, LOG_LEVELS, isLogLevel, createLogger, silentLogger } from "./logger.js";
