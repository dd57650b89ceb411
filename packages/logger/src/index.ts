/**
 * @papertrail/logger
 *
 * Structured logging with credential redaction.
 */

export { createLogger, createChildLogger } from "./logger.js";
export type { Logger, LogLevel, CreateLoggerOptions } from "./logger.js";
export { redactValue, redactText, REDACT_PATHS } from "./redactor.js";
