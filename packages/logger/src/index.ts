/**
 * @docseek/logger
 *
 * Structured logging with credential and e-mail redaction.
 */

export { createLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, redactFields, REDACT_PATHS } from "./redaction.js";
