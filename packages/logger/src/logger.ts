/**
 * Logger factory
 *
 * Pino with credential and e-mail redaction. Development runs go through
 * pino-pretty; everything else writes one JSON object per line.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, redactFields } from "./redaction.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Pino level name; "silent" turns logging off. Default: "debug" in development, else "info". */
  level?: string;
  /** Written as `name` on every line. Default: "docseek". */
  service?: string;
  /** Where lines go instead of stdout. Disables the pretty transport. */
  destination?: pino.DestinationStream;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

const PRETTY_TRANSPORT: pino.TransportSingleOptions = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "SYS:standard",
    ignore: "pid,hostname",
  },
};

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const config: pino.LoggerOptions = {
    level: options.level ?? (isDevelopment() ? "debug" : "info"),
    name: options.service ?? "docseek",
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    formatters: { log: redactFields },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options.destination) {
    return pino(config, options.destination);
  }
  return pino(isDevelopment() ? { ...config, transport: PRETTY_TRANSPORT } : config);
}
