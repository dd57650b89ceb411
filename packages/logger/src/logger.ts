import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS } from "./redactor.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface CreateLoggerOptions {
  /** Defaults to "debug" when pretty-printing, "info" otherwise. */
  level?: LogLevel;
  /** Logical service / component name attached to every log line. */
  service?: string;
  /** Human-readable output through `pino-pretty`. Defaults to NODE_ENV === "development". */
  pretty?: boolean;
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
  const pretty = options.pretty ?? process.env["NODE_ENV"] === "development";

  return pino({
    level: options.level ?? (pretty ? "debug" : "info"),
    name: options.service ?? "papertrail",
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    // AppError fields (code, service, retryAfter, details) ride along on `err`.
    serializers: { err: pino.stdSerializers.err },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(pretty ? { transport: PRETTY_TRANSPORT } : {}),
  });
}

/**
 * Child logger with request-scoped bindings such as `interactionId` or `component`.
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
