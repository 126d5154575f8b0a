import pino, { type DestinationStream, type Logger } from "pino";
import type { LogLevel } from "./config.js";

export type { Logger } from "pino";

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  /** Write to this stream instead of stderr (tests). */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const base = {
    level: options.level ?? "info",
    base: { service: "sciqa" },
    redact: {
      paths: ["apiKey", "*.apiKey", "headers.Authorization"],
      censor: "[REDACTED]",
    },
  };

  if (options.destination) {
    return pino(base, options.destination);
  }

  if (options.pretty) {
    return pino({
      ...base,
      transport: {
        target: "pino-pretty",
        options: { ignore: "pid,hostname,service", singleLine: true, destination: 2 },
      },
    });
  }

  // stdout is reserved for answers
  return pino(base, pino.destination(2));
}

/** An optional collaborator is missing or failed; the caller continues with less evidence. */
export function logDegraded(logger: Logger, capability: string, detail: string): void {
  logger.warn({ degraded: true, capability }, `Degraded mode: ${detail}`);
}
