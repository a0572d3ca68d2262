import { openSync } from "node:fs";
import path from "node:path";
import type { Writable } from "node:stream";
import { destination, pino, type DestinationStream, type Logger } from "pino";
import { PinoPretty } from "pino-pretty";
import { APP_NAME, DEFAULT_LOG_FILE } from "./constants.js";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";
export type LogFormat = "text" | "json";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const satisfies readonly LogLevel[];
export const LOG_FORMATS = ["text", "json"] as const satisfies readonly LogFormat[];

export interface LogContextOptions {
  /** Log file, resolved against the working directory. */
  file?: string;
  level?: LogLevel;
  format?: LogFormat;
  /** Where records go when the file cannot be opened. Never stdout: it carries frames. */
  fallback?: Writable;
}

/**
 * Logging context for one process lifetime. Opened once at startup and handed
 * to every component; `close()` releases the file at shutdown.
 */
export interface LogContext {
  readonly logger: Logger;
  /** Absolute path of the log file, or "stderr" after a fallback. */
  readonly target: string;
  close(): void;
}

function createLogger(level: LogLevel, sink: DestinationStream): Logger {
  return pino({ level, name: APP_NAME }, sink);
}

export function openLogContext(options: LogContextOptions = {}): LogContext {
  const level = options.level ?? "info";
  const format = options.format ?? "json";
  const file = path.resolve(options.file ?? DEFAULT_LOG_FILE);

  let fd: number;
  try {
    fd = openSync(file, "a", 0o644);
  } catch (err) {
    const fallback = options.fallback ?? process.stderr;
    const sink = format === "text" ? PinoPretty({ colorize: false, destination: fallback }) : fallback;
    const logger = createLogger(level, sink);
    logger.error({ err }, `Unable to open log file ${file}; logging to stderr instead`);
    return { logger, target: "stderr", close: () => {} };
  }

  if (format === "text") {
    const pretty = PinoPretty({ colorize: false, destination: fd, sync: true });
    return { logger: createLogger(level, pretty), target: file, close: () => pretty.end() };
  }

  const stream = destination({ dest: fd, sync: true });
  return {
    logger: createLogger(level, stream),
    target: file,
    close: () => stream.end(),
  };
}

