/**
 * Lightweight leveled logger.
 * Writes to the console and, when enabled, appends to a log file, each line
 * stamped with time, level and session ID.
 */

import { randomBytes } from "node:crypto";
import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";

let currentSessionId: string | null = null;

/**
 * Start a new logging session, e.g. "20240115-a1b2c3". Later log lines
 * carry its ID, so records from one session can be matched to the
 * archives it wrote and the uploads it made.
 */
export function initSessionId(): string {
  const datePart = new Date().toISOString().slice(0, 10).replace(/-/g, "");
  currentSessionId = `${datePart}-${randomBytes(3).toString("hex")}`;
  return currentSessionId;
}

/**
 * Current session ID. The first call starts a session if none is running.
 */
export function getSessionId(): string {
  return currentSessionId ?? initSessionId();
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
}

const DEFAULT_OPTIONS: Required<LoggerOptions> = {
  level: "info",
  logDir: "output/logs",
  logFile: "scidata.log",
  console: true,
  file: false,
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger that adds the given fields to every record */
  child(bindings: Record<string, unknown>): Logger;
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>
): string {
  const timestamp = new Date().toISOString();
  const sessionId = getSessionId();
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${timestamp}] [${levelStr}] [${sessionId}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const opts: Required<LoggerOptions> = { ...DEFAULT_OPTIONS, ...options };
  const logFilePath = join(opts.logDir, opts.logFile);

  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function log(
    level: LogLevel,
    message: string,
    bindings: Record<string, unknown>,
    context?: Record<string, unknown>
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const entry = formatLogEntry(level, message, { ...bindings, ...context });

    if (opts.console) {
      getConsoleMethod(level)(entry);
    }

    if (opts.file) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        // Fallback to console if file write fails
        console.error(`Failed to write to log file: ${err}`);
      }
    }
  }

  function bind(bindings: Record<string, unknown>): Logger {
    return {
      debug: (message, context) => log("debug", message, bindings, context),
      info: (message, context) => log("info", message, bindings, context),
      warn: (message, context) => log("warn", message, bindings, context),
      error: (message, context) => log("error", message, bindings, context),
      child: (extra) => bind({ ...bindings, ...extra }),
    };
  }

  return bind({});
}

/** Logger that drops everything */
export const silentLogger: Logger = createLogger({ console: false, file: false });
