/**
 * Lightweight logging utility.
 * Outputs to console and an append-only log file with timestamps and run ID.
 *
 * Several pipeline runs share one process, so a logger can be bound to a
 * run with `child({ runId })`; unbound loggers fall back to the process
 * run ID from run-id.ts.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

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
  /** Receives every formatted line that passes the level filter */
  sink?: (line: string, level: LogLevel) => void;
}

const DEFAULT_OPTIONS: Required<Omit<LoggerOptions, "sink">> = {
  level: "info",
  logDir: "output/logs",
  logFile: "app.log",
  console: true,
  file: true,
};

/** Context merged into every entry a child logger writes */
export interface LogBindings {
  runId?: string;
  component?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(bindings: LogBindings): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  const levels: readonly string[] = LOG_LEVELS;
  return levels.includes(value);
}

/**
 * Format a log entry with timestamp, level, run ID, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  bindings: LogBindings,
  context?: Record<string, unknown>,
  timestamp: string = new Date().toISOString()
): string {
  const { runId: boundRunId, component, ...boundContext } = bindings;
  const runId = boundRunId ?? getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);
  const prefix = component ? `[${component}] ` : "";

  let entry = `[${timestamp}] [${levelStr}] [${runId}] ${prefix}${message}`;

  const merged = { ...boundContext, ...context };
  if (Object.keys(merged).length > 0) {
    entry += ` ${JSON.stringify(merged)}`;
  }

  return entry;
}

/**
 * Get console method for log level.
 */
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
  const { sink, ...rest } = options;
  const opts: Required<Omit<LoggerOptions, "sink">> = { ...DEFAULT_OPTIONS, ...rest };
  const logFilePath = join(opts.logDir, opts.logFile);

  // Ensure log directory exists
  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function write(
    bindings: LogBindings,
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const entry = formatLogEntry(level, message, bindings, context);

    if (sink) {
      sink(entry, level);
    }

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

  function bind(bindings: LogBindings): Logger {
    return {
      debug: (message, context) => write(bindings, "debug", message, context),
      info: (message, context) => write(bindings, "info", message, context),
      warn: (message, context) => write(bindings, "warn", message, context),
      error: (message, context) => write(bindings, "error", message, context),
      child: (extra) => bind({ ...bindings, ...extra }),
    };
  }

  return bind({});
}

/**
 * Logger that drops everything. Used where a component is constructed
 * without an explicit logger.
 */
export function createNullLogger(): Logger {
  return createLogger({ console: false, file: false });
}
