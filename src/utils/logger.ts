/**
 * Level-filtered console logging.
 *
 * Everything goes to stderr through `console.error`; stdout is left to the
 * CLI output (`--help`, `--version`, `send`).
 *
 * @module utils/logger
 */

import type { LogLevel } from "../config/schema.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

/**
 * Logger used by every component of the service.
 */
export interface Logger {
  readonly level: LogLevel;
  fatal(message: string): void;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
  trace(message: string): void;
}

/**
 * Options for creating a Logger.
 */
export interface LoggerOptions {
  /** Most verbose level that is still written (default: info) */
  level?: LogLevel;
  /** Line writer (default: console.error) */
  write?: (line: string) => void;
}

/**
 * Creates a logger that drops messages more verbose than `level`.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "debug" });
 * logger.info("Listening on UNIX socket /run/early.sock");
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const write = options.write ?? ((line: string) => console.error(line));
  const threshold = LEVEL_ORDER[level];

  const at =
    (messageLevel: LogLevel) =>
    (message: string): void => {
      if (LEVEL_ORDER[messageLevel] <= threshold) {
        write(formatLine(messageLevel, message));
      }
    };

  return {
    level,
    fatal: at("fatal"),
    error: at("error"),
    warn: at("warn"),
    info: at("info"),
    debug: at("debug"),
    trace: at("trace"),
  };
}

/**
 * Formats one log line: `[level] message`.
 */
export function formatLine(level: LogLevel, message: string): string {
  return `[${level}] ${message}`;
}

/** Logger that writes nothing. */
export const silentLogger: Logger = createLogger({
  level: "fatal",
  write: () => {},
});
