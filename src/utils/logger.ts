/**
 * Console-backed and no-op implementations of {@link Logger}.
 */

import type { Logger, LogLevel } from "../types/logger.js";

const LOG_LEVEL = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const satisfies Record<LogLevel, number>;

/** Where formatted lines go. Defaults to the global console. */
export interface LogSink {
  readonly log: (line: string) => void;
  readonly warn: (line: string) => void;
  readonly error: (line: string) => void;
}

/** Options for {@link createConsoleLogger}. */
export interface ConsoleLoggerOptions {
  /** Lowest level that is written. Default: `"info"`. */
  readonly level?: LogLevel | undefined;
  readonly sink?: LogSink | undefined;
  readonly now?: (() => Date) | undefined;
}

/** Formats one log line: `[timestamp] [LEVEL] message {context} stack`. */
export const formatLogLine = (
  timestamp: Date,
  level: LogLevel,
  message: string,
  error?: unknown,
  context?: Record<string, unknown>,
): string => {
  let line = `[${timestamp.toISOString()}] [${level.toUpperCase()}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    line += ` ${JSON.stringify(context)}`;
  }

  if (error != null) {
    const stack = error instanceof Error ? (error.stack ?? error.message) : String(error);
    if (stack) {
      line += ` ${stack}`;
    }
  }

  return line;
};

/**
 * Creates a leveled logger that writes single-line records to the console.
 *
 * @example
 * ```ts
 * const client = createClient({
 *   adapter: createFetchAdapter(),
 *   logger: createConsoleLogger({ level: "debug" }),
 * });
 * ```
 */
export const createConsoleLogger = (
  options?: ConsoleLoggerOptions,
): Logger => {
  const threshold = LOG_LEVEL[options?.level ?? "info"];
  const sink = options?.sink ?? console;
  const now = options?.now ?? (() => new Date());

  const write = (
    level: LogLevel,
    message: string,
    error: unknown,
    context: Record<string, unknown> | undefined,
  ): void => {
    if (LOG_LEVEL[level] < threshold) return;
    const line = formatLogLine(now(), level, message, error, context);
    if (level === "error") sink.error(line);
    else if (level === "warn") sink.warn(line);
    else sink.log(line);
  };

  const logger: Logger = {
    debug: (message, context) => write("debug", message, undefined, context),
    info: (message, context) => write("info", message, undefined, context),
    warn: (message, context) => write("warn", message, undefined, context),
    error: (message, error, context) => write("error", message, error, context),
  };
  return Object.freeze(logger);
};

/** A logger that discards everything. Used when none is configured. */
export const noopLogger: Logger = Object.freeze({
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
});
