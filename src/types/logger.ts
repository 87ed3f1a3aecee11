/**
 * Logger shape accepted by the client. Any object with these four methods
 * works, including a thin wrapper over an application logger.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  readonly debug: (message: string, context?: Record<string, unknown>) => void;
  readonly info: (message: string, context?: Record<string, unknown>) => void;
  readonly warn: (message: string, context?: Record<string, unknown>) => void;
  readonly error: (
    message: string,
    error?: unknown,
    context?: Record<string, unknown>,
  ) => void;
}
