/**
 * Structured logger with JSON output support.
 *
 * Features:
 * - JSON-structured log entries (when LOG_FORMAT=json)
 * - Log level filtering via LOG_LEVEL env var
 * - app and command fields for tracing which scope logged
 *
 * All output goes to stderr so stdout stays reserved for program output.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogContext {
  app?: string;
  command?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Set persistent context fields (app, command, etc.) */
  setContext(ctx: LogContext): void;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

/** Resolve min log level from environment. */
function resolveMinLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const env = (typeof process !== "undefined" && process.env?.LOG_LEVEL) || "";
  const normalized = env.toLowerCase();
  if (isLogLevel(normalized)) return normalized;
  return "info";
}

/** Check if JSON output is requested. */
function isJsonFormat(): boolean {
  return (
    typeof process !== "undefined" &&
    process.env?.LOG_FORMAT?.toLowerCase() === "json"
  );
}

export function createLogger(name: string, minLevel?: LogLevel): Logger {
  const minPriority = LEVEL_PRIORITY[resolveMinLevel(minLevel)];
  const useJson = isJsonFormat();
  let context: LogContext = {};

  function log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const timestamp = new Date().toISOString();

    if (useJson) {
      const entry: Record<string, unknown> = {
        timestamp,
        level,
        module: name,
        message,
      };
      if (context.app) entry.app = context.app;
      if (context.command) entry.command = context.command;
      if (data && Object.keys(data).length > 0) {
        Object.assign(entry, data);
      }
      console.error(JSON.stringify(entry));
    } else {
      const prefix = `[${timestamp}] [${level.toUpperCase()}] [${name}]`;
      if (data && Object.keys(data).length > 0) {
        const extra = JSON.stringify(data);
        console.error(`${prefix} ${message} ${extra}`);
      } else {
        console.error(`${prefix} ${message}`);
      }
    }
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    setContext(ctx: LogContext): void {
      context = { ...context, ...ctx };
    },
  };
}
