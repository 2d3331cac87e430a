/**
 * Structured logger writing to stderr.
 *
 * - JSON lines when LOG_FORMAT=json, a bracketed text line otherwise
 * - Minimum level from LOG_LEVEL (default: info)
 * - room_id / sender context fields
 * - Child loggers inherit context
 */

import { performance } from "node:perf_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogContext {
  roomId?: string;
  sender?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(name: string): Logger;
  /** Set persistent context fields (roomId, sender). */
  setContext(ctx: LogContext): void;
  /** A logger of the same module whose lines also carry `ctx`. */
  withContext(ctx: LogContext): Logger;
  /** Start a timer. Returns a stop function that logs elapsed time and returns duration in ms. */
  time(label: string): () => number;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

/** Resolve min log level from environment. */
function resolveMinLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const env = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(env) ? env : "info";
}

function isJsonFormat(): boolean {
  return process.env.LOG_FORMAT?.toLowerCase() === "json";
}

export function createLogger(
  name: string,
  minLevel?: LogLevel,
  parentContext?: LogContext,
): Logger {
  const minPriority = LEVEL_PRIORITY[resolveMinLevel(minLevel)];
  const useJson = isJsonFormat();
  let context: LogContext = { ...parentContext };

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
      if (context.roomId) entry.room_id = context.roomId;
      if (context.sender) entry.sender = context.sender;
      if (data && Object.keys(data).length > 0) {
        Object.assign(entry, data);
      }
      console.error(JSON.stringify(entry));
    } else {
      const room = context.roomId ? ` [${context.roomId}]` : "";
      const prefix = `[${timestamp}] [${level.toUpperCase()}] [${name}]${room}`;
      if (data && Object.keys(data).length > 0) {
        console.error(`${prefix} ${message} ${JSON.stringify(data)}`);
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
    child: (childName) =>
      createLogger(`${name}:${childName}`, resolveMinLevel(minLevel), {
        ...context,
      }),
    setContext(ctx: LogContext): void {
      context = { ...context, ...ctx };
    },
    withContext(ctx: LogContext): Logger {
      const scoped = createLogger(name, resolveMinLevel(minLevel), context);
      scoped.setContext(ctx);
      return scoped;
    },
    time(label: string): () => number {
      const start = performance.now();
      return () => {
        const durationMs = Math.round((performance.now() - start) * 100) / 100;
        log("debug", `${label} completed`, { label, durationMs });
        return durationMs;
      };
    },
  };
}

/** Collapse newlines so a request or response fits on one log line. */
export function flattenForLog(text: string): string {
  return text.replace(/\n/g, " ");
}
