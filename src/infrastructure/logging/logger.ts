import type { LogLevel, Logger } from "../../core/ports/logger.js";
import { formatLogEntry } from "../../shared/log-format.js";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export type LogFormat = "pretty" | "json";

/** Meta keys whose values never reach a log line. */
const REDACTED_KEYS: ReadonlySet<string> = new Set([
  "password",
  "passwordhash",
  "token",
  "authorization",
  "secret",
]);

const redact = (meta: Record<string, unknown>): Record<string, unknown> => {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = REDACTED_KEYS.has(key.toLowerCase()) ? "[redacted]" : value;
  }
  return out;
};

/** Errors serialize to `{}` with JSON.stringify; flatten them first. */
const serializable = (value: unknown): unknown =>
  value instanceof Error ? { name: value.name, message: value.message } : value;

/**
 * Format a log entry as structured JSON (for Datadog, ELK, CloudWatch, etc.).
 */
const formatJsonEntry = (level: LogLevel, msg: string, meta: Record<string, unknown>): string => {
  const entry: Record<string, unknown> = {
    level,
    msg,
    time: new Date().toISOString(),
  };
  for (const [key, value] of Object.entries(meta)) entry[key] = serializable(value);
  return `${JSON.stringify(entry)}\n`;
};

/**
 * Logger: no library, writes straight to the process streams.
 * Supports two modes:
 * - "pretty": ANSI-colored human-readable output (default, for development)
 * - "json": structured JSON lines (for production log aggregators)
 *
 * warn and above go to stderr.
 */
export const createLogger = (
  minLevel: LogLevel = "info",
  bindings: Record<string, unknown> = {},
  format: LogFormat = "pretty",
): Logger => {
  const minPriority = LEVEL_PRIORITY[minLevel];

  const formatter = format === "json" ? formatJsonEntry : formatLogEntry;

  const write = (level: LogLevel, msg: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const line = formatter(level, msg, redact({ ...bindings, ...meta }));

    if (LEVEL_PRIORITY[level] >= LEVEL_PRIORITY.warn) {
      process.stderr.write(line);
    } else {
      process.stdout.write(line);
    }
  };

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
    fatal: (msg, meta) => write("fatal", msg, meta),
    child: (extra) => createLogger(minLevel, { ...bindings, ...extra }, format),
  };
};
