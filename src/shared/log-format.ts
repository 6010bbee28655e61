import type { LogLevel } from "../core/ports/logger.js";
import { badge, bold, cyan, dim, gray, green, red, white, yellow } from "./ansi.js";

const boldOf = (color: (s: string) => string) => (s: string) => bold(color(s));

const LEVEL_BADGES: Record<LogLevel, string> = {
  debug: gray("DBG"),
  info: green("INF"),
  warn: yellow("WRN"),
  error: red("ERR"),
  fatal: badge(41, "FTL", 97),
};

const METHOD_BADGES: Readonly<Record<string, string>> = {
  GET: badge(42, "GET"),
  POST: badge(46, "POST"),
  PUT: badge(43, "PUT"),
  DELETE: badge(41, "DEL"),
  OPTIONS: gray("OPT"),
};

// ── Helpers ─────────────────────────────────────────────────────────────

/** Wall clock as HH:MM:SS.mmm */
const clock = (at: Date = new Date()): string => {
  const pad = (n: number, width = 2) => String(n).padStart(width, "0");
  return `${pad(at.getHours())}:${pad(at.getMinutes())}:${pad(at.getSeconds())}.${pad(at.getMilliseconds(), 3)}`;
};

const fields = (values: Record<string, unknown>): string => {
  const parts = Object.entries(values).map(([k, v]) => `${dim(`${k}=`)}${white(String(v))}`);
  return parts.length === 0 ? "" : ` ${parts.join(" ")}`;
};

const statusBadge = (status: number): string => {
  const color = status < 300 ? green : status < 400 ? cyan : status < 500 ? yellow : red;
  return boldOf(color)(String(status));
};

const duration = (ms: number): string => (ms < 50 ? green : ms < 200 ? yellow : red)(`${ms}ms`);

// ── Formatters ──────────────────────────────────────────────────────────

/**
 * One structured log line for the Logger port.
 *
 *   INF 12:34:56.789 Post created  service=blog postId=7
 */
export const formatLogEntry = (level: LogLevel, msg: string, meta: Record<string, unknown>): string =>
  `  ${LEVEL_BADGES[level]} ${gray(clock())} ${white(msg)}${fields(meta)}\n`;

export interface AccessEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly ip: string;
  readonly requestId: string;
}

/**
 * HTTP access line.
 *
 *   ← 12:34:56.789 GET 201 /api/v1/posts 3.1ms  ip=127.0.0.1 rid=1f0c2a9b
 */
export const formatAccessLog = (entry: AccessEntry): string => {
  const badge = METHOD_BADGES[entry.method] ?? white(entry.method);
  const meta = gray(`ip=${entry.ip} rid=${entry.requestId.slice(0, 8)}`);
  return `  ${dim("←")} ${gray(clock())} ${badge} ${statusBadge(entry.status)} ${white(entry.path)} ${duration(entry.durationMs)}  ${meta}\n`;
};

/**
 * A transport-level rejection that never reaches a handler.
 *
 *   ⚠ 12:34:56.789 Rate limited  ip=1.2.3.4 hits=152
 */
export const formatRejection = (
  kind: "rate-limit" | "cors",
  values: Record<string, string | number>,
): string => {
  const head =
    kind === "rate-limit"
      ? `${yellow("⚠")} ${gray(clock())} ${boldOf(yellow)("Rate limited")}`
      : `${red("✗")} ${gray(clock())} ${boldOf(red)("CORS rejected")}`;
  return `  ${head} ${fields(values)}\n`;
};
