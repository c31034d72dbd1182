/**
 * Application logging.
 *
 * Every module logs through console.* with a "[scope]" prefix, e.g.
 * `console.log("[fetch] Downloaded ...")`. installConsoleFileLogging turns
 * those calls into:
 *
 * - a timestamped line on stdout/stderr (colored on a TTY)
 * - one JSON object in data/logs/YYYY-MM-DD.jsonl, with the scope split out
 *   into its own field
 *
 * Daily files older than the retention window are pruned at startup. /logs
 * uploads the newest file found by latestLogFile.
 */

import fs from "node:fs";
import path from "node:path";
import util from "node:util";
import { stdout, stderr } from "node:process";

type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  /** Module prefix without brackets, e.g. "batch". */
  scope?: string;
  message: string;
  args?: unknown[];
}

export interface AppLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export const DEFAULT_LOG_RETENTION_DAYS = 7;

const LOG_FILE_RE = /^(\d{4}-\d{2}-\d{2})\.jsonl$/;
const SCOPE_RE = /^\[([\w-]+)\]\s*/;
const DAY_MS = 86_400_000;

// Wrapping console twice would log every line twice.
let consoleFileLoggingInstalled = false;

function toDateString(date: Date): string {
  return date.toISOString().split("T")[0];
}

function toSerializable(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
    };
  }
  return value;
}

/**
 * Split a leading "[scope]" off a log message.
 */
export function splitScope(message: string): { scope?: string; message: string } {
  const match = SCOPE_RE.exec(message);
  if (!match) return { message };
  return { scope: match[1], message: message.slice(match[0].length) };
}

export function createAppLogger(dataDir: string): AppLogger {
  const logsDir = path.join(dataDir, "logs");
  fs.mkdirSync(logsDir, { recursive: true });

  function append(level: LogLevel, raw: string, args: unknown[]): void {
    const now = new Date();
    const entry: LogEntry = {
      timestamp: now.toISOString(),
      level,
      ...splitScope(raw),
      ...(args.length > 0 ? { args: args.map(toSerializable) } : {}),
    };
    fs.appendFileSync(path.join(logsDir, `${toDateString(now)}.jsonl`), `${JSON.stringify(entry)}\n`, "utf-8");
  }

  return {
    debug: (message, ...args) => append("debug", message, args),
    info: (message, ...args) => append("info", message, args),
    warn: (message, ...args) => append("warn", message, args),
    error: (message, ...args) => append("error", message, args),
  };
}

/**
 * Delete daily log files older than `retentionDays` (today counts as day
 * one). Returns the names removed.
 */
export function pruneLogs(dataDir: string, retentionDays: number, now = new Date()): string[] {
  const logsDir = path.join(dataDir, "logs");
  if (!fs.existsSync(logsDir)) return [];

  const cutoff = toDateString(new Date(now.getTime() - (retentionDays - 1) * DAY_MS));
  const removed: string[] = [];
  for (const name of fs.readdirSync(logsDir).sort()) {
    const match = LOG_FILE_RE.exec(name);
    if (!match || match[1] >= cutoff) continue;
    fs.rmSync(path.join(logsDir, name), { force: true });
    removed.push(name);
  }
  return removed;
}

/**
 * Path of the newest non-empty daily log file, or null when there is none.
 * File names are ISO dates, so lexical order is chronological.
 */
export function latestLogFile(dataDir: string): string | null {
  const logsDir = path.join(dataDir, "logs");
  let names: string[];
  try {
    names = fs.readdirSync(logsDir);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
    throw err;
  }

  const newest = names.filter((name) => LOG_FILE_RE.test(name)).sort().at(-1);
  if (!newest) return null;

  const filePath = path.join(logsDir, newest);
  return fs.statSync(filePath).size > 0 ? filePath : null;
}

// ---------------------------------------------------------------------------
// Stdio formatting
// ---------------------------------------------------------------------------

const ANSI = {
  reset:  "\x1b[0m",
  dim:    "\x1b[2m",
  yellow: "\x1b[33m",
  red:    "\x1b[31m",
  cyan:   "\x1b[36m",
} as const;

const LEVEL_STYLE: Record<LogLevel, { prefix: string; color: string }> = {
  debug: { prefix: "DBG", color: ANSI.dim },
  info:  { prefix: "INF", color: ANSI.cyan },
  warn:  { prefix: "WRN", color: ANSI.yellow },
  error: { prefix: "ERR", color: ANSI.red },
};

/**
 * One stdio line: "2026-01-02 10:00:00 [INF] message". Colors only on a TTY,
 * so piped output stays plain.
 */
export function formatLine(level: LogLevel, message: string, isTty: boolean, now = new Date()): string {
  const ts = now.toISOString().slice(0, 19).replace("T", " ");
  const { prefix, color } = LEVEL_STYLE[level];
  if (!isTty) {
    return `${ts} [${prefix}] ${message}`;
  }
  return `${ANSI.dim}${ts}${ANSI.reset} ${color}[${prefix}]${ANSI.reset} ${message}`;
}

// ---------------------------------------------------------------------------
// Console intercept
// ---------------------------------------------------------------------------

/**
 * Route console.* through formatLine and mirror every call to `logger`.
 * Replaces the raw methods for the rest of the process.
 */
export function installConsoleFileLogging(logger: AppLogger): void {
  if (consoleFileLoggingInstalled) {
    return;
  }
  consoleFileLoggingInstalled = true;

  function makeInterceptor(level: LogLevel, stream: NodeJS.WriteStream) {
    const isTty = stream.isTTY ?? false;
    return (...args: unknown[]): void => {
      const message = util.format(...args);
      stream.write(formatLine(level, message, isTty) + "\n");
      logger[level](message);
    };
  }

  console.log   = makeInterceptor("info",  stdout);
  console.info  = makeInterceptor("info",  stdout);
  console.debug = makeInterceptor("debug", stdout);
  console.warn  = makeInterceptor("warn",  stderr);
  console.error = makeInterceptor("error", stderr);
}
