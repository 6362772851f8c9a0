/**
 * Leveled logging for inferhost.
 *
 * Line format: `14:03:07.412 WARN  <message> key=value ...`
 * At debug level the caller's `src/...:line` follows the timestamp.
 *
 * Level selection, first match wins:
 * 1. INFERHOST_LOG_LEVEL (error|warn|info|debug)
 * 2. INFERHOST_DEBUG=1 → debug
 * 3. info
 *
 * error and warn go to stderr, info and debug to stdout. A closed pipe
 * (EPIPE) never throws out of a log call.
 */

import chalk from "chalk";
import { parseBoolEnv } from "@/common/utils/env";
import { getErrorCode, getErrorMessage } from "@/common/utils/errors";

export type LogLevel = "error" | "warn" | "info" | "debug";
export type LogFields = Record<string, unknown>;

export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  setLevel: (level: LogLevel) => void;
  getLevel: () => LogLevel;
  isDebugMode: () => boolean;
  /** A logger that appends `fields` to every line. */
  withFields: (fields: LogFields) => Logger;
}

const LEVELS: Record<LogLevel, { priority: number; tag: string; style: (text: string) => string }> = {
  error: { priority: 0, tag: "ERROR", style: chalk.red },
  warn: { priority: 1, tag: "WARN ", style: chalk.yellow },
  info: { priority: 2, tag: "INFO ", style: chalk.green },
  debug: { priority: 3, tag: "DEBUG", style: chalk.gray },
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const envLevel = env.INFERHOST_LOG_LEVEL?.trim().toLowerCase();
  if (envLevel && isLogLevel(envLevel)) return envLevel;
  return parseBoolEnv(env.INFERHOST_DEBUG) ? "debug" : "info";
}

let currentLevel: LogLevel = levelFromEnv();

function enabled(level: LogLevel): boolean {
  return LEVELS[level].priority <= LEVELS[currentLevel].priority;
}

function timestamp(now: Date = new Date()): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, "0");
  return `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}.${pad(now.getMilliseconds(), 3)}`;
}

/**
 * `src/...:line` of the code that called the logger. Frames 0-3 are the
 * Error header, this function, emit() and the level function.
 */
function callerLocation(): string {
  const frame = new Error().stack?.split("\n")[4] ?? "";
  const match = /\((.+):(\d+):\d+\)/.exec(frame) ?? /at (.+):(\d+):\d+/.exec(frame);
  if (!match) return "unknown:0";
  return `${match[1].replace(/^.*[\\/]src[\\/]/, "src/")}:${match[2]}`;
}

function isPlainObject(value: unknown): value is LogFields {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return /^[^\s="]+$/.test(value) ? value : JSON.stringify(value);
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

/** logfmt-style `key=value` pairs; strings with spaces or quotes are quoted. */
export function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(" ");
}

function emit(level: LogLevel, bound: LogFields, args: unknown[]): void {
  if (!enabled(level)) return;

  // A trailing plain object is merged into the bound fields
  let fields = bound;
  let message = args;
  const last = args[args.length - 1];
  if (args.length > 0 && isPlainObject(last)) {
    fields = { ...bound, ...last };
    message = args.slice(0, -1);
  }

  const color = process.stdout.isTTY === true && chalk.level > 0;
  const parts = [color ? chalk.dim(timestamp()) : timestamp()];
  if (currentLevel === "debug") {
    const location = callerLocation();
    parts.push(color ? chalk.cyan(location) : location);
  }
  const { tag, style } = LEVELS[level];
  parts.push(color ? style(tag) : tag);

  const suffix = formatFields(fields);
  const line = suffix ? [...message, suffix] : message;
  const toStderr = level === "error" || level === "warn";

  try {
    (toStderr ? console.error : console.log)(parts.join(" "), ...line);
  } catch (error) {
    if (getErrorCode(error) === "EPIPE") return;
    const stream = toStderr ? process.stderr : process.stdout;
    try {
      stream.write(`${parts.join(" ")} log write failed: ${getErrorMessage(error)}\n`);
    } catch {
      // the stream itself is gone
    }
  }
}

function createLogger(bound: LogFields): Logger {
  const at =
    (level: LogLevel) =>
    (...args: unknown[]): void =>
      emit(level, bound, args);

  return {
    error: at("error"),
    warn: at("warn"),
    info: at("info"),
    debug: at("debug"),
    setLevel: (level) => {
      currentLevel = level;
    },
    getLevel: () => currentLevel,
    isDebugMode: () => currentLevel === "debug",
    withFields: (fields) => createLogger({ ...bound, ...fields }),
  };
}

export const log: Logger = createLogger({});
