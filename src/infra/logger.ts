import { randomBytes } from "node:crypto";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function defaultRunId(now = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
  return `${stamp}-${randomBytes(3).toString("hex")}`;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

let runId = process.env.RUN_ID?.trim() || defaultRunId();
const envLevel = process.env.LOG_LEVEL?.trim().toLowerCase() ?? "";
let minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

const prefix = (level: LogLevel) => `[${new Date().toISOString()}] ${level.toUpperCase()} run=${runId}`;

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minLevel];
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getRunId(): string {
  return runId;
}

export function setRunId(id: string): void {
  runId = id;
}

export const logger = {
  debug(...args: unknown[]) {
    if (enabled("debug")) console.debug(prefix("debug"), ...args);
  },
  info(...args: unknown[]) {
    if (enabled("info")) console.log(prefix("info"), ...args);
  },
  warn(...args: unknown[]) {
    if (enabled("warn")) console.warn(prefix("warn"), ...args);
  },
  error(...args: unknown[]) {
    if (enabled("error")) console.error(prefix("error"), ...args);
  },
};
