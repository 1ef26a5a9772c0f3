/**
 * Leveled logging for the graph view.
 *
 * Usage:
 *   import { log } from "./logger";
 *   log.debug("layout", "converged", { iterations: 300 });
 *   log.warn("settings", "zoomSpeed must be positive", value);
 *
 * Messages below the active level are dropped. The default level is `warn`
 * so a frame loop stays quiet unless a host opts in.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let activeLevel: LogLevel = "warn";

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[activeLevel];
}

function format(context: string, message: string): string {
  return `[graph-view:${context}] ${message}`;
}

export const log = {
  debug(context: string, message: string, ...args: unknown[]): void {
    if (shouldLog("debug")) console.debug(format(context, message), ...args);
  },
  info(context: string, message: string, ...args: unknown[]): void {
    if (shouldLog("info")) console.info(format(context, message), ...args);
  },
  warn(context: string, message: string, ...args: unknown[]): void {
    if (shouldLog("warn")) console.warn(format(context, message), ...args);
  },
  error(context: string, message: string, ...args: unknown[]): void {
    if (shouldLog("error")) console.error(format(context, message), ...args);
  },
};
