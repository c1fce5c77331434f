/**
 * Leveled stderr logger. stdout is reserved for the MCP stdio transport
 * and for CLI results.
 */

import pc from "picocolors";
import type { LogLevel } from "../types.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + "\n");
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function createLogger(scope: string, level: LogLevel, sink: LogSink = stderrSink): Logger {
  const tag = pc.dim(`[${scope}]`);
  const enabled = (at: LogLevel) => LEVEL_ORDER[at] >= LEVEL_ORDER[level];

  return {
    level,
    debug(message) {
      if (enabled("debug")) sink(`${tag} ${pc.gray(message)}`);
    },
    info(message) {
      if (enabled("info")) sink(`${tag} ${message}`);
    },
    warn(message) {
      if (enabled("warn")) sink(`${tag} ${pc.yellow(message)}`);
    },
    error(message) {
      if (enabled("error")) sink(`${tag} ${pc.red(message)}`);
    },
    child(childScope) {
      return createLogger(`${scope}:${childScope}`, level, sink);
    }
  };
}

/**
 * Logger that drops everything. Used where no logger is supplied.
 */
export const silentLogger: Logger = createLogger("silent", "silent", () => {});
