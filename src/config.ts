/**
 * Runner configuration from environment variables.
 */

import type { RunnerConfig } from "./types.js";
import {
  DEFAULT_PYTHON,
  DEFAULT_TIMEOUT_SEC,
  DEFAULT_MAX_SCRIPT_DEPTH,
  DEFAULT_LOG_LEVEL
} from "./constants.js";
import { isLogLevel } from "./utils/logger.js";

export type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === "") return fallback;
  if (!/^\d+$/.test(raw) || Number(raw) < 1) {
    throw new Error(`${key} must be a positive integer, got "${raw}"`);
  }
  return Number(raw);
}

export function loadConfig(env: Env = process.env): RunnerConfig {
  const python = env.MSCRIPT_PYTHON?.trim();
  const level = (env.MSCRIPT_LOG_LEVEL?.trim() || DEFAULT_LOG_LEVEL).toLowerCase();
  if (!isLogLevel(level)) {
    throw new Error(`MSCRIPT_LOG_LEVEL must be one of debug, info, warn, error, silent, got "${level}"`);
  }

  return {
    pythonInterpreter: python || DEFAULT_PYTHON,
    timeoutSec: readPositiveInt(env, "MSCRIPT_TIMEOUT_SEC", DEFAULT_TIMEOUT_SEC),
    maxScriptDepth: readPositiveInt(env, "MSCRIPT_MAX_DEPTH", DEFAULT_MAX_SCRIPT_DEPTH),
    logLevel: level
  };
}
