/**
 * Validation utilities for the map script runner.
 */

import fs from "fs-extra";
import type {
  StartSessionArgs,
  SessionIdArgs,
  RunScriptArgs,
  RunDirectivesArgs,
  CheckScriptArgs
} from "../types.js";
import { PathResolutionError } from "../errors.js";

/**
 * Type guard to check if an error has expected execa properties.
 */
export function isExecaError(
  err: unknown
): err is { stdout?: string; stderr?: string; exitCode?: number; timedOut?: boolean; message?: string } {
  return (
    typeof err === 'object' && err !== null &&
    ('stdout' in err ||
     'stderr' in err ||
     'exitCode' in err ||
     'timedOut' in err)
  );
}

/**
 * Ensure a path exists and is a directory.
 */
export async function assertDirectory(dirPath: string): Promise<void> {
  const stat = await fs.stat(dirPath).catch(() => null);
  if (!stat) {
    throw new PathResolutionError(dirPath, `Directory does not exist: ${dirPath}`);
  }
  if (!stat.isDirectory()) {
    throw new PathResolutionError(dirPath, `Not a directory: ${dirPath}`);
  }
}

/**
 * Ensure a path exists, is a regular file and is readable.
 */
export async function assertReadableFile(filePath: string): Promise<void> {
  const stat = await fs.stat(filePath).catch(() => null);
  if (!stat) {
    throw new PathResolutionError(filePath, `File does not exist: ${filePath}`);
  }
  if (!stat.isFile()) {
    throw new PathResolutionError(filePath, `Not a file: ${filePath}`);
  }
  try {
    await fs.access(filePath, fs.constants.R_OK);
  } catch (err) {
    throw new PathResolutionError(filePath, `File is not readable: ${filePath}`, { cause: err });
  }
}

// ============= TOOL ARGUMENT DECODING =============

function asObject(raw: unknown): Record<string, unknown> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error("Tool arguments must be an object");
  }
  return Object.fromEntries(Object.entries(raw));
}

function requireString(obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new Error(`${key} must be a non-empty string`);
  }
  return value;
}

function optionalString(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new Error(`${key} must be a string`);
  }
  return value;
}

export function decodeStartSessionArgs(raw: unknown): StartSessionArgs {
  const obj = asObject(raw);
  const args: StartSessionArgs = { workingDirectory: requireString(obj, "workingDirectory") };

  if (obj.settings !== undefined) {
    const settings = asObject(obj.settings);
    const out: Record<string, string | number | boolean> = {};
    for (const [name, value] of Object.entries(settings)) {
      if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
        throw new Error(`settings.${name} must be a string, number or boolean`);
      }
      out[name] = value;
    }
    args.settings = out;
  }
  return args;
}

export function decodeSessionIdArgs(raw: unknown): SessionIdArgs {
  return { sessionId: requireString(asObject(raw), "sessionId") };
}

export function decodeRunScriptArgs(raw: unknown): RunScriptArgs {
  const obj = asObject(raw);
  return { sessionId: requireString(obj, "sessionId"), file: requireString(obj, "file") };
}

export function decodeRunDirectivesArgs(raw: unknown): RunDirectivesArgs {
  const obj = asObject(raw);
  const text = obj.text;
  if (typeof text !== "string") {
    throw new Error("text must be a string");
  }
  return {
    sessionId: requireString(obj, "sessionId"),
    text,
    scriptDirectory: optionalString(obj, "scriptDirectory")
  };
}

export function decodeCheckScriptArgs(raw: unknown): CheckScriptArgs {
  const text = asObject(raw).text;
  if (typeof text !== "string") {
    throw new Error("text must be a string");
  }
  return { text };
}
