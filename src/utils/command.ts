/**
 * Line tokenizing and external program execution.
 */

import { execa } from "execa";
import type { CommandResult } from "../types.js";
import { isExecaError } from "./validation.js";

export type Token = {
  text: string;
  quoted: boolean;
  quoteAt: number; // Offset in text where the first quoted span starts, -1 if none
};

/**
 * Split a line into whitespace-separated tokens, respecting quotes.
 * Example: 'set-setting name=a value="b c"' -> ['set-setting', 'name=a', 'value=b c']
 */
export function tokenizeLine(line: string): Token[] {
  const tokens: Token[] = [];
  let current = "";
  let started = false;
  let quoteAt = -1;
  let inQuote = false;
  let quoteChar = "";

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    // ' opens a quote only at the start of a token or of a value
    const opensQuote = char === '"' || (char === "'" && (!started || current.endsWith("=")));
    if (inQuote ? char === quoteChar : opensQuote) {
      if (inQuote) {
        inQuote = false;
        quoteChar = "";
      } else {
        inQuote = true;
        quoteChar = char;
        if (quoteAt < 0) quoteAt = current.length;
        started = true;
      }
    } else if (/\s/.test(char) && !inQuote) {
      if (started) {
        tokens.push({ text: current, quoted: quoteAt >= 0, quoteAt });
        current = "";
        started = false;
        quoteAt = -1;
      }
    } else {
      current += char;
      started = true;
    }
  }

  if (inQuote) {
    throw new Error(`Unclosed quote in line: ${line}`);
  }
  if (started) tokens.push({ text: current, quoted: quoteAt >= 0, quoteAt });

  return tokens;
}

/**
 * Split a program argument string into plain arguments.
 */
export function splitArgs(value: string): string[] {
  return tokenizeLine(value).map(t => t.text);
}

/**
 * Run a program to completion with timeout and error handling.
 * Spawn failures and timeouts come back as ok: false.
 */
export async function runProgram(
  bin: string,
  args: string[],
  cwd: string,
  timeoutSec: number
): Promise<CommandResult> {
  try {
    const { stdout, stderr, exitCode } = await execa(bin, args, { cwd, timeout: timeoutSec * 1000, shell: false });
    return { ok: (exitCode ?? 0) === 0, stdout, stderr, exitCode: exitCode ?? 0 };
  } catch (err: unknown) {
    if (isExecaError(err) && err.timedOut) {
      return {
        ok: false,
        stdout: err.stdout ?? "",
        stderr: `Program timed out after ${timeoutSec}s\n${err.stderr ?? ""}`,
        exitCode: null
      };
    }
    if (isExecaError(err)) {
      return { ok: false, stdout: err.stdout ?? "", stderr: err.stderr ?? String(err), exitCode: err.exitCode ?? null };
    }
    return { ok: false, stdout: "", stderr: String(err), exitCode: null };
  }
}

/**
 * Start a program detached from this process and return once it has spawned.
 * Later failures of the program are reported through onFailure.
 */
export async function startDetached(
  bin: string,
  args: string[],
  cwd: string,
  onFailure: (err: unknown) => void
): Promise<void> {
  const subprocess = execa(bin, args, { cwd, detached: true, stdio: "ignore", shell: false });
  let spawned = false;
  // Spawn errors reach the caller through the "error" event below
  void subprocess.catch((err: unknown) => {
    if (spawned) onFailure(err);
  });
  await new Promise<void>((resolve, reject) => {
    subprocess.once("spawn", () => resolve());
    subprocess.once("error", reject);
  });
  spawned = true;
  subprocess.unref();
}
