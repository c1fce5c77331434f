import { defineDirective, type RunContext } from "../registry.js";
import { optionalNumberArg, optionalStringArg, stringArg } from "../args.js";
import { resolveSessionPath } from "../../session/session.js";
import { assertReadableFile } from "../../utils/validation.js";
import { splitArgs } from "../../utils/command.js";
import { ExternalInvocationError, MalformedArgumentError, errorMessage } from "../../errors.js";
import { MAX_STDERR_CHARS } from "../../constants.js";
import type { CommandResult, Directive } from "../../types.js";

function tail(text: string): string {
  return text.length > MAX_STDERR_CHARS ? text.slice(-MAX_STDERR_CHARS) : text;
}

function programArgs(d: Directive): string[] {
  const raw = optionalStringArg(d, "args");
  if (raw === undefined) return [];
  try {
    return splitArgs(raw);
  } catch (err) {
    throw new MalformedArgumentError(`${d.name} args: ${errorMessage(err)}`, { argument: "args", cause: err });
  }
}

async function invoke(ctx: RunContext, label: string, program: string, args: string[], timeoutSec: number): Promise<void> {
  let result: CommandResult;
  try {
    result = await ctx.collaborator.run(program, args, { cwd: ctx.session.workingDirectory, timeoutSec });
  } catch (err) {
    throw new ExternalInvocationError(`${label} could not be started: ${errorMessage(err)}`, { cause: err });
  }

  if (result.stdout.trim() !== "") {
    ctx.logger.debug(`${label} stdout:\n${result.stdout.trimEnd()}`);
  }
  if (!result.ok) {
    const code = result.exitCode === null ? "no exit code" : `exit code ${result.exitCode}`;
    const stderr = tail(result.stderr.trim());
    throw new ExternalInvocationError(
      `${label} failed (${code})${stderr ? `: ${stderr}` : ""}`,
      { exitCode: result.exitCode, stderr }
    );
  }
}

/**
 * Hand a Python file to the configured interpreter.
 */
export const runPython = defineDirective({
  name: "run-python",
  summary: "Run a Python script with the configured interpreter",
  args: ["file"],
  maxPositional: 1,
  parse: (d) => ({ file: stringArg(d, "file", { positional: 0 }) }),
  async run({ file }, ctx) {
    const absPath = resolveSessionPath(ctx.session, file);
    await assertReadableFile(absPath);
    await invoke(ctx, `run-python ${file}`, ctx.config.pythonInterpreter, [absPath], ctx.config.timeoutSec);
  }
});

export const runProgram = defineDirective({
  name: "run-program",
  summary: "Run a program and wait for it to finish",
  args: ["file", "timeout", "args"],
  maxPositional: 1,
  parse: (d) => ({
    file: stringArg(d, "file", { positional: 0 }),
    timeoutSec: optionalNumberArg(d, "timeout", { min: 1 }),
    args: programArgs(d)
  }),
  async run({ file, timeoutSec, args }, ctx) {
    const absPath = resolveSessionPath(ctx.session, file);
    await assertReadableFile(absPath);
    await invoke(ctx, `run-program ${file}`, absPath, args, timeoutSec ?? ctx.config.timeoutSec);
  }
});

export const startProgram = defineDirective({
  name: "start-program",
  summary: "Start a program without waiting for it",
  args: ["file", "args"],
  maxPositional: 1,
  parse: (d) => ({
    file: stringArg(d, "file", { positional: 0 }),
    args: programArgs(d)
  }),
  async run({ file, args }, ctx) {
    const absPath = resolveSessionPath(ctx.session, file);
    await assertReadableFile(absPath);
    try {
      await ctx.collaborator.start(absPath, args, { cwd: ctx.session.workingDirectory });
    } catch (err) {
      throw new ExternalInvocationError(`start-program ${file} could not be started: ${errorMessage(err)}`, { cause: err });
    }
  }
});
