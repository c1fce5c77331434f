import { defineDirective } from "../registry.js";
import { numberArg, optionalStringArg, stringArg } from "../args.js";
import { runScriptFile } from "../interpreter.js";
import { resolveSessionPath } from "../../session/session.js";
import { ExternalInvocationError, MalformedArgumentError } from "../../errors.js";
import { MAX_PAUSE_MS } from "../../constants.js";

/**
 * Run another map script against the same session. Its directives are
 * indexed within its own file.
 */
export const runScript = defineDirective({
  name: "run-script",
  summary: "Run another map script against the current session",
  args: ["file"],
  maxPositional: 1,
  parse: (d) => ({ file: stringArg(d, "file", { positional: 0 }) }),
  async run({ file }, ctx) {
    if (ctx.depth + 1 > ctx.config.maxScriptDepth) {
      throw new ExternalInvocationError(`run-script nesting exceeds ${ctx.config.maxScriptDepth} levels`);
    }
    const absPath = resolveSessionPath(ctx.session, file);
    // onApplied counts the caller's own directives; the nested run is one of them
    await runScriptFile(absPath, { ...ctx, depth: ctx.depth + 1, onApplied: undefined });
  }
});

export const pause = defineDirective({
  name: "pause",
  summary: "Wait for a number of milliseconds",
  args: ["duration"],
  maxPositional: 1,
  parse: (d) => {
    const ms = numberArg(d, "duration", { positional: 0, integer: true, min: 0 });
    if (ms > MAX_PAUSE_MS) {
      throw new MalformedArgumentError(`pause duration must be <= ${MAX_PAUSE_MS}ms, got ${ms}`, { argument: "duration" });
    }
    return { ms };
  },
  async run({ ms }, ctx) {
    await ctx.sleep(ms);
  }
});

export const log = defineDirective({
  name: "log",
  summary: "Write a message to the log",
  args: ["message"],
  maxPositional: -1,
  parse: (d) => ({ message: optionalStringArg(d, "message") ?? d.positional.join(" ") }),
  run({ message }, ctx) {
    ctx.logger.info(message);
  }
});
