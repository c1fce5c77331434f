import path from "path";
import { defineDirective, type RunContext } from "../registry.js";
import { stringArg } from "../args.js";
import { resolveSessionPath } from "../../session/session.js";
import { assertDirectory } from "../../utils/validation.js";

/**
 * Directory of the running script, or the directory the caller named for inline text.
 */
export function scriptDirectoryOf(ctx: RunContext): string | undefined {
  if (ctx.scriptPath) return path.dirname(ctx.scriptPath);
  return ctx.scriptDirectory;
}

/**
 * Anchor relative paths at the script's own location.
 */
export const useScriptDir = defineDirective({
  name: "use-script-dir",
  aliases: ["set-relative-path", "set-paths-relative-to-script"],
  summary: "Resolve relative paths against the running script's directory",
  args: [],
  maxPositional: 0,
  parse: () => undefined,
  async run(_params, ctx) {
    const dir = scriptDirectoryOf(ctx);
    // Text with no known location keeps the current working directory as its anchor
    if (dir) {
      await assertDirectory(dir);
      ctx.session.workingDirectory = path.resolve(dir);
    } else {
      ctx.logger.debug(`no script location, paths stay relative to ${ctx.session.workingDirectory}`);
    }
    ctx.session.relativeTo = "script";
  }
});

export const changeDir = defineDirective({
  name: "change-dir",
  summary: "Move the working directory",
  args: ["dir"],
  maxPositional: 1,
  parse: (d) => ({ dir: stringArg(d, "dir", { positional: 0 }) }),
  async run({ dir }, ctx) {
    const target = resolveSessionPath(ctx.session, dir);
    await assertDirectory(target);
    ctx.session.workingDirectory = target;
  }
});
