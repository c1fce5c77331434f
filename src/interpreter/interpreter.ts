/**
 * Sequential directive interpreter.
 *
 * Directives run strictly in order against ctx.session. The first failure
 * stops the run: effects of earlier directives stay applied, nothing after it
 * runs, and the error carries the directive index and line. No state is kept
 * between runs.
 */

import fs from "fs-extra";
import path from "path";
import type { Directive, RunSummary, ScriptIssue } from "../types.js";
import { directiveLines, parseDirective, collectParseIssues } from "../script/parser.js";
import {
  ExternalInvocationError,
  UnknownDirectiveError,
  errorMessage,
  isScriptError,
  type ErrorLocation,
  type ScriptError
} from "../errors.js";
import { assertReadableFile } from "../utils/validation.js";
import type { DirectiveRegistry, RunContext } from "./registry.js";

type PendingDirective = {
  line: number;
  read(): Directive;
};

function locateFailure(err: unknown, location: ErrorLocation): ScriptError {
  if (isScriptError(err)) {
    return err.locate(location);
  }
  return new ExternalInvocationError(`Unexpected failure: ${errorMessage(err)}`, { cause: err }).locate(location);
}

async function applyOne(item: PendingDirective, index: number, ctx: RunContext): Promise<Directive> {
  let name: string | undefined;
  try {
    const directive = item.read();
    name = directive.name;
    const definition = ctx.registry.resolve(directive.name);
    if (!definition) {
      throw new UnknownDirectiveError(directive.name);
    }
    ctx.logger.debug(`#${index} line ${directive.line}: ${directive.text}`);
    await definition.apply(directive, ctx);
    return directive;
  } catch (err) {
    throw locateFailure(err, { directiveIndex: index, line: item.line, directive: name, script: ctx.scriptPath });
  }
}

async function runSequence(items: Iterable<PendingDirective>, ctx: RunContext): Promise<RunSummary> {
  const started = Date.now();
  let index = 0;

  for (const item of items) {
    const directive = await applyOne(item, index, ctx);
    ctx.onApplied?.(directive, index);
    index++;
  }

  const summary = { applied: index, durationMs: Date.now() - started };
  ctx.logger.debug(`applied ${summary.applied} directive(s) in ${summary.durationMs}ms`);
  return summary;
}

/**
 * Run already-parsed directives in order.
 */
export function runDirectives(directives: Iterable<Directive>, ctx: RunContext): Promise<RunSummary> {
  const items = Array.from(directives, (directive): PendingDirective => ({
    line: directive.line,
    read: () => directive
  }));
  return runSequence(items, ctx);
}

/**
 * Run script text. Each line is parsed only when the run reaches it.
 */
export function runScriptText(source: string, ctx: RunContext): Promise<RunSummary> {
  const items = directiveLines(source).map(({ line, text }): PendingDirective => ({
    line,
    read: () => parseDirective(text, line)
  }));
  return runSequence(items, ctx);
}

/**
 * Run a script file. Its directory becomes the script directory for use-script-dir.
 */
export async function runScriptFile(file: string, ctx: RunContext): Promise<RunSummary> {
  const scriptPath = path.resolve(ctx.session.workingDirectory, file);
  await assertReadableFile(scriptPath);
  const source = await fs.readFile(scriptPath, "utf8");
  ctx.logger.debug(`running ${scriptPath}`);
  return runScriptText(source, { ...ctx, scriptPath });
}

/**
 * Report every syntax problem, unknown directive and bad argument without running anything.
 */
export function checkScript(source: string, registry: DirectiveRegistry): ScriptIssue[] {
  const { directives, issues } = collectParseIssues(source);

  for (const directive of directives) {
    const definition = registry.resolve(directive.name);
    if (!definition) {
      issues.push({ line: directive.line, kind: "UnknownDirective", message: `Unknown directive: ${directive.name}` });
      continue;
    }
    try {
      definition.check(directive);
    } catch (err) {
      issues.push({
        line: directive.line,
        kind: isScriptError(err) ? err.kind : "Unknown",
        message: errorMessage(err)
      });
    }
  }

  return issues.sort((a, b) => a.line - b.line);
}
