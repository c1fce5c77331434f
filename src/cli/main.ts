#!/usr/bin/env node
import fs from "fs-extra";
import path from "path";
import pc from "picocolors";
import { parseCliArgs } from "./args.js";
import { loadConfig } from "../config.js";
import { createLogger } from "../utils/logger.js";
import { createSession, snapshotSession } from "../session/session.js";
import { createRunContext, createDefaultRegistry } from "../interpreter/context.js";
import { checkScript, runScriptFile } from "../interpreter/interpreter.js";
import { errorMessage, isScriptError } from "../errors.js";
import type { SessionSnapshot } from "../types.js";

function describeBounds(state: SessionSnapshot): string {
  const from = state.boundsSource ? ` (source ${state.boundsSource.index})` : "";
  if (state.bounds) {
    return `${state.bounds.minLon},${state.bounds.minLat} .. ${state.bounds.maxLon},${state.bounds.maxLat}${from}`;
  }
  return state.boundsSource ? `from ${state.boundsSource.path}${from}` : "none";
}

function printState(state: SessionSnapshot): void {
  const lines = [
    `${pc.bold("working directory")} ${state.workingDirectory} (relative to ${state.relativeTo})`,
    `${pc.bold("bounds")} ${describeBounds(state)}`,
    `${pc.bold("sources")}${state.sources.length === 0 ? " none" : ""}`,
    ...state.sources.map((s, i) => `  ${i + 1}. ${s.path} (${s.format})`),
    `${pc.bold("settings")}${Object.keys(state.settings).length === 0 ? " none" : ""}`,
    ...Object.entries(state.settings).map(([name, value]) => `  ${name} = ${String(value)}`)
  ];
  process.stdout.write(lines.join("\n") + "\n");
}

async function main(argv: string[]): Promise<number> {
  const args = parseCliArgs(argv);
  const config = loadConfig();
  const logger = createLogger("mscript", config.logLevel);
  const cwd = path.resolve(args.cwd ?? process.cwd());

  if (args.check) {
    const scriptPath = path.resolve(cwd, args.script);
    const issues = checkScript(await fs.readFile(scriptPath, "utf8"), createDefaultRegistry());
    for (const issue of issues) {
      logger.error(`${scriptPath}:${issue.line} ${issue.kind}: ${issue.message}`);
    }
    if (args.json) {
      process.stdout.write(JSON.stringify({ ok: issues.length === 0, issues }, null, 2) + "\n");
    }
    return issues.length === 0 ? 0 : 1;
  }

  const session = createSession({ workingDirectory: cwd });
  let applied = 0;
  const ctx = createRunContext({
    session,
    config,
    logger,
    onApplied: () => {
      applied++;
    }
  });

  let failure: unknown;
  try {
    const summary = await runScriptFile(args.script, ctx);
    logger.info(pc.green(`applied ${summary.applied} directive(s) in ${summary.durationMs}ms`));
  } catch (err) {
    failure = err;
    logger.error(errorMessage(err));
    logger.error(`${applied} directive(s) applied before the failure`);
  }

  const state = snapshotSession(session);
  if (args.json) {
    const error = failure === undefined
      ? undefined
      : { kind: isScriptError(failure) ? failure.kind : "Unknown", message: errorMessage(failure) };
    process.stdout.write(JSON.stringify({ status: failure === undefined ? "completed" : "failed", applied, error, state }, null, 2) + "\n");
  } else {
    printState(state);
  }
  return failure === undefined ? 0 : 1;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(pc.red(errorMessage(err)) + "\n");
    process.exitCode = 2;
  }
);
