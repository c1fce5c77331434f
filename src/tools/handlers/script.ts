import type { RunSummary, SessionState } from "../../types.js";
import {
  decodeCheckScriptArgs,
  decodeRunDirectivesArgs,
  decodeRunScriptArgs
} from "../../utils/validation.js";
import { createRunContext, createDefaultRegistry } from "../../interpreter/context.js";
import { checkScript, runScriptFile, runScriptText } from "../../interpreter/interpreter.js";
import type { RunContext } from "../../interpreter/registry.js";
import { resolveSessionPath, snapshotSession } from "../../session/session.js";
import { sessions } from "../../shared/sessions.js";
import { INLINE_ORIGIN } from "../../constants.js";
import {
  runFailure,
  runFailureResponse,
  successResponse,
  unknownSessionError,
  type MCPResponse
} from "./lib/response-utils.js";
import type { HandlerDeps } from "./lib/deps.js";

/**
 * Run against a stored session and record the outcome. Failures leave the
 * effects of earlier directives in place.
 */
async function runAgainst(
  state: SessionState,
  origin: string,
  deps: HandlerDeps,
  scriptDirectory: string | undefined,
  execute: (ctx: RunContext) => Promise<RunSummary>
): Promise<MCPResponse> {
  let applied = 0;
  const ctx = createRunContext({
    session: state.session,
    config: deps.config,
    collaborator: deps.collaborator,
    sourceLoader: deps.sourceLoader,
    registry: deps.registry,
    logger: deps.logger.child("run"),
    scriptDirectory,
    sleep: deps.sleep,
    onApplied: () => {
      applied++;
    }
  });

  const startedAt = Date.now();
  try {
    const summary = await execute(ctx);
    state.runs.push({ startedAt, origin, status: "completed", applied });
    return successResponse({
      status: "completed",
      applied,
      durationMs: summary.durationMs,
      state: snapshotSession(state.session)
    });
  } catch (err) {
    state.runs.push({ startedAt, origin, status: "failed", applied });
    const failure = runFailure(err, applied);
    deps.logger.warn(`${origin}: ${failure.error.message}`);
    return runFailureResponse(failure, snapshotSession(state.session));
  }
}

/**
 * Handler for mscript.runScript tool.
 * Runs a script file against a session. Relative paths resolve against the session's working directory.
 */
export async function handleRunScript(rawArgs: unknown, deps: HandlerDeps): Promise<MCPResponse> {
  const args = decodeRunScriptArgs(rawArgs);
  const state = sessions.get(args.sessionId);
  if (!state) {
    return unknownSessionError(args.sessionId);
  }

  const scriptPath = resolveSessionPath(state.session, args.file);
  return runAgainst(state, scriptPath, deps, undefined, (ctx) => runScriptFile(scriptPath, ctx));
}

/**
 * Handler for mscript.runDirectives tool.
 * Runs inline script text against a session.
 */
export async function handleRunDirectives(rawArgs: unknown, deps: HandlerDeps): Promise<MCPResponse> {
  const args = decodeRunDirectivesArgs(rawArgs);
  const state = sessions.get(args.sessionId);
  if (!state) {
    return unknownSessionError(args.sessionId);
  }

  return runAgainst(state, INLINE_ORIGIN, deps, args.scriptDirectory, (ctx) => runScriptText(args.text, ctx));
}

/**
 * Handler for mscript.checkScript tool.
 * Lists syntax errors, unknown directives and bad arguments without running anything.
 */
export async function handleCheckScript(rawArgs: unknown, deps: HandlerDeps): Promise<MCPResponse> {
  const { text } = decodeCheckScriptArgs(rawArgs);
  const issues = checkScript(text, deps.registry ?? createDefaultRegistry());
  return successResponse({ ok: issues.length === 0, issues });
}
