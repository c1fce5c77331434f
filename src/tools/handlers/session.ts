import { v4 as uuidv4 } from "uuid";
import type { SessionId, SessionState } from "../../types.js";
import {
  assertDirectory,
  decodeSessionIdArgs,
  decodeStartSessionArgs
} from "../../utils/validation.js";
import { createSession, snapshotSession } from "../../session/session.js";
import { parseValue } from "../../script/values.js";
import { sessions } from "../../shared/sessions.js";
import { successResponse, unknownSessionError, type MCPResponse } from "./lib/response-utils.js";
import type { HandlerDeps } from "./lib/deps.js";

/**
 * Handler for mscript.startSession tool.
 * Opens a render session rooted at a working directory, optionally with initial settings.
 */
export async function handleStartSession(rawArgs: unknown, deps: HandlerDeps): Promise<MCPResponse> {
  const args = decodeStartSessionArgs(rawArgs);
  await assertDirectory(args.workingDirectory);

  const settings = Object.fromEntries(
    Object.entries(args.settings ?? {}).map(([name, value]) => [
      name,
      // Strings get the same typing as unquoted script values, so "10%" stays a percentage
      typeof value === "string" ? parseValue(value, false) : value
    ])
  );

  const id: SessionId = uuidv4();
  const state: SessionState = {
    id,
    createdAt: Date.now(),
    session: createSession({ workingDirectory: args.workingDirectory, settings }),
    runs: []
  };
  sessions.set(id, state);
  deps.logger.info(`session ${id} started in ${state.session.workingDirectory}`);

  return successResponse({
    sessionId: id,
    message: "Session started",
    state: snapshotSession(state.session)
  });
}

/**
 * Handler for mscript.endSession tool.
 * Ends and removes a session.
 */
export async function handleEndSession(rawArgs: unknown, deps: HandlerDeps): Promise<MCPResponse> {
  const { sessionId } = decodeSessionIdArgs(rawArgs);
  if (!sessions.delete(sessionId)) {
    return unknownSessionError(sessionId);
  }
  deps.logger.info(`session ${sessionId} ended`);
  return successResponse({ ok: true });
}
