import { decodeSessionIdArgs } from "../../utils/validation.js";
import { distinctSourcePaths, snapshotSession } from "../../session/session.js";
import { sessions } from "../../shared/sessions.js";
import { successResponse, unknownSessionError, type MCPResponse } from "./lib/response-utils.js";

/**
 * Handler for mscript.getState tool.
 * Returns the session's working directory, bounds, sources, settings and run history.
 * distinctSources lists each loaded path once, in first-load order.
 */
export async function handleGetState(rawArgs: unknown): Promise<MCPResponse> {
  const { sessionId } = decodeSessionIdArgs(rawArgs);
  const state = sessions.get(sessionId);
  if (!state) {
    return unknownSessionError(sessionId);
  }

  return successResponse({
    sessionId: state.id,
    createdAt: state.createdAt,
    state: snapshotSession(state.session),
    distinctSources: distinctSourcePaths(state.session),
    runs: state.runs
  });
}
