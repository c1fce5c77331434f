import type { CallToolRequest } from "@modelcontextprotocol/sdk/types.js";
import { handleStartSession, handleEndSession } from "./session.js";
import { handleRunScript, handleRunDirectives, handleCheckScript } from "./script.js";
import { handleGetState } from "./state.js";
import { handleListDirectives } from "./directives.js";
import { errorResponse, type MCPResponse } from "./lib/response-utils.js";
import type { HandlerDeps } from "./lib/deps.js";

/**
 * Handler registry - routes tool calls to appropriate handlers.
 * Centralizes error handling and response formatting.
 */
export async function handleToolCall(req: CallToolRequest, deps: HandlerDeps): Promise<MCPResponse> {
  const args = req.params.arguments ?? {};
  try {
    switch (req.params.name) {
      // Session lifecycle
      case "mscript.startSession":
        return await handleStartSession(args, deps);
      case "mscript.endSession":
        return await handleEndSession(args, deps);

      // Script execution
      case "mscript.runScript":
        return await handleRunScript(args, deps);
      case "mscript.runDirectives":
        return await handleRunDirectives(args, deps);
      case "mscript.checkScript":
        return await handleCheckScript(args, deps);

      // State queries
      case "mscript.getState":
        return await handleGetState(args);
      case "mscript.listDirectives":
        return await handleListDirectives(deps);

      default:
        return errorResponse(`Unhandled tool: ${req.params.name}`);
    }
  } catch (err: unknown) {
    return errorResponse(err);
  }
}
