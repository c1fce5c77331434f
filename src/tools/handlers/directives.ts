import { createDefaultRegistry } from "../../interpreter/context.js";
import { successResponse, type MCPResponse } from "./lib/response-utils.js";
import type { HandlerDeps } from "./lib/deps.js";

/**
 * Handler for mscript.listDirectives tool.
 * Lists the directives a script may use, with their aliases and a one-line summary.
 */
export async function handleListDirectives(deps: HandlerDeps): Promise<MCPResponse> {
  const registry = deps.registry ?? createDefaultRegistry();
  const directives = registry
    .list()
    .map(({ name, aliases, summary }) => ({ name, aliases: [...aliases], summary }))
    .sort((a, b) => a.name.localeCompare(b.name));
  return successResponse({ directives });
}
