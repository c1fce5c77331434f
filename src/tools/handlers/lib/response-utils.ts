/**
 * Standardized response utilities for MCP tool handlers.
 * Ensures consistent error and success response formats across all handlers.
 */

import { isScriptError, type ErrorLocation } from "../../../errors.js";
import type { FailureLocation, RunFailure } from "../../../types.js";

/**
 * Standard MCP response content type.
 */
export type MCPResponse = {
  content: Array<{
    type: "text";
    text: string;
  }>;
  isError?: boolean;
};

/**
 * Creates a standardized success response with JSON content.
 */
export function successResponse(data: unknown): MCPResponse {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }]
  };
}

/**
 * Creates a standardized error response for unknown session IDs.
 */
export function unknownSessionError(sessionId: string): MCPResponse {
  return {
    content: [{ type: "text", text: JSON.stringify({ error: `Unknown session: ${sessionId}` }, null, 2) }],
    isError: true
  };
}

/**
 * Creates a standardized error response for generic errors.
 */
export function errorResponse(error: unknown): MCPResponse {
  const message = error instanceof Error ? error.message : String(error);
  return {
    content: [{ type: "text", text: JSON.stringify({ error: message }, null, 2) }],
    isError: true
  };
}

function toFailureLocation(loc: ErrorLocation): FailureLocation {
  return {
    index: loc.directiveIndex ?? null,
    line: loc.line ?? null,
    directive: loc.directive ?? null,
    script: loc.script ?? null
  };
}

/**
 * Describe a failed run: how far it got and what stopped it. applied and
 * failedAt count the top-level run's own directives.
 */
export function runFailure(error: unknown, applied: number): RunFailure {
  if (isScriptError(error)) {
    const [innermost] = error.frames;
    return {
      applied,
      failedAt: toFailureLocation(error.outermost()),
      nestedAt: error.frames.length > 1 ? toFailureLocation(innermost) : null,
      error: { kind: error.kind, message: error.message }
    };
  }
  return {
    applied,
    failedAt: toFailureLocation({}),
    nestedAt: null,
    error: { kind: "Unknown", message: error instanceof Error ? error.message : String(error) }
  };
}

/**
 * Creates an error response for a run that stopped partway.
 */
export function runFailureResponse(failure: RunFailure, state: unknown): MCPResponse {
  return {
    content: [{ type: "text", text: JSON.stringify({ status: "failed", ...failure, state }, null, 2) }],
    isError: true
  };
}
