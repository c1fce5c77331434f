import type { Tool } from "@modelcontextprotocol/sdk/types.js";

/**
 * All map script runner tool schemas.
 * - Session lifecycle: startSession, endSession
 * - Execution: runScript, runDirectives, checkScript
 * - Inspection: getState, listDirectives
 */

export const tools: Tool[] = [
  {
    name: "mscript.startSession",
    description: "Open a render session rooted at a working directory. Scripts run against the session accumulate their effects.",
    inputSchema: {
      type: "object",
      properties: {
        workingDirectory: { type: "string", description: "Absolute path of the initial working directory" },
        settings: {
          type: "object",
          description: "Initial settings, name to value. String values are typed like unquoted script values (\"10%\", \"false\").",
          additionalProperties: { type: ["string", "number", "boolean"] }
        }
      },
      required: ["workingDirectory"]
    }
  },
  {
    name: "mscript.runScript",
    description: "Run a map script file against a session. Stops at the first failing directive; earlier effects stay applied.",
    inputSchema: {
      type: "object",
      properties: {
        sessionId: { type: "string" },
        file: { type: "string", description: "Script path, absolute or relative to the session's working directory" }
      },
      required: ["sessionId", "file"]
    }
  },
  {
    name: "mscript.runDirectives",
    description: "Run inline map script text against a session.",
    inputSchema: {
      type: "object",
      properties: {
        sessionId: { type: "string" },
        text: { type: "string", description: "Script text, one directive per line" },
        scriptDirectory: { type: "string", description: "Directory use-script-dir should move to" }
      },
      required: ["sessionId", "text"]
    }
  },
  {
    name: "mscript.checkScript",
    description: "Check map script text for syntax errors, unknown directives and bad arguments without running it.",
    inputSchema: {
      type: "object",
      properties: {
        text: { type: "string" }
      },
      required: ["text"]
    }
  },
  {
    name: "mscript.getState",
    description: "Get a session's working directory, bounds, loaded sources, settings and run history.",
    inputSchema: {
      type: "object",
      properties: {
        sessionId: { type: "string" }
      },
      required: ["sessionId"]
    }
  },
  {
    name: "mscript.listDirectives",
    description: "List the directives map scripts may use, with aliases and a short summary of each.",
    inputSchema: {
      type: "object",
      properties: {}
    }
  },
  {
    name: "mscript.endSession",
    description: "Close a session and drop its state.",
    inputSchema: {
      type: "object",
      properties: {
        sessionId: { type: "string" }
      },
      required: ["sessionId"]
    }
  }
];
