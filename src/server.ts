#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { tools } from "./tools/schemas.js";
import { handleToolCall } from "./tools/handlers/index.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./utils/logger.js";
import type { HandlerDeps } from "./tools/handlers/lib/deps.js";

/**
 * MCP server for running map scripts.
 *
 * A client opens a session (working directory, settings, loaded sources,
 * bounds), runs script files or inline directives against it, and reads the
 * resulting state back. Runs stop at the first failing directive and report
 * how far they got; nothing is rolled back.
 *
 * Tools:
 *  - mscript.startSession   : open a session rooted at a directory
 *  - mscript.runScript      : run a script file against a session
 *  - mscript.runDirectives  : run inline script text against a session
 *  - mscript.checkScript    : validate script text without running it
 *  - mscript.getState       : snapshot of a session
 *  - mscript.listDirectives : directives scripts may use
 *  - mscript.endSession     : cleanup
 *
 * External programs (run-python, run-program, start-program) run locally in
 * the session's working directory with timeouts.
 */

const config = loadConfig();
const logger = createLogger("mscript-server", config.logLevel);
const deps: HandlerDeps = { config, logger };

const transport = new StdioServerTransport();
const server = new Server(
  {
    name: "mscript-runner",
    version: "0.1.0",
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

// Register tools list handler
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools };
});

// Register tool execution handler
server.setRequestHandler(CallToolRequestSchema, async (req) => {
  return await handleToolCall(req, deps);
});

await server.connect(transport);
logger.info("ready on stdio");
