import { test, describe } from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import type { CallToolRequest } from "@modelcontextprotocol/sdk/types.js";
import { handleToolCall } from "../src/tools/handlers/index.js";
import type { HandlerDeps } from "../src/tools/handlers/lib/deps.js";
import type { MCPResponse } from "../src/tools/handlers/lib/response-utils.js";
import { silentLogger } from "../src/utils/logger.js";
import { fakeCollaborator, fakeSourceLoader, makeTempDir, testConfig, writeFile } from "./helpers.js";

const deps: HandlerDeps = {
  config: testConfig,
  logger: silentLogger,
  collaborator: fakeCollaborator().collaborator,
  sourceLoader: fakeSourceLoader().sourceLoader,
  sleep: async () => {}
};

function call(name: string, args: Record<string, unknown>): Promise<MCPResponse> {
  const req: CallToolRequest = { method: "tools/call", params: { name, arguments: args } };
  return handleToolCall(req, deps);
}

function body(res: MCPResponse): Record<string, unknown> {
  return JSON.parse(res.content[0].text);
}

async function startSession(workingDirectory: string, settings?: Record<string, unknown>): Promise<string> {
  const res = await call("mscript.startSession", settings ? { workingDirectory, settings } : { workingDirectory });
  assert.equal(res.isError, undefined);
  return String(body(res).sessionId);
}

describe("mscript tools", () => {
  test("startSession types string settings like script values", async () => {
    const root = makeTempDir();
    const res = await call("mscript.startSession", {
      workingDirectory: root,
      settings: { "map.scale": "10%", grid: true, label: "north" }
    });

    assert.equal(res.isError, undefined);
    const out = body(res);
    assert.equal(out.message, "Session started");
    assert.deepEqual(out.state, {
      workingDirectory: root,
      relativeTo: "cwd",
      bounds: null,
      boundsSource: null,
      sources: [],
      settings: { "map.scale": "10%", grid: true, label: "north" }
    });
  });

  test("startSession rejects a missing directory", async () => {
    const root = makeTempDir();
    const res = await call("mscript.startSession", { workingDirectory: path.join(root, "gone") });

    assert.equal(res.isError, true);
    assert.deepEqual(body(res), { error: `Directory does not exist: ${path.join(root, "gone")}` });
  });

  test("runDirectives reports where a run stopped and keeps earlier effects", async () => {
    const root = makeTempDir();
    const sessionId = await startSession(root);

    const res = await call("mscript.runDirectives", {
      sessionId,
      text: "set-setting name=zoom value=12\nchange-dir nowhere\nset-setting name=x value=1"
    });

    assert.equal(res.isError, true);
    assert.deepEqual(body(res), {
      status: "failed",
      applied: 1,
      failedAt: { index: 1, line: 2, directive: "change-dir", script: null },
      nestedAt: null,
      error: {
        kind: "PathResolution",
        message: `failed at directive 1 (line 2) [change-dir]: Directory does not exist: ${path.join(root, "nowhere")}`
      },
      state: { workingDirectory: root, relativeTo: "cwd", bounds: null, boundsSource: null, sources: [], settings: { zoom: 12 } }
    });

    const state = body(await call("mscript.getState", { sessionId }));
    assert.ok(Array.isArray(state.runs));
    assert.deepEqual(
      state.runs.map((r: { origin: string; status: string; applied: number }) => [r.origin, r.status, r.applied]),
      [["<inline>", "failed", 1]]
    );
  });

  test("runDirectives resolves use-script-dir against the given directory", async () => {
    const root = makeTempDir();
    writeFile(root, "maps/.keep");
    const sessionId = await startSession(root);

    const res = await call("mscript.runDirectives", {
      sessionId,
      text: "use-script-dir",
      scriptDirectory: path.join(root, "maps")
    });

    const out = body(res);
    assert.equal(out.status, "completed");
    assert.equal(out.applied, 1);
    assert.deepEqual(out.state, {
      workingDirectory: path.join(root, "maps"),
      relativeTo: "script",
      bounds: null,
      boundsSource: null,
      sources: [],
      settings: {}
    });
  });

  test("runScript runs a file relative to the session", async () => {
    const root = makeTempDir();
    writeFile(root, "maps/city.mscript", "use-script-dir\nload-source city.osm\nset-setting name=grid value=false");
    writeFile(root, "maps/city.osm", "<osm/>");
    const sessionId = await startSession(root);

    const out = body(await call("mscript.runScript", { sessionId, file: "maps/city.mscript" }));

    assert.equal(out.status, "completed");
    assert.equal(out.applied, 3);
    assert.deepEqual(out.state, {
      workingDirectory: path.join(root, "maps"),
      relativeTo: "script",
      bounds: null,
      boundsSource: null,
      sources: [{ path: path.join(root, "maps", "city.osm"), format: "osm" }],
      settings: { grid: false }
    });

    const state = body(await call("mscript.getState", { sessionId }));
    assert.ok(Array.isArray(state.runs));
    assert.equal(state.runs[0].origin, path.join(root, "maps", "city.mscript"));
    assert.deepEqual(state.distinctSources, [path.join(root, "maps", "city.osm")]);
  });

  test("runScript counts only top-level directives when a nested script fails", async () => {
    const root = makeTempDir();
    const main = writeFile(root, "main.mscript", "set-setting name=a value=1\nrun-script child.mscript\nset-setting name=b value=2");
    const child = writeFile(root, "child.mscript", "set-setting name=c value=3\nset-setting name=d value=4\nchange-dir missing");
    const sessionId = await startSession(root);

    const res = await call("mscript.runScript", { sessionId, file: "main.mscript" });

    assert.equal(res.isError, true);
    const out = body(res);
    assert.equal(out.applied, 1);
    assert.deepEqual(out.failedAt, { index: 1, line: 2, directive: "run-script", script: main });
    assert.deepEqual(out.nestedAt, { index: 2, line: 3, directive: "change-dir", script: child });
  });

  test("endSession removes the session", async () => {
    const sessionId = await startSession(makeTempDir());

    assert.deepEqual(body(await call("mscript.endSession", { sessionId })), { ok: true });

    const res = await call("mscript.getState", { sessionId });
    assert.equal(res.isError, true);
    assert.deepEqual(body(res), { error: `Unknown session: ${sessionId}` });
  });

  test("checkScript lists problems without a session", async () => {
    const out = body(await call("mscript.checkScript", { text: "clear-map\nzoom-in\nset-setting value=1" }));

    assert.deepEqual(out, {
      ok: false,
      issues: [
        { line: 2, kind: "UnknownDirective", message: "Unknown directive: zoom-in" },
        { line: 3, kind: "MalformedArgument", message: "set-setting requires name" }
      ]
    });
  });

  test("listDirectives describes every built-in directive", async () => {
    const out = body(await call("mscript.listDirectives", {}));

    assert.ok(Array.isArray(out.directives));
    assert.equal(out.directives.length, 13);
    assert.deepEqual(out.directives[0], {
      name: "bounds-use-source",
      aliases: ["set-geo-bounds"],
      summary: "Set the geographic bounds to those of a loaded source"
    });
    assert.deepEqual(
      out.directives.find((d: { name: string }) => d.name === "zip"),
      { name: "zip", aliases: [], summary: "Pack files under a base directory into a zip archive" }
    );
  });

  test("bad arguments and unknown tools come back as errors", async () => {
    const missing = await call("mscript.runScript", { sessionId: "s1" });
    assert.equal(missing.isError, true);
    assert.deepEqual(body(missing), { error: "file must be a non-empty string" });

    const unknown = await call("mscript.draw", {});
    assert.equal(unknown.isError, true);
    assert.deepEqual(body(unknown), { error: "Unhandled tool: mscript.draw" });
  });
});
