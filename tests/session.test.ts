import { test, describe } from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import {
  addSource,
  clearMap,
  createSession,
  distinctSourcePaths,
  resolveSessionPath,
  setSetting,
  snapshotSession
} from "../src/session/session.js";
import { percent } from "../src/script/values.js";

describe("session", () => {
  test("starts in cwd mode with nothing loaded", () => {
    const session = createSession({ workingDirectory: "/maps/work" });
    assert.equal(session.workingDirectory, path.resolve("/maps/work"));
    assert.equal(session.relativeTo, "cwd");
    assert.equal(session.bounds, undefined);
    assert.deepEqual(session.sources, []);
    assert.equal(session.settings.size, 0);
  });

  test("relative paths resolve against the working directory", () => {
    const session = createSession({ workingDirectory: "/maps/work" });
    assert.equal(resolveSessionPath(session, "../Cache/a.osm"), path.resolve("/maps/Cache/a.osm"));
    assert.equal(resolveSessionPath(session, "/abs/b.osm"), path.resolve("/abs/b.osm"));
  });

  test("settings are last-write-wins", () => {
    const session = createSession({ workingDirectory: "/" });
    setSetting(session, "map.decoration.grid", true);
    setSetting(session, "map.decoration.grid", false);
    assert.equal(session.settings.get("map.decoration.grid"), false);
    assert.equal(session.settings.size, 1);
  });

  test("sources accumulate; distinctSourcePaths gives the set view", () => {
    const session = createSession({ workingDirectory: "/" });
    addSource(session, { path: "/a.osm", format: "osm" });
    addSource(session, { path: "/b.ibf", format: "ibf" });
    addSource(session, { path: "/a.osm", format: "osm" });
    assert.equal(session.sources.length, 3);
    assert.deepEqual(distinctSourcePaths(session), ["/a.osm", "/b.ibf"]);
  });

  test("clearMap drops sources and bounds but keeps settings", () => {
    const session = createSession({ workingDirectory: "/", settings: { "map.decoration.scale": false } });
    addSource(session, { path: "/a.osm", format: "osm", bounds: { minLon: 1, minLat: 2, maxLon: 3, maxLat: 4 } });
    session.bounds = { minLon: 1, minLat: 2, maxLon: 3, maxLat: 4 };
    clearMap(session);
    assert.deepEqual(session.sources, []);
    assert.equal(session.bounds, undefined);
    assert.equal(session.settings.get("map.decoration.scale"), false);
  });

  test("snapshot renders percentages and copies state", () => {
    const session = createSession({ workingDirectory: "/w" });
    setSetting(session, "map.rendering.tiles.rendering-bounds-buffer", percent(10));
    setSetting(session, "map.decoration.attribution", false);
    const snap = snapshotSession(session);
    assert.deepEqual(snap, {
      workingDirectory: path.resolve("/w"),
      relativeTo: "cwd",
      bounds: null,
      boundsSource: null,
      sources: [],
      settings: {
        "map.rendering.tiles.rendering-bounds-buffer": "10%",
        "map.decoration.attribution": false
      }
    });
  });
});
