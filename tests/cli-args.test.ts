import { test, describe } from "node:test";
import assert from "node:assert/strict";
import { USAGE, parseCliArgs } from "../src/cli/args.js";

describe("parseCliArgs", () => {
  test("reads the script and flags", () => {
    assert.deepEqual(parseCliArgs(["maps/city.mscript", "--cwd", "/work", "--json"]), {
      script: "maps/city.mscript",
      cwd: "/work",
      json: true,
      check: false
    });
  });

  test("defaults", () => {
    assert.deepEqual(parseCliArgs(["--check", "a.mscript"]), {
      script: "a.mscript",
      cwd: undefined,
      json: false,
      check: true
    });
  });

  test("ignores a bare --", () => {
    assert.equal(parseCliArgs(["--", "a.mscript"]).script, "a.mscript");
  });

  test("rejects bad input", () => {
    assert.throws(() => parseCliArgs(["a.mscript", "--cwd"]), { message: "--cwd requires a directory" });
    assert.throws(() => parseCliArgs(["a.mscript", "--verbose"]), { message: "Unknown option --verbose" });
    assert.throws(() => parseCliArgs([]), { message: USAGE });
    assert.throws(() => parseCliArgs(["a.mscript", "b.mscript"]), { message: USAGE });
  });
});
