import { test, describe } from "node:test";
import assert from "node:assert/strict";
import { directiveLines, parseDirective, parseScript, collectParseIssues } from "../src/script/parser.js";
import { tokenizeLine, splitArgs } from "../src/utils/command.js";
import { MalformedArgumentError } from "../src/errors.js";

describe("tokenizeLine", () => {
  test("splits on whitespace and keeps quoted spans together", () => {
    const tokens = tokenizeLine('set-setting  name=a\tvalue="b c"');
    assert.deepEqual(tokens.map(t => t.text), ["set-setting", "name=a", "value=b c"]);
    assert.deepEqual(tokens.map(t => t.quoteAt), [-1, -1, 6]);
  });

  test("empty quotes produce an empty token", () => {
    assert.deepEqual(tokenizeLine('log ""').map(t => t.text), ["log", ""]);
  });

  test("an apostrophe inside a word is literal", () => {
    const tokens = tokenizeLine("log Israel's map done");
    assert.deepEqual(tokens.map(t => t.text), ["log", "Israel's", "map", "done"]);
    assert.deepEqual(tokens.map(t => t.quoted), [false, false, false, false]);
  });

  test("single quotes open at the start of a value", () => {
    const [, token] = tokenizeLine("set-setting value='a b'");
    assert.deepEqual(token, { text: "value=a b", quoted: true, quoteAt: 6 });
  });

  test("throws on an unclosed quote", () => {
    assert.throws(() => tokenizeLine('log "oops'), /Unclosed quote/);
  });

  test("splitArgs returns plain strings", () => {
    assert.deepEqual(splitArgs(`--no-verbose '--directory-prefix=a b' x`), ["--no-verbose", "--directory-prefix=a b", "x"]);
  });
});

describe("directiveLines", () => {
  test("skips blanks and comments, keeps line numbers", () => {
    const source = "\uFEFF// header\r\n\r\nchange-dir dir=..\n   # note\nclear-map\n";
    assert.deepEqual(directiveLines(source), [
      { line: 3, text: "change-dir dir=.." },
      { line: 5, text: "clear-map" }
    ]);
  });
});

describe("parseDirective", () => {
  test("named, typed and positional arguments", () => {
    const d = parseDirective('Set-Setting name=map.decoration.grid value=False extra "two words"', 7);
    assert.equal(d.name, "set-setting");
    assert.deepEqual(d.args, { name: "map.decoration.grid", value: false });
    assert.deepEqual(d.raw, { name: "map.decoration.grid", value: "False" });
    assert.deepEqual(d.positional, ["extra", "two words"]);
    assert.equal(d.line, 7);
    assert.ok(Object.isFrozen(d));
  });

  test("quoted values are strings", () => {
    const d = parseDirective('set-setting name=x value="10%"', 1);
    assert.equal(d.args.value, "10%");
  });

  test("an equals sign inside a quoted span is not a separator", () => {
    const d = parseDirective('log "a=b"', 1);
    assert.deepEqual(d.args, {});
    assert.deepEqual(d.positional, ["a=b"]);
  });

  test("rejects empty keys, duplicates and bad names", () => {
    assert.throws(() => parseDirective("change-dir =..", 1), MalformedArgumentError);
    assert.throws(() => parseDirective("change-dir dir=a dir=b", 1), /Duplicate argument: dir/);
    assert.throws(() => parseDirective("dir=a", 1), /Expected a directive name/);
    assert.throws(() => parseDirective('log "open', 1), MalformedArgumentError);
  });
});

describe("parseScript", () => {
  test("reports the failing line", () => {
    const source = "clear-map\n\nchange-dir dir=a dir=b\n";
    assert.throws(
      () => parseScript(source),
      (err: unknown) => {
        assert.ok(err instanceof MalformedArgumentError);
        assert.equal(err.line, 3);
        assert.equal(err.directiveIndex, 1);
        assert.equal(err.message, "failed at directive 1 (line 3): Duplicate argument: dir");
        return true;
      }
    );
  });

  test("collectParseIssues keeps going after a bad line", () => {
    const { directives, issues } = collectParseIssues('log "x\nclear-map\nchange-dir =y');
    assert.deepEqual(directives.map(d => d.name), ["clear-map"]);
    assert.deepEqual(issues.map(i => [i.line, i.kind]), [[1, "MalformedArgument"], [3, "MalformedArgument"]]);
  });
});
