import { test, describe } from "node:test";
import assert from "node:assert/strict";
import { parseValue, formatValue, isPercentage, percent } from "../src/script/values.js";

describe("parseValue", () => {
  test("booleans are case-insensitive", () => {
    assert.equal(parseValue("False", false), false);
    assert.equal(parseValue("TRUE", false), true);
  });

  test("numbers and percentages", () => {
    assert.equal(parseValue("42", false), 42);
    assert.equal(parseValue("-3.5", false), -3.5);
    assert.deepEqual(parseValue("10%", false), { kind: "percent", value: 10 });
  });

  test("quoted text stays a string", () => {
    assert.equal(parseValue("false", true), "false");
    assert.equal(parseValue("10", true), "10");
  });

  test("anything else is a string", () => {
    assert.equal(parseValue("relief", false), "relief");
    assert.equal(parseValue("1e5", false), "1e5");
    assert.equal(parseValue("10%%", false), "10%%");
  });
});

describe("formatValue", () => {
  test("percentages render with a percent sign", () => {
    assert.equal(formatValue(percent(12.5)), "12.5%");
    assert.equal(formatValue(true), true);
    assert.equal(formatValue("x"), "x");
  });

  test("isPercentage rejects look-alikes", () => {
    assert.equal(isPercentage({ kind: "percent", value: "10" }), false);
    assert.equal(isPercentage(null), false);
    assert.equal(isPercentage(percent(1)), true);
  });
});
