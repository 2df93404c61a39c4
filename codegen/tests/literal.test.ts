import { describe, it } from "node:test";
import * as assert from "node:assert";

import { evaluateLiteral } from "../src/literal.js";
import { LiteralParseError } from "../src/errors.js";
import { renderNativeValue } from "../src/emitters/typescript.js";

describe("evaluateLiteral", () => {
  it("should evaluate scalar literals", () => {
    assert.strictEqual(evaluateLiteral("42"), 42);
    assert.strictEqual(evaluateLiteral("-7"), -7);
    assert.strictEqual(evaluateLiteral("3.14"), 3.14);
    assert.strictEqual(evaluateLiteral("1e3"), 1000);
    assert.strictEqual(evaluateLiteral('"hi"'), "hi");
    assert.strictEqual(evaluateLiteral('"""block"""'), "block");
    assert.strictEqual(evaluateLiteral("true"), true);
    assert.strictEqual(evaluateLiteral("false"), false);
    assert.strictEqual(evaluateLiteral("null"), null);
  });

  it("should keep integers beyond the safe range exact", () => {
    assert.strictEqual(evaluateLiteral("9007199254740991"), 9007199254740991);
    assert.strictEqual(evaluateLiteral("9007199254740993"), 9007199254740993n);
    assert.strictEqual(evaluateLiteral("-9007199254740993"), -9007199254740993n);
    assert.deepStrictEqual(evaluateLiteral("[1, 123456789012345678901234567890]"), [
      1,
      123456789012345678901234567890n,
    ]);
  });

  it("should evaluate enum values to their name", () => {
    assert.strictEqual(evaluateLiteral("SOME_ENUM_VALUE"), "SOME_ENUM_VALUE");
  });

  it("should evaluate lists in order", () => {
    assert.deepStrictEqual(evaluateLiteral("[1,2,3]"), [1, 2, 3]);
    assert.deepStrictEqual(evaluateLiteral("[]"), []);
  });

  it("should evaluate objects to maps in written order", () => {
    const value = evaluateLiteral('{b: "x", a: 1}');
    assert.ok(value instanceof Map);
    assert.deepStrictEqual([...value.entries()], [
      ["b", "x"],
      ["a", 1],
    ]);
  });

  it("should evaluate nested values", () => {
    const value = evaluateLiteral("{list: [{x: 1}, null], order: DESC}");
    assert.deepStrictEqual(
      value,
      new Map<string, unknown>([
        ["list", [new Map([["x", 1]]), null]],
        ["order", "DESC"],
      ])
    );
  });

  it("should reject malformed literals", () => {
    assert.throws(() => evaluateLiteral("[1, 2"), LiteralParseError);
    assert.throws(() => evaluateLiteral("{a 1}"), LiteralParseError);
  });

  it("should reject variables nested in a literal", () => {
    assert.throws(() => evaluateLiteral("[$first]"), (err: unknown) => {
      assert.ok(err instanceof LiteralParseError);
      assert.strictEqual(err.literal, "[$first]");
      assert.strictEqual(
        err.message,
        'Cannot parse literal "[$first]": variable $first is not a constant value'
      );
      return true;
    });
  });
});

describe("renderNativeValue", () => {
  it("should render evaluated literals as expressions", () => {
    assert.strictEqual(renderNativeValue(null), "null");
    assert.strictEqual(renderNativeValue(3.5), "3.5");
    assert.strictEqual(renderNativeValue(true), "true");
    assert.strictEqual(renderNativeValue('say "hi"'), '"say \\"hi\\""');
    assert.strictEqual(
      renderNativeValue(evaluateLiteral('{tags: ["a", "b"], limit: null}')),
      '{ tags: ["a", "b"], limit: null }'
    );
    assert.strictEqual(renderNativeValue(new Map()), "{}");
  });

  it("should render large integers as bigint literals", () => {
    assert.strictEqual(renderNativeValue(evaluateLiteral("9007199254740993")), "9007199254740993n");
    assert.strictEqual(
      renderNativeValue(evaluateLiteral("{max: -9007199254740993}")),
      "{ max: -9007199254740993n }"
    );
  });

  it("should not render __proto__ as a plain key", () => {
    assert.strictEqual(
      renderNativeValue(evaluateLiteral("{__proto__: 1}")),
      '{ ["__proto__"]: 1 }'
    );
  });
});
