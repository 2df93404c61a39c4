import { describe, it } from "node:test";
import * as assert from "node:assert";

import { EmissionState, resolveTypeRef } from "../src/references.js";
import { ConsistencyError } from "../src/errors.js";
import { listOf, nonNull } from "../src/schema-model.js";
import { ref } from "./builders.js";

const stringListRef = nonNull(listOf(nonNull(ref("String"))));

describe("resolveTypeRef", () => {
  it("should resolve wrappers around a declared type directly", () => {
    const state = new EmissionState();
    state.markEmitted("String");
    assert.deepStrictEqual(resolveTypeRef(stringListRef, state, new Set()), {
      kind: "nonNull",
      ofType: {
        kind: "list",
        ofType: { kind: "nonNull", ofType: { kind: "resolved", name: "String" } },
      },
    });
  });

  it("should only make the innermost type a forward reference", () => {
    const state = new EmissionState();
    assert.deepStrictEqual(resolveTypeRef(stringListRef, state, new Set()), {
      kind: "nonNull",
      ofType: {
        kind: "list",
        ofType: { kind: "nonNull", ofType: { kind: "forward", name: "String" } },
      },
    });
  });

  it("should use a forward reference when a sibling field shares the name", () => {
    const state = new EmissionState();
    state.markEmitted("Address");
    assert.deepStrictEqual(
      resolveTypeRef(ref("Address", "OBJECT"), state, new Set(["Address", "city"])),
      { kind: "forward", name: "Address" }
    );
    assert.deepStrictEqual(
      resolveTypeRef(ref("Address", "OBJECT"), state, new Set(["address"])),
      { kind: "resolved", name: "Address" }
    );
  });

  it("should reject wrappers without an inner type", () => {
    assert.throws(
      () => resolveTypeRef({ kind: "LIST", name: null, ofType: null }, new EmissionState(), new Set()),
      ConsistencyError
    );
  });
});

describe("EmissionState", () => {
  it("should record names in declaration order", () => {
    const state = new EmissionState();
    state.markEmitted("B");
    state.markEmitted("A");
    assert.deepStrictEqual(state.names(), ["B", "A"]);
    assert.strictEqual(state.has("A"), true);
    assert.strictEqual(state.has("C"), false);
  });

  it("should refuse to declare a type twice", () => {
    const state = new EmissionState();
    state.markEmitted("A");
    assert.throws(() => state.markEmitted("A"), new ConsistencyError("type A declared twice"));
  });
});
