import { describe, it } from "node:test";
import * as assert from "node:assert";
import * as fs from "node:fs";

import {
  describeTypeRef,
  getNamedType,
  listOf,
  loadSchema,
  nonNull,
} from "../src/schema-model.js";
import { detectFormat, parseSchemaSource } from "../src/parser.js";
import { SchemaFormatError } from "../src/errors.js";
import { evaluateLiteral } from "../src/literal.js";
import { enumType, introspection, object, ref, scalar } from "./builders.js";

const fixturesDir = new URL("../fixtures/", import.meta.url);

const minimalSource = fs.readFileSync(
  new URL("minimal.json", fixturesDir),
  "utf-8"
);
const petsSource = fs.readFileSync(new URL("pets.graphql", fixturesDir), "utf-8");

describe("loadSchema", () => {
  it("should accept a query result envelope", () => {
    const schema = loadSchema(JSON.parse(minimalSource));
    assert.deepStrictEqual(
      schema.types.map((t) => t.name),
      ["Color", "ID", "Item", "Query"]
    );
    assert.strictEqual(schema.queryType, "Query");
    assert.strictEqual(schema.mutationType, null);
    assert.strictEqual(schema.subscriptionType, null);
    assert.strictEqual(schema.typesByName.get("Item")?.kind, "OBJECT");
  });

  it("should accept a bare introspection object and a __schema field", () => {
    const inner = introspection([scalar("String")], { query: "Query" });
    assert.strictEqual(loadSchema(inner).queryType, "Query");
    assert.strictEqual(loadSchema({ __schema: inner }).queryType, "Query");
  });

  it("should sort types by code unit order", () => {
    const schema = loadSchema(
      introspection([scalar("b"), scalar("_x"), scalar("B"), scalar("a")])
    );
    assert.deepStrictEqual(
      schema.types.map((t) => t.name),
      ["B", "_x", "a", "b"]
    );
  });

  it("should detect date/time and pagination types", () => {
    const plain = loadSchema(introspection([scalar("String")]));
    assert.strictEqual(plain.usesDateTime, false);
    assert.strictEqual(plain.usesPagination, false);

    const rich = loadSchema(
      introspection([scalar("Date"), object("PageInfo", [])])
    );
    assert.strictEqual(rich.usesDateTime, true);
    assert.strictEqual(rich.usesPagination, true);
  });

  it("should reject documents that are not objects", () => {
    assert.throws(() => loadSchema([]), SchemaFormatError);
    assert.throws(() => loadSchema("schema"), SchemaFormatError);
    assert.throws(() => loadSchema(null), SchemaFormatError);
  });

  it("should reject objects in no known shape", () => {
    assert.throws(
      () => loadSchema({ data: { schema: {} } }),
      new SchemaFormatError("schema must be introspection object or query result")
    );
  });

  it("should report malformed types with their path", () => {
    assert.throws(
      () => loadSchema({ types: [{ name: "Broken" }] }),
      (err: unknown) => {
        assert.ok(err instanceof SchemaFormatError);
        assert.ok(err.message.includes("types.0.kind"));
        return true;
      }
    );
  });

  it("should keep enum values in declaration order", () => {
    const schema = loadSchema(
      introspection([enumType("Color", ["RED", "GREEN", "BLUE"])])
    );
    assert.deepStrictEqual(
      schema.typesByName.get("Color")?.enumValues?.map((v) => v.name),
      ["RED", "GREEN", "BLUE"]
    );
  });
});

describe("type references", () => {
  it("should describe and unwrap wrapped references", () => {
    const typeRef = nonNull(listOf(nonNull(ref("String"))));
    assert.strictEqual(describeTypeRef(typeRef), "[String!]!");
    assert.strictEqual(getNamedType(typeRef), "String");
  });
});

describe("parseSchemaSource", () => {
  it("should reject a JSON array", () => {
    assert.throws(
      () => parseSchemaSource("[1, 2]", "json"),
      new SchemaFormatError("schema must be a JSON object")
    );
  });

  it("should reject invalid JSON", () => {
    assert.throws(() => parseSchemaSource("{", "json"), SchemaFormatError);
  });

  it("should introspect SDL schemas", () => {
    const schema = parseSchemaSource(petsSource, "sdl");
    assert.strictEqual(schema.queryType, "Query");
    assert.strictEqual(schema.usesDateTime, true);
    assert.strictEqual(schema.usesPagination, true);
    assert.strictEqual(schema.typesByName.get("Pet")?.kind, "UNION");
    assert.ok(schema.typesByName.has("__Schema"));

    const pets = schema.typesByName
      .get("Query")
      ?.fields?.find((f) => f.name === "pets");
    const defaults = new Map(
      pets?.args?.map((a): [string, string | null | undefined] => [
        a.name,
        a.defaultValue,
      ])
    );
    assert.strictEqual(defaults.get("first"), "10");
    assert.strictEqual(defaults.get("order"), "ASC");
    assert.deepStrictEqual(
      evaluateLiteral(defaults.get("filter") ?? ""),
      new Map([["species", ["dog"]]])
    );
  });

  it("should reject invalid SDL", () => {
    assert.throws(() => parseSchemaSource("type {", "sdl"), SchemaFormatError);
    assert.throws(
      () => parseSchemaSource("type Query { a: Missing }", "sdl"),
      SchemaFormatError
    );
  });
});

describe("detectFormat", () => {
  it("should pick SDL for GraphQL file extensions", () => {
    assert.strictEqual(detectFormat("schema.graphql"), "sdl");
    assert.strictEqual(detectFormat("api.GQL"), "sdl");
    assert.strictEqual(detectFormat("schema.json"), "json");
    assert.strictEqual(detectFormat(undefined), "json");
  });
});
