/**
 * Evaluates GraphQL value literals (as found in introspection `defaultValue`
 * strings) into plain values.
 */

import { GraphQLError, Kind, parseValue, ValueNode } from "graphql";

import { LiteralParseError } from "./errors.js";

/**
 * Object literals keep their written field order. Integers outside the safe
 * range evaluate to `bigint`.
 */
export type NativeValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | NativeValue[]
  | Map<string, NativeValue>;

/**
 * Parse a value literal such as `[1, 2]` or `{first: 10, order: ASC}`.
 * Enum values evaluate to their bare name.
 */
export function evaluateLiteral(text: string): NativeValue {
  let node: ValueNode;
  try {
    node = parseValue(text);
  } catch (err) {
    if (err instanceof GraphQLError) {
      throw new LiteralParseError(text, err.message, { cause: err });
    }
    throw err;
  }
  return evaluateNode(node, text);
}

function evaluateNode(node: ValueNode, text: string): NativeValue {
  switch (node.kind) {
    case Kind.INT: {
      const value = Number.parseInt(node.value, 10);
      return Number.isSafeInteger(value) ? value : BigInt(node.value);
    }
    case Kind.FLOAT:
      return Number.parseFloat(node.value);
    case Kind.STRING:
    case Kind.ENUM:
      return node.value;
    case Kind.BOOLEAN:
      return node.value;
    case Kind.NULL:
      return null;
    case Kind.LIST:
      return node.values.map((value) => evaluateNode(value, text));
    case Kind.OBJECT: {
      const result = new Map<string, NativeValue>();
      for (const field of node.fields) {
        result.set(field.name.value, evaluateNode(field.value, text));
      }
      return result;
    }
    case Kind.VARIABLE:
      throw new LiteralParseError(
        text,
        `variable $${node.name.value} is not a constant value`
      );
  }
}
