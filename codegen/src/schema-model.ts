/**
 * Internal model of an introspection schema.
 * Built once from the raw document and read-only afterwards.
 */

import { z } from "zod";

import { SchemaFormatError } from "./errors.js";

export type TypeKind =
  | "SCALAR"
  | "OBJECT"
  | "INTERFACE"
  | "UNION"
  | "ENUM"
  | "INPUT_OBJECT"
  | "LIST"
  | "NON_NULL";

/** A possibly wrapped type reference, as found on fields and arguments. */
export interface TypeRef {
  kind: TypeKind;
  name?: string | null; // null for LIST and NON_NULL
  ofType?: TypeRef | null; // for LIST and NON_NULL
}

const typeKindSchema = z.enum([
  "SCALAR",
  "OBJECT",
  "INTERFACE",
  "UNION",
  "ENUM",
  "INPUT_OBJECT",
  "LIST",
  "NON_NULL",
]);

const typeRefSchema: z.ZodType<TypeRef> = z.lazy(() =>
  z.object({
    kind: typeKindSchema,
    name: z.string().nullish(),
    ofType: typeRefSchema.nullish(),
  })
);

const namedRefSchema = z.object({ name: z.string() });

const inputValueSchema = z.object({
  name: z.string(),
  type: typeRefSchema,
  defaultValue: z.string().nullish(),
});

const fieldSchema = z.object({
  name: z.string(),
  type: typeRefSchema,
  args: z.array(inputValueSchema).nullish(),
});

const introspectionTypeSchema = z.object({
  kind: typeKindSchema,
  name: z.string(),
  fields: z.array(fieldSchema).nullish(),
  inputFields: z.array(inputValueSchema).nullish(),
  interfaces: z.array(namedRefSchema).nullish(),
  possibleTypes: z.array(namedRefSchema).nullish(),
  enumValues: z.array(namedRefSchema).nullish(),
});

const directiveSchema = z.object({
  name: z.string(),
  locations: z.array(z.string()).nullish(),
  args: z.array(inputValueSchema).nullish(),
});

const introspectionSchema = z.object({
  queryType: namedRefSchema.nullish(),
  mutationType: namedRefSchema.nullish(),
  subscriptionType: namedRefSchema.nullish(),
  types: z.array(introspectionTypeSchema),
  directives: z.array(directiveSchema).nullish(),
});

export type InputValue = z.infer<typeof inputValueSchema>;
export type FieldDefinition = z.infer<typeof fieldSchema>;
export type IntrospectionType = z.infer<typeof introspectionTypeSchema>;
export type DirectiveDefinition = z.infer<typeof directiveSchema>;

export interface SchemaModel {
  readonly types: readonly IntrospectionType[]; // sorted by name
  readonly typesByName: ReadonlyMap<string, IntrospectionType>;
  readonly queryType: string | null;
  readonly mutationType: string | null;
  readonly subscriptionType: string | null;
  readonly directives: readonly DirectiveDefinition[];
  readonly usesDateTime: boolean;
  readonly usesPagination: boolean;
}

export const BUILTIN_SCALARS: ReadonlySet<string> = new Set([
  "Int",
  "Float",
  "String",
  "Boolean",
  "ID",
]);

export const DATETIME_SCALARS: ReadonlySet<string> = new Set([
  "DateTime",
  "Date",
  "Time",
]);

/** Types whose presence means the schema follows the Relay connection conventions. */
export const PAGINATION_TYPES: ReadonlySet<string> = new Set([
  "Node",
  "PageInfo",
]);

/**
 * Build a SchemaModel from a parsed JSON document.
 *
 * Accepts the bare introspection object, a query result
 * (`{ data: { __schema } }`) or the `__schema` field alone.
 */
export function loadSchema(document: unknown): SchemaModel {
  const inner = unwrapDocument(document);
  const parsed = introspectionSchema.safeParse(inner);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new SchemaFormatError(
      `invalid introspection schema (${problems.join("; ")})`
    );
  }
  const schema = parsed.data;

  const types = [...schema.types].sort((a, b) => compareNames(a.name, b.name));
  const typesByName = new Map(types.map((t) => [t.name, t]));

  return {
    types,
    typesByName,
    queryType: schema.queryType?.name ?? null,
    mutationType: schema.mutationType?.name ?? null,
    subscriptionType: schema.subscriptionType?.name ?? null,
    directives: schema.directives ?? [],
    usesDateTime: types.some((t) => DATETIME_SCALARS.has(t.name)),
    usesPagination: types.some((t) => PAGINATION_TYPES.has(t.name)),
  };
}

function unwrapDocument(document: unknown): unknown {
  if (!isRecord(document)) {
    throw new SchemaFormatError("schema must be a JSON object");
  }
  if (Array.isArray(document.types) && document.types.length > 0) {
    return document;
  }
  if (isRecord(document.data) && isRecord(document.data.__schema)) {
    return document.data.__schema; // plain HTTP endpoint result
  }
  if (isRecord(document.__schema)) {
    return document.__schema; // introspection field
  }
  throw new SchemaFormatError(
    "schema must be introspection object or query result"
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Code-unit order, independent of the host locale */
function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Check if a reference kind only wraps another type */
export function isWrapper(typeRef: TypeRef): boolean {
  return typeRef.kind === "LIST" || typeRef.kind === "NON_NULL";
}

/** Get the innermost named type of a reference */
export function getNamedType(typeRef: TypeRef): string | null {
  if (isWrapper(typeRef)) {
    return typeRef.ofType ? getNamedType(typeRef.ofType) : null;
  }
  return typeRef.name ?? null;
}

/** Render a reference in GraphQL notation, e.g. `[String!]!` */
export function describeTypeRef(typeRef: TypeRef): string {
  switch (typeRef.kind) {
    case "NON_NULL":
      return `${typeRef.ofType ? describeTypeRef(typeRef.ofType) : "?"}!`;
    case "LIST":
      return `[${typeRef.ofType ? describeTypeRef(typeRef.ofType) : "?"}]`;
    default:
      return typeRef.name ?? "?";
  }
}

/** Helper to create a non-null type ref */
export function nonNull(inner: TypeRef): TypeRef {
  return { kind: "NON_NULL", name: null, ofType: inner };
}

/** Helper to create a list type ref */
export function listOf(inner: TypeRef): TypeRef {
  return { kind: "LIST", name: null, ofType: inner };
}

/** Helper to create a named type ref */
export function named(kind: TypeKind, name: string): TypeRef {
  return { kind, name, ofType: null };
}
