/**
 * Builds the ordered list of declarations for a schema. This is the
 * target-independent part of generation; emitters only render the plan.
 */

import {
  classifyTypes,
  ClassifiedTypes,
  isSkipped,
} from "./classifier.js";
import { ConsistencyError } from "./errors.js";
import { evaluateLiteral, NativeValue } from "./literal.js";
import { NameRegistry } from "./naming.js";
import { EmissionState, resolveTypeRef, TypeReference } from "./references.js";
import {
  BUILTIN_SCALARS,
  DATETIME_SCALARS,
  InputValue,
  IntrospectionType,
  SchemaModel,
  TypeRef,
} from "./schema-model.js";

/** Base classes the target runtime provides for declared types. */
export type Capability = "object" | "interface" | "input" | "connection";

export type Base =
  | { kind: "capability"; capability: Capability }
  | { kind: "type"; name: string };

export type DefaultValue =
  | { kind: "none" }
  | { kind: "variable"; name: string }
  | { kind: "value"; value: NativeValue };

/** Argument and field names are rendered as object keys, so they keep their GraphQL name. */
export interface ArgumentDeclaration {
  name: string;
  type: TypeReference;
  defaultValue: DefaultValue;
}

export interface FieldDeclaration {
  name: string;
  type: TypeReference;
  args: ArgumentDeclaration[];
}

interface NamedDeclaration {
  name: string;
  identifier: string;
}

export type Declaration =
  | (NamedDeclaration & { kind: "builtinScalar" })
  | (NamedDeclaration & { kind: "dateTimeScalar" })
  | (NamedDeclaration & { kind: "scalar" })
  | (NamedDeclaration & { kind: "enum"; choices: string[] })
  | (NamedDeclaration & {
      kind: "container";
      containerKind: "object" | "interface" | "input";
      bases: Base[];
      fields: FieldDeclaration[];
    })
  | (NamedDeclaration & { kind: "union"; members: string[] });

export interface Section {
  title: string;
  declarations: Declaration[];
}

export interface EntryPoints {
  query: string | null;
  mutation: string | null;
  subscription: string | null;
}

export interface GenerationPlan {
  schemaName: string;
  usesDateTime: boolean;
  usesPagination: boolean;
  sections: Section[];
  entryPoints: EntryPoints;
  /** GraphQL type name to output identifier, for every declared type */
  identifiers: ReadonlyMap<string, string>;
}

export interface PlanOptions {
  schemaName: string;
  /** Module-level names the emitter uses itself; types may not take them */
  reservedNames?: Iterable<string>;
}

/** Output fields and input fields; only the former take arguments. */
interface FieldLike {
  name: string;
  type: TypeRef;
  args?: InputValue[] | null;
}

interface BuildContext {
  model: SchemaModel;
  state: EmissionState;
  typeNames: NameRegistry;
  identifiers: Map<string, string>;
}

export const SECTION_TITLES = [
  "Scalars and Enumerations",
  "Input Objects",
  "Output Objects and Interfaces",
  "Unions",
] as const;

/**
 * Classify and order the schema's types, then describe each declaration
 * with its references resolved against the declarations before it.
 */
export function buildDeclarations(
  model: SchemaModel,
  options: PlanOptions
): GenerationPlan {
  const reserved = new Set(options.reservedNames ?? []);
  reserved.add(options.schemaName);

  const ctx: BuildContext = {
    model,
    state: new EmissionState(),
    typeNames: new NameRegistry("types", reserved),
    identifiers: new Map(),
  };

  const classified: ClassifiedTypes = classifyTypes(model.types);
  const phases: IntrospectionType[][] = [
    classified.scalarsAndEnums,
    classified.inputObjects,
    classified.outputTypes,
    classified.unions,
  ];

  const sections = phases.map((types, i) => ({
    title: SECTION_TITLES[i],
    declarations: types
      .filter((t) => !isSkipped(t))
      .map((t) => declare(ctx, t)),
  }));

  return {
    schemaName: options.schemaName,
    usesDateTime: model.usesDateTime,
    usesPagination: model.usesPagination,
    sections,
    entryPoints: {
      query: entryPoint(ctx, model.queryType),
      mutation: entryPoint(ctx, model.mutationType),
      subscription: entryPoint(ctx, model.subscriptionType),
    },
    identifiers: ctx.identifiers,
  };
}

function entryPoint(ctx: BuildContext, name: string | null): string | null {
  if (name === null) return null;
  if (!ctx.state.has(name)) {
    throw new ConsistencyError(`root type ${name} is not declared`);
  }
  return name;
}

function declare(ctx: BuildContext, t: IntrospectionType): Declaration {
  const identifier = ctx.typeNames.claim(t.name);
  const declaration = describe(ctx, t, identifier);
  ctx.state.markEmitted(t.name);
  ctx.identifiers.set(t.name, identifier);
  return declaration;
}

function describe(
  ctx: BuildContext,
  t: IntrospectionType,
  identifier: string
): Declaration {
  const name = t.name;
  switch (t.kind) {
    case "SCALAR":
      if (BUILTIN_SCALARS.has(name)) {
        return { kind: "builtinScalar", name, identifier };
      }
      if (DATETIME_SCALARS.has(name)) {
        return { kind: "dateTimeScalar", name, identifier };
      }
      return { kind: "scalar", name, identifier };
    case "ENUM":
      return {
        kind: "enum",
        name,
        identifier,
        choices: (t.enumValues ?? []).map((v) => v.name),
      };
    case "INPUT_OBJECT":
      return {
        kind: "container",
        containerKind: "input",
        name,
        identifier,
        bases: [{ kind: "capability", capability: "input" }],
        fields: describeFields(ctx, t.inputFields ?? []),
      };
    case "INTERFACE":
      return {
        kind: "container",
        containerKind: "interface",
        name,
        identifier,
        bases: [{ kind: "capability", capability: "interface" }],
        fields: describeFields(ctx, t.fields ?? []),
      };
    case "OBJECT":
      return describeObject(ctx, t, identifier);
    case "UNION":
      return {
        kind: "union",
        name,
        identifier,
        members: (t.possibleTypes ?? []).map((member) => {
          if (!ctx.state.has(member.name)) {
            throw new ConsistencyError(
              `union ${name} member ${member.name} is not declared`
            );
          }
          return member.name;
        }),
      };
    default:
      throw new ConsistencyError(`cannot declare ${name} of kind ${t.kind}`);
  }
}

function describeObject(
  ctx: BuildContext,
  t: IntrospectionType,
  identifier: string
): Declaration {
  const capability: Capability =
    ctx.model.usesPagination && t.name.endsWith("Connection")
      ? "connection"
      : "object";
  const bases: Base[] = [{ kind: "capability", capability }];

  const inherited = new Set<string>();
  for (const iface of t.interfaces ?? []) {
    if (!ctx.state.has(iface.name)) {
      throw new ConsistencyError(
        `${t.name} implements ${iface.name}, which is not declared before it`
      );
    }
    bases.push({ kind: "type", name: iface.name });
    for (const field of ctx.model.typesByName.get(iface.name)?.fields ?? []) {
      inherited.add(field.name);
    }
  }

  const ownFields = (t.fields ?? []).filter((f) => !inherited.has(f.name));
  return {
    kind: "container",
    containerKind: "object",
    name: t.name,
    identifier,
    bases,
    fields: describeFields(ctx, ownFields),
  };
}

function describeFields(
  ctx: BuildContext,
  fields: readonly FieldLike[]
): FieldDeclaration[] {
  const siblings = new Set(fields.map((f) => f.name));
  return fields.map((field) => {
    const args = field.args ?? [];
    return {
      name: field.name,
      type: resolveTypeRef(field.type, ctx.state, siblings),
      args: args.map((arg) => ({
        name: arg.name,
        type: resolveTypeRef(arg.type, ctx.state, siblings),
        defaultValue: describeDefault(arg.defaultValue),
      })),
    };
  });
}

function describeDefault(raw: string | null | undefined): DefaultValue {
  if (!raw) return { kind: "none" };
  if (raw.startsWith("$")) return { kind: "variable", name: raw.slice(1) };
  return { kind: "value", value: evaluateLiteral(raw) };
}
