/**
 * TypeScript code emitter.
 * Renders a GenerationPlan as a module of class declarations built on the
 * client type runtime (`t.Type`, `t.Interface`, `t.Input`, ...).
 *
 * Types that are not declared yet are referenced by their GraphQL name as a
 * string; the runtime resolves those through the schema on first use.
 */

import {
  Base,
  buildDeclarations,
  Capability,
  Declaration,
  DefaultValue,
  FieldDeclaration,
  GenerationPlan,
} from "../declarations.js";
import { ConsistencyError } from "../errors.js";
import { NativeValue } from "../literal.js";
import { toIdentifier } from "../naming.js";
import { TypeReference } from "../references.js";
import { SchemaModel } from "../schema-model.js";

export interface TypeScriptEmitterOptions {
  schemaName: string;
  runtimeModule?: string; // defaults to DEFAULT_RUNTIME_MODULE
}

export const DEFAULT_RUNTIME_MODULE = "gql-schema-runtime";

/** Bindings the generated module declares besides the schema's types. */
export const MODULE_BINDINGS: ReadonlySet<string> = new Set([
  "t",
  "datetime",
  "relay",
]);

const CAPABILITY_BASES: Record<Capability, string> = {
  object: "t.Type",
  interface: "t.Interface",
  input: "t.Input",
  connection: "relay.Connection",
};

const BANNER_BAR = "/".repeat(72);

/**
 * Generate a complete TypeScript module for a schema model.
 * The result is returned as a whole so callers write nothing on failure.
 */
export function emitTypeScript(
  schema: SchemaModel,
  options: TypeScriptEmitterOptions
): string {
  const schemaName = toIdentifier(options.schemaName, MODULE_BINDINGS);
  const plan = buildDeclarations(schema, {
    schemaName,
    reservedNames: MODULE_BINDINGS,
  });
  return renderPlan(plan, options.runtimeModule ?? DEFAULT_RUNTIME_MODULE);
}

/** Render an already built plan. */
export function renderPlan(plan: GenerationPlan, runtimeModule: string): string {
  const lines: string[] = [];
  const s = plan.schemaName;

  lines.push(`import * as t from ${JSON.stringify(runtimeModule)};`);
  if (plan.usesDateTime) {
    lines.push(
      `import * as datetime from ${JSON.stringify(`${runtimeModule}/datetime`)};`
    );
  }
  if (plan.usesPagination) {
    lines.push(
      `import * as relay from ${JSON.stringify(`${runtimeModule}/relay`)};`
    );
  }
  lines.push("");
  lines.push(`export const ${s} = new t.Schema();`);
  lines.push("");

  if (plan.usesPagination) {
    lines.push("// Unexport Node/PageInfo, let schema re-declare them");
    lines.push(`${s}.unexport(relay.Node);`);
    lines.push(`${s}.unexport(relay.PageInfo);`);
    lines.push("");
  }

  for (const section of plan.sections) {
    lines.push(...banner(section.title));
    for (const declaration of section.declarations) {
      lines.push(...renderDeclaration(declaration, plan));
      lines.push("");
    }
  }

  lines.push(...banner("Schema Entry Points"));
  const { query, mutation, subscription } = plan.entryPoints;
  lines.push(`${s}.queryType = ${entryPoint(query, plan)};`);
  lines.push(`${s}.mutationType = ${entryPoint(mutation, plan)};`);
  lines.push(`${s}.subscriptionType = ${entryPoint(subscription, plan)};`);
  lines.push("");

  return lines.join("\n");
}

function banner(title: string): string[] {
  return ["", BANNER_BAR, `// ${title}`, BANNER_BAR, ""];
}

function entryPoint(name: string | null, plan: GenerationPlan): string {
  return name === null ? "null" : identifierOf(name, plan);
}

function identifierOf(name: string, plan: GenerationPlan): string {
  const identifier = plan.identifiers.get(name);
  if (identifier === undefined) {
    throw new ConsistencyError(`no identifier was assigned to ${name}`);
  }
  return identifier;
}

function renderDeclaration(
  declaration: Declaration,
  plan: GenerationPlan
): string[] {
  const id = declaration.identifier;
  const schemaLine = `  static readonly schema = ${plan.schemaName};`;

  switch (declaration.kind) {
    case "builtinScalar":
      return [`export const ${id} = t.${declaration.name};`];
    case "dateTimeScalar":
      return [`export const ${id} = datetime.${declaration.name};`];
    case "scalar":
      return [`export class ${id} extends t.Scalar {`, schemaLine, "}"];
    case "enum":
      return [
        `export class ${id} extends t.Enum {`,
        schemaLine,
        `  static readonly choices = ${stringTuple(declaration.choices)};`,
        "}",
      ];
    case "union":
      return [
        `export class ${id} extends t.Union {`,
        schemaLine,
        `  static readonly types = [${declaration.members
          .map((member) => identifierOf(member, plan))
          .join(", ")}] as const;`,
        "}",
      ];
    case "container": {
      const lines = [
        `export class ${id} extends ${renderBases(declaration.bases, plan)} {`,
        schemaLine,
        `  static readonly fieldNames = ${stringTuple(
          declaration.fields.map((f) => f.name)
        )};`,
      ];
      if (declaration.fields.length === 0) {
        lines.push("  static readonly fields = {};");
      } else {
        lines.push("  static readonly fields = {");
        for (const field of declaration.fields) {
          lines.push(...renderField(field, plan));
        }
        lines.push("  };");
      }
      lines.push("}");
      return lines;
    }
  }
}

function renderBases(bases: Base[], plan: GenerationPlan): string {
  const rendered = bases.map((base) =>
    base.kind === "capability"
      ? CAPABILITY_BASES[base.capability]
      : identifierOf(base.name, plan)
  );
  if (rendered.length === 1) return rendered[0];
  return `t.implement(${rendered.join(", ")})`;
}

function renderField(field: FieldDeclaration, plan: GenerationPlan): string[] {
  const type = renderTypeReference(field.type, plan);
  const graphqlName = `graphqlName: ${JSON.stringify(field.name)}`;
  if (field.args.length === 0) {
    return [`    ${renderKey(field.name)}: t.field(${type}, { ${graphqlName} }),`];
  }

  const lines = [
    `    ${renderKey(field.name)}: t.field(${type}, {`,
    `      ${graphqlName},`,
    "      args: t.argDict({",
  ];
  for (const arg of field.args) {
    const options = [`graphqlName: ${JSON.stringify(arg.name)}`];
    const defaultValue = renderDefault(arg.defaultValue);
    if (defaultValue !== null) {
      options.push(`default: ${defaultValue}`);
    }
    lines.push(
      `        ${renderKey(arg.name)}: t.arg(${renderTypeReference(arg.type, plan)}, { ${options.join(", ")} }),`
    );
  }
  lines.push("      }),");
  lines.push("    }),");
  return lines;
}

function renderDefault(defaultValue: DefaultValue): string | null {
  switch (defaultValue.kind) {
    case "none":
      return null;
    case "variable":
      return `t.variable(${JSON.stringify(defaultValue.name)})`;
    case "value":
      return renderNativeValue(defaultValue.value);
  }
}

/** Render a reference: wrappers nest, forward references are quoted names. */
export function renderTypeReference(
  reference: TypeReference,
  plan: GenerationPlan
): string {
  switch (reference.kind) {
    case "nonNull":
      return `t.nonNull(${renderTypeReference(reference.ofType, plan)})`;
    case "list":
      return `t.listOf(${renderTypeReference(reference.ofType, plan)})`;
    case "resolved":
      return identifierOf(reference.name, plan);
    case "forward":
      return JSON.stringify(reference.name);
  }
}

/** Render an evaluated literal as a TypeScript expression. */
export function renderNativeValue(value: NativeValue): string {
  if (value === null) return "null";
  if (Array.isArray(value)) {
    return `[${value.map(renderNativeValue).join(", ")}]`;
  }
  if (value instanceof Map) {
    if (value.size === 0) return "{}";
    const entries = [...value].map(
      ([key, item]) => `${renderKey(key)}: ${renderNativeValue(item)}`
    );
    return `{ ${entries.join(", ")} }`;
  }
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value}n`;
  return String(value);
}

function renderKey(key: string): string {
  // a literal __proto__ key would set the prototype instead
  if (key === "__proto__") return `["__proto__"]`;
  return /^[A-Za-z_$][A-Za-z0-9_$]*$/.test(key) ? key : JSON.stringify(key);
}

function stringTuple(values: string[]): string {
  return `[${values.map((v) => JSON.stringify(v)).join(", ")}] as const`;
}
