/**
 * Library entry point for programmatic use.
 *
 * Re-exports the pure functions from the codegen pipeline.
 */

export { parseSchemaSource, detectFormat } from "./parser.js";
export type { SchemaFormat } from "./parser.js";

export {
  emitTypeScript,
  renderPlan,
  renderTypeReference,
  renderNativeValue,
  DEFAULT_RUNTIME_MODULE,
  MODULE_BINDINGS,
} from "./emitters/typescript.js";
export type { TypeScriptEmitterOptions } from "./emitters/typescript.js";

export { buildDeclarations, SECTION_TITLES } from "./declarations.js";
export type {
  GenerationPlan,
  Section,
  Declaration,
  FieldDeclaration,
  ArgumentDeclaration,
  DefaultValue,
  Base,
  Capability,
  EntryPoints,
  PlanOptions,
} from "./declarations.js";

export {
  classifyTypes,
  orderOutputTypes,
  isSkipped,
  BUILTIN_ENUM_NAMES,
  BUILTIN_OBJECT_NAMES,
} from "./classifier.js";
export type { ClassifiedTypes } from "./classifier.js";

export { EmissionState, resolveTypeRef } from "./references.js";
export type { TypeReference } from "./references.js";

export { evaluateLiteral } from "./literal.js";
export type { NativeValue } from "./literal.js";

export {
  toIdentifier,
  cleanupSchemaName,
  schemaNameFromPaths,
  NameRegistry,
} from "./naming.js";

export {
  CodegenError,
  SchemaFormatError,
  LiteralParseError,
  ConsistencyError,
} from "./errors.js";

export type {
  SchemaModel,
  IntrospectionType,
  FieldDefinition,
  InputValue,
  DirectiveDefinition,
  TypeRef,
  TypeKind,
} from "./schema-model.js";

export {
  loadSchema,
  nonNull,
  listOf,
  named,
  isWrapper,
  getNamedType,
  describeTypeRef,
  BUILTIN_SCALARS,
  DATETIME_SCALARS,
  PAGINATION_TYPES,
} from "./schema-model.js";
