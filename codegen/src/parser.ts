/**
 * Schema source parser using the `graphql` npm package.
 * Turns introspection JSON or SDL text into a SchemaModel for code generation.
 */

import { buildSchema, introspectionFromSchema } from "graphql";

import { SchemaFormatError } from "./errors.js";
import { loadSchema, SchemaModel } from "./schema-model.js";

export type SchemaFormat = "json" | "sdl";

const SDL_EXTENSIONS = [".graphql", ".graphqls", ".gql"];

/** Guess the source format from a file name; stdin is always JSON. */
export function detectFormat(fileName: string | undefined): SchemaFormat {
  if (!fileName) return "json";
  const lower = fileName.toLowerCase();
  return SDL_EXTENSIONS.some((ext) => lower.endsWith(ext)) ? "sdl" : "json";
}

/**
 * Parse a schema source string into a SchemaModel.
 */
export function parseSchemaSource(
  source: string,
  format: SchemaFormat
): SchemaModel {
  if (format === "sdl") {
    return loadSchema(introspectSdl(source));
  }

  let document: unknown;
  try {
    document = JSON.parse(source);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SchemaFormatError(`schema is not valid JSON: ${reason}`, {
      cause: err,
    });
  }
  return loadSchema(document);
}

/** Run the introspection query against an SDL schema, without a server. */
function introspectSdl(source: string): unknown {
  try {
    return introspectionFromSchema(buildSchema(source));
  } catch (err) {
    // syntax errors are GraphQLErrors, validation failures plain Errors
    if (err instanceof Error) {
      throw new SchemaFormatError(`invalid SDL schema: ${err.message}`, {
        cause: err,
      });
    }
    throw err;
  }
}
