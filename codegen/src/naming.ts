/**
 * Output identifier helpers.
 */

import * as path from "node:path";

import { ConsistencyError } from "./errors.js";

// Words that cannot name a class or const binding in a strict-mode module.
const RESERVED_WORDS: ReadonlySet<string> = new Set([
  "arguments", "await", "break", "case", "catch", "class", "const",
  "continue", "debugger", "default", "delete", "do", "else", "enum", "eval",
  "export", "extends", "false", "finally", "for", "function", "if",
  "implements", "import", "in", "instanceof", "interface", "let", "new",
  "null", "package", "private", "protected", "public", "return", "static",
  "super", "switch", "this", "throw", "true", "try", "typeof", "var", "void",
  "while", "with", "yield",
]);

/**
 * Map a GraphQL name to an output identifier. GraphQL names are already
 * valid identifiers character-wise, so only reserved words (and any extra
 * names the caller reserves) are changed, by appending `_`.
 */
export function toIdentifier(
  name: string,
  reserved: ReadonlySet<string> = RESERVED_WORDS
): string {
  if (RESERVED_WORDS.has(name) || reserved.has(name)) {
    return `${name}_`;
  }
  return name;
}

/**
 * Turn an arbitrary file-derived name into a valid identifier:
 * `my-schema.v2` becomes `my_schema_v2`, `2023 api` becomes `_2023_api`.
 */
export function cleanupSchemaName(name: string): string {
  let cleaned = name.replace(/[^A-Za-z0-9_]+/g, "_");
  cleaned = cleaned.replace(/^_+|_+$/g, "");
  if (/^[0-9]/.test(cleaned)) {
    cleaned = `_${cleaned}`;
  }
  return cleaned;
}

/**
 * Default schema name: the output file's basename, else the input file's,
 * else `generated_schema`. `undefined` stands for stdin/stdout.
 */
export function schemaNameFromPaths(
  outputPath: string | undefined,
  inputPath: string | undefined
): string {
  const source = outputPath ?? inputPath;
  if (!source) return "generated_schema";
  return path.basename(source, path.extname(source));
}

/**
 * Tracks which schema name claimed each identifier in one scope, so two
 * names that sanitize to the same identifier are reported instead of one
 * silently replacing the other.
 */
export class NameRegistry {
  private readonly owners = new Map<string, string>();

  constructor(
    private readonly scope: string,
    private readonly reserved: ReadonlySet<string> = new Set()
  ) {}

  claim(name: string): string {
    const identifier = toIdentifier(name, this.reserved);
    const owner = this.owners.get(identifier);
    if (owner !== undefined && owner !== name) {
      throw new ConsistencyError(
        `${this.scope}: "${owner}" and "${name}" both map to identifier "${identifier}"`
      );
    }
    this.owners.set(identifier, name);
    return identifier;
  }
}
