/**
 * Error types raised by the generation pipeline.
 * None of them are recoverable: the CLI reports the message and exits.
 */

export class CodegenError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The input is not an introspection document in any recognized shape. */
export class SchemaFormatError extends CodegenError {}

/** A default-value literal does not parse as a constant GraphQL value. */
export class LiteralParseError extends CodegenError {
  readonly literal: string;

  constructor(literal: string, message: string, options?: { cause?: unknown }) {
    super(`Cannot parse literal ${JSON.stringify(literal)}: ${message}`, options);
    this.literal = literal;
  }
}

/** An internal invariant does not hold (malformed schema or generator bug). */
export class ConsistencyError extends CodegenError {}
