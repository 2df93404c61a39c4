/**
 * Resolves field and argument type references against what has been
 * declared so far.
 */

import { ConsistencyError } from "./errors.js";
import { describeTypeRef, TypeRef } from "./schema-model.js";

export type TypeReference =
  | { kind: "nonNull"; ofType: TypeReference }
  | { kind: "list"; ofType: TypeReference }
  | { kind: "resolved"; name: string } // declared earlier, refer to it directly
  | { kind: "forward"; name: string }; // resolved lazily by the runtime

/** The names declared so far in one generation run. Append-only. */
export class EmissionState {
  private readonly emitted = new Set<string>();

  markEmitted(name: string): void {
    if (this.emitted.has(name)) {
      throw new ConsistencyError(`type ${name} declared twice`);
    }
    this.emitted.add(name);
  }

  has(name: string): boolean {
    return this.emitted.has(name);
  }

  names(): string[] {
    return [...this.emitted];
  }
}

/**
 * A named type is referenced directly only when it was already declared and
 * no field of the current declaration is spelled the same way; otherwise the
 * reference is forward and the runtime looks the name up on first use.
 */
export function resolveTypeRef(
  typeRef: TypeRef,
  state: EmissionState,
  siblings: ReadonlySet<string>
): TypeReference {
  if (typeRef.kind === "NON_NULL" || typeRef.kind === "LIST") {
    if (!typeRef.ofType) {
      throw new ConsistencyError(
        `${typeRef.kind} reference without ofType: ${describeTypeRef(typeRef)}`
      );
    }
    const ofType = resolveTypeRef(typeRef.ofType, state, siblings);
    return typeRef.kind === "NON_NULL"
      ? { kind: "nonNull", ofType }
      : { kind: "list", ofType };
  }

  const name = typeRef.name;
  if (!name) {
    throw new ConsistencyError(`${typeRef.kind} reference without a name`);
  }
  if (state.has(name) && !siblings.has(name)) {
    return { kind: "resolved", name };
  }
  return { kind: "forward", name };
}
