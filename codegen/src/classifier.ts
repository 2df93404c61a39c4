/**
 * Splits schema types into the four emission phases and orders the output
 * objects and interfaces so every interface precedes its implementors.
 */

import { ConsistencyError } from "./errors.js";
import { IntrospectionType, TypeKind } from "./schema-model.js";

export const BUILTIN_ENUM_NAMES: ReadonlySet<string> = new Set([
  "__TypeKind",
  "__DirectiveLocation",
]);

export const BUILTIN_OBJECT_NAMES: ReadonlySet<string> = new Set([
  "__Schema",
  "__Type",
  "__Field",
  "__Directive",
  "__EnumValue",
  "__InputValue",
]);

export interface ClassifiedTypes {
  scalarsAndEnums: IntrospectionType[];
  inputObjects: IntrospectionType[];
  outputTypes: IntrospectionType[]; // already in dependency order
  unions: IntrospectionType[];
}

/** Whether a claimed type is left out of the output entirely. */
export function isSkipped(type: IntrospectionType): boolean {
  return (
    (type.kind === "ENUM" && BUILTIN_ENUM_NAMES.has(type.name)) ||
    (type.kind === "OBJECT" && BUILTIN_OBJECT_NAMES.has(type.name))
  );
}

/**
 * Each phase claims its kinds from what the previous phase left over;
 * anything unclaimed at the end is an error.
 */
export function classifyTypes(
  types: readonly IntrospectionType[]
): ClassifiedTypes {
  const [scalarsAndEnums, afterBasic] = claim(types, ["SCALAR", "ENUM"]);
  const [inputObjects, afterInputs] = claim(afterBasic, ["INPUT_OBJECT"]);
  const [outputTypes, afterOutputs] = claim(afterInputs, [
    "OBJECT",
    "INTERFACE",
  ]);
  const [unions, remaining] = claim(afterOutputs, ["UNION"]);

  if (remaining.length > 0) {
    const names = remaining.map((t) => `${t.name} (${t.kind})`).join(", ");
    throw new ConsistencyError(`types not claimed by any phase: ${names}`);
  }

  return {
    scalarsAndEnums,
    inputObjects,
    outputTypes: orderOutputTypes(outputTypes),
    unions,
  };
}

function claim(
  types: readonly IntrospectionType[],
  kinds: TypeKind[]
): [IntrospectionType[], IntrospectionType[]] {
  const claimed: IntrospectionType[] = [];
  const remaining: IntrospectionType[] = [];
  for (const t of types) {
    (kinds.includes(t.kind) ? claimed : remaining).push(t);
  }
  return [claimed, remaining];
}

/**
 * Stable topological sort over the "implements" edges. Among types that
 * are ready, the ones without interfaces go first, then input order.
 * Interfaces that are not part of `types` impose no ordering here.
 */
export function orderOutputTypes(
  types: readonly IntrospectionType[]
): IntrospectionType[] {
  const indexByName = new Map(types.map((t, i) => [t.name, i]));
  const dependents: number[][] = types.map(() => []);
  const pending: number[] = types.map(() => 0);

  types.forEach((t, i) => {
    const seen = new Set<number>();
    for (const iface of t.interfaces ?? []) {
      const dep = indexByName.get(iface.name);
      if (dep === undefined || seen.has(dep)) continue;
      if (dep === i) {
        throw new ConsistencyError(`${t.name} implements itself`);
      }
      seen.add(dep);
      dependents[dep].push(i);
      pending[i]++;
    }
  });

  const rank = (i: number): [number, number] => [
    (types[i].interfaces ?? []).length > 0 ? 1 : 0,
    i,
  ];
  const before = (a: number, b: number): boolean => {
    const [ra, ia] = rank(a);
    const [rb, ib] = rank(b);
    return ra !== rb ? ra < rb : ia < ib;
  };

  const ready = types.map((_, i) => i).filter((i) => pending[i] === 0);
  const order: IntrospectionType[] = [];

  while (ready.length > 0) {
    let best = 0;
    for (let k = 1; k < ready.length; k++) {
      if (before(ready[k], ready[best])) best = k;
    }
    const [next] = ready.splice(best, 1);
    order.push(types[next]);
    for (const dependent of dependents[next]) {
      pending[dependent]--;
      if (pending[dependent] === 0) ready.push(dependent);
    }
  }

  if (order.length < types.length) {
    const stuck = types
      .filter((_, i) => pending[i] > 0)
      .map((t) => t.name)
      .join(", ");
    throw new ConsistencyError(`cyclic interface implementation among: ${stuck}`);
  }

  return order;
}
