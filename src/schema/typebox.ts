import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export type SchemaCheck<T> = { ok: true; value: T } | { ok: false; issues: string[] };

/**
 * Apply schema defaults to a copy of `value`, then check it. On failure every
 * violated constraint is reported, formatted as `"<path>: <message>"`.
 */
export function checkValue<T extends TSchema>(schema: T, value: unknown): SchemaCheck<Static<T>> {
  const candidate = Value.Default(schema, Value.Clone(value));
  if (Value.Check(schema, candidate)) {
    return { ok: true, value: candidate };
  }
  const issues = [...Value.Errors(schema, candidate)].map(
    (err) => `${err.path === "" ? "/" : err.path}: ${err.message}`,
  );
  return { ok: false, issues };
}

/** Union of string literals, e.g. from an `as const` array. */
export function literalUnion<const T extends string>(values: readonly T[]) {
  return Type.Union(values.map((value) => Type.Literal(value)));
}
