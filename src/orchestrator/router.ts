// ---------------------------------------------------------------------------
// Orchestrator – Input Router
// ---------------------------------------------------------------------------
// Builds a unit's input from the committed outputs of its producers
// according to the node's declared input mapping.
// ---------------------------------------------------------------------------

import type { UnitNode, UnitRunRecord } from "./types.js";
import { parseMappingSource } from "./resolver.js";

export class RoutingError extends Error {
  readonly kind = "routing" as const;
  readonly unitId: string;
  /** Producers whose output was missing or unsuccessful. */
  readonly producers: string[];

  constructor(unitId: string, producers: string[], message: string) {
    super(message);
    this.name = "RoutingError";
    this.unitId = unitId;
    this.producers = producers;
  }
}

export function isRootNode(node: UnitNode): boolean {
  return Object.keys(node.inputs ?? {}).length === 0;
}

function readPath(value: unknown, path: string[]): { found: boolean; value: unknown } {
  let current: unknown = value;
  for (const seg of path) {
    if (current === null || typeof current !== "object" || !(seg in current)) {
      return { found: false, value: undefined };
    }
    current = Reflect.get(current, seg);
  }
  return { found: true, value: current };
}

/**
 * Route the input for `node`.
 *
 * - Root nodes receive `initialInput` unchanged.
 * - `{ field: "producer" }` passes the producer's whole output.
 * - `{ field: "producer.a.b" }` extracts `a.b` from the producer's output.
 *
 * Throws `RoutingError` when a producer has no successful output or the
 * referenced field does not exist.
 */
export function routeInput(
  node: UnitNode,
  results: ReadonlyMap<string, UnitRunRecord>,
  initialInput: unknown,
): unknown {
  if (isRootNode(node)) {
    return initialInput;
  }

  const input: Record<string, unknown> = {};
  const unavailable: string[] = [];

  for (const [field, source] of Object.entries(node.inputs ?? {})) {
    const { producerId, path } = parseMappingSource(source);
    const record = results.get(producerId);

    if (!record || record.status !== "succeeded") {
      if (!unavailable.includes(producerId)) {
        unavailable.push(producerId);
      }
      continue;
    }

    const resolved = readPath(record.output, path);
    if (!resolved.found) {
      throw new RoutingError(
        node.id,
        [producerId],
        `Output of "${producerId}" has no field "${path.join(".")}" (mapped to "${field}")`,
      );
    }
    input[field] = resolved.value;
  }

  if (unavailable.length > 0) {
    throw new RoutingError(
      node.id,
      unavailable,
      `No successful output from ${unavailable.map((id) => `"${id}"`).join(", ")}`,
    );
  }

  return input;
}
