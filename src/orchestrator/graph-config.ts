// ---------------------------------------------------------------------------
// Orchestrator – Graph description files (YAML or JSON)
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import { Type } from "@sinclair/typebox";
import { parse as parseYaml } from "yaml";
import { checkValue } from "../schema/typebox.js";
import type { GraphDescription } from "./types.js";

const NODE_ID = "^[A-Za-z0-9_-]+$";
const MAPPING_SOURCE = "^[A-Za-z0-9_-]+(\\.[A-Za-z0-9_-]+)*$";

export const GraphDescriptionSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  description: Type.Optional(Type.String()),
  nodes: Type.Array(
    Type.Object({
      id: Type.String({ pattern: NODE_ID }),
      unit: Type.String({ minLength: 1 }),
      config: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
      inputs: Type.Optional(Type.Record(Type.String(), Type.String({ pattern: MAPPING_SOURCE }))),
      timeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),
      cache: Type.Optional(Type.Boolean()),
    }),
  ),
});

export class GraphConfigError extends Error {
  readonly kind = "graphConfig" as const;
  readonly source: string;
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid graph description ${source}: ${issues.join("; ")}`);
    this.name = "GraphConfigError";
    this.source = source;
    this.issues = issues;
  }
}

/** Validate an already-parsed graph description. */
export function toGraphDescription(value: unknown, source = "<inline>"): GraphDescription {
  const checked = checkValue(GraphDescriptionSchema, value);
  if (!checked.ok) {
    throw new GraphConfigError(source, checked.issues);
  }
  return checked.value;
}

/** Parse YAML (a superset of JSON) text into a validated graph description. */
export function parseGraphDescription(text: string, source = "<inline>"): GraphDescription {
  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (err) {
    throw new GraphConfigError(source, [err instanceof Error ? err.message : String(err)]);
  }
  return toGraphDescription(parsed, source);
}

export async function loadGraphDescription(filePath: string): Promise<GraphDescription> {
  const text = await fs.readFile(filePath, "utf-8");
  return parseGraphDescription(text, filePath);
}
