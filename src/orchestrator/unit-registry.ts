// ---------------------------------------------------------------------------
// Orchestrator – Unit Registry
// ---------------------------------------------------------------------------
// Maps implementation references used in graph descriptions (e.g.
// "scouting") to unit factories. Populated explicitly at startup; adding a
// unit never touches the engine.
// ---------------------------------------------------------------------------

import type { Static, TSchema } from "@sinclair/typebox";
import { checkValue } from "../schema/typebox.js";
import type { AnyUnit } from "../units/unit.js";
import { GraphError } from "./resolver.js";
import type { UnitNode } from "./types.js";

// ===========================================================================
// DEFINITIONS
// ===========================================================================

export interface UnitDefinition<D, C extends TSchema = TSchema> {
  ref: string;
  label: string;
  description: string;
  /** Static node configuration accepted by `create` (defaults applied). */
  configSchema: C;
  create(config: Static<C>, deps: D): AnyUnit;
}

export type UnitMetadata = {
  ref: string;
  label: string;
  description: string;
  configSchema: TSchema;
};

// ===========================================================================
// UNIT REGISTRY
// ===========================================================================

export class UnitRegistry<D> {
  private readonly defs = new Map<string, UnitDefinition<D>>();

  /** Add a definition. Throws on a reference that is already taken. */
  register<C extends TSchema>(def: UnitDefinition<D, C>): void {
    if (this.defs.has(def.ref)) {
      throw new Error(`Unit "${def.ref}" is already registered`);
    }
    this.defs.set(def.ref, def);
  }

  get(ref: string): UnitDefinition<D> | undefined {
    return this.defs.get(ref);
  }

  has(ref: string): boolean {
    return this.defs.has(ref);
  }

  list(): UnitMetadata[] {
    return [...this.defs.values()].map(({ ref, label, description, configSchema }) => ({
      ref,
      label,
      description,
      configSchema,
    }));
  }

  // -------------------------------------------------------------------------
  // instantiate
  // -------------------------------------------------------------------------

  /**
   * Build one unit instance per node. Throws `GraphError` (`unknownUnit` or
   * `invalidConfig`) before anything is created for a bad node.
   */
  instantiate(nodes: readonly UnitNode[], deps: D): Map<string, AnyUnit> {
    const planned: Array<{ node: UnitNode; def: UnitDefinition<D>; config: unknown }> = [];
    for (const node of nodes) {
      const def = this.defs.get(node.unit);
      if (!def) {
        throw new GraphError(
          "unknownUnit",
          `Unit "${node.id}" references unregistered implementation "${node.unit}"`,
          { nodeId: node.id },
        );
      }
      const checked = checkValue(def.configSchema, node.config ?? {});
      if (!checked.ok) {
        throw new GraphError(
          "invalidConfig",
          `Invalid config for "${node.id}": ${checked.issues.join("; ")}`,
          { nodeId: node.id },
        );
      }
      planned.push({ node, def, config: checked.value });
    }

    const units = new Map<string, AnyUnit>();
    for (const { node, def, config } of planned) {
      units.set(node.id, def.create(config, deps));
    }
    return units;
  }
}
