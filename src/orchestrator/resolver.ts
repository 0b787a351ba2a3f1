// ---------------------------------------------------------------------------
// Orchestrator – Graph Resolver
// ---------------------------------------------------------------------------
// Builds adjacency from declared input mappings, rejects dangling producers
// and cycles, and computes a layered topological order (Kahn's algorithm,
// one wave per layer, ties broken by declaration order).
// ---------------------------------------------------------------------------

import type { ExecutionPlan, UnitNode } from "./types.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export const GRAPH_ERROR_KINDS = [
  "cycle",
  "unknownProducer",
  "duplicateNode",
  "unknownUnit",
  "invalidConfig",
] as const;

export type GraphErrorKind = (typeof GRAPH_ERROR_KINDS)[number];

export class GraphError extends Error {
  readonly kind: GraphErrorKind;
  /** Offending cycle for `cycle`, closed (first id repeated at the end). */
  readonly path?: string[];
  readonly nodeId?: string;

  constructor(kind: GraphErrorKind, message: string, opts?: { path?: string[]; nodeId?: string }) {
    super(message);
    this.name = "GraphError";
    this.kind = kind;
    this.path = opts?.path;
    this.nodeId = opts?.nodeId;
  }
}

// ---------------------------------------------------------------------------
// Mapping sources
// ---------------------------------------------------------------------------

/**
 * Split `"producer.field.sub"` into the producer id and the field path.
 * A bare `"producer"` has an empty path (whole-output passthrough).
 */
export function parseMappingSource(source: string): { producerId: string; path: string[] } {
  const [producerId, ...path] = source.split(".");
  return { producerId: producerId ?? "", path: path.filter((seg) => seg.length > 0) };
}

// ---------------------------------------------------------------------------
// GraphResolver
// ---------------------------------------------------------------------------

export class GraphResolver {
  // -------------------------------------------------------------------------
  // dependenciesOf
  // -------------------------------------------------------------------------
  /** Unique producer ids a node reads from, in mapping declaration order. */
  static dependenciesOf(node: UnitNode): string[] {
    const seen = new Set<string>();
    for (const source of Object.values(node.inputs ?? {})) {
      seen.add(parseMappingSource(source).producerId);
    }
    return [...seen];
  }

  // -------------------------------------------------------------------------
  // dependentsOf
  // -------------------------------------------------------------------------
  /** Ids of nodes that read directly from `nodeId`. */
  static dependentsOf(nodeId: string, nodes: UnitNode[]): string[] {
    return nodes
      .filter((n) => GraphResolver.dependenciesOf(n).includes(nodeId))
      .map((n) => n.id);
  }

  // -------------------------------------------------------------------------
  // collectDownstream
  // -------------------------------------------------------------------------
  /** Every node that depends on `nodeId`, directly or transitively. */
  static collectDownstream(nodeId: string, nodes: UnitNode[]): Set<string> {
    const visited = new Set<string>();
    const queue = [nodeId];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) {
        break;
      }
      for (const child of GraphResolver.dependentsOf(current, nodes)) {
        if (!visited.has(child)) {
          visited.add(child);
          queue.push(child);
        }
      }
    }

    return visited;
  }

  // -------------------------------------------------------------------------
  // findCycle
  // -------------------------------------------------------------------------
  /**
   * Return one cycle in data-flow order (producer first, first id repeated
   * at the end), or `null` when the graph is acyclic. Dangling producer
   * references are ignored.
   */
  static findCycle(nodes: UnitNode[]): string[] | null {
    const deps = new Map<string, string[]>();
    for (const n of nodes) {
      deps.set(n.id, GraphResolver.dependenciesOf(n));
    }

    const state = new Map<string, "visiting" | "done">();
    const stack: string[] = [];

    const visit = (id: string): string[] | null => {
      state.set(id, "visiting");
      stack.push(id);
      for (const producer of deps.get(id) ?? []) {
        if (!deps.has(producer)) {
          continue;
        }
        const mark = state.get(producer);
        if (mark === "visiting") {
          // stack holds consumer → producer edges; reverse for data flow.
          const loop = stack.slice(stack.indexOf(producer));
          loop.push(producer);
          return loop.reverse();
        }
        if (mark === undefined) {
          const found = visit(producer);
          if (found) {
            return found;
          }
        }
      }
      stack.pop();
      state.set(id, "done");
      return null;
    };

    for (const n of nodes) {
      if (!state.has(n.id)) {
        const found = visit(n.id);
        if (found) {
          return found;
        }
      }
    }
    return null;
  }

  // -------------------------------------------------------------------------
  // resolve
  // -------------------------------------------------------------------------
  /**
   * Resolve `nodes` into an execution plan.
   * Throws `GraphError` for duplicate ids, unknown producers and cycles.
   */
  static resolve(nodes: UnitNode[]): ExecutionPlan {
    const position = new Map<string, number>();
    nodes.forEach((n, i) => {
      if (position.has(n.id)) {
        throw new GraphError("duplicateNode", `Duplicate unit id "${n.id}"`, { nodeId: n.id });
      }
      position.set(n.id, i);
    });

    const dependencies: Record<string, string[]> = {};
    const inDegree = new Map<string, number>();
    const dependents = new Map<string, string[]>();

    for (const n of nodes) {
      dependents.set(n.id, []);
    }

    for (const n of nodes) {
      const producers = GraphResolver.dependenciesOf(n);
      for (const producerId of producers) {
        const consumers = dependents.get(producerId);
        if (!consumers) {
          throw new GraphError(
            "unknownProducer",
            `Unit "${n.id}" reads from unknown producer "${producerId}"`,
            { nodeId: n.id },
          );
        }
        consumers.push(n.id);
      }
      dependencies[n.id] = producers;
      inDegree.set(n.id, producers.length);
    }

    const byDeclaration = (a: string, b: string) =>
      (position.get(a) ?? 0) - (position.get(b) ?? 0);

    const waves: string[][] = [];
    let current = nodes.filter((n) => inDegree.get(n.id) === 0).map((n) => n.id);
    let placed = 0;

    while (current.length > 0) {
      waves.push(current);
      placed += current.length;

      const next: string[] = [];
      for (const id of current) {
        for (const consumer of dependents.get(id) ?? []) {
          const remaining = (inDegree.get(consumer) ?? 1) - 1;
          inDegree.set(consumer, remaining);
          if (remaining === 0) {
            next.push(consumer);
          }
        }
      }
      current = next.sort(byDeclaration);
    }

    if (placed !== nodes.length) {
      const cycle = GraphResolver.findCycle(nodes) ?? [];
      throw new GraphError("cycle", `Graph contains a cycle: ${cycle.join(" -> ")}`, {
        path: cycle,
        nodeId: cycle[0],
      });
    }

    return { order: waves.flat(), waves, dependencies };
  }
}
