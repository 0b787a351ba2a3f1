import { describe, expect, it } from "vitest";
import { GraphError, GraphResolver, parseMappingSource } from "./resolver.js";
import type { UnitNode } from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeNode(id: string, ...producers: string[]): UnitNode {
  const inputs: Record<string, string> = {};
  producers.forEach((p, i) => {
    inputs[`in${i}`] = p;
  });
  return { id, unit: "noop", inputs };
}

function resolveError(nodes: UnitNode[]): GraphError {
  try {
    GraphResolver.resolve(nodes);
  } catch (err) {
    if (err instanceof GraphError) {
      return err;
    }
    throw err;
  }
  throw new Error("expected resolve to fail");
}

/** Deterministic Lehmer generator. */
function lcg(seed: number) {
  let state = seed;
  return () => {
    state = (state * 48271) % 2147483647;
    return state / 2147483647;
  };
}

// ---------------------------------------------------------------------------
// resolve
// ---------------------------------------------------------------------------

describe("GraphResolver.resolve", () => {
  it("orders a linear chain", () => {
    const plan = GraphResolver.resolve([makeNode("c", "b"), makeNode("a"), makeNode("b", "a")]);
    expect(plan.order).toEqual(["a", "b", "c"]);
    expect(plan.waves).toEqual([["a"], ["b"], ["c"]]);
  });

  it("groups a diamond into waves and breaks ties by declaration order", () => {
    const plan = GraphResolver.resolve([
      makeNode("root"),
      makeNode("sentiment", "root.shortlist"),
      makeNode("technical", "root.shortlist"),
      makeNode("strategist", "technical", "sentiment"),
    ]);
    expect(plan.waves).toEqual([["root"], ["sentiment", "technical"], ["strategist"]]);
    expect(plan.dependencies.strategist).toEqual(["technical", "sentiment"]);
  });

  it("counts a producer once when several fields read from it", () => {
    const plan = GraphResolver.resolve([makeNode("a"), makeNode("b", "a.x", "a.y", "a")]);
    expect(plan.dependencies.b).toEqual(["a"]);
    expect(plan.waves).toEqual([["a"], ["b"]]);
  });

  it("is deterministic across calls", () => {
    const nodes = [makeNode("x"), makeNode("y"), makeNode("z", "x", "y"), makeNode("w", "x")];
    expect(GraphResolver.resolve(nodes)).toEqual(GraphResolver.resolve(nodes));
  });

  it("places every node after its producers for generated acyclic graphs", () => {
    const rand = lcg(42);
    for (let trial = 0; trial < 25; trial++) {
      const size = 2 + Math.floor(rand() * 10);
      const nodes: UnitNode[] = [];
      for (let i = 0; i < size; i++) {
        const producers: string[] = [];
        for (let j = 0; j < i; j++) {
          if (rand() < 0.3) {
            producers.push(`n${j}`);
          }
        }
        nodes.push(makeNode(`n${i}`, ...producers));
      }
      // Shuffle declaration order.
      for (let i = nodes.length - 1; i > 0; i--) {
        const j = Math.floor(rand() * (i + 1));
        [nodes[i], nodes[j]] = [nodes[j], nodes[i]];
      }

      const plan = GraphResolver.resolve(nodes);
      expect(plan.order).toHaveLength(size);
      for (const n of nodes) {
        for (const producer of GraphResolver.dependenciesOf(n)) {
          expect(plan.order.indexOf(producer)).toBeLessThan(plan.order.indexOf(n.id));
        }
      }
    }
  });

  it("reports a two-node cycle with its path", () => {
    const err = resolveError([makeNode("root"), makeNode("a", "b", "root"), makeNode("b", "a")]);
    expect(err.kind).toBe("cycle");
    expect(err.path).toEqual(["a", "b", "a"]);
    expect(err.message).toBe("Graph contains a cycle: a -> b -> a");
  });

  it("reports a self-loop", () => {
    const err = resolveError([makeNode("a", "a.out")]);
    expect(err.kind).toBe("cycle");
    expect(err.path).toEqual(["a", "a"]);
  });

  it("rejects an unknown producer", () => {
    const err = resolveError([makeNode("a"), makeNode("b", "ghost.field")]);
    expect(err.kind).toBe("unknownProducer");
    expect(err.message).toBe('Unit "b" reads from unknown producer "ghost"');
  });

  it("rejects duplicate ids", () => {
    const err = resolveError([makeNode("a"), makeNode("a")]);
    expect(err.kind).toBe("duplicateNode");
  });

  it("resolves an empty graph", () => {
    expect(GraphResolver.resolve([])).toEqual({ order: [], waves: [], dependencies: {} });
  });
});

// ---------------------------------------------------------------------------
// Adjacency helpers
// ---------------------------------------------------------------------------

describe("GraphResolver adjacency", () => {
  const nodes = [makeNode("a"), makeNode("b", "a"), makeNode("c", "b"), makeNode("d", "a")];

  it("lists direct dependents", () => {
    expect(GraphResolver.dependentsOf("a", nodes)).toEqual(["b", "d"]);
  });

  it("collects the transitive downstream set", () => {
    expect([...GraphResolver.collectDownstream("a", nodes)].sort()).toEqual(["b", "c", "d"]);
    expect(GraphResolver.collectDownstream("c", nodes).size).toBe(0);
  });

  it("finds no cycle in an acyclic graph", () => {
    expect(GraphResolver.findCycle(nodes)).toBeNull();
  });
});

describe("parseMappingSource", () => {
  it("splits producer and nested path", () => {
    expect(parseMappingSource("scouting")).toEqual({ producerId: "scouting", path: [] });
    expect(parseMappingSource("scouting.shortlisted_stocks")).toEqual({
      producerId: "scouting",
      path: ["shortlisted_stocks"],
    });
    expect(parseMappingSource("a.b.c")).toEqual({ producerId: "a", path: ["b", "c"] });
  });
});
