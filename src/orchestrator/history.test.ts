import { describe, expect, it } from "vitest";
import { ExecutionHistory } from "./history.js";
import type { ExecutionResult } from "./types.js";

function makeResult(id: string, startedAtMs: number): ExecutionResult {
  return {
    id,
    graphName: "g",
    status: "success",
    order: [],
    waves: [],
    units: [],
    outputs: {},
    startedAtMs,
    completedAtMs: startedAtMs,
    durationMs: 0,
  };
}

describe("ExecutionHistory", () => {
  it("keeps records newest first and caps the size", () => {
    const history = new ExecutionHistory(3);
    for (let i = 1; i <= 5; i++) {
      history.add(makeResult(`e${i}`, i));
    }
    expect(history.list().map((r) => r.id)).toEqual(["e5", "e4", "e3"]);
    expect(history.get("e1")).toBeUndefined();
    expect(history.get("e4")?.startedAtMs).toBe(4);
    expect(history.list(2).map((r) => r.id)).toEqual(["e5", "e4"]);
  });

  it("replaces a record with the same id", () => {
    const history = new ExecutionHistory();
    history.add(makeResult("a", 1));
    history.add(makeResult("b", 2));
    history.add({ ...makeResult("a", 1), status: "partial" });
    expect(history.list().map((r) => [r.id, r.status])).toEqual([
      ["a", "partial"],
      ["b", "success"],
    ]);
  });

  it("merges restored records by start time without duplicating", () => {
    const history = new ExecutionHistory(10);
    history.add(makeResult("live", 50));
    history.restore([makeResult("old", 10), makeResult("live", 50), makeResult("newer", 60)]);
    expect(history.list().map((r) => r.id)).toEqual(["newer", "live", "old"]);
  });

  it("rejects a non-positive limit", () => {
    expect(() => new ExecutionHistory(0)).toThrow("positive integer");
  });
});
