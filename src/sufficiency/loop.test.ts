import { Type, type Static } from "@sinclair/typebox";
import { describe, expect, it, vi } from "vitest";
import { ResultCache } from "../cache/result-cache.js";
import { ToolRegistry, type ToolCallContext } from "../tools/registry.js";
import { collectEvidence, normalizeToolItems } from "./loop.js";
import type { EvidenceItem, EvidenceSource, JudgeContext } from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const FetchArgs = Type.Object({
  symbol: Type.String(),
  query: Type.String(),
  days: Type.Number(),
  maxResults: Type.Number(),
});

type FetchArgs = Static<typeof FetchArgs>;

function titles(...list: string[]): EvidenceItem[] {
  return list.map((title) => ({ title }));
}

function addTool(
  registry: ToolRegistry,
  name: string,
  produce: (args: FetchArgs) => EvidenceItem[],
  opts?: { available?: boolean },
) {
  const execute = vi.fn(async (args: FetchArgs, _ctx: ToolCallContext) => produce(args));
  registry.register({
    name,
    description: `${name} fetcher`,
    parameters: FetchArgs,
    available: opts?.available,
    execute,
  });
  return execute;
}

const SOURCES: EvidenceSource[] = [
  { tool: "news", tier: "primary" },
  { tool: "gnews", tier: "alternate" },
  { tool: "reddit", tier: "supplementary" },
];

const SUBJECT = { symbol: "ACME.NS", name: "Acme Industries" };

// ---------------------------------------------------------------------------
// Termination
// ---------------------------------------------------------------------------

describe("collectEvidence termination", () => {
  it("exhausts after ladder × sources rounds when every source returns nothing", async () => {
    const registry = new ToolRegistry();
    const news = addTool(registry, "news", () => []);
    const gnews = addTool(registry, "gnews", () => []);
    const reddit = addTool(registry, "reddit", () => []);

    const result = await collectEvidence({
      subject: SUBJECT,
      sources: SOURCES,
      policy: { minItems: 5 },
      tools: registry,
      ladder: [2, 90, 180],
    });

    expect(result.verdict).toBe("exhausted");
    expect(result.lowConfidence).toBe(true);
    expect(result.rounds).toBe(9);
    expect(result.windowDays).toBe(180);
    expect(result.items).toEqual([]);
    for (const fn of [news, gnews, reddit]) {
      expect(fn.mock.calls.map(([args]) => args.days)).toEqual([2, 90, 180]);
    }
    expect(result.trace.filter((t) => t.type === "expand")).toEqual([
      { type: "expand", fromDays: 2, toDays: 90 },
      { type: "expand", fromDays: 90, toDays: 180 },
    ]);
  });

  it("terminates when no source is usable at all", async () => {
    const registry = new ToolRegistry();
    addTool(registry, "news", () => titles("A"), { available: false });

    const result = await collectEvidence({
      subject: SUBJECT,
      sources: [
        { tool: "news", tier: "primary" },
        { tool: "missing", tier: "alternate" },
      ],
      policy: { minItems: 1 },
      tools: registry,
      ladder: [2, 90],
    });

    expect(result.verdict).toBe("exhausted");
    expect(result.rounds).toBe(0);
    expect(result.trace).toEqual([
      { type: "skip", tool: "news", days: 2, reason: "not available" },
      { type: "skip", tool: "missing", days: 2, reason: "not registered" },
      { type: "expand", fromDays: 2, toDays: 90 },
      { type: "skip", tool: "news", days: 90, reason: "not available" },
      { type: "skip", tool: "missing", days: 90, reason: "not registered" },
    ]);
  });

  it("rejects an empty ladder", async () => {
    await expect(
      collectEvidence({
        subject: SUBJECT,
        sources: SOURCES,
        policy: { minItems: 1 },
        tools: new ToolRegistry(),
        ladder: [],
      }),
    ).rejects.toThrow("at least one window");
  });

  it("stops when the signal is aborted", async () => {
    const registry = new ToolRegistry();
    addTool(registry, "news", () => []);
    const controller = new AbortController();
    controller.abort(new Error("deadline"));

    await expect(
      collectEvidence({
        subject: SUBJECT,
        sources: SOURCES,
        policy: { minItems: 1 },
        tools: registry,
        signal: controller.signal,
      }),
    ).rejects.toThrow("deadline");
  });
});

// ---------------------------------------------------------------------------
// Selection & escalation
// ---------------------------------------------------------------------------

describe("collectEvidence selection", () => {
  it("is satisfied by the primary source in the narrowest window", async () => {
    const registry = new ToolRegistry();
    addTool(registry, "news", () => titles("A", "B", "C", "D", "E"));
    const gnews = addTool(registry, "gnews", () => []);

    const result = await collectEvidence({
      subject: SUBJECT,
      sources: SOURCES,
      policy: { minItems: 5 },
      tools: registry,
    });

    expect(result.verdict).toBe("satisfied");
    expect(result.lowConfidence).toBe(false);
    expect(result.rounds).toBe(1);
    expect(result.windowDays).toBe(2);
    expect(result.sourcesUsed).toEqual(["news"]);
    expect(result.itemsBySource.news).toHaveLength(5);
    expect(gnews).not.toHaveBeenCalled();
  });

  it("falls back across failures and unavailable tools, then widens the window", async () => {
    const registry = new ToolRegistry();
    addTool(registry, "news", (args) => (args.days === 2 ? titles("A", "B") : titles("A", "b ", "C")));
    addTool(registry, "gnews", () => {
      throw new Error("quota exceeded");
    });
    addTool(registry, "reddit", () => titles("R"), { available: false });

    const result = await collectEvidence({
      subject: SUBJECT,
      sources: SOURCES,
      policy: { minItems: 3 },
      tools: registry,
    });

    expect(result.verdict).toBe("satisfied");
    expect(result.rounds).toBe(3);
    expect(result.windowDays).toBe(90);
    expect(result.sourcesUsed).toEqual(["news"]);
    expect(result.items.map((i) => i.title)).toEqual(["A", "B", "C"]);
    expect(result.items.every((i) => i.tool === "news")).toBe(true);
    expect(result.trace).toContainEqual({
      type: "skip",
      tool: "reddit",
      days: 2,
      reason: "not available",
    });
    const gnewsFetch = result.trace.find((t) => t.type === "fetch" && t.tool === "gnews");
    expect(gnewsFetch).toMatchObject({ newItems: 0, error: expect.stringContaining("quota") });
  });

  it("orders sources by tier regardless of declaration order", async () => {
    const registry = new ToolRegistry();
    const calls: string[] = [];
    for (const name of ["news", "gnews", "reddit"]) {
      addTool(registry, name, () => {
        calls.push(name);
        return [];
      });
    }

    await collectEvidence({
      subject: SUBJECT,
      sources: [
        { tool: "reddit", tier: "supplementary" },
        { tool: "gnews", tier: "alternate" },
        { tool: "news", tier: "primary" },
      ],
      policy: { minItems: 1 },
      tools: registry,
      ladder: [7],
    });

    expect(calls).toEqual(["news", "gnews", "reddit"]);
  });
});

// ---------------------------------------------------------------------------
// Judge
// ---------------------------------------------------------------------------

describe("collectEvidence judge", () => {
  it("lets the judge veto a policy pass and steer the next source", async () => {
    const registry = new ToolRegistry();
    addTool(registry, "news", () => titles("A"));
    const gnews = addTool(registry, "gnews", () => titles("G"));
    addTool(registry, "reddit", () => titles("R"));
    const judge = vi
      .fn()
      .mockResolvedValueOnce(
        'Not enough yet. {"sufficient": false, "reasoning": "thin", "tools": ["reddit"]}',
      )
      .mockResolvedValueOnce({ sufficient: true, reasoning: "ok" });

    const result = await collectEvidence({
      subject: SUBJECT,
      sources: SOURCES,
      policy: { minItems: 1 },
      tools: registry,
      judge,
    });

    expect(result.verdict).toBe("satisfied");
    expect(result.rounds).toBe(2);
    expect(result.sourcesUsed).toEqual(["news", "reddit"]);
    expect(gnews).not.toHaveBeenCalled();
    expect(judge).toHaveBeenCalledTimes(2);
    expect(judge.mock.calls[0][0]).toMatchObject({
      windowDays: 2,
      itemCount: 1,
      titles: ["A"],
      untriedTools: ["gnews", "reddit"],
    });
  });

  it("treats an unparseable judge answer as insufficient", async () => {
    const registry = new ToolRegistry();
    addTool(registry, "news", () => titles("A"));

    const result = await collectEvidence({
      subject: SUBJECT,
      sources: [{ tool: "news", tier: "primary" }],
      policy: { minItems: 1 },
      tools: registry,
      ladder: [2],
      judge: async () => "I think it is probably fine",
    });

    expect(result.verdict).toBe("exhausted");
    expect(result.lowConfidence).toBe(true);
    expect(result.items).toHaveLength(1);
  });

  it("treats a failing judge as insufficient", async () => {
    const registry = new ToolRegistry();
    addTool(registry, "news", () => titles("A"));
    const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const result = await collectEvidence({
      subject: SUBJECT,
      sources: [{ tool: "news", tier: "primary" }],
      policy: { minItems: 1 },
      tools: registry,
      ladder: [2],
      judge: async () => {
        throw new Error("model offline");
      },
      log,
    });

    expect(result.verdict).toBe("exhausted");
    expect(log.warn).toHaveBeenCalledWith(
      "sufficiency judge failed for ACME.NS: model offline",
    );
  });
});

// ---------------------------------------------------------------------------
// Fetch caching
// ---------------------------------------------------------------------------

describe("collectEvidence caching", () => {
  it("reuses fetches for the same tool, subject and window", async () => {
    const registry = new ToolRegistry();
    const news = addTool(registry, "news", () => titles("A", "B"));
    const cache = new ResultCache();
    const opts = {
      subject: SUBJECT,
      sources: [{ tool: "news", tier: "primary" as const }],
      policy: { minItems: 2 },
      tools: registry,
      cache,
    };

    const first = await collectEvidence(opts);
    const second = await collectEvidence(opts);

    expect(news).toHaveBeenCalledTimes(1);
    expect(second.items).toEqual(first.items);
    expect(second.trace[0]).toMatchObject({ type: "fetch", cached: true });
  });
});

describe("normalizeToolItems", () => {
  it("accepts arrays or { items } and drops malformed entries", () => {
    expect(normalizeToolItems([{ title: "A" }, { nope: 1 }, "x"])).toEqual([{ title: "A" }]);
    expect(normalizeToolItems({ items: [{ title: "B", url: "https://example.test/b" }] })).toEqual([
      { title: "B", url: "https://example.test/b" },
    ]);
    expect(normalizeToolItems(null)).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Cancellation
// ---------------------------------------------------------------------------

describe("collectEvidence cancellation", () => {
  it("passes its signal to every tool call and to the judge", async () => {
    const registry = new ToolRegistry();
    const news = addTool(registry, "news", () => titles("A"));
    const judge = vi.fn(async (_context: JudgeContext) => ({ sufficient: true, reasoning: "ok" }));
    const controller = new AbortController();

    await collectEvidence({
      subject: SUBJECT,
      sources: [{ tool: "news", tier: "primary" }],
      policy: { minItems: 1 },
      tools: registry,
      ladder: [2],
      judge,
      signal: controller.signal,
    });

    expect(news.mock.calls[0][1]).toEqual({ signal: controller.signal });
    expect(judge.mock.calls[0][0]).toMatchObject({ signal: controller.signal });
  });
});
