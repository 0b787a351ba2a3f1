import { describe, expect, it, vi } from "vitest";
import type { ChatCompletionOpts, ChatMessage } from "../llm/chat-client.js";
import { createLlmJudge, FALLBACK_VERDICT, parseJudgeVerdict } from "./judge.js";

describe("parseJudgeVerdict", () => {
  it("reads a verdict from model text", () => {
    expect(
      parseJudgeVerdict(
        '<think>hmm</think>{"sufficient": false, "reasoning": "stale", "action": "expand_timeframe"}',
      ),
    ).toEqual({ sufficient: false, reasoning: "stale", action: "expand_timeframe" });
  });

  it("accepts a structured verdict and fills reasoning", () => {
    expect(parseJudgeVerdict({ sufficient: true, tools: ["fetch_gnews"] })).toEqual({
      sufficient: true,
      reasoning: "",
      tools: ["fetch_gnews"],
    });
  });

  it("falls back on anything else", () => {
    expect(parseJudgeVerdict("I think it is fine")).toBe(FALLBACK_VERDICT);
    expect(parseJudgeVerdict({ sufficient: "yes" })).toBe(FALLBACK_VERDICT);
    expect(parseJudgeVerdict({ sufficient: true, action: "panic" })).toBe(FALLBACK_VERDICT);
  });
});

describe("createLlmJudge", () => {
  it("prompts with the evidence summary and caps headlines", async () => {
    const complete = vi.fn(async (_messages: ChatMessage[]) => '{"sufficient": true}');
    const judge = createLlmJudge({ complete }, { maxTitles: 2 });

    const answer = await judge({
      subject: { symbol: "AAA.NS", name: "Acme" },
      windowDays: 90,
      itemCount: 3,
      countsBySource: { fetch_news: 2, fetch_gnews: 1 },
      titles: ["one", "two", "three"],
      untriedTools: [],
    });

    expect(answer).toBe('{"sufficient": true}');
    const prompt = complete.mock.calls[0][0][1].content;
    expect(prompt).toContain("Subject: Acme (AAA.NS)");
    expect(prompt).toContain("Items collected: 3 (fetch_news: 2, fetch_gnews: 1)");
    expect(prompt).toContain("Untried sources: none");
    expect(prompt).toContain("- two\n\n");
    expect(prompt).not.toContain("- three");
  });

  it("passes the abort signal to the model", async () => {
    const complete = vi.fn(async (_messages: ChatMessage[], _opts?: ChatCompletionOpts) => "{}");
    const controller = new AbortController();
    const judge = createLlmJudge({ complete });

    await judge({
      subject: { symbol: "AAA.NS" },
      windowDays: 2,
      itemCount: 0,
      countsBySource: {},
      titles: [],
      untriedTools: [],
      signal: controller.signal,
    });

    expect(complete.mock.calls[0][1]).toEqual({ temperature: 0, signal: controller.signal });
  });
});
