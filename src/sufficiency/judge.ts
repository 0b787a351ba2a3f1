// ---------------------------------------------------------------------------
// Sufficiency – Judge verdict parsing and the LLM-backed judge
// ---------------------------------------------------------------------------

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { ChatModel } from "../llm/chat-client.js";
import { extractJsonObject } from "../llm/json.js";
import type { JudgeContext, JudgeVerdict, SufficiencyJudge } from "./types.js";

const JudgeVerdictSchema = Type.Object({
  sufficient: Type.Boolean(),
  reasoning: Type.Optional(Type.String()),
  action: Type.Optional(
    Type.Union([Type.Literal("expand_timeframe"), Type.Literal("try_alternate_source")]),
  ),
  tools: Type.Optional(Type.Array(Type.String())),
});

export const FALLBACK_VERDICT: JudgeVerdict = {
  sufficient: false,
  reasoning: "Judge response could not be parsed",
};

/**
 * Accept either an already-structured verdict or raw model text. Anything
 * that does not yield a verdict object becomes `FALLBACK_VERDICT`.
 */
export function parseJudgeVerdict(raw: unknown): JudgeVerdict {
  const candidate = typeof raw === "string" ? extractJsonObject(raw) : raw;
  if (!Value.Check(JudgeVerdictSchema, candidate)) {
    return FALLBACK_VERDICT;
  }
  return {
    sufficient: candidate.sufficient,
    reasoning: candidate.reasoning ?? "",
    ...(candidate.action ? { action: candidate.action } : {}),
    ...(candidate.tools ? { tools: candidate.tools } : {}),
  };
}

function buildPrompt(context: JudgeContext): string {
  const label = context.subject.name
    ? `${context.subject.name} (${context.subject.symbol})`
    : context.subject.symbol;
  const counts = Object.entries(context.countsBySource)
    .map(([tool, n]) => `${tool}: ${n}`)
    .join(", ");
  return [
    `Subject: ${label}`,
    `Lookback window: ${context.windowDays} days`,
    `Items collected: ${context.itemCount} (${counts || "none"})`,
    `Untried sources: ${context.untriedTools.join(", ") || "none"}`,
    "Headlines:",
    ...context.titles.map((t) => `- ${t}`),
    "",
    "Is this enough recent, relevant evidence to judge market sentiment?",
    'Reply with JSON only: {"sufficient": boolean, "reasoning": string, ' +
      '"action": "expand_timeframe" | "try_alternate_source", "tools": string[]}',
  ].join("\n");
}

export function createLlmJudge(model: ChatModel, opts?: { maxTitles?: number }): SufficiencyJudge {
  const maxTitles = opts?.maxTitles ?? 20;
  return async (context) =>
    model.complete(
      [
        {
          role: "system",
          content: "You assess whether collected news evidence is sufficient for analysis.",
        },
        {
          role: "user",
          content: buildPrompt({ ...context, titles: context.titles.slice(0, maxTitles) }),
        },
      ],
      { temperature: 0, signal: context.signal },
    );
}
