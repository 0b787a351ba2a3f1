/**
 * Sentiment scoring of collected evidence.
 *
 * The LLM analyzer asks for a JSON verdict; anything it cannot parse, and
 * any call failure, degrades to a neutral low-confidence result built from
 * the evidence titles.
 */

import { Type, type Static } from "@sinclair/typebox";
import type { ChatModel } from "../../llm/chat-client.js";
import { extractJsonObject } from "../../llm/json.js";
import { formatError, silentLogger, type SubsystemLogger } from "../../logging.js";
import { checkValue, literalUnion } from "../../schema/typebox.js";
import type { EvidenceItem, EvidenceSubject } from "../../sufficiency/types.js";
import { RecommendationSchema } from "./schemas.js";

export const SENTIMENT_LEVELS = [
  "very_positive",
  "positive",
  "neutral",
  "negative",
  "very_negative",
] as const;

export type SentimentLevel = (typeof SENTIMENT_LEVELS)[number];

export const SentimentVerdictSchema = Type.Object({
  summary_points: Type.Array(Type.String(), { default: [] }),
  overall_sentiment: literalUnion(SENTIMENT_LEVELS),
  sentiment_score: Type.Number({ minimum: -1, maximum: 1, default: 0 }),
  confidence: Type.Number({ minimum: 0, maximum: 1, default: 0.5 }),
  key_insights: Type.Array(Type.String(), { default: [] }),
  recommendation: RecommendationSchema,
});

export type SentimentVerdict = Static<typeof SentimentVerdictSchema>;

export interface SentimentAnalyzer {
  analyze(
    subject: EvidenceSubject,
    items: readonly EvidenceItem[],
    opts?: { signal?: AbortSignal; log?: SubsystemLogger },
  ): Promise<SentimentVerdict>;
}

// ---------------------------------------------------------------------------
// Neutral fallback
// ---------------------------------------------------------------------------

export const FALLBACK_CONFIDENCE = 0.2;

export function neutralVerdict(items: readonly EvidenceItem[]): SentimentVerdict {
  return {
    summary_points: items.slice(0, 5).map((i) => i.title),
    overall_sentiment: "neutral",
    sentiment_score: 0,
    confidence: items.length === 0 ? 0 : FALLBACK_CONFIDENCE,
    key_insights: [],
    recommendation: "hold",
  };
}

export const neutralAnalyzer: SentimentAnalyzer = {
  async analyze(_subject, items) {
    return neutralVerdict(items);
  },
};

// ---------------------------------------------------------------------------
// LLM analyzer
// ---------------------------------------------------------------------------

function buildPrompt(subject: EvidenceSubject, items: readonly EvidenceItem[]): string {
  const articles = items
    .map((item) =>
      [
        `Title: ${item.title}`,
        item.summary ? `Description: ${item.summary}` : "",
        item.publishedAt ? `Date: ${item.publishedAt}` : "",
      ]
        .filter(Boolean)
        .join("\n"),
    )
    .join("\n\n---\n\n");
  const label = subject.name ? `${subject.name} (${subject.symbol})` : subject.symbol;
  return [
    `Analyze the following news about ${label}.`,
    "",
    articles,
    "",
    "Reply with JSON only:",
    '{"summary_points": string[5-7], "overall_sentiment": "very_positive"|"positive"|"neutral"|"negative"|"very_negative",',
    ' "sentiment_score": -1..1, "confidence": 0..1, "key_insights": string[3-5],',
    ' "recommendation": "strong_buy"|"buy"|"hold"|"sell"|"strong_sell"}',
  ].join("\n");
}

export function parseSentimentVerdict(text: string): SentimentVerdict | undefined {
  const json = extractJsonObject(text);
  if (!json) {
    return undefined;
  }
  const checked = checkValue(SentimentVerdictSchema, json);
  return checked.ok ? checked.value : undefined;
}

export class LlmSentimentAnalyzer implements SentimentAnalyzer {
  private readonly model: ChatModel;

  constructor(model: ChatModel) {
    this.model = model;
  }

  async analyze(
    subject: EvidenceSubject,
    items: readonly EvidenceItem[],
    opts?: { signal?: AbortSignal; log?: SubsystemLogger },
  ): Promise<SentimentVerdict> {
    const log = opts?.log ?? silentLogger;
    if (items.length === 0) {
      return neutralVerdict(items);
    }
    let text: string;
    try {
      text = await this.model.complete(
        [
          { role: "system", content: "You are a financial sentiment analysis expert." },
          { role: "user", content: buildPrompt(subject, items) },
        ],
        { temperature: 0.5, maxTokens: 4096, signal: opts?.signal },
      );
    } catch (err) {
      opts?.signal?.throwIfAborted();
      log.warn(`sentiment analysis failed for ${subject.symbol}: ${formatError(err)}`);
      return neutralVerdict(items);
    }
    const verdict = parseSentimentVerdict(text);
    if (!verdict) {
      log.warn(`unparseable sentiment verdict for ${subject.symbol}`);
      return neutralVerdict(items);
    }
    return verdict;
  }
}
