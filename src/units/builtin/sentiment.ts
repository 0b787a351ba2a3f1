// ---------------------------------------------------------------------------
// Built-in Units – Sentiment
// ---------------------------------------------------------------------------
// Per stock: collect evidence through the adaptive sufficiency loop, then
// score it. A stock whose evidence ran out is still analyzed, flagged
// `low_confidence`.
// ---------------------------------------------------------------------------

import { Type, type Static } from "@sinclair/typebox";
import { literalUnion } from "../../schema/typebox.js";
import { collectEvidence, DEFAULT_MAX_RESULTS } from "../../sufficiency/loop.js";
import type { EvidenceSource, SufficiencyJudge } from "../../sufficiency/types.js";
import { DEFAULT_LADDER_DAYS, SOURCE_TIERS } from "../../sufficiency/types.js";
import { NEWS_TOOL_NAMES } from "../../tools/news.js";
import type { ToolRegistry } from "../../tools/registry.js";
import { Unit, type UnitRunContext } from "../unit.js";
import type { SentimentAnalyzer, SentimentVerdict } from "./sentiment-analyzer.js";

export const DEFAULT_EVIDENCE_SOURCES: EvidenceSource[] = [
  { tool: NEWS_TOOL_NAMES.eventRegistry, tier: "primary" },
  { tool: NEWS_TOOL_NAMES.gnews, tier: "alternate" },
  { tool: NEWS_TOOL_NAMES.reddit, tier: "supplementary" },
  { tool: NEWS_TOOL_NAMES.twitter, tier: "supplementary" },
];

export const DEFAULT_MIN_EVIDENCE_ITEMS = 5;

/** Unset fields fall back to the process-wide evidence settings. */
export const SentimentConfigSchema = Type.Object({
  minItems: Type.Optional(Type.Integer({ minimum: 1 })),
  minSources: Type.Optional(Type.Integer({ minimum: 1 })),
  ladderDays: Type.Optional(Type.Array(Type.Integer({ minimum: 1 }), { minItems: 1 })),
  maxResults: Type.Optional(Type.Integer({ minimum: 1, maximum: 100 })),
  sources: Type.Optional(
    Type.Array(
      Type.Object({ tool: Type.String({ minLength: 1 }), tier: literalUnion(SOURCE_TIERS) }),
      { minItems: 1 },
    ),
  ),
  useJudge: Type.Boolean({ default: true }),
});

export type SentimentConfig = Static<typeof SentimentConfigSchema>;

export const SentimentInputSchema = Type.Object({
  stocks: Type.Array(
    Type.Object({
      symbol: Type.String({ minLength: 1 }),
      name: Type.Optional(Type.String()),
    }),
    { minItems: 1 },
  ),
});

export type EvidenceDefaults = {
  minItems: number;
  ladderDays: readonly number[];
  maxResults: number;
};

export type StockSentiment = SentimentVerdict & {
  symbol: string;
  name: string;
  news_count: number;
  evidence_count: number;
  sources_used: string[];
  evidence_verdict: "satisfied" | "exhausted";
  low_confidence: boolean;
  window_days: number;
};

export type SentimentOutput = {
  analyzed_stocks: StockSentiment[];
  total_analyzed: number;
  positive_count: number;
  negative_count: number;
  neutral_count: number;
  evidence_count: number;
  sources_used: string[];
};

export type SentimentUnitDeps = {
  tools: ToolRegistry;
  analyzer: SentimentAnalyzer;
  judge?: SufficiencyJudge;
  evidence?: Partial<EvidenceDefaults>;
};

export class SentimentUnit extends Unit<typeof SentimentInputSchema, SentimentOutput> {
  readonly name = "sentiment";
  readonly description =
    "Collects news until the evidence is sufficient, then scores sentiment per stock.";
  readonly inputSchema = SentimentInputSchema;

  private readonly config: SentimentConfig;
  private readonly deps: SentimentUnitDeps;

  constructor(config: SentimentConfig, deps: SentimentUnitDeps) {
    super();
    this.config = config;
    this.deps = deps;
  }

  protected async run(
    input: Static<typeof SentimentInputSchema>,
    ctx: UnitRunContext,
  ): Promise<SentimentOutput> {
    const defaults = this.deps.evidence ?? {};
    const policy = {
      minItems: this.config.minItems ?? defaults.minItems ?? DEFAULT_MIN_EVIDENCE_ITEMS,
      minSources: this.config.minSources,
    };
    const ladder = this.config.ladderDays ?? defaults.ladderDays ?? DEFAULT_LADDER_DAYS;
    const maxResults = this.config.maxResults ?? defaults.maxResults ?? DEFAULT_MAX_RESULTS;
    const sources = this.config.sources ?? DEFAULT_EVIDENCE_SOURCES;
    const judge = this.config.useJudge ? this.deps.judge : undefined;

    const analyzed: StockSentiment[] = [];
    for (const stock of input.stocks) {
      const subject = { symbol: stock.symbol, name: stock.name };
      const evidence = await collectEvidence({
        subject,
        sources,
        policy,
        tools: this.deps.tools,
        ladder,
        judge,
        cache: ctx.cache,
        maxResults,
        signal: ctx.signal,
        log: ctx.log,
      });
      ctx.log.info(
        `${stock.symbol}: ${evidence.items.length} items from [${evidence.sourcesUsed.join(", ")}] ` +
          `over ${evidence.windowDays}d (${evidence.verdict})`,
      );

      const verdict = await this.deps.analyzer.analyze(subject, evidence.items, {
        signal: ctx.signal,
        log: ctx.log,
      });
      analyzed.push({
        symbol: stock.symbol,
        name: stock.name ?? stock.symbol,
        news_count: evidence.items.length,
        ...verdict,
        evidence_count: evidence.items.length,
        sources_used: evidence.sourcesUsed,
        evidence_verdict: evidence.verdict,
        low_confidence: evidence.lowConfidence,
        window_days: evidence.windowDays,
      });
    }

    const isPositive = (s: StockSentiment) =>
      s.overall_sentiment === "positive" || s.overall_sentiment === "very_positive";
    const isNegative = (s: StockSentiment) =>
      s.overall_sentiment === "negative" || s.overall_sentiment === "very_negative";

    return {
      analyzed_stocks: analyzed,
      total_analyzed: analyzed.length,
      positive_count: analyzed.filter(isPositive).length,
      negative_count: analyzed.filter(isNegative).length,
      neutral_count: analyzed.filter((s) => s.overall_sentiment === "neutral").length,
      evidence_count: analyzed.reduce((sum, s) => sum + s.evidence_count, 0),
      sources_used: [...new Set(analyzed.flatMap((s) => s.sources_used))],
    };
  }
}
