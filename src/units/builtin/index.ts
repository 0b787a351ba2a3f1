/**
 * Built-in unit registry.
 *
 * Registers the screening → analysis → decision units that the default
 * graph is built from. Collaborators are injected once through
 * `BuiltinUnitDeps`; node configuration comes from the graph description.
 */

import type { ChatModel } from "../../llm/chat-client.js";
import type { MarketDataProvider } from "../../market/types.js";
import type { UnitRegistry } from "../../orchestrator/unit-registry.js";
import { createLlmJudge } from "../../sufficiency/judge.js";
import type { ToolRegistry } from "../../tools/registry.js";
import type { Broker } from "./broker.js";
import { ScoutingConfigSchema, ScoutingUnit } from "./scouting.js";
import { LlmSentimentAnalyzer, neutralAnalyzer, type SentimentAnalyzer } from "./sentiment-analyzer.js";
import { SentimentConfigSchema, SentimentUnit, type EvidenceDefaults } from "./sentiment.js";
import { StrategistConfigSchema, StrategistUnit } from "./strategist.js";
import { TechnicalConfigSchema, TechnicalUnit } from "./technical.js";

export { PaperBroker, type Broker, type OrderResult } from "./broker.js";

export type BuiltinUnitDeps = {
  market: MarketDataProvider;
  tools: ToolRegistry;
  broker: Broker;
  /** Without a model the sentiment and strategist units use their fallbacks. */
  chat?: ChatModel;
  /** Overrides the analyzer derived from `chat`. */
  analyzer?: SentimentAnalyzer;
  evidence?: Partial<EvidenceDefaults>;
  minTradeConfidence?: number;
};

export const BUILTIN_UNIT_REFS = ["scouting", "technical", "sentiment", "strategist"] as const;

export function registerBuiltinUnits(registry: UnitRegistry<BuiltinUnitDeps>): void {
  registry.register({
    ref: "scouting",
    label: "Scouting",
    description: "Screens a symbol universe on ATR% and liquidity and shortlists the best.",
    configSchema: ScoutingConfigSchema,
    create: (config, deps) => new ScoutingUnit(config, deps.market),
  });

  registry.register({
    ref: "technical",
    label: "Technical analysis",
    description: "RSI, MACD and moving-average trend with a strength score per stock.",
    configSchema: TechnicalConfigSchema,
    create: (config, deps) => new TechnicalUnit(config, deps.market),
  });

  registry.register({
    ref: "sentiment",
    label: "Sentiment analysis",
    description: "Adaptive news collection followed by sentiment scoring per stock.",
    configSchema: SentimentConfigSchema,
    create: (config, deps) =>
      new SentimentUnit(config, {
        tools: deps.tools,
        analyzer: deps.analyzer ?? (deps.chat ? new LlmSentimentAnalyzer(deps.chat) : neutralAnalyzer),
        judge: deps.chat ? createLlmJudge(deps.chat) : undefined,
        evidence: deps.evidence,
      }),
  });

  registry.register({
    ref: "strategist",
    label: "Strategist",
    description: "Trade decisions from technical and sentiment results; orders the top pick.",
    configSchema: StrategistConfigSchema,
    create: (config, deps) =>
      new StrategistUnit(config, {
        broker: deps.broker,
        chat: deps.chat,
        minConfidence: deps.minTradeConfidence,
      }),
  });
}
