// ---------------------------------------------------------------------------
// Built-in Units – Strategist
// ---------------------------------------------------------------------------
// Joins technical and sentiment results by symbol into one decision per
// stock, picks the strongest confident buy and places a single order for it.
// Decisions come from the deterministic scorer unless an LLM decider is
// configured and answers with something usable.
// ---------------------------------------------------------------------------

import { Type, type Static } from "@sinclair/typebox";
import type { ChatModel } from "../../llm/chat-client.js";
import { extractJsonObject } from "../../llm/json.js";
import { formatError, type SubsystemLogger } from "../../logging.js";
import { checkValue, literalUnion } from "../../schema/typebox.js";
import { Unit, type UnitRunContext } from "../unit.js";
import type { Broker, OrderResult } from "./broker.js";
import { SENTIMENT_LEVELS } from "./sentiment-analyzer.js";
import { RecommendationSchema, round } from "./schemas.js";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const TechnicalStockSchema = Type.Object({
  symbol: Type.String({ minLength: 1 }),
  name: Type.Optional(Type.String()),
  current_price: Type.Number({ minimum: 0 }),
  trend: literalUnion(["bullish", "bearish", "neutral"] as const),
  strength: Type.Number({ minimum: 0, maximum: 100 }),
  recommendation: RecommendationSchema,
  signals: Type.Array(Type.String(), { default: [] }),
});

const SentimentStockSchema = Type.Object({
  symbol: Type.String({ minLength: 1 }),
  name: Type.Optional(Type.String()),
  overall_sentiment: literalUnion(SENTIMENT_LEVELS),
  sentiment_score: Type.Number({ minimum: -1, maximum: 1 }),
  confidence: Type.Number({ minimum: 0, maximum: 1 }),
  recommendation: RecommendationSchema,
  low_confidence: Type.Boolean({ default: false }),
});

export const StrategistInputSchema = Type.Object({
  technical: Type.Object({ analyzed_stocks: Type.Array(TechnicalStockSchema) }),
  sentiment: Type.Object({ analyzed_stocks: Type.Array(SentimentStockSchema) }),
});

export type StrategistInput = Static<typeof StrategistInputSchema>;
export type TechnicalStock = Static<typeof TechnicalStockSchema>;
export type SentimentStock = Static<typeof SentimentStockSchema>;

export const StrategistConfigSchema = Type.Object({
  /** Unset: the process-wide trade confidence threshold. */
  minConfidence: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
  capital: Type.Number({ exclusiveMinimum: 0, default: 100_000 }),
  maxPositionSize: Type.Number({ exclusiveMinimum: 0, maximum: 1, default: 0.1 }),
  stopLossPct: Type.Number({ exclusiveMinimum: 0, maximum: 0.5, default: 0.05 }),
  useLlm: Type.Boolean({ default: true }),
});

export type StrategistConfig = Static<typeof StrategistConfigSchema>;

export const DEFAULT_MIN_TRADE_CONFIDENCE = 0.75;

export type TradeAction = "buy" | "hold" | "sell";

export type TradingDecision = {
  symbol: string;
  name: string;
  action: TradeAction;
  confidence: number;
  reasoning: string;
  technical_score: number;
  sentiment_score: number;
  combined_score: number;
  quantity?: number;
  stop_loss?: number;
  target_price?: number;
};

export type StrategistOutput = {
  decisions: TradingDecision[];
  top_pick: TradingDecision | null;
  order_executed: boolean;
  order_details: OrderResult | null;
  execution_reason: string | null;
};

// ---------------------------------------------------------------------------
// Combining
// ---------------------------------------------------------------------------

export type CombinedStock = {
  symbol: string;
  name: string;
  current_price: number;
  technical?: TechnicalStock;
  sentiment?: SentimentStock;
};

/** One entry per symbol seen by either analysis, technical order first. */
export function combineAnalyses(input: StrategistInput): CombinedStock[] {
  const bySymbol = new Map<string, CombinedStock>();
  for (const tech of input.technical.analyzed_stocks) {
    bySymbol.set(tech.symbol, {
      symbol: tech.symbol,
      name: tech.name ?? tech.symbol,
      current_price: tech.current_price,
      technical: tech,
    });
  }
  for (const sent of input.sentiment.analyzed_stocks) {
    const existing = bySymbol.get(sent.symbol);
    if (existing) {
      existing.sentiment = sent;
      if (existing.name === existing.symbol && sent.name) {
        existing.name = sent.name;
      }
    } else {
      bySymbol.set(sent.symbol, {
        symbol: sent.symbol,
        name: sent.name ?? sent.symbol,
        current_price: 0,
        sentiment: sent,
      });
    }
  }
  return [...bySymbol.values()];
}

// ---------------------------------------------------------------------------
// Deterministic scorer
// ---------------------------------------------------------------------------

export type SizingOpts = Pick<StrategistConfig, "capital" | "maxPositionSize" | "stopLossPct">;

/** Whole shares within the position limit, with a 1:2 stop/target bracket. */
export function sizePosition(
  price: number,
  opts: SizingOpts,
): { quantity: number; stop_loss: number; target_price: number } | undefined {
  if (price <= 0) {
    return undefined;
  }
  return {
    quantity: Math.floor((opts.capital * opts.maxPositionSize) / price),
    stop_loss: round(price * (1 - opts.stopLossPct)),
    target_price: round(price * (1 + 2 * opts.stopLossPct)),
  };
}

export function scoreStock(stock: CombinedStock, sizing: SizingOpts): TradingDecision {
  const technicalScore = stock.technical?.strength ?? 50;
  const sentimentScore = stock.sentiment?.sentiment_score ?? 0;
  const sentimentConfidence = stock.sentiment?.low_confidence
    ? Math.min(stock.sentiment.confidence, 0.3)
    : (stock.sentiment?.confidence ?? 0);
  const combined = round(0.6 * technicalScore + 0.4 * (sentimentScore + 1) * 50);

  const techBullish =
    stock.technical?.recommendation === "buy" || stock.technical?.recommendation === "strong_buy";
  let action: TradeAction = "hold";
  if (combined >= 65 && techBullish && sentimentScore > 0) {
    action = "buy";
  } else if (combined <= 35) {
    action = "sell";
  }

  const directional =
    action === "buy" ? combined / 100 : action === "sell" ? 1 - combined / 100 : 1 - Math.abs(combined - 50) / 50;
  const confidence = round(0.7 * directional + 0.3 * sentimentConfidence);

  const tech = stock.technical
    ? `technical ${stock.technical.trend} (strength ${stock.technical.strength}, ${stock.technical.recommendation})`
    : "no technical analysis";
  const sent = stock.sentiment
    ? `sentiment ${stock.sentiment.overall_sentiment} (score ${stock.sentiment.sentiment_score}, confidence ${stock.sentiment.confidence})`
    : "no sentiment analysis";

  const decision: TradingDecision = {
    symbol: stock.symbol,
    name: stock.name,
    action,
    confidence,
    reasoning: `${action.toUpperCase()}: ${tech}; ${sent}`,
    technical_score: technicalScore,
    sentiment_score: sentimentScore,
    combined_score: combined,
  };
  const sized = action === "buy" ? sizePosition(stock.current_price, sizing) : undefined;
  return sized ? { ...decision, ...sized } : decision;
}

// ---------------------------------------------------------------------------
// LLM decider
// ---------------------------------------------------------------------------

const LlmDecisionSchema = Type.Object({
  symbol: Type.String({ minLength: 1 }),
  action: literalUnion(["buy", "hold", "sell"] as const),
  confidence: Type.Number({ minimum: 0, maximum: 1 }),
  reasoning: Type.String({ default: "" }),
  combined_score: Type.Number({ minimum: 0, maximum: 100 }),
  quantity: Type.Optional(Type.Union([Type.Integer({ minimum: 0 }), Type.Null()])),
  stop_loss: Type.Optional(Type.Union([Type.Number(), Type.Null()])),
  target_price: Type.Optional(Type.Union([Type.Number(), Type.Null()])),
});

const LlmDecisionsSchema = Type.Object({
  decisions: Type.Array(LlmDecisionSchema),
});

function buildDecisionPrompt(stocks: readonly CombinedStock[], minConfidence: number): string {
  const payload = stocks.map((s) => ({
    symbol: s.symbol,
    name: s.name,
    current_price: s.current_price,
    technical: s.technical
      ? {
          trend: s.technical.trend,
          strength: s.technical.strength,
          recommendation: s.technical.recommendation,
          signals: s.technical.signals,
        }
      : null,
    sentiment: s.sentiment
      ? {
          overall_sentiment: s.sentiment.overall_sentiment,
          sentiment_score: s.sentiment.sentiment_score,
          confidence: s.sentiment.confidence,
          recommendation: s.sentiment.recommendation,
        }
      : null,
  }));
  return [
    "Decide buy, hold or sell for each stock of a swing trading system.",
    "Only buy when technical and sentiment are both clearly positive; technicals set the timing.",
    `Only recommend buy with confidence above ${minConfidence}. Use a 1:2 risk-reward bracket.`,
    "",
    JSON.stringify(payload, null, 2),
    "",
    'Reply with JSON only: {"decisions": [{"symbol", "action", "confidence", "reasoning",',
    ' "combined_score" (0-100), "quantity", "stop_loss", "target_price"}]}',
  ].join("\n");
}

/**
 * Ask the model for decisions. Returns `undefined` when the answer is
 * unusable or does not cover every stock.
 */
export async function decideWithLlm(
  model: ChatModel,
  stocks: readonly CombinedStock[],
  opts: { minConfidence: number; sizing: SizingOpts; signal?: AbortSignal; log: SubsystemLogger },
): Promise<TradingDecision[] | undefined> {
  let text: string;
  try {
    text = await model.complete(
      [
        { role: "system", content: "You are a senior trading strategist." },
        { role: "user", content: buildDecisionPrompt(stocks, opts.minConfidence) },
      ],
      { temperature: 0.3, maxTokens: 4096, signal: opts.signal },
    );
  } catch (err) {
    opts.signal?.throwIfAborted();
    opts.log.warn(`strategist model call failed: ${formatError(err)}`);
    return undefined;
  }

  const json = extractJsonObject(text);
  const checked = json ? checkValue(LlmDecisionsSchema, json) : undefined;
  if (!checked?.ok) {
    opts.log.warn("strategist model answer was not usable");
    return undefined;
  }

  const bySymbol = new Map(checked.value.decisions.map((d) => [d.symbol, d]));
  const decisions: TradingDecision[] = [];
  for (const stock of stocks) {
    const d = bySymbol.get(stock.symbol);
    if (!d) {
      opts.log.warn(`strategist model skipped ${stock.symbol}`);
      return undefined;
    }
    const decision: TradingDecision = {
      symbol: stock.symbol,
      name: stock.name,
      action: d.action,
      confidence: d.confidence,
      reasoning: d.reasoning,
      technical_score: stock.technical?.strength ?? 50,
      sentiment_score: stock.sentiment?.sentiment_score ?? 0,
      combined_score: d.combined_score,
    };
    if (d.action === "buy") {
      const sized = sizePosition(stock.current_price, opts.sizing);
      const cap = sized?.quantity ?? 0;
      decision.quantity = d.quantity != null ? Math.min(d.quantity, cap) : cap;
      decision.stop_loss = d.stop_loss ?? sized?.stop_loss;
      decision.target_price = d.target_price ?? sized?.target_price;
    }
    decisions.push(decision);
  }
  return decisions;
}

// ---------------------------------------------------------------------------
// Top pick
// ---------------------------------------------------------------------------

/** Highest (confidence, combined score) among buys at or above the threshold. */
export function selectTopPick(
  decisions: readonly TradingDecision[],
  minConfidence: number,
): TradingDecision | null {
  const buys = decisions
    .filter((d) => d.action === "buy" && d.confidence >= minConfidence)
    .sort((a, b) => b.confidence - a.confidence || b.combined_score - a.combined_score);
  return buys[0] ?? null;
}

// ---------------------------------------------------------------------------
// Unit
// ---------------------------------------------------------------------------

export type StrategistUnitDeps = {
  broker: Broker;
  chat?: ChatModel;
  minConfidence?: number;
};

export class StrategistUnit extends Unit<typeof StrategistInputSchema, StrategistOutput> {
  readonly name = "strategist";
  readonly description =
    "Combines technical and sentiment analysis into trade decisions and places the top pick.";
  readonly inputSchema = StrategistInputSchema;

  private readonly config: StrategistConfig;
  private readonly deps: StrategistUnitDeps;

  constructor(config: StrategistConfig, deps: StrategistUnitDeps) {
    super();
    this.config = config;
    this.deps = deps;
  }

  protected async run(input: StrategistInput, ctx: UnitRunContext): Promise<StrategistOutput> {
    const minConfidence =
      this.config.minConfidence ?? this.deps.minConfidence ?? DEFAULT_MIN_TRADE_CONFIDENCE;
    const stocks = combineAnalyses(input);
    if (stocks.length === 0) {
      ctx.log.warn("no analyzed stocks to decide on");
      return {
        decisions: [],
        top_pick: null,
        order_executed: false,
        order_details: null,
        execution_reason: null,
      };
    }

    let decisions: TradingDecision[] | undefined;
    if (this.config.useLlm && this.deps.chat) {
      decisions = await decideWithLlm(this.deps.chat, stocks, {
        minConfidence,
        sizing: this.config,
        signal: ctx.signal,
        log: ctx.log,
      });
    }
    if (!decisions) {
      decisions = stocks.map((s) => scoreStock(s, this.config));
    }

    const topPick = selectTopPick(decisions, minConfidence);
    if (!topPick) {
      ctx.log.info(`no buy at confidence >= ${minConfidence}`);
      return {
        decisions,
        top_pick: null,
        order_executed: false,
        order_details: null,
        execution_reason: null,
      };
    }

    ctx.log.info(`top pick ${topPick.symbol} (confidence ${topPick.confidence})`);
    if (!topPick.quantity || topPick.quantity <= 0) {
      return {
        decisions,
        top_pick: topPick,
        order_executed: false,
        order_details: null,
        execution_reason: "Order not executed: invalid quantity",
      };
    }

    ctx.signal.throwIfAborted();
    let order: OrderResult;
    try {
      order = await this.deps.broker.placeOrder({
        symbol: topPick.symbol,
        quantity: topPick.quantity,
        side: "BUY",
        orderType: "MARKET",
      });
    } catch (err) {
      ctx.log.error(`order for ${topPick.symbol} failed: ${formatError(err)}`);
      return {
        decisions,
        top_pick: topPick,
        order_executed: false,
        order_details: null,
        execution_reason: `Order not executed: ${formatError(err)}`,
      };
    }

    const executed = order.status === "success";
    return {
      decisions,
      top_pick: topPick,
      order_executed: executed,
      order_details: order,
      execution_reason: executed
        ? `High confidence (${topPick.confidence.toFixed(2)}) buy signal for ${topPick.symbol}`
        : `Order not executed: ${order.error ?? order.message ?? "rejected"}`,
    };
  }
}
