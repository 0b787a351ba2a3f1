// ---------------------------------------------------------------------------
// Built-in Units – Technical Analysis
// ---------------------------------------------------------------------------
// RSI, MACD and moving averages per shortlisted stock, folded into a trend,
// a 0–100 strength score and a recommendation. Stocks with too little
// history are left out of the result.
// ---------------------------------------------------------------------------

import { Type, type Static } from "@sinclair/typebox";
import { formatError } from "../../logging.js";
import { ema, macd, rsi, sma } from "../../market/indicators.js";
import type { MarketDataProvider } from "../../market/types.js";
import { Unit, type UnitRunContext } from "../unit.js";
import { round, StockListInputSchema, type Recommendation, type StockInput } from "./schemas.js";

export const TechnicalConfigSchema = Type.Object({
  historyDays: Type.Integer({ minimum: 50, default: 90 }),
  minBars: Type.Integer({ minimum: 35, default: 50 }),
});

export type TechnicalConfig = Static<typeof TechnicalConfigSchema>;

export type Trend = "bullish" | "bearish" | "neutral";

export type TechnicalIndicators = {
  rsi: number | null;
  macd: number | null;
  macd_signal: number | null;
  macd_histogram: number | null;
  sma_20: number | null;
  sma_50: number | null;
  ema_12: number | null;
  ema_26: number | null;
};

export type TechnicalAnalysis = {
  symbol: string;
  name: string;
  current_price: number;
  indicators: TechnicalIndicators;
  trend: Trend;
  strength: number;
  signals: string[];
  recommendation: Recommendation;
};

export type TechnicalOutput = {
  analyzed_stocks: TechnicalAnalysis[];
  total_analyzed: number;
  bullish_count: number;
  bearish_count: number;
  neutral_count: number;
};

// ---------------------------------------------------------------------------
// Scoring
// ---------------------------------------------------------------------------

export function determineTrend(price: number, sma20: number | null, sma50: number | null): Trend {
  if (sma20 === null || sma50 === null) {
    return "neutral";
  }
  if (price > sma20 && sma20 > sma50) {
    return "bullish";
  }
  if (price < sma20 && sma20 < sma50) {
    return "bearish";
  }
  return "neutral";
}

export function generateSignals(ind: TechnicalIndicators, trend: Trend): string[] {
  const signals: string[] = [];
  if (ind.rsi !== null) {
    if (ind.rsi < 30) {
      signals.push("RSI Oversold (<30)");
    } else if (ind.rsi > 70) {
      signals.push("RSI Overbought (>70)");
    } else if (ind.rsi >= 40 && ind.rsi <= 60) {
      signals.push("RSI Neutral");
    }
  }
  if (ind.macd !== null && ind.macd_signal !== null) {
    signals.push(ind.macd > ind.macd_signal ? "MACD Bullish (above signal)" : "MACD Bearish (below signal)");
  }
  signals.push(`Trend: ${trend.charAt(0).toUpperCase()}${trend.slice(1)}`);
  return signals;
}

/** Starts at 50; RSI ±20, MACD histogram ±15, trend ±15; clamped to 0–100. */
export function strengthScore(rsiValue: number | null, histogram: number | null, trend: Trend): number {
  let score = 50;
  if (rsiValue !== null) {
    if (rsiValue < 30) {
      score += 20;
    } else if (rsiValue > 70) {
      score -= 20;
    } else if (rsiValue >= 40 && rsiValue <= 60) {
      score += 5;
    }
  }
  if (histogram !== null) {
    score += Math.sign(histogram) * Math.min(15, Math.abs(histogram) * 10);
  }
  if (trend === "bullish") {
    score += 15;
  } else if (trend === "bearish") {
    score -= 15;
  }
  return Math.max(0, Math.min(100, score));
}

export function recommendationFor(strength: number): Recommendation {
  if (strength >= 70) return "strong_buy";
  if (strength >= 55) return "buy";
  if (strength >= 45) return "hold";
  if (strength >= 30) return "sell";
  return "strong_sell";
}

export function analyzeCloses(stock: StockInput, closes: readonly number[]): TechnicalAnalysis {
  const m = macd(closes);
  const indicators: TechnicalIndicators = {
    rsi: rsi(closes),
    macd: m?.macd ?? null,
    macd_signal: m?.signal ?? null,
    macd_histogram: m?.histogram ?? null,
    sma_20: sma(closes, 20),
    sma_50: sma(closes, 50),
    ema_12: ema(closes, 12),
    ema_26: ema(closes, 26),
  };
  const trend = determineTrend(stock.current_price, indicators.sma_20, indicators.sma_50);
  const strength = strengthScore(indicators.rsi, indicators.macd_histogram, trend);
  return {
    symbol: stock.symbol,
    name: stock.name,
    current_price: stock.current_price,
    indicators,
    trend,
    strength: round(strength),
    signals: generateSignals(indicators, trend),
    recommendation: recommendationFor(strength),
  };
}

// ---------------------------------------------------------------------------
// Unit
// ---------------------------------------------------------------------------

export class TechnicalUnit extends Unit<typeof StockListInputSchema, TechnicalOutput> {
  readonly name = "technical";
  readonly description = "Momentum and trend indicators for each shortlisted stock.";
  readonly inputSchema = StockListInputSchema;

  private readonly config: TechnicalConfig;
  private readonly market: MarketDataProvider;

  constructor(config: TechnicalConfig, market: MarketDataProvider) {
    super();
    this.config = config;
    this.market = market;
  }

  protected async run(
    input: Static<typeof StockListInputSchema>,
    ctx: UnitRunContext,
  ): Promise<TechnicalOutput> {
    const analyzed: TechnicalAnalysis[] = [];
    for (const stock of input.stocks) {
      ctx.signal.throwIfAborted();
      let closes: number[];
      try {
        const quote = await this.market.getDailyBars(stock.symbol, {
          days: this.config.historyDays,
          signal: ctx.signal,
        });
        closes = quote.bars.map((b) => b.close);
      } catch (err) {
        ctx.signal.throwIfAborted();
        ctx.log.warn(`history for ${stock.symbol} unavailable: ${formatError(err)}`);
        continue;
      }
      if (closes.length < this.config.minBars) {
        ctx.log.warn(`insufficient history for ${stock.symbol}: ${closes.length} bars`);
        continue;
      }
      const analysis = analyzeCloses(stock, closes);
      ctx.log.info(
        `${stock.symbol}: ${analysis.trend}, strength ${analysis.strength}, ${analysis.recommendation}`,
      );
      analyzed.push(analysis);
    }

    return {
      analyzed_stocks: analyzed,
      total_analyzed: analyzed.length,
      bullish_count: analyzed.filter((a) => a.trend === "bullish").length,
      bearish_count: analyzed.filter((a) => a.trend === "bearish").length,
      neutral_count: analyzed.filter((a) => a.trend === "neutral").length,
    };
  }
}
