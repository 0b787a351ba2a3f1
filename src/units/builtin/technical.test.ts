import { describe, expect, it } from "vitest";
import { ResultCache } from "../../cache/result-cache.js";
import { silentLogger } from "../../logging.js";
import type { MarketDataProvider } from "../../market/types.js";
import type { UnitRunContext } from "../unit.js";
import {
  determineTrend,
  generateSignals,
  recommendationFor,
  strengthScore,
  TechnicalUnit,
  type TechnicalIndicators,
} from "./technical.js";

function makeCtx(): UnitRunContext {
  return {
    executionId: "test",
    signal: new AbortController().signal,
    log: silentLogger,
    cache: new ResultCache(),
  };
}

const EMPTY_INDICATORS: TechnicalIndicators = {
  rsi: null,
  macd: null,
  macd_signal: null,
  macd_histogram: null,
  sma_20: null,
  sma_50: null,
  ema_12: null,
  ema_26: null,
};

describe("determineTrend", () => {
  it("needs price and averages stacked in one direction", () => {
    expect(determineTrend(110, 105, 100)).toBe("bullish");
    expect(determineTrend(90, 95, 100)).toBe("bearish");
    expect(determineTrend(102, 105, 100)).toBe("neutral");
    expect(determineTrend(110, null, 100)).toBe("neutral");
  });
});

describe("strengthScore", () => {
  it("adds RSI, MACD and trend contributions", () => {
    expect(strengthScore(25, 2, "bullish")).toBe(100);
    expect(strengthScore(75, -0.5, "bearish")).toBe(10);
    expect(strengthScore(50, null, "neutral")).toBe(55);
    expect(strengthScore(35, 0, "neutral")).toBe(50);
  });
});

describe("recommendationFor", () => {
  it("maps strength bands", () => {
    expect([70, 69.9, 55, 54.9, 45, 30, 29.9].map(recommendationFor)).toEqual([
      "strong_buy",
      "buy",
      "buy",
      "hold",
      "hold",
      "sell",
      "strong_sell",
    ]);
  });
});

describe("generateSignals", () => {
  it("lists RSI, MACD and trend signals", () => {
    expect(generateSignals({ ...EMPTY_INDICATORS, rsi: 25, macd: 1, macd_signal: 0.5 }, "bullish")).toEqual([
      "RSI Oversold (<30)",
      "MACD Bullish (above signal)",
      "Trend: Bullish",
    ]);
    expect(generateSignals({ ...EMPTY_INDICATORS, rsi: 65, macd: 0, macd_signal: 0.5 }, "neutral")).toEqual([
      "MACD Bearish (below signal)",
      "Trend: Neutral",
    ]);
  });
});

describe("TechnicalUnit", () => {
  const market: MarketDataProvider = {
    async getDailyBars(symbol) {
      const count = symbol === "SHORT.NS" ? 30 : 60;
      return {
        symbol,
        name: symbol,
        bars: Array.from({ length: count }, (_, i) => ({
          date: `d${i}`,
          open: 100 + i,
          high: 101 + i,
          low: 99 + i,
          close: 100 + i,
          volume: 1000,
        })),
      };
    },
  };

  it("analyzes stocks with enough history and skips the rest", async () => {
    const unit = new TechnicalUnit({ historyDays: 90, minBars: 50 }, market);
    const outcome = await unit.execute(
      {
        stocks: [
          { symbol: "UP.NS", name: "Up", current_price: 160, atr_percentage: null },
          { symbol: "SHORT.NS", name: "Short", current_price: 50 },
        ],
      },
      makeCtx(),
    );
    if (outcome.status !== "succeeded") throw new Error(outcome.message);

    expect(outcome.output.total_analyzed).toBe(1);
    expect(outcome.output.bullish_count).toBe(1);
    const [up] = outcome.output.analyzed_stocks;
    expect(up.symbol).toBe("UP.NS");
    expect(up.indicators.sma_20).toBe(149.5);
    expect(up.indicators.sma_50).toBe(134.5);
    expect(up.indicators.rsi).toBe(100);
    expect(up.trend).toBe("bullish");
    expect(up.signals[0]).toBe("RSI Overbought (>70)");
    expect(up.signals.at(-1)).toBe("Trend: Bullish");
  });

  it("rejects an empty stock list", async () => {
    const unit = new TechnicalUnit({ historyDays: 90, minBars: 50 }, market);
    const outcome = await unit.execute({ stocks: [] }, makeCtx());
    expect(outcome).toMatchObject({ status: "failed", errorKind: "validation" });
  });
});
