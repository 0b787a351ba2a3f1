import { describe, expect, it } from "vitest";
import { atr, atrPercentage, ema, emaSeries, liquidityMetrics, macd, rsi, sma } from "./indicators.js";
import type { DailyBar } from "./types.js";

function flatBars(count: number, volume = 1000): DailyBar[] {
  return Array.from({ length: count }, (_, i) => ({
    date: `2024-01-${String(i + 1).padStart(2, "0")}`,
    open: 10,
    high: 11,
    low: 9,
    close: 10,
    volume,
  }));
}

describe("moving averages", () => {
  it("averages the trailing window", () => {
    expect(sma([1, 2, 3, 4], 2)).toBe(3.5);
    expect(sma([1], 2)).toBeNull();
  });

  it("seeds the EMA with the first value", () => {
    expect(emaSeries([1, 2, 3], 3)).toEqual([1, 1.5, 2.25]);
    expect(ema([1, 2, 3], 3)).toBe(2.25);
    expect(ema([1, 2], 3)).toBeNull();
  });
});

describe("rsi", () => {
  it("is 100 when prices only rise", () => {
    expect(rsi(Array.from({ length: 15 }, (_, i) => 10 + i))).toBe(100);
  });

  it("is 50 when gains and losses balance", () => {
    const closes = Array.from({ length: 15 }, (_, i) => (i % 2 === 0 ? 10 : 11));
    expect(rsi(closes)).toBe(50);
  });

  it("is undefined for a flat or short series", () => {
    expect(rsi(Array.from({ length: 15 }, () => 10))).toBeNull();
    expect(rsi([1, 2, 3])).toBeNull();
  });
});

describe("macd", () => {
  it("is zero for a constant series", () => {
    const result = macd(Array.from({ length: 40 }, () => 5));
    expect(result?.macd).toBeCloseTo(0, 10);
    expect(result?.histogram).toBeCloseTo(0, 10);
  });

  it("needs slow + signal bars", () => {
    expect(macd(Array.from({ length: 34 }, (_, i) => i))).toBeNull();
  });

  it("turns positive in an uptrend", () => {
    const result = macd(Array.from({ length: 60 }, (_, i) => 100 + i));
    expect(result?.macd).toBeGreaterThan(0);
  });
});

describe("atr", () => {
  it("averages the true range", () => {
    expect(atr(flatBars(15))).toBe(2);
    expect(atrPercentage(flatBars(15))).toBeCloseTo(20, 10);
    expect(atr(flatBars(14))).toBeNull();
  });
});

describe("liquidityMetrics", () => {
  it("compares recent volume to the whole series", () => {
    const bars = [...flatBars(5, 100), ...flatBars(5, 200)];
    expect(liquidityMetrics(bars)).toEqual({ avgVolume: 150, recentVolume: 200, volumeRatio: 200 / 150 });
  });

  it("is zero for no bars", () => {
    expect(liquidityMetrics([])).toEqual({ avgVolume: 0, recentVolume: 0, volumeRatio: 0 });
  });
});
