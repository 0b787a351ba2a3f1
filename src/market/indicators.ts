// ---------------------------------------------------------------------------
// Market Data – Indicators
// ---------------------------------------------------------------------------
// Pure functions over oldest-first series. Each returns `null` when the
// series is too short for its window.
// ---------------------------------------------------------------------------

import type { DailyBar } from "./types.js";

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function sma(values: readonly number[], period: number): number | null {
  if (values.length < period || period <= 0) {
    return null;
  }
  return mean(values.slice(-period));
}

/** Full EMA series, seeded with the first value (`alpha = 2 / (span + 1)`). */
export function emaSeries(values: readonly number[], span: number): number[] {
  const alpha = 2 / (span + 1);
  const out: number[] = [];
  for (const [i, v] of values.entries()) {
    out.push(i === 0 ? v : alpha * v + (1 - alpha) * out[i - 1]);
  }
  return out;
}

export function ema(values: readonly number[], span: number): number | null {
  if (values.length < span) {
    return null;
  }
  return emaSeries(values, span).at(-1) ?? null;
}

/** RSI over simple rolling means of gains and losses. */
export function rsi(closes: readonly number[], period = 14): number | null {
  if (closes.length < period + 1) {
    return null;
  }
  const recent = closes.slice(-(period + 1));
  let gains = 0;
  let losses = 0;
  for (let i = 1; i < recent.length; i++) {
    const delta = recent[i] - recent[i - 1];
    if (delta > 0) {
      gains += delta;
    } else {
      losses -= delta;
    }
  }
  if (losses === 0) {
    return gains === 0 ? null : 100;
  }
  const rs = gains / period / (losses / period);
  return 100 - 100 / (1 + rs);
}

export type Macd = { macd: number; signal: number; histogram: number };

export function macd(closes: readonly number[], fast = 12, slow = 26, signal = 9): Macd | null {
  if (closes.length < slow + signal) {
    return null;
  }
  const fastSeries = emaSeries(closes, fast);
  const slowSeries = emaSeries(closes, slow);
  const line = fastSeries.map((v, i) => v - slowSeries[i]);
  const signalSeries = emaSeries(line, signal);
  const m = line[line.length - 1];
  const s = signalSeries[signalSeries.length - 1];
  return { macd: m, signal: s, histogram: m - s };
}

/** Mean true range over the last `period` bars. */
export function atr(bars: readonly DailyBar[], period = 14): number | null {
  if (bars.length < period + 1) {
    return null;
  }
  const ranges: number[] = [];
  for (let i = 1; i < bars.length; i++) {
    const { high, low } = bars[i];
    const prevClose = bars[i - 1].close;
    ranges.push(Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose)));
  }
  return mean(ranges.slice(-period));
}

export function atrPercentage(bars: readonly DailyBar[], period = 14): number | null {
  const value = atr(bars, period);
  const last = bars.at(-1);
  if (value === null || !last || last.close <= 0) {
    return null;
  }
  return (value / last.close) * 100;
}

export type LiquidityMetrics = {
  avgVolume: number;
  recentVolume: number;
  volumeRatio: number;
};

/** Whole-series average volume against the last `recentPeriod` bars. */
export function liquidityMetrics(bars: readonly DailyBar[], recentPeriod = 5): LiquidityMetrics {
  if (bars.length === 0) {
    return { avgVolume: 0, recentVolume: 0, volumeRatio: 0 };
  }
  const volumes = bars.map((b) => b.volume);
  const avgVolume = mean(volumes);
  const recentVolume = mean(volumes.slice(-Math.min(recentPeriod, volumes.length)));
  return {
    avgVolume,
    recentVolume,
    volumeRatio: avgVolume > 0 ? recentVolume / avgVolume : 0,
  };
}
