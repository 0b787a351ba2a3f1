/**
 * Daily bars from the Yahoo Finance chart endpoint.
 *
 * Rows with a missing field (holidays, halted sessions) are dropped. The
 * display name falls back to the symbol without its exchange suffix.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { DailyBar, MarketDataProvider, Quote } from "./types.js";

const DEFAULT_BASE_URL = "https://query1.finance.yahoo.com/v8/finance/chart";

const NullableNumbers = Type.Array(Type.Union([Type.Number(), Type.Null()]));

const ChartResponseSchema = Type.Object({
  chart: Type.Object({
    result: Type.Union([
      Type.Array(
        Type.Object({
          meta: Type.Object({
            symbol: Type.String(),
            longName: Type.Optional(Type.String()),
            shortName: Type.Optional(Type.String()),
          }),
          timestamp: Type.Optional(Type.Array(Type.Number())),
          indicators: Type.Object({
            quote: Type.Array(
              Type.Object({
                open: NullableNumbers,
                high: NullableNumbers,
                low: NullableNumbers,
                close: NullableNumbers,
                volume: NullableNumbers,
              }),
            ),
          }),
        }),
      ),
      Type.Null(),
    ]),
    error: Type.Optional(
      Type.Union([Type.Object({ description: Type.Optional(Type.String()) }), Type.Null()]),
    ),
  }),
});

export type YahooChartProviderOpts = {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

export function displayName(symbol: string): string {
  return symbol.replace(/\.[A-Z]+$/, "");
}

/** Calendar range covering the requested number of trading days. */
function rangeFor(days: number): string {
  if (days <= 30) return "1mo";
  if (days <= 90) return "3mo";
  if (days <= 180) return "6mo";
  if (days <= 365) return "1y";
  return "2y";
}

export class YahooChartProvider implements MarketDataProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(opts?: YahooChartProviderOpts) {
    this.baseUrl = (opts?.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = opts?.timeoutMs ?? 30_000;
    this.fetchImpl = opts?.fetchImpl ?? fetch;
  }

  async getDailyBars(symbol: string, opts: { days: number; signal?: AbortSignal }): Promise<Quote> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = opts.signal ? AbortSignal.any([opts.signal, timeout]) : timeout;
    const url = `${this.baseUrl}/${encodeURIComponent(symbol)}?interval=1d&range=${rangeFor(Math.ceil(opts.days * 1.5))}`;

    const res = await this.fetchImpl(url, { headers: { "User-Agent": "trade-graph" }, signal });
    if (!res.ok) {
      throw new Error(`Chart request for ${symbol} failed (${res.status})`);
    }
    const body: unknown = await res.json();
    if (!Value.Check(ChartResponseSchema, body)) {
      throw new Error(`Unexpected chart response for ${symbol}`);
    }
    const result = body.chart.result?.[0];
    if (!result) {
      const reason = body.chart.error?.description ?? "no data";
      throw new Error(`No chart data for ${symbol}: ${reason}`);
    }

    const quote = result.indicators.quote[0];
    const bars: DailyBar[] = [];
    for (const [i, ts] of (result.timestamp ?? []).entries()) {
      const open = quote?.open[i];
      const high = quote?.high[i];
      const low = quote?.low[i];
      const close = quote?.close[i];
      const volume = quote?.volume[i];
      if (open == null || high == null || low == null || close == null || volume == null) {
        continue;
      }
      bars.push({
        date: new Date(ts * 1000).toISOString().slice(0, 10),
        open,
        high,
        low,
        close,
        volume,
      });
    }

    return {
      symbol,
      name: result.meta.longName ?? result.meta.shortName ?? displayName(symbol),
      bars: bars.slice(-opts.days),
    };
  }
}
