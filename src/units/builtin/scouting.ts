// ---------------------------------------------------------------------------
// Built-in Units – Scouting
// ---------------------------------------------------------------------------
// Screens a symbol universe on volatility (ATR%) and liquidity, then
// shortlists the best `top_n`. When fewer than `top_n` symbols meet every
// criterion, all screened symbols are scored and the best ones are taken.
// ---------------------------------------------------------------------------

import { Type, type Static } from "@sinclair/typebox";
import { formatError } from "../../logging.js";
import { atrPercentage, liquidityMetrics } from "../../market/indicators.js";
import type { MarketDataProvider, Quote } from "../../market/types.js";
import { Unit, UnitExecutionError, type UnitRunContext } from "../unit.js";
import { round } from "./schemas.js";

// ---------------------------------------------------------------------------
// Config & schemas
// ---------------------------------------------------------------------------

export const ScreeningCriteriaSchema = Type.Object({
  minAtrPct: Type.Number({ default: 2 }),
  maxAtrPct: Type.Number({ default: 5 }),
  idealAtrPct: Type.Number({ default: 3.5 }),
  minVolumeRatio: Type.Number({ default: 0.8 }),
  minAvgVolume: Type.Number({ default: 100_000 }),
});

export type ScreeningCriteria = Static<typeof ScreeningCriteriaSchema>;

export const ScoutingConfigSchema = Type.Object({
  universe: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
  historyDays: Type.Integer({ minimum: 20, default: 60 }),
  atrPeriod: Type.Integer({ minimum: 1, default: 14 }),
  criteria: Type.Optional(ScreeningCriteriaSchema),
});

export type ScoutingConfig = Static<typeof ScoutingConfigSchema>;

export const ScoutingInputSchema = Type.Object(
  {
    top_n: Type.Integer({ minimum: 1, maximum: 50, default: 10 }),
  },
  { default: {} },
);

export const DEFAULT_CRITERIA: ScreeningCriteria = {
  minAtrPct: 2,
  maxAtrPct: 5,
  idealAtrPct: 3.5,
  minVolumeRatio: 0.8,
  minAvgVolume: 100_000,
};

export type ScreeningResult = {
  symbol: string;
  name: string;
  current_price: number;
  atr_percentage: number | null;
  avg_volume: number;
  recent_volume: number;
  volume_ratio: number;
  meets_criteria: boolean;
  criteria_details: string[];
  score?: number;
};

export type ScoutingOutput = {
  shortlisted_stocks: ScreeningResult[];
  total_screened: number;
  qualifying_count: number;
  criteria: {
    atr_range: string;
    volume_ratio_min: number;
    min_avg_volume: number;
  };
};

// ---------------------------------------------------------------------------
// Screening
// ---------------------------------------------------------------------------

export function screenBars(
  quote: Quote,
  criteria: ScreeningCriteria,
  atrPeriod = 14,
): ScreeningResult | null {
  const last = quote.bars.at(-1);
  if (!last) {
    return null;
  }
  const atrPct = atrPercentage(quote.bars, atrPeriod);
  const liquidity = liquidityMetrics(quote.bars);
  const details: string[] = [];
  let meets = true;

  if (atrPct === null) {
    meets = false;
    details.push("ATR calculation failed");
  } else if (atrPct < criteria.minAtrPct) {
    meets = false;
    details.push(`ATR too low: ${atrPct.toFixed(2)}%`);
  } else if (atrPct > criteria.maxAtrPct) {
    meets = false;
    details.push(`ATR too high: ${atrPct.toFixed(2)}%`);
  } else {
    details.push(`ATR OK: ${atrPct.toFixed(2)}%`);
  }

  if (liquidity.volumeRatio < criteria.minVolumeRatio) {
    meets = false;
    details.push(`Volume ratio low: ${liquidity.volumeRatio.toFixed(2)}`);
  } else {
    details.push(`Volume ratio OK: ${liquidity.volumeRatio.toFixed(2)}`);
  }

  if (liquidity.avgVolume < criteria.minAvgVolume) {
    meets = false;
    details.push(`Avg volume too low: ${liquidity.avgVolume.toFixed(0)}`);
  } else {
    details.push(`Avg volume OK: ${liquidity.avgVolume.toFixed(0)}`);
  }

  return {
    symbol: quote.symbol,
    name: quote.name,
    current_price: last.close,
    atr_percentage: atrPct,
    avg_volume: liquidity.avgVolume,
    recent_volume: liquidity.recentVolume,
    volume_ratio: liquidity.volumeRatio,
    meets_criteria: meets,
    criteria_details: details,
  };
}

/** Higher is better: ATR near the ideal, rising volume, deep liquidity. */
export function screeningScore(stock: ScreeningResult, criteria: ScreeningCriteria): number {
  let score = 0;
  const atrPct = stock.atr_percentage;
  if (atrPct) {
    if (atrPct >= criteria.minAtrPct && atrPct <= criteria.maxAtrPct) {
      score += 50 - Math.abs(atrPct - criteria.idealAtrPct) * 10;
    } else {
      score -= 20;
    }
  }
  score += stock.volume_ratio * 30;
  score += Math.min(stock.avg_volume / 1_000_000, 1) * 20;
  return score;
}

export function shortlist(
  results: readonly ScreeningResult[],
  topN: number,
  criteria: ScreeningCriteria,
): ScreeningResult[] {
  const qualifying = results.filter((r) => r.meets_criteria);
  if (qualifying.length >= topN) {
    const atrDistance = (r: ScreeningResult) =>
      r.atr_percentage ? -Math.abs(r.atr_percentage - criteria.idealAtrPct) : 0;
    return [...qualifying]
      .sort((a, b) => b.volume_ratio - a.volume_ratio || atrDistance(b) - atrDistance(a))
      .slice(0, topN);
  }
  return results
    .map((r) => ({ ...r, score: round(screeningScore(r, criteria)) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, topN);
}

// ---------------------------------------------------------------------------
// Unit
// ---------------------------------------------------------------------------

export class ScoutingUnit extends Unit<typeof ScoutingInputSchema, ScoutingOutput> {
  readonly name = "scouting";
  readonly description = "Screens the configured universe for liquid stocks with tradeable volatility.";
  readonly inputSchema = ScoutingInputSchema;

  private readonly config: ScoutingConfig;
  private readonly market: MarketDataProvider;

  constructor(config: ScoutingConfig, market: MarketDataProvider) {
    super();
    this.config = config;
    this.market = market;
  }

  protected async run(
    input: Static<typeof ScoutingInputSchema>,
    ctx: UnitRunContext,
  ): Promise<ScoutingOutput> {
    const criteria = this.config.criteria ?? DEFAULT_CRITERIA;
    ctx.log.info(`screening ${this.config.universe.length} symbols, top_n=${input.top_n}`);

    const results: ScreeningResult[] = [];
    for (const symbol of this.config.universe) {
      ctx.signal.throwIfAborted();
      try {
        const quote = await this.market.getDailyBars(symbol, {
          days: this.config.historyDays,
          signal: ctx.signal,
        });
        const result = screenBars(quote, criteria, this.config.atrPeriod);
        if (result) {
          results.push(result);
        } else {
          ctx.log.warn(`no bars for ${symbol}`);
        }
      } catch (err) {
        ctx.signal.throwIfAborted();
        ctx.log.warn(`screening ${symbol} failed: ${formatError(err)}`);
      }
    }

    if (results.length === 0) {
      throw new UnitExecutionError(this.name, "No symbol in the universe could be screened");
    }

    const qualifyingCount = results.filter((r) => r.meets_criteria).length;
    ctx.log.info(`${qualifyingCount}/${results.length} symbols meet the criteria`);

    return {
      shortlisted_stocks: shortlist(results, input.top_n, criteria),
      total_screened: results.length,
      qualifying_count: qualifyingCount,
      criteria: {
        atr_range: `${criteria.minAtrPct}-${criteria.maxAtrPct}%`,
        volume_ratio_min: criteria.minVolumeRatio,
        min_avg_volume: criteria.minAvgVolume,
      },
    };
  }
}
