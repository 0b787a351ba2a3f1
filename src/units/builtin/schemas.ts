// ---------------------------------------------------------------------------
// Built-in Units – Shared Schemas
// ---------------------------------------------------------------------------

import { Type, type Static } from "@sinclair/typebox";
import { literalUnion } from "../../schema/typebox.js";

export const RECOMMENDATIONS = ["strong_buy", "buy", "hold", "sell", "strong_sell"] as const;

export type Recommendation = (typeof RECOMMENDATIONS)[number];

export const RecommendationSchema = literalUnion(RECOMMENDATIONS);

/** A shortlisted stock as handed from screening to the analysis units. */
export const StockInputSchema = Type.Object({
  symbol: Type.String({ minLength: 1 }),
  name: Type.String(),
  current_price: Type.Number({ exclusiveMinimum: 0 }),
  atr_percentage: Type.Optional(Type.Union([Type.Number(), Type.Null()])),
  avg_volume: Type.Optional(Type.Number()),
  volume_ratio: Type.Optional(Type.Number()),
  meets_criteria: Type.Optional(Type.Boolean()),
});

export type StockInput = Static<typeof StockInputSchema>;

export const StockListInputSchema = Type.Object({
  stocks: Type.Array(StockInputSchema, { minItems: 1 }),
});

export function round(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
