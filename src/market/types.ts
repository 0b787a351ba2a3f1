// ---------------------------------------------------------------------------
// Market Data – Types
// ---------------------------------------------------------------------------

export type DailyBar = {
  /** ISO date, `YYYY-MM-DD`. */
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

export type Quote = {
  symbol: string;
  name: string;
  bars: DailyBar[];
};

/** Source of daily OHLCV history, oldest bar first. */
export interface MarketDataProvider {
  getDailyBars(symbol: string, opts: { days: number; signal?: AbortSignal }): Promise<Quote>;
}
