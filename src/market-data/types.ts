import type { Timeframe } from '@/utils/config.ts';

export type PriceBar = {
  /** Bar open time, epoch milliseconds. */
  t: number;
  o: number;
  h: number;
  l: number;
  c: number;
  v: number;
};

/** Bars for one symbol, ascending by `t`. */
export type PriceSeries = {
  symbol: string;
  timeframe: Timeframe;
  bars: PriceBar[];
};

export interface MarketDataSource {
  fetchSeries(symbol: string, timeframe: Timeframe): Promise<PriceSeries>;
}
