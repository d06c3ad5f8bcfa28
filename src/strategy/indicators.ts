import { BANDS } from '@/utils/config.ts';
import { InsufficientDataError } from '@/utils/errors.ts';
import { classifySignal } from '@/strategy/signals.ts';
import type { Timeframe } from '@/utils/config.ts';
import type { PriceSeries } from '@/market-data/types.ts';
import type { Signal } from '@/strategy/signals.ts';

export type BollingerBands = {
  upper: number;
  middle: number;
  lower: number;
  stdDev: number;
};

export type BandResult = Readonly<{
  symbol: string;
  timeframe: Timeframe;
  currentPrice: number;
  changePct: number;
  sma: number;
  upperBand: number;
  lowerBand: number;
  stdDev: number;
  positionPct: number;
  signal: Signal;
  volume: number;
}>;

export type BandOptions = {
  period?: number;
  numStd?: number;
};

/**
 * Mean and sample standard deviation (n - 1) via Welford's update.
 * A constant window gives the exact value back and a deviation of 0.
 */
export const meanAndStdDev = (values: readonly number[]): { mean: number; stdDev: number } => {
  let mean = 0;
  let m2 = 0;
  values.forEach((x, i) => {
    const delta = x - mean;
    mean += delta / (i + 1);
    m2 += delta * (x - mean);
  });
  const stdDev = values.length > 1 ? Math.sqrt(Math.max(m2, 0) / (values.length - 1)) : 0;
  return { mean, stdDev };
};

export const calculateBollingerBands = (
  closes: readonly number[],
  period: number = BANDS.period,
  multiplier: number = BANDS.numStd,
): BollingerBands => {
  if (closes.length < period) {
    throw new InsufficientDataError(closes.length, period);
  }

  const { mean, stdDev } = meanAndStdDev(closes.slice(-period));

  return {
    upper: mean + multiplier * stdDev,
    middle: mean,
    lower: mean - multiplier * stdDev,
    stdDev,
  };
};

/** Where `price` sits inside the band, in percent. Not clamped; 50 for a flat band. */
export const calculatePositionPct = (price: number, bands: BollingerBands): number => {
  const width = bands.upper - bands.lower;
  if (width === 0) return 50;
  return ((price - bands.lower) / width) * 100;
};

export const calculateChangePct = (closes: readonly number[]): number => {
  if (closes.length < 2) return 0;
  const current = closes[closes.length - 1];
  const previous = closes[closes.length - 2];
  if (previous === 0) return 0;
  return ((current - previous) / previous) * 100;
};

export const computeBands = (series: PriceSeries, options: BandOptions = {}): BandResult => {
  const period = options.period ?? BANDS.period;
  const numStd = options.numStd ?? BANDS.numStd;

  if (!Number.isInteger(period) || period < 1) {
    throw new RangeError(`period must be a positive integer, got ${period}`);
  }

  const closes = series.bars.map((b) => b.c);
  const bands = calculateBollingerBands(closes, period, numStd);
  const latest = series.bars[series.bars.length - 1];
  const positionPct = calculatePositionPct(latest.c, bands);

  const result: BandResult = {
    symbol: series.symbol,
    timeframe: series.timeframe,
    currentPrice: latest.c,
    changePct: calculateChangePct(closes),
    sma: bands.middle,
    upperBand: bands.upper,
    lowerBand: bands.lower,
    stdDev: bands.stdDev,
    positionPct,
    signal: bands.upper === bands.lower ? 'neutral' : classifySignal(positionPct),
    volume: latest.v,
  };

  return Object.freeze(result);
};
