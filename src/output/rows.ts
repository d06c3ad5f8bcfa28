import { BANDS } from '@/utils/config.ts';
import { SIGNAL_LABELS } from '@/strategy/signals.ts';
import type { Category, Timeframe } from '@/utils/config.ts';
import type { SymbolErrorKind } from '@/utils/errors.ts';
import type { BatchResult, SymbolOutcome } from '@/engine/batch.ts';
import type { BandResult } from '@/strategy/indicators.ts';

export type Cell = string | number;
export type Row = Cell[];

export type SheetTable = {
  headers: string[];
  rows: Row[];
};

export const EMPTY_CELL = '-';

export const FAILURE_MARKERS: Record<SymbolErrorKind, string> = {
  'empty-result': 'No Data',
  'insufficient-data': 'Insufficient Data',
  network: 'Network Error',
  unknown: 'Error',
};

export const dailyHeaders = (period: number = BANDS.period): string[] => [
  'Symbol',
  'Current Price',
  'Change %',
  `SMA(${period})`,
  'Upper Band',
  'Lower Band',
  'Signal',
  'Position %',
  'Volume',
];

export const hourlyHeaders = (period: number = BANDS.period): string[] => [
  'Symbol',
  'Current Price',
  'Lower Band',
  `SMA(${period})`,
  'Upper Band',
];

export const headersFor = (timeframe: Timeframe, period: number = BANDS.period): string[] =>
  timeframe === 'daily' ? dailyHeaders(period) : hourlyHeaders(period);

export const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

export const formatPercent = (value: number, digits: number): string => `${value.toFixed(digits)}%`;

/** Indian numbering units: crore, lakh, thousand. */
export const formatVolume = (volume: number): string => {
  if (volume >= 10_000_000) return `${(volume / 10_000_000).toFixed(2)}Cr`;
  if (volume >= 100_000) return `${(volume / 100_000).toFixed(2)}L`;
  if (volume >= 1_000) return `${(volume / 1_000).toFixed(2)}K`;
  return String(Math.trunc(volume));
};

export const formatWorksheetName = (category: Category, timeframe: Timeframe): string =>
  `${category} ${timeframe === 'daily' ? 'Daily' : 'Hourly'} BB`;

const dailyRow = (symbol: string, r: BandResult): Row => [
  symbol,
  round(r.currentPrice, 2),
  formatPercent(r.changePct, 2),
  round(r.sma, 2),
  round(r.upperBand, 2),
  round(r.lowerBand, 2),
  SIGNAL_LABELS[r.signal],
  formatPercent(r.positionPct, 1),
  formatVolume(r.volume),
];

const hourlyRow = (symbol: string, r: BandResult): Row => [
  symbol,
  round(r.currentPrice, 2),
  round(r.lowerBand, 2),
  round(r.sma, 2),
  round(r.upperBand, 2),
];

export const outcomeToRow = (outcome: SymbolOutcome, timeframe: Timeframe): Row => {
  if (outcome.ok) {
    return timeframe === 'daily'
      ? dailyRow(outcome.symbol, outcome.result)
      : hourlyRow(outcome.symbol, outcome.result);
  }
  const width = headersFor(timeframe).length;
  return [
    outcome.symbol,
    FAILURE_MARKERS[outcome.error.kind],
    ...Array.from({ length: width - 2 }, () => EMPTY_CELL),
  ];
};

/** Failed symbols stay in the table, in input order, with a marker in the price column. */
export const assembleTable = (
  result: BatchResult,
  period: number = BANDS.period,
): SheetTable => ({
  headers: headersFor(result.timeframe, period),
  rows: result.outcomes.map((o) => outcomeToRow(o, result.timeframe)),
});
