import { MARKET } from '@/utils/config.ts';

export const toYahooSymbol = (symbol: string): string => {
  const trimmed = symbol.trim().toUpperCase();
  return trimmed.endsWith(MARKET.symbolSuffix) ? trimmed : `${trimmed}${MARKET.symbolSuffix}`;
};

export const toDisplaySymbol = (symbol: string): string =>
  symbol.endsWith(MARKET.symbolSuffix) ? symbol.slice(0, -MARKET.symbolSuffix.length) : symbol;

export const cleanSymbolList = (raw: readonly string[]): string[] =>
  raw.map((s) => s.trim().toUpperCase()).filter((s) => s.length > 0);
